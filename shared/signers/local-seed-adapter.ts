/**
 * Local seed adapter for development and testing
 * Derives every key from in-memory root seeds (not a threshold signer)
 */

import { utf8ToBytes } from '@noble/hashes/utils';
import type { SignerAdapter } from './signer-adapter';
import { SignerError, SignerErrorCode } from './errors';
import { type RootKey, derivePublicKey, rootKeyFromSeed, signDerived } from './schnorr';
import type { SeedStore } from './seed-store';
import {
  type CallContext,
  type DerivationPath,
  type SchnorrKeyId,
  type SchnorrPublicKeyArgs,
  type SchnorrPublicKeyResult,
  type SignWithSchnorrArgs,
  type SignWithSchnorrResult,
  isSchnorrAlgorithm,
} from './types';

export const MAX_DERIVATION_PATH_LENGTH = 255;

export interface LocalSeedAdapterOptions {
  seeds: SeedStore;
  /** Called once per signature actually produced */
  onSignature?: (keyId: SchnorrKeyId) => void;
}

export class LocalSeedAdapter implements SignerAdapter {
  private seeds: SeedStore;
  private onSignature?: (keyId: SchnorrKeyId) => void;
  private rootKeys = new Map<string, RootKey>();

  constructor(options: LocalSeedAdapterOptions) {
    this.seeds = options.seeds;
    this.onSignature = options.onSignature;
  }

  async schnorrPublicKey(
    args: SchnorrPublicKeyArgs,
    context: CallContext = {}
  ): Promise<SchnorrPublicKeyResult> {
    const root = this.rootKey(args.keyId);
    const principal = args.canisterId ?? context.caller;
    return derivePublicKey(root, effectivePath(principal, args.derivationPath));
  }

  async signWithSchnorr(
    args: SignWithSchnorrArgs,
    context: CallContext = {}
  ): Promise<SignWithSchnorrResult> {
    const root = this.rootKey(args.keyId);
    const signature = signDerived(root, effectivePath(context.caller, args.derivationPath), args.message);
    this.onSignature?.(args.keyId);
    return { signature };
  }

  private rootKey(keyId: SchnorrKeyId): RootKey {
    if (!isSchnorrAlgorithm(keyId.algorithm)) {
      throw new SignerError(
        SignerErrorCode.UNSUPPORTED_ALGORITHM,
        `Unsupported algorithm: ${String(keyId.algorithm)}`
      );
    }
    const cacheKey = `${keyId.algorithm}:${keyId.name}`;
    const cached = this.rootKeys.get(cacheKey);
    if (cached) {
      return cached;
    }
    const root = rootKeyFromSeed(keyId.algorithm, this.seeds.get(keyId.name));
    this.rootKeys.set(cacheKey, root);
    return root;
  }
}

/**
 * Prefix the caller's path with the scoping principal, if any.
 * The principal counts towards {@link MAX_DERIVATION_PATH_LENGTH}.
 */
export function effectivePath(principal: string | undefined, path: DerivationPath): DerivationPath {
  const effective = principal ? [utf8ToBytes(principal), ...path] : path;
  if (effective.length > MAX_DERIVATION_PATH_LENGTH) {
    throw new SignerError(
      SignerErrorCode.INVALID_DERIVATION_PATH,
      `Derivation path has ${effective.length} segments, at most ${MAX_DERIVATION_PATH_LENGTH} are allowed`
    );
  }
  return effective;
}
