import { schnorr, secp256k1 } from '@noble/curves/secp256k1';
import { hmac } from '@noble/hashes/hmac';
import { sha512 } from '@noble/hashes/sha512';
import { HDKey } from '@scure/bip32';
import nacl from 'tweetnacl';
import * as ed25519Derivation from './derivation/ed25519';
import * as secp256k1Derivation from './derivation/secp256k1';
import { SignerError, SignerErrorCode } from './errors';
import {
  type DerivationPath,
  SchnorrAlgorithm,
  type SchnorrAlgorithmType,
  type SchnorrPublicKeyResult,
} from './types';

/** Chain code of every root key */
export const MASTER_CHAIN_CODE = new Uint8Array(32);

/** BIP-340 signing uses no auxiliary randomness, so signatures are deterministic */
const ZERO_AUX_RAND = new Uint8Array(32);

const ED25519_SEED_KEY = 'ed25519 seed';

/**
 * Root key material expanded from a seed, ready for derivation.
 */
export type RootKey =
  | {
      algorithm: typeof SchnorrAlgorithm.Bip340Secp256k1;
      privateKey: Uint8Array;
      publicKey: Uint8Array;
      chainCode: Uint8Array;
    }
  | {
      algorithm: typeof SchnorrAlgorithm.Ed25519;
      expanded: ed25519Derivation.Ed25519ExpandedKey;
      publicKey: Uint8Array;
      chainCode: Uint8Array;
    };

function unsupported(algorithm: never): never {
  throw new SignerError(
    SignerErrorCode.UNSUPPORTED_ALGORITHM,
    `Unsupported algorithm: ${String(algorithm)}`
  );
}

/**
 * Expand a root seed for the given algorithm.
 *
 * bip340secp256k1 uses the BIP32 master key of the seed. ed25519 uses the
 * SLIP-10 master key of the seed as an RFC 8032 secret.
 */
export function rootKeyFromSeed(algorithm: SchnorrAlgorithmType, seed: Uint8Array): RootKey {
  switch (algorithm) {
    case SchnorrAlgorithm.Bip340Secp256k1: {
      const master = HDKey.fromMasterSeed(seed);
      if (!master.privateKey) {
        throw new SignerError(SignerErrorCode.COMPUTATION_FAILURE, 'Failed to derive BIP32 master key');
      }
      return {
        algorithm,
        privateKey: master.privateKey,
        publicKey: secp256k1.getPublicKey(master.privateKey, true),
        chainCode: MASTER_CHAIN_CODE,
      };
    }
    case SchnorrAlgorithm.Ed25519: {
      const secret = hmac(sha512, ED25519_SEED_KEY, seed).slice(0, 32);
      const expanded = ed25519Derivation.expandSeed(secret, MASTER_CHAIN_CODE);
      return { algorithm, expanded, publicKey: expanded.publicKey, chainCode: MASTER_CHAIN_CODE };
    }
    default:
      return unsupported(algorithm);
  }
}

export function derivePublicKey(root: RootKey, path: DerivationPath): SchnorrPublicKeyResult {
  switch (root.algorithm) {
    case SchnorrAlgorithm.Bip340Secp256k1:
      return secp256k1Derivation.derivePublicKey(root.publicKey, root.chainCode, path);
    case SchnorrAlgorithm.Ed25519:
      return ed25519Derivation.derivePublicKey(root.publicKey, root.chainCode, path);
    default:
      return unsupported(root);
  }
}

/**
 * Sign `message` under the key derived at `path`.
 */
export function signDerived(root: RootKey, path: DerivationPath, message: Uint8Array): Uint8Array {
  switch (root.algorithm) {
    case SchnorrAlgorithm.Bip340Secp256k1: {
      const { privateKey } = secp256k1Derivation.derivePrivateKey(root.privateKey, root.chainCode, path);
      try {
        return schnorr.sign(message, privateKey, ZERO_AUX_RAND);
      } catch (error) {
        throw new SignerError(SignerErrorCode.COMPUTATION_FAILURE, 'BIP-340 signing failed', {
          cause: error,
        });
      }
    }
    case SchnorrAlgorithm.Ed25519: {
      const key = ed25519Derivation.derivePrivateKey(root.expanded, path);
      return ed25519Derivation.signWithExpandedKey(key, message);
    }
    default:
      return unsupported(root);
  }
}

/**
 * Verify a signature against a public key as returned by `schnorr_public_key`.
 *
 * For bip340secp256k1 the public key may be the 33-byte compressed point or
 * its 32-byte x-only form.
 */
export function verifySignature(
  algorithm: SchnorrAlgorithmType,
  message: Uint8Array,
  publicKey: Uint8Array,
  signature: Uint8Array
): boolean {
  if (signature.length !== 64) {
    return false;
  }

  switch (algorithm) {
    case SchnorrAlgorithm.Ed25519:
      if (publicKey.length !== 32) {
        return false;
      }
      return nacl.sign.detached.verify(message, signature, publicKey);
    case SchnorrAlgorithm.Bip340Secp256k1: {
      let xOnly: Uint8Array;
      if (publicKey.length === 33) {
        xOnly = publicKey.subarray(1);
      } else if (publicKey.length === 32) {
        xOnly = publicKey;
      } else {
        return false;
      }
      try {
        return schnorr.verify(signature, message, xOnly);
      } catch {
        return false;
      }
    }
    default:
      return unsupported(algorithm);
  }
}
