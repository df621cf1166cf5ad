/**
 * Key-derivation and signing contract.
 * Implemented in-process by LocalSeedAdapter and over HTTP by RemoteSignerAdapter.
 */

import type {
  CallContext,
  SchnorrPublicKeyArgs,
  SchnorrPublicKeyResult,
  SignWithSchnorrArgs,
  SignWithSchnorrResult,
} from './types';

export interface SignerAdapter {
  /**
   * Derive the public key and chain code for a key id and derivation path
   * @param context - Caller identity, used when `args.canisterId` is not set
   */
  schnorrPublicKey(args: SchnorrPublicKeyArgs, context?: CallContext): Promise<SchnorrPublicKeyResult>;

  /**
   * Sign a message with the private key derived for the caller and path.
   * The signature verifies against `schnorrPublicKey` for the same key id,
   * path and principal.
   */
  signWithSchnorr(args: SignWithSchnorrArgs, context?: CallContext): Promise<SignWithSchnorrResult>;
}
