/**
 * Schnorr algorithm variants a root key can be used with
 */
export const SchnorrAlgorithm = {
  Ed25519: 'ed25519',
  Bip340Secp256k1: 'bip340secp256k1',
} as const;

export type SchnorrAlgorithmType = (typeof SchnorrAlgorithm)[keyof typeof SchnorrAlgorithm];

export const SCHNORR_ALGORITHMS: readonly SchnorrAlgorithmType[] = Object.values(SchnorrAlgorithm);

export function isSchnorrAlgorithm(value: string): value is SchnorrAlgorithmType {
  return SCHNORR_ALGORITHMS.some((algorithm) => algorithm === value);
}

/**
 * Identifies a provisioned root key, scoped by algorithm
 */
export interface SchnorrKeyId {
  algorithm: SchnorrAlgorithmType;
  /** Name of the root key (e.g. "dfx_test_key") */
  name: string;
}

/**
 * Ordered list of opaque segments. An empty path denotes the root key.
 */
export type DerivationPath = Uint8Array[];

export interface SchnorrPublicKeyArgs {
  keyId: SchnorrKeyId;
  /** Principal the key is scoped to. Falls back to the caller when omitted. */
  canisterId?: string | null;
  derivationPath: DerivationPath;
}

export interface SchnorrPublicKeyResult {
  /** 32-byte Edwards point for ed25519, 33-byte SEC1 compressed point for bip340secp256k1 */
  publicKey: Uint8Array;
  /** 32-byte chain code for further derivation */
  chainCode: Uint8Array;
}

export interface SignWithSchnorrArgs {
  keyId: SchnorrKeyId;
  derivationPath: DerivationPath;
  /** Signed exactly as given; no hashing is applied */
  message: Uint8Array;
}

export interface SignWithSchnorrResult {
  /** 64-byte signature */
  signature: Uint8Array;
}

/**
 * Who is making the call. The caller scopes every derived key.
 */
export interface CallContext {
  caller?: string;
}
