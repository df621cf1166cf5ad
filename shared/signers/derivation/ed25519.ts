import { ed25519 } from '@noble/curves/ed25519';
import { mod } from '@noble/curves/abstract/modular';
import { bytesToNumberLE, numberToBytesLE } from '@noble/curves/abstract/utils';
import { hkdf } from '@noble/hashes/hkdf';
import { sha512 } from '@noble/hashes/sha512';
import { concatBytes } from '@noble/hashes/utils';
import { SignerError, SignerErrorCode } from '../errors';
import type { DerivationPath } from '../types';

const Point = ed25519.ExtendedPoint;
type Ed25519Point = typeof Point.BASE;

const GROUP_ORDER = ed25519.CURVE.n;
const HKDF_INFO = 'Ed25519';

export interface Ed25519DerivedPublicKey {
  /** 32-byte compressed Edwards point */
  publicKey: Uint8Array;
  chainCode: Uint8Array;
}

/**
 * An expanded Ed25519 signing key. Derived keys have no seed, only a scalar
 * and the prefix used to generate nonces.
 */
export interface Ed25519ExpandedKey extends Ed25519DerivedPublicKey {
  scalar: bigint;
  prefix: Uint8Array;
}

function multiplyBase(scalar: bigint): Ed25519Point {
  return scalar === 0n ? Point.ZERO : Point.BASE.multiply(scalar);
}

function walk(
  root: Ed25519Point,
  chainCode: Uint8Array,
  path: DerivationPath
): { point: Ed25519Point; chainCode: Uint8Array; offset: bigint } {
  let point = root;
  let code = chainCode;
  let offset = 0n;
  for (const index of path) {
    const okm = hkdf(sha512, concatBytes(point.toRawBytes(), index), code, HKDF_INFO, 96);
    const step = mod(bytesToNumberLE(okm.subarray(0, 64)), GROUP_ORDER);
    point = point.add(multiplyBase(step));
    code = okm.slice(64, 96);
    offset = mod(offset + step, GROUP_ORDER);
  }
  return { point, chainCode: code, offset };
}

/**
 * Expand a 32-byte Ed25519 seed into its signing scalar and nonce prefix.
 */
export function expandSeed(seed: Uint8Array, chainCode: Uint8Array): Ed25519ExpandedKey {
  const { scalar, prefix, pointBytes } = ed25519.utils.getExtendedPublicKey(seed);
  return { scalar, prefix, publicKey: pointBytes, chainCode };
}

export function derivePublicKey(
  rootPublicKey: Uint8Array,
  rootChainCode: Uint8Array,
  path: DerivationPath
): Ed25519DerivedPublicKey {
  let root: Ed25519Point;
  try {
    root = Point.fromHex(rootPublicKey);
  } catch (error) {
    throw new SignerError(SignerErrorCode.COMPUTATION_FAILURE, 'Invalid ed25519 root public key', {
      cause: error,
    });
  }
  const derived = walk(root, rootChainCode, path);
  return { publicKey: derived.point.toRawBytes(), chainCode: derived.chainCode };
}

/**
 * Derive the expanded signing key at `path`. The root key keeps its own
 * prefix, so signatures under an empty path match plain Ed25519.
 */
export function derivePrivateKey(root: Ed25519ExpandedKey, path: DerivationPath): Ed25519ExpandedKey {
  if (path.length === 0) {
    return root;
  }
  const derived = walk(multiplyBase(root.scalar), root.chainCode, path);
  const scalar = mod(root.scalar + derived.offset, GROUP_ORDER);
  if (scalar === 0n) {
    throw new SignerError(SignerErrorCode.COMPUTATION_FAILURE, 'Derived ed25519 scalar is zero');
  }
  const prefix = sha512(concatBytes(root.prefix, numberToBytesLE(derived.offset, 32))).slice(0, 32);
  return {
    scalar,
    prefix,
    publicKey: derived.point.toRawBytes(),
    chainCode: derived.chainCode,
  };
}

/**
 * RFC 8032 signing with an already expanded key.
 */
export function signWithExpandedKey(key: Ed25519ExpandedKey, message: Uint8Array): Uint8Array {
  const nonce = mod(bytesToNumberLE(sha512(concatBytes(key.prefix, message))), GROUP_ORDER);
  const commitment = multiplyBase(nonce).toRawBytes();
  const challenge = mod(
    bytesToNumberLE(sha512(concatBytes(commitment, key.publicKey, message))),
    GROUP_ORDER
  );
  const response = mod(nonce + challenge * key.scalar, GROUP_ORDER);
  return concatBytes(commitment, numberToBytesLE(response, 32));
}
