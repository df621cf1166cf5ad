/**
 * Extended BIP32 derivation on secp256k1.
 *
 * Unlike BIP32, path segments are arbitrary byte strings rather than 31-bit
 * indices, and every step is non-hardened so the public half of any child can
 * be computed from the parent public key and chain code alone.
 */

import { secp256k1 } from '@noble/curves/secp256k1';
import { mod } from '@noble/curves/abstract/modular';
import { bytesToNumberBE, numberToBytesBE } from '@noble/curves/abstract/utils';
import { hmac } from '@noble/hashes/hmac';
import { sha512 } from '@noble/hashes/sha512';
import { concatBytes } from '@noble/hashes/utils';
import { SignerError, SignerErrorCode } from '../errors';
import type { DerivationPath } from '../types';

const Point = secp256k1.ProjectivePoint;
type Secp256k1Point = typeof Point.BASE;

const CURVE_ORDER = secp256k1.CURVE.n;

export interface Secp256k1DerivedPublicKey {
  /** 33-byte SEC1 compressed point */
  publicKey: Uint8Array;
  chainCode: Uint8Array;
}

export interface Secp256k1DerivedPrivateKey extends Secp256k1DerivedPublicKey {
  privateKey: Uint8Array;
}

interface ChildStep {
  point: Secp256k1Point;
  offset: bigint;
  chainCode: Uint8Array;
}

function multiplyBase(scalar: bigint): Secp256k1Point {
  return scalar === 0n ? Point.ZERO : Point.BASE.multiply(scalar);
}

function deriveChild(point: Secp256k1Point, chainCode: Uint8Array, index: Uint8Array): ChildStep {
  let input = concatBytes(point.toRawBytes(true), index);
  for (;;) {
    const output = hmac(sha512, chainCode, input);
    const offset = bytesToNumberBE(output.subarray(0, 32));
    const nextChainCode = output.slice(32);
    if (offset < CURVE_ORDER) {
      const child = point.add(multiplyBase(offset));
      if (!child.equals(Point.ZERO)) {
        return { point: child, offset, chainCode: nextChainCode };
      }
    }
    // Out-of-range offset or identity point: re-key the input and try again.
    input = concatBytes(Uint8Array.of(0x01), nextChainCode, index);
  }
}

function walk(
  root: Secp256k1Point,
  chainCode: Uint8Array,
  path: DerivationPath
): { point: Secp256k1Point; chainCode: Uint8Array; offset: bigint } {
  let point = root;
  let code = chainCode;
  let offset = 0n;
  for (const index of path) {
    const step = deriveChild(point, code, index);
    point = step.point;
    code = step.chainCode;
    offset = mod(offset + step.offset, CURVE_ORDER);
  }
  return { point, chainCode: code, offset };
}

/**
 * Derive the public key and chain code at `path` from a root public key.
 */
export function derivePublicKey(
  rootPublicKey: Uint8Array,
  rootChainCode: Uint8Array,
  path: DerivationPath
): Secp256k1DerivedPublicKey {
  let root: Secp256k1Point;
  try {
    root = Point.fromHex(rootPublicKey);
  } catch (error) {
    throw new SignerError(SignerErrorCode.COMPUTATION_FAILURE, 'Invalid secp256k1 root public key', {
      cause: error,
    });
  }
  const derived = walk(root, rootChainCode, path);
  return {
    publicKey: derived.point.toRawBytes(true),
    chainCode: derived.chainCode,
  };
}

/**
 * Derive the private key at `path`. The matching public key is identical to
 * what {@link derivePublicKey} returns for the root public key.
 */
export function derivePrivateKey(
  rootPrivateKey: Uint8Array,
  rootChainCode: Uint8Array,
  path: DerivationPath
): Secp256k1DerivedPrivateKey {
  const rootScalar = bytesToNumberBE(rootPrivateKey);
  if (rootScalar <= 0n || rootScalar >= CURVE_ORDER) {
    throw new SignerError(SignerErrorCode.COMPUTATION_FAILURE, 'secp256k1 root private key is out of range');
  }
  const derived = walk(multiplyBase(rootScalar), rootChainCode, path);
  const scalar = mod(rootScalar + derived.offset, CURVE_ORDER);
  if (scalar === 0n) {
    throw new SignerError(SignerErrorCode.COMPUTATION_FAILURE, 'Derived secp256k1 private key is zero');
  }
  return {
    privateKey: numberToBytesBE(scalar, 32),
    publicKey: derived.point.toRawBytes(true),
    chainCode: derived.chainCode,
  };
}
