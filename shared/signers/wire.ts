/**
 * JSON wire format shared by the signer service and the remote adapter.
 * Byte fields travel as hex strings; field names follow the service's
 * snake_case interface.
 */

import { bytesToHex, hexToBytes } from '@noble/hashes/utils';
import { z } from 'zod';
import { SignerErrorCode, type SignerErrorCodeType, isSignerErrorCode } from './errors';
import {
  SchnorrAlgorithm,
  type SchnorrPublicKeyArgs,
  type SchnorrPublicKeyResult,
  type SignWithSchnorrArgs,
  type SignWithSchnorrResult,
} from './types';

export const HexBytes = z
  .string()
  .regex(/^(?:[0-9a-fA-F]{2})*$/, 'expected an even-length hex string')
  .transform((value) => hexToBytes(value));

export const KeyIdBody = z.object({
  algorithm: z.enum([SchnorrAlgorithm.Ed25519, SchnorrAlgorithm.Bip340Secp256k1]),
  name: z.string().min(1),
});

export const SchnorrPublicKeyBody = z
  .object({
    key_id: KeyIdBody,
    canister_id: z.string().min(1).nullable().optional(),
    derivation_path: z.array(HexBytes),
  })
  .transform(
    (body): SchnorrPublicKeyArgs => ({
      keyId: body.key_id,
      canisterId: body.canister_id ?? undefined,
      derivationPath: body.derivation_path,
    })
  );

export const SignWithSchnorrBody = z
  .object({
    key_id: KeyIdBody,
    derivation_path: z.array(HexBytes),
    message: HexBytes,
  })
  .transform(
    (body): SignWithSchnorrArgs => ({
      keyId: body.key_id,
      derivationPath: body.derivation_path,
      message: body.message,
    })
  );

export const SchnorrPublicKeyReply = z
  .object({ public_key: HexBytes, chain_code: HexBytes })
  .transform((reply): SchnorrPublicKeyResult => ({ publicKey: reply.public_key, chainCode: reply.chain_code }));

export const SignWithSchnorrReply = z
  .object({ signature: HexBytes })
  .transform((reply): SignWithSchnorrResult => ({ signature: reply.signature }));

const HeaderField = z.tuple([z.string(), z.string()]);

export const HttpRequestBody = z.object({
  url: z.string(),
  method: z.string(),
  body: HexBytes,
  headers: z.array(HeaderField),
  certificate_version: z.number().int().min(0).max(65535).nullable().optional(),
});

export type HttpRequest = z.infer<typeof HttpRequestBody>;

export interface HttpResponse {
  status_code: number;
  headers: [string, string][];
  /** hex-encoded */
  body: string;
}

export const ErrorBody = z.object({
  error: z.string(),
  message: z.string().optional(),
});

export function encodePublicKeyArgs(args: SchnorrPublicKeyArgs) {
  return {
    key_id: { algorithm: args.keyId.algorithm, name: args.keyId.name },
    canister_id: args.canisterId ?? null,
    derivation_path: args.derivationPath.map((segment) => bytesToHex(segment)),
  };
}

export function encodeSignArgs(args: SignWithSchnorrArgs) {
  return {
    key_id: { algorithm: args.keyId.algorithm, name: args.keyId.name },
    derivation_path: args.derivationPath.map((segment) => bytesToHex(segment)),
    message: bytesToHex(args.message),
  };
}

export function encodePublicKeyResult(result: SchnorrPublicKeyResult) {
  return { public_key: bytesToHex(result.publicKey), chain_code: bytesToHex(result.chainCode) };
}

export function encodeSignResult(result: SignWithSchnorrResult) {
  return { signature: bytesToHex(result.signature) };
}

/** `UNKNOWN_KEY` -> `unknown_key` */
export function errorCodeToWire(code: SignerErrorCodeType): string {
  return code.toLowerCase();
}

/** `unknown_key` -> `UNKNOWN_KEY`; anything unrecognized is a computation failure */
export function errorCodeFromWire(error: string): SignerErrorCodeType {
  const code = error.toUpperCase();
  return isSignerErrorCode(code) ? code : SignerErrorCode.COMPUTATION_FAILURE;
}
