/**
 * Remote signer adapter
 * Calls a running signer service over HTTP; key material never leaves the service.
 */

import { z } from 'zod';
import type { SignerAdapter } from './signer-adapter';
import { SignerError, SignerErrorCode } from './errors';
import type {
  CallContext,
  SchnorrPublicKeyArgs,
  SchnorrPublicKeyResult,
  SignWithSchnorrArgs,
  SignWithSchnorrResult,
} from './types';
import {
  ErrorBody,
  SchnorrPublicKeyReply,
  SignWithSchnorrReply,
  encodePublicKeyArgs,
  encodeSignArgs,
  errorCodeFromWire,
} from './wire';

const DEFAULT_TIMEOUT_MS = 30000;
const DEFAULT_PUBLIC_KEY_CACHE_SIZE = 256;

export type FetchLike = typeof fetch;

export interface RemoteAdapterConfig {
  url: string;
  apiKey?: string;
  /** Sent as x-caller-id; scopes derived keys */
  caller?: string;
  timeoutMs?: number;
  /** Most derived public keys kept in memory; the oldest is evicted first */
  publicKeyCacheSize?: number;
  fetch?: FetchLike;
}

function copyPublicKey(result: SchnorrPublicKeyResult): SchnorrPublicKeyResult {
  return { publicKey: Uint8Array.from(result.publicKey), chainCode: Uint8Array.from(result.chainCode) };
}

export class RemoteSignerAdapter implements SignerAdapter {
  private baseUrl: string;
  private apiKey?: string;
  private caller?: string;
  private timeoutMs: number;
  private publicKeyCacheSize: number;
  private fetchImpl: FetchLike;
  private cachedPublicKeys = new Map<string, SchnorrPublicKeyResult>();

  constructor(config: RemoteAdapterConfig) {
    this.baseUrl = config.url.replace(/\/$/, '');
    this.apiKey = config.apiKey;
    this.caller = config.caller;
    this.timeoutMs = config.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.publicKeyCacheSize = config.publicKeyCacheSize ?? DEFAULT_PUBLIC_KEY_CACHE_SIZE;
    this.fetchImpl = config.fetch ?? fetch;
  }

  async schnorrPublicKey(
    args: SchnorrPublicKeyArgs,
    context: CallContext = {}
  ): Promise<SchnorrPublicKeyResult> {
    const body = encodePublicKeyArgs(args);
    const caller = context.caller ?? this.caller;
    // Derived public keys never change, so they are safe to cache
    const cacheKey = JSON.stringify([caller ?? null, body]);
    const cached = this.cachedPublicKeys.get(cacheKey);
    if (cached) {
      return copyPublicKey(cached);
    }

    const result = await this.post('/schnorr_public_key', body, caller, SchnorrPublicKeyReply);
    this.remember(cacheKey, result);
    return copyPublicKey(result);
  }

  async signWithSchnorr(
    args: SignWithSchnorrArgs,
    context: CallContext = {}
  ): Promise<SignWithSchnorrResult> {
    return this.post('/sign_with_schnorr', encodeSignArgs(args), context.caller ?? this.caller, SignWithSchnorrReply);
  }

  private remember(cacheKey: string, result: SchnorrPublicKeyResult): void {
    if (this.publicKeyCacheSize <= 0) {
      return;
    }
    this.cachedPublicKeys.set(cacheKey, result);
    // Maps iterate in insertion order, so the first key is the oldest
    for (const oldest of this.cachedPublicKeys.keys()) {
      if (this.cachedPublicKeys.size <= this.publicKeyCacheSize) {
        break;
      }
      this.cachedPublicKeys.delete(oldest);
    }
  }

  private async post<T>(
    path: string,
    body: Record<string, unknown>,
    caller: string | undefined,
    reply: z.ZodType<T, z.ZodTypeDef, unknown>
  ): Promise<T> {
    const headers: Record<string, string> = { 'content-type': 'application/json' };
    if (this.apiKey) {
      headers['x-api-key'] = this.apiKey;
    }
    if (caller) {
      headers['x-caller-id'] = caller;
    }

    const response = await this.send(path, body, headers);

    if (!response.ok) {
      const parsed = ErrorBody.safeParse(response.payload);
      if (parsed.success) {
        throw new SignerError(
          errorCodeFromWire(parsed.data.error),
          parsed.data.message ?? parsed.data.error
        );
      }
      throw new SignerError(
        SignerErrorCode.COMPUTATION_FAILURE,
        `Signer request to ${path} failed with status ${response.status}`
      );
    }

    const parsed = reply.safeParse(response.payload);
    if (!parsed.success) {
      throw new SignerError(
        SignerErrorCode.COMPUTATION_FAILURE,
        `Signer returned a malformed response for ${path}`,
        { cause: parsed.error }
      );
    }
    return parsed.data;
  }

  private async send(
    path: string,
    body: Record<string, unknown>,
    headers: Record<string, string>
  ): Promise<{ ok: boolean; status: number; payload: unknown }> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      const response = await this.fetchImpl(`${this.baseUrl}${path}`, {
        method: 'POST',
        headers,
        body: JSON.stringify(body),
        signal: controller.signal,
      });
      return { ok: response.ok, status: response.status, payload: await response.json() };
    } catch (error) {
      throw new SignerError(
        SignerErrorCode.COMPUTATION_FAILURE,
        `Signer request to ${path} failed: ${error instanceof Error ? error.message : String(error)}`,
        { cause: error }
      );
    } finally {
      clearTimeout(timeout);
    }
  }
}

/**
 * Factory function to create a remote adapter from environment variables
 */
export function createRemoteAdapterFromEnv(env: NodeJS.ProcessEnv = process.env): RemoteSignerAdapter | null {
  const url = env.SIGNER_URL;
  if (!url) {
    return null;
  }

  const timeoutMs = env.SIGNER_TIMEOUT_MS ? parseInt(env.SIGNER_TIMEOUT_MS, 10) : undefined;
  return new RemoteSignerAdapter({
    url,
    apiKey: env.SIGNER_API_KEY || undefined,
    caller: env.SIGNER_CALLER_ID || undefined,
    timeoutMs: timeoutMs !== undefined && Number.isFinite(timeoutMs) ? timeoutMs : undefined,
  });
}
