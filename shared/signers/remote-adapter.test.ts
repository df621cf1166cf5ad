import { describe, expect, it, vi } from 'vitest';
import { bytesToHex, utf8ToBytes } from '@noble/hashes/utils';
import { SignerError, SignerErrorCode } from './errors';
import { type FetchLike, RemoteSignerAdapter, createRemoteAdapterFromEnv } from './remote-adapter';
import { SchnorrAlgorithm, type SchnorrKeyId } from './types';

const keyId: SchnorrKeyId = { algorithm: SchnorrAlgorithm.Ed25519, name: 'dfx_test_key' };
const publicKeyHex = '11'.repeat(32);
const chainCodeHex = '22'.repeat(32);

interface RecordedCall {
  url: string;
  headers: Headers;
  body: unknown;
}

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'content-type': 'application/json' },
  });
}

function recordingFetch(respond: () => Response | Promise<Response>) {
  const calls: RecordedCall[] = [];
  const fetch: FetchLike = async (input, init) => {
    calls.push({
      url: String(input),
      headers: new Headers(init?.headers),
      body: JSON.parse(String(init?.body)),
    });
    return respond();
  };
  return { fetch, calls };
}

describe('RemoteSignerAdapter', () => {
  it('posts public key requests in the wire format', async () => {
    const { fetch, calls } = recordingFetch(() =>
      jsonResponse({ public_key: publicKeyHex, chain_code: chainCodeHex })
    );
    const adapter = new RemoteSignerAdapter({
      url: 'http://signer.test/',
      apiKey: 'test-secret',
      caller: 'app-1',
      fetch,
    });

    const result = await adapter.schnorrPublicKey({
      keyId,
      canisterId: 'canister-a',
      derivationPath: [Uint8Array.of(0xab, 0xcd)],
    });

    expect(result.publicKey).toEqual(new Uint8Array(32).fill(0x11));
    expect(result.chainCode).toEqual(new Uint8Array(32).fill(0x22));
    expect(calls).toHaveLength(1);
    expect(calls[0].url).toBe('http://signer.test/schnorr_public_key');
    expect(calls[0].headers.get('x-api-key')).toBe('test-secret');
    expect(calls[0].headers.get('x-caller-id')).toBe('app-1');
    expect(calls[0].body).toEqual({
      key_id: { algorithm: 'ed25519', name: 'dfx_test_key' },
      canister_id: 'canister-a',
      derivation_path: ['abcd'],
    });
  });

  it('caches public keys per caller and arguments', async () => {
    const { fetch, calls } = recordingFetch(() =>
      jsonResponse({ public_key: publicKeyHex, chain_code: chainCodeHex })
    );
    const adapter = new RemoteSignerAdapter({ url: 'http://signer.test', fetch });
    const args = { keyId, derivationPath: [] };

    await adapter.schnorrPublicKey(args, { caller: 'a' });
    await adapter.schnorrPublicKey(args, { caller: 'a' });
    await adapter.schnorrPublicKey(args, { caller: 'b' });

    expect(calls).toHaveLength(2);
    expect(calls[1].headers.get('x-caller-id')).toBe('b');
  });

  it('hands out copies of cached public keys', async () => {
    const { fetch, calls } = recordingFetch(() =>
      jsonResponse({ public_key: publicKeyHex, chain_code: chainCodeHex })
    );
    const adapter = new RemoteSignerAdapter({ url: 'http://signer.test', fetch });
    const args = { keyId, derivationPath: [] };

    const first = await adapter.schnorrPublicKey(args);
    first.publicKey.fill(0);
    first.chainCode.fill(0);
    const second = await adapter.schnorrPublicKey(args);

    expect(calls).toHaveLength(1);
    expect(second.publicKey).toEqual(new Uint8Array(32).fill(0x11));
    expect(second.chainCode).toEqual(new Uint8Array(32).fill(0x22));
  });

  it('evicts the oldest public key once the cache is full', async () => {
    const { fetch, calls } = recordingFetch(() =>
      jsonResponse({ public_key: publicKeyHex, chain_code: chainCodeHex })
    );
    const adapter = new RemoteSignerAdapter({ url: 'http://signer.test', publicKeyCacheSize: 2, fetch });
    const at = (index: number) => ({ keyId, derivationPath: [Uint8Array.of(index)] });

    await adapter.schnorrPublicKey(at(1));
    await adapter.schnorrPublicKey(at(2));
    await adapter.schnorrPublicKey(at(3));
    await adapter.schnorrPublicKey(at(3));
    await adapter.schnorrPublicKey(at(2));
    expect(calls).toHaveLength(3);

    await adapter.schnorrPublicKey(at(1));
    expect(calls).toHaveLength(4);
    expect(calls[3].body).toMatchObject({ derivation_path: ['01'] });
  });

  it('posts sign requests with a hex message', async () => {
    const signatureHex = '33'.repeat(64);
    const { fetch, calls } = recordingFetch(() => jsonResponse({ signature: signatureHex }));
    const adapter = new RemoteSignerAdapter({ url: 'http://signer.test', fetch });

    const { signature } = await adapter.signWithSchnorr(
      { keyId, derivationPath: [], message: utf8ToBytes('hello') },
      { caller: 'app-9' }
    );

    expect(bytesToHex(signature)).toBe(signatureHex);
    expect(calls[0].url).toBe('http://signer.test/sign_with_schnorr');
    expect(calls[0].headers.get('x-caller-id')).toBe('app-9');
    expect(calls[0].headers.get('x-api-key')).toBeNull();
    expect(calls[0].body).toEqual({
      key_id: { algorithm: 'ed25519', name: 'dfx_test_key' },
      derivation_path: [],
      message: '68656c6c6f',
    });
  });

  it('maps error responses back to signer error codes', async () => {
    const { fetch } = recordingFetch(() =>
      jsonResponse({ error: 'unknown_key', message: 'No key with name "dfx_test_key"' }, 404)
    );
    const adapter = new RemoteSignerAdapter({ url: 'http://signer.test', fetch });

    await expect(adapter.schnorrPublicKey({ keyId, derivationPath: [] })).rejects.toMatchObject({
      code: SignerErrorCode.UNKNOWN_KEY,
      message: 'No key with name "dfx_test_key"',
    });
  });

  it('treats unrecognized error codes as computation failures', async () => {
    const { fetch } = recordingFetch(() => jsonResponse({ error: 'unauthorized' }, 401));
    const adapter = new RemoteSignerAdapter({ url: 'http://signer.test', fetch });

    await expect(
      adapter.signWithSchnorr({ keyId, derivationPath: [], message: new Uint8Array(0) })
    ).rejects.toMatchObject({ code: SignerErrorCode.COMPUTATION_FAILURE, message: 'unauthorized' });
  });

  it('wraps transport failures', async () => {
    const fetch = vi.fn<FetchLike>().mockRejectedValue(new Error('connect ECONNREFUSED'));
    const adapter = new RemoteSignerAdapter({ url: 'http://signer.test', fetch });

    await expect(adapter.schnorrPublicKey({ keyId, derivationPath: [] })).rejects.toThrowError(
      new SignerError(
        SignerErrorCode.COMPUTATION_FAILURE,
        'Signer request to /schnorr_public_key failed: connect ECONNREFUSED'
      )
    );
  });

  it('rejects malformed success responses', async () => {
    const { fetch } = recordingFetch(() => jsonResponse({ signature: 'not-hex' }));
    const adapter = new RemoteSignerAdapter({ url: 'http://signer.test', fetch });

    await expect(
      adapter.signWithSchnorr({ keyId, derivationPath: [], message: new Uint8Array(0) })
    ).rejects.toMatchObject({
      code: SignerErrorCode.COMPUTATION_FAILURE,
      message: 'Signer returned a malformed response for /sign_with_schnorr',
    });
  });
});

describe('createRemoteAdapterFromEnv', () => {
  it('returns null without SIGNER_URL', () => {
    expect(createRemoteAdapterFromEnv({})).toBeNull();
  });

  it('builds an adapter from the environment', () => {
    const adapter = createRemoteAdapterFromEnv({
      SIGNER_URL: 'http://signer.test',
      SIGNER_API_KEY: 'test-secret',
      SIGNER_TIMEOUT_MS: '500',
    });

    expect(adapter).toBeInstanceOf(RemoteSignerAdapter);
  });
});
