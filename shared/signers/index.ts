/**
 * Signer adapters for Schnorr key derivation and signing
 * Export all adapters and factory functions
 */

export type { SignerAdapter } from './signer-adapter';
export { LocalSeedAdapter, MAX_DERIVATION_PATH_LENGTH, type LocalSeedAdapterOptions } from './local-seed-adapter';
export { RemoteSignerAdapter, createRemoteAdapterFromEnv, type RemoteAdapterConfig } from './remote-adapter';
export { SeedStore, SEED_LENGTH } from './seed-store';
export { SignerError, SignerErrorCode, type SignerErrorCodeType, isSignerError } from './errors';
export { verifySignature, MASTER_CHAIN_CODE } from './schnorr';
export * from './types';

/**
 * Factory function to create appropriate signer based on configuration
 */
import type { SignerAdapter } from './signer-adapter';
import { LocalSeedAdapter } from './local-seed-adapter';
import { RemoteSignerAdapter, createRemoteAdapterFromEnv } from './remote-adapter';
import type { SeedStore } from './seed-store';

export function createSignerAdapter(config: {
  type: 'local' | 'remote';
  seeds?: SeedStore;
  url?: string;
  apiKey?: string;
  caller?: string;
}): SignerAdapter {
  switch (config.type) {
    case 'local':
      if (!config.seeds) {
        throw new Error('seeds are required for local signer');
      }
      return new LocalSeedAdapter({ seeds: config.seeds });

    case 'remote':
      if (!config.url) {
        // Try to create from environment
        const envAdapter = createRemoteAdapterFromEnv();
        if (!envAdapter) {
          throw new Error('Signer URL or SIGNER_URL environment variable required for remote signer');
        }
        return envAdapter;
      }
      return new RemoteSignerAdapter({
        url: config.url,
        apiKey: config.apiKey,
        caller: config.caller,
      });

    default:
      throw new Error(`Unsupported signer type: ${String(config.type)}`);
  }
}
