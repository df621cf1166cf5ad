import { randomBytes } from '@noble/hashes/utils';
import { SignerError, SignerErrorCode } from './errors';

export const SEED_LENGTH = 64;

/**
 * Root seeds by key name. A seed is provisioned once and never replaced.
 */
export class SeedStore {
  private seeds = new Map<string, Uint8Array>();

  /**
   * Provision a seed for `name` unless one already exists.
   * @returns the seed in effect for `name`
   */
  provision(name: string, seed: Uint8Array = randomBytes(SEED_LENGTH)): Uint8Array {
    const existing = this.seeds.get(name);
    if (existing) {
      return existing;
    }
    if (seed.length !== SEED_LENGTH) {
      throw new Error(`Seed for key "${name}" must be ${SEED_LENGTH} bytes, got ${seed.length}`);
    }
    const copy = Uint8Array.from(seed);
    this.seeds.set(name, copy);
    return copy;
  }

  has(name: string): boolean {
    return this.seeds.has(name);
  }

  /**
   * @throws SignerError UNKNOWN_KEY if `name` was never provisioned
   */
  get(name: string): Uint8Array {
    const seed = this.seeds.get(name);
    if (!seed) {
      throw new SignerError(SignerErrorCode.UNKNOWN_KEY, `No key with name "${name}"`);
    }
    return seed;
  }

  names(): string[] {
    return [...this.seeds.keys()];
  }
}
