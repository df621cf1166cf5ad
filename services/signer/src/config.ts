import { hexToBytes } from '@noble/hashes/utils';
import { z } from 'zod';
import { SEED_LENGTH } from '../../../shared/signers';

const DEFAULT_KEY_NAMES = ['dfx_test_key', 'test_key_1'];

const booleanFlag = z
  .enum(['true', 'false', '1', '0', ''])
  .optional()
  .transform((value) => value === 'true' || value === '1');

const commaList = (fallback: string[]) =>
  z
    .string()
    .optional()
    .transform((value) =>
      value
        ? value
            .split(',')
            .map((item) => item.trim())
            .filter((item) => item.length > 0)
        : fallback
    );

const SEED_HEX_LENGTH = SEED_LENGTH * 2;

const rootSeeds = z
  .string()
  .optional()
  .transform((value, ctx) => {
    const seeds = new Map<string, Uint8Array>();
    if (!value) {
      return seeds;
    }
    for (const entry of value.split(',')) {
      const trimmed = entry.trim();
      if (!trimmed) continue;
      const separator = trimmed.indexOf('=');
      const name = separator > 0 ? trimmed.slice(0, separator) : '';
      const hex = separator > 0 ? trimmed.slice(separator + 1) : '';
      if (!name || !new RegExp(`^[0-9a-fA-F]{${SEED_HEX_LENGTH}}$`).test(hex)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `ROOT_SEEDS entries must look like name=<${SEED_HEX_LENGTH} hex chars>`,
        });
        return z.NEVER;
      }
      seeds.set(name, hexToBytes(hex));
    }
    return seeds;
  });

const ConfigSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(8080),
  AUTH_TOKEN: z.string().optional().transform((value) => value || undefined),
  ALLOWED_ORIGINS: commaList(['*']),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  KEY_NAMES: commaList(DEFAULT_KEY_NAMES),
  ROOT_SEEDS: rootSeeds,
  BODY_LIMIT: z.string().default('1mb'),
  TRUST_PROXY: booleanFlag,
});

export type Config = z.infer<typeof ConfigSchema>;

/**
 * Load and validate configuration from the environment
 * @throws Error listing every invalid variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const parsed = ConfigSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.errors
      .map((issue) => `${issue.path.join('.') || 'env'}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid configuration: ${details}`);
  }
  return parsed.data;
}
