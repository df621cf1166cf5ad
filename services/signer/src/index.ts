import 'dotenv/config';
import pino from 'pino';
import { LocalSeedAdapter, SeedStore } from '../../../shared/signers';
import { createApp } from './app';
import { type Config, loadConfig } from './config';
import { SignerMetrics } from './metrics';

const log = pino();

// Load and validate configuration
let config: Config;
try {
  config = loadConfig();
} catch (error) {
  log.error({ error: error instanceof Error ? error.message : 'unknown' }, 'Failed to load configuration');
  process.exit(1);
}

log.level = config.LOG_LEVEL;

const { PORT, AUTH_TOKEN, ALLOWED_ORIGINS, KEY_NAMES, ROOT_SEEDS, BODY_LIMIT, TRUST_PROXY } = config;

// Provision root keys; configured seeds make keys reproducible across restarts
const seeds = new SeedStore();
for (const [name, seed] of ROOT_SEEDS) {
  seeds.provision(name, seed);
}
for (const name of KEY_NAMES) {
  seeds.provision(name);
}
log.info({ keys: seeds.names(), configuredSeeds: [...ROOT_SEEDS.keys()] }, 'root keys provisioned');

const metrics = new SignerMetrics();
const signer = new LocalSeedAdapter({
  seeds,
  onSignature: () => metrics.recordSignature(),
});

const app = createApp({
  signer,
  metrics,
  log,
  authToken: AUTH_TOKEN,
  allowedOrigins: ALLOWED_ORIGINS,
  bodyLimit: BODY_LIMIT,
  trustProxy: TRUST_PROXY,
});

if (!AUTH_TOKEN) {
  log.warn('AUTH_TOKEN is not set; any client can request signatures');
}

app.listen(PORT, () => {
  log.info({ PORT }, 'signer listening');
});
