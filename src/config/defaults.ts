import path from 'node:path';
import os from 'node:os';
import { fileURLToPath } from 'node:url';
import type { RouterConfig } from './types.js';

const __dirname = path.dirname(fileURLToPath(import.meta.url));
const projectRoot = path.resolve(__dirname, '..', '..');

const configDir = process.env['MODELMUX_CONFIG_DIR']
  ?? path.join(os.homedir(), '.config', 'modelmux');

export const defaults: RouterConfig = {
  logging: {
    level: 'info',
  },
  cache: {
    enabled: true,
    keyPrefix: 'llm:',
    localTtlSeconds: 60 * 60,
    sharedTtlSeconds: 24 * 60 * 60,
    defaultTtlSeconds: 30 * 60,
    maxLocalEntries: 10_000,
    sharedTimeoutMs: 500,
    modelTypeTtlSeconds: {},
    redisUrl: '',
  },
  routing: {
    strategy: 'round-robin',
    failover: {
      enabled: true,
      maxRetries: 3,
    },
    skipUnhealthy: true,
  },
  pool: {
    idleTimeoutMs: 30 * 60 * 1000,
    sweepIntervalMs: 5 * 60 * 1000,
  },
  backend: {
    apiKey: '',
    baseUrl: 'http://localhost:11434/v1',
    timeoutMs: 5 * 60 * 1000,
  },
  modelCatalogPath: path.join(projectRoot, 'data', 'model-catalog.json'),
};

export { configDir };
