import fs from 'node:fs';
import path from 'node:path';
import type { RouterConfig, StrategyName, LogLevel } from './types.js';
import { defaults, configDir } from './defaults.js';

const configFilePath = path.join(configDir, 'config.json');

const STRATEGIES: readonly StrategyName[] = [
  'round-robin',
  'random',
  'weighted-round-robin',
  'performance-based',
  'least-connections',
];

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

export function deepMerge(base: Record<string, unknown>, override: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = { ...base };
  for (const [key, val] of Object.entries(override)) {
    const current = result[key];
    if (isPlainObject(val) && isPlainObject(current)) {
      result[key] = deepMerge(current, val);
    } else if (val !== undefined && val !== null) {
      result[key] = val;
    }
  }
  return result;
}

function isStrategyName(value: string): value is StrategyName {
  return STRATEGIES.some(s => s === value);
}

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some(l => l === value);
}

function readConfigFile(): Record<string, unknown> {
  if (!fs.existsSync(configFilePath)) return {};
  const parsed: unknown = JSON.parse(fs.readFileSync(configFilePath, 'utf-8'));
  return isPlainObject(parsed) ? parsed : {};
}

/**
 * Overlay file and environment values onto a fully-typed base. Each merged
 * section is rebuilt field by field so a malformed file cannot change the
 * shape of the result.
 */
export function resolveConfig(
  fileConfig: Record<string, unknown>,
  env: NodeJS.ProcessEnv = process.env,
): RouterConfig {
  const base: Record<string, unknown> = { ...defaults };
  const merged = deepMerge(base, fileConfig);
  const section = (name: keyof RouterConfig): Record<string, unknown> => {
    const value = merged[name];
    return isPlainObject(value) ? value : {};
  };

  const num = (value: unknown, fallback: number): number =>
    typeof value === 'number' && Number.isFinite(value) ? value : fallback;
  const positive = (value: unknown, fallback: number): number => {
    const n = num(value, fallback);
    return n > 0 ? n : fallback;
  };
  const count = (value: unknown, fallback: number): number => {
    const n = Math.floor(num(value, fallback));
    return n >= 1 ? n : fallback;
  };
  const bool = (value: unknown, fallback: boolean): boolean =>
    typeof value === 'boolean' ? value : fallback;
  const str = (value: unknown, fallback: string): string =>
    typeof value === 'string' ? value : fallback;

  const logging = section('logging');
  const cache = section('cache');
  const routing = section('routing');
  const failover = isPlainObject(routing['failover']) ? routing['failover'] : {};
  const pool = section('pool');
  const backend = section('backend');

  const typeTtls: Record<string, number> = {};
  const rawTypeTtls = cache['modelTypeTtlSeconds'];
  if (isPlainObject(rawTypeTtls)) {
    for (const [type, seconds] of Object.entries(rawTypeTtls)) {
      if (typeof seconds === 'number' && Number.isFinite(seconds) && seconds > 0) typeTtls[type] = seconds;
    }
  }

  const level = str(logging['level'], defaults.logging.level);
  const strategy = str(routing['strategy'], defaults.routing.strategy);

  const config: RouterConfig = {
    logging: {
      level: isLogLevel(level) ? level : defaults.logging.level,
    },
    cache: {
      enabled: bool(cache['enabled'], defaults.cache.enabled),
      keyPrefix: str(cache['keyPrefix'], defaults.cache.keyPrefix),
      localTtlSeconds: positive(cache['localTtlSeconds'], defaults.cache.localTtlSeconds),
      sharedTtlSeconds: positive(cache['sharedTtlSeconds'], defaults.cache.sharedTtlSeconds),
      defaultTtlSeconds: positive(cache['defaultTtlSeconds'], defaults.cache.defaultTtlSeconds),
      maxLocalEntries: count(cache['maxLocalEntries'], defaults.cache.maxLocalEntries),
      sharedTimeoutMs: positive(cache['sharedTimeoutMs'], defaults.cache.sharedTimeoutMs),
      modelTypeTtlSeconds: typeTtls,
      redisUrl: str(cache['redisUrl'], defaults.cache.redisUrl),
    },
    routing: {
      strategy: isStrategyName(strategy) ? strategy : defaults.routing.strategy,
      failover: {
        enabled: bool(failover['enabled'], defaults.routing.failover.enabled),
        maxRetries: Math.max(0, Math.floor(num(failover['maxRetries'], defaults.routing.failover.maxRetries))),
      },
      skipUnhealthy: bool(routing['skipUnhealthy'], defaults.routing.skipUnhealthy),
    },
    pool: {
      idleTimeoutMs: positive(pool['idleTimeoutMs'], defaults.pool.idleTimeoutMs),
      sweepIntervalMs: positive(pool['sweepIntervalMs'], defaults.pool.sweepIntervalMs),
    },
    backend: {
      apiKey: str(backend['apiKey'], defaults.backend.apiKey),
      baseUrl: str(backend['baseUrl'], defaults.backend.baseUrl),
      timeoutMs: positive(backend['timeoutMs'], defaults.backend.timeoutMs),
    },
    modelCatalogPath: str(merged['modelCatalogPath'], defaults.modelCatalogPath),
  };

  const envLevel = env['MODELMUX_LOG_LEVEL'];
  if (envLevel && isLogLevel(envLevel)) {
    config.logging.level = envLevel;
  }
  const envStrategy = env['MODELMUX_STRATEGY'];
  if (envStrategy && isStrategyName(envStrategy)) {
    config.routing.strategy = envStrategy;
  }
  if (env['MODELMUX_REDIS_URL']) {
    config.cache.redisUrl = env['MODELMUX_REDIS_URL'];
  }
  if (env['MODELMUX_API_KEY']) {
    config.backend.apiKey = env['MODELMUX_API_KEY'];
  }
  if (env['MODELMUX_BASE_URL']) {
    config.backend.baseUrl = env['MODELMUX_BASE_URL'];
  }

  return config;
}

export function loadConfig(): RouterConfig {
  return resolveConfig(readConfigFile());
}

export function saveConfig(partial: Record<string, unknown>): void {
  fs.mkdirSync(configDir, { recursive: true });
  const merged = deepMerge(readConfigFile(), partial);
  fs.writeFileSync(configFilePath, JSON.stringify(merged, null, 2), 'utf-8');
}

export { configDir, defaults };
export type { RouterConfig, StrategyName, LogLevel } from './types.js';
