import type { RouterConfig } from './config/types.js';
import type { HandleFactory } from './backends/types.js';
import type { SharedTier } from './cache/shared-tier.js';
import type { RandomSource } from './balancer/types.js';
import { RedisSharedTier } from './cache/shared-tier.js';
import { CacheKeyBuilder } from './cache/key-builder.js';
import { ResponseCache } from './cache/response-cache.js';
import { MetricsCollector } from './metrics/collector.js';
import { createDefaultStrategyRegistry } from './balancer/registry.js';
import { InstancePool } from './pool/instance-pool.js';
import { ModelRegistry } from './router/model-registry.js';
import { RequestRouter } from './router/request-router.js';
import { createOpenAiCompatFactory } from './backends/openai-compat.js';
import { createLogger } from './utils/logger.js';

const log = createLogger('service');

export interface RouterServiceOptions {
  /** Defaults to the OpenAI-compatible HTTP backend. */
  factory?: HandleFactory;
  /** Overrides the Redis tier built from `cache.redisUrl`. */
  sharedTier?: SharedTier;
  /** Defaults to the catalog at `modelCatalogPath`. */
  registry?: ModelRegistry;
  random?: RandomSource;
}

export interface RouterService {
  router: RequestRouter;
  registry: ModelRegistry;
  metrics: MetricsCollector;
  cache: ResponseCache;
  pool: InstancePool;
  close(): Promise<void>;
}

export async function createRouterService(
  config: RouterConfig,
  options: RouterServiceOptions = {},
): Promise<RouterService> {
  const registry = options.registry ?? ModelRegistry.fromFile(config.modelCatalogPath);

  let sharedTier = options.sharedTier;
  if (!sharedTier && config.cache.enabled && config.cache.redisUrl) {
    const redis = new RedisSharedTier(config.cache.redisUrl);
    await redis.connect();
    sharedTier = redis;
  }

  const cache = new ResponseCache({
    localTtlMs: config.cache.localTtlSeconds * 1000,
    sharedTtlMs: config.cache.sharedTtlSeconds * 1000,
    maxLocalEntries: config.cache.maxLocalEntries,
    sharedTimeoutMs: config.cache.sharedTimeoutMs,
    sharedTier,
  });

  const metrics = new MetricsCollector();
  const strategy = createDefaultStrategyRegistry().create(config.routing.strategy, { random: options.random });
  const pool = new InstancePool(registry, options.factory ?? createOpenAiCompatFactory(config.backend), {
    idleTimeoutMs: config.pool.idleTimeoutMs,
    sweepIntervalMs: config.pool.sweepIntervalMs,
  });
  pool.startIdleSweep();

  const router = new RequestRouter({
    registry,
    cache,
    keyBuilder: new CacheKeyBuilder(config.cache.keyPrefix),
    metrics,
    strategy,
    pool,
    config,
  });

  log.info(`Router ready: ${registry.size} models, strategy=${strategy.name}, shared cache ${sharedTier ? 'on' : 'off'}`);

  return {
    router,
    registry,
    metrics,
    cache,
    pool,
    async close(): Promise<void> {
      pool.stopIdleSweep();
      await pool.disposeAll();
      await sharedTier?.close?.();
      log.info('Router service closed');
    },
  };
}
