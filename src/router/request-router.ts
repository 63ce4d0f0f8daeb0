import { randomUUID } from 'node:crypto';
import { performance } from 'node:perf_hooks';
import type { RouterConfig } from '../config/types.js';
import type { BackendHandle, BackendResult } from '../backends/types.js';
import type { CacheKeyBuilder } from '../cache/key-builder.js';
import type { ResponseCache } from '../cache/response-cache.js';
import type { CandidateScore, LoadBalancingStrategy } from '../balancer/types.js';
import type { MetricsCollector } from '../metrics/collector.js';
import type { HealthSnapshot, MetricsSummary } from '../metrics/types.js';
import type { InstancePool } from '../pool/instance-pool.js';
import type { ModelRegistry } from './model-registry.js';
import type { ModelSpec, RouteRequest, RouteResponse, RouteStreamChunk, Usage } from './types.js';
import { routeResponseSchema } from './types.js';
import { WeightedRoundRobinStrategy } from '../balancer/weighted-round-robin.js';
import { BackendInvocationError, RoutingError, describeError, errorKind } from '../errors.js';
import { abortable } from '../utils/abort.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('request-router');

export interface RequestRouterDeps {
  registry: ModelRegistry;
  cache: ResponseCache;
  keyBuilder: CacheKeyBuilder;
  metrics: MetricsCollector;
  strategy: LoadBalancingStrategy;
  pool: InstancePool;
  config: Pick<RouterConfig, 'cache' | 'routing'>;
}

export function estimateCost(model: ModelSpec, inputTokens: number, outputTokens: number): number {
  return (inputTokens / 1_000_000) * model.inputCostPerMTok
    + (outputTokens / 1_000_000) * model.outputCostPerMTok;
}

/**
 * Entry point of the request path: cache lookup, candidate selection,
 * backend invocation with bounded failover, metrics and cache write-back.
 *
 * Callers get either a real response (fresh or cached) or one terminal
 * error. A failure is never papered over with a placeholder.
 */
export class RequestRouter {
  private readonly registry: ModelRegistry;
  private readonly cache: ResponseCache;
  private readonly keyBuilder: CacheKeyBuilder;
  private readonly metrics: MetricsCollector;
  private readonly strategy: LoadBalancingStrategy;
  private readonly pool: InstancePool;
  private readonly config: Pick<RouterConfig, 'cache' | 'routing'>;

  constructor(deps: RequestRouterDeps) {
    this.registry = deps.registry;
    this.cache = deps.cache;
    this.keyBuilder = deps.keyBuilder;
    this.metrics = deps.metrics;
    this.strategy = deps.strategy;
    this.pool = deps.pool;
    this.config = deps.config;

    if (this.strategy instanceof WeightedRoundRobinStrategy) {
      for (const model of this.registry.getAll()) {
        if (model.weight !== undefined) {
          this.strategy.setWeight(model.id, model.weight);
        }
      }
    }
  }

  async route(request: RouteRequest, signal?: AbortSignal): Promise<RouteResponse> {
    signal?.throwIfAborted();
    const lookupStart = performance.now();

    const key = this.keyBuilder.build(request);
    const cacheable = this.config.cache.enabled && !this.keyBuilder.isFallbackKey(key);

    if (cacheable) {
      const cached = await this.lookup(key, request, signal);
      if (cached) {
        return {
          ...cached,
          responseId: randomUUID(),
          cacheHit: true,
          latencyMs: performance.now() - lookupStart,
        };
      }
    }

    const round = this.selectRound(request);
    const attempts: string[] = [];
    let lastError: unknown;

    for (const model of round) {
      signal?.throwIfAborted();
      attempts.push(model.id);

      const outcome = await this.attempt(model, request, signal);
      if (outcome.ok) {
        const response = this.buildResponse(model, outcome.result, outcome.latencyMs, attempts);
        if (cacheable) {
          await this.cache.set(key, response, this.cacheTtlMs(model), signal);
        }
        log.info(`Routed ${request.modelId} => ${model.id} in ${outcome.latencyMs.toFixed(0)}ms (attempts: ${attempts.join(', ')})`);
        return response;
      }

      lastError = outcome.error;
      if (attempts.length < round.length) {
        log.warn(`Attempt on ${model.id} failed, failing over: ${describeError(outcome.error)}`);
      }
    }

    throw new BackendInvocationError(
      `All ${attempts.length} attempt(s) failed for ${request.modelId}: ${describeError(lastError)}`,
      attempts,
      lastError,
    );
  }

  /**
   * Streams content deltas, closing with a `done` chunk. Failover applies
   * only until the first delta has been yielded; streamed responses are
   * not cached.
   */
  async *routeStream(request: RouteRequest, signal?: AbortSignal): AsyncGenerator<RouteStreamChunk> {
    signal?.throwIfAborted();

    const responseId = randomUUID();
    const round = this.selectRound(request);
    const attempts: string[] = [];
    let lastError: unknown;

    for (const model of round) {
      signal?.throwIfAborted();
      attempts.push(model.id);

      const handle = await this.acquireForStream(model, signal);
      if (!handle.ok) {
        lastError = handle.error;
        continue;
      }
      const stream = handle.value.invokeStream;
      if (!stream) {
        throw new RoutingError(`Model ${model.id} does not support streaming`);
      }

      const trackingId = this.metrics.startRequest(model.id, 'streaming');
      const started = performance.now();
      let sequence = 0;
      let settled = false;

      try {
        for await (const delta of stream.call(handle.value, request, signal)) {
          signal?.throwIfAborted();
          yield { responseId, modelId: model.id, delta, sequence: sequence++, done: false };
        }
        this.metrics.endRequest(trackingId, true, performance.now() - started);
        settled = true;
        yield { responseId, modelId: model.id, delta: '', sequence, done: true };
        return;
      } catch (err) {
        if (signal?.aborted) throw signal.reason;

        this.metrics.endRequest(trackingId, false, performance.now() - started);
        settled = true;
        this.metrics.recordError(model.id, errorKind(err), err);
        lastError = err;
        if (sequence > 0) throw err;
      } finally {
        // Aborted, or the consumer stopped iterating early.
        if (!settled) this.metrics.discardRequest(trackingId);
      }
    }

    throw new BackendInvocationError(
      `All ${attempts.length} streaming attempt(s) failed for ${request.modelId}: ${describeError(lastError)}`,
      attempts,
      lastError,
    );
  }

  getMetrics(modelId: string, windowMs?: number): MetricsSummary {
    return this.metrics.getMetrics(modelId, windowMs);
  }

  getHealth(modelId: string): HealthSnapshot {
    return this.metrics.getHealth(modelId);
  }

  /**
   * Returns false when the active strategy has no notion of weight.
   */
  setWeight(modelId: string, weight: number): boolean {
    if (!(this.strategy instanceof WeightedRoundRobinStrategy)) {
      log.warn(`setWeight ignored: strategy ${this.strategy.name} is not weighted`);
      return false;
    }
    this.strategy.setWeight(modelId, weight);
    return true;
  }

  get strategyName(): string {
    return this.strategy.name;
  }

  private async lookup(key: string, request: RouteRequest, signal?: AbortSignal): Promise<RouteResponse | undefined> {
    const result = await this.cache.get(key, routeResponseSchema, signal);
    if (result.status === 'hit') {
      this.metrics.recordCacheHit(request.modelId, result.tier);
      return result.value;
    }

    if (result.status === 'failure') {
      // A broken cache must not fail the request. Cancellation still must.
      signal?.throwIfAborted();
      log.warn(`Cache lookup failed, routing as a miss: ${result.error.message}`);
    }
    this.metrics.recordCacheMiss(request.modelId, this.cache.hasSharedTier ? 'shared' : 'local');
    return undefined;
  }

  /**
   * Candidates for this request, rotated to start at the primary and cut to
   * the failover budget. A request naming a registered candidate gets that
   * model as primary; any other id (`auto`, `default`, unknown) leaves the
   * pick to the strategy.
   */
  private selectRound(request: RouteRequest): ModelSpec[] {
    const candidates = this.candidatesFor(request);
    const ids = candidates.map(model => model.id);

    const primaryId = ids.includes(request.modelId)
      ? request.modelId
      : this.strategy.selectNext(ids, { scoreOf: id => this.scoreOf(id) });
    const start = Math.max(0, ids.indexOf(primaryId));
    const rotated = [...candidates.slice(start), ...candidates.slice(0, start)];

    const { failover } = this.config.routing;
    const limit = failover.enabled ? Math.max(1, failover.maxRetries + 1) : 1;
    return rotated.slice(0, limit);
  }

  private candidatesFor(request: RouteRequest): ModelSpec[] {
    const hints = request.hints ?? {};
    let models = this.registry.withCapabilities(hints.requiredCapabilities ?? []);

    const { maxCostPerMTok, maxLatencyMs } = hints;
    if (maxCostPerMTok !== undefined) {
      models = models.filter(m => Math.max(m.inputCostPerMTok, m.outputCostPerMTok) <= maxCostPerMTok);
    }
    if (maxLatencyMs !== undefined) {
      models = models.filter(m => {
        const average = this.metrics.averageLatency(m.id);
        return average === undefined || average <= maxLatencyMs;
      });
    }

    if (this.config.routing.skipUnhealthy) {
      const usable = models.filter(m => this.metrics.getHealth(m.id).status !== 'unhealthy');
      if (usable.length > 0) {
        models = usable;
      } else if (models.length > 0) {
        log.warn(`All ${models.length} candidate(s) for ${request.modelId} are unhealthy, routing anyway`);
      }
    }

    if (models.length === 0) {
      throw new RoutingError(`No model satisfies the routing constraints for ${request.modelId}`);
    }
    return models;
  }

  private scoreOf(modelId: string): CandidateScore {
    return {
      health: this.metrics.getHealth(modelId).status,
      averageResponseTimeMs: this.metrics.averageLatency(modelId),
      activeRequests: this.metrics.inFlight(modelId),
    };
  }

  private async attempt(
    model: ModelSpec,
    request: RouteRequest,
    signal?: AbortSignal,
  ): Promise<{ ok: true; result: BackendResult; latencyMs: number } | { ok: false; error: unknown }> {
    let trackingId: string | undefined;
    let started = 0;
    try {
      const handle = await this.pool.acquire(model.id, signal);
      trackingId = this.metrics.startRequest(model.id, 'text_generation');
      started = performance.now();

      const result = await abortable(handle.invoke(request, signal), signal);
      const latencyMs = performance.now() - started;
      this.metrics.endRequest(trackingId, true, latencyMs, {
        totalTokens: result.inputTokens + result.outputTokens,
        costUsd: estimateCost(model, result.inputTokens, result.outputTokens),
      });
      return { ok: true, result, latencyMs };
    } catch (err) {
      if (signal?.aborted) {
        if (trackingId !== undefined) this.metrics.discardRequest(trackingId);
        throw signal.reason;
      }
      if (trackingId !== undefined) {
        this.metrics.endRequest(trackingId, false, performance.now() - started);
      }
      this.metrics.recordError(model.id, errorKind(err), err);
      return { ok: false, error: err };
    }
  }

  private async acquireForStream(
    model: ModelSpec,
    signal?: AbortSignal,
  ): Promise<{ ok: true; value: BackendHandle } | { ok: false; error: unknown }> {
    try {
      return { ok: true, value: await this.pool.acquire(model.id, signal) };
    } catch (err) {
      if (signal?.aborted) throw signal.reason;
      this.metrics.recordError(model.id, errorKind(err), err);
      return { ok: false, error: err };
    }
  }

  private buildResponse(
    model: ModelSpec,
    result: BackendResult,
    latencyMs: number,
    attempts: readonly string[],
  ): RouteResponse {
    const usage: Usage = {
      inputTokens: result.inputTokens,
      outputTokens: result.outputTokens,
      totalTokens: result.inputTokens + result.outputTokens,
      costUsd: estimateCost(model, result.inputTokens, result.outputTokens),
    };
    return {
      responseId: randomUUID(),
      modelId: model.id,
      content: result.content,
      finishReason: result.finishReason,
      usage,
      latencyMs,
      cacheHit: false,
      attempts: [...attempts],
      createdAt: new Date().toISOString(),
    };
  }

  private cacheTtlMs(model: ModelSpec): number {
    const { cache } = this.config;
    const seconds = model.cacheTtlSeconds
      ?? cache.modelTypeTtlSeconds[model.modelType]
      ?? cache.defaultTtlSeconds;
    return seconds * 1000;
  }
}
