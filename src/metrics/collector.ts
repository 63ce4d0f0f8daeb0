import { randomUUID } from 'node:crypto';
import { performance } from 'node:perf_hooks';
import type { CacheTier } from '../cache/response-cache.js';
import type {
  CacheCounts,
  HealthSnapshot,
  MetricsSummary,
  RequestKind,
  TrackedRequest,
  UsageRecord,
} from './types.js';
import { SampleWindow } from './sample-window.js';
import { describeError } from '../errors.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('metrics');

export const DEFAULT_SAMPLE_WINDOW = 1000;
export const UNHEALTHY_ERROR_RATE = 0.1;

interface ModelMetrics {
  totalRequests: number;
  successfulRequests: number;
  failedRequests: number;
  totalTokens: number;
  totalCostUsd: number;
  inFlight: number;
  requestsByKind: Partial<Record<RequestKind, number>>;
  errorsByKind: Map<string, number>;
  cache: CacheCounts;
  responseTimes: SampleWindow;
  lastUpdated: number | null;
}

export interface MetricsCollectorOptions {
  sampleWindowSize?: number;
  unhealthyErrorRate?: number;
}

/**
 * Per-model request accounting that feeds routing decisions.
 *
 * Every mutation of a model's record happens in one synchronous block, so on
 * the event loop it is atomic with respect to every other caller; records of
 * different models never share state.
 *
 * `totalRequests` counts started requests; success and failure counts are
 * settled ones, so their sum trails the total by the in-flight count.
 */
export class MetricsCollector {
  private readonly active = new Map<string, TrackedRequest>();
  private readonly models = new Map<string, ModelMetrics>();
  private readonly windowSize: number;
  private readonly unhealthyErrorRate: number;

  constructor(options: MetricsCollectorOptions = {}) {
    this.windowSize = options.sampleWindowSize ?? DEFAULT_SAMPLE_WINDOW;
    this.unhealthyErrorRate = options.unhealthyErrorRate ?? UNHEALTHY_ERROR_RATE;
  }

  startRequest(modelId: string, kind: RequestKind): string {
    const trackingId = randomUUID();
    this.active.set(trackingId, {
      trackingId,
      modelId,
      kind,
      startedAt: new Date().toISOString(),
      startMark: performance.now(),
    });

    const metrics = this.record(modelId);
    metrics.totalRequests++;
    metrics.requestsByKind[kind] = (metrics.requestsByKind[kind] ?? 0) + 1;
    metrics.inFlight++;

    log.debug(`Tracking ${trackingId}: model=${modelId}, kind=${kind}`);
    return trackingId;
  }

  /**
   * Settle a tracked request. `durationMs` defaults to the time since
   * `startRequest`. Unknown or already-settled ids are logged and ignored.
   */
  endRequest(trackingId: string, success: boolean, durationMs?: number, usage?: UsageRecord): void {
    const tracking = this.take(trackingId, 'endRequest');
    if (!tracking) return;

    const elapsed = durationMs ?? performance.now() - tracking.startMark;
    const metrics = this.record(tracking.modelId);

    metrics.inFlight = Math.max(0, metrics.inFlight - 1);
    if (success) {
      metrics.successfulRequests++;
    } else {
      metrics.failedRequests++;
    }
    if (usage) {
      metrics.totalTokens += usage.totalTokens;
      if (usage.costUsd !== undefined) {
        metrics.totalCostUsd += usage.costUsd;
      }
    }
    metrics.responseTimes.push(elapsed);
    metrics.lastUpdated = Date.now();

    log.debug(`Settled ${trackingId}: success=${success}, ${elapsed.toFixed(1)}ms`);
  }

  /**
   * Drop a tracked request that was cancelled before it produced an outcome.
   * Totals are left alone; only the in-flight count is released.
   */
  discardRequest(trackingId: string): void {
    const tracking = this.take(trackingId, 'discardRequest');
    if (!tracking) return;

    const metrics = this.record(tracking.modelId);
    metrics.inFlight = Math.max(0, metrics.inFlight - 1);
    log.debug(`Discarded ${trackingId}`);
  }

  recordCacheHit(modelId: string, tier: CacheTier): void {
    this.record(modelId).cache[tier].hits++;
    log.debug(`Cache hit: model=${modelId}, tier=${tier}`);
  }

  recordCacheMiss(modelId: string, tier: CacheTier): void {
    this.record(modelId).cache[tier].misses++;
    log.debug(`Cache miss: model=${modelId}, tier=${tier}`);
  }

  recordError(modelId: string, errorKind: string, cause?: unknown): void {
    const errors = this.record(modelId).errorsByKind;
    errors.set(errorKind, (errors.get(errorKind) ?? 0) + 1);
    if (cause !== undefined) {
      log.error(`Error recorded: model=${modelId}, kind=${errorKind}: ${describeError(cause)}`);
    } else {
      log.warn(`Error recorded: model=${modelId}, kind=${errorKind}`);
    }
  }

  /**
   * Summary for one model. `windowMs` is carried through for callers that
   * ask for a range, but the figures are lifetime figures.
   */
  getMetrics(modelId: string, windowMs?: number): MetricsSummary {
    const metrics = this.models.get(modelId);
    const window = windowMs ?? null;
    if (!metrics) {
      return {
        modelId,
        windowMs: window,
        totalRequests: 0,
        successfulRequests: 0,
        failedRequests: 0,
        successRate: 0,
        errorRate: 0,
        averageResponseTimeMs: 0,
        p95ResponseTimeMs: 0,
        sampleCount: 0,
        cacheHits: 0,
        cacheMisses: 0,
        cacheHitRate: 0,
        totalTokens: 0,
        totalCostUsd: 0,
        inFlight: 0,
        requestsByKind: {},
        errorsByKind: {},
        lastUpdated: null,
      };
    }

    const cacheHits = metrics.cache.local.hits + metrics.cache.shared.hits;
    const cacheMisses = metrics.cache.local.misses + metrics.cache.shared.misses;
    const settled = metrics.successfulRequests + metrics.failedRequests;

    return {
      modelId,
      windowMs: window,
      totalRequests: metrics.totalRequests,
      successfulRequests: metrics.successfulRequests,
      failedRequests: metrics.failedRequests,
      successRate: settled > 0 ? metrics.successfulRequests / settled : 0,
      errorRate: settled > 0 ? metrics.failedRequests / settled : 0,
      averageResponseTimeMs: metrics.responseTimes.mean(),
      p95ResponseTimeMs: metrics.responseTimes.percentile(0.95),
      sampleCount: metrics.responseTimes.size,
      cacheHits,
      cacheMisses,
      cacheHitRate: cacheHits + cacheMisses > 0 ? cacheHits / (cacheHits + cacheMisses) : 0,
      totalTokens: metrics.totalTokens,
      totalCostUsd: metrics.totalCostUsd,
      inFlight: metrics.inFlight,
      requestsByKind: { ...metrics.requestsByKind },
      errorsByKind: Object.fromEntries(metrics.errorsByKind),
      lastUpdated: metrics.lastUpdated !== null ? new Date(metrics.lastUpdated).toISOString() : null,
    };
  }

  /**
   * Healthy iff fewer than 10% of settled requests failed. A model with no
   * settled request is `unknown`.
   */
  getHealth(modelId: string): HealthSnapshot {
    const checkedAt = new Date().toISOString();
    const metrics = this.models.get(modelId);
    const settled = metrics ? metrics.successfulRequests + metrics.failedRequests : 0;

    if (!metrics || settled === 0) {
      return {
        modelId,
        status: 'unknown',
        isHealthy: false,
        errorRate: 0,
        totalRequests: 0,
        averageResponseTimeMs: 0,
        lastActivity: null,
        checkedAt,
      };
    }

    const errorRate = metrics.failedRequests / settled;
    const isHealthy = errorRate < this.unhealthyErrorRate;
    return {
      modelId,
      status: isHealthy ? 'healthy' : 'unhealthy',
      isHealthy,
      errorRate,
      totalRequests: settled,
      averageResponseTimeMs: metrics.responseTimes.mean(),
      lastActivity: metrics.lastUpdated !== null ? new Date(metrics.lastUpdated).toISOString() : null,
      checkedAt,
    };
  }

  /**
   * Mean of the sample window, or undefined before the first settled
   * request. Cheap enough to call per candidate on every routing decision.
   */
  averageLatency(modelId: string): number | undefined {
    const window = this.models.get(modelId)?.responseTimes;
    return window && window.size > 0 ? window.mean() : undefined;
  }

  inFlight(modelId: string): number {
    return this.models.get(modelId)?.inFlight ?? 0;
  }

  /** Live tracking ids. Anything left here after a request finished is a leak. */
  get activeRequests(): number {
    return this.active.size;
  }

  trackedModels(): string[] {
    return Array.from(this.models.keys());
  }

  reset(): void {
    this.active.clear();
    this.models.clear();
  }

  private take(trackingId: string, operation: string): TrackedRequest | undefined {
    const tracking = this.active.get(trackingId);
    if (!tracking) {
      log.warn(`${operation}: unknown or already settled tracking id ${trackingId}`);
      return undefined;
    }
    this.active.delete(trackingId);
    return tracking;
  }

  private record(modelId: string): ModelMetrics {
    let metrics = this.models.get(modelId);
    if (!metrics) {
      metrics = {
        totalRequests: 0,
        successfulRequests: 0,
        failedRequests: 0,
        totalTokens: 0,
        totalCostUsd: 0,
        inFlight: 0,
        requestsByKind: {},
        errorsByKind: new Map(),
        cache: {
          local: { hits: 0, misses: 0 },
          shared: { hits: 0, misses: 0 },
        },
        responseTimes: new SampleWindow(this.windowSize),
        lastUpdated: null,
      };
      this.models.set(modelId, metrics);
    }
    return metrics;
  }
}
