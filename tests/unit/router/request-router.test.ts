import { describe, it, expect, afterEach, vi } from 'vitest';
import { RequestRouter } from '../../../src/router/request-router.js';
import { ModelRegistry } from '../../../src/router/model-registry.js';
import { CacheKeyBuilder } from '../../../src/cache/key-builder.js';
import { ResponseCache } from '../../../src/cache/response-cache.js';
import { MetricsCollector } from '../../../src/metrics/collector.js';
import { InstancePool } from '../../../src/pool/instance-pool.js';
import { RoundRobinStrategy } from '../../../src/balancer/round-robin.js';
import { WeightedRoundRobinStrategy } from '../../../src/balancer/weighted-round-robin.js';
import { PerformanceBasedStrategy } from '../../../src/balancer/performance-based.js';
import { defaults } from '../../../src/config/index.js';
import type { RouterConfig } from '../../../src/config/index.js';
import type { LoadBalancingStrategy } from '../../../src/balancer/types.js';
import type { ModelSpec, RouteRequest, RouteStreamChunk } from '../../../src/router/types.js';
import { BackendError, BackendInvocationError, RoutingError } from '../../../src/errors.js';
import { MemorySharedTier } from '../../helpers/memory-shared-tier.js';
import { factoryFor, fakeHandle, hangUntilAborted, makeModel } from '../../helpers/fake-backend.js';
import type { FakeHandle } from '../../helpers/fake-backend.js';

interface SetupOptions {
  models: ModelSpec[];
  handles: Record<string, FakeHandle>;
  strategy?: LoadBalancingStrategy;
  cache?: Partial<RouterConfig['cache']>;
  routing?: Partial<RouterConfig['routing']>;
  sharedTier?: MemorySharedTier;
}

function setup(options: SetupOptions): { router: RequestRouter; metrics: MetricsCollector; cache: ResponseCache } {
  const config: Pick<RouterConfig, 'cache' | 'routing'> = {
    cache: { ...defaults.cache, ...options.cache },
    routing: { ...defaults.routing, ...options.routing },
  };
  const registry = new ModelRegistry(options.models);
  const metrics = new MetricsCollector();
  const cache = new ResponseCache({
    localTtlMs: config.cache.localTtlSeconds * 1000,
    sharedTtlMs: config.cache.sharedTtlSeconds * 1000,
    maxLocalEntries: config.cache.maxLocalEntries,
    sharedTimeoutMs: config.cache.sharedTimeoutMs,
    sharedTier: options.sharedTier,
  });
  const router = new RequestRouter({
    registry,
    cache,
    keyBuilder: new CacheKeyBuilder(config.cache.keyPrefix),
    metrics,
    strategy: options.strategy ?? new RoundRobinStrategy(),
    pool: new InstancePool(registry, factoryFor(options.handles)),
    config,
  });
  return { router, metrics, cache };
}

function failing(modelId: string, status = 503): FakeHandle {
  return fakeHandle(modelId, async () => {
    throw new BackendError('test', status, 'overloaded');
  });
}

async function collect(stream: AsyncIterable<RouteStreamChunk>): Promise<RouteStreamChunk[]> {
  const chunks: RouteStreamChunk[] = [];
  for await (const chunk of stream) chunks.push(chunk);
  return chunks;
}

const hello: RouteRequest = { modelId: 'm1', userPrompt: 'hello' };

describe('RequestRouter', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  describe('caching', () => {
    it('answers a repeated request from cache without calling the backend', async () => {
      const m1 = fakeHandle('m1');
      const { router, metrics } = setup({ models: [makeModel('m1')], handles: { m1 } });

      const first = await router.route(hello);
      const second = await router.route(hello);

      expect(first.cacheHit).toBe(false);
      expect(second.cacheHit).toBe(true);
      expect(second.content).toBe('m1: hello');
      expect(second.responseId).not.toBe(first.responseId);
      expect(m1.invoke).toHaveBeenCalledTimes(1);

      const summary = metrics.getMetrics('m1');
      expect(summary.cacheHits).toBe(1);
      expect(summary.cacheMisses).toBe(1);
      expect(summary.totalRequests).toBe(1);
    });

    it('skips the cache when disabled', async () => {
      const m1 = fakeHandle('m1');
      const { router, metrics } = setup({
        models: [makeModel('m1')],
        handles: { m1 },
        cache: { enabled: false },
      });

      await router.route(hello);
      const second = await router.route(hello);

      expect(second.cacheHit).toBe(false);
      expect(m1.invoke).toHaveBeenCalledTimes(2);
      expect(metrics.getMetrics('m1').cacheMisses).toBe(0);
    });

    it('routes through a broken shared tier and counts a miss', async () => {
      const shared = new MemorySharedTier();
      shared.failNext = new Error('connection refused');
      const m1 = fakeHandle('m1');
      const { router, metrics } = setup({ models: [makeModel('m1')], handles: { m1 }, sharedTier: shared });

      const response = await router.route(hello);

      expect(response.content).toBe('m1: hello');
      expect(metrics.getMetrics('m1').cacheMisses).toBe(1);
      expect(shared.store.size).toBe(1);
    });

    it('routes as a miss when the shared tier stops answering', async () => {
      const shared = new MemorySharedTier();
      shared.stalled = true;
      const m1 = fakeHandle('m1');
      const { router, metrics } = setup({
        models: [makeModel('m1')],
        handles: { m1 },
        sharedTier: shared,
        cache: { sharedTimeoutMs: 20 },
      });

      const first = await router.route(hello);
      const second = await router.route(hello);

      expect(first.content).toBe('m1: hello');
      expect(second.cacheHit).toBe(true);
      expect(metrics.getMetrics('m1').cacheMisses).toBe(1);
      expect(m1.invoke).toHaveBeenCalledTimes(1);
    });

    it('serves the cached response unchanged after the caller mutates its copy', async () => {
      const { router } = setup({ models: [makeModel('m1')], handles: { m1: fakeHandle('m1') } });

      const first = await router.route(hello);
      first.usage.totalTokens = 999_999;
      first.content = 'edited';
      first.attempts.push('elsewhere');

      const second = await router.route(hello);
      second.usage.inputTokens = 0;
      const third = await router.route(hello);

      expect(third.cacheHit).toBe(true);
      expect(third.content).toBe('m1: hello');
      expect(third.usage).toMatchObject({ inputTokens: 10, outputTokens: 5, totalTokens: 15 });
      expect(third.attempts).toEqual(['m1']);
    });

    it('does not cache a request whose key could not be built', async () => {
      const m1 = fakeHandle('m1');
      const { router, cache } = setup({ models: [makeModel('m1')], handles: { m1 } });
      const request: RouteRequest = { modelId: 'm1', userPrompt: 'hello', settings: { seed: 10n } };

      await router.route(request);
      await router.route(request);

      expect(m1.invoke).toHaveBeenCalledTimes(2);
      expect(cache.localSize).toBe(0);
    });

    it.each([
      ['the model override', makeModel('m1', { cacheTtlSeconds: 120 }), 120_000],
      ['the model-type override', makeModel('m1', { modelType: 'code' }), 300_000],
      ['the default', makeModel('m1'), 1_800_000],
    ])('stores with the TTL from %s', async (_source, model, ttlMs) => {
      vi.useFakeTimers({ toFake: ['Date'] });
      vi.setSystemTime(new Date('2026-01-01T00:00:00.000Z'));
      const shared = new MemorySharedTier();
      const { router } = setup({
        models: [model],
        handles: { m1: fakeHandle('m1') },
        cache: { modelTypeTtlSeconds: { code: 300 } },
        sharedTier: shared,
      });

      await router.route(hello);

      const [entry] = Array.from(shared.store.values());
      expect(entry?.expiresAt).toBe(Date.now() + ttlMs);
    });
  });

  describe('dispatch', () => {
    it('reports usage and cost from the model pricing', async () => {
      const { router, metrics } = setup({
        models: [makeModel('m1', { inputCostPerMTok: 1, outputCostPerMTok: 2 })],
        handles: { m1: fakeHandle('m1') },
      });

      const response = await router.route(hello);

      expect(response.usage.inputTokens).toBe(10);
      expect(response.usage.outputTokens).toBe(5);
      expect(response.usage.totalTokens).toBe(15);
      expect(response.usage.costUsd).toBeCloseTo(0.00002, 10);
      expect(response.finishReason).toBe('stop');
      expect(response.attempts).toEqual(['m1']);
      expect(metrics.getMetrics('m1').totalTokens).toBe(15);
      expect(metrics.getMetrics('m1').successfulRequests).toBe(1);
    });

    it('filters candidates by required capability', async () => {
      const plain = fakeHandle('plain');
      const vision = fakeHandle('vision');
      const { router } = setup({
        models: [makeModel('plain'), makeModel('vision', { capabilities: ['text-generation', 'vision'] })],
        handles: { plain, vision },
      });

      const response = await router.route({ ...hello, hints: { requiredCapabilities: ['vision'] } });

      expect(response.modelId).toBe('vision');
      expect(plain.invoke).not.toHaveBeenCalled();
    });

    it('fails with RoutingError when no model qualifies', async () => {
      const m1 = fakeHandle('m1');
      const { router } = setup({ models: [makeModel('m1')], handles: { m1 } });

      const attempt = router.route({ ...hello, hints: { requiredCapabilities: ['audio'] } });

      await expect(attempt).rejects.toThrow(RoutingError);
      await expect(router.route({ ...hello, hints: { requiredCapabilities: ['audio'] } }))
        .rejects.toThrow('No model satisfies the routing constraints for m1');
      expect(m1.invoke).not.toHaveBeenCalled();
    });

    it('filters candidates by cost ceiling', async () => {
      const { router } = setup({
        models: [
          makeModel('pricey', { inputCostPerMTok: 0.5, outputCostPerMTok: 3 }),
          makeModel('cheap', { inputCostPerMTok: 0, outputCostPerMTok: 0 }),
        ],
        handles: { pricey: fakeHandle('pricey'), cheap: fakeHandle('cheap') },
      });

      const response = await router.route({ ...hello, hints: { maxCostPerMTok: 1 } });
      expect(response.modelId).toBe('cheap');
    });

    it('filters measured models by latency ceiling and keeps unmeasured ones', async () => {
      const { router, metrics } = setup({
        models: [makeModel('slow'), makeModel('fresh')],
        handles: { slow: fakeHandle('slow'), fresh: fakeHandle('fresh') },
      });
      metrics.endRequest(metrics.startRequest('slow', 'text_generation'), true, 500);

      const response = await router.route({ ...hello, hints: { maxLatencyMs: 100 } });
      expect(response.modelId).toBe('fresh');
    });

    it('skips unhealthy models while another remains', async () => {
      const { router, metrics } = setup({
        models: [makeModel('sick'), makeModel('well')],
        handles: { sick: fakeHandle('sick'), well: fakeHandle('well') },
      });
      metrics.endRequest(metrics.startRequest('sick', 'text_generation'), false, 10);

      const response = await router.route(hello);
      expect(response.modelId).toBe('well');
    });

    it('routes to unhealthy models when skipping is off', async () => {
      const { router, metrics } = setup({
        models: [makeModel('sick'), makeModel('well')],
        handles: { sick: fakeHandle('sick'), well: fakeHandle('well') },
        routing: { skipUnhealthy: false },
      });
      metrics.endRequest(metrics.startRequest('sick', 'text_generation'), false, 10);

      const response = await router.route(hello);
      expect(response.modelId).toBe('sick');
    });

    it('keeps an unhealthy model when it is the only candidate', async () => {
      const { router, metrics } = setup({ models: [makeModel('m1')], handles: { m1: fakeHandle('m1') } });
      metrics.endRequest(metrics.startRequest('m1', 'text_generation'), false, 10);

      const response = await router.route(hello);
      expect(response.modelId).toBe('m1');
    });

    it('scores candidates without building full summaries', async () => {
      const { router, metrics } = setup({
        models: [makeModel('slow'), makeModel('fast')],
        handles: { slow: fakeHandle('slow'), fast: fakeHandle('fast') },
        strategy: new PerformanceBasedStrategy(() => 0),
        cache: { enabled: false },
      });
      metrics.endRequest(metrics.startRequest('slow', 'text_generation'), true, 400);
      metrics.endRequest(metrics.startRequest('fast', 'text_generation'), true, 40);
      const summaries = vi.spyOn(metrics, 'getMetrics');

      const response = await router.route({ modelId: 'auto', userPrompt: 'hello', hints: { maxLatencyMs: 1_000 } });

      expect(response.modelId).toBe('fast');
      expect(summaries).not.toHaveBeenCalled();
    });

    it('applies catalog weights to a weighted strategy', async () => {
      const { router } = setup({
        models: [makeModel('a', { weight: 2 }), makeModel('b')],
        handles: { a: fakeHandle('a'), b: fakeHandle('b') },
        strategy: new WeightedRoundRobinStrategy(),
        cache: { enabled: false },
      });

      const served: string[] = [];
      for (let i = 0; i < 3; i++) {
        served.push((await router.route(hello)).modelId);
      }
      expect(served).toEqual(['a', 'b', 'a']);
    });

    it('setWeight reaches only a weighted strategy', () => {
      const weighted = setup({
        models: [makeModel('m1')],
        handles: { m1: fakeHandle('m1') },
        strategy: new WeightedRoundRobinStrategy(),
      });
      const plain = setup({ models: [makeModel('m1')], handles: { m1: fakeHandle('m1') } });

      expect(weighted.router.setWeight('m1', 4)).toBe(true);
      expect(plain.router.setWeight('m1', 4)).toBe(false);
    });

    it('passes metrics and health through', async () => {
      const { router } = setup({ models: [makeModel('m1')], handles: { m1: fakeHandle('m1') } });
      await router.route(hello);

      expect(router.getMetrics('m1', 60_000).windowMs).toBe(60_000);
      expect(router.getHealth('m1').status).toBe('healthy');
    });
  });

  describe('requested model', () => {
    it('dispatches to a registered model the request names', async () => {
      const a = fakeHandle('a');
      const b = fakeHandle('b');
      const { router } = setup({
        models: [makeModel('a'), makeModel('b')],
        handles: { a, b },
        cache: { enabled: false },
      });

      const first = await router.route({ modelId: 'b', userPrompt: 'hello' });
      const second = await router.route({ modelId: 'b', userPrompt: 'hello' });

      expect(first.modelId).toBe('b');
      expect(second.modelId).toBe('b');
      expect(a.invoke).not.toHaveBeenCalled();
    });

    it('does not advance the strategy for a named model', async () => {
      const { router } = setup({
        models: [makeModel('a'), makeModel('b')],
        handles: { a: fakeHandle('a'), b: fakeHandle('b') },
        cache: { enabled: false },
      });

      await router.route({ modelId: 'b', userPrompt: 'hello' });
      const auto = await router.route({ modelId: 'auto', userPrompt: 'hello' });

      expect(auto.modelId).toBe('a');
    });

    it('fails over from the named model to the other candidates', async () => {
      const { router } = setup({
        models: [makeModel('a'), makeModel('b'), makeModel('c')],
        handles: { a: fakeHandle('a'), b: failing('b'), c: fakeHandle('c') },
      });

      const response = await router.route({ modelId: 'b', userPrompt: 'hello' });

      expect(response.attempts).toEqual(['b', 'c']);
      expect(response.modelId).toBe('c');
    });

    it.each(['auto', 'default', 'not-in-catalog'])('lets the strategy choose for %s', async (modelId) => {
      const { router } = setup({
        models: [makeModel('a'), makeModel('b')],
        handles: { a: fakeHandle('a'), b: fakeHandle('b') },
        cache: { enabled: false },
      });

      const served: string[] = [];
      for (let i = 0; i < 3; i++) {
        served.push((await router.route({ modelId, userPrompt: 'hello' })).modelId);
      }
      expect(served).toEqual(['a', 'b', 'a']);
    });

    it('lets the strategy choose when the named model is filtered out', async () => {
      const { router } = setup({
        models: [makeModel('plain'), makeModel('vision', { capabilities: ['text-generation', 'vision'] })],
        handles: { plain: fakeHandle('plain'), vision: fakeHandle('vision') },
      });

      const response = await router.route({
        modelId: 'plain',
        userPrompt: 'hello',
        hints: { requiredCapabilities: ['vision'] },
      });

      expect(response.modelId).toBe('vision');
    });

    it('starts a stream at the named model', async () => {
      const { router } = setup({
        models: [makeModel('a'), makeModel('b')],
        handles: { a: fakeHandle('a', undefined, ['from a']), b: fakeHandle('b', undefined, ['from b']) },
      });

      const chunks = await collect(router.routeStream({ modelId: 'b', userPrompt: 'hello' }));

      expect(chunks.map(c => c.delta)).toEqual(['from b', '']);
    });
  });

  describe('failover', () => {
    it('retries the next candidate after a backend failure', async () => {
      const a = failing('a');
      const b = fakeHandle('b');
      const { router, metrics } = setup({
        models: [makeModel('a'), makeModel('b')],
        handles: { a, b },
        routing: { failover: { enabled: true, maxRetries: 1 } },
      });

      const response = await router.route(hello);

      expect(response.modelId).toBe('b');
      expect(response.content).toBe('b: hello');
      expect(response.attempts).toEqual(['a', 'b']);
      expect(metrics.getMetrics('a').failedRequests).toBe(1);
      expect(metrics.getMetrics('a').errorsByKind).toEqual({ upstream_503: 1 });
      expect(metrics.getMetrics('b').successfulRequests).toBe(1);
    });

    it('starts the failover round at the selected candidate', async () => {
      const a = fakeHandle('a');
      const b = failing('b');
      const c = fakeHandle('c');
      const { router } = setup({
        models: [makeModel('a'), makeModel('b'), makeModel('c')],
        handles: { a, b, c },
        cache: { enabled: false },
      });

      expect((await router.route(hello)).attempts).toEqual(['a']);
      expect((await router.route(hello)).attempts).toEqual(['b', 'c']);
    });

    it('surfaces the failure when failover is disabled', async () => {
      const a = failing('a');
      const b = fakeHandle('b');
      const { router } = setup({
        models: [makeModel('a'), makeModel('b')],
        handles: { a, b },
        routing: { failover: { enabled: false, maxRetries: 3 } },
      });

      const error = await router.route(hello).catch((err: unknown) => err);

      expect(error).toBeInstanceOf(BackendInvocationError);
      if (!(error instanceof BackendInvocationError)) return;
      expect(error.attempts).toEqual(['a']);
      expect(error.cause).toBeInstanceOf(BackendError);
      expect(b.invoke).not.toHaveBeenCalled();
    });

    it('gives up after the retry budget', async () => {
      const handles = { a: failing('a'), b: failing('b'), c: failing('c', 429) };
      const { router } = setup({
        models: [makeModel('a'), makeModel('b'), makeModel('c')],
        handles,
        routing: { failover: { enabled: true, maxRetries: 1 } },
      });

      const error = await router.route(hello).catch((err: unknown) => err);

      expect(error).toBeInstanceOf(BackendInvocationError);
      if (!(error instanceof BackendInvocationError)) return;
      expect(error.attempts).toEqual(['a', 'b']);
      expect(error.message).toBe('All 2 attempt(s) failed for m1: test API error (503): overloaded');
      expect(handles.c.invoke).not.toHaveBeenCalled();
    });

    it('tries each candidate at most once', async () => {
      const { router, metrics } = setup({
        models: [makeModel('a'), makeModel('b')],
        handles: { a: failing('a'), b: failing('b', 429) },
      });

      const error = await router.route(hello).catch((err: unknown) => err);

      expect(error).toBeInstanceOf(BackendInvocationError);
      if (!(error instanceof BackendInvocationError)) return;
      expect(error.attempts).toEqual(['a', 'b']);
      expect(metrics.getMetrics('b').errorsByKind).toEqual({ rate_limited: 1 });
      expect(metrics.activeRequests).toBe(0);
    });

    it('fails over when a handle cannot be built', async () => {
      const { router, metrics } = setup({
        models: [makeModel('a'), makeModel('b')],
        handles: { b: fakeHandle('b') },
      });

      const response = await router.route(hello);

      expect(response.attempts).toEqual(['a', 'b']);
      expect(metrics.getMetrics('a').errorsByKind).toEqual({ Error: 1 });
      expect(metrics.getMetrics('a').totalRequests).toBe(0);
    });
  });

  describe('cancellation', () => {
    it('rejects before any work when already aborted', async () => {
      const m1 = fakeHandle('m1');
      const { router, metrics } = setup({ models: [makeModel('m1')], handles: { m1 } });
      const controller = new AbortController();
      controller.abort(new Error('caller went away'));

      await expect(router.route(hello, controller.signal)).rejects.toThrow('caller went away');
      expect(m1.invoke).not.toHaveBeenCalled();
      expect(metrics.trackedModels()).toEqual([]);
    });

    it('discards the tracking id when aborted mid-invocation', async () => {
      const controller = new AbortController();
      const m1 = fakeHandle('m1', async (_request, signal) => {
        controller.abort(new Error('caller went away'));
        return hangUntilAborted(signal);
      });
      const m2 = fakeHandle('m2');
      const { router, metrics } = setup({ models: [makeModel('m1'), makeModel('m2')], handles: { m1, m2 } });

      await expect(router.route(hello, controller.signal)).rejects.toThrow('caller went away');

      expect(metrics.activeRequests).toBe(0);
      const summary = metrics.getMetrics('m1');
      expect(summary.totalRequests).toBe(1);
      expect(summary.failedRequests).toBe(0);
      expect(summary.inFlight).toBe(0);
      expect(m2.invoke).not.toHaveBeenCalled();
    });
  });

  describe('routeStream', () => {
    it('yields deltas and a closing chunk', async () => {
      const m1 = fakeHandle('m1', undefined, ['Hel', 'lo']);
      const { router, metrics } = setup({ models: [makeModel('m1')], handles: { m1 } });

      const chunks = await collect(router.routeStream(hello));

      expect(chunks.map(c => [c.delta, c.sequence, c.done])).toEqual([
        ['Hel', 0, false],
        ['lo', 1, false],
        ['', 2, true],
      ]);
      expect(new Set(chunks.map(c => c.responseId)).size).toBe(1);
      expect(chunks.every(c => c.modelId === 'm1')).toBe(true);
      expect(metrics.getMetrics('m1').requestsByKind).toEqual({ streaming: 1 });
      expect(metrics.getMetrics('m1').successfulRequests).toBe(1);
    });

    it('rejects a handle that cannot stream', async () => {
      const { router } = setup({ models: [makeModel('m1')], handles: { m1: fakeHandle('m1') } });
      await expect(collect(router.routeStream(hello))).rejects.toThrow('Model m1 does not support streaming');
    });

    it('fails over before the first delta', async () => {
      const a = fakeHandle('a');
      a.invokeStream = async function* () {
        yield* [];
        throw new BackendError('test', 500, 'stream broke');
      };
      const b = fakeHandle('b', undefined, ['ok']);
      const { router, metrics } = setup({ models: [makeModel('a'), makeModel('b')], handles: { a, b } });

      const chunks = await collect(router.routeStream(hello));

      expect(chunks.map(c => c.modelId)).toEqual(['b', 'b']);
      expect(metrics.getMetrics('a').failedRequests).toBe(1);
    });

    it('does not fail over after a delta was yielded', async () => {
      const a = fakeHandle('a');
      a.invokeStream = async function* () {
        yield 'partial';
        throw new BackendError('test', 500, 'stream broke');
      };
      const b = fakeHandle('b', undefined, ['ok']);
      const { router } = setup({ models: [makeModel('a'), makeModel('b')], handles: { a, b } });

      const seen: string[] = [];
      const consume = async (): Promise<void> => {
        for await (const chunk of router.routeStream(hello)) seen.push(chunk.delta);
      };

      await expect(consume()).rejects.toThrow('test API error (500): stream broke');
      expect(seen).toEqual(['partial']);
    });

    it('releases the tracking id when the consumer stops early', async () => {
      const m1 = fakeHandle('m1', undefined, ['a', 'b', 'c']);
      const { router, metrics } = setup({ models: [makeModel('m1')], handles: { m1 } });

      for await (const chunk of router.routeStream(hello)) {
        if (chunk.sequence === 0) break;
      }

      expect(metrics.activeRequests).toBe(0);
      expect(metrics.getMetrics('m1').inFlight).toBe(0);
      expect(metrics.getMetrics('m1').successfulRequests).toBe(0);
    });
  });
});
