import { LRUCache } from 'lru-cache';
import { z } from 'zod';
import type { SharedTier } from './shared-tier.js';
import type { CacheSerializer } from './serializer.js';
import { JsonCacheSerializer } from './serializer.js';
import { CacheFailure } from '../errors.js';
import { abortable } from '../utils/abort.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('response-cache');

export type CacheTier = 'local' | 'shared';

export interface CacheEntry {
  value: unknown;
  createdAt: number;
  expiresAt: number;
}

export type CacheLookup<T> =
  | { status: 'hit'; tier: CacheTier; value: T }
  | { status: 'miss' }
  | { status: 'failure'; error: CacheFailure };

export type CacheWriteOutcome =
  | { status: 'ok' }
  | { status: 'skipped' }
  | { status: 'failure'; error: CacheFailure };

export interface ResponseCacheOptions {
  localTtlMs: number;
  sharedTtlMs: number;
  maxLocalEntries: number;
  sharedTier?: SharedTier;
  /** Commands on the shared tier slower than this become `failure` outcomes. */
  sharedTimeoutMs?: number;
  serializer?: CacheSerializer;
}

const envelopeSchema = z.object({
  createdAt: z.number(),
  expiresAt: z.number(),
  value: z.unknown(),
});

const MISS = { status: 'miss' } as const;

/**
 * Two-tier response cache: a bounded in-process LRU in front of an optional
 * shared tier. Reads go local → shared and backfill the local tier; writes
 * go to both.
 *
 * Nothing here throws. Tier errors, timeouts and cancellation come back as
 * a `failure` outcome, so callers can tell "not cached" from "cache broken"
 * and still carry on. Corrupted or mistyped shared payloads are plain
 * misses.
 *
 * The local tier holds its own copies: values are cloned on the way in, and
 * schema parsing hands every reader a fresh object on the way out.
 */
export class ResponseCache {
  private readonly local: LRUCache<string, CacheEntry>;
  private readonly shared: SharedTier | undefined;
  private readonly serializer: CacheSerializer;
  private readonly localTtlMs: number;
  private readonly sharedTtlMs: number;
  private readonly sharedTimeoutMs: number | undefined;

  constructor(options: ResponseCacheOptions) {
    this.localTtlMs = options.localTtlMs;
    this.sharedTtlMs = options.sharedTtlMs;
    this.sharedTimeoutMs = options.sharedTimeoutMs;
    this.shared = options.sharedTier;
    this.serializer = options.serializer ?? new JsonCacheSerializer();
    this.local = new LRUCache<string, CacheEntry>({
      max: options.maxLocalEntries,
      ttl: options.localTtlMs,
    });
  }

  get hasSharedTier(): boolean {
    return this.shared !== undefined;
  }

  get localSize(): number {
    return this.local.size;
  }

  async get<T>(
    key: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    signal?: AbortSignal,
  ): Promise<CacheLookup<T>> {
    if (!key) return MISS;

    try {
      signal?.throwIfAborted();

      const localEntry = this.local.get(key);
      if (localEntry) {
        const parsed = schema.safeParse(localEntry.value);
        if (parsed.success) {
          log.debug(`Local cache hit: ${key}`);
          return { status: 'hit', tier: 'local', value: parsed.data };
        }
        // Same key written with a different value shape: drop it.
        this.local.delete(key);
      }

      if (!this.shared) {
        log.debug(`Cache miss: ${key}`);
        return MISS;
      }

      const data = await abortable(this.shared.get(key), this.sharedSignal(signal));
      if (!data) {
        log.debug(`Cache miss: ${key}`);
        return MISS;
      }

      const entry = this.decode(key, data);
      if (!entry) return MISS;

      const parsed = schema.safeParse(entry.value);
      if (!parsed.success) {
        log.warn(`Shared cache payload for ${key} does not match the expected shape, treating as miss`);
        return MISS;
      }

      const remainingMs = entry.expiresAt - Date.now();
      if (remainingMs <= 0) return MISS;

      const localTtl = Math.min(this.localTtlMs, remainingMs);
      this.local.set(
        key,
        { value: structuredClone(parsed.data), createdAt: entry.createdAt, expiresAt: Date.now() + localTtl },
        { ttl: localTtl },
      );

      log.debug(`Shared cache hit: ${key}`);
      return { status: 'hit', tier: 'shared', value: parsed.data };
    } catch (err) {
      const error = new CacheFailure('get', key, err);
      log.warn(error.message);
      return { status: 'failure', error };
    }
  }

  /**
   * Write to both tiers. `ttlMs` sets the shared lifetime and caps the
   * local one; the local tier never holds an entry longer than its own TTL.
   */
  async set<T>(key: string, value: T, ttlMs?: number, signal?: AbortSignal): Promise<CacheWriteOutcome> {
    if (!key || value === undefined || value === null) return { status: 'skipped' };

    try {
      signal?.throwIfAborted();

      const now = Date.now();
      const localTtl = Math.min(ttlMs ?? this.localTtlMs, this.localTtlMs);
      const sharedTtl = ttlMs ?? this.sharedTtlMs;

      this.local.set(key, { value: structuredClone(value), createdAt: now, expiresAt: now + localTtl }, { ttl: localTtl });

      if (this.shared) {
        const payload = this.serializer.serialize({
          createdAt: now,
          expiresAt: now + sharedTtl,
          value,
        });
        await abortable(this.shared.set(key, payload, sharedTtl), this.sharedSignal(signal));
      }

      log.debug(`Cached ${key} (local ${localTtl}ms, shared ${this.shared ? `${sharedTtl}ms` : 'off'})`);
      return { status: 'ok' };
    } catch (err) {
      const error = new CacheFailure('set', key, err);
      log.warn(error.message);
      return { status: 'failure', error };
    }
  }

  async remove(key: string, signal?: AbortSignal): Promise<CacheWriteOutcome> {
    if (!key) return { status: 'skipped' };

    try {
      this.local.delete(key);
      if (this.shared) {
        await abortable(this.shared.delete(key), this.sharedSignal(signal));
      }
      log.debug(`Removed ${key}`);
      return { status: 'ok' };
    } catch (err) {
      const error = new CacheFailure('remove', key, err);
      log.warn(error.message);
      return { status: 'failure', error };
    }
  }

  /**
   * Empties the local tier only. The shared tier offers no key enumeration,
   * so its entries age out on their own TTL.
   */
  clear(): void {
    this.local.clear();
    log.debug('Local cache tier cleared');
  }

  private sharedSignal(signal?: AbortSignal): AbortSignal | undefined {
    if (this.sharedTimeoutMs === undefined) return signal;
    const timeout = AbortSignal.timeout(this.sharedTimeoutMs);
    return signal ? AbortSignal.any([signal, timeout]) : timeout;
  }

  private decode(key: string, data: Uint8Array): CacheEntry | undefined {
    let raw: unknown;
    try {
      raw = this.serializer.deserialize(data);
    } catch (err) {
      log.warn(`Undecodable shared cache payload for ${key}, treating as miss`, err);
      return undefined;
    }
    const envelope = envelopeSchema.safeParse(raw);
    if (!envelope.success) {
      log.warn(`Malformed shared cache envelope for ${key}, treating as miss`);
      return undefined;
    }
    return {
      value: envelope.data.value,
      createdAt: envelope.data.createdAt,
      expiresAt: envelope.data.expiresAt,
    };
  }
}
