import { createClient, commandOptions } from 'redis';
import { createLogger } from '../utils/logger.js';

const log = createLogger('shared-tier');

/**
 * Network-addressable cache tier shared by every router process. Holds
 * opaque serializer bytes; expiry is enforced by the store.
 */
export interface SharedTier {
  get(key: string): Promise<Uint8Array | null>;
  set(key: string, data: Uint8Array, ttlMs: number): Promise<void>;
  delete(key: string): Promise<void>;
  close?(): Promise<void>;
}

type RedisClient = ReturnType<typeof createClient>;

export interface RedisSharedTierOptions {
  connectTimeoutMs?: number;
}

/**
 * Redis-backed shared tier (production use). Commands issued while the
 * connection is down reject at once instead of queueing for a reconnect.
 */
export class RedisSharedTier implements SharedTier {
  private readonly client: RedisClient;

  constructor(redisUrl: string, options: RedisSharedTierOptions = {}) {
    this.client = createClient({
      url: redisUrl,
      disableOfflineQueue: true,
      socket: { connectTimeout: options.connectTimeoutMs ?? 2_000 },
    });
    this.client.on('error', (err: unknown) => {
      log.error('Redis client error', err);
    });
  }

  async connect(): Promise<void> {
    if (this.client.isOpen) return;
    await this.client.connect();
    log.info('Connected to Redis shared tier');
  }

  async get(key: string): Promise<Uint8Array | null> {
    return this.client.get(commandOptions({ returnBuffers: true }), key);
  }

  async set(key: string, data: Uint8Array, ttlMs: number): Promise<void> {
    await this.client.set(key, Buffer.from(data), { PX: Math.max(1, Math.round(ttlMs)) });
  }

  async delete(key: string): Promise<void> {
    await this.client.del(key);
  }

  async close(): Promise<void> {
    if (this.client.isOpen) {
      await this.client.quit();
    }
  }
}
