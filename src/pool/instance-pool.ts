import type { BackendHandle, HandleFactory } from '../backends/types.js';
import type { ModelRegistry } from '../router/model-registry.js';
import { abortable } from '../utils/abort.js';
import { describeError } from '../errors.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('instance-pool');

interface PoolEntry {
  handle: Promise<BackendHandle>;
  lastUsedAt: number;
}

export interface InstancePoolOptions {
  idleTimeoutMs?: number;
  sweepIntervalMs?: number;
}

/**
 * One backend handle per model id, built on first use and reused after.
 *
 * The map stores the construction promise itself, inserted before the first
 * await. Concurrent first calls for the same model therefore join one
 * construction, while constructions for different models run independently.
 * A failed construction is evicted so that the next call tries again.
 */
export class InstancePool {
  private readonly entries = new Map<string, PoolEntry>();
  private readonly idleTimeoutMs: number;
  private readonly sweepIntervalMs: number;
  private sweepTimer: ReturnType<typeof setInterval> | null = null;

  constructor(
    private readonly registry: ModelRegistry,
    private readonly factory: HandleFactory,
    options: InstancePoolOptions = {},
  ) {
    this.idleTimeoutMs = options.idleTimeoutMs ?? 30 * 60 * 1000;
    this.sweepIntervalMs = options.sweepIntervalMs ?? 5 * 60 * 1000;
  }

  /**
   * The signal only releases this caller. A construction other callers may
   * be waiting on keeps running.
   */
  async acquire(modelId: string, signal?: AbortSignal): Promise<BackendHandle> {
    signal?.throwIfAborted();

    const existing = this.entries.get(modelId);
    if (existing) {
      existing.lastUsedAt = Date.now();
      return abortable(existing.handle, signal);
    }

    const model = this.registry.getById(modelId);
    const handle = Promise.resolve().then(() => this.factory(model));
    const entry: PoolEntry = { handle, lastUsedAt: Date.now() };
    this.entries.set(modelId, entry);

    handle.then(
      () => log.info(`Created backend handle: ${modelId}`),
      (err: unknown) => {
        if (this.entries.get(modelId) === entry) {
          this.entries.delete(modelId);
        }
        log.error(`Failed to create backend handle for ${modelId}: ${describeError(err)}`);
      },
    );

    return abortable(handle, signal);
  }

  has(modelId: string): boolean {
    return this.entries.has(modelId);
  }

  get size(): number {
    return this.entries.size;
  }

  /**
   * Evict and release one handle. Returns false when nothing was pooled.
   */
  async dispose(modelId: string): Promise<boolean> {
    const entry = this.entries.get(modelId);
    if (!entry) return false;
    this.entries.delete(modelId);

    try {
      const handle = await entry.handle;
      await handle.dispose?.();
      log.debug(`Disposed backend handle: ${modelId}`);
    } catch (err) {
      log.warn(`Error while disposing backend handle ${modelId}`, err);
    }
    return true;
  }

  async disposeAll(): Promise<void> {
    const ids = Array.from(this.entries.keys());
    await Promise.all(ids.map(id => this.dispose(id)));
  }

  /**
   * Dispose handles idle for longer than the idle timeout. Returns the
   * evicted model ids.
   */
  async sweepIdle(now = Date.now()): Promise<string[]> {
    const expired: string[] = [];
    for (const [modelId, entry] of this.entries) {
      if (now - entry.lastUsedAt > this.idleTimeoutMs) {
        expired.push(modelId);
      }
    }
    await Promise.all(expired.map(id => this.dispose(id)));
    if (expired.length > 0) {
      log.debug(`Idle sweep disposed ${expired.length} handle(s)`);
    }
    return expired;
  }

  startIdleSweep(): void {
    if (this.sweepTimer) return;
    this.sweepTimer = setInterval(() => {
      this.sweepIdle().catch((err: unknown) => log.error('Idle sweep failed', err));
    }, this.sweepIntervalMs);
    // Don't prevent process exit
    this.sweepTimer.unref();
  }

  stopIdleSweep(): void {
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = null;
    }
  }
}
