import { randomUUID } from 'node:crypto';
import type { RouteRequest } from '../router/types.js';
import { canonicalJson, hashPrefix } from '../utils/hash.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('cache-key');

/**
 * Width of each hashed key segment. Truncating SHA-256 to 64 bits keeps keys
 * short; a collision would serve one request's response for another.
 */
export const HASH_SEGMENT_LENGTH = 16;

/**
 * Fingerprints a request into
 * `<prefix><modelId>:<sys>:<user>[:<history>][:<settings>]`.
 *
 * Every segment is a pure function of request content. The system segment is
 * always present (an absent prompt hashes as `''`), so the user segment keeps
 * its position. History hashes as a JSON array of `[role, content]` pairs and
 * settings as a JSON object, so neither can pass for the other or for a
 * differently split history. When a segment cannot
 * be computed (settings JSON cannot encode), the builder returns a unique
 * fallback key instead, which can never be hit again.
 */
export class CacheKeyBuilder {
  constructor(private readonly prefix = 'llm:') {}

  build(request: RouteRequest): string {
    try {
      const parts: string[] = [`${this.prefix}${request.modelId}`];

      parts.push(hashPrefix(request.systemPrompt ?? '', HASH_SEGMENT_LENGTH));
      parts.push(hashPrefix(request.userPrompt, HASH_SEGMENT_LENGTH));

      if (request.history && request.history.length > 0) {
        const pairs = request.history.map(m => [m.role, m.content]);
        parts.push(hashPrefix(canonicalJson(pairs), HASH_SEGMENT_LENGTH));
      }

      if (request.settings && Object.keys(request.settings).length > 0) {
        parts.push(hashPrefix(canonicalJson(request.settings), HASH_SEGMENT_LENGTH));
      }

      return parts.join(':');
    } catch (err) {
      log.warn(`Cache key generation failed for ${request.modelId}, using an uncacheable key`, err);
      return this.fallbackKey();
    }
  }

  isFallbackKey(key: string): boolean {
    return key.startsWith(`${this.prefix}fallback:`);
  }

  private fallbackKey(): string {
    return `${this.prefix}fallback:${randomUUID()}`;
  }
}
