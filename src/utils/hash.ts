import { createHash } from 'node:crypto';

/**
 * SHA-256 of the UTF-8 input, truncated to `length` lowercase hex chars.
 */
export function hashPrefix(input: string, length = 16): string {
  return createHash('sha256').update(input, 'utf-8').digest('hex').slice(0, length);
}

/**
 * JSON with object keys sorted at every depth, so that two settings objects
 * built in a different key order encode identically. Throws on values JSON
 * cannot represent (bigint, cycles).
 */
export function canonicalJson(value: unknown): string {
  return JSON.stringify(sortKeys(value, new Set()));
}

function sortKeys(value: unknown, seen: Set<object>): unknown {
  if (typeof value === 'bigint') {
    throw new TypeError('Cannot serialize a bigint');
  }
  if (value === null || typeof value !== 'object') return value;
  if (seen.has(value)) {
    throw new TypeError('Cannot serialize a circular structure');
  }
  seen.add(value);
  let result: unknown;
  if (Array.isArray(value)) {
    result = value.map(v => sortKeys(v, seen));
  } else if (value instanceof Date) {
    result = value.toISOString();
  } else {
    const entries: Array<[string, unknown]> = Object.entries(value);
    entries.sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    const sorted: Record<string, unknown> = {};
    for (const [key, entry] of entries) {
      if (entry === undefined || typeof entry === 'function') continue;
      sorted[key] = sortKeys(entry, seen);
    }
    result = sorted;
  }
  seen.delete(value);
  return result;
}
