/**
 * Byte encoding used for the shared cache tier. Implementations must
 * round-trip: `deserialize(serialize(x))` deep-equals `x` for any value the
 * cache accepts.
 */
export interface CacheSerializer {
  serialize(value: unknown): Buffer;
  /** Throws when the payload is not something `serialize` produced. */
  deserialize(data: Uint8Array): unknown;
}

/**
 * Compact UTF-8 JSON. Object properties holding `null` or `undefined` are
 * dropped; array slots are kept.
 */
export class JsonCacheSerializer implements CacheSerializer {
  serialize(value: unknown): Buffer {
    const json = JSON.stringify(value, (_key, v: unknown) => (v === null ? undefined : v));
    if (json === undefined) {
      throw new TypeError('Value has no JSON representation');
    }
    return Buffer.from(json, 'utf-8');
  }

  deserialize(data: Uint8Array): unknown {
    if (data.byteLength === 0) {
      throw new SyntaxError('Empty cache payload');
    }
    return JSON.parse(Buffer.from(data).toString('utf-8'));
  }
}
