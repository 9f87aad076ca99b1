/**
 * Size-bounded cache with least-recently-used eviction. Entries never go
 * stale on their own; they leave only by eviction or `clear()`.
 */
export class LruCache<V> {
  private readonly entries = new Map<string, V>();
  readonly capacity: number;

  constructor(capacity = 100) {
    if (!Number.isInteger(capacity) || capacity <= 0) {
      throw new RangeError(`cache capacity must be a positive integer, got ${capacity}`);
    }
    this.capacity = capacity;
  }

  get size() { return this.entries.size; }

  has(key: string) { return this.entries.has(key); }

  get(key: string): V | undefined {
    if (!this.entries.has(key)) return undefined;
    const value = this.entries.get(key);
    // Map keeps insertion order, so re-inserting marks the key most recent
    this.entries.delete(key);
    if (value !== undefined) this.entries.set(key, value);
    return value;
  }

  set(key: string, value: V) {
    this.entries.delete(key);
    this.entries.set(key, value);
    while (this.entries.size > this.capacity) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
    }
  }

  clear() { this.entries.clear(); }

  keys(): string[] { return [...this.entries.keys()]; }
}

/** JSON with object keys sorted at every depth, so equal values serialize equally. */
export function canonicalJson(value: unknown): string {
  return JSON.stringify(sortKeys(value)) ?? 'null';
}

function sortKeys(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(sortKeys);
  if (value && typeof value === 'object') {
    const out: Record<string, unknown> = {};
    for (const k of Object.keys(value).sort()) {
      out[k] = sortKeys(Reflect.get(value, k));
    }
    return out;
  }
  return value;
}
