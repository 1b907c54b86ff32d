interface CacheEntry<V> {
  value: V;
  storedAt: number;
}

export interface BoundedCacheOptions {
  /** Maximum number of entries kept; the oldest insertion is dropped first */
  maxSize: number;
  /** Entries older than this are treated as missing. Omit for no expiry. */
  ttlMs?: number;
  now?: () => number;
}

/**
 * Small insertion-ordered cache. Map iteration order is insertion order, so
 * the first key is always the oldest entry.
 */
export class BoundedCache<K, V> {
  private readonly entries = new Map<K, CacheEntry<V>>();
  private readonly maxSize: number;
  private readonly ttlMs?: number;
  private readonly now: () => number;

  constructor(options: BoundedCacheOptions) {
    if (options.maxSize < 1) {
      throw new RangeError(`BoundedCache maxSize must be at least 1, got ${options.maxSize}`);
    }
    this.maxSize = options.maxSize;
    this.ttlMs = options.ttlMs;
    this.now = options.now ?? Date.now;
  }

  get size(): number {
    return this.entries.size;
  }

  get(key: K): V | undefined {
    const entry = this.entries.get(key);
    if (!entry) return undefined;
    if (this.ttlMs !== undefined && this.now() - entry.storedAt >= this.ttlMs) {
      this.entries.delete(key);
      return undefined;
    }
    return entry.value;
  }

  has(key: K): boolean {
    return this.get(key) !== undefined;
  }

  set(key: K, value: V): void {
    // Re-inserting moves the key to the back of the eviction order
    this.entries.delete(key);
    while (this.entries.size >= this.maxSize) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
    }
    this.entries.set(key, { value, storedAt: this.now() });
  }

  delete(key: K): boolean {
    return this.entries.delete(key);
  }

  clear(): void {
    this.entries.clear();
  }
}
