interface CacheEntry<T> {
  value: T;
  insertedAt: number;
  expiresAt: number;
}

/**
 * In-process LRU map with per-entry TTL. Reads refresh recency; inserts past
 * `maxEntries` evict the least recently used entry.
 */
export class MemoryCache<T = unknown> {
  private readonly cache: Map<string, CacheEntry<T>> = new Map();
  private evictions = 0;

  constructor(private readonly maxEntries: number) {
    if (maxEntries < 1) {
      throw new Error('MemoryCache maxEntries must be at least 1');
    }
  }

  get(key: string): T | undefined {
    const entry = this.cache.get(key);
    if (!entry) return undefined;

    if (Date.now() >= entry.expiresAt) {
      this.cache.delete(key);
      return undefined;
    }

    // Map keeps insertion order; re-inserting marks the entry most recent
    this.cache.delete(key);
    this.cache.set(key, entry);
    return entry.value;
  }

  set(key: string, value: T, ttlMs: number): void {
    const now = Date.now();
    this.cache.delete(key);
    this.cache.set(key, { value, insertedAt: now, expiresAt: now + ttlMs });

    while (this.cache.size > this.maxEntries) {
      const oldest = this.cache.keys().next();
      if (oldest.done) break;
      this.cache.delete(oldest.value);
      this.evictions++;
    }
  }

  delete(key: string): boolean {
    return this.cache.delete(key);
  }

  clear(): void {
    this.cache.clear();
  }

  size(): number {
    this.prune();
    return this.cache.size;
  }

  evicted(): number {
    return this.evictions;
  }

  private prune(): void {
    const now = Date.now();
    for (const [key, entry] of this.cache.entries()) {
      if (now >= entry.expiresAt) {
        this.cache.delete(key);
      }
    }
  }
}
