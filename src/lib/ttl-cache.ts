/**
 * In-memory cache with per-entry time-to-live.
 *
 * Entries expire on their own and are never invalidated early. When the
 * entry cap is reached, expired entries are swept and then the oldest
 * insertions are evicted. A compute function that rejects stores nothing.
 */

export interface Cache<V> {
  getOrCompute(key: string, ttlSeconds: number, compute: () => Promise<V>): Promise<V>;
}

interface CacheEntry<V> {
  value: V;
  expiresAt: number;
}

export interface TtlCacheOptions {
  maxEntries?: number;
  /** Clock in milliseconds (for testing) */
  now?: () => number;
}

const DEFAULT_MAX_ENTRIES = 128;

export class TtlCache<V> implements Cache<V> {
  private readonly entries = new Map<string, CacheEntry<V>>();
  private readonly maxEntries: number;
  private readonly now: () => number;

  constructor(options: TtlCacheOptions = {}) {
    this.maxEntries = options.maxEntries ?? DEFAULT_MAX_ENTRIES;
    this.now = options.now ?? Date.now;
  }

  get size(): number {
    return this.entries.size;
  }

  async getOrCompute(
    key: string,
    ttlSeconds: number,
    compute: () => Promise<V>
  ): Promise<V> {
    const entry = this.entries.get(key);
    if (entry && entry.expiresAt > this.now()) {
      return entry.value;
    }
    if (entry) {
      this.entries.delete(key);
    }

    const value = await compute();

    if (ttlSeconds > 0) {
      this.set(key, value, ttlSeconds);
    }
    return value;
  }

  clear(): void {
    this.entries.clear();
  }

  private set(key: string, value: V, ttlSeconds: number): void {
    this.entries.delete(key);
    if (this.entries.size >= this.maxEntries) {
      this.evict();
    }
    this.entries.set(key, {
      value,
      expiresAt: this.now() + ttlSeconds * 1000,
    });
  }

  private evict(): void {
    const now = this.now();
    for (const [key, entry] of this.entries) {
      if (entry.expiresAt <= now) {
        this.entries.delete(key);
      }
    }

    // Map iteration order is insertion order, oldest first
    for (const key of this.entries.keys()) {
      if (this.entries.size < this.maxEntries) {
        break;
      }
      this.entries.delete(key);
    }
  }
}

/**
 * Cache that never stores anything
 */
export class NoopCache<V> implements Cache<V> {
  async getOrCompute(
    _key: string,
    _ttlSeconds: number,
    compute: () => Promise<V>
  ): Promise<V> {
    return compute();
  }
}
