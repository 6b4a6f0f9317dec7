/**
 * In-memory cache keyed by registry path, with a fixed time-to-live.
 */

interface CacheEntry<T> {
  value: T;
  fetchedAt: number;
}

export interface CacheStats {
  hits: number;
  misses: number;
  size: number;
}

/**
 * Entries are served while their age is strictly below the TTL.
 * A TTL of 0 means nothing is ever served from cache.
 */
export class TtlCache<T> {
  private entries = new Map<string, CacheEntry<T>>();
  private hits = 0;
  private misses = 0;

  constructor(
    private readonly ttlMs: number,
    private readonly now: () => number = Date.now
  ) {}

  get(key: string): T | undefined {
    const entry = this.entries.get(key);
    if (entry && this.now() - entry.fetchedAt < this.ttlMs) {
      this.hits++;
      return entry.value;
    }
    this.misses++;
    return undefined;
  }

  set(key: string, value: T): void {
    this.entries.set(key, { value, fetchedAt: this.now() });
  }

  /**
   * Return the cached value, or load, store and return a fresh one.
   * A failed load leaves any previous entry untouched.
   */
  async getOrLoad(key: string, load: () => Promise<T>): Promise<T> {
    const cached = this.get(key);
    if (cached !== undefined) {
      return cached;
    }
    const value = await load();
    this.set(key, value);
    return value;
  }

  clear(): void {
    this.entries.clear();
  }

  stats(): CacheStats {
    return { hits: this.hits, misses: this.misses, size: this.entries.size };
  }
}
