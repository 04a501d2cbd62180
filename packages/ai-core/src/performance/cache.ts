/**
 * LRU Cache with TTL
 *
 * Bounded memo for deterministic scoring results. Map insertion order is the
 * recency order: reads move an entry to the end, eviction takes the front.
 */

interface CacheEntry<V> {
  value: V;
  expiresAt: number;
}

export interface LRUCacheConfig {
  /** Maximum number of entries */
  maxEntries: number;
  /** Time-to-live in milliseconds (0 = no expiry) */
  ttlMs: number;
}

export interface CacheStats {
  hits: number;
  misses: number;
  evictions: number;
  currentEntries: number;
  hitRate: number;
}

const DEFAULT_CONFIG: LRUCacheConfig = {
  maxEntries: 1000,
  ttlMs: 300000, // 5 minutes
};

export class LRUCache<K, V> {
  private readonly cache = new Map<K, CacheEntry<V>>();
  private readonly config: LRUCacheConfig;

  private hits = 0;
  private misses = 0;
  private evictions = 0;

  constructor(config: Partial<LRUCacheConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  get(key: K): V | undefined {
    const entry = this.cache.get(key);
    if (!entry) {
      this.misses++;
      return undefined;
    }

    if (this.config.ttlMs > 0 && Date.now() >= entry.expiresAt) {
      this.cache.delete(key);
      this.misses++;
      return undefined;
    }

    this.cache.delete(key);
    this.cache.set(key, entry);
    this.hits++;
    return entry.value;
  }

  set(key: K, value: V): void {
    this.cache.delete(key);

    while (this.cache.size >= this.config.maxEntries) {
      const oldest = this.cache.keys().next();
      if (oldest.done) {
        break;
      }
      this.cache.delete(oldest.value);
      this.evictions++;
    }

    this.cache.set(key, { value, expiresAt: Date.now() + this.config.ttlMs });
  }

  delete(key: K): boolean {
    return this.cache.delete(key);
  }

  clear(): void {
    this.cache.clear();
  }

  get size(): number {
    return this.cache.size;
  }

  getStats(): CacheStats {
    const total = this.hits + this.misses;
    return {
      hits: this.hits,
      misses: this.misses,
      evictions: this.evictions,
      currentEntries: this.cache.size,
      hitRate: total > 0 ? this.hits / total : 0,
    };
  }
}
