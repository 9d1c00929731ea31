/**
 * Bounded least-recently-used cache.
 *
 * Wraps a Map, relying on its insertion order: a hit re-inserts the entry at
 * the back, and eviction removes from the front. Values are expected to be
 * immutable once stored; the cache never mutates them. `undefined` is not a
 * cacheable value.
 *
 * @packageDocumentation
 */

/**
 * Hit/miss counters for a cache.
 */
export interface CacheStats {
  /** Number of lookups that found an entry. */
  readonly hits: number;
  /** Number of lookups that did not. */
  readonly misses: number;
  /** Number of entries evicted to respect the bound. */
  readonly evictions: number;
  /** Current number of entries. */
  readonly size: number;
}

/**
 * Size-bounded cache with least-recently-used eviction.
 *
 * @example
 * ```ts
 * const cache = new LruCache<string, number>(2);
 * cache.set('a', 1).set('b', 2);
 * cache.get('a');    // 1, now most recently used
 * cache.set('c', 3); // evicts 'b'
 * ```
 *
 * @template K - The type of keys in the cache.
 * @template V - The type of values in the cache.
 */
export class LruCache<K, V> {
  private readonly map = new Map<K, V>();
  private readonly maxSize: number;
  private hits = 0;
  private misses = 0;
  private evictions = 0;

  /**
   * Creates an empty cache.
   *
   * @param maxSize - Maximum number of entries; must be a positive integer.
   */
  constructor(maxSize: number) {
    if (!Number.isInteger(maxSize) || maxSize <= 0) {
      throw new RangeError(`LruCache size must be a positive integer, got ${String(maxSize)}`);
    }
    this.maxSize = maxSize;
  }

  /**
   * Returns the cached value and marks it most recently used.
   *
   * @param key - The key to look up.
   * @returns The cached value, or undefined on a miss.
   */
  get(key: K): V | undefined {
    const value = this.map.get(key);
    if (value === undefined) {
      this.misses += 1;
      return undefined;
    }
    this.map.delete(key);
    this.map.set(key, value);
    this.hits += 1;
    return value;
  }

  /**
   * Stores a value, evicting the least recently used entry when full.
   *
   * @param key - The key to set.
   * @param value - The value to store.
   * @returns This cache, for chaining.
   */
  set(key: K, value: V): this {
    if (this.map.has(key)) {
      this.map.delete(key);
    } else if (this.map.size >= this.maxSize) {
      const oldest = this.map.keys().next();
      if (oldest.done !== true) {
        this.map.delete(oldest.value);
        this.evictions += 1;
      }
    }
    this.map.set(key, value);
    return this;
  }

  /**
   * Returns the cached value for a key, computing and storing it on a miss.
   *
   * If `compute` throws, nothing is stored.
   *
   * @param key - The key to look up.
   * @param compute - Produces the value on a miss.
   * @returns The cached or newly computed value.
   */
  getOrCompute(key: K, compute: (key: K) => V): V {
    const cached = this.get(key);
    if (cached !== undefined) {
      return cached;
    }
    const value = compute(key);
    this.set(key, value);
    return value;
  }

  /** The maximum number of entries. */
  get capacity(): number {
    return this.maxSize;
  }

  /**
   * Returns a snapshot of the counters.
   */
  stats(): CacheStats {
    return {
      hits: this.hits,
      misses: this.misses,
      evictions: this.evictions,
      size: this.map.size,
    };
  }
}
