/**
 * Cache Manager
 *
 * TTL cache with an optional entry bound. Expiry is checked lazily on lookup;
 * when the bound is reached the entry that expires soonest is evicted.
 */

import { systemClock } from '../time';
import type { Clock } from '../time';

/**
 * Cache entry with value and expiry
 */
export interface CacheEntry<V> {
  readonly value: V;
  readonly expiresAt: number;
}

/**
 * Cache statistics
 */
export interface CacheStats {
  hits: number;
  misses: number;
  size: number;
  capacity?: number;
  hitRate: number;
}

/**
 * CacheManager - TTL cache with expiry-ordered eviction
 *
 * @template K - Key type
 * @template V - Value type
 *
 * @example
 * ```typescript
 * const cache = new CacheManager<string, User>({ capacity: 1000 });
 *
 * cache.set('user-123', user, 60000); // 60 seconds
 * const hit = cache.get('user-123');
 * ```
 */
export class CacheManager<K, V> {
  private cache: Map<K, CacheEntry<V>> = new Map();
  private hits = 0;
  private misses = 0;
  private readonly capacity?: number;
  private readonly clock: Clock;

  constructor(
    options: { capacity?: number; clock?: Clock } = {},
    private readonly onEvict?: (key: K) => void,
  ) {
    this.capacity = options.capacity;
    this.clock = options.clock ?? systemClock;
  }

  /**
   * Get a live value from the cache
   */
  get(key: K): V | undefined {
    return this.getEntry(key)?.value;
  }

  /**
   * Get the live entry for a key. Unlike `get`, distinguishes a cached
   * `undefined` from a miss.
   */
  getEntry(key: K): CacheEntry<V> | undefined {
    const entry = this.cache.get(key);

    if (!entry) {
      this.misses++;
      return undefined;
    }

    if (this.isExpired(entry)) {
      this.cache.delete(key);
      this.misses++;
      return undefined;
    }

    this.hits++;
    return entry;
  }

  /**
   * Set a value in the cache, replacing any previous entry for the key
   *
   * @param key - Cache key
   * @param value - Value to cache
   * @param ttl - Time to live in milliseconds
   */
  set(key: K, value: V, ttl: number): void {
    this.cache.delete(key);

    const capacity = this.capacity;
    if (capacity !== undefined && this.cache.size >= capacity) {
      this.prune();
      while (this.cache.size > 0 && this.cache.size >= capacity) {
        this.evictSoonestExpiring();
      }
    }

    this.cache.set(key, { value, expiresAt: this.clock.now() + ttl });
  }

  /**
   * Check if key exists in cache (and is not expired)
   */
  has(key: K): boolean {
    const entry = this.cache.get(key);
    if (!entry) return false;

    if (this.isExpired(entry)) {
      this.cache.delete(key);
      return false;
    }

    return true;
  }

  /**
   * Delete a key from cache
   */
  delete(key: K): boolean {
    return this.cache.delete(key);
  }

  /**
   * Clear all entries
   */
  clear(): void {
    this.cache.clear();
    this.hits = 0;
    this.misses = 0;
  }

  /**
   * Get cache statistics
   */
  stats(): CacheStats {
    const total = this.hits + this.misses;
    return {
      hits: this.hits,
      misses: this.misses,
      size: this.cache.size,
      capacity: this.capacity,
      hitRate: total > 0 ? this.hits / total : 0,
    };
  }

  /**
   * Get all keys
   */
  keys(): K[] {
    return Array.from(this.cache.keys());
  }

  /**
   * Get cache size
   */
  get size(): number {
    return this.cache.size;
  }

  /**
   * Prune expired entries
   */
  prune(): number {
    let pruned = 0;

    for (const [key, entry] of this.cache.entries()) {
      if (this.isExpired(entry)) {
        this.cache.delete(key);
        pruned++;
      }
    }

    return pruned;
  }

  private isExpired(entry: CacheEntry<V>): boolean {
    return this.clock.now() >= entry.expiresAt;
  }

  private evictSoonestExpiring(): void {
    let victim: K | undefined;
    let soonest = Infinity;

    // Ties go to the earliest inserted entry
    for (const [key, entry] of this.cache.entries()) {
      if (victim === undefined || entry.expiresAt < soonest) {
        soonest = entry.expiresAt;
        victim = key;
      }
    }

    if (victim === undefined) return;
    this.cache.delete(victim);
    this.onEvict?.(victim);
  }
}
