/**
 * In-memory LRU set with lazy time-based expiry, used to suppress
 * duplicate downstream writes
 */

/**
 * Configuration options for a write cache
 */
export interface WriteCacheOptions {
  /** Maximum number of keys to retain (default: 100000) */
  maxSize?: number;
  /** Time-to-live of a marked key in milliseconds */
  ttlMs: number;
  /** Clock returning epoch milliseconds (default: Date.now) */
  now?: () => number;
}

/**
 * Cache statistics for monitoring and debugging
 */
export interface WriteCacheStats {
  /** Current number of retained keys, expired ones included until touched */
  size: number;
  /** Cache hit rate (hits / total lookups) */
  hitRate: number;
  /** Cache miss rate (misses / total lookups) */
  missRate: number;
  /** Keys dropped to stay within maxSize */
  evicted: number;
  /** Keys found past their expiry on lookup */
  expired: number;
}

/**
 * Bounded, time-expiring set of keys
 *
 * Uses native Map insertion order for O(1) LRU. Expiry is checked when a key
 * is looked up; nothing runs in the background. A lookup may report a key as
 * absent after it was marked (evicted or expired), so callers must treat a
 * miss as "possibly new", never as "certainly new".
 *
 * Every method is synchronous, so concurrent async callers on the event loop
 * see each call as atomic.
 */
export class WriteCache {
  private entries = new Map<string, number>();
  private readonly maxSize: number;
  private readonly ttlMs: number;
  private readonly now: () => number;
  private hits = 0;
  private misses = 0;
  private evicted = 0;
  private expired = 0;

  constructor(options: WriteCacheOptions) {
    this.maxSize = Math.max(1, options.maxSize ?? 100_000);
    this.ttlMs = options.ttlMs;
    this.now = options.now ?? Date.now;
  }

  /**
   * Check whether a key was marked within the TTL
   *
   * A hit refreshes the key's LRU position but not its expiry.
   */
  contains(key: string): boolean {
    const expiresAt = this.entries.get(key);

    if (expiresAt === undefined) {
      this.misses++;
      return false;
    }

    if (this.now() >= expiresAt) {
      this.entries.delete(key);
      this.expired++;
      this.misses++;
      return false;
    }

    // LRU: Move to end (most recently used)
    this.entries.delete(key);
    this.entries.set(key, expiresAt);

    this.hits++;
    return true;
  }

  /**
   * Mark a key as present for one TTL from now
   */
  mark(key: string): void {
    this.entries.delete(key);
    this.entries.set(key, this.now() + this.ttlMs);
    this.evictIfNeeded();
  }

  stats(): WriteCacheStats {
    const total = this.hits + this.misses;
    return {
      size: this.entries.size,
      hitRate: total > 0 ? this.hits / total : 0,
      missRate: total > 0 ? this.misses / total : 0,
      evicted: this.evicted,
      expired: this.expired,
    };
  }

  /**
   * Evict least recently used keys until within maxSize
   */
  private evictIfNeeded(): void {
    while (this.entries.size > this.maxSize) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;

      this.entries.delete(oldest.value);
      this.evicted++;
    }
  }
}
