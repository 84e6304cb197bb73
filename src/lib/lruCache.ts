/**
 * Guildforge — src/lib/lruCache.ts
 * WHAT: Bounded read-through cache with LRU eviction and TTL expiry for the stores.
 * DOCS:
 *  - Map iteration order: https://developer.mozilla.org/en-US/docs/Web/JavaScript/Reference/Global_Objects/Map
 *
 * Map keeps insertion order, so delete-then-set moves an entry to the MRU end
 * and the first key is always the eviction candidate. Expiry is lazy.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

export interface LRUCacheOptions {
  maxSize: number;
  ttlMs: number;
  /** Clock override for tests */
  now?: () => number;
}

/**
 * @example
 * const cache = new LRUCache<string, TierDefinition[]>({ maxSize: 500, ttlMs: env.STORE_CACHE_TTL_MS });
 * const tiers = cache.getOrLoad(guildId, () => readTiers(guildId));
 */
export class LRUCache<K, V> {
  private readonly entries = new Map<K, { value: V; storedAt: number }>();
  private readonly maxSize: number;
  private readonly ttlMs: number;
  private readonly now: () => number;

  constructor(options: LRUCacheOptions) {
    if (options.maxSize <= 0) {
      throw new Error("LRUCache maxSize must be a positive number");
    }
    if (options.ttlMs <= 0) {
      throw new Error("LRUCache ttlMs must be a positive number");
    }
    this.maxSize = options.maxSize;
    this.ttlMs = options.ttlMs;
    this.now = options.now ?? Date.now;
  }

  /**
   * Returns the entry wrapper so a cached `null` or `undefined` value is still
   * distinguishable from a miss.
   */
  lookup(key: K): { value: V } | undefined {
    const entry = this.entries.get(key);
    if (!entry) return undefined;

    if (this.now() - entry.storedAt > this.ttlMs) {
      this.entries.delete(key);
      return undefined;
    }

    this.entries.delete(key);
    this.entries.set(key, entry);
    return { value: entry.value };
  }

  get(key: K): V | undefined {
    return this.lookup(key)?.value;
  }

  set(key: K, value: V): void {
    this.entries.delete(key);

    if (this.entries.size >= this.maxSize) {
      const oldestKey = this.entries.keys().next();
      if (!oldestKey.done) {
        this.entries.delete(oldestKey.value);
      }
    }

    this.entries.set(key, { value, storedAt: this.now() });
  }

  /** Read-through: load and remember on miss. */
  getOrLoad(key: K, load: () => V): V {
    const hit = this.lookup(key);
    if (hit) return hit.value;
    const value = load();
    this.set(key, value);
    return value;
  }

  delete(key: K): boolean {
    return this.entries.delete(key);
  }

  clear(): void {
    this.entries.clear();
  }

  /** May include expired entries that haven't been lazily cleaned. */
  get size(): number {
    return this.entries.size;
  }
}
