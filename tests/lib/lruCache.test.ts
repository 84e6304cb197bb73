/**
 * Guildforge -- tests/lib/lruCache.test.ts
 * WHAT: Unit tests for the LRU cache behind the stores.
 * WHY: Ensures bounded size, TTL expiry, LRU eviction and per-guild invalidation.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { describe, it, expect } from "vitest";
import { LRUCache } from "../../src/lib/lruCache.js";

function createCache<V>(maxSize = 3, ttlMs = 1000): { cache: LRUCache<string, V>; advance: (ms: number) => void } {
  let now = 0;
  const cache = new LRUCache<string, V>({ maxSize, ttlMs, now: () => now });
  return {
    cache,
    advance: (ms) => {
      now += ms;
    },
  };
}

describe("LRUCache", () => {
  describe("constructor", () => {
    it("throws if maxSize is zero", () => {
      expect(() => new LRUCache<string, string>({ maxSize: 0, ttlMs: 1000 })).toThrow(
        "LRUCache maxSize must be a positive number"
      );
    });

    it("throws if ttlMs is negative", () => {
      expect(() => new LRUCache<string, string>({ maxSize: 10, ttlMs: -1000 })).toThrow(
        "LRUCache ttlMs must be a positive number"
      );
    });
  });

  it("stores and returns values", () => {
    const { cache } = createCache<number>();
    cache.set("a", 1);
    expect(cache.get("a")).toBe(1);
    expect(cache.get("missing")).toBeUndefined();
  });

  it("distinguishes a cached null from a miss", () => {
    const { cache } = createCache<string | null>();
    cache.set("a", null);
    expect(cache.lookup("a")).toEqual({ value: null });
    expect(cache.lookup("b")).toBeUndefined();
  });

  it("expires entries after the TTL", () => {
    const { cache, advance } = createCache<number>();
    cache.set("a", 1);

    advance(1000);
    expect(cache.get("a")).toBe(1);

    advance(1);
    expect(cache.get("a")).toBeUndefined();
    expect(cache.size).toBe(0);
  });

  it("evicts the least recently used entry", () => {
    const { cache } = createCache<number>(2);
    cache.set("a", 1);
    cache.set("b", 2);
    cache.get("a");
    cache.set("c", 3);

    expect(cache.get("a")).toBe(1);
    expect(cache.get("b")).toBeUndefined();
    expect(cache.get("c")).toBe(3);
  });

  it("getOrLoad loads once and then serves the cached value", () => {
    const { cache } = createCache<string[]>();
    let loads = 0;
    const load = () => {
      loads++;
      return ["Bronze"];
    };

    expect(cache.getOrLoad("guild-1", load)).toEqual(["Bronze"]);
    expect(cache.getOrLoad("guild-1", load)).toEqual(["Bronze"]);
    expect(loads).toBe(1);
  });
});
