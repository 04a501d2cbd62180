import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { LRUCache } from "../performance/cache";

describe("LRUCache", () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("evicts the least recently used entry", () => {
    const cache = new LRUCache<string, number>({ maxEntries: 2 });
    cache.set("a", 1);
    cache.set("b", 2);
    cache.get("a");
    cache.set("c", 3);

    expect(cache.get("b")).toBeUndefined();
    expect(cache.get("a")).toBe(1);
    expect(cache.get("c")).toBe(3);
    expect(cache.getStats().evictions).toBe(1);
  });

  it("expires entries after the ttl", () => {
    const cache = new LRUCache<string, number>({ ttlMs: 1000 });
    cache.set("a", 1);

    vi.advanceTimersByTime(999);
    expect(cache.get("a")).toBe(1);

    vi.advanceTimersByTime(1);
    expect(cache.get("a")).toBeUndefined();
    expect(cache.size).toBe(0);
  });

  it("tracks the hit rate", () => {
    const cache = new LRUCache<string, number>();
    cache.set("a", 1);
    cache.get("a");
    cache.get("missing");

    expect(cache.getStats()).toEqual({
      hits: 1,
      misses: 1,
      evictions: 0,
      currentEntries: 1,
      hitRate: 0.5,
    });
  });
});
