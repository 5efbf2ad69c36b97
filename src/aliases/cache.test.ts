import { describe, it, expect } from "vitest";
import { createResolutionCache, resolutionCacheKey } from "./cache.js";

const createClock = (start = 0) => {
  let current = start;
  return {
    now: () => current,
    advance: (ms: number) => {
      current += ms;
    },
  };
};

describe("createResolutionCache", () => {
  it("returns stored values", () => {
    const cache = createResolutionCache<string>();
    cache.put("k", "v");

    expect(cache.get("k")).toBe("v");
  });

  it("expires entries after the TTL", () => {
    const clock = createClock();
    const cache = createResolutionCache<string>({ ttlMs: 1000, now: clock.now });
    cache.put("k", "v");

    clock.advance(1000);
    expect(cache.get("k")).toBe("v");

    clock.advance(1);
    expect(cache.get("k")).toBeUndefined();
    expect(cache.getStats().size).toBe(0);
  });

  it("evicts the oldest entry when full", () => {
    const cache = createResolutionCache<string>({ maxSize: 2 });
    cache.put("a", "1");
    cache.put("b", "2");
    cache.put("c", "3");

    expect(cache.get("a")).toBeUndefined();
    expect(cache.get("b")).toBe("2");
    expect(cache.get("c")).toBe("3");
  });

  it("treats a re-put key as newest", () => {
    const cache = createResolutionCache<string>({ maxSize: 2 });
    cache.put("a", "1");
    cache.put("b", "2");
    cache.put("a", "1b");
    cache.put("c", "3");

    expect(cache.get("a")).toBe("1b");
    expect(cache.get("b")).toBeUndefined();
  });

  // ─────────────────────────────────────────────────────────────────
  // Generations
  // ─────────────────────────────────────────────────────────────────

  describe("generations", () => {
    it("invalidateAll bumps the generation and drops entries", () => {
      const cache = createResolutionCache<string>();
      cache.put("k", "v");

      cache.invalidateAll();

      expect(cache.getGeneration()).toBe(1);
      expect(cache.get("k")).toBeUndefined();
      expect(cache.getStats().size).toBe(0);
    });

    it("drops a value computed under an older generation", () => {
      const cache = createResolutionCache<string>();
      const startedAt = cache.getGeneration();

      cache.invalidateAll();
      const stored = cache.put("k", "stale", startedAt);

      expect(stored).toBe(false);
      expect(cache.get("k")).toBeUndefined();
    });

    it("clear resets entries, counters and generation", () => {
      const cache = createResolutionCache<string>();
      cache.put("k", "v");
      cache.get("k");
      cache.get("missing");
      cache.invalidateAll();

      cache.clear();

      expect(cache.getStats()).toEqual({
        size: 0,
        maxSize: 1000,
        hits: 0,
        misses: 0,
        hitRate: "0.00%",
        generation: 0,
      });
    });
  });

  describe("getStats", () => {
    it("reports hits, misses and hit rate", () => {
      const cache = createResolutionCache<string>({ maxSize: 10 });
      cache.put("k", "v");
      cache.get("k");
      cache.get("k");
      cache.get("other");

      expect(cache.getStats()).toEqual({
        size: 1,
        maxSize: 10,
        hits: 2,
        misses: 1,
        hitRate: "66.67%",
        generation: 0,
      });
    });
  });

  describe("resolutionCacheKey", () => {
    it("separates explicit providers", () => {
      expect(resolutionCacheKey("fast")).toBe("|fast");
      expect(resolutionCacheKey("fast", "Poe")).toBe("poe|fast");
    });
  });
});
