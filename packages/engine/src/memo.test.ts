/**
 * Tests for MemoCache and memoize helpers
 */

import { describe, it, expect, beforeEach, vi } from "vitest";
import { MemoCache, memoize, memoizeAsync, defaultKeyOf } from "./memo.js";
import { InvalidInputError } from "./errors.js";
import { metrics } from "./observability/metrics.js";

describe("MemoCache", () => {
  let cache: MemoCache<string, number>;

  beforeEach(() => {
    metrics.reset();
    cache = new MemoCache({ capacity: 3, name: "test" });
  });

  describe("Basic operations", () => {
    it("should return undefined for cache miss", () => {
      expect(cache.get("missing")).toBeUndefined();
      expect(cache.stats().misses).toBe(1);
    });

    it("should return cached value on hit", () => {
      cache.set("a", 1);
      expect(cache.get("a")).toBe(1);
      expect(cache.stats()).toMatchObject({ size: 1, hits: 1, misses: 0, hitRate: 1 });
    });

    it("should distinguish a cached undefined from a miss", () => {
      const values = new MemoCache<string, number | undefined>();
      values.set("empty", undefined);

      expect(values.find("empty")).toEqual({ value: undefined });
      expect(values.find("other")).toBeUndefined();
    });

    it("should delete specific entry", () => {
      cache.set("a", 1);
      expect(cache.delete("a")).toBe(true);
      expect(cache.has("a")).toBe(false);
    });

    it("should clear entire cache", () => {
      cache.set("a", 1);
      cache.set("b", 2);
      cache.clear();
      expect(cache.size).toBe(0);
    });

    it("should be unbounded by default", () => {
      const unbounded = new MemoCache<number, number>();
      for (let i = 0; i < 1000; i++) {
        unbounded.set(i, i);
      }
      expect(unbounded.size).toBe(1000);
      expect(unbounded.stats()).toMatchObject({ capacity: null, evicted: 0 });
    });

    it("should reject a capacity below 1", () => {
      expect(() => new MemoCache({ capacity: 0 })).toThrow(InvalidInputError);
      expect(() => new MemoCache({ capacity: 1.5 })).toThrow("Invalid capacity: 1.5 must be a positive integer");
    });
  });

  describe("LRU eviction", () => {
    it("should evict the least recently inserted key after capacity + 1 insertions", () => {
      cache.set("a", 1);
      cache.set("b", 2);
      cache.set("c", 3);
      cache.set("d", 4);

      expect(cache.has("a")).toBe(false);
      expect(cache.keys()).toEqual(["b", "c", "d"]);
      expect(cache.stats().evicted).toBe(1);
    });

    it("should evict the least recently accessed key, not the oldest insert", () => {
      cache.set("a", 1);
      cache.set("b", 2);
      cache.set("c", 3);
      cache.get("a");
      cache.set("d", 4);

      expect(cache.has("a")).toBe(true);
      expect(cache.has("b")).toBe(false);
    });

    it("should not refresh recency on peek", () => {
      cache.set("a", 1);
      cache.set("b", 2);
      cache.set("c", 3);
      expect(cache.peek("a")).toBe(1);
      cache.set("d", 4);

      expect(cache.has("a")).toBe(false);
    });

    it("should recompute an evicted key", () => {
      const compute = vi.fn((key: string) => key.length);

      for (const key of ["a", "bb", "ccc", "dddd"]) {
        cache.getOrCompute(key, () => compute(key));
      }
      expect(compute).toHaveBeenCalledTimes(4);

      expect(cache.getOrCompute("a", () => compute("a"))).toBe(1);
      expect(compute).toHaveBeenCalledTimes(5);

      expect(cache.getOrCompute("dddd", () => compute("dddd"))).toBe(4);
      expect(compute).toHaveBeenCalledTimes(5);
    });

    it("should record evictions in metrics", () => {
      for (const key of ["a", "b", "c", "d", "e"]) {
        cache.set(key, 0);
      }
      expect(metrics.getMemoMetrics("test")?.evictions).toBe(2);
    });
  });
});

describe("defaultKeyOf", () => {
  it("should use a single scalar argument as the key", () => {
    expect(defaultKeyOf(42)).toBe(42);
    expect(defaultKeyOf("x")).toBe("x");
  });

  it("should serialize multiple or structured arguments canonically", () => {
    expect(defaultKeyOf(1, "a")).toBe('[1,"a"]');
    expect(defaultKeyOf({ b: 1, a: 2 })).toBe('[{"a":2,"b":1}]');
  });
});

describe("memoize", () => {
  it("should call the function once per distinct input", () => {
    const square = vi.fn((x: number) => x * x);
    const memoized = memoize(square);

    expect(memoized(4)).toBe(16);
    expect(memoized(4)).toBe(16);
    expect(memoized(5)).toBe(25);
    expect(square).toHaveBeenCalledTimes(2);
  });

  it("should key tuples of arguments", () => {
    const add = vi.fn((a: number, b: number) => a + b);
    const memoized = memoize(add);

    memoized(1, 2);
    memoized(1, 2);
    memoized(2, 1);
    expect(add).toHaveBeenCalledTimes(2);
    expect(memoized.cache.size).toBe(2);
  });

  it("should accept a custom key function", () => {
    const lengthOf = vi.fn((s: string) => s.length);
    const memoized = memoize(lengthOf, { keyOf: (s) => s.toLowerCase() });

    memoized("Abc");
    memoized("aBC");
    expect(lengthOf).toHaveBeenCalledTimes(1);
  });

  it("should respect capacity", () => {
    const identity = vi.fn((x: number) => x);
    const memoized = memoize(identity, { capacity: 2 });

    memoized(1);
    memoized(2);
    memoized(3);
    memoized(1);

    expect(identity).toHaveBeenCalledTimes(4);
    expect(memoized.cache.stats().evicted).toBe(2);
  });

  it("should not cache a throwing call", () => {
    let attempts = 0;
    const flaky = memoize((x: number) => {
      attempts++;
      if (attempts === 1) throw new Error("first attempt fails");
      return x;
    });

    expect(() => flaky(1)).toThrow("first attempt fails");
    expect(flaky(1)).toBe(1);
    expect(flaky.cache.size).toBe(1);
  });
});

describe("memoizeAsync", () => {
  it("should share one computation between concurrent callers", async () => {
    let release: () => void = () => {};
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    const load = vi.fn(async (id: string) => {
      await gate;
      return `value:${id}`;
    });
    const memoized = memoizeAsync(load);

    const first = memoized("a");
    const second = memoized("a");
    expect(memoized.inFlight()).toBe(1);

    release();
    expect(await first).toBe("value:a");
    expect(await second).toBe("value:a");
    expect(load).toHaveBeenCalledTimes(1);
    expect(memoized.inFlight()).toBe(0);
  });

  it("should serve later calls from the cache", async () => {
    const load = vi.fn(async (n: number) => n * 2);
    const memoized = memoizeAsync(load);

    await memoized(2);
    expect(await memoized(2)).toBe(4);
    expect(load).toHaveBeenCalledTimes(1);
    expect(memoized.cache.stats().hits).toBe(1);
  });

  it("should not cache a rejected computation", async () => {
    const load = vi
      .fn<(n: number) => Promise<number>>()
      .mockRejectedValueOnce(new Error("boom"))
      .mockResolvedValueOnce(7);
    const memoized = memoizeAsync(load);

    await expect(memoized(1)).rejects.toThrow("boom");
    expect(memoized.cache.has(1)).toBe(false);
    expect(await memoized(1)).toBe(7);
    expect(load).toHaveBeenCalledTimes(2);
  });
});
