/**
 * Memoization caches with optional LRU bounds
 */

import { InvalidInputError } from "./errors.js";
import { isScalar, valueKey } from "./format.js";
import type { CacheStats } from "./types.js";
import { metrics } from "./observability/metrics.js";
import { logger } from "./observability/logs.js";

/**
 * Configuration options for a memoization cache
 */
export interface MemoCacheOptions {
  /** Maximum number of entries; unbounded when omitted */
  capacity?: number;
  /** Name used for metrics and log events (default: "memo") */
  name?: string;
}

/**
 * Boxed cache value, so `undefined` results can be cached too
 */
export interface MemoEntry<V> {
  readonly value: V;
}

/**
 * Key → value cache for results of pure computations
 *
 * Uses native Map insertion order for O(1) LRU operations: a hit moves the
 * entry to the end, eviction removes from the front. Entries are never
 * updated in place; a value is written once per key and lives until evicted
 * or cleared.
 */
export class MemoCache<K, V> {
  #entries = new Map<K, MemoEntry<V>>();
  #capacity: number | undefined;
  #name: string;
  #hits = 0;
  #misses = 0;
  #evicted = 0;

  constructor(options: MemoCacheOptions = {}) {
    if (options.capacity !== undefined) {
      if (!Number.isInteger(options.capacity) || options.capacity < 1) {
        throw new InvalidInputError(
          "capacity",
          `${options.capacity} must be a positive integer`
        );
      }
    }
    this.#capacity = options.capacity;
    this.#name = options.name ?? "memo";
  }

  /**
   * Get a cached value and mark it most recently used
   *
   * @returns Cached value, or undefined on a miss
   */
  get(key: K): V | undefined {
    return this.find(key)?.value;
  }

  /**
   * Like `get`, but distinguishes a cached `undefined` from a miss
   */
  find(key: K): MemoEntry<V> | undefined {
    const entry = this.#entries.get(key);
    if (!entry) {
      this.#misses++;
      metrics.recordMemoMiss(this.#name);
      return undefined;
    }

    // LRU: Move to end (most recently used)
    this.#entries.delete(key);
    this.#entries.set(key, entry);

    this.#hits++;
    metrics.recordMemoHit(this.#name);
    return entry;
  }

  /**
   * Read a value without touching recency or statistics
   */
  peek(key: K): V | undefined {
    return this.#entries.get(key)?.value;
  }

  has(key: K): boolean {
    return this.#entries.has(key);
  }

  /**
   * Store a value as most recently used, evicting the oldest entries when over capacity
   */
  set(key: K, value: V): void {
    this.#entries.delete(key);
    this.#entries.set(key, { value });
    this.#evictIfNeeded();
  }

  /**
   * Return the cached value for `key`, computing and caching it on a miss
   */
  getOrCompute(key: K, compute: () => V): V {
    const entry = this.find(key);
    if (entry) {
      return entry.value;
    }

    const value = compute();
    this.set(key, value);
    return value;
  }

  delete(key: K): boolean {
    return this.#entries.delete(key);
  }

  /**
   * Remove every entry; statistics are kept
   */
  clear(): void {
    this.#entries.clear();
  }

  get size(): number {
    return this.#entries.size;
  }

  /**
   * Keys from least to most recently used
   */
  keys(): K[] {
    return [...this.#entries.keys()];
  }

  stats(): CacheStats {
    const total = this.#hits + this.#misses;
    return {
      size: this.#entries.size,
      capacity: this.#capacity ?? null,
      hits: this.#hits,
      misses: this.#misses,
      hitRate: total > 0 ? this.#hits / total : 0,
      evicted: this.#evicted,
    };
  }

  #evictIfNeeded(): void {
    if (this.#capacity === undefined) return;

    while (this.#entries.size > this.#capacity) {
      const oldest = this.#entries.keys().next();
      if (oldest.done) break;

      this.#entries.delete(oldest.value);
      this.#evicted++;
      metrics.recordMemoEviction(this.#name);
      logger.debug("memo.evict", {
        message: this.#name,
        details: { key: String(oldest.value), size: this.#entries.size },
      });
    }
  }
}

/**
 * Options for memoized functions
 */
export interface MemoizeOptions<A extends unknown[]> extends MemoCacheOptions {
  /** Derive the cache key from the arguments */
  keyOf?: (...args: A) => unknown;
}

/**
 * A memoized function together with the cache it owns
 */
export interface Memoized<A extends unknown[], V> {
  (...args: A): V;
  readonly cache: MemoCache<unknown, V>;
}

/**
 * A memoized async function; concurrent calls for one key share a single computation
 */
export interface MemoizedAsync<A extends unknown[], V> {
  (...args: A): Promise<V>;
  readonly cache: MemoCache<unknown, V>;
  /** Number of computations currently in flight */
  inFlight(): number;
}

/**
 * Default key: a single scalar argument is its own key, anything else is its structural value key
 */
export function defaultKeyOf(...args: unknown[]): unknown {
  if (args.length === 1 && isScalar(args[0])) {
    return args[0];
  }
  return valueKey(args);
}

/**
 * Cache the results of a pure function
 *
 * The cache is created once here and owned by the returned function, so it
 * outlives every individual call.
 */
export function memoize<A extends unknown[], V>(
  fn: (...args: A) => V,
  options: MemoizeOptions<A> = {}
): Memoized<A, V> {
  const cache = new MemoCache<unknown, V>(options);
  const keyOf = options.keyOf ?? defaultKeyOf;

  const memoized = (...args: A): V => cache.getOrCompute(keyOf(...args), () => fn(...args));
  return Object.assign(memoized, { cache });
}

/**
 * Cache the results of a pure async function
 *
 * At most one computation is in flight per key. A rejected computation is
 * not cached; the next call retries it.
 */
export function memoizeAsync<A extends unknown[], V>(
  fn: (...args: A) => Promise<V>,
  options: MemoizeOptions<A> = {}
): MemoizedAsync<A, V> {
  const cache = new MemoCache<unknown, V>(options);
  const keyOf = options.keyOf ?? defaultKeyOf;
  const inflight = new Map<unknown, Promise<V>>();

  const memoized = (...args: A): Promise<V> => {
    const key = keyOf(...args);

    const cached = cache.find(key);
    if (cached) {
      return Promise.resolve(cached.value);
    }

    const existing = inflight.get(key);
    if (existing) {
      return existing;
    }

    const pending = (async () => {
      try {
        const value = await fn(...args);
        cache.set(key, value);
        return value;
      } finally {
        inflight.delete(key);
      }
    })();

    inflight.set(key, pending);
    return pending;
  };

  return Object.assign(memoized, { cache, inFlight: () => inflight.size });
}
