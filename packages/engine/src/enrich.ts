/**
 * Record enrichment with results cached by record content
 */

import { valueKey } from "./format.js";
import { MemoCache, type MemoCacheOptions } from "./memo.js";
import type { CacheStats, DataRecord } from "./types.js";

/**
 * Applies a pure computation to records, caching by canonical record content
 *
 * Two records with the same fields and values share one cache entry
 * regardless of key order.
 */
export class CachedTransform<R extends DataRecord, T> {
  #compute: (record: R) => T;
  #cache: MemoCache<string, T>;

  constructor(compute: (record: R) => T, options: MemoCacheOptions = {}) {
    this.#compute = compute;
    this.#cache = new MemoCache({ name: "transform", ...options });
  }

  apply(record: R): T {
    return this.#cache.getOrCompute(valueKey(record), () => this.#compute(record));
  }

  applyAll(records: Iterable<R>): T[] {
    const out: T[] = [];
    for (const record of records) {
      out.push(this.apply(record));
    }
    return out;
  }

  stats(): CacheStats {
    return this.#cache.stats();
  }

  clear(): void {
    this.#cache.clear();
  }
}

/**
 * Record extended with its sum of squares
 */
export type ScoredRecord<R extends DataRecord> = R & { computed: number };

/**
 * Add `computed`: the sum of squares of the record's finite numeric fields
 *
 * @example
 * sumOfSquares({ a: 3, b: 4, name: "x" }) // { a: 3, b: 4, name: "x", computed: 25 }
 */
export function sumOfSquares<R extends DataRecord>(record: R): ScoredRecord<R> {
  let computed = 0;
  for (const value of Object.values(record)) {
    if (typeof value === "number" && Number.isFinite(value)) {
      computed += value * value;
    }
  }
  return { ...record, computed };
}
