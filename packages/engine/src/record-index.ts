/**
 * Lazily built equality indexes over in-memory records
 *
 * Invariants:
 * - An index for a field is built at most once, from the records supplied to
 *   the first query for that field, and is published only when complete
 * - Once built, the index is reused for every later query on the field; the
 *   records argument of later calls is ignored (a changed collection leaves
 *   the index stale until `clear(field)`)
 * - Buckets keep the original relative order of records
 * - Records without the field are not indexed for it
 * - Concurrent async builds are serialized per field, never across fields
 */

import { performance } from "node:perf_hooks";
import { KeyedMutex } from "./mutex.js";
import { isScalar, valueKey } from "./format.js";
import { hasField } from "./types.js";
import type { DataRecord, FieldIndexStats, FieldName, RecordLoader } from "./types.js";
import { metrics } from "./observability/metrics.js";
import { logger } from "./observability/logs.js";

/**
 * Buckets for one field: value → records carrying that value
 *
 * Scalars match by SameValueZero. Objects and arrays match by structural value
 * key; values without one (cycles, nested symbols or functions) fall back to identity.
 */
class FieldIndex<R extends DataRecord> {
  #scalars = new Map<unknown, R[]>();
  #composites = new Map<string, R[]>();
  records = 0;

  add(value: unknown, record: R): void {
    const key = compositeKey(value);
    const bucket =
      key === undefined ? bucketOf(this.#scalars, value) : bucketOf(this.#composites, key);
    bucket.push(record);
    this.records++;
  }

  get(value: unknown): readonly R[] {
    const key = compositeKey(value);
    const bucket = key === undefined ? this.#scalars.get(value) : this.#composites.get(key);
    return bucket ?? [];
  }

  get keys(): number {
    return this.#scalars.size + this.#composites.size;
  }
}

function bucketOf<K, R>(map: Map<K, R[]>, key: K): R[] {
  let bucket = map.get(key);
  if (!bucket) {
    bucket = [];
    map.set(key, bucket);
  }
  return bucket;
}

/**
 * Canonical key for structured values, undefined for scalars and unserializable values
 */
function compositeKey(value: unknown): string | undefined {
  if (isScalar(value)) {
    return undefined;
  }
  try {
    return valueKey(value);
  } catch {
    // Indexed by identity instead
    return undefined;
  }
}

interface BuiltIndex<R extends DataRecord> {
  index: FieldIndex<R>;
  stats: FieldIndexStats;
}

/**
 * Options for a record index
 */
export interface RecordIndexOptions<R extends DataRecord> {
  /** Records used by `lookup` when a field has not been indexed yet */
  records?: readonly R[];
}

/**
 * Secondary indexes keyed by field name, built on first use
 */
export class RecordIndex<R extends DataRecord = DataRecord> {
  #built = new Map<FieldName, BuiltIndex<R>>();
  #locks = new KeyedMutex();
  #records: readonly R[] | undefined;

  constructor(options: RecordIndexOptions<R> = {}) {
    this.#records = options.records;
  }

  /**
   * Find records whose `field` equals `value`
   *
   * Builds the index for `field` from `records` on the first call for that
   * field. Later calls for the same field reuse it without rescanning.
   *
   * @returns Matching records in original order; empty for an unknown field or value
   */
  search(records: readonly R[], field: FieldName, value: unknown): R[] {
    const built = this.#built.get(field);
    if (built) {
      metrics.recordIndexHit(field);
      return [...built.index.get(value)];
    }

    metrics.recordIndexMiss(field);
    return [...this.#build(field, records).index.get(value)];
  }

  /**
   * Async variant of `search` whose records come from a loader
   *
   * The loader runs at most once per field. Concurrent first queries for the
   * same field wait for a single build; other fields are not blocked.
   */
  async searchAsync(load: RecordLoader<R>, field: FieldName, value: unknown): Promise<R[]> {
    const ready = this.#built.get(field);
    if (ready) {
      metrics.recordIndexHit(field);
      return [...ready.index.get(value)];
    }

    const built = await this.#locks.withLock(field, async () => {
      // Another caller may have finished the build while this one waited
      const existing = this.#built.get(field);
      if (existing) {
        metrics.recordIndexHit(field);
        return existing;
      }

      metrics.recordIndexMiss(field);
      const records = await load();

      // A synchronous search may have built the field while the loader ran
      const builtMeanwhile = this.#built.get(field);
      if (builtMeanwhile) {
        return builtMeanwhile;
      }
      return this.#build(field, records);
    });

    return [...built.index.get(value)];
  }

  /**
   * Query an index without supplying records
   *
   * Falls back to the records given at construction when the field has not
   * been indexed yet; returns an empty list when there are none.
   */
  lookup(field: FieldName, value: unknown): R[] {
    if (this.#built.has(field) || this.#records) {
      return this.search(this.#records ?? [], field, value);
    }
    return [];
  }

  isIndexed(field: FieldName): boolean {
    return this.#built.has(field);
  }

  /**
   * Fields with a built index, in build order
   */
  fields(): FieldName[] {
    return [...this.#built.keys()];
  }

  stats(field: FieldName): FieldIndexStats | undefined {
    const built = this.#built.get(field);
    return built ? { ...built.stats } : undefined;
  }

  /**
   * Drop one field index, or all of them; the next query rebuilds
   */
  clear(field?: FieldName): void {
    if (field === undefined) {
      this.#built.clear();
      return;
    }
    this.#built.delete(field);
  }

  #build(field: FieldName, records: readonly R[]): BuiltIndex<R> {
    const startTime = performance.now();
    logger.debug("index.build.start", { field, details: { records: records.length } });

    const index = new FieldIndex<R>();
    for (const record of records) {
      if (hasField(record, field)) {
        index.add(record[field], record);
      }
    }

    const durationMs = performance.now() - startTime;
    const built: BuiltIndex<R> = {
      index,
      stats: {
        field,
        records: index.records,
        keys: index.keys,
        scanned: records.length,
        durationMs,
      },
    };

    // Publish only the complete index
    this.#built.set(field, built);

    metrics.recordIndexBuild(field, durationMs, index.records, index.keys);
    logger.debug("index.build.end", {
      field,
      details: { durationMs: durationMs.toFixed(2), records: index.records, keys: index.keys },
    });

    return built;
  }
}
