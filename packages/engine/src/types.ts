/**
 * Core types for the record engine
 */

/**
 * One logical data item: field name → arbitrary value, no fixed schema
 */
export type DataRecord = Record<string, unknown>;

/**
 * Name of a record field
 */
export type FieldName = string;

/**
 * Loads the record collection for an asynchronous index build
 */
export type RecordLoader<R extends DataRecord = DataRecord> = () => Promise<readonly R[]>;

/**
 * Size and timing of a built field index
 */
export interface FieldIndexStats {
  field: FieldName;
  /** Records that carried the field at build time */
  records: number;
  /** Distinct field values */
  keys: number;
  /** Records scanned during the build, with or without the field */
  scanned: number;
  durationMs: number;
}

/**
 * Cache statistics for monitoring and debugging
 */
export interface CacheStats {
  /** Current number of cached entries */
  size: number;
  /** Capacity, or null when unbounded */
  capacity: number | null;
  hits: number;
  misses: number;
  /** Cache hit rate (hits / total lookups) */
  hitRate: number;
  /** Total number of evictions performed */
  evicted: number;
}

/**
 * Check whether a record carries a field as an own property
 *
 * A field set to `null` or `undefined` is still present.
 */
export function hasField(record: DataRecord, field: FieldName): boolean {
  return Object.prototype.hasOwnProperty.call(record, field);
}
