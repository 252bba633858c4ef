/**
 * recordkit engine
 *
 * In-memory record processing: deduplication, statistics, filter/transform,
 * lazily indexed search and memoized evaluation
 */

// Re-export types
export type { DataRecord, FieldName, RecordLoader, FieldIndexStats, CacheStats } from "./types.js";
export { hasField } from "./types.js";

// Components
export { findDuplicates, mergeDatasets } from "./dedupe.js";
export { calculateStatistics, type Statistics } from "./statistics.js";
export { filterAndTransform, pipeline, type PipelineStages } from "./pipeline.js";
export { RecordIndex, type RecordIndexOptions } from "./record-index.js";
export {
  MemoCache,
  memoize,
  memoizeAsync,
  defaultKeyOf,
  type MemoCacheOptions,
  type MemoEntry,
  type MemoizeOptions,
  type Memoized,
  type MemoizedAsync,
} from "./memo.js";
export {
  FibonacciEvaluator,
  defaultEvaluator,
  fib,
  type FibonacciOptions,
  type FibonacciStats,
} from "./fibonacci.js";
export { matrixMultiply, type Matrix } from "./matrix.js";
export { CachedTransform, sumOfSquares, type ScoredRecord } from "./enrich.js";

// Re-export utilities
export { valueKey, isScalar, describeKind, type Scalar } from "./format.js";
export {
  isRecord,
  assertNonNegativeInteger,
  assertNumberArray,
  assertScalarArray,
  assertRecordArray,
  assertMatrix,
} from "./validation.js";
export { Mutex, KeyedMutex } from "./mutex.js";

// Observability
export { logger, Logger, type LogLevel, type LogEntry, type LogSink } from "./observability/logs.js";
export {
  metrics,
  MetricsCollector,
  MAX_TRACKED_FIELDS,
  type IndexMetrics,
  type MemoMetrics,
  type MetricsCollectorOptions,
} from "./observability/metrics.js";

// Re-export errors
export { RecordKitError, InvalidInputError, TypeMismatchError, isRecordKitError } from "./errors.js";
