/**
 * Engine service adapter
 * Owns the long-lived engine state the tools share (the Fibonacci cache)
 */

import {
  FibonacciEvaluator,
  RecordIndex,
  assertMatrix,
  calculateStatistics,
  filterAndTransform,
  findDuplicates,
  matrixMultiply,
  mergeDatasets,
  type DataRecord,
  type FibonacciStats,
  type Matrix,
  type Statistics,
} from "@recordkit/engine";
import { logger } from "../observability/logger.js";
import type { FibonacciOutput, Scalar } from "../schemas.js";

export interface EngineServiceOptions {
  /** Fibonacci cache bound; unbounded when omitted */
  cacheSize?: number;
}

export class EngineService {
  #fibonacci: FibonacciEvaluator;

  constructor(options: EngineServiceOptions = {}) {
    this.#fibonacci = new FibonacciEvaluator({ capacity: options.cacheSize });
    logger.info("service.init", { cache_size: options.cacheSize ?? "unbounded" });
  }

  findDuplicates(items: readonly Scalar[]): Scalar[] {
    return [...findDuplicates(items)];
  }

  statistics(numbers: readonly number[]): Statistics {
    return calculateStatistics(numbers);
  }

  filterAndTransform(data: readonly number[], threshold: number): number[] {
    return filterAndTransform(data, threshold);
  }

  /**
   * Records arrive with each call, so every call indexes its own records
   */
  searchRecords(records: readonly DataRecord[], field: string, value: unknown): DataRecord[] {
    return new RecordIndex().search(records, field, value);
  }

  fibonacci(n: number): FibonacciOutput {
    const value = this.#fibonacci.fib(n).toString();
    return { n, value, digits: value.length };
  }

  fibonacciStats(): FibonacciStats {
    return this.#fibonacci.stats();
  }

  mergeDatasets(first: readonly unknown[], second: readonly unknown[]): unknown[] {
    return mergeDatasets(first, second);
  }

  multiplyMatrices(a: unknown, b: unknown): Matrix {
    assertMatrix(a, "a");
    assertMatrix(b, "b");
    return matrixMultiply(a, b);
  }
}

/**
 * Read RECORDKIT_CACHE_SIZE; malformed values fall back to an unbounded cache
 */
export function cacheSizeFromEnv(raw: string | undefined): number | undefined {
  if (raw === undefined || raw.trim() === "") {
    return undefined;
  }

  if (!/^\d+$/.test(raw.trim()) || Number.parseInt(raw, 10) < 2) {
    logger.warn("service.config.invalid", {
      name: "RECORDKIT_CACHE_SIZE",
      value: raw,
      fallback: "unbounded",
    });
    return undefined;
  }

  return Number.parseInt(raw, 10);
}

/**
 * Singleton service instance
 * Cache bound from the RECORDKIT_CACHE_SIZE environment variable
 */
export const engineService = new EngineService({
  cacheSize: cacheSizeFromEnv(process.env.RECORDKIT_CACHE_SIZE),
});
