/**
 * Metrics tracking for index and memoization operations
 */

export interface IndexMetrics {
  hitCount: number;
  missCount: number;
  buildTimeMs: number[];
  records: number;
  keys: number;
}

export interface MemoMetrics {
  hitCount: number;
  missCount: number;
  evictions: number;
}

const MAX_SAMPLES = 100;

/** Default number of fields with index metrics kept at once */
export const MAX_TRACKED_FIELDS = 1000;

export interface MetricsCollectorOptions {
  /** Fields tracked at once; the least recently touched field is dropped beyond this */
  maxFields?: number;
}

export class MetricsCollector {
  #indexes = new Map<string, IndexMetrics>();
  #memos = new Map<string, MemoMetrics>();
  #maxFields: number;

  constructor(options: MetricsCollectorOptions = {}) {
    this.#maxFields = options.maxFields ?? MAX_TRACKED_FIELDS;
  }

  #getIndexMetrics(field: string): IndexMetrics {
    let metrics = this.#indexes.get(field);
    if (metrics) {
      // Re-insert to mark as most recently touched
      this.#indexes.delete(field);
    } else {
      metrics = { hitCount: 0, missCount: 0, buildTimeMs: [], records: 0, keys: 0 };
    }
    this.#indexes.set(field, metrics);

    if (this.#indexes.size > this.#maxFields) {
      const oldest = this.#indexes.keys().next();
      if (!oldest.done) {
        this.#indexes.delete(oldest.value);
      }
    }
    return metrics;
  }

  #getMemoMetrics(name: string): MemoMetrics {
    let metrics = this.#memos.get(name);
    if (!metrics) {
      metrics = { hitCount: 0, missCount: 0, evictions: 0 };
      this.#memos.set(name, metrics);
    }
    return metrics;
  }

  /**
   * Record a search answered from an existing index
   */
  recordIndexHit(field: string): void {
    this.#getIndexMetrics(field).hitCount++;
  }

  /**
   * Record a search that had to build the index first
   */
  recordIndexMiss(field: string): void {
    this.#getIndexMetrics(field).missCount++;
  }

  /**
   * Record build time and resulting index size
   */
  recordIndexBuild(field: string, ms: number, records: number, keys: number): void {
    const metrics = this.#getIndexMetrics(field);
    metrics.buildTimeMs.push(ms);

    // Keep only the most recent samples to avoid unbounded memory growth
    if (metrics.buildTimeMs.length > MAX_SAMPLES) {
      metrics.buildTimeMs.shift();
    }

    metrics.records = records;
    metrics.keys = keys;
  }

  recordMemoHit(name: string): void {
    this.#getMemoMetrics(name).hitCount++;
  }

  recordMemoMiss(name: string): void {
    this.#getMemoMetrics(name).missCount++;
  }

  recordMemoEviction(name: string): void {
    this.#getMemoMetrics(name).evictions++;
  }

  getIndexMetrics(field: string): IndexMetrics | undefined {
    return this.#indexes.get(field);
  }

  /**
   * Fields with index metrics, least recently touched first
   */
  indexFields(): string[] {
    return [...this.#indexes.keys()];
  }

  getMemoMetrics(name: string): MemoMetrics | undefined {
    return this.#memos.get(name);
  }

  /**
   * Calculate hit rate for a field index
   */
  getIndexHitRate(field: string): number {
    const metrics = this.#indexes.get(field);
    if (!metrics) return 0;
    const total = metrics.hitCount + metrics.missCount;
    return total > 0 ? metrics.hitCount / total : 0;
  }

  /**
   * Calculate p95 for a list of samples
   */
  getP95(values: number[]): number {
    if (values.length === 0) return 0;

    const sorted = [...values].sort((a, b) => a - b);
    const idx = Math.ceil(sorted.length * 0.95) - 1;
    return sorted[Math.max(0, idx)] ?? 0;
  }

  /**
   * Reset all metrics
   */
  reset(): void {
    this.#indexes.clear();
    this.#memos.clear();
  }
}

/**
 * Global metrics collector instance
 */
export const metrics = new MetricsCollector();
