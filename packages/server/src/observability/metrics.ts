/**
 * In-process metrics for monitoring tool performance
 * Tracks call counts, errors, and latency histograms
 */

export interface HistogramStats {
  count: number;
  sum: number;
  p50: number;
  p95: number;
  p99: number;
}

type Labels = Record<string, string>;

interface Histogram {
  values: number[];
  sum: number;
}

/** Latency samples kept per histogram */
const MAX_SAMPLES = 1000;

export class MetricsRegistry {
  #counters = new Map<string, number>();
  #histograms = new Map<string, Histogram>();

  inc(name: string, labels: Labels = {}): void {
    const key = makeKey(name, labels);
    this.#counters.set(key, (this.#counters.get(key) ?? 0) + 1);
  }

  observe(name: string, value: number, labels: Labels = {}): void {
    const key = makeKey(name, labels);
    const histogram = this.#histograms.get(key) ?? { values: [], sum: 0 };
    histogram.values.push(value);
    histogram.sum += value;

    if (histogram.values.length > MAX_SAMPLES) {
      const removed = histogram.values.shift();
      if (removed !== undefined) {
        histogram.sum -= removed;
      }
    }

    this.#histograms.set(key, histogram);
  }

  getCounter(name: string, labels: Labels = {}): number {
    return this.#counters.get(makeKey(name, labels)) ?? 0;
  }

  /**
   * Percentiles over the retained samples (nearest rank)
   */
  getHistogram(name: string, labels: Labels = {}): HistogramStats | null {
    return summarize(this.#histograms.get(makeKey(name, labels)));
  }

  // Get all metrics (for debugging)
  getAllMetrics(): { counters: Record<string, number>; histograms: Record<string, HistogramStats> } {
    const counters = Object.fromEntries(this.#counters);

    const histograms: Record<string, HistogramStats> = {};
    for (const [key, histogram] of this.#histograms) {
      const stats = summarize(histogram);
      if (stats) {
        histograms[key] = stats;
      }
    }

    return { counters, histograms };
  }

  reset(): void {
    this.#counters.clear();
    this.#histograms.clear();
  }
}

function makeKey(name: string, labels: Labels): string {
  const labelStr = Object.entries(labels)
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([k, v]) => `${k}="${v}"`)
    .join(",");
  return labelStr ? `${name}{${labelStr}}` : name;
}

function summarize(histogram: Histogram | undefined): HistogramStats | null {
  if (!histogram || histogram.values.length === 0) {
    return null;
  }

  const sorted = [...histogram.values].sort((a, b) => a - b);
  const percentile = (p: number): number => {
    const index = Math.ceil((p / 100) * sorted.length) - 1;
    return sorted[Math.max(0, index)];
  };

  return {
    count: sorted.length,
    sum: histogram.sum,
    p50: percentile(50),
    p95: percentile(95),
    p99: percentile(99),
  };
}

export const metrics = new MetricsRegistry();

// Helper to record tool execution metrics
export function recordToolExecution(
  tool: string,
  duration_ms: number,
  success: boolean,
  errCode?: string
): void {
  metrics.inc("recordkit.tool.calls_total", { tool });

  if (!success) {
    metrics.inc("recordkit.tool.errors_total", { tool, err_code: errCode ?? "UNKNOWN" });
  }

  metrics.observe("recordkit.tool.latency_ms", duration_ms, { tool });
}
