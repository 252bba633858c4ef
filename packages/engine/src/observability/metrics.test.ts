import { describe, it, expect } from "vitest";
import { MetricsCollector } from "./metrics.js";

describe("MetricsCollector", () => {
  it("should drop the least recently touched field past the limit", () => {
    const collector = new MetricsCollector({ maxFields: 2 });

    collector.recordIndexHit("a");
    collector.recordIndexHit("b");
    collector.recordIndexHit("a");
    collector.recordIndexMiss("c");

    expect(collector.indexFields()).toEqual(["a", "c"]);
    expect(collector.getIndexMetrics("b")).toBeUndefined();
    expect(collector.getIndexMetrics("a")).toMatchObject({ hitCount: 2, missCount: 0 });
    expect(collector.getIndexMetrics("c")).toMatchObject({ hitCount: 0, missCount: 1 });
  });

  it("should keep only the most recent build samples", () => {
    const collector = new MetricsCollector();
    for (let i = 0; i < 105; i++) {
      collector.recordIndexBuild("status", i, 10, 3);
    }

    const fieldMetrics = collector.getIndexMetrics("status");
    expect(fieldMetrics?.buildTimeMs).toHaveLength(100);
    expect(fieldMetrics?.buildTimeMs[0]).toBe(5);
    expect(fieldMetrics).toMatchObject({ records: 10, keys: 3 });
  });

  it("should compute p95 over samples", () => {
    const collector = new MetricsCollector();
    const samples = Array.from({ length: 20 }, (_, i) => i + 1);
    expect(collector.getP95(samples)).toBe(19);
    expect(collector.getP95([])).toBe(0);
  });
});
