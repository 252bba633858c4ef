/**
 * Performance checks for indexed search and memoized evaluation
 * Run with: npm run bench
 */

import { describe, it, expect } from "vitest";
import { performance } from "node:perf_hooks";
import { RecordIndex, FibonacciEvaluator, findDuplicates, filterAndTransform } from "../src/index.js";

describe("Engine Performance Benchmarks", () => {
  it("10k records, 1000 indexed queries < 50ms after build", () => {
    const statuses = ["open", "in-progress", "blocked", "closed"];
    const records = Array.from({ length: 10_000 }, (_, i) => ({
      id: `task-${i}`,
      status: statuses[i % statuses.length],
    }));
    const index = new RecordIndex();
    index.search(records, "status", "open");

    const start = performance.now();
    for (let i = 0; i < 1000; i++) {
      index.search(records, "status", statuses[i % statuses.length]);
    }
    const duration = performance.now() - start;

    console.log(`1000 indexed queries: ${duration.toFixed(2)}ms`);
    expect(duration).toBeLessThan(50);
  });

  it("fib(30) cold < 10ms, warm < 1ms", () => {
    const evaluator = new FibonacciEvaluator();

    const coldStart = performance.now();
    evaluator.fib(30);
    const cold = performance.now() - coldStart;

    const warmStart = performance.now();
    evaluator.fib(30);
    const warm = performance.now() - warmStart;

    console.log(`fib(30) cold: ${cold.toFixed(3)}ms, warm: ${warm.toFixed(3)}ms`);
    expect(cold).toBeLessThan(10);
    expect(warm).toBeLessThan(1);
  });

  it("linear-time duplicates and filter over 100k values", () => {
    const values = Array.from({ length: 100_000 }, (_, i) => i % 75_000);

    const start = performance.now();
    const duplicates = findDuplicates(values);
    const squares = filterAndTransform(values, 50_000);
    const duration = performance.now() - start;

    console.log(`duplicates + filter over 100k: ${duration.toFixed(2)}ms`);
    expect(duplicates.size).toBe(25_000);
    expect(squares.length).toBeGreaterThan(0);
    expect(duration).toBeLessThan(500);
  });
});
