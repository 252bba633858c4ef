/**
 * Basic Usage Example
 *
 * Demonstrates the stateless operations of the recordkit engine.
 * Run with: npx tsx examples/basic-usage.ts
 */

import {
  calculateStatistics,
  filterAndTransform,
  findDuplicates,
  fib,
  matrixMultiply,
  mergeDatasets,
} from "@recordkit/engine";

function main(): void {
  const readings = [12, 15, 12, 18, 21, 15, 12];

  // Duplicates: each repeated value once, in order of its second occurrence
  console.log("🔁 Duplicates:", [...findDuplicates(readings)]);

  // Statistics: population variance
  const { mean, variance, stdDev } = calculateStatistics(readings);
  console.log(`📊 mean=${mean.toFixed(2)} variance=${variance.toFixed(2)} stdDev=${stdDev.toFixed(2)}`);

  // Filter and transform: squares of values above 14, ascending
  console.log("🔎 Squares above 14:", filterAndTransform(readings, 14));

  // Merge: objects compare by content, so key order does not matter
  const merged = mergeDatasets(
    [{ sku: "A-1", qty: 2 }, { sku: "B-7", qty: 1 }],
    [{ qty: 2, sku: "A-1" }, { sku: "C-3", qty: 5 }]
  );
  console.log(`🧩 Merged into ${merged.length} unique rows`);

  // Matrix product
  console.log("✖️  Product:", matrixMultiply([[1, 2], [3, 4]], [[0, 1], [1, 0]]));

  // Memoized Fibonacci, exact for any size
  console.log(`🌀 fib(150) = ${fib(150)}`);
}

main();
