/**
 * Indexed Search Example
 *
 * Shows lazy per-field indexes and what happens when records change after
 * an index was built.
 * Run with: npx tsx examples/with-indexes.ts
 */

import { RecordIndex, FibonacciEvaluator, memoizeAsync } from "@recordkit/engine";

interface Task extends Record<string, unknown> {
  id: string;
  status: string;
  priority?: number;
}

async function main(): Promise<void> {
  const tasks: Task[] = [
    { id: "task-1", status: "open", priority: 3 },
    { id: "task-2", status: "closed" },
    { id: "task-3", status: "open", priority: 1 },
  ];

  const index = new RecordIndex<Task>();

  // First query builds the "status" index; later ones reuse it
  console.log("📇 open:", index.search(tasks, "status", "open").map((t) => t.id));
  console.log("   stats:", index.stats("status"));

  // Indexes are not refreshed when records change
  tasks.push({ id: "task-4", status: "open" });
  console.log("⚠️  open after push (stale):", index.search(tasks, "status", "open").length);

  index.clear("status");
  console.log("✅ open after clear:", index.search(tasks, "status", "open").length);

  // Concurrent first queries share one load
  let loads = 0;
  const load = async (): Promise<Task[]> => {
    loads++;
    return tasks;
  };
  const fresh = new RecordIndex<Task>();
  await Promise.all([
    fresh.searchAsync(load, "priority", 1),
    fresh.searchAsync(load, "priority", 3),
  ]);
  console.log(`🔒 loader ran ${loads} time(s)`);

  // Bounded Fibonacci cache
  const evaluator = new FibonacciEvaluator({ capacity: 16 });
  evaluator.fib(500);
  console.log("🌀 fib cache:", evaluator.stats());

  // Async memoization computes each key once, even when callers overlap
  const slowSquare = memoizeAsync(async (n: number) => n * n);
  const [a, b] = await Promise.all([slowSquare(12), slowSquare(12)]);
  console.log(`💾 ${a} ${b}, cached keys: ${slowSquare.cache.size}`);
}

main().catch((error: unknown) => {
  console.error(error);
  process.exit(1);
});
