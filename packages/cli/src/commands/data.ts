/**
 * Data processing commands: duplicates, stats, filter, search, fib, merge, multiply, process
 */

import { Command } from "commander";
import {
  CachedTransform,
  FibonacciEvaluator,
  RecordIndex,
  TypeMismatchError,
  assertMatrix,
  assertNumberArray,
  assertRecordArray,
  assertScalarArray,
  calculateStatistics,
  describeKind,
  filterAndTransform,
  findDuplicates,
  matrixMultiply,
  mergeDatasets,
  sumOfSquares,
  type DataRecord,
  type ScoredRecord,
} from "@recordkit/engine";
import { parseJsonValue, parseNonNegativeInt, parseNumber } from "../lib/arg.js";
import { resolveCacheSize } from "../lib/env.js";
import { readJsonFromFile, readJsonInput, readJsonLines } from "../lib/io.js";
import { printJson, printJsonLines } from "../lib/render.js";
import { emitMetric, withTiming } from "../lib/telemetry.js";
import type { CliDeps, GlobalOptions } from "../lib/context.js";

/** Largest n `fib` accepts */
export const MAX_FIB_INPUT = 50000;

interface InputOptions {
  input?: string;
}

async function readArrayFile(file: string): Promise<unknown[]> {
  const value = await readJsonFromFile(file);
  if (!Array.isArray(value)) {
    throw new TypeMismatchError(file, "array", describeKind(value));
  }
  return value;
}

/**
 * Register data commands on the program
 */
export function createDataCommands(program: Command, deps: CliDeps): void {
  const globals = (): GlobalOptions => program.opts<GlobalOptions>();

  program
    .command("duplicates")
    .description("Print the values that occur more than once in a JSON array")
    .option("-i, --input <file>", "Read the JSON array from a file instead of stdin")
    .action(async (options: InputOptions) => {
      await withTiming("cli.duplicates", async () => {
        const items = await readJsonInput(options.input, deps);
        assertScalarArray(items, "input");

        printJson([...findDuplicates(items)], { raw: globals().raw });
      });
    });

  program
    .command("stats")
    .description("Print mean, variance and standard deviation of a JSON number array")
    .option("-i, --input <file>", "Read the JSON array from a file instead of stdin")
    .action(async (options: InputOptions) => {
      await withTiming("cli.stats", async () => {
        const numbers = await readJsonInput(options.input, deps);
        assertNumberArray(numbers, "input");

        printJson(calculateStatistics(numbers), { raw: globals().raw });
      });
    });

  program
    .command("filter")
    .description("Square the values above a threshold, in ascending order")
    .requiredOption("-t, --threshold <n>", "Keep values strictly greater than n", (value) =>
      parseNumber(value, "--threshold")
    )
    .option("-i, --input <file>", "Read the JSON array from a file instead of stdin")
    .action(async (options: InputOptions & { threshold: number }) => {
      await withTiming("cli.filter", async () => {
        const numbers = await readJsonInput(options.input, deps);
        assertNumberArray(numbers, "input");

        printJson(filterAndTransform(numbers, options.threshold), { raw: globals().raw });
      });
    });

  program
    .command("search")
    .description("Print the records whose field equals a value")
    .requiredOption("-k, --key <field>", "Field to match")
    .requiredOption("-v, --value <json>", "Value to match (JSON, or a bare string)", parseJsonValue)
    .option("-i, --input <file>", "Read the JSON record array from a file instead of stdin")
    .action(async (options: InputOptions & { key: string; value: unknown }) => {
      await withTiming("cli.search", async () => {
        const records = await readJsonInput(options.input, deps);
        assertRecordArray(records, "input");

        const index = new RecordIndex();
        const matches = index.search(records, options.key, options.value);

        const stats = index.stats(options.key);
        if (stats) {
          emitMetric("cli.search.index", { ...stats });
        }

        printJson(matches, { raw: globals().raw });
      });
    });

  program
    .command("fib")
    .description("Print the nth Fibonacci number")
    .argument("<n>", `Index, 0-${MAX_FIB_INPUT}`, (value: string) =>
      parseNonNegativeInt(value, "n", MAX_FIB_INPUT)
    )
    .option(
      "-c, --cache-size <n>",
      "Keep at most n cached values (default: RECORDKIT_CACHE_SIZE or unbounded)",
      (value) => parseNonNegativeInt(value, "--cache-size", 1_000_000)
    )
    .action(async (n: number, options: { cacheSize?: number }) => {
      await withTiming("cli.fib", async () => {
        const evaluator = new FibonacciEvaluator({ capacity: resolveCacheSize(options.cacheSize) });

        console.log(evaluator.fib(n).toString());

        const { computations, size, evicted } = evaluator.stats();
        emitMetric("cli.fib.cache", { computations, size, evicted });
      });
    });

  program
    .command("merge <first> <second>")
    .description("Concatenate two JSON array files, dropping repeated items")
    .action(async (first: string, second: string) => {
      await withTiming("cli.merge", async () => {
        const a = await readArrayFile(first);
        const b = await readArrayFile(second);

        printJson(mergeDatasets(a, b), { raw: globals().raw });
      });
    });

  program
    .command("multiply <a> <b>")
    .description("Multiply two matrices stored as JSON files")
    .action(async (a: string, b: string) => {
      await withTiming("cli.multiply", async () => {
        const left = await readJsonFromFile(a);
        const right = await readJsonFromFile(b);
        assertMatrix(left, a);
        assertMatrix(right, b);

        printJson(matrixMultiply(left, right), { raw: globals().raw });
      });
    });

  program
    .command("process <file>")
    .description("Add the sum of squares of numeric fields to each record of a JSON-lines file")
    .action(async (file: string) => {
      await withTiming("cli.process", async () => {
        const records = await readJsonLines(file);
        assertRecordArray(records, file);

        const transform = new CachedTransform<DataRecord, ScoredRecord<DataRecord>>(
          sumOfSquares,
          { capacity: resolveCacheSize() }
        );
        printJsonLines(transform.applyAll(records));

        const { hits, misses, size } = transform.stats();
        emitMetric("cli.process.cache", { records: records.length, hits, misses, size });
      });
    });
}
