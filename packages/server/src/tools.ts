/**
 * MCP tool implementations for recordkit
 * Every tool returns a text summary, the result as JSON text, and the same
 * result as structured content
 */

import {
  CalculateStatisticsInputSchema,
  FibonacciInputSchema,
  FilterAndTransformInputSchema,
  FindDuplicatesInputSchema,
  MergeDatasetsInputSchema,
  MultiplyMatricesInputSchema,
  SearchRecordsInputSchema,
} from "./schemas.js";
import { engineService } from "./service/engine.js";
import { errorCodeOf, logger } from "./observability/logger.js";
import { recordToolExecution } from "./observability/metrics.js";

export type TextContent = {
  type: "text";
  text: string;
};

export type ToolResult<T extends Record<string, unknown> = Record<string, unknown>> = {
  content: TextContent[];
  structuredContent: T;
};

export type ToolHandler = (args: unknown) => Promise<ToolResult>;

/**
 * Run a tool handler with logging and metrics
 *
 * Engine work is synchronous, so a handler runs to completion once started;
 * input size limits in the schemas bound its cost.
 */
export async function executeTool<T>(toolName: string, handler: () => Promise<T>): Promise<T> {
  const startTime = Date.now();
  let success = false;
  let error: unknown;

  try {
    const result = await handler();
    success = true;
    return result;
  } catch (err) {
    error = err;
    throw err;
  } finally {
    const duration = Date.now() - startTime;
    logger.toolCall(toolName, duration, success, error);
    recordToolExecution(toolName, duration, success, success ? undefined : errorCodeOf(error));
  }
}

function result<T extends Record<string, unknown>>(summary: string, payload: T): ToolResult<T> {
  return {
    content: [
      { type: "text", text: summary },
      { type: "text", text: JSON.stringify(payload) },
    ],
    structuredContent: payload,
  };
}

function plural(count: number, noun: string): string {
  return `${count} ${noun}${count === 1 ? "" : "s"}`;
}

/**
 * find_duplicates: Values occurring more than once
 */
export async function findDuplicates(args: unknown) {
  const { items } = FindDuplicatesInputSchema.parse(args);

  return executeTool("find_duplicates", async () => {
    const duplicates = engineService.findDuplicates(items);
    const summary = `Found ${plural(duplicates.length, "duplicate value")} in ${plural(items.length, "item")}`;
    return result(summary, {
      duplicates,
      count: duplicates.length,
    });
  });
}

/**
 * calculate_statistics: Mean, population variance and standard deviation
 */
export async function calculateStatistics(args: unknown) {
  const { numbers } = CalculateStatisticsInputSchema.parse(args);

  return executeTool("calculate_statistics", async () => {
    const stats = engineService.statistics(numbers);
    return result(`mean=${stats.mean} variance=${stats.variance} stdDev=${stats.stdDev}`, {
      ...stats,
    });
  });
}

/**
 * filter_and_transform: Sorted squares of the values above a threshold
 */
export async function filterAndTransform(args: unknown) {
  const { data, threshold } = FilterAndTransformInputSchema.parse(args);

  return executeTool("filter_and_transform", async () => {
    const values = engineService.filterAndTransform(data, threshold);
    return result(`${plural(values.length, "value")} above ${threshold}`, {
      values,
      count: values.length,
    });
  });
}

/**
 * search_records: Records whose field equals a value
 */
export async function searchRecords(args: unknown) {
  const { records, field, value } = SearchRecordsInputSchema.parse(args);

  return executeTool("search_records", async () => {
    const matches = engineService.searchRecords(records, field, value);
    const summary = `Found ${plural(matches.length, "matching record")} where ${field} = ${JSON.stringify(value)}`;
    return result(summary, {
      records: matches,
      count: matches.length,
    });
  });
}

/**
 * fibonacci: nth Fibonacci number as a decimal string
 */
export async function fibonacci(args: unknown) {
  const { n } = FibonacciInputSchema.parse(args);

  return executeTool("fibonacci", async () => {
    const output = engineService.fibonacci(n);
    const { computations, size, hitRate } = engineService.fibonacciStats();
    logger.debug("fibonacci.cache", { computations, size, hit_rate: hitRate });

    return result(`fib(${n}) has ${plural(output.digits, "digit")}`, { ...output });
  });
}

/**
 * merge_datasets: Concatenation without repeated items
 */
export async function mergeDatasets(args: unknown) {
  const { first, second } = MergeDatasetsInputSchema.parse(args);

  return executeTool("merge_datasets", async () => {
    const items = engineService.mergeDatasets(first, second);
    const summary = `Merged ${first.length} + ${second.length} items into ${plural(items.length, "unique item")}`;
    return result(summary, {
      items,
      count: items.length,
    });
  });
}

/**
 * multiply_matrices: Matrix product a × b
 */
export async function multiplyMatrices(args: unknown) {
  const { a, b } = MultiplyMatricesInputSchema.parse(args);

  return executeTool("multiply_matrices", async () => {
    const product = engineService.multiplyMatrices(a, b);
    const columns = product.length > 0 ? product[0].length : 0;
    return result(`Product is ${product.length}x${columns}`, { product });
  });
}

/**
 * Tool definitions for MCP server
 */
export const toolDefinitions = [
  {
    name: "find_duplicates",
    description: "Return each value that occurs more than once, in order of its second occurrence",
    inputSchema: {
      type: "object",
      properties: {
        items: {
          type: "array",
          description: "Strings, numbers, booleans or nulls",
          items: { type: ["string", "number", "boolean", "null"] },
        },
      },
      required: ["items"],
    },
  },
  {
    name: "calculate_statistics",
    description: "Mean, population variance and standard deviation of a non-empty list of numbers",
    inputSchema: {
      type: "object",
      properties: {
        numbers: { type: "array", items: { type: "number" }, description: "Finite numbers" },
      },
      required: ["numbers"],
    },
  },
  {
    name: "filter_and_transform",
    description: "Square every value strictly greater than the threshold; result sorted ascending",
    inputSchema: {
      type: "object",
      properties: {
        data: { type: "array", items: { type: "number" } },
        threshold: { type: "number" },
      },
      required: ["data", "threshold"],
    },
  },
  {
    name: "search_records",
    description:
      "Return the records whose field equals the value (records lacking the field never match)",
    inputSchema: {
      type: "object",
      properties: {
        records: { type: "array", items: { type: "object" }, description: "Records to search" },
        field: { type: "string", description: "Field name" },
        value: { description: "Value to match; objects and arrays match by content" },
      },
      required: ["records", "field", "value"],
    },
  },
  {
    name: "fibonacci",
    description: "The nth Fibonacci number (fib(0) = 0, fib(1) = 1) as a decimal string",
    inputSchema: {
      type: "object",
      properties: {
        n: { type: "integer", minimum: 0, maximum: 50000 },
      },
      required: ["n"],
    },
  },
  {
    name: "merge_datasets",
    description: "Concatenate two arrays keeping the first occurrence of each item",
    inputSchema: {
      type: "object",
      properties: {
        first: { type: "array" },
        second: { type: "array" },
      },
      required: ["first", "second"],
    },
  },
  {
    name: "multiply_matrices",
    description: "Multiply two rectangular matrices of numbers",
    inputSchema: {
      type: "object",
      properties: {
        a: { type: "array", items: { type: "array", items: { type: "number" } } },
        b: { type: "array", items: { type: "array", items: { type: "number" } } },
      },
      required: ["a", "b"],
    },
  },
];

/**
 * Tool handlers by name
 */
export const toolHandlers: ReadonlyMap<string, ToolHandler> = new Map<string, ToolHandler>([
  ["find_duplicates", findDuplicates],
  ["calculate_statistics", calculateStatistics],
  ["filter_and_transform", filterAndTransform],
  ["search_records", searchRecords],
  ["fibonacci", fibonacci],
  ["merge_datasets", mergeDatasets],
  ["multiply_matrices", multiplyMatrices],
]);
