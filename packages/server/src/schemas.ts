/**
 * Zod schemas for validating tool inputs and outputs
 * Provides runtime type safety and detailed validation errors
 */

import { z } from "zod";

/** Largest collection accepted by a single tool call */
export const MAX_ITEMS = 100_000;

/** Largest Fibonacci index accepted by the fibonacci tool */
export const MAX_FIB_INDEX = 50_000;

const fieldPattern = /^[^\s]+$/;

// Hashable JSON values
export const ScalarSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

export const RecordSchema = z.record(z.string(), z.unknown());

// Any JSON value except a missing one
export const JsonValueSchema = z.union([ScalarSchema, z.array(z.unknown()), RecordSchema]);

const FieldSchema = z.string().min(1).superRefine((val, ctx) => {
  if (!fieldPattern.test(val)) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: "field must be a non-empty name without whitespace",
    });
  }
});

const NumberListSchema = z.array(z.number()).max(MAX_ITEMS, `at most ${MAX_ITEMS} numbers`);

const MatrixSchema = z.array(z.array(z.number())).min(1, "matrix must have at least one row");

// Tool input schemas

export const FindDuplicatesInputSchema = z.object({
  items: z.array(ScalarSchema).max(MAX_ITEMS, `at most ${MAX_ITEMS} items`),
});

export const CalculateStatisticsInputSchema = z.object({
  numbers: NumberListSchema,
});

export const FilterAndTransformInputSchema = z.object({
  data: NumberListSchema,
  threshold: z.number(),
});

export const SearchRecordsInputSchema = z.object({
  records: z.array(RecordSchema).max(MAX_ITEMS, `at most ${MAX_ITEMS} records`),
  field: FieldSchema,
  value: JsonValueSchema,
});

export const FibonacciInputSchema = z.object({
  n: z
    .number()
    .int("n must be an integer")
    .min(0, "n must be non-negative")
    .max(MAX_FIB_INDEX, `n cannot exceed ${MAX_FIB_INDEX}`),
});

export const MergeDatasetsInputSchema = z.object({
  first: z.array(z.unknown()).max(MAX_ITEMS),
  second: z.array(z.unknown()).max(MAX_ITEMS),
});

export const MultiplyMatricesInputSchema = z.object({
  a: MatrixSchema,
  b: MatrixSchema,
});

// Tool output schemas (for documentation)

export const StatisticsOutputSchema = z.object({
  mean: z.number(),
  variance: z.number(),
  stdDev: z.number(),
});

export const FibonacciOutputSchema = z.object({
  n: z.number().int().min(0),
  /** Decimal string; values past 2^53 do not fit a JSON number */
  value: z.string().regex(/^\d+$/),
  digits: z.number().int().positive(),
});

// Export types
export type Scalar = z.infer<typeof ScalarSchema>;
export type FindDuplicatesInput = z.infer<typeof FindDuplicatesInputSchema>;
export type CalculateStatisticsInput = z.infer<typeof CalculateStatisticsInputSchema>;
export type FilterAndTransformInput = z.infer<typeof FilterAndTransformInputSchema>;
export type SearchRecordsInput = z.infer<typeof SearchRecordsInputSchema>;
export type FibonacciInput = z.infer<typeof FibonacciInputSchema>;
export type MergeDatasetsInput = z.infer<typeof MergeDatasetsInputSchema>;
export type MultiplyMatricesInput = z.infer<typeof MultiplyMatricesInputSchema>;
export type StatisticsOutput = z.infer<typeof StatisticsOutputSchema>;
export type FibonacciOutput = z.infer<typeof FibonacciOutputSchema>;
