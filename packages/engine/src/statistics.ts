/**
 * Descriptive statistics over numeric sequences
 */

import { InvalidInputError, TypeMismatchError } from "./errors.js";
import { describeKind } from "./format.js";

/**
 * Summary statistics for a numeric sequence
 */
export interface Statistics {
  mean: number;
  /** Population variance (divides by n, not n - 1) */
  variance: number;
  /** Square root of the population variance */
  stdDev: number;
}

/**
 * Calculate mean, population variance and standard deviation
 *
 * `n` and the total are computed once; the variance pass reuses the mean.
 *
 * @throws InvalidInputError on empty input or a non-finite element
 * @throws TypeMismatchError on a non-number element
 */
export function calculateStatistics(numbers: ArrayLike<number>): Statistics {
  const n = numbers.length;
  if (n === 0) {
    throw new InvalidInputError("numbers", "sequence of length 0 has no statistics");
  }

  let total = 0;
  for (let i = 0; i < n; i++) {
    const value: unknown = numbers[i];
    if (typeof value !== "number") {
      throw new TypeMismatchError(`numbers[${i}]`, "number", describeKind(value));
    }
    if (!Number.isFinite(value)) {
      throw new InvalidInputError(`numbers[${i}]`, `${value} is not a finite number`);
    }
    total += value;
  }

  const mean = total / n;

  let squaredDeviations = 0;
  for (let i = 0; i < n; i++) {
    const deviation = (numbers[i] ?? 0) - mean;
    squaredDeviations += deviation * deviation;
  }

  const variance = squaredDeviations / n;

  return {
    mean,
    variance,
    stdDev: Math.sqrt(variance),
  };
}
