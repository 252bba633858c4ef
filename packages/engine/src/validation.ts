/**
 * Validation utilities for engine inputs
 *
 * Callers holding `unknown` data (parsed JSON, tool arguments) narrow it here
 * before handing it to the typed engine functions.
 */

import { InvalidInputError, TypeMismatchError } from "./errors.js";
import { describeKind, isScalar, type Scalar } from "./format.js";
import type { DataRecord } from "./types.js";

/**
 * Check whether a value is a plain record (non-null, non-array object)
 */
export function isRecord(value: unknown): value is DataRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Validate a non-negative integer
 * @param value - Value to validate
 * @param label - Name of the input for error messages
 * @throws TypeMismatchError if not an integer
 * @throws InvalidInputError if negative
 */
export function assertNonNegativeInteger(value: unknown, label: string): asserts value is number {
  if (typeof value !== "number" || !Number.isInteger(value)) {
    throw new TypeMismatchError(
      label,
      "integer",
      typeof value === "number" ? String(value) : describeKind(value)
    );
  }

  if (value < 0) {
    throw new InvalidInputError(label, `${value} is negative`);
  }
}

/**
 * Validate an array of numbers
 * @throws TypeMismatchError if not an array or an element is not a number
 */
export function assertNumberArray(value: unknown, label: string): asserts value is number[] {
  if (!Array.isArray(value)) {
    throw new TypeMismatchError(label, "array of numbers", describeKind(value));
  }

  value.forEach((item: unknown, i) => {
    if (typeof item !== "number") {
      throw new TypeMismatchError(`${label}[${i}]`, "number", describeKind(item));
    }
  });
}

/**
 * Validate an array of hashable values
 * @throws TypeMismatchError if not an array
 * @throws InvalidInputError if an element is an object or array
 */
export function assertScalarArray(value: unknown, label: string): asserts value is Scalar[] {
  if (!Array.isArray(value)) {
    throw new TypeMismatchError(label, "array", describeKind(value));
  }

  value.forEach((item: unknown, i) => {
    if (!isScalar(item)) {
      throw new InvalidInputError(
        `${label}[${i}]`,
        `${describeKind(item)} is not hashable; only scalar values can be deduplicated`
      );
    }
  });
}

/**
 * Validate an array of records
 * @throws TypeMismatchError if not an array or an element is not an object
 */
export function assertRecordArray(value: unknown, label: string): asserts value is DataRecord[] {
  if (!Array.isArray(value)) {
    throw new TypeMismatchError(label, "array of records", describeKind(value));
  }

  value.forEach((item: unknown, i) => {
    if (!isRecord(item)) {
      throw new TypeMismatchError(`${label}[${i}]`, "record", describeKind(item));
    }
  });
}

/**
 * Validate a rectangular, non-empty matrix of numbers
 * @throws TypeMismatchError on non-numeric content
 * @throws InvalidInputError on empty or ragged matrices
 */
export function assertMatrix(value: unknown, label: string): asserts value is number[][] {
  if (!Array.isArray(value)) {
    throw new TypeMismatchError(label, "matrix", describeKind(value));
  }

  if (value.length === 0) {
    throw new InvalidInputError(label, "matrix has no rows");
  }

  let width: number | undefined;
  value.forEach((row: unknown, i) => {
    assertNumberArray(row, `${label}[${i}]`);

    if (row.length === 0) {
      throw new InvalidInputError(`${label}[${i}]`, "matrix row is empty");
    }

    if (width === undefined) {
      width = row.length;
    } else if (row.length !== width) {
      throw new InvalidInputError(
        `${label}[${i}]`,
        `row has ${row.length} columns, expected ${width}`
      );
    }
  });
}
