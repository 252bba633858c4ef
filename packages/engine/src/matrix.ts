/**
 * Dense matrix multiplication
 */

import { InvalidInputError } from "./errors.js";
import { assertMatrix } from "./validation.js";

export type Matrix = number[][];

/**
 * Multiply two matrices
 * @throws InvalidInputError on empty or ragged matrices, or when columns of `a` differ from rows of `b`
 */
export function matrixMultiply(a: readonly (readonly number[])[], b: readonly (readonly number[])[]): Matrix {
  assertMatrix(a, "a");
  assertMatrix(b, "b");

  const rows = a.length;
  const inner = b.length;
  const cols = b[0]?.length ?? 0;

  if ((a[0]?.length ?? 0) !== inner) {
    throw new InvalidInputError(
      "matrix dimensions",
      `${rows}x${a[0]?.length ?? 0} cannot be multiplied by ${inner}x${cols}`
    );
  }

  return a.map((row) => {
    const out = new Array<number>(cols).fill(0);
    row.forEach((value, k) => {
      const other = b[k] ?? [];
      for (let j = 0; j < cols; j++) {
        out[j] += value * (other[j] ?? 0);
      }
    });
    return out;
  });
}
