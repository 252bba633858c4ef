import { describe, it, expect } from "vitest";
import { matrixMultiply } from "./matrix.js";
import { InvalidInputError, TypeMismatchError } from "./errors.js";

describe("matrixMultiply", () => {
  it("should multiply square matrices", () => {
    expect(
      matrixMultiply(
        [
          [1, 2],
          [3, 4],
        ],
        [
          [5, 6],
          [7, 8],
        ]
      )
    ).toEqual([
      [19, 22],
      [43, 50],
    ]);
  });

  it("should multiply rectangular matrices", () => {
    expect(matrixMultiply([[1, 2, 3]], [[1], [2], [3]])).toEqual([[14]]);
    expect(matrixMultiply([[1], [2]], [[3, 4]])).toEqual([
      [3, 4],
      [6, 8],
    ]);
  });

  it("should reject incompatible dimensions", () => {
    expect(() => matrixMultiply([[1, 2]], [[1, 2]])).toThrow(InvalidInputError);
    expect(() => matrixMultiply([[1, 2]], [[1, 2]])).toThrow(
      "Invalid matrix dimensions: 1x2 cannot be multiplied by 1x2"
    );
  });

  it("should reject empty matrices", () => {
    expect(() => matrixMultiply([], [[1]])).toThrow("Invalid a: matrix has no rows");
    expect(() => matrixMultiply([[1]], [[]])).toThrow("Invalid b[0]: matrix row is empty");
  });

  it("should reject ragged matrices", () => {
    expect(() => matrixMultiply([[1, 2], [3]], [[1], [2]])).toThrow(
      "Invalid a[1]: row has 1 columns, expected 2"
    );
  });

  it("should reject non-numeric cells", () => {
    const a = JSON.parse('[[1, "x"]]');
    expect(() => matrixMultiply(a, [[1], [2]])).toThrow(TypeMismatchError);
  });
});
