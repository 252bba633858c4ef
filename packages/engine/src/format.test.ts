import { describe, it, expect } from "vitest";
import { valueKey, isScalar, describeKind } from "./format.js";

describe("valueKey", () => {
  it("should render plain data like sorted compact JSON", () => {
    expect(valueKey({ b: 1, a: [1, "x", null] })).toBe('{"a":[1,"x",null],"b":1}');
  });

  it("should keep bigints apart from their string spelling", () => {
    expect(valueKey(10n)).toBe("10n");
    expect(valueKey("10n")).toBe('"10n"');
  });

  it("should tag dates by their time", () => {
    expect(valueKey(new Date(0))).toBe("Date(0)");
    expect(valueKey(new Date(0))).not.toBe(valueKey(new Date(1000)));
  });

  it("should ignore the insertion order of sets and maps", () => {
    expect(valueKey(new Set([2, 1]))).toBe("Set[1,2]");
    expect(valueKey(new Map([["b", 1], ["a", 2]]))).toBe('Map{"a"=>2,"b"=>1}');
  });

  it("should follow SameValueZero for numbers", () => {
    expect(valueKey(Number.NaN)).toBe("NaN");
    expect(valueKey(-0)).toBe("0");
  });

  it("should keep undefined fields", () => {
    expect(valueKey({ a: undefined })).toBe('{"a":undefined}');
    expect(valueKey({})).toBe("{}");
  });

  it("should prefix class instances with the class name", () => {
    class Point {
      x = 1;
    }
    expect(valueKey(new Point())).toBe('Point{"x":1}');
  });

  it("should reject symbols and cycles", () => {
    expect(() => valueKey([Symbol("s")])).toThrow("Cannot derive a value key from a symbol");
    const node: Record<string, unknown> = {};
    node.self = node;
    expect(() => valueKey(node)).toThrow("Circular reference detected in object");
  });
});

describe("isScalar", () => {
  it("should accept primitives and null", () => {
    for (const value of ["s", 1, 1n, true, Symbol("s"), null, undefined]) {
      expect(isScalar(value)).toBe(true);
    }
  });

  it("should reject objects, arrays and functions", () => {
    for (const value of [{}, [], () => 1, new Date(0)]) {
      expect(isScalar(value)).toBe(false);
    }
  });
});

describe("describeKind", () => {
  it("should name arrays and null explicitly", () => {
    expect(describeKind([])).toBe("array");
    expect(describeKind(null)).toBe("null");
    expect(describeKind("x")).toBe("string");
  });
});
