/**
 * Value keys and kind helpers
 *
 * `valueKey` is used wherever a structured value has to act as a map key:
 * composite index values, merge keys, memo keys and the enrichment cache key
 * of a record.
 */

const byCodeUnit = (a: string, b: string): number => (a < b ? -1 : a > b ? 1 : 0);

/**
 * Structural equality key for a value
 *
 * Two values get the same key exactly when they are structurally equal:
 * plain objects ignore key order, a Set ignores insertion order, a Map ignores
 * entry order. Strings are always quoted, so no other value collides with
 * one; bigints, dates, maps, sets, regular expressions and class instances
 * carry their own tag. Numbers compare by SameValueZero (`NaN` equals `NaN`,
 * `-0` equals `0`).
 *
 * @throws Error on circular references, symbols and functions, which have no
 *   structural form
 */
export function valueKey(value: unknown): string {
  const seen = new WeakSet<object>();

  const encode = (current: unknown): string => {
    if (current === null) {
      return "null";
    }

    if (typeof current === "object") {
      if (seen.has(current)) {
        throw new Error("Circular reference detected in object");
      }
      seen.add(current);
      try {
        return encodeObject(current);
      } finally {
        seen.delete(current);
      }
    }

    switch (typeof current) {
      case "string":
        return JSON.stringify(current);
      case "number":
      case "boolean":
        return String(current);
      case "bigint":
        return `${String(current)}n`;
      case "undefined":
        return "undefined";
    }

    throw new Error(`Cannot derive a value key from a ${typeof current}`);
  };

  const encodeObject = (current: object): string => {
    if (Array.isArray(current)) {
      return `[${Array.from(current, encode).join(",")}]`;
    }
    if (current instanceof Date) {
      return `Date(${current.getTime()})`;
    }
    if (current instanceof RegExp) {
      return `RegExp(${String(current)})`;
    }
    if (current instanceof Map) {
      const entries = Array.from(current, ([k, v]) => `${encode(k)}=>${encode(v)}`);
      return `Map{${entries.sort(byCodeUnit).join(",")}}`;
    }
    if (current instanceof Set) {
      const members = Array.from(current, encode);
      return `Set[${members.sort(byCodeUnit).join(",")}]`;
    }

    const fields = Object.entries(current)
      .sort(([a], [b]) => byCodeUnit(a, b))
      .map(([k, v]) => `${JSON.stringify(k)}:${encode(v)}`);
    const body = `{${fields.join(",")}}`;

    const proto: unknown = Object.getPrototypeOf(current);
    if (proto === Object.prototype || proto === null) {
      return body;
    }
    // Class instances with equal fields but different classes stay apart
    return `${current.constructor.name || "Object"}${body}`;
  };

  return encode(value);
}

/**
 * Values that can be used as Set/Map keys with value semantics
 */
export type Scalar = string | number | bigint | boolean | symbol | null | undefined;

/**
 * Check whether a value compares by value under SameValueZero
 */
export function isScalar(value: unknown): value is Scalar {
  return value === null || (typeof value !== "object" && typeof value !== "function");
}

/**
 * Describe a value's kind for error messages
 */
export function describeKind(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  return typeof value;
}
