/**
 * Duplicate detection and dataset merging
 */

import { InvalidInputError } from "./errors.js";
import { describeKind, isScalar, valueKey, type Scalar } from "./format.js";

/**
 * Find values that occur more than once
 *
 * Single pass over `items` with a "seen" set and a "duplicates" set.
 * Values compare by SameValueZero, so NaN matches NaN and 0 matches -0.
 *
 * @returns Each repeated value exactly once, in order of its second occurrence
 * @throws InvalidInputError if an element is an object, array or function
 */
export function findDuplicates<T extends Scalar>(items: Iterable<T>): Set<T> {
  const seen = new Set<T>();
  const duplicates = new Set<T>();

  let index = 0;
  for (const item of items) {
    // Objects would only match by identity, which is never what callers mean
    if (!isScalar(item)) {
      throw new InvalidInputError(
        `items[${index}]`,
        `${describeKind(item)} is not hashable; only scalar values can be deduplicated`
      );
    }

    if (seen.has(item)) {
      duplicates.add(item);
    } else {
      seen.add(item);
    }
    index++;
  }

  return duplicates;
}

function keyOrIdentity(item: unknown): string | undefined {
  try {
    return valueKey(item);
  } catch {
    return undefined;
  }
}

/**
 * Concatenate two datasets, dropping repeated items
 *
 * The first occurrence of each item is kept. Scalars compare by SameValueZero;
 * objects and arrays compare by their structural value key, so `{a:1,b:2}` and
 * `{b:2,a:1}` count as the same item. Items without a value key (cyclic ones)
 * compare by identity.
 */
export function mergeDatasets<T>(first: readonly T[], second: readonly T[]): T[] {
  const scalars = new Set<unknown>();
  const composites = new Set<string>();
  const merged: T[] = [];

  for (const dataset of [first, second]) {
    for (const item of dataset) {
      const key = isScalar(item) ? undefined : keyOrIdentity(item);
      if (key === undefined) {
        if (scalars.has(item)) continue;
        scalars.add(item);
      } else {
        if (composites.has(key)) continue;
        composites.add(key);
      }
      merged.push(item);
    }
  }

  return merged;
}
