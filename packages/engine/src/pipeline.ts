/**
 * Single-pass filter/map pipeline
 */

/**
 * Pipeline stages, applied in a single pass over the input
 */
export interface PipelineStages<T, U> {
  /** Keep only items for which this returns true */
  where: (item: T, index: number) => boolean;
  /** Map each kept item */
  select: (item: T, index: number) => U;
  /** Sort the mapped items with this comparator (insertion order if omitted) */
  compare?: (a: U, b: U) => number;
}

/**
 * Filter and map in one pass, then optionally sort
 */
export function pipeline<T, U>(data: Iterable<T>, stages: PipelineStages<T, U>): U[] {
  const out: U[] = [];

  let index = 0;
  for (const item of data) {
    if (stages.where(item, index)) {
      out.push(stages.select(item, index));
    }
    index++;
  }

  if (stages.compare) {
    out.sort(stages.compare);
  }

  return out;
}

/**
 * Square every value strictly above `threshold` and return the squares ascending
 *
 * @example
 * filterAndTransform([1, -2, 3, -4, 5], 0) // [1, 9, 25]
 */
export function filterAndTransform(data: Iterable<number>, threshold: number): number[] {
  return pipeline(data, {
    where: (x) => x > threshold,
    select: (x) => x * x,
    compare: (a, b) => a - b,
  });
}
