/**
 * Memoized Fibonacci evaluation
 *
 * fib(0) = 0, fib(1) = 1, fib(n) = fib(n - 1) + fib(n - 2)
 */

import { InvalidInputError } from "./errors.js";
import { MemoCache } from "./memo.js";
import { assertNonNegativeInteger } from "./validation.js";
import type { CacheStats } from "./types.js";

/**
 * Configuration options for a Fibonacci evaluator
 */
export interface FibonacciOptions {
  /** Bound the cache to this many entries (LRU); unbounded when omitted. Minimum 2. */
  capacity?: number;
}

export interface FibonacciStats extends CacheStats {
  /** Values derived from the recurrence rather than read from the cache */
  computations: number;
}

/**
 * Evaluates Fibonacci numbers against a cache owned by the evaluator
 *
 * A new value is derived by walking down to the nearest cached pair and
 * applying the recurrence upward, so every fib(k) on the way is computed
 * once and stored, and the call stack stays flat for large n.
 */
export class FibonacciEvaluator {
  #cache: MemoCache<number, bigint>;
  #computations = 0;

  constructor(options: FibonacciOptions = {}) {
    if (options.capacity !== undefined && options.capacity < 2) {
      throw new InvalidInputError(
        "capacity",
        `${options.capacity} is below 2; the recurrence needs two cached predecessors`
      );
    }
    this.#cache = new MemoCache({ capacity: options.capacity, name: "fibonacci" });
  }

  /**
   * Compute fib(n)
   * @throws TypeMismatchError if n is not an integer
   * @throws InvalidInputError if n is negative
   */
  fib(n: number): bigint {
    assertNonNegativeInteger(n, "n");

    const cached = this.#cache.find(n);
    if (cached) {
      return cached.value;
    }

    // Find the lowest index that still has to be derived
    let start = n;
    let prev1 = 0n;
    let prev2 = 0n;
    while (start >= 2) {
      const p1 = this.#cache.peek(start - 1);
      const p2 = this.#cache.peek(start - 2);
      if (p1 !== undefined && p2 !== undefined) {
        prev1 = p1;
        prev2 = p2;
        break;
      }
      start--;
    }
    if (start < 2) {
      start = 0;
    }

    let result = 0n;
    for (let k = start; k <= n; k++) {
      const known = this.#cache.peek(k);
      const value = known ?? (k <= 1 ? BigInt(k) : prev1 + prev2);

      if (known === undefined) {
        this.#computations++;
        this.#cache.set(k, value);
      }

      prev2 = prev1;
      prev1 = value;
      result = value;
    }

    return result;
  }

  /**
   * Forget every cached value; the computation counter is kept
   */
  clear(): void {
    this.#cache.clear();
  }

  stats(): FibonacciStats {
    return { ...this.#cache.stats(), computations: this.#computations };
  }
}

/**
 * Process-wide evaluator behind `fib`
 */
export const defaultEvaluator = new FibonacciEvaluator();

/**
 * Compute fib(n) with the process-wide cache
 */
export function fib(n: number): bigint {
  return defaultEvaluator.fib(n);
}
