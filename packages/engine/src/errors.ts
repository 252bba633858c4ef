/**
 * Error types for record engine operations
 *
 * Invariants:
 * - All errors name the offending input (index, length, field or value) in the message
 * - All errors support a `cause` property for wrapping underlying errors
 * - All errors have stable `name` and `code` fields for programmatic handling
 *
 * Lookup misses are not errors: searches return an empty list instead.
 */

/**
 * Base class for all record engine errors
 */
export abstract class RecordKitError extends Error {
  abstract readonly code: string;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Thrown when an input is structurally unusable: empty where a value is required,
 * out of range, or not hashable where hashing is required
 */
export class InvalidInputError extends RecordKitError {
  readonly code = "INVALID_INPUT";

  constructor(
    public readonly input: string,
    reason: string,
    options?: ErrorOptions
  ) {
    super(`Invalid ${input}: ${reason}`, options);
  }
}

/**
 * Thrown when an element has a type the operation cannot work with
 */
export class TypeMismatchError extends RecordKitError {
  readonly code = "TYPE_MISMATCH";

  constructor(
    public readonly input: string,
    public readonly expected: string,
    public readonly received: string,
    options?: ErrorOptions
  ) {
    super(`Type mismatch for ${input}: expected ${expected}, got ${received}`, options);
  }
}

/**
 * Check whether a value is one of the engine's errors
 */
export function isRecordKitError(value: unknown): value is RecordKitError {
  return value instanceof RecordKitError;
}
