/**
 * Argument parsing and validation helpers
 */

import { InvalidArgumentError } from "commander";
import { CliError } from "./errors.js";

/**
 * Parse a non-negative integer argument
 */
export function parseNonNegativeInt(value: string, name: string, max = 10000): number {
  const trimmed = value.trim();

  if (!/^\d+$/.test(trimmed)) {
    throw new InvalidArgumentError(`${name} must be a non-negative integer`);
  }

  const parsed = Number.parseInt(trimmed, 10);

  // Enforce reasonable max to prevent runaway computations
  if (parsed > max) {
    throw new InvalidArgumentError(`${name} must be <= ${max}`);
  }

  return parsed;
}

/**
 * Parse an integer within an inclusive range
 */
export function parseIntInRange(value: string, name: string, min: number, max: number): number {
  const trimmed = value.trim();

  if (!/^-?\d+$/.test(trimmed)) {
    throw new InvalidArgumentError(`${name} must be an integer`);
  }

  const parsed = Number.parseInt(trimmed, 10);
  if (parsed < min || parsed > max) {
    throw new InvalidArgumentError(`${name} must be between ${min} and ${max}`);
  }

  return parsed;
}

/**
 * Parse a finite number (integer or decimal)
 */
export function parseNumber(value: string, name: string): number {
  const trimmed = value.trim();
  const parsed = trimmed === "" ? Number.NaN : Number(trimmed);

  if (!Number.isFinite(parsed)) {
    throw new InvalidArgumentError(`${name} must be a finite number`);
  }

  return parsed;
}

/**
 * Parse JSON document content with descriptive error messages
 *
 * Fails with a CliError rather than InvalidArgumentError: document content
 * is parsed inside command actions, after commander has finished parsing.
 */
export function parseJson(value: string, source: string): unknown {
  try {
    // Strip BOM if present
    const cleaned = value.charCodeAt(0) === 0xfeff ? value.slice(1) : value;
    return JSON.parse(cleaned);
  } catch (err) {
    if (err instanceof SyntaxError) {
      throw new CliError(`Invalid JSON in ${source}: ${err.message}`, { cause: err });
    }
    throw err;
  }
}

/**
 * Parse a field value given on the command line
 *
 * Valid JSON is decoded (`2` → 2, `true` → true, `"2"` → "2"); anything else
 * is taken as a literal string (`open` → "open").
 */
export function parseJsonValue(value: string): unknown {
  try {
    return JSON.parse(value);
  } catch {
    return value;
  }
}

/**
 * Parse a WIDTHxHEIGHT resolution
 */
export function parseResolution(value: string, name: string): string {
  const trimmed = value.trim();
  if (!/^[1-9]\d*x[1-9]\d*$/.test(trimmed)) {
    throw new InvalidArgumentError(`${name} must look like 1280x720`);
  }
  return trimmed;
}

/**
 * Parse an FFmpeg bitrate such as 2M, 800k or 1500000
 */
export function parseBitrate(value: string, name: string): string {
  const trimmed = value.trim();
  if (!/^\d+(?:\.\d+)?[kKmMgG]?$/.test(trimmed)) {
    throw new InvalidArgumentError(`${name} must be a number with an optional k/M/G suffix`);
  }
  return trimmed;
}
