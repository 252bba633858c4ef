/**
 * In-process CLI testing utilities
 */

import { vi } from "vitest";

/**
 * Anything with commander's `parseAsync`
 */
export interface ParsableProgram {
  parseAsync(argv: readonly string[], options: { from: "user" }): Promise<unknown>;
}

/**
 * Result of a CLI command execution
 */
export interface CliResult {
  /** console.log output, one entry per call */
  stdout: string[];
  /** console.error and process.stderr.write output */
  stderr: string[];
  /** Error the command rejected with, if any */
  error: unknown;
}

/**
 * Run a program with user arguments, capturing what it prints
 *
 * Output is captured only for the duration of the call.
 */
export async function runProgram(program: ParsableProgram, args: string[]): Promise<CliResult> {
  const stdout: string[] = [];
  const stderr: string[] = [];

  const log = vi.spyOn(console, "log").mockImplementation((...parts: unknown[]) => {
    stdout.push(parts.map(String).join(" "));
  });
  const error = vi.spyOn(console, "error").mockImplementation((...parts: unknown[]) => {
    stderr.push(parts.map(String).join(" "));
  });
  const write = vi.spyOn(process.stderr, "write").mockImplementation((chunk: string | Uint8Array) => {
    stderr.push(typeof chunk === "string" ? chunk : Buffer.from(chunk).toString("utf8"));
    return true;
  });

  let failure: unknown;
  try {
    await program.parseAsync(args, { from: "user" });
  } catch (err) {
    failure = err;
  } finally {
    log.mockRestore();
    error.mockRestore();
    write.mockRestore();
  }

  return { stdout, stderr, error: failure };
}

/**
 * Parse the JSON a command printed
 */
export function parseJsonOutput(stdout: readonly string[]): unknown {
  return JSON.parse(stdout.join("\n").trim());
}
