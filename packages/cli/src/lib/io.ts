/**
 * I/O helpers for CLI
 */

import * as fs from "node:fs/promises";
import { parseJson } from "./arg.js";
import type { Stats } from "node:fs";
import { CliError } from "./errors.js";
import type { CliDeps } from "./context.js";

/**
 * Read from stdin with size limit (default 10MB)
 * @param maxBytes - Maximum bytes to read (default 10MB)
 * @throws Error if input exceeds size limit
 */
export async function readStdin(maxBytes = 10 * 1024 * 1024): Promise<string> {
  return new Promise((resolve, reject) => {
    let data = "";
    let bytesRead = 0;
    process.stdin.setEncoding("utf8");

    process.stdin.on("data", (chunk) => {
      bytesRead += Buffer.byteLength(chunk, "utf8");

      // Enforce size limit during streaming to prevent memory exhaustion
      if (bytesRead > maxBytes) {
        process.stdin.pause();
        process.stdin.removeAllListeners();
        reject(new Error(`stdin too large (max ${Math.floor(maxBytes / (1024 * 1024))}MB)`));
        return;
      }

      data += chunk;
    });

    process.stdin.on("end", () => resolve(data));
    process.stdin.on("error", reject);
  });
}

/**
 * Read a text file, reporting a missing file with exit code 2
 */
export async function readTextFile(filePath: string): Promise<string> {
  try {
    return await fs.readFile(filePath, "utf8");
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") {
      throw new CliError(`Input file not found: ${filePath}`, { exitCode: 2, cause: err });
    }
    throw err;
  }
}

/**
 * Stat an input path, reporting a missing path with exit code 2
 */
export async function statInput(inputPath: string): Promise<Stats> {
  try {
    return await fs.stat(inputPath);
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") {
      throw new CliError(`Input file not found: ${inputPath}`, { exitCode: 2, cause: err });
    }
    throw err;
  }
}

/**
 * Read a JSON document from `--input <file>`, or from stdin when no file is given
 */
export async function readJsonInput(
  file: string | undefined,
  deps: Pick<CliDeps, "readStdin" | "isStdinTTY">
): Promise<unknown> {
  if (file !== undefined) {
    return readJsonFromFile(file);
  }

  if (deps.isStdinTTY()) {
    throw new CliError("No input provided. Use --input or pipe JSON to stdin");
  }

  let stdin: string;
  try {
    stdin = await deps.readStdin(); // Size limit enforced during streaming
  } catch (err) {
    throw new CliError(err instanceof Error ? err.message : "Failed to read from stdin", {
      cause: err,
    });
  }

  if (!stdin.trim()) {
    throw new CliError("stdin is empty");
  }

  return parseJson(stdin, "stdin");
}

/**
 * Read JSON from a file
 */
export async function readJsonFromFile(filePath: string): Promise<unknown> {
  const content = await readTextFile(filePath);
  return parseJson(content, `file ${filePath}`);
}

/**
 * Parse newline-delimited JSON; blank lines are skipped
 */
export function parseJsonLines(content: string, source: string): unknown[] {
  const values: unknown[] = [];
  const lines = content.split(/\r?\n/);

  lines.forEach((line, i) => {
    if (line.trim() === "") {
      return;
    }
    values.push(parseJson(line, `${source}:${i + 1}`));
  });

  return values;
}

/**
 * Read newline-delimited JSON from a file
 */
export async function readJsonLines(filePath: string): Promise<unknown[]> {
  const content = await readTextFile(filePath);
  return parseJsonLines(content, filePath);
}

/**
 * Write to stderr
 */
export function writeStderr(content: string): void {
  process.stderr.write(content);
}

/**
 * Check if stdin is a TTY (interactive terminal)
 */
export function isStdinTTY(): boolean {
  return process.stdin.isTTY ?? false;
}
