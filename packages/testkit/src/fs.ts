/**
 * File system test utilities
 */

import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

/**
 * Create a unique temporary directory for testing
 * @param prefix - Prefix for the temp directory (default: "recordkit-test-")
 * @returns Absolute path to temp directory
 */
export async function createTempDir(prefix = "recordkit-test-"): Promise<string> {
  return await mkdtemp(join(tmpdir(), prefix));
}

/**
 * Remove a directory recursively
 */
export async function removeDir(path: string): Promise<void> {
  await rm(path, { recursive: true, force: true });
}

/**
 * Execute a function with a clean temp directory
 * @returns Result of fn
 */
export async function withTempDir<T>(fn: (dir: string) => Promise<T>): Promise<T> {
  const dir = await createTempDir();
  try {
    return await fn(dir);
  } finally {
    await removeDir(dir);
  }
}

/**
 * Write a value as a JSON file and return its path
 */
export async function writeJson(dir: string, name: string, value: unknown): Promise<string> {
  const file = join(dir, name);
  await writeFile(file, JSON.stringify(value), "utf8");
  return file;
}

/**
 * Write values as newline-delimited JSON and return the file path
 */
export async function writeJsonLines(
  dir: string,
  name: string,
  values: readonly unknown[]
): Promise<string> {
  const file = join(dir, name);
  await writeFile(file, values.map((value) => JSON.stringify(value)).join("\n") + "\n", "utf8");
  return file;
}

/**
 * Write a file of exactly `bytes` zero bytes and return its path
 */
export async function writeSizedFile(dir: string, name: string, bytes: number): Promise<string> {
  const file = join(dir, name);
  await writeFile(file, Buffer.alloc(bytes));
  return file;
}
