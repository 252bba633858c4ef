/**
 * Environment and configuration resolution
 */

import { CliError } from "./errors.js";

let verboseOverride = false;

/**
 * Turn on verbose output for the rest of the process (set by --verbose)
 */
export function setVerbose(enabled: boolean): void {
  verboseOverride = enabled;
}

/**
 * Check if running in verbose mode
 */
export function isVerbose(): boolean {
  return verboseOverride || process.env.RECORDKIT_CLI_DEBUG === "1";
}

/**
 * Check if output is a TTY
 */
export function isTTY(): boolean {
  return process.stdout.isTTY ?? false;
}

/**
 * Resolve the Fibonacci cache capacity
 * Priority: CLI option > RECORDKIT_CACHE_SIZE env var > unbounded
 */
export function resolveCacheSize(cliSize?: number): number | undefined {
  if (cliSize !== undefined) {
    return cliSize;
  }

  const raw = process.env.RECORDKIT_CACHE_SIZE;
  if (raw === undefined || raw.trim() === "") {
    return undefined;
  }

  if (!/^\d+$/.test(raw.trim())) {
    throw new CliError(`RECORDKIT_CACHE_SIZE must be a positive integer, got "${raw}"`);
  }

  return Number.parseInt(raw.trim(), 10);
}

export type ExternalTool = "magick" | "ffmpeg";

const TOOL_ENV: Record<ExternalTool, string> = {
  magick: "RECORDKIT_MAGICK_BIN",
  ffmpeg: "RECORDKIT_FFMPEG_BIN",
};

/**
 * Resolve the executable for an external optimizer
 * Priority: RECORDKIT_MAGICK_BIN / RECORDKIT_FFMPEG_BIN > bare tool name on PATH
 */
export function resolveToolBin(tool: ExternalTool): string {
  const configured = process.env[TOOL_ENV[tool]];
  return configured && configured.trim() !== "" ? configured : tool;
}
