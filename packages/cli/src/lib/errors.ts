/**
 * CLI error handling and exit code mapping
 */

/**
 * Base CLI error class
 */
export class CliError extends Error {
  exitCode: number;

  constructor(message: string, options?: { exitCode?: number; cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.name = "CliError";
    this.exitCode = options?.exitCode ?? 1;
  }
}

/**
 * Thrown when an external optimizer exits with a non-zero code
 */
export class ExternalToolError extends CliError {
  constructor(
    public readonly tool: string,
    public readonly toolExitCode: number,
    public readonly stderr: string
  ) {
    const detail = stderr.trim();
    super(`${tool} exited with code ${toolExitCode}${detail ? `: ${detail}` : ""}`, {
      exitCode: 3,
    });
    this.name = "ExternalToolError";
  }
}

/**
 * Map engine and CLI errors to exit codes
 * - 0: success
 * - 1: usage/validation/unknown error
 * - 2: input file not found
 * - 3: external tool failure
 */
export function mapEngineErrorToExitCode(error: unknown): number {
  // Check for CliError first (has exitCode property)
  if (error instanceof CliError) {
    return error.exitCode;
  }

  if (isErrnoException(error) && error.code === "ENOENT") {
    return 2;
  }

  // Engine validation errors, commander usage errors and anything else
  return 1;
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error;
}

/**
 * Format an error for CLI output
 */
export function formatCliError(error: unknown, verbose = false): string {
  if (error instanceof Error) {
    let message = error.message;

    // Redact large payloads from error messages
    if (message.length > 2000) {
      message = message.substring(0, 2000) + "... (truncated)";
    }

    if (verbose && error.cause) {
      message += `\n  Cause: ${String(error.cause)}`;
    }

    if (verbose && error.stack) {
      message += `\n${error.stack}`;
    }

    return message;
  }

  return String(error);
}
