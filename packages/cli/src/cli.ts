#!/usr/bin/env node

/**
 * recordkit CLI entry point
 */

import { CommanderError } from "commander";
import { createProgram } from "./program.js";
import { formatCliError, mapEngineErrorToExitCode } from "./lib/errors.js";
import type { GlobalOptions } from "./lib/context.js";

// Top-level error handler
async function main(): Promise<void> {
  const program = createProgram();

  try {
    await program.parseAsync(process.argv);
  } catch (err) {
    // Commander has already written its own message (or help/version output)
    if (err instanceof CommanderError) {
      process.exitCode = err.exitCode;
      return;
    }

    const opts = program.opts<GlobalOptions>();
    console.error(`Error: ${formatCliError(err, opts.verbose)}`);
    process.exitCode = mapEngineErrorToExitCode(err);
  }
}

void main();
