/**
 * Command-line program definition
 */

import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { dirname, join } from "node:path";
import { Command } from "commander";
import { isRecord } from "@recordkit/engine";
import { createDataCommands } from "./commands/data.js";
import { createOptimizeCommands } from "./commands/optimize.js";
import { setVerbose } from "./lib/env.js";
import { isStdinTTY, readStdin } from "./lib/io.js";
import { execaRunner } from "./lib/optimizer.js";
import { colorize } from "./lib/render.js";
import type { CliDeps, GlobalOptions } from "./lib/context.js";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

function readVersion(): string {
  // Read package.json for version
  const packageJson: unknown = JSON.parse(readFileSync(join(__dirname, "../package.json"), "utf-8"));
  return isRecord(packageJson) && typeof packageJson.version === "string"
    ? packageJson.version
    : "0.0.0";
}

/**
 * Build the `recordkit` program
 *
 * Commander errors are thrown as CommanderError instead of exiting, so callers
 * decide how to exit.
 */
export function createProgram(overrides: Partial<CliDeps> = {}): Command {
  const deps: CliDeps = {
    runTool: execaRunner,
    readStdin: () => readStdin(),
    isStdinTTY,
    ...overrides,
  };

  const program = new Command();

  // Settings below are inherited by every subcommand added afterwards
  program
    .configureOutput({
      writeErr: (str) => process.stderr.write(colorize(str, "red", process.stderr)),
    })
    .exitOverride();

  // Global options
  program
    .name("recordkit")
    .description("recordkit - in-memory record processing and media optimization")
    .version(readVersion())
    .option("--verbose", "Verbose diagnostics (metrics on stderr)")
    .option("--quiet", "Suppress non-error output")
    .option("--raw", "Print compact JSON")
    .hook("preAction", () => {
      if (program.opts<GlobalOptions>().verbose) {
        setVerbose(true);
      }
    });

  createDataCommands(program, deps);
  createOptimizeCommands(program, deps);

  return program;
}
