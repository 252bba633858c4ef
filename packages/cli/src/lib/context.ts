/**
 * Shared command context
 */

import type { ToolRunner } from "./optimizer.js";

/**
 * Side effects commands depend on; tests swap these for in-process fakes
 */
export interface CliDeps {
  runTool: ToolRunner;
  readStdin: () => Promise<string>;
  isStdinTTY: () => boolean;
}

export interface GlobalOptions {
  verbose?: boolean;
  quiet?: boolean;
  raw?: boolean;
}
