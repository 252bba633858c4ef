/**
 * In-process stand-in for external command-line tools
 */

import { writeFile } from "node:fs/promises";

export interface ToolCall {
  command: string;
  args: string[];
}

export interface FakeToolOptions {
  /** Exit code to report (default 0) */
  exitCode?: number;
  stderr?: string;
  /** Size of the output file written on success (default 10) */
  outputBytes?: number;
  /**
   * Fail only the calls this returns true for, with `exitCode` (default 1);
   * every other call succeeds
   */
  failsOn?: (args: readonly string[]) => boolean;
}

export interface FakeTool {
  run: (command: string, args: string[]) => Promise<{ exitCode: number; stdout: string; stderr: string }>;
  calls: ToolCall[];
}

/**
 * Output path of a tool invocation: the last argument that is not `-y`
 */
export function outputArg(args: readonly string[]): string | undefined {
  return args.filter((arg) => arg !== "-y").at(-1);
}

/**
 * Create a tool runner that records its calls and, on success, writes the output file
 */
export function createFakeTool(options: FakeToolOptions = {}): FakeTool {
  const { stderr = "", outputBytes = 10, failsOn } = options;
  const calls: ToolCall[] = [];

  return {
    calls,
    run: async (command, args) => {
      calls.push({ command, args: [...args] });

      let exitCode = options.exitCode ?? 0;
      if (failsOn) {
        exitCode = failsOn(args) ? options.exitCode ?? 1 : 0;
      }

      const output = outputArg(args);
      if (exitCode === 0 && output !== undefined) {
        await writeFile(output, Buffer.alloc(outputBytes));
      }

      return { exitCode, stdout: "", stderr: exitCode === 0 ? "" : stderr };
    },
  };
}
