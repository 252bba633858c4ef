export { createTempDir, removeDir, withTempDir, writeJson, writeJsonLines, writeSizedFile } from "./fs.js";
export { runProgram, parseJsonOutput, type CliResult, type ParsableProgram } from "./cli.js";
export { createFakeTool, outputArg, type FakeTool, type FakeToolOptions, type ToolCall } from "./tools.js";
