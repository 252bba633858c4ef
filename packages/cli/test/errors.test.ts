/**
 * Unit tests for error handling
 */

import { describe, it, expect } from "vitest";
import { InvalidInputError, TypeMismatchError } from "@recordkit/engine";
import {
  CliError,
  ExternalToolError,
  mapEngineErrorToExitCode,
  formatCliError,
} from "../src/lib/errors.js";

describe("error handling", () => {
  describe("CliError", () => {
    it("should create error with default exit code 1", () => {
      const err = new CliError("test error");
      expect(err.message).toBe("test error");
      expect(err.exitCode).toBe(1);
      expect(err.name).toBe("CliError");
    });

    it("should create error with custom exit code and cause", () => {
      const cause = new Error("underlying error");
      const err = new CliError("not found", { exitCode: 2, cause });
      expect(err.exitCode).toBe(2);
      expect(err.cause).toBe(cause);
    });
  });

  describe("ExternalToolError", () => {
    it("should carry the tool's exit code and stderr", () => {
      const err = new ExternalToolError("magick", 1, "  unable to open image  \n");
      expect(err.message).toBe("magick exited with code 1: unable to open image");
      expect(err.exitCode).toBe(3);
      expect(err.toolExitCode).toBe(1);
      expect(err.name).toBe("ExternalToolError");
    });

    it("should omit the detail when stderr is empty", () => {
      expect(new ExternalToolError("ffmpeg", 255, "").message).toBe("ffmpeg exited with code 255");
    });
  });

  describe("mapEngineErrorToExitCode", () => {
    it("should use the exit code of CLI errors", () => {
      expect(mapEngineErrorToExitCode(new CliError("missing", { exitCode: 2 }))).toBe(2);
      expect(mapEngineErrorToExitCode(new ExternalToolError("ffmpeg", 1, ""))).toBe(3);
    });

    it("should map missing files to exit code 2", () => {
      const err: NodeJS.ErrnoException = new Error("ENOENT: no such file");
      err.code = "ENOENT";
      expect(mapEngineErrorToExitCode(err)).toBe(2);
    });

    it("should map engine validation errors to exit code 1", () => {
      expect(mapEngineErrorToExitCode(new InvalidInputError("numbers", "empty"))).toBe(1);
      expect(mapEngineErrorToExitCode(new TypeMismatchError("n", "integer", "string"))).toBe(1);
    });

    it("should default to exit code 1 for unknown errors", () => {
      expect(mapEngineErrorToExitCode(new Error("unknown"))).toBe(1);
      expect(mapEngineErrorToExitCode("string error")).toBe(1);
      expect(mapEngineErrorToExitCode(null)).toBe(1);
    });
  });

  describe("formatCliError", () => {
    it("should format Error instances", () => {
      expect(formatCliError(new Error("test message"))).toBe("test message");
    });

    it("should truncate long messages", () => {
      const formatted = formatCliError(new Error("a".repeat(3000)));
      expect(formatted).toBe("a".repeat(2000) + "... (truncated)");
    });

    it("should include cause and stack in verbose mode", () => {
      const err = new CliError("wrapper", { cause: new Error("underlying") });
      const formatted = formatCliError(err, true);
      expect(formatted.startsWith("wrapper\n  Cause: Error: underlying\n")).toBe(true);
    });

    it("should handle non-Error values", () => {
      expect(formatCliError("string error")).toBe("string error");
      expect(formatCliError(42)).toBe("42");
      expect(formatCliError(null)).toBe("null");
    });
  });
});
