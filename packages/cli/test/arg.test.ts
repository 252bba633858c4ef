/**
 * Unit tests for argument parsing
 */

import { describe, it, expect } from "vitest";
import { InvalidArgumentError } from "commander";
import {
  parseNonNegativeInt,
  parseIntInRange,
  parseNumber,
  parseJson,
  parseJsonValue,
  parseResolution,
  parseBitrate,
} from "../src/lib/arg.js";
import { CliError } from "../src/lib/errors.js";

describe("arg parsing", () => {
  describe("parseNonNegativeInt", () => {
    it("should parse valid non-negative integers", () => {
      expect(parseNonNegativeInt("0", "n")).toBe(0);
      expect(parseNonNegativeInt(" 42 ", "n")).toBe(42);
      expect(parseNonNegativeInt("10000", "n")).toBe(10000);
    });

    it("should reject negative numbers and non-numbers", () => {
      expect(() => parseNonNegativeInt("-1", "n")).toThrow(InvalidArgumentError);
      expect(() => parseNonNegativeInt("abc", "n")).toThrow("n must be a non-negative integer");
      expect(() => parseNonNegativeInt("1.5", "n")).toThrow("n must be a non-negative integer");
    });

    it("should enforce the maximum", () => {
      expect(() => parseNonNegativeInt("10001", "n")).toThrow("n must be <= 10000");
      expect(parseNonNegativeInt("50000", "n", 50000)).toBe(50000);
    });
  });

  describe("parseIntInRange", () => {
    it("should accept bounds inclusively", () => {
      expect(parseIntInRange("1", "--quality", 1, 100)).toBe(1);
      expect(parseIntInRange("100", "--quality", 1, 100)).toBe(100);
    });

    it("should reject values outside the range", () => {
      expect(() => parseIntInRange("0", "--quality", 1, 100)).toThrow(
        "--quality must be between 1 and 100"
      );
      expect(() => parseIntInRange("high", "--quality", 1, 100)).toThrow(
        "--quality must be an integer"
      );
    });
  });

  describe("parseNumber", () => {
    it("should parse integers, decimals and negatives", () => {
      expect(parseNumber("5", "--threshold")).toBe(5);
      expect(parseNumber("-2.5", "--threshold")).toBe(-2.5);
    });

    it("should reject empty and non-finite input", () => {
      expect(() => parseNumber("", "--threshold")).toThrow("--threshold must be a finite number");
      expect(() => parseNumber("Infinity", "--threshold")).toThrow(InvalidArgumentError);
      expect(() => parseNumber("ten", "--threshold")).toThrow(InvalidArgumentError);
    });
  });

  describe("parseJson", () => {
    it("should parse valid JSON", () => {
      expect(parseJson('{"a":1}', "test")).toEqual({ a: 1 });
      expect(parseJson("[1,2,3]", "test")).toEqual([1, 2, 3]);
      expect(parseJson("null", "test")).toBe(null);
    });

    it("should handle BOM", () => {
      expect(parseJson("\uFEFF" + "[1]", "test")).toEqual([1]);
    });

    it("should reject invalid JSON with a CliError naming the source", () => {
      expect(() => parseJson("{", "stdin")).toThrow(CliError);
      expect(() => parseJson("{", "stdin")).toThrow("Invalid JSON in stdin");
    });
  });

  describe("parseJsonValue", () => {
    it("should decode JSON literals", () => {
      expect(parseJsonValue("2")).toBe(2);
      expect(parseJsonValue("true")).toBe(true);
      expect(parseJsonValue('"2"')).toBe("2");
      expect(parseJsonValue("null")).toBe(null);
    });

    it("should fall back to the raw string", () => {
      expect(parseJsonValue("open")).toBe("open");
      expect(parseJsonValue("in progress")).toBe("in progress");
    });
  });

  describe("parseResolution", () => {
    it("should accept WIDTHxHEIGHT", () => {
      expect(parseResolution("1920x1080", "--resolution")).toBe("1920x1080");
    });

    it("should reject other shapes", () => {
      expect(() => parseResolution("1920", "--resolution")).toThrow(
        "--resolution must look like 1280x720"
      );
      expect(() => parseResolution("0x720", "--resolution")).toThrow(InvalidArgumentError);
    });
  });

  describe("parseBitrate", () => {
    it("should accept plain and suffixed rates", () => {
      expect(parseBitrate("2M", "--bitrate")).toBe("2M");
      expect(parseBitrate("800k", "--bitrate")).toBe("800k");
      expect(parseBitrate("1500000", "--bitrate")).toBe("1500000");
    });

    it("should reject unknown suffixes", () => {
      expect(() => parseBitrate("2X", "--bitrate")).toThrow(
        "--bitrate must be a number with an optional k/M/G suffix"
      );
    });
  });
});
