import { defineConfig, mergeConfig } from "vitest/config";
import base from "./vitest.config.js";

// Timing checks, kept out of the default test run
export default mergeConfig(
  base,
  defineConfig({
    test: {
      include: ["packages/*/benchmarks/**/*.bench.ts"],
    },
  })
);
