// pattern: Imperative Shell
import { defineConfig, mergeConfig } from "vitest/config";

import workspaceConfig from "../../vitest.config.js";

export default mergeConfig(
  workspaceConfig,
  defineConfig({
    test: {
      // Only unit tests for this package
      include: ["src/**/*.{test,spec}.ts"],
      exclude: ["node_modules", "dist"],

      coverage: {
        include: ["src/**/*.ts"],
        exclude: [
          "node_modules",
          "dist",
          "**/*.{test,spec}.ts",
          "**/*.d.ts",
          "src/bin/**",
        ],
      },
    },
  })
);
