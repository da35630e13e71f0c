/**
 * @file packages/program/vitest.config.ts
 * @version 0.1.0
 * @scope Program package configuration.
 * @description Vitest configuration for the program package.
 */

import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["tests/**/*.spec.ts"],
    exclude: ["dist/**"],
  },
});
