/**
 * @file packages/program/tsup.config.ts
 * @version 0.1.0
 * @scope Program package configuration.
 * @description tsup build configuration for the program package.
 */

import { defineConfig } from "tsup";

export default defineConfig({
  entry: ["src/index.ts", "src/index.types.ts", "src/cli.ts"],
  format: ["esm"],
  platform: "node",
  target: "es2022",
  dts: true,
  sourcemap: true,
  clean: true,
  treeshake: true,
});
