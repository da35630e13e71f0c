/**
 * @file packages/program/src/index.ts
 * @version 0.1.0
 * @scope Program package source code.
 * @description Public contract entrypoint for the program package.
 */

/**
 * Public value surface.
 *
 * Export only intentional public APIs; internal module paths stay private.
 */
export { main } from "./main.js";
export { createProgram, programLines, runProgram } from "./program.js";
export { programDefaults } from "./program/defaults.js";
export { greet, formatGreeting } from "./steps/greet.js";
export { classifyDigits } from "./steps/classify.js";
export { computeBindings, formatBindings } from "./steps/bindings.js";
export { countUp, formatNumber } from "./steps/countUp.js";
export { createMemorySink, createStdoutSink } from "./output/sink.js";
export { createDiagnosticCollector } from "./diagnostics/index.js";
