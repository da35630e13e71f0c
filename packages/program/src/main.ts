/**
 * @file packages/program/src/main.ts
 * @version 0.1.0
 * @scope Program package source code.
 * @description Process entry routine.
 */

import { createStdoutSink, type OutputSink } from "./output/sink.js";
import { runProgram } from "./program.js";

/**
 * Runs the program with its fixed literals. Output goes to stdout unless a
 * sink is given; a failing write propagates to the caller.
 */
export function main(sink: OutputSink = createStdoutSink()): void {
  runProgram({ sink });
}
