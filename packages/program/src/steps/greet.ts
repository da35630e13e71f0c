/**
 * @file packages/program/src/steps/greet.ts
 * @version 0.1.0
 * @scope Program package source code.
 * @description Greeter.
 */

import type { OutputSink } from "../output/sink.js";

export const formatGreeting = (name: string): string => `Hello, ${name}!`;

// `name` is interpolated verbatim, empty strings included.
export function greet(name: string, sink: OutputSink): void {
  sink.writeLine(formatGreeting(name));
}
