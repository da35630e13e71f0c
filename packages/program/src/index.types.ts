/**
 * @file packages/program/src/index.types.ts
 * @version 0.1.0
 * @scope Program package source code.
 * @description Public type entrypoint for the program package.
 */

export type { Program, ProgramOptions } from "./program.js";
export type {
  BranchLiterals,
  ProgramDefaults,
  ProgramOverrides,
  RangeLiterals,
} from "./program/defaults.js";
export type {
  ProgramErrorContext,
  ProgramErrorPhase,
  ProgramOnError,
} from "./program/onError.js";
export type { StepName } from "./program/plan.js";
export type { BindingLiterals, Bindings } from "./steps/bindings.js";
export type { DigitClass } from "./steps/classify.js";
export type { LineStream, MemorySink, OutputSink } from "./output/sink.js";
export type {
  DiagnosticCode,
  DiagnosticCollector,
  DiagnosticListener,
  DiagnosticSeverity,
  ProgramDiagnostic,
} from "./diagnostics/index.js";
