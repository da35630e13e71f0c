/**
 * @file packages/program/src/diagnostics/index.ts
 * @version 0.1.0
 * @scope Program package source code.
 * @description Diagnostics barrel.
 */

export {
  createDiagnosticCollector,
  type DiagnosticCollector,
  type DiagnosticListener,
  type ProgramDiagnostic,
} from "./emit.js";
export {
  DIAGNOSTIC_CODES,
  type DiagnosticCode,
  type DiagnosticSeverity,
} from "./codes.js";
