/**
 * @file packages/program/src/diagnostics/codes.ts
 * @version 0.1.0
 * @scope Program package source code.
 * @description Diagnostic code registry.
 */

/**
 * Diagnostic code registry.
 *
 * Single source of truth for:
 * - code -> { description, severity, shape }
 */
export type DiagnosticSeverity = "info" | "warn" | "error";

export interface DiagnosticCodeSpec {
  readonly description: string;
  readonly severity: DiagnosticSeverity;
  readonly shape: Record<string, unknown>;
}

export const DIAGNOSTIC_CODES = {
  "program.run.started": {
    description: "A program run started.",
    severity: "info",
    shape: {
      steps: "number",
    },
  },
  "program.step.completed": {
    description: "A program step wrote all of its lines.",
    severity: "info",
    shape: {
      step: "greeting|bindings|branch|loop|greet",
      lines: "number",
    },
  },
  "program.run.completed": {
    description: "A program run wrote every line.",
    severity: "info",
    shape: {
      lines: "number",
    },
  },
  "program.run.aborted": {
    description: "A program run stopped after a reported output failure.",
    severity: "warn",
    shape: {
      step: "string",
      lines: "number",
    },
  },
  "program.output.failed": {
    description: "Writing a line to the output sink failed.",
    severity: "error",
    shape: {
      phase: "output/write",
      step: "string",
    },
  },
  "program.options.invalid": {
    description: "Program options were rejected before the run.",
    severity: "error",
    shape: {
      field: "string",
      reason: "string",
    },
  },
  "program.diagnostic.listenerError": {
    description: "Diagnostic listener threw while processing a diagnostic.",
    severity: "error",
    shape: {
      phase: "diagnostic/listener",
      handlerName: "string?",
    },
  },
} as const satisfies Record<string, DiagnosticCodeSpec>;

export type DiagnosticCode = keyof typeof DIAGNOSTIC_CODES;
