import type { DiagnosticCollector } from "../diagnostics/index.js";
import type { StepName } from "./plan.js";

export type ProgramErrorPhase = "output/write";

export type ProgramErrorContext = Readonly<{
  phase: ProgramErrorPhase;
  step: StepName;
}>;

export type ProgramOnError =
  | "throw"
  | "report"
  | ((error: unknown, ctx: ProgramErrorContext) => void);

export function handleProgramOnError(
  mode: ProgramOnError,
  diagnostics: DiagnosticCollector,
  error: unknown,
  ctx: ProgramErrorContext,
): void {
  diagnostics.emit({
    code: "program.output.failed",
    message: error instanceof Error ? error.message : "Output write failed",
    severity: "error",
    data: { ...ctx },
  });

  if (typeof mode === "function") {
    mode(error, ctx);
    return;
  }

  if (mode === "throw") {
    throw error;
  }
}
