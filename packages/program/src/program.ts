/**
 * @file packages/program/src/program.ts
 * @version 0.1.0
 * @scope Program package source code.
 * @description Program public API facade and run wiring.
 */

import {
  createDiagnosticCollector,
  type DiagnosticCollector,
  type DiagnosticListener,
} from "./diagnostics/index.js";
import {
  createMemorySink,
  createStdoutSink,
  type OutputSink,
} from "./output/sink.js";
import {
  resolveProgramDefaults,
  validateProgramDefaults,
  type ProgramOverrides,
} from "./program/defaults.js";
import { handleProgramOnError, type ProgramOnError } from "./program/onError.js";
import { planSteps } from "./program/plan.js";

export type ProgramOptions = ProgramOverrides &
  Readonly<{
    sink?: OutputSink;
    onError?: ProgramOnError;
    diagnostics?: DiagnosticCollector;
  }>;

export type Program = Readonly<{
  run: () => void;
  onDiagnostic: (handler: DiagnosticListener) => () => void;
}>;

/**
 * `program.options.invalid` is only recorded on a collector passed in through
 * `options.diagnostics`; without one there is nothing to subscribe to yet.
 */
function rejectOptions(
  diagnostics: DiagnosticCollector | undefined,
  field: string,
  reason: string,
): never {
  diagnostics?.emit({
    code: "program.options.invalid",
    message: `${field} ${reason}`,
    severity: "error",
    data: { field, reason },
  });
  throw new Error("program.options.invalid");
}

/**
 * Builds a program over resolved literal values. Options are validated here,
 * before any line is written; each `run()` is one full pass over the steps.
 */
export function createProgram(options: ProgramOptions = {}): Program {
  const values = resolveProgramDefaults(options);

  const issue = validateProgramDefaults(values);
  if (issue !== undefined) {
    rejectOptions(options.diagnostics, issue.field, issue.reason);
  }

  const onError: ProgramOnError = options.onError ?? "throw";
  const sink = options.sink ?? createStdoutSink();
  const diagnostics = options.diagnostics ?? createDiagnosticCollector();

  const steps = planSteps(values);

  function run(): void {
    let lines = 0;
    const counted: OutputSink = {
      writeLine(line) {
        sink.writeLine(line);
        lines += 1;
      },
    };

    diagnostics.emit({
      code: "program.run.started",
      message: "Program run started",
      severity: "info",
      data: { steps: steps.length },
    });

    for (const step of steps) {
      try {
        step.run(counted);
      } catch (error) {
        handleProgramOnError(onError, diagnostics, error, {
          phase: "output/write",
          step: step.name,
        });
        diagnostics.emit({
          code: "program.run.aborted",
          message: `Program run stopped at ${step.name}`,
          severity: "warn",
          data: { step: step.name, lines },
        });
        return;
      }

      diagnostics.emit({
        code: "program.step.completed",
        message: `Step ${step.name} completed`,
        severity: "info",
        data: { step: step.name, lines },
      });
    }

    diagnostics.emit({
      code: "program.run.completed",
      message: "Program run completed",
      severity: "info",
      data: { lines },
    });
  }

  return {
    run,
    onDiagnostic(handler) {
      return diagnostics.subscribe(handler);
    },
  };
}

export function runProgram(options: ProgramOptions = {}): void {
  createProgram(options).run();
}

/** Lines one run would write, collected in memory. */
export function programLines(
  overrides: ProgramOverrides = {},
): readonly string[] {
  const sink = createMemorySink();
  runProgram({ ...overrides, sink });
  return sink.lines();
}
