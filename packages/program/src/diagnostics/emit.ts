/**
 * @file packages/program/src/diagnostics/emit.ts
 * @version 0.1.0
 * @scope Program package source code.
 * @description Diagnostic collector for program runs.
 */

import { DIAGNOSTIC_CODES, type DiagnosticSeverity } from "./codes.js";
import { hasOwn } from "../util/hasOwn.js";
import { isPlainObject } from "../util/guards.js";

export interface ProgramDiagnostic<TCode extends string = string> {
  readonly code: TCode;
  readonly message: string;
  readonly severity?: DiagnosticSeverity;
  readonly data?: Record<string, unknown>;
}

export type DiagnosticListener = (diagnostic: ProgramDiagnostic) => void;

export interface DiagnosticCollector {
  emit: (diagnostic: ProgramDiagnostic) => ProgramDiagnostic;
  subscribe: (handler: DiagnosticListener) => () => void;
  readonly list: () => readonly ProgramDiagnostic[];
  clear: () => void;
}

const isTestMode = (): boolean =>
  process.env.NODE_ENV === "test" || process.env.VITEST === "true";

function snapshot(diagnostic: ProgramDiagnostic): ProgramDiagnostic {
  const data = isPlainObject(diagnostic.data)
    ? Object.freeze({ ...diagnostic.data })
    : undefined;

  return Object.freeze(
    data === undefined ? { ...diagnostic } : { ...diagnostic, data },
  );
}

function listenerFailure(
  error: unknown,
  listener: DiagnosticListener,
): ProgramDiagnostic {
  return {
    code: "program.diagnostic.listenerError",
    message:
      error instanceof Error ? error.message : "Diagnostic listener failed",
    severity: "error",
    data: {
      phase: "diagnostic/listener",
      ...(listener.name !== "" ? { handlerName: listener.name } : {}),
    },
  };
}

/**
 * Collects frozen diagnostics and fans them out to subscribers.
 *
 * A subscriber that throws does not stop the run or the other subscribers.
 * Its failure is recorded as `program.diagnostic.listenerError`, and failures
 * while delivering that record are not reported again.
 */
export function createDiagnosticCollector(): DiagnosticCollector {
  const recorded: ProgramDiagnostic[] = [];
  const listeners = new Set<DiagnosticListener>();

  const record = (
    diagnostic: ProgramDiagnostic,
    reportFailures: boolean,
  ): ProgramDiagnostic => {
    if (!hasOwn(DIAGNOSTIC_CODES, diagnostic.code) && isTestMode()) {
      throw new Error("diagnostics.code.unknown");
    }

    const frozen = snapshot(diagnostic);
    recorded.push(frozen);

    const failures: ProgramDiagnostic[] = [];
    for (const listener of [...listeners]) {
      try {
        listener(frozen);
      } catch (error) {
        failures.push(listenerFailure(error, listener));
      }
    }

    if (reportFailures) {
      for (const failure of failures) {
        record(failure, false);
      }
    }

    return frozen;
  };

  return {
    emit(diagnostic) {
      return record(diagnostic, true);
    },
    subscribe(handler) {
      listeners.add(handler);
      return () => {
        listeners.delete(handler);
      };
    },
    list() {
      return recorded.slice();
    },
    clear() {
      recorded.length = 0;
    },
  };
}
