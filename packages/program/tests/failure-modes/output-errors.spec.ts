/**
 * @file packages/program/tests/failure-modes/output-errors.spec.ts
 * @version 0.1.0
 * @scope Program package test code.
 * @description Output sink failures under each onError mode.
 */

import { describe, expect, it, vi } from "vitest";

import {
  createDiagnosticCollector,
  createProgram,
  main,
} from "../../src/index.js";
import type { OutputSink } from "../../src/output/sink.js";

/** Sink that accepts `okLines` lines and throws on the next write. */
function createFailingSink(okLines: number) {
  const written: string[] = [];
  const sink: OutputSink = {
    writeLine(line) {
      if (written.length === okLines) {
        throw new Error("EPIPE");
      }
      written.push(line);
    },
  };

  return { sink, written };
}

describe("failure-modes/output-errors", () => {
  it("propagates a write failure by default and records it", () => {
    const { sink, written } = createFailingSink(2);
    const diagnostics = createDiagnosticCollector();
    const program = createProgram({ sink, diagnostics });

    expect(() => program.run()).toThrow("EPIPE");

    expect(written).toEqual(["Hello, world!", "--------------"]);
    expect(diagnostics.list().map((d) => d.code)).toEqual([
      "program.run.started",
      "program.step.completed",
      "program.output.failed",
    ]);
    expect(diagnostics.list()[2]?.data).toEqual({
      phase: "output/write",
      step: "bindings",
    });
  });

  it("lets main propagate the failure to its caller", () => {
    const { sink } = createFailingSink(0);

    expect(() => main(sink)).toThrow("EPIPE");
  });

  it("stops the run without throwing in report mode", () => {
    const { sink, written } = createFailingSink(7);
    const diagnostics = createDiagnosticCollector();
    const program = createProgram({ sink, diagnostics, onError: "report" });

    expect(() => program.run()).not.toThrow();

    expect(written).toHaveLength(7);
    expect(written.at(-1)).toBe("Number: 1");
    expect(diagnostics.list().slice(-2)).toEqual([
      {
        code: "program.output.failed",
        message: "EPIPE",
        severity: "error",
        data: { phase: "output/write", step: "loop" },
      },
      {
        code: "program.run.aborted",
        message: "Program run stopped at loop",
        severity: "warn",
        data: { step: "loop", lines: 7 },
      },
    ]);
  });

  it("hands the failure to an onError callback and stops the run", () => {
    const { sink, written } = createFailingSink(12);
    const onError = vi.fn();
    const program = createProgram({ sink, onError });

    program.run();

    expect(written).toHaveLength(12);
    expect(onError).toHaveBeenCalledTimes(1);
    expect(onError.mock.calls[0]?.[1]).toEqual({
      phase: "output/write",
      step: "greet",
    });
    expect(onError.mock.calls[0]?.[0]).toBeInstanceOf(Error);
  });
});
