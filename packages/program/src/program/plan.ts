/**
 * @file packages/program/src/program/plan.ts
 * @version 0.1.0
 * @scope Program package source code.
 * @description Ordered steps of a program run.
 */

import { computeBindings, formatBindings } from "../steps/bindings.js";
import { classifyDigits } from "../steps/classify.js";
import { countUp, formatNumber } from "../steps/countUp.js";
import { greet } from "../steps/greet.js";
import type { OutputSink } from "../output/sink.js";
import type { ProgramDefaults } from "./defaults.js";

export type StepName = "greeting" | "bindings" | "branch" | "loop" | "greet";

export type ProgramStep = Readonly<{
  name: StepName;
  run: (sink: OutputSink) => void;
}>;

/**
 * Every step but the last ends with a separator line.
 */
export function planSteps(values: ProgramDefaults): readonly ProgramStep[] {
  const separate = (sink: OutputSink): void => {
    sink.writeLine(values.separator);
  };

  return [
    {
      name: "greeting",
      run(sink) {
        sink.writeLine(values.greeting);
        separate(sink);
      },
    },
    {
      name: "bindings",
      run(sink) {
        sink.writeLine(formatBindings(computeBindings(values.bindings)));
        separate(sink);
      },
    },
    {
      name: "branch",
      run(sink) {
        const number = values.branch.value;
        sink.writeLine(classifyDigits(number, values.branch.threshold));
        separate(sink);
      },
    },
    {
      name: "loop",
      run(sink) {
        for (const i of countUp(values.range.from, values.range.to)) {
          sink.writeLine(formatNumber(i));
        }
        separate(sink);
      },
    },
    {
      name: "greet",
      run(sink) {
        greet(values.name, sink);
      },
    },
  ];
}
