/**
 * @file packages/program/src/program/defaults.ts
 * @version 0.1.0
 * @scope Program package source code.
 * @description Literal values of the program and their resolution.
 */

import { isSafeInteger } from "../util/guards.js";
import type { BindingLiterals } from "../steps/bindings.js";

export type BranchLiterals = Readonly<{
  value: number;
  threshold: number;
}>;

export type RangeLiterals = Readonly<{
  from: number;
  to: number;
}>;

export type ProgramDefaults = Readonly<{
  greeting: string;
  separator: string;
  bindings: BindingLiterals;
  branch: BranchLiterals;
  range: RangeLiterals;
  name: string;
}>;

export type ProgramOverrides = Readonly<{
  greeting?: string;
  separator?: string;
  bindings?: Partial<BindingLiterals>;
  branch?: Partial<BranchLiterals>;
  range?: Partial<RangeLiterals>;
  name?: string;
}>;

export type OptionsIssue = Readonly<{
  field: string;
  reason: string;
}>;

export const programDefaults: ProgramDefaults = Object.freeze({
  greeting: "Hello, world!",
  separator: "--------------",
  bindings: Object.freeze({ x: 5, y: 10, increment: 5 }),
  branch: Object.freeze({ value: 7, threshold: 10 }),
  range: Object.freeze({ from: 1, to: 5 }),
  name: "Rustacean",
});

/**
 * Merges overrides over {@link programDefaults} key by key. An override left
 * `undefined`, at any depth, keeps the default. The result is frozen.
 */
export function resolveProgramDefaults(
  overrides: ProgramOverrides = {},
): ProgramDefaults {
  const { bindings, branch, range } = programDefaults;

  return Object.freeze({
    greeting: overrides.greeting ?? programDefaults.greeting,
    separator: overrides.separator ?? programDefaults.separator,
    bindings: Object.freeze({
      x: overrides.bindings?.x ?? bindings.x,
      y: overrides.bindings?.y ?? bindings.y,
      increment: overrides.bindings?.increment ?? bindings.increment,
    }),
    branch: Object.freeze({
      value: overrides.branch?.value ?? branch.value,
      threshold: overrides.branch?.threshold ?? branch.threshold,
    }),
    range: Object.freeze({
      from: overrides.range?.from ?? range.from,
      to: overrides.range?.to ?? range.to,
    }),
    name: overrides.name ?? programDefaults.name,
  });
}

/**
 * Returns the first problem found in resolved values, or `undefined`.
 */
export function validateProgramDefaults(
  values: ProgramDefaults,
): OptionsIssue | undefined {
  const texts = [
    ["greeting", values.greeting],
    ["separator", values.separator],
    ["name", values.name],
  ] as const;

  for (const [field, text] of texts) {
    if (typeof text !== "string") {
      return { field, reason: "must be a string" };
    }
  }

  const integers = [
    ["bindings.x", values.bindings.x],
    ["bindings.y", values.bindings.y],
    ["bindings.increment", values.bindings.increment],
    ["branch.value", values.branch.value],
    ["branch.threshold", values.branch.threshold],
    ["range.from", values.range.from],
    ["range.to", values.range.to],
  ] as const;

  for (const [field, value] of integers) {
    if (!isSafeInteger(value)) {
      return { field, reason: "must be a safe integer" };
    }
  }

  if (!isSafeInteger(values.bindings.y + values.bindings.increment)) {
    return { field: "bindings.increment", reason: "sum overflows" };
  }

  if (values.range.from > values.range.to) {
    return { field: "range", reason: "from must not exceed to" };
  }

  return undefined;
}
