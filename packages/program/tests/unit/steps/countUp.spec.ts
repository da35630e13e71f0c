/**
 * @file packages/program/tests/unit/steps/countUp.spec.ts
 * @version 0.1.0
 * @scope Program package test code.
 * @description Unit coverage for the inclusive range loop.
 */

import { describe, expect, it } from "vitest";

import { countUp, formatNumber } from "../../../src/steps/countUp.js";

describe("steps/countUp", () => {
  it("includes both bounds in ascending order", () => {
    expect([...countUp(1, 5)]).toEqual([1, 2, 3, 4, 5]);
  });

  it("yields a single value when the bounds are equal", () => {
    expect([...countUp(3, 3)]).toEqual([3]);
  });

  it("yields nothing when from exceeds to", () => {
    expect([...countUp(5, 1)]).toEqual([]);
  });

  it("crosses zero", () => {
    expect([...countUp(-2, 1)]).toEqual([-2, -1, 0, 1]);
  });

  it("is not restartable once drained", () => {
    const iterator = countUp(1, 2);
    expect([...iterator]).toEqual([1, 2]);
    expect([...iterator]).toEqual([]);
  });

  it("formats a number line", () => {
    expect(formatNumber(4)).toBe("Number: 4");
  });
});
