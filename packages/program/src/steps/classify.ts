/**
 * @file packages/program/src/steps/classify.ts
 * @version 0.1.0
 * @scope Program package source code.
 * @description Two-way branch on a strict less-than comparison.
 */

export type DigitClass = "Single digit" | "Double digit";

export const DIGIT_THRESHOLD = 10;

export function classifyDigits(
  value: number,
  threshold: number = DIGIT_THRESHOLD,
): DigitClass {
  if (value < threshold) {
    return "Single digit";
  }

  return "Double digit";
}
