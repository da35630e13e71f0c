/**
 * @file packages/program/src/steps/countUp.ts
 * @version 0.1.0
 * @scope Program package source code.
 * @description Bounded iteration over an inclusive integer range.
 */

/**
 * Yields `from`, `from + 1`, ... `to` (inclusive). Yields nothing when
 * `from > to`.
 */
export function* countUp(from: number, to: number): Generator<number, void> {
  for (let i = from; i <= to; i += 1) {
    yield i;
  }
}

export const formatNumber = (value: number): string => `Number: ${value}`;
