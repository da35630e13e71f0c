/**
 * @file packages/program/src/util/guards.ts
 * @version 0.1.0
 * @scope Program package source code.
 * @description Small runtime type guards for option validation.
 */

export function isPlainObject(
  value: unknown,
): value is Record<string, unknown> {
  return (
    typeof value === "object" &&
    value !== null &&
    Object.getPrototypeOf(value) === Object.prototype
  );
}

export function isSafeInteger(value: unknown): value is number {
  return typeof value === "number" && Number.isSafeInteger(value);
}
