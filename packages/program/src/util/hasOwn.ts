/**
 * @file packages/program/src/util/hasOwn.ts
 * @version 0.1.0
 * @scope Program package source code.
 * @description Own-property check used against code registries.
 */

/**
 * True when `key` is an own (non-inherited) property of `obj`, so that
 * `"toString"` or `"__proto__"` never count as registered keys.
 */
export function hasOwn<K extends PropertyKey>(
  obj: object,
  key: K,
): obj is Record<K, unknown> {
  return Object.prototype.hasOwnProperty.call(obj, key);
}
