/**
 * @file packages/program/src/steps/bindings.ts
 * @version 0.1.0
 * @scope Program package source code.
 * @description Immutable and mutable integer bindings.
 */

export type BindingLiterals = Readonly<{
  x: number;
  y: number;
  increment: number;
}>;

export type Bindings = Readonly<{
  x: number;
  y: number;
}>;

export function computeBindings(literals: BindingLiterals): Bindings {
  const x = literals.x;
  let y = literals.y;
  y += literals.increment;

  return { x, y };
}

export function formatBindings({ x, y }: Bindings): string {
  return `x: ${x}, y: ${y}`;
}
