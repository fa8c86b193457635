/**
 * Runtime Safety Primitives
 *
 * - `invariant(condition, message)` — Runtime assertion
 * - `debugOnly(fn)` — Code that only runs when `config.debug` is on
 *
 * @example
 * ```typescript
 * function frac(a: number, b: number): number {
 *   invariant(b !== 0, "Division by zero");
 *   return a / b;
 * }
 * ```
 */

import { config } from "./config.js";

/**
 * Runtime invariant check.
 *
 * @param condition - The condition that must be true
 * @param message - Error message if the invariant is violated
 * @throws Error if condition is false
 */
export function invariant(condition: boolean, message?: string): asserts condition {
  if (!condition) {
    throw new Error(message ?? "Invariant violation");
  }
}

/**
 * Run `fn` only when debug mode is enabled.
 */
export function debugOnly(fn: () => void): void {
  if (config.has("debug")) {
    fn();
  }
}
