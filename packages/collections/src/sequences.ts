/**
 * Sequence helpers
 */

/**
 * Values that occur more than once, each reported once, in ascending order.
 * Equality is `Object.is`, so `NaN` matches `NaN` and `0` does not match `-0`.
 *
 * @example
 * ```typescript
 * duplicates([1, 2, 2, 3, 3, 3]); // [2, 3]
 * ```
 */
export function duplicates<T extends number | string>(items: readonly T[]): T[] {
  const sorted = [...items].sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
  const result: T[] = [];
  for (let i = 1; i < sorted.length; i++) {
    const current = sorted[i];
    if (!Object.is(current, sorted[i - 1])) continue;
    if (result.length === 0 || !Object.is(result[result.length - 1], current)) {
      result.push(current);
    }
  }
  return result;
}

/**
 * Left fold over a tuple with `f(accumulator, element)`.
 *
 * @example
 * ```typescript
 * foldlUnrolled((acc, x) => acc + x, [1, 2, 3] as const, 0); // 6
 * ```
 */
export function foldlUnrolled<T extends readonly unknown[], Acc>(
  f: (acc: Acc, elem: T[number]) => Acc,
  tuple: T,
  init: Acc
): Acc {
  let acc = init;
  for (let i = 0; i < tuple.length; i++) {
    acc = f(acc, tuple[i]);
  }
  return acc;
}
