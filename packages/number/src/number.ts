/**
 * @utilkit/number — Scalar helpers
 *
 * Clamping against 0 and 1, safe ratios and invalid-value handling.
 */

// ============================================================================
// Clamping
// ============================================================================

/** `x` clamped into `[0, 1]`. */
export function clampZeroOne(x: number): number {
  return Math.min(Math.max(x, 0), 1);
}

export function maxZero(x: number): number {
  return Math.max(x, 0);
}

export function maxOne(x: number): number {
  return Math.max(x, 1);
}

export function minZero(x: number): number {
  return Math.min(x, 0);
}

export function minOne(x: number): number {
  return Math.min(x, 1);
}

// ============================================================================
// Ratios and Invalid Values
// ============================================================================

/**
 * `numerator / denominator`, or `numerator` itself when the denominator is
 * zero.
 *
 * @example
 * ```typescript
 * getFrac(1, 2); // 0.5
 * getFrac(1, 0); // 1
 * ```
 */
export function getFrac(numerator: number, denominator: number): number {
  return denominator === 0 ? numerator : numerator / denominator;
}

/**
 * Whether `x` is missing (`null`/`undefined`), `NaN` or infinite.
 */
export function isInvalid(x: number | null | undefined): boolean {
  return x === null || x === undefined || !Number.isFinite(x);
}

/**
 * `fill` when {@link isInvalid} holds for `x`, otherwise `x`.
 *
 * @example
 * ```typescript
 * replaceInvalid(NaN, 0); // 0
 * ```
 */
export function replaceInvalid(x: number | null | undefined, fill: number): number {
  if (x === null || x === undefined || !Number.isFinite(x)) return fill;
  return x;
}

/**
 * Running totals of `input`. When `output` is given it is filled in place
 * and returned; otherwise a new array is allocated.
 *
 * @example
 * ```typescript
 * cumSum([1, 2, 3]); // [1, 3, 6]
 * ```
 */
export function cumSum(input: readonly number[], output: number[] = new Array<number>(input.length)): number[] {
  let total = 0;
  for (let i = 0; i < input.length; i++) {
    total += input[i];
    output[i] = total;
  }
  return output;
}
