/**
 * @utilkit/array — Matrix helpers
 *
 * Matrices are row-major `number[][]`. Element lists extracted from a
 * matrix come out in column-major order (down the first column, then the
 * next).
 */

import { IndexOutOfBoundsError, InvalidArgumentError } from "@utilkit/core";
import { replaceInvalid } from "@utilkit/number";

export type Matrix<T = number> = readonly (readonly T[])[];

/** Arrays nested to any depth. Leaves must not be arrays themselves. */
export type NestedArray<T> = readonly (T | NestedArray<T>)[];

/** `[rows, columns]` of a rectangular matrix. */
export function shapeOf(matrix: Matrix<unknown>): [number, number] {
  const rows = matrix.length;
  const cols = rows === 0 ? 0 : matrix[0].length;
  matrix.forEach((row, i) => {
    if (row.length !== cols) {
      throw new InvalidArgumentError(`Row ${i + 1} has ${row.length} columns; expected ${cols}`);
    }
  });
  return [rows, cols];
}

/**
 * `true` where the value is greater than zero; invalid values count as 0.
 *
 * @example
 * ```typescript
 * booleanizeArray([1, 0, -1, NaN]); // [true, false, false, false]
 * ```
 */
export function booleanizeArray(values: readonly (number | null | undefined)[]): boolean[] {
  return values.map((x) => replaceInvalid(x, 0) > 0);
}

// ============================================================================
// Masks
// ============================================================================

type Position = (row: number, col: number) => boolean;

function flag(matrix: Matrix<unknown>, where: Position): number[][] {
  const [rows, cols] = shapeOf(matrix);
  const out: number[][] = [];
  for (let i = 0; i < rows; i++) {
    const row: number[] = [];
    for (let j = 0; j < cols; j++) row.push(where(i, j) ? 1 : 0);
    out.push(row);
  }
  return out;
}

const offDiagonal: Position = (i, j) => i !== j;
const belowDiagonal: Position = (i, j) => i > j;
const aboveDiagonal: Position = (i, j) => i < j;

/**
 * Same shape as `matrix`: 1 off the diagonal, 0 on it.
 *
 * @example
 * ```typescript
 * flagOffDiag([[1, 2], [3, 4]]); // [[0, 1], [1, 0]]
 * ```
 */
export function flagOffDiag(matrix: Matrix<unknown>): number[][] {
  return flag(matrix, offDiagonal);
}

/** 1 below the diagonal, 0 elsewhere. */
export function flagLower(matrix: Matrix<unknown>): number[][] {
  return flag(matrix, belowDiagonal);
}

/** 1 above the diagonal, 0 elsewhere. */
export function flagUpper(matrix: Matrix<unknown>): number[][] {
  return flag(matrix, aboveDiagonal);
}

// ============================================================================
// Element Extraction
// ============================================================================

function select<T>(matrix: Matrix<T>, where: Position): T[] {
  const [rows, cols] = shapeOf(matrix);
  const out: T[] = [];
  for (let j = 0; j < cols; j++) {
    for (let i = 0; i < rows; i++) {
      if (where(i, j)) out.push(matrix[i][j]);
    }
  }
  return out;
}

/**
 * Off-diagonal elements in column-major order.
 *
 * @example
 * ```typescript
 * offDiag([[1, 2], [3, 4]]); // [3, 2]
 * ```
 */
export function offDiag<T>(matrix: Matrix<T>): T[] {
  return select(matrix, offDiagonal);
}

export function offDiagLower<T>(matrix: Matrix<T>): T[] {
  return select(matrix, belowDiagonal);
}

export function offDiagUpper<T>(matrix: Matrix<T>): T[] {
  return select(matrix, aboveDiagonal);
}

// ============================================================================
// Trailing-Dimension Access
// ============================================================================

function isNested<T>(value: T | NestedArray<T>): value is NestedArray<T> {
  return Array.isArray(value);
}

function dimensionsOf<T>(data: NestedArray<T>): number {
  let dims = 0;
  let current: T | NestedArray<T> = data;
  while (isNested(current)) {
    dims++;
    if (current.length === 0) break;
    current = current[0];
  }
  return dims;
}

/**
 * Select along the trailing dimensions of a nested array. With `k` indices
 * on a `d`-dimensional array, the indices (0-based) apply to the last `k`
 * levels of nesting and every leading level is kept whole.
 *
 * @throws InvalidArgumentError with no indices, more indices than dimensions,
 *   or a level that is not an array
 * @throws IndexOutOfBoundsError for an index outside its dimension
 *
 * @example
 * ```typescript
 * const a = [[1, 4, 7], [2, 5, 8], [3, 6, 9]];
 * getArrayView(a, [1, 2]); // 8
 * getArrayView(a, [2]);    // [7, 8, 9]
 * ```
 */
export function getArrayView<T>(data: NestedArray<T>, indices: readonly number[]): T | NestedArray<T> {
  const dims = dimensionsOf(data);
  if (indices.length === 0) {
    throw new InvalidArgumentError("At least one index is required");
  }
  if (dims < indices.length) {
    throw new InvalidArgumentError(`Cannot index a ${dims}-dimensional array with ${indices.length} indices`);
  }
  const lead = dims - indices.length;

  const pick = (node: T | NestedArray<T>, level: number): T | NestedArray<T> => {
    if (!isNested(node)) {
      throw new InvalidArgumentError(`Level ${level + 1} is not an array`);
    }
    if (level < lead) {
      return node.map((child) => pick(child, level + 1));
    }
    const i = indices[level - lead];
    if (!Number.isInteger(i) || i < 0 || i >= node.length) {
      throw new IndexOutOfBoundsError(i, [0, node.length - 1]);
    }
    return level === dims - 1 ? node[i] : pick(node[i], level + 1);
  };

  return pick(data, 0);
}

// ============================================================================
// Stacking
// ============================================================================

/**
 * Place each array as one column of a matrix. When the arrays have a single
 * element the result is flattened to a vector.
 *
 * @throws InvalidArgumentError for no arrays or arrays of different lengths
 *
 * @example
 * ```typescript
 * stackArrays([[1, 2], [3, 4]]); // [[1, 3], [2, 4]]
 * stackArrays([[1], [2]]);       // [1, 2]
 * ```
 */
export function stackArrays<T>(arrays: readonly (readonly T[])[]): T[][] | T[] {
  if (arrays.length === 0) {
    throw new InvalidArgumentError("Cannot stack zero arrays");
  }
  const height = arrays[0].length;
  arrays.forEach((column, j) => {
    if (column.length !== height) {
      throw new InvalidArgumentError(`Array ${j + 1} has ${column.length} elements; expected ${height}`);
    }
  });
  if (height === 1) {
    return arrays.map((column) => column[0]);
  }
  const out: T[][] = [];
  for (let i = 0; i < height; i++) {
    out.push(arrays.map((column) => column[i]));
  }
  return out;
}
