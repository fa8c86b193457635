import { describe, it, expect } from "vitest";
import { IndexOutOfBoundsError, InvalidArgumentError } from "@utilkit/core";
import {
  shapeOf,
  booleanizeArray,
  flagOffDiag,
  flagLower,
  flagUpper,
  offDiag,
  offDiagLower,
  offDiagUpper,
  stackArrays,
  getArrayView,
} from "../src/index.js";

const square = [
  [1, 2, 3],
  [4, 5, 6],
  [7, 8, 9],
];

describe("shapeOf()", () => {
  it("reports rows and columns", () => {
    expect(shapeOf([[1, 2, 3], [4, 5, 6]])).toEqual([2, 3]);
    expect(shapeOf([])).toEqual([0, 0]);
  });

  it("rejects ragged matrices", () => {
    expect(() => shapeOf([[1, 2], [3]])).toThrow(InvalidArgumentError);
    expect(() => shapeOf([[1, 2], [3]])).toThrow("Row 2 has 1 columns; expected 2");
  });
});

describe("booleanizeArray()", () => {
  it("marks positive values", () => {
    expect(booleanizeArray([1, 0, -1, 0.5])).toEqual([true, false, false, true]);
  });

  it("treats invalid values as zero", () => {
    expect(booleanizeArray([NaN, null, undefined, Infinity])).toEqual([false, false, false, false]);
  });
});

describe("masks", () => {
  it("flagOffDiag()", () => {
    expect(flagOffDiag([[1, 2], [3, 4]])).toEqual([
      [0, 1],
      [1, 0],
    ]);
  });

  it("flagLower()", () => {
    expect(flagLower(square)).toEqual([
      [0, 0, 0],
      [1, 0, 0],
      [1, 1, 0],
    ]);
  });

  it("flagUpper() on a non-square matrix", () => {
    expect(flagUpper([[1, 2, 3], [4, 5, 6]])).toEqual([
      [0, 1, 1],
      [0, 0, 1],
    ]);
  });

  it("rejects ragged input", () => {
    expect(() => flagOffDiag([[1], [2, 3]])).toThrow(InvalidArgumentError);
  });
});

describe("off-diagonal extraction", () => {
  it("reads the 2x2 case column by column", () => {
    expect(offDiag([[1, 2], [3, 4]])).toEqual([3, 2]);
    expect(offDiagLower([[1, 2], [3, 4]])).toEqual([3]);
    expect(offDiagUpper([[1, 2], [3, 4]])).toEqual([2]);
  });

  it("reads a 3x3 matrix in column-major order", () => {
    expect(offDiag(square)).toEqual([4, 7, 2, 8, 3, 6]);
    expect(offDiagLower(square)).toEqual([4, 7, 8]);
    expect(offDiagUpper(square)).toEqual([2, 3, 6]);
  });

  it("keeps element types", () => {
    expect(offDiag([["a", "b"], ["c", "d"]])).toEqual(["c", "b"]);
  });
});

describe("stackArrays()", () => {
  it("turns arrays into columns", () => {
    expect(stackArrays([[1, 2], [3, 4]])).toEqual([
      [1, 3],
      [2, 4],
    ]);
    expect(stackArrays([[1, 2, 3]])).toEqual([[1], [2], [3]]);
  });

  it("flattens single-element arrays", () => {
    expect(stackArrays([[1], [2], [3]])).toEqual([1, 2, 3]);
  });

  it("rejects empty or uneven input", () => {
    expect(() => stackArrays([])).toThrow("Cannot stack zero arrays");
    expect(() => stackArrays([[1, 2], [3]])).toThrow("Array 2 has 1 elements; expected 2");
  });
});

describe("getArrayView()", () => {
  const matrix = [
    [1, 4, 7],
    [2, 5, 8],
    [3, 6, 9],
  ];
  const cube = [
    [
      [1, 2],
      [3, 4],
    ],
    [
      [5, 6],
      [7, 8],
    ],
  ];

  it("indexes a vector", () => {
    expect(getArrayView([10, 20, 30], [1])).toBe(20);
  });

  it("indexes both dimensions of a matrix", () => {
    expect(getArrayView(matrix, [1, 2])).toBe(8);
  });

  it("applies a single index to the last dimension", () => {
    expect(getArrayView(matrix, [2])).toEqual([7, 8, 9]);
    expect(getArrayView(cube, [1])).toEqual([
      [2, 4],
      [6, 8],
    ]);
  });

  it("keeps leading dimensions whole", () => {
    expect(getArrayView(cube, [0, 1])).toEqual([2, 6]);
    expect(getArrayView(cube, [1, 0, 1])).toBe(6);
  });

  it("rejects more indices than dimensions", () => {
    expect(() => getArrayView([1, 2, 3], [0, 1])).toThrow(InvalidArgumentError);
    expect(() => getArrayView(matrix, [0, 0, 0])).toThrow(
      "Cannot index a 2-dimensional array with 3 indices"
    );
  });

  it("rejects an empty index list", () => {
    expect(() => getArrayView(matrix, [])).toThrow("At least one index is required");
  });

  it("rejects indices outside a dimension", () => {
    expect(() => getArrayView(matrix, [3])).toThrow(IndexOutOfBoundsError);
    expect(() => getArrayView(matrix, [0, -1])).toThrow(IndexOutOfBoundsError);
  });
});
