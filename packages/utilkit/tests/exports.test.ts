import { describe, it, expect } from "vitest";
import * as utilkit from "../src/index.js";

describe("utilkit umbrella", () => {
  it("re-exports the chunked sequence API", () => {
    const lt = utilkit.makeLongTuple([1, 2, 3, 4, 5, 6, 7, 8, 9], 2);
    expect(utilkit.getIndex(lt, 7)).toBe(7);
    expect(utilkit.sliceLongTuple(lt, 3, 5).chunks).toEqual([[3, 4], [5]]);
  });

  it("re-exports the shared error types", () => {
    const lt = utilkit.makeLongTuple([1], 1);
    expect(() => utilkit.getIndex(lt, 2)).toThrow(utilkit.IndexOutOfBoundsError);
  });

  it("re-exports the helper packages", () => {
    expect(utilkit.cumSum([1, 1])).toEqual([1, 2]);
    expect(utilkit.offDiag([[1, 2], [3, 4]])).toEqual([3, 2]);
    expect(utilkit.toUpperCaseFirst("a_b")).toBe("AB");
    expect(utilkit.duplicates([1, 1])).toEqual([1]);
  });
});
