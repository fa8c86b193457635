import { describe, it, expect, afterEach, vi } from "vitest";
import { makeLongTuple } from "../operations.js";
import { showLongTuple, printLongTuple } from "../show.js";

class Point {
  x: number;
  y: number;

  constructor(x: number, y: number) {
    this.x = x;
    this.y = y;
  }
}

describe("showLongTuple()", () => {
  afterEach(() => {
    vi.restoreAllMocks();
    vi.unstubAllEnvs();
  });

  it("lists each element with its type and field count", () => {
    vi.stubEnv("NO_COLOR", "1");
    const lt = makeLongTuple([new Point(1, 2), 7, null, { a: 1 }], 2);
    expect(showLongTuple(lt).split("\n")).toEqual([
      "LongTuple:",
      "  1  ↓ Point: with 2 parameters",
      "  2  ↓ number: with 0 parameters",
      "  3  ↓ null: with 0 parameters",
      "  4  ↓ Object: with 1 parameter",
    ]);
  });

  it("narrows the gap after a two-digit index", () => {
    vi.stubEnv("NO_COLOR", "1");
    const lines = showLongTuple(makeLongTuple(Array.from({ length: 10 }, (_, i) => `s${i}`), 4)).split("\n");
    expect(lines[9]).toBe("  9  ↓ string: with 0 parameters");
    expect(lines[10]).toBe("  10 ↓ string: with 0 parameters");
  });

  it("printLongTuple() writes the rendering to the console", () => {
    vi.stubEnv("NO_COLOR", "1");
    const spy = vi.spyOn(console, "log").mockImplementation(() => {});
    printLongTuple(makeLongTuple([true], 1));
    expect(spy).toHaveBeenCalledWith("LongTuple:\n  1  ↓ boolean: with 0 parameters");
  });
});
