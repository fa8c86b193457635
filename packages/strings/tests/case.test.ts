import { describe, it, expect } from "vitest";
import { toUpperCaseFirst } from "../src/index.js";

describe("toUpperCaseFirst()", () => {
  it("joins underscore-separated parts in PascalCase", () => {
    expect(toUpperCaseFirst("soil_water_content")).toBe("SoilWaterContent");
  });

  it("prepends the prefix unchanged", () => {
    expect(toUpperCaseFirst("rain", "Forcing")).toBe("ForcingRain");
    expect(toUpperCaseFirst("rain", "x_")).toBe("x_Rain");
  });

  it("keeps the rest of each part as written", () => {
    expect(toUpperCaseFirst("gpp_MAX")).toBe("GppMAX");
  });

  it("drops empty parts", () => {
    expect(toUpperCaseFirst("a__b")).toBe("AB");
    expect(toUpperCaseFirst("")).toBe("");
  });
});
