import { describe, it, expect } from "vitest";
import {
  UtilkitError,
  InvalidArgumentError,
  IndexOutOfBoundsError,
} from "../src/errors.js";
import { invariant } from "../src/safety.js";
import { typeName, isPlainObject } from "../src/type-name.js";

describe("errors", () => {
  it("InvalidArgumentError carries its reason", () => {
    const err = new InvalidArgumentError("chunk size must be positive");
    expect(err).toBeInstanceOf(UtilkitError);
    expect(err).toBeInstanceOf(Error);
    expect(err.reason).toBe("invalid_argument");
    expect(err.name).toBe("InvalidArgumentError");
    expect(err.message).toBe("chunk size must be positive");
  });

  it("IndexOutOfBoundsError formats a default message", () => {
    const err = new IndexOutOfBoundsError(7, [1, 3]);
    expect(err.reason).toBe("index_out_of_bounds");
    expect(err.index).toBe(7);
    expect(err.bounds).toEqual([1, 3]);
    expect(err.message).toBe("Index 7 out of bounds [1, 3]");
  });

  it("IndexOutOfBoundsError accepts a custom message", () => {
    const err = new IndexOutOfBoundsError(0, [1, 3], "too small");
    expect(err.message).toBe("too small");
  });
});

describe("safety", () => {
  it("invariant() passes silently on true", () => {
    expect(() => invariant(true, "never")).not.toThrow();
  });

  it("invariant() throws the given message", () => {
    expect(() => invariant(false, "broken")).toThrow("broken");
    expect(() => invariant(false)).toThrow("Invariant violation");
  });
});

describe("typeName()", () => {
  class Widget {}

  it("names primitives by typeof", () => {
    expect(typeName(1)).toBe("number");
    expect(typeName("a")).toBe("string");
    expect(typeName(undefined)).toBe("undefined");
    expect(typeName(null)).toBe("null");
  });

  it("names objects by constructor", () => {
    expect(typeName(new Widget())).toBe("Widget");
    expect(typeName([1])).toBe("Array");
    expect(typeName({})).toBe("Object");
    expect(typeName(Object.create(null))).toBe("Object");
  });

  it("isPlainObject() accepts only plain records", () => {
    expect(isPlainObject({ a: 1 })).toBe(true);
    expect(isPlainObject(Object.create(null))).toBe(true);
    expect(isPlainObject([1])).toBe(false);
    expect(isPlainObject(new Widget())).toBe(false);
    expect(isPlainObject(null)).toBe(false);
  });
});
