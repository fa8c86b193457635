/**
 * Runtime type name of a value: the constructor name for objects, `typeof`
 * for primitives, `"null"` for null.
 */
export function typeName(value: unknown): string {
  if (value === null) return "null";
  if (typeof value !== "object") return typeof value;
  const proto: unknown = Object.getPrototypeOf(value);
  if (proto === null) return "Object";
  const ctor: unknown = Object.getOwnPropertyDescriptor(proto, "constructor")?.value;
  return typeof ctor === "function" && ctor.name !== "" ? ctor.name : "Object";
}

/** Whether `value` is an object created by `{}`, `Object.create(null)` or `new Object()`. */
export function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== "object" || value === null) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === null || proto === Object.prototype;
}
