/**
 * Record helpers
 *
 * Plain records stand in for named tuples: every helper returns a new
 * object and leaves its inputs untouched.
 */

import { InvalidArgumentError, isPlainObject } from "@utilkit/core";

/** A string-keyed record of arbitrary values. */
export type Fields = Record<string, unknown>;

/**
 * Remove the named fields.
 *
 * @example
 * ```typescript
 * dropFields({ a: 1, b: 2, c: 3 }, ["b"]); // { a: 1, c: 3 }
 * ```
 */
export function dropFields<R extends Fields, K extends keyof R & string>(
  record: R,
  names: readonly K[]
): Omit<R, K> {
  const dropped = new Set<string>(names);
  const result: Fields = {};
  for (const [key, value] of Object.entries(record)) {
    if (!dropped.has(key)) result[key] = value;
  }
  return result as Omit<R, K>;
}

/**
 * Add or replace one field.
 *
 * @example
 * ```typescript
 * setField({ a: 1 }, ["b", 2]); // { a: 1, b: 2 }
 * ```
 */
export function setField<R extends Fields, K extends string, V>(
  record: R,
  [name, value]: readonly [K, V]
): Omit<R, K> & Record<K, V> {
  return { ...record, [name]: value } as unknown as Omit<R, K> & Record<K, V>;
}

/**
 * Set `record[name][sub]`, creating `record[name]` as an empty record when
 * it is missing.
 *
 * @throws InvalidArgumentError when `record[name]` exists but is not a plain record
 *
 * @example
 * ```typescript
 * setSubfield({ a: {} }, "a", ["x", 1]); // { a: { x: 1 } }
 * ```
 */
export function setSubfield(record: Fields, name: string, [sub, value]: readonly [string, unknown]): Fields {
  const existing = record[name] ?? {};
  if (!isPlainObject(existing)) {
    throw new InvalidArgumentError(`Field "${name}" is not a record`);
  }
  return { ...record, [name]: { ...existing, [sub]: value } };
}

/**
 * Remove fields whose value is an empty record.
 *
 * @example
 * ```typescript
 * dropEmptyFields({ a: {}, b: { x: 1 } }); // { b: { x: 1 } }
 * ```
 */
export function dropEmptyFields(record: Fields): Fields {
  const result: Fields = {};
  for (const [key, value] of Object.entries(record)) {
    if (isPlainObject(value) && Object.keys(value).length === 0) continue;
    result[key] = value;
  }
  return result;
}

function isNonEmpty(value: unknown): boolean {
  if (value === null || value === undefined) return false;
  if (typeof value === "string" || Array.isArray(value)) return value.length > 0;
  if (value instanceof Map || value instanceof Set) return value.size > 0;
  if (isPlainObject(value)) return Object.keys(value).length > 0;
  return true;
}

/**
 * Combine two records: every field of `base`, then the new fields of
 * `priority`. A priority value replaces the base value only when it is
 * non-empty (not null/undefined, and with a positive length, size or key
 * count where that applies).
 *
 * @example
 * ```typescript
 * mergePreferNonEmpty({ a: [1], b: [2] }, { b: [99], c: [] });
 * // { a: [1], b: [99], c: [] }
 * ```
 */
export function mergePreferNonEmpty(base: Fields, priority: Fields): Fields {
  const result: Fields = {};
  const keys = new Set([...Object.keys(base), ...Object.keys(priority)]);
  for (const key of keys) {
    const inBase = Object.prototype.hasOwnProperty.call(base, key);
    const inPriority = Object.prototype.hasOwnProperty.call(priority, key);
    let value = inBase ? base[key] : priority[key];
    if (inPriority && isNonEmpty(priority[key])) {
      value = priority[key];
    }
    result[key] = value;
  }
  return result;
}

/**
 * Overlay `overrides` on a deep copy of `defaults`.
 *
 * @example
 * ```typescript
 * mergeRecords({ a: 1, b: 2 }, { b: 99 }); // { a: 1, b: 99 }
 * ```
 */
export function mergeRecords<D extends Fields>(defaults: D, overrides: Partial<D>): D {
  return { ...structuredClone(defaults), ...overrides };
}

/**
 * Zip names and values into a record.
 *
 * @throws InvalidArgumentError when the lengths differ
 *
 * @example
 * ```typescript
 * recordFromNamesValues([1, 2], ["a", "b"]); // { a: 1, b: 2 }
 * ```
 */
export function recordFromNamesValues(values: readonly unknown[], names: readonly string[]): Fields {
  if (values.length !== names.length) {
    throw new InvalidArgumentError(`Got ${names.length} names for ${values.length} values`);
  }
  const result: Fields = {};
  names.forEach((name, i) => {
    result[name] = values[i];
  });
  return result;
}

/**
 * Convert a (possibly nested) string-keyed Map into records. Nested maps
 * become nested records; arrays are copied.
 *
 * @example
 * ```typescript
 * mapToRecord(new Map([["a", 1], ["b", new Map([["c", 2]])]])); // { a: 1, b: { c: 2 } }
 * ```
 */
export function mapToRecord(map: ReadonlyMap<string, unknown>): Fields {
  const result: Fields = {};
  for (const [key, value] of map) {
    if (value instanceof Map) {
      result[key] = mapToRecord(value);
    } else if (Array.isArray(value)) {
      result[key] = [...value];
    } else {
      result[key] = value;
    }
  }
  return result;
}
