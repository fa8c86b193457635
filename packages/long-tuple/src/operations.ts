/**
 * @utilkit/long-tuple — Runtime Operations
 *
 * Construction, 1-based element access, slicing and traversal. Every
 * operation returns a new LongTuple; chunks are frozen on construction and
 * never shared with the caller's arrays.
 */

import { config, debug, invariant, warn, IndexOutOfBoundsError, InvalidArgumentError } from "@utilkit/core";
import type { Chunk, LongTuple, ReadonlyChunks, SplitChunks } from "./types.js";

/** Chunk size used when neither the caller nor the configuration gives one. */
export const DEFAULT_CHUNK_SIZE = 5;

const constructed = new WeakSet<object>();

// ============================================================================
// Construction
// ============================================================================

function build<T extends readonly unknown[], N extends number>(
  chunks: T[number][][],
  chunkSize: number
): LongTuple<T, N> {
  const frozen: readonly Chunk<T[number]>[] = Object.freeze(chunks.map((c) => Object.freeze(c)));
  let length = 0;
  for (const chunk of frozen) length += chunk.length;

  const lt: LongTuple<T, N> = Object.freeze({
    chunkSize,
    length,
    chunks: frozen,
    *[Symbol.iterator](): Iterator<T[number]> {
      for (const chunk of frozen) yield* chunk;
    },
  });
  constructed.add(lt);
  return lt;
}

function assertChunkSize(chunkSize: number): void {
  if (!Number.isInteger(chunkSize) || chunkSize < 1) {
    throw new InvalidArgumentError(`LongTuple chunk size must be a positive integer, got ${chunkSize}`);
  }
}

function partition<T extends readonly unknown[], N extends number>(
  values: T,
  chunkSize: number
): LongTuple<T, N> {
  assertChunkSize(chunkSize);
  const total = values.length;
  if (total === 0) {
    throw new InvalidArgumentError("Cannot build a LongTuple from an empty sequence");
  }

  const n = Math.min(chunkSize, total);
  if (n < chunkSize) {
    debug(`LongTuple chunk size ${chunkSize} clamped to length ${total}`);
  }
  const full = Math.floor(total / n);
  const remainder = total % n;
  const count = remainder === 0 ? full : full + 1;

  const chunks: T[number][][] = [];
  let idx = 0;
  for (let i = 0; i < count; i++) {
    const size = remainder !== 0 && i === count - 1 ? remainder : n;
    const chunk: T[number][] = [];
    for (let j = 0; j < size; j++) {
      chunk.push(values[idx++]);
    }
    chunks.push(chunk);
  }
  invariant(idx === total, `Partitioned ${idx} of ${total} elements`);
  return build<T, N>(chunks, n);
}

/**
 * The chunk size `makeLongTuple` falls back to: `longtuple.defaultsize` from
 * the configuration, or {@link DEFAULT_CHUNK_SIZE}. A configured value that
 * is not a number is ignored with a warning; a number is returned as is and
 * validated where it is used.
 */
export function defaultChunkSize(): number {
  const configured = config.get("longtuple.defaultsize");
  if (configured === undefined) return DEFAULT_CHUNK_SIZE;
  const size = config.getNumber("longtuple.defaultsize");
  if (size === undefined) {
    warn(`Ignoring longtuple.defaultsize ${String(configured)}; using ${DEFAULT_CHUNK_SIZE}`);
    return DEFAULT_CHUNK_SIZE;
  }
  return size;
}

/**
 * Whether `value` was produced by this module.
 */
export function isLongTuple(value: unknown): value is LongTuple {
  return typeof value === "object" && value !== null && constructed.has(value);
}

/**
 * Create a LongTuple from a flat sequence.
 *
 * The effective chunk size is `min(chunkSize, values.length)`. Passing an
 * existing LongTuple returns it unchanged.
 *
 * @throws InvalidArgumentError for a chunk size below 1 or an empty sequence
 *
 * @example
 * ```typescript
 * makeLongTuple([1, 2, 3], 2).chunks;  // [[1, 2], [3]]
 * makeLongTuple([1, 2, 3], 10).chunks; // [[1, 2, 3]]
 * ```
 */
export function makeLongTuple<T extends readonly unknown[], N extends number>(
  lt: LongTuple<T, N>,
  chunkSize?: number
): LongTuple<T, N>;
export function makeLongTuple<T extends readonly unknown[], N extends number = number>(
  values: T,
  chunkSize?: N
): LongTuple<T, N>;
export function makeLongTuple(
  values: readonly unknown[] | LongTuple,
  chunkSize?: number
): LongTuple {
  if (isLongTuple(values)) {
    return values;
  }
  return partition(values, chunkSize ?? defaultChunkSize());
}

/**
 * Create a LongTuple from positional arguments, keeping each element's type.
 *
 * @example
 * ```typescript
 * const lt = longTuple(2, 1, "a", true);
 * // LongTuple<[number, string, boolean], 2>
 * ```
 */
export function longTuple<N extends number, T extends readonly unknown[]>(
  chunkSize: N,
  ...values: T
): LongTuple<T, N> {
  return partition<T, N>(values, chunkSize);
}

/**
 * Create a LongTuple from an already-chunked representation. The chunk size
 * is the length of the first chunk.
 *
 * @throws InvalidArgumentError unless every chunk but the last has exactly
 *   that size and the last is non-empty and no longer
 *
 * @example
 * ```typescript
 * fromChunks([[1, 2], [3]]).chunkSize; // 2
 * ```
 */
export function fromChunks<E>(chunks: readonly (readonly E[])[]): LongTuple<E[]> {
  if (chunks.length === 0) {
    throw new InvalidArgumentError("Cannot build a LongTuple from zero chunks");
  }
  const size = chunks[0].length;
  assertChunkSize(size);

  chunks.forEach((chunk, i) => {
    const isLast = i === chunks.length - 1;
    if (isLast ? chunk.length < 1 || chunk.length > size : chunk.length !== size) {
      throw new InvalidArgumentError(
        `Chunk ${i + 1} has ${chunk.length} elements; expected ${isLast ? `1 to ${size}` : size}`
      );
    }
  });

  return build<E[], number>(
    chunks.map((chunk) => [...chunk]),
    size
  );
}

// ============================================================================
// Element Access
// ============================================================================

/** First logical index; always 1. */
export function firstIndex(_lt: LongTuple): number {
  return 1;
}

/** Last logical index: the sum of all chunk lengths. */
export function lastIndex(lt: LongTuple): number {
  let total = 0;
  for (const chunk of lt.chunks) total += chunk.length;
  return total;
}

/**
 * Element at 1-based logical index `i`, found by walking the chunks and
 * accumulating their lengths.
 *
 * @throws IndexOutOfBoundsError outside `[1, lastIndex(lt)]`
 *
 * @example
 * ```typescript
 * getIndex(makeLongTuple([1, 2, 3], 2), 3); // 3
 * ```
 */
export function getIndex<T extends readonly unknown[]>(lt: LongTuple<T, number>, i: number): T[number] {
  if (!Number.isInteger(i) || i < 1) {
    throw new IndexOutOfBoundsError(i, [1, lastIndex(lt)]);
  }
  let consumed = 0;
  for (const chunk of lt.chunks) {
    if (i <= consumed + chunk.length) {
      return chunk[i - consumed - 1];
    }
    consumed += chunk.length;
  }
  throw new IndexOutOfBoundsError(
    i,
    [1, consumed],
    `Index ${i} out of bounds for LongTuple. Total length is ${consumed}.`
  );
}

/**
 * Elements `start..stop` (inclusive, 1-based) re-chunked with the same
 * chunk size.
 *
 * Each index resolves through `chunk = (i-1) div N`, `offset = (i-1) mod N`
 * rather than the cumulative walk of {@link getIndex}.
 *
 * @throws InvalidArgumentError when `stop < start`
 * @throws IndexOutOfBoundsError when a bound is not an integer or an index
 *   does not resolve to an element
 *
 * @example
 * ```typescript
 * sliceLongTuple(makeLongTuple([1, 2, 3, 4, 5, 6, 7, 8, 9], 2), 3, 5).chunks; // [[3, 4], [5]]
 * ```
 */
export function sliceLongTuple<T extends readonly unknown[]>(
  lt: LongTuple<T, number>,
  start: number,
  stop: number
): LongTuple<T[number][]> {
  for (const bound of [start, stop]) {
    if (!Number.isInteger(bound)) {
      throw new IndexOutOfBoundsError(bound, [1, lastIndex(lt)]);
    }
  }
  if (stop < start) {
    throw new InvalidArgumentError(`Range ${start}:${stop} is empty or descending`);
  }
  const n = lt.chunkSize;
  const selected: T[number][] = [];

  for (let i = start; i <= stop; i++) {
    if (!Number.isInteger(i) || i < 1) {
      throw new IndexOutOfBoundsError(i, [1, lastIndex(lt)]);
    }
    const chunk: Chunk<T[number]> | undefined = lt.chunks[Math.floor((i - 1) / n)];
    const offset = (i - 1) % n;
    if (chunk === undefined || offset >= chunk.length) {
      throw new IndexOutOfBoundsError(i, [1, lastIndex(lt)]);
    }
    selected.push(chunk[offset]);
  }

  return makeLongTuple(selected, n);
}

/**
 * The chunks typed per position, as computed by {@link SplitChunks}. Both the
 * outer list and every chunk are read-only, as they are frozen at runtime.
 *
 * @example
 * ```typescript
 * const [first, second] = chunksOf(longTuple(2, 1, "a", true));
 * // first: readonly [number, string], second: readonly [boolean]
 * ```
 */
export function chunksOf<T extends readonly unknown[], N extends number>(
  lt: LongTuple<T, N>
): ReadonlyChunks<SplitChunks<T, N>> {
  return lt.chunks as unknown as ReadonlyChunks<SplitChunks<T, N>>;
}

/** Length of every chunk, in order. */
export function chunkLengths(lt: LongTuple): number[] {
  return lt.chunks.map((chunk) => chunk.length);
}

// ============================================================================
// Higher-Order Operations
// ============================================================================

/**
 * Call `f` once per element in chunk order, then in-chunk order. `index`
 * is the 1-based logical index.
 */
export function forEachLongTuple<T extends readonly unknown[]>(
  lt: LongTuple<T, number>,
  f: (elem: T[number], index: number) => void
): void {
  let index = 1;
  for (const chunk of lt.chunks) {
    for (const elem of chunk) {
      f(elem, index++);
    }
  }
}

/**
 * Map `f` over every element. The result has exactly the chunk boundaries
 * of the input.
 *
 * @example
 * ```typescript
 * mapLongTuple(makeLongTuple([1, 2, 3], 2), (x) => x * 10).chunks; // [[10, 20], [30]]
 * ```
 */
export function mapLongTuple<T extends readonly unknown[], N extends number, U>(
  lt: LongTuple<T, N>,
  f: (elem: T[number], index: number) => U
): LongTuple<U[], N> {
  let index = 1;
  const chunks = lt.chunks.map((chunk) => chunk.map((elem) => f(elem, index++)));
  return build<U[], N>(chunks, lt.chunkSize);
}

/**
 * Left fold over all elements. Note the argument order of `f`: element
 * first, accumulator second.
 *
 * @example
 * ```typescript
 * foldlLongTuple((x, acc) => acc + x, makeLongTuple([1, 2, 3], 2), 0); // 6
 * ```
 */
export function foldlLongTuple<T extends readonly unknown[], Acc>(
  f: (elem: T[number], acc: Acc) => Acc,
  lt: LongTuple<T, number>,
  init: Acc
): Acc {
  let acc = init;
  for (const chunk of lt.chunks) {
    for (const elem of chunk) {
      acc = f(elem, acc);
    }
  }
  return acc;
}

/**
 * Flatten back to a plain array. Inverse of {@link makeLongTuple}.
 *
 * @example
 * ```typescript
 * getTupleFromLongTuple(makeLongTuple([1, 2, 3], 2)); // [1, 2, 3]
 * ```
 */
export function getTupleFromLongTuple<T extends readonly unknown[]>(lt: LongTuple<T, number>): T[number][] {
  const out: T[number][] = [];
  forEachLongTuple(lt, (elem) => {
    out.push(elem);
  });
  return out;
}

/** Iterate the elements in logical order. */
export function* iterateLongTuple<T extends readonly unknown[]>(
  lt: LongTuple<T, number>
): IterableIterator<T[number]> {
  for (const chunk of lt.chunks) {
    yield* chunk;
  }
}
