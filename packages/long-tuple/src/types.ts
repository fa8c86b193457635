/**
 * @utilkit/long-tuple — Core Type Definitions
 *
 * A LongTuple is an immutable sequence split into fixed-size chunks. At
 * runtime every chunk is a plain frozen array; the element tuple `T` and the
 * requested chunk size `N` are tracked only in the type system.
 */

// ============================================================================
// LongTuple Core Types
// ============================================================================

/** Phantom key carrying the element tuple and chunk size (type-only, never at runtime). */
declare const __longtuple__: unique symbol;

/** One group of a LongTuple. */
export type Chunk<E = unknown> = readonly E[];

/**
 * A sequence partitioned front to back into chunks of `chunkSize` elements;
 * only the last chunk may be shorter.
 *
 * Logical indices are 1-based.
 *
 * @example
 * ```typescript
 * const lt = longTuple(2, 1, "two", true);
 * lt.chunks;  // [[1, "two"], [true]]
 * lt.length;  // 3
 * ```
 */
export interface LongTuple<
  T extends readonly unknown[] = readonly unknown[],
  N extends number = number,
> {
  /** Effective chunk size: the requested size clamped to the total length. */
  readonly chunkSize: number;
  /** Total element count. */
  readonly length: number;
  readonly chunks: readonly Chunk<T[number]>[];
  [Symbol.iterator](): Iterator<T[number]>;
  readonly [__longtuple__]?: readonly [T, N];
}

// ============================================================================
// Type-Level Utilities — Chunking
// ============================================================================

/**
 * Partition a tuple type into chunks of `N`, mirroring the runtime algorithm
 * (clamping included: an `N` larger than the tuple yields one chunk).
 * Non-literal lengths or sizes fall back to an array of homogeneous chunks.
 *
 * @example
 * ```typescript
 * type C = SplitChunks<[number, string, boolean], 2>; // [[number, string], [boolean]]
 * ```
 */
export type SplitChunks<T extends readonly unknown[], N extends number> = number extends N
  ? T[number][][]
  : number extends T["length"]
    ? T[number][][]
    : _SplitChunks<T, N, [], []>;

type _SplitChunks<
  T extends readonly unknown[],
  N extends number,
  Current extends unknown[],
  Out extends unknown[][],
> = T extends readonly [infer H, ...infer Rest]
  ? [...Current, H]["length"] extends N
    ? _SplitChunks<Rest, N, [], [...Out, [...Current, H]]>
    : _SplitChunks<Rest, N, [...Current, H], Out>
  : Current extends []
    ? Out
    : [...Out, Current];

/**
 * Number of chunks for a literal tuple and size.
 *
 * @example
 * ```typescript
 * type K = ChunkCount<[1, 2, 3, 4, 5], 2>; // 3
 * ```
 */
export type ChunkCount<T extends readonly unknown[], N extends number> = SplitChunks<T, N>["length"];

/**
 * Chunk list with every level read-only, matching the frozen runtime value.
 *
 * @example
 * ```typescript
 * type R = ReadonlyChunks<[[1, 2], [3]]>; // readonly [readonly [1, 2], readonly [3]]
 * ```
 */
export type ReadonlyChunks<C> = { readonly [K in keyof C]: Readonly<C[K]> };

/** Element type of a LongTuple. */
export type ElementOf<L> = L extends LongTuple<infer T, number> ? T[number] : never;
