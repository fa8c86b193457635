/**
 * @utilkit/long-tuple — Chunked sequences
 *
 * Splits a long heterogeneous sequence into fixed-size chunks (the last may
 * be shorter) so no single group grows unwieldy, while keeping global order,
 * 1-based random access, slicing, mapping and folding.
 *
 * @example
 * ```typescript
 * import { makeLongTuple, getIndex, foldlLongTuple } from "@utilkit/long-tuple";
 *
 * const lt = makeLongTuple([1, 2, 3], 2); // chunks [[1, 2], [3]]
 * getIndex(lt, 3);                        // 3
 * foldlLongTuple((x, acc) => acc + x, lt, 0); // 6
 * ```
 */

// Core types
export type { LongTuple, Chunk, SplitChunks, ReadonlyChunks, ChunkCount, ElementOf } from "./types.js";

// Runtime operations
export {
  DEFAULT_CHUNK_SIZE,
  defaultChunkSize,
  isLongTuple,
  makeLongTuple,
  longTuple,
  fromChunks,
  firstIndex,
  lastIndex,
  getIndex,
  sliceLongTuple,
  chunksOf,
  chunkLengths,
  forEachLongTuple,
  mapLongTuple,
  foldlLongTuple,
  getTupleFromLongTuple,
  iterateLongTuple,
} from "./operations.js";

// Display
export { showLongTuple, printLongTuple } from "./show.js";
