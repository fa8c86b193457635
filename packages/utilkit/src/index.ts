/**
 * utilkit - Small utilities around chunked sequences
 *
 * Re-exports every `@utilkit/*` package.
 *
 * ## Quick Start
 *
 * ```ts
 * import { makeLongTuple, getIndex, sliceLongTuple, printLongTuple } from "utilkit";
 *
 * const lt = makeLongTuple([1, 2, 3, 4, 5, 6, 7, 8, 9], 2);
 * getIndex(lt, 7);                   // 7
 * sliceLongTuple(lt, 3, 5).chunks;   // [[3, 4], [5]]
 * printLongTuple(lt);
 * ```
 *
 * @module
 */

// ============================================================================
// Core: config, errors, logging
// ============================================================================

export * from "@utilkit/core";

// ============================================================================
// Chunked sequences
// ============================================================================

export * from "@utilkit/long-tuple";

// ============================================================================
// Supporting helpers
// ============================================================================

export * from "@utilkit/collections";
export * from "@utilkit/number";
export * from "@utilkit/array";
export * from "@utilkit/strings";
