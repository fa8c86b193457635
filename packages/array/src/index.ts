/**
 * @utilkit/array — Masks, off-diagonal extraction and stacking for
 * row-major matrices, plus trailing-dimension access on nested arrays
 */

export {
  shapeOf,
  booleanizeArray,
  flagOffDiag,
  flagLower,
  flagUpper,
  offDiag,
  offDiagLower,
  offDiagUpper,
  stackArrays,
  getArrayView,
  type Matrix,
  type NestedArray,
} from "./matrix.js";
