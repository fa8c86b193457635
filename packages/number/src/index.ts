/**
 * @utilkit/number — Numeric helpers
 */

export {
  clampZeroOne,
  maxZero,
  maxOne,
  minZero,
  minOne,
  getFrac,
  isInvalid,
  replaceInvalid,
  cumSum,
} from "./number.js";
