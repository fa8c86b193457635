/**
 * Core module exports for @utilkit/core
 *
 * This package provides:
 * - Configuration (env vars, config files, programmatic)
 * - Error types shared by all packages
 * - Runtime safety primitives (invariant, debugOnly)
 * - Prefixed console logging and ANSI colour helpers
 */

// Configuration System
export { config, defineConfig, type UtilkitConfig, type LongTupleConfig } from "./config.js";

// Errors
export {
  UtilkitError,
  InvalidArgumentError,
  IndexOutOfBoundsError,
  type UtilkitErrorReason,
} from "./errors.js";

// Runtime Safety Primitives
export { invariant, debugOnly } from "./safety.js";

// Logging
export { debug, warn } from "./log.js";

// Terminal colour
export { COLORS, color, colorsEnabled, type ColorStyle } from "./color.js";

// Runtime type inspection
export { typeName, isPlainObject } from "./type-name.js";
