/**
 * Error types shared by every utilkit package.
 *
 * Callback failures (a function passed to `mapLongTuple`, `foldlUnrolled`, ...)
 * are never wrapped in one of these; they reach the caller unchanged.
 */

/** Reason codes for utilkit failures. */
export type UtilkitErrorReason = "invalid_argument" | "index_out_of_bounds";

/** Base class for all errors raised by utilkit itself. */
export class UtilkitError extends Error {
  constructor(
    readonly reason: UtilkitErrorReason,
    message: string,
  ) {
    super(message);
    this.name = "UtilkitError";
  }
}

/** Thrown when an argument fails validation (bad size, empty input, ...). */
export class InvalidArgumentError extends UtilkitError {
  constructor(message: string) {
    super("invalid_argument", message);
    this.name = "InvalidArgumentError";
  }
}

/** Thrown when a logical index falls outside `[first, last]`. */
export class IndexOutOfBoundsError extends UtilkitError {
  constructor(
    readonly index: number,
    readonly bounds: readonly [first: number, last: number],
    message?: string,
  ) {
    super(
      "index_out_of_bounds",
      message ?? `Index ${index} out of bounds [${bounds[0]}, ${bounds[1]}]`,
    );
    this.name = "IndexOutOfBoundsError";
  }
}
