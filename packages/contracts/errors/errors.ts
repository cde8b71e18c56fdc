/**
 * Error taxonomy shared by all routines.
 *
 * Numeric edge cases with a well-defined IEEE result (log of zero,
 * division by zero) are returned as Infinity/NaN, never thrown.
 */

export class SpatialMathError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "SpatialMathError";
  }
}

/**
 * Input cannot be reduced to the required number of dimensions, or is
 * not rectangular.
 */
export class ShapeError extends SpatialMathError {
  readonly shape?: readonly number[];

  constructor(message: string, shape?: readonly number[]) {
    super(shape ? `${message} (got shape [${shape.join(", ")}])` : message);
    this.name = "ShapeError";
    this.shape = shape;
  }
}

/**
 * Two arrays that must share a dimension do not.
 */
export class DimensionMismatchError extends SpatialMathError {
  readonly shapes: readonly (readonly number[])[];

  constructor(message: string, ...shapes: readonly (readonly number[])[]) {
    const detail = shapes.map((s) => `[${s.join(", ")}]`).join(" vs ");
    super(detail ? `${message} (${detail})` : message);
    this.name = "DimensionMismatchError";
    this.shapes = shapes;
  }
}

/**
 * A named channel layout convention is violated.
 */
export class FormatConstraintError extends SpatialMathError {
  readonly format: string;

  constructor(format: string, message: string) {
    super(`${format}: ${message}`);
    this.name = "FormatConstraintError";
    this.format = format;
  }
}
