/**
 * Options for the routines that take any, with their defaults.
 * Call sites merge as `{ ...DEFAULT_X_OPTIONS, ...options }`.
 */

export interface CartesianToSphericalOptions {
  /**
   * Clamp the radius to STEADY_RADIUS_EPSILON before computing the
   * colatitude, so the origin maps to pi/2 instead of NaN.
   * @default false
   */
  steadyColatitude?: boolean;
}

export const DEFAULT_CARTESIAN_TO_SPHERICAL_OPTIONS: Required<CartesianToSphericalOptions> = {
  steadyColatitude: false,
};

export const STEADY_RADIUS_EPSILON = 1e-14;

export interface VectorsToDirectionsOptions {
  /** Wrap azimuth from (-pi, pi] into [0, 2pi). @default true */
  positiveAzimuth?: boolean;
}

export const DEFAULT_VECTORS_TO_DIRECTIONS_OPTIONS: Required<VectorsToDirectionsOptions> = {
  positiveAzimuth: true,
};

export interface DecibelOptions {
  /** Treat values as power ratios (10 log10) instead of amplitude (20 log10). @default false */
  power?: boolean;
}

export const DEFAULT_DECIBEL_OPTIONS: Required<DecibelOptions> = {
  power: false,
};

export interface CompareArraysOptions {
  /** Prefix for the logged line */
  label?: string;

  /**
   * Axis to sum the difference over. Inputs are flattened first, so only
   * 0 and -1 are meaningful. Unset sums everything.
   */
  axis?: number;

  /** Differences above this are reported. @default 1e-6 */
  tolerance?: number;

  /** Log a pass/fail line. @default true */
  verbose?: boolean;
}

export const DEFAULT_COMPARE_ARRAYS_OPTIONS: Required<
  Omit<CompareArraysOptions, "label" | "axis">
> = {
  tolerance: 1e-6,
  verbose: true,
};
