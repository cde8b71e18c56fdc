/**
 * Array shapes accepted and produced by the numeric routines.
 */

/**
 * Any rectangular numeric input: a scalar, a flat array-like
 * (plain array, Float32Array, ...) or nested arrays of those.
 */
export type NumericArray = number | ArrayLike<number> | readonly NumericArray[];

/** Nested output of shape-preserving element-wise operations. */
export type NestedNumbers = number | NestedNumbers[];

/** Always exactly one-dimensional. */
export type NumericSequence = number[];

/**
 * Strided, row-major view of a rectangular array.
 * `data.length` equals the product of `shape` (1 for a scalar).
 */
export interface NdArray {
  shape: number[];
  data: number[];
}

export interface Complex {
  re: number;
  im: number;
}

/** Real or complex samples, as accepted by rms(). May mix both. */
export type SampleArray = number | Complex | ArrayLike<number> | readonly SampleArray[];

/** One-dimensional real or complex samples. */
export type SampleSequence = ArrayLike<number> | readonly (number | Complex)[];

/**
 * Channels x samples. Rows are channels, columns are time samples.
 */
export type ChannelMatrix = readonly ArrayLike<number>[];

/** Layout conventions known to interleaveChannels(). */
export type ChannelLayoutStyle = "SSR";

/** Channel count of the SSR layout (one channel per degree of azimuth). */
export const SSR_CHANNEL_COUNT = 360;
