/**
 * Array composition helpers: two-vector stacking and left/right channel
 * interleaving.
 */

import type {
  ChannelLayoutStyle,
  ChannelMatrix,
  NdArray,
  NumericArray,
} from "@spatialmath/contracts";
import {
  DimensionMismatchError,
  FormatConstraintError,
  SSR_CHANNEL_COUNT,
  ShapeError,
} from "@spatialmath/contracts";
import { shapesEqual, squeeze, toNdArray, toRows } from "../shape";

/**
 * Stacks two vectors (or matrices) along the dimension they share.
 *
 * Both inputs are first promoted to 2D (a flat vector of n becomes 1 x n).
 * With shapes M1 x N1 and M2 x N2:
 *
 * - M1 == M2 and M is the smaller dimension of either input: rows are
 *   concatenated, so two 1 x 5 row vectors give 2 x 5.
 * - else N1 == N2 and N is the smaller dimension of either input:
 *   columns are concatenated, so two 5 x 1 column vectors give 5 x 2.
 * - else there is no common dimension.
 *
 * The row check runs first. Two square inputs of the same size satisfy
 * neither "smaller" test and are rejected.
 *
 * The result is squeezed, so it may come back one-dimensional.
 *
 * @throws DimensionMismatchError if there is no common dimension
 * @throws ShapeError if an input has more than two dimensions
 */
export function stack(v1: NumericArray, v2: NumericArray): number[] | number[][] {
  const a = atLeast2d(v1);
  const b = atLeast2d(v2);
  const [m1, n1] = a.shape;
  const [m2, n2] = b.shape;

  let out: NdArray;
  if (m1 === m2 && (m1 < n1 || m2 < n2)) {
    out = concatRows(a, b);
  } else if (n1 === n2 && (n1 < m1 || n2 < m2)) {
    out = concatColumns(a, b);
  } else {
    throw new DimensionMismatchError("v1 and v2 have no common dimension", a.shape, b.shape);
  }

  const squeezed = squeeze(out);
  return squeezed.shape.length === 2 ? toRows(squeezed) : squeezed.data;
}

function atLeast2d(input: NumericArray): NdArray {
  const nd = toNdArray(input);
  switch (nd.shape.length) {
    case 0:
      return { shape: [1, 1], data: nd.data };
    case 1:
      return { shape: [1, nd.shape[0]], data: nd.data };
    case 2:
      return nd;
    default:
      throw new ShapeError("stack() takes scalars, vectors or matrices", nd.shape);
  }
}

function concatRows(a: NdArray, b: NdArray): NdArray {
  const [m1, n1] = a.shape;
  const [m2, n2] = b.shape;
  if (n1 !== n2) {
    throw new DimensionMismatchError("cannot stack rows of different widths", a.shape, b.shape);
  }
  return { shape: [m1 + m2, n1], data: [...a.data, ...b.data] };
}

function concatColumns(a: NdArray, b: NdArray): NdArray {
  const [m1, n1] = a.shape;
  const [m2, n2] = b.shape;
  if (m1 !== m2) {
    throw new DimensionMismatchError("cannot stack columns of different heights", a.shape, b.shape);
  }

  const data: number[] = [];
  for (let row = 0; row < m1; row++) {
    data.push(...a.data.slice(row * n1, (row + 1) * n1));
    data.push(...b.data.slice(row * n2, (row + 1) * n2));
  }
  return { shape: [m1, n1 + n2], data };
}

/**
 * Interleaves left and right channel matrices (channels x samples) into
 * one matrix with twice the channels: output row 2k is left row k and
 * output row 2k+1 is right row k.
 *
 * With `style` "SSR" the inputs must also carry exactly 360 channels.
 *
 * @throws DimensionMismatchError if left and right differ in shape
 * @throws FormatConstraintError if the SSR channel count is not met
 * @throws ShapeError if the inputs are not two-dimensional
 */
export function interleaveChannels(
  left: ChannelMatrix,
  right: ChannelMatrix,
  style?: ChannelLayoutStyle
): number[][] {
  const l = toNdArray(left);
  const r = toNdArray(right);

  if (!shapesEqual(l.shape, r.shape)) {
    throw new DimensionMismatchError("left and right channels must have the same shape", l.shape, r.shape);
  }

  if (l.shape.length !== 2) {
    throw new ShapeError("channel matrices must be channels x samples", l.shape);
  }

  if (style === "SSR" && l.shape[0] !== SSR_CHANNEL_COUNT) {
    throw new FormatConstraintError(
      "SSR",
      `expected ${SSR_CHANNEL_COUNT} channels (channels x samples), got ${l.shape[0]}`
    );
  }

  const leftRows = toRows(l);
  const rightRows = toRows(r);

  return leftRows.flatMap((row, channel) => [row, rightRows[channel]]);
}
