/**
 * Strided n-dimensional views over nested numeric input.
 *
 * Everything downstream works on the flattened row-major `data` of an
 * NdArray and rebuilds nested arrays only at the output boundary.
 */

import type {
  Complex,
  NdArray,
  NestedNumbers,
  NumericArray,
  SampleArray,
} from "@spatialmath/contracts";
import { ShapeError } from "@spatialmath/contracts";

export function sizeOf(shape: readonly number[]): number {
  return shape.reduce((acc, dim) => acc * dim, 1);
}

export function shapesEqual(a: readonly number[], b: readonly number[]): boolean {
  if (a.length !== b.length) return false;
  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i]) return false;
  }
  return true;
}

function isComplex(value: SampleArray): value is Complex {
  return typeof value === "object" && "re" in value && "im" in value;
}

/**
 * Walks nested input, mapping every leaf sample through `leaf`.
 * Sibling sub-arrays must share a shape.
 */
export function toNdArrayBy(
  input: SampleArray,
  leaf: (sample: number | Complex) => number
): NdArray {
  if (typeof input === "number" || isComplex(input)) {
    return { shape: [], data: [leaf(input)] };
  }

  if (input.length === 0) {
    return { shape: [0], data: [] };
  }

  if (typeof input[0] === "number") {
    return { shape: [input.length], data: flatRow(input, leaf) };
  }

  const first = toNdArrayBy(input[0], leaf);
  const data = [...first.data];

  for (let i = 1; i < input.length; i++) {
    const child = toNdArrayBy(input[i], leaf);
    if (!shapesEqual(child.shape, first.shape)) {
      throw new ShapeError(
        `array must be rectangular: element ${i} has shape [${child.shape.join(", ")}], expected [${first.shape.join(", ")}]`
      );
    }
    for (const value of child.data) {
      data.push(value);
    }
  }

  return { shape: [input.length, ...first.shape], data };
}

/** One pass over a row of samples; a nested element makes it ragged. */
function flatRow(
  row: ArrayLike<number> | readonly SampleArray[],
  leaf: (sample: number | Complex) => number
): number[] {
  const data = new Array<number>(row.length);
  for (let i = 0; i < row.length; i++) {
    const sample = row[i];
    if (typeof sample !== "number" && !isComplex(sample)) {
      throw new ShapeError(
        `array must be rectangular: element ${i} has shape [${toNdArrayBy(sample, leaf).shape.join(", ")}], expected []`
      );
    }
    data[i] = leaf(sample);
  }
  return data;
}

function realSample(sample: number | Complex): number {
  if (typeof sample !== "number") {
    throw new TypeError("expected real-valued samples");
  }
  return sample;
}

export function toNdArray(input: NumericArray): NdArray {
  return toNdArrayBy(input, realSample);
}

export function fromNdArray(nd: NdArray): NestedNumbers {
  return build(nd.shape, nd.data, 0);
}

function build(shape: readonly number[], data: readonly number[], offset: number): NestedNumbers {
  if (shape.length === 0) {
    return data[offset];
  }

  const [size, ...rest] = shape;
  const stride = sizeOf(rest);
  return Array.from({ length: size }, (_, i) => build(rest, data, offset + i * stride));
}

/** Drops every singleton dimension. */
export function squeeze(nd: NdArray): NdArray {
  return { shape: nd.shape.filter((dim) => dim !== 1), data: nd.data };
}

/**
 * Splits a two-dimensional NdArray into rows.
 */
export function toRows(nd: NdArray): number[][] {
  const [rows, columns] = nd.shape;
  return Array.from({ length: rows }, (_, i) =>
    nd.data.slice(i * columns, (i + 1) * columns)
  );
}

/**
 * Applies `fn` to every element, keeping the input's nesting.
 * A bare number maps to a bare number.
 */
export function mapElements(
  input: NumericArray,
  fn: (value: number) => number
): NestedNumbers {
  if (typeof input === "number") {
    return fn(input);
  }

  const nd = toNdArray(input);
  return fromNdArray({ shape: nd.shape, data: nd.data.map(fn) });
}
