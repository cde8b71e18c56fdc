import type { Complex, NestedNumbers, SampleArray, SampleSequence } from "@spatialmath/contracts";
import { ShapeError } from "@spatialmath/contracts";
import { fromNdArray, sizeOf, toNdArrayBy } from "../shape";

/** x * conj(x), which is real for complex samples. */
function energy(sample: number | Complex): number {
  return typeof sample === "number"
    ? sample * sample
    : sample.re * sample.re + sample.im * sample.im;
}

/**
 * Root-mean-square along one axis. Other axes are kept.
 *
 * Samples may be real or complex. `axis` counts from the end when
 * negative; the default reduces the last axis (time, for a
 * channels x samples matrix). Reducing an empty axis gives NaN.
 *
 * @throws ShapeError if `axis` does not exist in the input
 */
export function rms(x: SampleSequence, axis?: number): number;
export function rms(x: readonly SampleSequence[], axis?: number): number[];
export function rms(x: SampleArray, axis?: number): NestedNumbers;
export function rms(x: SampleArray, axis = -1): NestedNumbers {
  const { shape, data } = toNdArrayBy(x, energy);
  const ndim = shape.length;
  const k = axis < 0 ? axis + ndim : axis;

  if (!Number.isInteger(axis) || k < 0 || k >= ndim) {
    throw new ShapeError(`axis ${axis} is out of bounds for array of dimension ${ndim}`, shape);
  }

  const outer = sizeOf(shape.slice(0, k));
  const length = shape[k];
  const inner = sizeOf(shape.slice(k + 1));
  const result = new Array<number>(outer * inner);

  for (let o = 0; o < outer; o++) {
    for (let i = 0; i < inner; i++) {
      let sum = 0;
      for (let j = 0; j < length; j++) {
        sum += data[(o * length + j) * inner + i];
      }
      result[o * inner + i] = Math.sqrt(sum / length);
    }
  }

  return fromNdArray({ shape: [...shape.slice(0, k), ...shape.slice(k + 1)], data: result });
}
