import type { CompareArraysOptions, NumericArray } from "@spatialmath/contracts";
import { DEFAULT_COMPARE_ARRAYS_OPTIONS, ShapeError } from "@spatialmath/contracts";
import { broadcast1d, toNdArray } from "../shape";

/**
 * Cumulative element-wise difference between two arrays, for debugging.
 *
 * Both inputs are flattened, then sum(|v1 - v2|) is returned. When
 * `verbose`, one line is logged saying whether the difference exceeds
 * `tolerance`. A NaN difference is reported as a difference, not as
 * close. Advisory only: nothing is thrown for a large difference.
 */
export function compareArrays(
  v1: NumericArray,
  v2: NumericArray,
  options?: CompareArraysOptions
): number {
  const cfg = { ...DEFAULT_COMPARE_ARRAYS_OPTIONS, ...options };

  // Flattened input has exactly one axis.
  if (cfg.axis !== undefined && cfg.axis !== 0 && cfg.axis !== -1) {
    throw new ShapeError(`axis ${cfg.axis} is out of bounds for array of dimension 1`);
  }

  const [a, b] = broadcast1d(toNdArray(v1).data, toNdArray(v2).data);
  const diff = a.reduce((sum, value, i) => sum + Math.abs(value - b[i]), 0);

  if (cfg.verbose) {
    const prefix = cfg.label === undefined ? "[compareArrays]" : `[compareArrays] ${cfg.label} --`;
    if (diff > cfg.tolerance || Number.isNaN(diff)) {
      console.log(`${prefix} Diff: ${diff}`);
    } else {
      console.log(`${prefix} Close enough.`);
    }
  }

  return diff;
}
