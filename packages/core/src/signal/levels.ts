/**
 * Decibel conversions.
 *
 * Zero maps to -Infinity and is not an error; log10(0) is returned as is.
 */

import type { DecibelOptions, NestedNumbers, NumericArray } from "@spatialmath/contracts";
import { DEFAULT_DECIBEL_OPTIONS } from "@spatialmath/contracts";
import { mapElements } from "../shape";

function decibelFactor(options?: DecibelOptions): number {
  const cfg = { ...DEFAULT_DECIBEL_OPTIONS, ...options };
  return cfg.power ? 10 : 20;
}

/**
 * Ratio to decibel: 20 log10(|x|), or 10 log10(|x|) for power ratios.
 */
export function toDecibel(x: number, options?: DecibelOptions): number;
export function toDecibel(x: ArrayLike<number>, options?: DecibelOptions): number[];
export function toDecibel(x: NumericArray, options?: DecibelOptions): NestedNumbers;
export function toDecibel(x: NumericArray, options?: DecibelOptions): NestedNumbers {
  const factor = decibelFactor(options);
  return mapElements(x, (value) => factor * Math.log10(Math.abs(value)));
}

/**
 * Decibel back to ratio. `power` must match the one used for toDecibel().
 */
export function fromDecibel(db: number, options?: DecibelOptions): number;
export function fromDecibel(db: ArrayLike<number>, options?: DecibelOptions): number[];
export function fromDecibel(db: NumericArray, options?: DecibelOptions): NestedNumbers;
export function fromDecibel(db: NumericArray, options?: DecibelOptions): NestedNumbers {
  const factor = decibelFactor(options);
  return mapElements(db, (value) => Math.pow(10, value / factor));
}
