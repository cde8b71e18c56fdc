/**
 * Angle Conversions
 *
 * Degree/radian mapping with canonical range normalization, plus the
 * explicit conversion between the two polar-angle conventions.
 *
 * All functions are element-wise and keep the input's nesting:
 * a number maps to a number, a flat array to a flat array.
 */

import * as THREE from "three";
import type { NestedNumbers, NumericArray } from "@spatialmath/contracts";
import { mapElements } from "../shape";

const FULL_TURN_DEG = 360;
const HALF_PI = Math.PI / 2;

/**
 * Degrees to radians, wrapped into [0, 2pi).
 * Negative inputs wrap around: -10 maps to the radian value of 350.
 */
export function deg2rad(deg: number): number;
export function deg2rad(deg: ArrayLike<number>): number[];
export function deg2rad(deg: NumericArray): NestedNumbers;
export function deg2rad(deg: NumericArray): NestedNumbers {
  return mapElements(
    deg,
    (d) => (THREE.MathUtils.euclideanModulo(d, FULL_TURN_DEG) / 180) * Math.PI
  );
}

/**
 * Radians to degrees, wrapped into [0, 360).
 */
export function rad2deg(rad: number): number;
export function rad2deg(rad: ArrayLike<number>): number[];
export function rad2deg(rad: NumericArray): NestedNumbers;
export function rad2deg(rad: NumericArray): NestedNumbers {
  return mapElements(rad, (r) =>
    THREE.MathUtils.euclideanModulo((r / Math.PI) * 180, FULL_TURN_DEG)
  );
}

/** Elevation (up from the horizontal plane) to colatitude (down from +z). */
export function elevationToColatitude(elevation: number): number;
export function elevationToColatitude(elevation: ArrayLike<number>): number[];
export function elevationToColatitude(elevation: NumericArray): NestedNumbers;
export function elevationToColatitude(elevation: NumericArray): NestedNumbers {
  return mapElements(elevation, (e) => HALF_PI - e);
}

/** Colatitude (down from +z) to elevation (up from the horizontal plane). */
export function colatitudeToElevation(colatitude: number): number;
export function colatitudeToElevation(colatitude: ArrayLike<number>): number[];
export function colatitudeToElevation(colatitude: NumericArray): NestedNumbers;
export function colatitudeToElevation(colatitude: NumericArray): NestedNumbers {
  return mapElements(colatitude, (c) => HALF_PI - c);
}
