/**
 * Angular metrics between directions and points.
 */

import * as THREE from "three";
import type { NumericArray, NumericSequence } from "@spatialmath/contracts";
import { DimensionMismatchError, ShapeError } from "@spatialmath/contracts";
import { asArray1d, broadcast1d, toNdArray, toRows } from "../shape";

/**
 * Angle between v1 and v2, optionally measured at a shared vertex.
 *
 * v2 may be a single vector (one angle) or rows of vectors (one angle
 * per row). With `vertex` both vectors are taken relative to it.
 *
 * The cosine is clamped to [-1, 1] before acos; a zero-length vector
 * still yields NaN.
 *
 * @throws DimensionMismatchError if the vector lengths differ
 */
export function angleBetween(v1: NumericArray, v2: ArrayLike<number>, vertex?: NumericArray): number;
export function angleBetween(
  v1: NumericArray,
  v2: readonly ArrayLike<number>[],
  vertex?: NumericArray
): number[];
export function angleBetween(
  v1: NumericArray,
  v2: ArrayLike<number> | readonly ArrayLike<number>[],
  vertex?: NumericArray
): number | number[] {
  const origin = vertex === undefined ? undefined : asArray1d(vertex);
  const relative = (v: NumericSequence) => (origin ? subtract(v, origin) : v);

  const from = relative(asArray1d(v1));
  const to = toNdArray(v2);

  switch (to.shape.length) {
    case 1:
      return angle(from, relative(to.data));
    case 2:
      return toRows(to).map((row) => angle(from, relative(row)));
    default:
      throw new ShapeError("v2 must be a vector or rows of vectors", to.shape);
  }
}

/**
 * Great-circle distance between (azimuth1, colatitude1) and
 * (azimuth2, colatitude2) on a sphere of the given radius.
 * For radius 1 this is the central angle.
 *
 * All-scalar input gives a number; otherwise every argument is
 * flattened and broadcast, and one distance per element is returned.
 *
 * @see https://en.wikipedia.org/wiki/Haversine_formula
 */
export function haversine(
  azimuth1: number,
  colatitude1: number,
  azimuth2: number,
  colatitude2: number,
  radius?: number
): number;
export function haversine(
  azimuth1: NumericArray,
  colatitude1: NumericArray,
  azimuth2: NumericArray,
  colatitude2: NumericArray,
  radius?: NumericArray
): number[];
export function haversine(
  azimuth1: NumericArray,
  colatitude1: NumericArray,
  azimuth2: NumericArray,
  colatitude2: NumericArray,
  radius: NumericArray = 1
): number | number[] {
  if (
    typeof azimuth1 === "number" &&
    typeof colatitude1 === "number" &&
    typeof azimuth2 === "number" &&
    typeof colatitude2 === "number" &&
    typeof radius === "number"
  ) {
    return haversineDistance(azimuth1, colatitude1, azimuth2, colatitude2, radius);
  }

  const [az1, colat1, az2, colat2, r] = broadcast1d(
    asArray1d(azimuth1),
    asArray1d(colatitude1),
    asArray1d(azimuth2),
    asArray1d(colatitude2),
    asArray1d(radius)
  );

  return az1.map((a, i) => haversineDistance(a, colat1[i], az2[i], colat2[i], r[i]));
}

function haversineDistance(
  azimuth1: number,
  colatitude1: number,
  azimuth2: number,
  colatitude2: number,
  radius: number
): number {
  const lat1 = Math.PI / 2 - colatitude1;
  const lat2 = Math.PI / 2 - colatitude2;

  const dLon = azimuth2 - azimuth1;
  const dLat = lat2 - lat1;

  const haversinLat = Math.sin(dLat / 2) ** 2;
  const haversinLon = Math.sin(dLon / 2) ** 2;
  const haversinAlpha = haversinLat + Math.cos(lat1) * Math.cos(lat2) * haversinLon;

  return 2 * radius * Math.asin(Math.sqrt(haversinAlpha));
}

/**
 * Area of the triangle spanned by three corners: 0.5 * |(p2-p1) x (p3-p1)|.
 * Corners may be 2D (z = 0) or 3D. Collinear corners give 0.
 *
 * @throws ShapeError if a corner is not a 2D or 3D point
 */
export function triangleArea(p1: NumericArray, p2: NumericArray, p3: NumericArray): number {
  const a = toVector3(p1);
  const ab = new THREE.Vector3().subVectors(toVector3(p2), a);
  const ac = new THREE.Vector3().subVectors(toVector3(p3), a);

  return 0.5 * ab.cross(ac).length();
}

function toVector3(point: NumericArray): THREE.Vector3 {
  const p = asArray1d(point);
  switch (p.length) {
    case 2:
      return new THREE.Vector3(p[0], p[1], 0);
    case 3:
      return new THREE.Vector3(p[0], p[1], p[2]);
    default:
      throw new ShapeError("triangle corners must be 2D or 3D points", [p.length]);
  }
}

function angle(a: NumericSequence, b: NumericSequence): number {
  if (a.length !== b.length) {
    throw new DimensionMismatchError("vectors must have the same length", [a.length], [b.length]);
  }

  const cosine = dot(a, b) / (norm(a) * norm(b));
  return Math.acos(THREE.MathUtils.clamp(cosine, -1, 1));
}

function subtract(a: NumericSequence, b: NumericSequence): NumericSequence {
  if (a.length !== b.length) {
    throw new DimensionMismatchError("vertex must match the vector length", [a.length], [b.length]);
  }
  return a.map((n, i) => n - b[i]);
}

function dot(a: NumericSequence, b: NumericSequence): number {
  let sum = 0;
  for (let i = 0; i < a.length; i++) {
    sum += a[i] * b[i];
  }
  return sum;
}

function norm(a: NumericSequence): number {
  return Math.sqrt(dot(a, a));
}
