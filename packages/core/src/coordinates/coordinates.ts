/**
 * Coordinate Transforms
 *
 * Two spherical conventions live here and are never interchangeable:
 *
 * - colatitude (physics): second angle measured down from the +z pole,
 *   0..pi. Used by cartesianToSpherical / sphericalToCartesian.
 * - elevation (legacy): second angle measured up from the horizontal
 *   plane, -pi/2..pi/2. Used only by legacySphericalToCartesian.
 *
 * elevation = pi/2 - colatitude.
 */

import * as THREE from "three";
import type {
  CartesianCoordinates,
  CartesianToSphericalOptions,
  Direction,
  NumericArray,
  SphericalCoordinates,
  SphericalDirection,
  Vector3,
  VectorsToDirectionsOptions,
} from "@spatialmath/contracts";
import {
  DEFAULT_CARTESIAN_TO_SPHERICAL_OPTIONS,
  DEFAULT_VECTORS_TO_DIRECTIONS_OPTIONS,
  STEADY_RADIUS_EPSILON,
  ShapeError,
} from "@spatialmath/contracts";
import { asArray1d, broadcast1d } from "../shape";

const TWO_PI = 2 * Math.PI;

/**
 * Cartesian to spherical (azimuth, colatitude, radius).
 *
 * Each component is flattened to one dimension on its own; components of
 * length 1 broadcast against the others.
 *
 * Azimuth comes from atan2 and lies in (-pi, pi]. At the origin the
 * colatitude is NaN unless `steadyColatitude` is set, in which case the
 * radius is clamped to 1e-14 before dividing and the origin maps to pi/2.
 *
 * @throws DimensionMismatchError if the component lengths cannot broadcast
 */
export function cartesianToSpherical(
  x: NumericArray,
  y: NumericArray,
  z: NumericArray,
  options?: CartesianToSphericalOptions
): SphericalCoordinates {
  const cfg = { ...DEFAULT_CARTESIAN_TO_SPHERICAL_OPTIONS, ...options };
  const [xs, ys, zs] = broadcast1d(asArray1d(x), asArray1d(y), asArray1d(z));

  const radius = xs.map((xi, i) => Math.sqrt(xi * xi + ys[i] * ys[i] + zs[i] * zs[i]));
  const azimuth = xs.map((xi, i) => Math.atan2(ys[i], xi));
  const colatitude = zs.map((zi, i) => {
    const r = cfg.steadyColatitude ? Math.max(radius[i], STEADY_RADIUS_EPSILON) : radius[i];
    return Math.acos(zi / r);
  });

  return { azimuth, colatitude, radius };
}

/**
 * Spherical (azimuth, colatitude, radius) to Cartesian.
 */
export function sphericalToCartesian(
  azimuth: NumericArray,
  colatitude: NumericArray,
  radius: NumericArray = 1
): CartesianCoordinates {
  const [az, colat, r] = broadcast1d(
    asArray1d(azimuth),
    asArray1d(colatitude),
    asArray1d(radius)
  );

  return {
    x: az.map((a, i) => r[i] * Math.cos(a) * Math.sin(colat[i])),
    y: az.map((a, i) => r[i] * Math.sin(a) * Math.sin(colat[i])),
    z: colat.map((c, i) => r[i] * Math.cos(c)),
  };
}

/**
 * Spherical to Cartesian in the legacy ELEVATION convention.
 *
 * Not a drop-in for sphericalToCartesian: passing a colatitude here
 * mirrors the point through the horizontal plane and swaps sin/cos.
 */
export function legacySphericalToCartesian(
  azimuth: NumericArray,
  elevation: NumericArray,
  radius: NumericArray
): CartesianCoordinates {
  const [az, elev, r] = broadcast1d(
    asArray1d(azimuth),
    asArray1d(elevation),
    asArray1d(radius)
  );

  const rCosElev = elev.map((e, i) => r[i] * Math.cos(e));

  return {
    x: az.map((a, i) => rCosElev[i] * Math.cos(a)),
    y: az.map((a, i) => rCosElev[i] * Math.sin(a)),
    z: elev.map((e, i) => r[i] * Math.sin(e)),
  };
}

/**
 * Converts rows of [x, y, z] to rows of [azimuth, colatitude].
 *
 * @throws ShapeError if a row is not three wide
 */
export function vectorsToDirections(
  vectors: readonly ArrayLike<number>[],
  options?: VectorsToDirectionsOptions
): Direction[] {
  const cfg = { ...DEFAULT_VECTORS_TO_DIRECTIONS_OPTIONS, ...options };
  const columns = splitColumns(vectors, 3, "vectors must have shape (N, 3)");

  const { azimuth, colatitude } = cartesianToSpherical(columns[0], columns[1], columns[2]);

  return azimuth.map((a, i): Direction => [
    cfg.positiveAzimuth ? THREE.MathUtils.euclideanModulo(a, TWO_PI) : a,
    colatitude[i],
  ]);
}

/**
 * Converts rows of [azimuth, colatitude] to rows of [x, y, z].
 *
 * @throws ShapeError if a row is not two wide
 * @throws DimensionMismatchError if `radius` does not broadcast against the rows
 */
export function directionsToVectors(
  directions: readonly ArrayLike<number>[],
  radius: NumericArray = 1
): Vector3[] {
  const columns = splitColumns(directions, 2, "directions must have shape (N, 2)");
  const { x, y, z } = sphericalToCartesian(columns[0], columns[1], radius);

  return x.map((xi, i): Vector3 => [xi, y[i], z[i]]);
}

/**
 * Converts one tagged direction to a Cartesian point, dispatching on the
 * angle convention it carries.
 */
export function directionToCartesian(direction: SphericalDirection): Vector3 {
  const radius = direction.radius ?? 1;

  switch (direction.convention) {
    case "colatitude": {
      const { x, y, z } = sphericalToCartesian(direction.azimuth, direction.colatitude, radius);
      return [x[0], y[0], z[0]];
    }
    case "elevation": {
      const { x, y, z } = legacySphericalToCartesian(direction.azimuth, direction.elevation, radius);
      return [x[0], y[0], z[0]];
    }
  }
}

function splitColumns(
  rows: readonly ArrayLike<number>[],
  width: number,
  message: string
): number[][] {
  const columns: number[][] = Array.from({ length: width }, () => []);

  rows.forEach((row) => {
    if (row.length !== width) {
      throw new ShapeError(message, [rows.length, row.length]);
    }
    for (let c = 0; c < width; c++) {
      columns[c].push(row[c]);
    }
  });

  return columns;
}
