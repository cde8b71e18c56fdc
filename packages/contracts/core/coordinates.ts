export type Vector3 = [number, number, number];

/** [azimuth, colatitude] in radians */
export type Direction = [number, number];

export interface CartesianCoordinates {
  x: number[];
  y: number[];
  z: number[];
}

/**
 * Physics convention: colatitude is measured down from the +z pole.
 */
export interface SphericalCoordinates {
  azimuth: number[];    // (-pi, pi] from atan2
  colatitude: number[]; // 0..pi
  radius: number[];     // >= 0
}

/**
 * A single spherical direction, tagged with the convention its second
 * angle is expressed in. Elevation = pi/2 - colatitude.
 */
export type SphericalDirection =
  | {
      convention: "colatitude";
      azimuth: number;
      colatitude: number;
      radius?: number;
    }
  | {
      convention: "elevation";
      azimuth: number;
      elevation: number; // -pi/2..pi/2
      radius?: number;
    };

export type AngleConvention = SphericalDirection["convention"];
