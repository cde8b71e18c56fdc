import { describe, it, expect } from "vitest";
import { ShapeError } from "@spatialmath/contracts";
import { rms } from "../../src/signal/rms";

describe("rms", () => {
  it("computes the RMS of a flat signal", () => {
    expect(rms([1, -1, 1, -1])).toBe(1);
    expect(rms([3, 4])).toBeCloseTo(Math.sqrt(12.5), 12);
  });

  it("accepts typed arrays", () => {
    expect(rms(new Float32Array([2, -2]))).toBe(2);
  });

  it("reduces the last axis by default", () => {
    expect(
      rms([
        [1, 1, 1],
        [2, -2, 2],
      ])
    ).toEqual([1, 2]);
  });

  it("reduces the requested axis only", () => {
    const result = rms(
      [
        [1, 3],
        [1, 3],
      ],
      0
    );
    expect(result).toEqual([1, 3]);
  });

  it("uses the squared magnitude of complex samples", () => {
    expect(rms([{ re: 3, im: 4 }])).toBe(5);
    expect(rms([{ re: 0, im: 2 }, 2])).toBe(2);
  });

  it("keeps leading axes of higher-dimensional input", () => {
    const result = rms([
      [[1], [2]],
      [[3], [4]],
    ]);
    expect(result).toEqual([
      [1, 2],
      [3, 4],
    ]);
  });

  it("gives NaN for an empty signal", () => {
    expect(rms([])).toBeNaN();
  });

  it("throws for an axis the input does not have", () => {
    expect(() => rms([1, 2, 3], 1)).toThrow(ShapeError);
    expect(() => rms([1, 2, 3], -2)).toThrow("axis -2 is out of bounds for array of dimension 1");
  });
});
