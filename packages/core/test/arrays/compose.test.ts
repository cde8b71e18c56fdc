import { describe, it, expect } from "vitest";
import {
  DimensionMismatchError,
  FormatConstraintError,
  ShapeError,
} from "@spatialmath/contracts";
import { interleaveChannels, stack } from "../../src/arrays/compose";

describe("stack", () => {
  it("stacks two row vectors into rows", () => {
    expect(stack([1, 2, 3, 4, 5], [6, 7, 8, 9, 10])).toEqual([
      [1, 2, 3, 4, 5],
      [6, 7, 8, 9, 10],
    ]);
  });

  it("treats explicit 1 x N input like a flat vector", () => {
    expect(stack([[1, 2, 3, 4, 5]], [6, 7, 8, 9, 10])).toEqual([
      [1, 2, 3, 4, 5],
      [6, 7, 8, 9, 10],
    ]);
  });

  it("stacks two column vectors side by side", () => {
    expect(stack([[1], [2], [3]], [[4], [5], [6]])).toEqual([
      [1, 4],
      [2, 5],
      [3, 6],
    ]);
  });

  it("concatenates rows when the shared row count is the smaller dimension", () => {
    const result = stack(
      [
        [1, 2, 3],
        [4, 5, 6],
      ],
      [
        [7, 8, 9],
        [10, 11, 12],
      ]
    );
    expect(result).toEqual([
      [1, 2, 3],
      [4, 5, 6],
      [7, 8, 9],
      [10, 11, 12],
    ]);
  });

  it("concatenates columns when the shared column count is the smaller dimension", () => {
    const result = stack(
      [
        [1, 2],
        [3, 4],
        [5, 6],
      ],
      [
        [7, 8],
        [9, 10],
        [11, 12],
      ]
    );
    expect(result).toEqual([
      [1, 2, 7, 8],
      [3, 4, 9, 10],
      [5, 6, 11, 12],
    ]);
  });

  it("throws when there is no common dimension", () => {
    expect(() => stack([1, 2, 3], [[1], [2]])).toThrow(DimensionMismatchError);
  });

  // Convention: equal square inputs pass neither "smaller dimension" test.
  it("rejects two equal square matrices", () => {
    expect(() =>
      stack(
        [
          [1, 2],
          [3, 4],
        ],
        [
          [5, 6],
          [7, 8],
        ]
      )
    ).toThrow(DimensionMismatchError);
  });

  it("throws when the shared rows differ in width", () => {
    expect(() => stack([1, 2, 3, 4, 5], [1, 2, 3])).toThrow(
      "cannot stack rows of different widths ([1, 5] vs [1, 3])"
    );
  });

  it("squeezes the result", () => {
    expect(stack([], [])).toEqual([]);
  });

  it("rejects three-dimensional input", () => {
    expect(() => stack([[[1, 2]]], [1, 2])).toThrow(ShapeError);
  });
});

describe("interleaveChannels", () => {
  const left = [
    [1, 1, 1],
    [2, 2, 2],
  ];
  const right = [
    [10, 10, 10],
    [20, 20, 20],
  ];

  it("alternates left and right channels", () => {
    expect(interleaveChannels(left, right)).toEqual([
      [1, 1, 1],
      [10, 10, 10],
      [2, 2, 2],
      [20, 20, 20],
    ]);
  });

  it("copies rows instead of aliasing the inputs", () => {
    const result = interleaveChannels(left, right);
    result[0][0] = 99;
    expect(left[0][0]).toBe(1);
  });

  it("accepts typed-array rows", () => {
    const result = interleaveChannels([new Float32Array([0.5, 0.25])], [new Float32Array([-0.5, -0.25])]);
    expect(result).toEqual([
      [0.5, 0.25],
      [-0.5, -0.25],
    ]);
  });

  it("throws when left and right differ in shape", () => {
    expect(() => interleaveChannels(left, [[10, 10, 10]])).toThrow(DimensionMismatchError);
  });

  describe("SSR style", () => {
    it("requires 360 channels", () => {
      expect(() => interleaveChannels(left, right, "SSR")).toThrow(FormatConstraintError);
      expect(() => interleaveChannels(left, right, "SSR")).toThrow(
        "SSR: expected 360 channels (channels x samples), got 2"
      );
    });

    it("interleaves a full 360-channel layout", () => {
      const ssrLeft = Array.from({ length: 360 }, (_, i) => [i, i]);
      const ssrRight = Array.from({ length: 360 }, (_, i) => [1000 + i, 1000 + i]);

      const result = interleaveChannels(ssrLeft, ssrRight, "SSR");

      expect(result).toHaveLength(720);
      expect(result[0]).toEqual([0, 0]);
      expect(result[1]).toEqual([1000, 1000]);
      expect(result[358]).toEqual([179, 179]);
      expect(result[719]).toEqual([1359, 1359]);
    });

    it("interleaves long typed-array channels", () => {
      const ssrLeft = Array.from({ length: 360 }, (_, i) => new Float32Array(4800).fill(i));
      const ssrRight = Array.from({ length: 360 }, (_, i) => new Float32Array(4800).fill(-i));

      const result = interleaveChannels(ssrLeft, ssrRight, "SSR");

      expect(result).toHaveLength(720);
      expect(result[0]).toHaveLength(4800);
      expect(result[2][4799]).toBe(1);
      expect(result[719][0]).toBe(-359);
    });
  });
});
