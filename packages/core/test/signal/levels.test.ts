import { describe, it, expect } from "vitest";
import { fromDecibel, toDecibel } from "../../src/signal/levels";

describe("toDecibel", () => {
  it("uses 20 log10 for amplitude ratios", () => {
    expect(toDecibel(10)).toBe(20);
    expect(toDecibel(1)).toBe(0);
  });

  it("uses 10 log10 for power ratios", () => {
    expect(toDecibel(100, { power: true })).toBe(20);
  });

  it("takes the magnitude of negative values", () => {
    expect(toDecibel(-10)).toBe(20);
  });

  it("maps zero to -Infinity without throwing", () => {
    expect(toDecibel(0)).toBe(-Infinity);
    expect(toDecibel([0, 1])).toEqual([-Infinity, 0]);
  });

  it("keeps nested shapes", () => {
    expect(toDecibel([[1], [10]])).toEqual([[0], [20]]);
  });
});

describe("fromDecibel", () => {
  it("inverts 20 log10", () => {
    expect(fromDecibel(20)).toBe(10);
    expect(fromDecibel(-20)).toBeCloseTo(0.1, 12);
  });

  it("inverts 10 log10 for power", () => {
    expect(fromDecibel(20, { power: true })).toBe(100);
  });

  it("maps -Infinity back to zero", () => {
    expect(fromDecibel(-Infinity)).toBe(0);
  });
});

describe("decibel round trips", () => {
  it("toDecibel(fromDecibel(db)) returns db", () => {
    for (const db of [-96, -6, 0, 3.5, 12]) {
      expect(toDecibel(fromDecibel(db))).toBeCloseTo(db, 10);
      expect(toDecibel(fromDecibel(db, { power: true }), { power: true })).toBeCloseTo(db, 10);
    }
  });

  it("fromDecibel(toDecibel(x)) returns |x|", () => {
    for (const x of [0.001, 0.5, -0.5, 2, 1000]) {
      expect(fromDecibel(toDecibel(x))).toBeCloseTo(Math.abs(x), 10);
    }
  });
});
