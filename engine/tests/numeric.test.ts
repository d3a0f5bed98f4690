import { describe, expect, it } from "vitest";
import { arange, finiteMax, isClose, linspace, mean, roundHalfEven } from "../src/numeric.js";

describe("arange", () => {
  it("excludes the stop value", () => {
    expect(arange(0, 1, 0.25)).toEqual([0, 0.25, 0.5, 0.75]);
  });

  it("is empty for an inverted or non-finite range", () => {
    expect(arange(5, 0, 1)).toEqual([]);
    expect(arange(0, Number.NaN, 1)).toEqual([]);
  });
});

describe("linspace", () => {
  it("ends exactly on stop", () => {
    expect(linspace(0, 1, 3)).toEqual([0, 0.5, 1]);
    expect(linspace(0, 1500, 31)[30]).toBe(1500);
  });

  it("handles degenerate counts", () => {
    expect(linspace(0, 1, 0)).toEqual([]);
    expect(linspace(4, 9, 1)).toEqual([4]);
  });
});

describe("roundHalfEven", () => {
  it("rounds ties to the even neighbour", () => {
    expect(roundHalfEven(2.5)).toBe(2);
    expect(roundHalfEven(3.5)).toBe(4);
    expect(roundHalfEven(-2.5)).toBe(-2);
    expect(roundHalfEven(901.5)).toBe(902);
  });

  it("rounds non-ties normally", () => {
    expect(roundHalfEven(2.4)).toBe(2);
    expect(roundHalfEven(2.6)).toBe(3);
  });
});

describe("helpers", () => {
  it("mean is NaN for no values", () => {
    expect(mean([])).toBeNaN();
    expect(mean([1, 2, 3])).toBe(2);
  });

  it("finiteMax skips NaN and infinities", () => {
    expect(finiteMax([1, Number.NaN, 7, Infinity])).toBe(7);
    expect(finiteMax([Number.NaN])).toBeNaN();
  });

  it("isClose uses relative and absolute tolerance", () => {
    expect(isClose(10.00001, 10)).toBe(true);
    expect(isClose(10.001, 10)).toBe(false);
  });
});
