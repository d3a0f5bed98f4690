import { describe, expect, it } from "vitest";
import { computeAreaRatios } from "../src/area-ratio.js";
import { Matrix } from "../src/grid.js";
import { GeometryMask } from "../src/interpolator.js";

function layers(values: number[], maskBits: boolean[]): { eff: Matrix; mask: GeometryMask } {
  const eff = new Matrix(2, 2);
  const mask = new GeometryMask(2, 2);
  values.forEach((v, i) => eff.set(Math.floor(i / 2), i % 2, v));
  maskBits.forEach((b, i) => mask.set(Math.floor(i / 2), i % 2, b));
  return { eff, mask };
}

describe("computeAreaRatios", () => {
  it("divides counts at or above each level by the mask size, highest level first", () => {
    const { eff, mask } = layers([95, 85, 75, Number.NaN], [true, true, true, true]);
    expect(computeAreaRatios(eff, mask, [80, 90])).toEqual([
      { level: 90, ratio: 25 },
      { level: 80, ratio: 50 },
    ]);
  });

  it("counts a value equal to the level", () => {
    const { eff, mask } = layers([90, 80, 70, 60], [true, true, true, true]);
    expect(computeAreaRatios(eff, mask, [90])).toEqual([{ level: 90, ratio: 25 }]);
  });

  it("never increases as the level rises", () => {
    const { eff, mask } = layers([95, 85, 75, 65], [true, true, true, true]);
    const ratios = computeAreaRatios(eff, mask, [60, 70, 80, 90, 100]).map(r => r.ratio);
    expect(ratios).toEqual([0, 25, 50, 75, 100]);
  });

  it("is empty when the mask is empty", () => {
    const { eff, mask } = layers([95, 85, 75, 65], [false, false, false, false]);
    expect(computeAreaRatios(eff, mask, [90, 80])).toEqual([]);
  });

  it("returns no entries for no levels", () => {
    const { eff, mask } = layers([95, 85, 75, 65], [true, true, true, true]);
    expect(computeAreaRatios(eff, mask, [])).toEqual([]);
  });
});
