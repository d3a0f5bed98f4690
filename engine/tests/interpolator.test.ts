import { describe, expect, it } from "vitest";
import type { EnvelopeCurve } from "../src/envelope.js";
import { synthesizeGrid } from "../src/grid.js";
import { interpolateGrid, isCutoff } from "../src/interpolator.js";
import { Triangulation } from "../src/triangulation.js";
import type { MeasurementRow } from "../src/types.js";

const flat10: EnvelopeCurve = { fit: "constant", samples: [], evaluate: () => 10 };
const row = (speed: number): MeasurementRow => ({ speed, torque: 0, power: 1, effMcu: 85, effMotor: 85, effSys: 85, uDc: 350 });

/** 3 × 3 filled points (speeds 0/5/10, torques 0/5/10) plus one sentinel row */
const grid = synthesizeGrid([row(10)], flat10, 5, 5);

const squareX = [0, 10, 0, 10];
const squareY = [0, 0, 10, 10];
/** eff = x + 2y is linear, so barycentric interpolation reproduces it */
const planeEff = squareX.map((x, i) => x + 2 * squareY[i]);
const ones = [1, 1, 1, 1];

describe("Triangulation", () => {
  const tri = Triangulation.build(squareX, squareY);

  it("triangulates a square into two triangles", () => {
    expect(tri.triangleCount).toBe(2);
    expect(tri.isDegenerate).toBe(false);
  });

  it("reproduces a linear field inside the hull", () => {
    expect(tri.interpolate(planeEff, 5, 5)).toBeCloseTo(15, 9);
    expect(tri.interpolate(planeEff, 2, 3)).toBeCloseTo(8, 9);
  });

  it("counts hull edges and vertices as inside", () => {
    expect(tri.interpolate(planeEff, 10, 5)).toBeCloseTo(20, 9);
    expect(tri.interpolate(planeEff, 0, 0)).toBeCloseTo(0, 9);
  });

  it("is NaN outside the hull", () => {
    expect(tri.locate(20, 20)).toBeNull();
    expect(tri.interpolate(planeEff, -1, 5)).toBeNaN();
  });

  it("is degenerate for collinear or repeated points", () => {
    expect(Triangulation.build([0, 1, 2], [0, 1, 2]).isDegenerate).toBe(true);
    expect(Triangulation.build([0, 0, 1, 1], [0, 0, 1, 1]).isDegenerate).toBe(true);
    expect(Triangulation.build([], []).isDegenerate).toBe(true);
  });
});

describe("isCutoff", () => {
  it("cuts points below either start value", () => {
    const cutoff = { startSpeed: 100, startTorque: 5 };
    expect(isCutoff(99, 10, cutoff)).toBe(true);
    expect(isCutoff(100, 4, cutoff)).toBe(true);
    expect(isCutoff(100, 5, cutoff)).toBe(false);
  });
});

describe("interpolateGrid", () => {
  const noCutoff = { startSpeed: 0, startTorque: 0 };

  it("interpolates every filled point and leaves the sentinel row empty", () => {
    const layers = interpolateGrid(grid, Triangulation.build(squareX, squareY), planeEff, ones, noCutoff);
    expect(layers.status).toBe("ok");
    expect(layers.mask.count()).toBe(9);
    expect(layers.eff.at(1, 1)).toBeCloseTo(15, 9);
    expect(layers.eff.at(2, 2)).toBeCloseTo(30, 9);
    expect(layers.power.at(0, 2)).toBeCloseTo(1, 9);
    expect(layers.eff.at(3, 0)).toBeNaN();
    expect(layers.mask.at(3, 0)).toBe(false);
  });

  it("excludes cutoff points from both the layers and the mask", () => {
    const layers = interpolateGrid(grid, Triangulation.build(squareX, squareY), planeEff, ones, { startSpeed: 5, startTorque: 0 });
    expect(layers.mask.count()).toBe(6);
    expect(layers.mask.at(0, 0)).toBe(false);
    expect(layers.eff.at(0, 0)).toBeNaN();
    expect(layers.eff.at(0, 1)).toBeCloseTo(5, 9);
  });

  it("keeps points outside the hull in the mask with a sentinel value", () => {
    const tri = Triangulation.build([0, 10, 0], [0, 0, 5]);
    const layers = interpolateGrid(grid, tri, [85, 85, 85], [1, 1, 1], noCutoff);
    expect(layers.mask.at(2, 2)).toBe(true);
    expect(layers.eff.at(2, 2)).toBeNaN();
    expect(layers.mask.count()).toBe(9);
  });

  it("reports a degenerate cloud and leaves every layer empty", () => {
    const tri = Triangulation.build([0, 5, 10], [0, 0, 0]);
    const layers = interpolateGrid(grid, tri, [85, 85, 85], [1, 1, 1], noCutoff);
    expect(layers.status).toBe("degenerate");
    expect(layers.mask.count()).toBe(9);
    expect(Array.from(layers.eff.data).every(Number.isNaN)).toBe(true);
  });
});
