/**
 * Interpolator — fills the efficiency and power layers of a grid from the
 * scattered measurement cloud and applies the start-speed / start-torque cutoff.
 */
import { type Grid, Matrix } from "./grid.js";
import { isSentinel } from "./numeric.js";
import { blend, type Triangulation } from "./triangulation.js";

export type InterpolationStatus = "ok" | "degenerate" | "empty";

export interface Cutoff {
  startSpeed: number;
  startTorque: number;
}

/** Reachable, non-cutoff grid points: the denominator of area ratios. */
export class GeometryMask {
  readonly data: Uint8Array;

  constructor(
    readonly rows: number,
    readonly cols: number,
  ) {
    this.data = new Uint8Array(rows * cols);
  }

  at(row: number, col: number): boolean {
    return this.data[row * this.cols + col] === 1;
  }

  set(row: number, col: number, value: boolean): void {
    this.data[row * this.cols + col] = value ? 1 : 0;
  }

  count(): number {
    let n = 0;
    for (const v of this.data) n += v;
    return n;
  }

  toRows(): boolean[][] {
    return Array.from({ length: this.rows }, (_, r) => Array.from({ length: this.cols }, (_, c) => this.at(r, c)));
  }
}

export interface MapLayers {
  status: InterpolationStatus;
  eff: Matrix;
  power: Matrix;
  mask: GeometryMask;
}

export function isCutoff(speed: number, torque: number, cutoff: Cutoff): boolean {
  return speed < cutoff.startSpeed || torque < cutoff.startTorque;
}

/**
 * Interpolate `effValues` and `powerValues` (one per triangulated point) at
 * every filled grid point. The mask depends on grid geometry and cutoff only,
 * never on whether a point fell inside the hull.
 */
export function interpolateGrid(
  grid: Grid,
  tri: Triangulation,
  effValues: ArrayLike<number>,
  powerValues: ArrayLike<number>,
  cutoff: Cutoff,
): MapLayers {
  const eff = new Matrix(grid.rows, grid.cols);
  const power = new Matrix(grid.rows, grid.cols);
  const mask = new GeometryMask(grid.rows, grid.cols);
  const status: InterpolationStatus = grid.cols === 0 ? "empty" : tri.isDegenerate ? "degenerate" : "ok";

  for (let r = 0; r < grid.rows; r++) {
    for (let c = 0; c < grid.cols; c++) {
      const x = grid.x.at(r, c);
      const y = grid.y.at(r, c);
      if (isSentinel(y)) continue;
      if (isCutoff(x, y, cutoff)) continue;
      mask.set(r, c, true);
      const hit = tri.locate(x, y);
      if (!hit) continue;
      eff.set(r, c, blend(hit, effValues));
      power.set(r, c, blend(hit, powerValues));
    }
  }

  return { status, eff, power, mask };
}
