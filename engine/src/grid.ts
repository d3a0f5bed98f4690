/**
 * Grid synthesizer — speed × torque mesh whose torque fill per column stops at
 * the envelope.
 *
 * The grid is a dense row-major matrix (row = torque index, column = speed
 * index) with a per-column valid height; rows past the height hold the
 * sentinel.
 */
import type { EnvelopeCurve } from "./envelope.js";
import { NoSpeedRangeError } from "./errors.js";
import { arange, finiteMax, isClose, isSentinel, linspace, SENTINEL } from "./numeric.js";
import type { MeasurementRow } from "./types.js";

export class Matrix {
  readonly data: Float64Array;

  constructor(
    readonly rows: number,
    readonly cols: number,
    fill = SENTINEL,
  ) {
    this.data = new Float64Array(rows * cols).fill(fill);
  }

  at(row: number, col: number): number {
    return this.data[row * this.cols + col];
  }

  set(row: number, col: number, value: number): void {
    this.data[row * this.cols + col] = value;
  }

  /** Nested rows with the sentinel as null, for JSON output. */
  toRows(): (number | null)[][] {
    return Array.from({ length: this.rows }, (_, r) =>
      Array.from(this.data.subarray(r * this.cols, (r + 1) * this.cols), v => (isSentinel(v) ? null : v)),
    );
  }
}

export interface Grid {
  rows: number;
  cols: number;
  /** Speed of each column */
  speedAxis: number[];
  /** Envelope torque at each column's speed */
  edgeTorques: number[];
  /** Number of valid torque rows in each column */
  heights: number[];
  x: Matrix;
  y: Matrix;
}

/**
 * Torque values for one column: 0, step, 2·step, … up to `edge`, with `edge`
 * itself appended when the last multiple does not land on it.
 */
export function columnFill(edge: number, step: number): number[] {
  if (!Number.isFinite(edge)) return [0];
  const fill = arange(0, edge + step / 1000, step).filter(t => t <= edge);
  if (!fill.length) return edge > 0 ? [0, edge] : [0];
  if (!isClose(fill[fill.length - 1], edge)) fill.push(edge);
  return fill;
}

/**
 * Number of speed columns: one per whole step from 0 to the maximum. A maximum
 * below one step gives a single column at speed 0.
 */
export function speedColumnCount(maxSpeed: number, speedStep: number): number {
  return Math.floor(maxSpeed / speedStep) + 1;
}

/** Grid with no columns, for a dataset that filtering left empty. */
export function emptyGrid(): Grid {
  return { rows: 0, cols: 0, speedAxis: [], edgeTorques: [], heights: [], x: new Matrix(0, 0), y: new Matrix(0, 0) };
}

export function synthesizeGrid(
  rows: readonly MeasurementRow[],
  envelope: EnvelopeCurve,
  speedStep: number,
  torqueStep: number,
): Grid {
  const maxSpeed = finiteMax(rows.map(r => r.speed));
  if (!(maxSpeed > 0)) throw new NoSpeedRangeError(Number.isNaN(maxSpeed) ? 0 : maxSpeed);

  const speedAxis = linspace(0, maxSpeed, speedColumnCount(maxSpeed, speedStep));
  const edgeTorques = speedAxis.map(s => envelope.evaluate(s));
  const fills = edgeTorques.map(e => columnFill(e, torqueStep));

  // arange yields at most ceil(e/step) + 1 values and the boundary append one more
  const maxEdge = finiteMax(edgeTorques);
  const bound = Number.isFinite(maxEdge) ? Math.ceil(maxEdge / torqueStep) + 2 : 2;
  const height = fills.reduce((h, f) => Math.max(h, f.length), bound);

  const cols = speedAxis.length;
  const x = new Matrix(height, cols);
  const y = new Matrix(height, cols);
  for (let c = 0; c < cols; c++) {
    for (let r = 0; r < height; r++) x.set(r, c, speedAxis[c]);
    fills[c].forEach((t, r) => y.set(r, c, t));
  }

  return { rows: height, cols, speedAxis, edgeTorques, heights: fills.map(f => f.length), x, y };
}
