/**
 * Envelope extractor — maximum torque per speed point and a curve through it.
 *
 * More than 3 points get a smoothing spline; fewer, or a failed fit, fall back
 * to piecewise-linear interpolation extended linearly past both ends. The
 * chosen path is reported in `fit` so callers can tell the outcomes apart.
 */
import logger from "./logger.js";
import { fitSmoothingSpline } from "./smoothing-spline.js";
import type { MeasurementRow } from "./types.js";

export type EnvelopeFit = "spline" | "linear" | "constant" | "empty";

export interface EnvelopeSample {
  speed: number;
  torque: number;
}

export interface EnvelopeCurve {
  fit: EnvelopeFit;
  samples: EnvelopeSample[];
  /** Why the spline was not used, when it was attempted */
  fallbackReason?: string;
  evaluate(speed: number): number;
}

/** Minimum sample count for a spline fit */
const SPLINE_MIN_POINTS = 4;

/** Maximum torque for each (already grouped) speed, ascending by speed. */
export function envelopeSamples(rows: readonly MeasurementRow[]): EnvelopeSample[] {
  const maxBySpeed = new Map<number, number>();
  for (const { speed, torque } of rows) {
    const prev = maxBySpeed.get(speed);
    if (prev === undefined || torque > prev) maxBySpeed.set(speed, torque);
  }
  return [...maxBySpeed.entries()]
    .map(([speed, torque]) => ({ speed, torque }))
    .sort((a, b) => a.speed - b.speed);
}

/** Piecewise-linear interpolant through ≥ 2 points, extrapolated with the end slopes. */
export function linearInterpolant(xs: readonly number[], ys: readonly number[]): (x: number) => number {
  const n = xs.length;
  return (x: number) => {
    let i: number;
    if (x <= xs[0]) i = 0;
    else if (x >= xs[n - 1]) i = n - 2;
    else {
      let lo = 0, hi = n - 1;
      while (hi - lo > 1) {
        const mid = (lo + hi) >> 1;
        if (xs[mid] <= x) lo = mid; else hi = mid;
      }
      i = lo;
    }
    const slope = (ys[i + 1] - ys[i]) / (xs[i + 1] - xs[i]);
    return ys[i] + slope * (x - xs[i]);
  };
}

function linearEnvelope(samples: EnvelopeSample[], fallbackReason?: string): EnvelopeCurve {
  if (!samples.length) return { fit: "empty", samples, fallbackReason, evaluate: () => 0 };
  if (samples.length === 1) {
    const torque = samples[0].torque;
    return { fit: "constant", samples, fallbackReason, evaluate: () => torque };
  }
  const f = linearInterpolant(samples.map(s => s.speed), samples.map(s => s.torque));
  return { fit: "linear", samples, fallbackReason, evaluate: f };
}

export function extractEnvelope(rows: readonly MeasurementRow[]): EnvelopeCurve {
  const samples = envelopeSamples(rows);
  if (samples.length < SPLINE_MIN_POINTS) return linearEnvelope(samples);

  const result = fitSmoothingSpline(samples.map(s => s.speed), samples.map(s => s.torque));
  if (!result.ok) {
    logger.warn(`Envelope spline fit failed (${result.reason}), using linear interpolation`, { module: "Envelope" });
    return linearEnvelope(samples, result.reason);
  }
  const { spline } = result;
  return { fit: "spline", samples, evaluate: x => spline.evaluate(x) };
}
