/**
 * Numeric helpers shared by the pipeline stages.
 * NaN is the in-memory sentinel for "empty / not interpolated".
 */

export const SENTINEL = Number.NaN;

export function isSentinel(v: number): boolean {
  return Number.isNaN(v);
}

/** Half-open range [start, stop) with a fixed step; the length is ceil((stop - start) / step). */
export function arange(start: number, stop: number, step: number): number[] {
  const length = Math.ceil((stop - start) / step);
  if (!Number.isFinite(length) || length <= 0) return [];
  return Array.from({ length }, (_, i) => start + i * step);
}

/** `count` evenly spaced values over [start, stop]; the last value is exactly `stop`. */
export function linspace(start: number, stop: number, count: number): number[] {
  if (count <= 0) return [];
  if (count === 1) return [start];
  const delta = (stop - start) / (count - 1);
  const out = Array.from({ length: count }, (_, i) => start + i * delta);
  out[count - 1] = stop;
  return out;
}

export function isClose(a: number, b: number, rtol = 1e-5, atol = 1e-8): boolean {
  return Math.abs(a - b) <= atol + rtol * Math.abs(b);
}

/** Round half to even (banker's rounding). */
export function roundHalfEven(x: number): number {
  if (!Number.isFinite(x)) return x;
  const frac = Math.abs(x % 1);
  if (frac === 0.5) return 2 * Math.round(x / 2);
  return Math.round(x);
}

export function mean(values: readonly number[]): number {
  if (!values.length) return Number.NaN;
  let sum = 0;
  for (const v of values) sum += v;
  return sum / values.length;
}

/** Largest finite value, or NaN when there is none. */
export function finiteMax(values: Iterable<number>): number {
  let max = Number.NaN;
  for (const v of values) {
    if (!Number.isFinite(v)) continue;
    if (Number.isNaN(max) || v > max) max = v;
  }
  return max;
}
