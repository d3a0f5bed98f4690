/**
 * Normalizer — speed grouping and row filtering ahead of envelope extraction.
 */
import { roundHalfEven } from "./numeric.js";
import type { MeasurementRow } from "./types.js";

/** Adjacent sorted speeds closer than this (rpm) belong to one speed point. */
export const SPEED_GROUP_TOLERANCE = 6;

const EFF_FIELDS = ["effMcu", "effMotor", "effSys"] as const;

/**
 * Replace each run of speeds whose consecutive gaps are ≤ tolerance with the
 * rounded mean of the run. Input must be sorted ascending.
 */
export function groupSpeeds(sorted: readonly number[], tolerance = SPEED_GROUP_TOLERANCE): number[] {
  const out = sorted.slice();
  if (!out.length) return out;

  let start = 0;
  let sum = sorted[0];
  const close = (end: number) => {
    const avg = roundHalfEven(sum / (end - start));
    out.fill(avg, start, end);
  };

  for (let i = 0; i < sorted.length - 1; i++) {
    if (Math.abs(sorted[i] - sorted[i + 1]) <= tolerance) {
      sum += sorted[i + 1];
    } else {
      close(i + 1);
      start = i + 1;
      sum = sorted[i + 1];
    }
  }
  close(sorted.length);
  return out;
}

function hasMissing(row: MeasurementRow): boolean {
  return Object.values(row).some(Number.isNaN);
}

/** Efficiency readings of exactly 100 are treated as sentinel data and rejected. */
export function isValidEfficiency(v: number): boolean {
  return v >= 0 && v < 100;
}

export function normalizeRows(rows: readonly MeasurementRow[]): MeasurementRow[] {
  const sorted = rows.slice().sort((a, b) => a.speed - b.speed);
  const grouped = groupSpeeds(sorted.map(r => r.speed));

  return sorted
    .map((r, i) => ({ ...r, speed: grouped[i] }))
    .sort((a, b) => a.speed - b.speed || a.torque - b.torque)
    .filter(r => !hasMissing(r))
    .filter(r => EFF_FIELDS.every(f => isValidEfficiency(r[f])));
}
