/**
 * Area-ratio aggregator — share of the operating region at or above each
 * efficiency threshold.
 */
import type { Matrix } from "./grid.js";
import type { GeometryMask } from "./interpolator.js";
import type { AreaRatioEntry } from "./types.js";

/**
 * For each level (highest first): 100 × count(eff ≥ level) / count(mask).
 * Sentinel cells never compare true. An empty mask yields no entries.
 */
export function computeAreaRatios(eff: Matrix, mask: GeometryMask, levels: readonly number[]): AreaRatioEntry[] {
  const denominator = mask.count();
  if (denominator === 0) return [];

  return [...levels]
    .sort((a, b) => b - a)
    .map(level => {
      let count = 0;
      for (const v of eff.data) if (v >= level) count++;
      return { level, ratio: (count / denominator) * 100 };
    });
}
