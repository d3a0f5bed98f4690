import { describe, expect, it } from "vitest";
import { envelopeSamples, extractEnvelope, linearInterpolant } from "../src/envelope.js";
import { fitSmoothingSpline } from "../src/smoothing-spline.js";
import type { MeasurementRow } from "../src/types.js";

function row(speed: number, torque: number): MeasurementRow {
  return { speed, torque, power: 1, effMcu: 85, effMotor: 85, effSys: 85, uDc: 350 };
}

describe("envelopeSamples", () => {
  it("keeps the highest torque per speed, ascending", () => {
    const rows = [row(2000, 50), row(1000, 0), row(1000, 80), row(2000, 60)];
    expect(envelopeSamples(rows)).toEqual([
      { speed: 1000, torque: 80 },
      { speed: 2000, torque: 60 },
    ]);
  });
});

describe("linearInterpolant", () => {
  const f = linearInterpolant([0, 1000, 2000], [100, 50, 50]);

  it("interpolates between samples", () => {
    expect(f(500)).toBe(75);
    expect(f(1500)).toBe(50);
  });

  it("extends the end segments", () => {
    expect(f(-1000)).toBe(150);
    expect(f(3000)).toBe(50);
  });
});

describe("extractEnvelope", () => {
  it("is empty for no rows", () => {
    const curve = extractEnvelope([]);
    expect(curve.fit).toBe("empty");
    expect(curve.evaluate(500)).toBe(0);
  });

  it("is constant for one speed point", () => {
    const curve = extractEnvelope([row(1000, 40), row(1000, 70)]);
    expect(curve.fit).toBe("constant");
    expect(curve.evaluate(0)).toBe(70);
    expect(curve.evaluate(5000)).toBe(70);
  });

  it("is linear for two or three speed points", () => {
    const curve = extractEnvelope([row(0, 100), row(1000, 50)]);
    expect(curve.fit).toBe("linear");
    expect(curve.fallbackReason).toBeUndefined();
    expect(curve.evaluate(500)).toBe(75);
    expect(curve.evaluate(2000)).toBe(0);
  });

  it("fits a spline from four speed points", () => {
    const rows = [0, 1000, 2000, 3000, 4000].map(s => row(s, 200 - 0.05 * s));
    const curve = extractEnvelope(rows);
    expect(curve.fit).toBe("spline");
    expect(curve.evaluate(1500)).toBeCloseTo(125, 9);
    expect(curve.evaluate(5000)).toBeCloseTo(-50, 9);
  });
});

describe("fitSmoothingSpline", () => {
  const x = [0, 1, 2, 3, 4, 5];
  const y = [0, 10, 0, 10, 0, 10];

  it("matches the residual target", () => {
    const result = fitSmoothingSpline(x, y);
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    const { spline } = result;
    expect(spline.rss).toBeCloseTo(6, 1);
    expect(spline.lambda).toBeGreaterThan(0);
    expect(spline.curvature[0]).toBe(0);
    expect(spline.curvature[5]).toBe(0);
  });

  it("passes through its fitted values at the knots", () => {
    const result = fitSmoothingSpline(x, y);
    if (!result.ok) throw new Error(result.reason);
    const { spline } = result;
    x.forEach((xi, i) => expect(spline.evaluate(xi)).toBeCloseTo(spline.values[i], 9));
  });

  it("continues linearly past the last knot", () => {
    const result = fitSmoothingSpline(x, y);
    if (!result.ok) throw new Error(result.reason);
    const { evaluate } = result.spline;
    expect(evaluate(7) - evaluate(6)).toBeCloseTo(evaluate(6) - evaluate(5), 9);
  });

  it("reduces to the least-squares line when it already meets the target", () => {
    const result = fitSmoothingSpline([0, 1, 2, 3], [1, 3, 5, 7]);
    if (!result.ok) throw new Error(result.reason);
    expect(result.spline.lambda).toBe(Number.POSITIVE_INFINITY);
    expect(result.spline.evaluate(10)).toBeCloseTo(21, 9);
  });

  it("interpolates when the target is zero", () => {
    const result = fitSmoothingSpline(x, y, 0);
    if (!result.ok) throw new Error(result.reason);
    expect(result.spline.values).toEqual(y);
  });

  it("reports why a fit is impossible", () => {
    expect(fitSmoothingSpline([0, 1], [0, 1])).toEqual({ ok: false, reason: "need at least 3 points, got 2" });
    expect(fitSmoothingSpline([0, 0, 1], [0, 1, 2])).toEqual({ ok: false, reason: "x must be strictly increasing" });
    expect(fitSmoothingSpline([0, 1, 2], [0, Number.NaN, 2])).toEqual({ ok: false, reason: "non-finite input" });
  });
});
