/**
 * Cubic smoothing spline (Reinsch form).
 *
 * Minimises Σ (yᵢ − g(xᵢ))² + λ ∫ g''² with natural end conditions; λ is chosen
 * so that the residual sum of squares matches the smoothing target `s`
 * (s = number of points by default, i.e. unit weights). Beyond the knots the
 * curve continues along its end tangents.
 *
 * Ref: Green & Silverman, "Nonparametric Regression and Generalized Linear Models", ch. 2.
 */

export interface SmoothingSpline {
  /** Fitted values at the knots */
  values: readonly number[];
  /** Second derivatives at the knots (zero at both ends) */
  curvature: readonly number[];
  lambda: number;
  rss: number;
  evaluate(x: number): number;
}

export type SplineFitResult = { ok: true; spline: SmoothingSpline } | { ok: false; reason: string };

const MAX_BISECTIONS = 200;
const RSS_TOLERANCE = 1e-3;

/** Pentadiagonal symmetric matrix stored by its three upper bands. */
interface Bands {
  d0: Float64Array;
  d1: Float64Array;
  d2: Float64Array;
}

/** Solve A·x = b for symmetric positive-definite pentadiagonal A (banded LDLᵀ). Null if A is not SPD. */
function solvePentadiagonal(a: Bands, b: Float64Array): Float64Array | null {
  const m = b.length;
  const D = new Float64Array(m);
  const l1 = new Float64Array(m);
  const l2 = new Float64Array(m);

  for (let i = 0; i < m; i++) {
    if (i >= 2) l2[i] = a.d2[i - 2] / D[i - 2];
    if (i >= 1) l1[i] = (a.d1[i - 1] - (i >= 2 ? l2[i] * l1[i - 1] * D[i - 2] : 0)) / D[i - 1];
    D[i] = a.d0[i] - (i >= 1 ? l1[i] * l1[i] * D[i - 1] : 0) - (i >= 2 ? l2[i] * l2[i] * D[i - 2] : 0);
    if (!(D[i] > 0) || !Number.isFinite(D[i])) return null;
  }

  const z = new Float64Array(m);
  for (let i = 0; i < m; i++) {
    z[i] = b[i] - (i >= 1 ? l1[i] * z[i - 1] : 0) - (i >= 2 ? l2[i] * z[i - 2] : 0);
  }
  const x = new Float64Array(m);
  for (let i = m - 1; i >= 0; i--) {
    x[i] = z[i] / D[i] - (i + 1 < m ? l1[i + 1] * x[i + 1] : 0) - (i + 2 < m ? l2[i + 2] * x[i + 2] : 0);
  }
  return x;
}

class ReinschSystem {
  readonly n: number;
  readonly m: number;
  readonly h: Float64Array;
  /** Q columns: Q[j][j] = a, Q[j+1][j] = b, Q[j+2][j] = c */
  private readonly qa: Float64Array;
  private readonly qb: Float64Array;
  private readonly qc: Float64Array;
  private readonly qty: Float64Array;
  private readonly qtq: Bands;
  private readonly r: Bands;

  constructor(
    readonly x: readonly number[],
    readonly y: readonly number[],
  ) {
    const n = x.length;
    const m = n - 2;
    this.n = n;
    this.m = m;
    this.h = new Float64Array(n - 1);
    for (let i = 0; i < n - 1; i++) this.h[i] = x[i + 1] - x[i];

    const h = this.h;
    this.qa = new Float64Array(m);
    this.qb = new Float64Array(m);
    this.qc = new Float64Array(m);
    this.qty = new Float64Array(m);
    this.r = { d0: new Float64Array(m), d1: new Float64Array(Math.max(m - 1, 0)), d2: new Float64Array(Math.max(m - 2, 0)) };
    this.qtq = { d0: new Float64Array(m), d1: new Float64Array(Math.max(m - 1, 0)), d2: new Float64Array(Math.max(m - 2, 0)) };

    for (let j = 0; j < m; j++) {
      this.qa[j] = 1 / h[j];
      this.qb[j] = -1 / h[j] - 1 / h[j + 1];
      this.qc[j] = 1 / h[j + 1];
      this.qty[j] = this.qa[j] * y[j] + this.qb[j] * y[j + 1] + this.qc[j] * y[j + 2];
      this.r.d0[j] = (h[j] + h[j + 1]) / 3;
      if (j + 1 < m) this.r.d1[j] = h[j + 1] / 6;
    }
    for (let j = 0; j < m; j++) {
      this.qtq.d0[j] = this.qa[j] ** 2 + this.qb[j] ** 2 + this.qc[j] ** 2;
      if (j + 1 < m) this.qtq.d1[j] = this.qb[j] * this.qa[j + 1] + this.qc[j] * this.qb[j + 1];
      if (j + 2 < m) this.qtq.d2[j] = this.qc[j] * this.qa[j + 2];
    }
  }

  /** Fitted values and interior second derivatives for a given λ. */
  solve(lambda: number): { g: Float64Array; gamma: Float64Array; rss: number } | null {
    const { m, n } = this;
    const bands: Bands = {
      d0: this.r.d0.map((v, j) => v + lambda * this.qtq.d0[j]),
      d1: this.r.d1.map((v, j) => v + lambda * this.qtq.d1[j]),
      d2: this.qtq.d2.map(v => lambda * v),
    };
    const gamma = solvePentadiagonal(bands, this.qty);
    if (!gamma) return null;

    const g = new Float64Array(n);
    let rss = 0;
    for (let i = 0; i < n; i++) {
      let qg = 0;
      if (i < m) qg += this.qa[i] * gamma[i];
      if (i - 1 >= 0 && i - 1 < m) qg += this.qb[i - 1] * gamma[i - 1];
      if (i - 2 >= 0 && i - 2 < m) qg += this.qc[i - 2] * gamma[i - 2];
      const resid = lambda * qg;
      g[i] = this.y[i] - resid;
      rss += resid * resid;
    }
    return { g, gamma, rss };
  }

  /** Least-squares straight line: the λ → ∞ limit. */
  linearLimit(): { g: Float64Array; rss: number } {
    const { x, y, n } = this;
    let sx = 0, sy = 0;
    for (let i = 0; i < n; i++) { sx += x[i]; sy += y[i]; }
    const mx = sx / n, my = sy / n;
    let sxy = 0, sxx = 0;
    for (let i = 0; i < n; i++) {
      sxy += (x[i] - mx) * (y[i] - my);
      sxx += (x[i] - mx) ** 2;
    }
    const slope = sxy / sxx;
    const g = new Float64Array(n);
    let rss = 0;
    for (let i = 0; i < n; i++) {
      g[i] = my + slope * (x[i] - mx);
      rss += (y[i] - g[i]) ** 2;
    }
    return { g, rss };
  }
}

function buildSpline(x: readonly number[], g: ArrayLike<number>, interior: ArrayLike<number>, lambda: number, rss: number): SmoothingSpline {
  const n = x.length;
  const values = Array.from(g);
  const curvature = [0, ...Array.from(interior), 0];
  const h = (i: number) => x[i + 1] - x[i];
  const slopeStart = (values[1] - values[0]) / h(0) - (h(0) * curvature[1]) / 6;
  const slopeEnd = (values[n - 1] - values[n - 2]) / h(n - 2) + (h(n - 2) * curvature[n - 2]) / 6;

  const evaluate = (t: number): number => {
    if (t <= x[0]) return values[0] + slopeStart * (t - x[0]);
    if (t >= x[n - 1]) return values[n - 1] + slopeEnd * (t - x[n - 1]);
    let lo = 0, hi = n - 1;
    while (hi - lo > 1) {
      const mid = (lo + hi) >> 1;
      if (x[mid] <= t) lo = mid; else hi = mid;
    }
    const span = h(lo);
    const dl = t - x[lo];
    const dr = x[lo + 1] - t;
    return (dl * values[lo + 1] + dr * values[lo]) / span
      - (dl * dr / 6) * ((1 + dl / span) * curvature[lo + 1] + (1 + dr / span) * curvature[lo]);
  };

  return { values, curvature, lambda, rss, evaluate };
}

/**
 * Fit a smoothing spline through (x, y). `x` must be strictly increasing with
 * at least 3 points; `s` is the target residual sum of squares.
 */
export function fitSmoothingSpline(x: readonly number[], y: readonly number[], s = x.length): SplineFitResult {
  const n = x.length;
  if (n !== y.length) return { ok: false, reason: "x and y differ in length" };
  if (n < 3) return { ok: false, reason: `need at least 3 points, got ${n}` };
  if (![...x, ...y].every(Number.isFinite)) return { ok: false, reason: "non-finite input" };
  for (let i = 1; i < n; i++) {
    if (!(x[i] > x[i - 1])) return { ok: false, reason: "x must be strictly increasing" };
  }

  const sys = new ReinschSystem(x, y);
  const linear = sys.linearLimit();
  if (s >= linear.rss) {
    return { ok: true, spline: buildSpline(x, linear.g, new Float64Array(n - 2), Number.POSITIVE_INFINITY, linear.rss) };
  }
  if (s <= 0) {
    const exact = sys.solve(0);
    if (!exact) return { ok: false, reason: "interpolating system is singular" };
    return { ok: true, spline: buildSpline(x, exact.g, exact.gamma, 0, exact.rss) };
  }

  // RSS grows monotonically with λ; bisect on log λ around the natural scale h³
  const meanH = (x[n - 1] - x[0]) / (n - 1);
  let lo = Math.log10(meanH ** 3) - 12;
  let hi = lo + 24;
  let best: { g: Float64Array; gamma: Float64Array; rss: number; lambda: number } | null = null;

  for (let grow = 0; grow < 10; grow++) {
    const top = sys.solve(10 ** hi);
    if (!top) return { ok: false, reason: "smoothing system is not positive definite" };
    if (top.rss >= s) break;
    hi += 12;
  }

  for (let it = 0; it < MAX_BISECTIONS; it++) {
    const mid = (lo + hi) / 2;
    const lambda = 10 ** mid;
    const sol = sys.solve(lambda);
    if (!sol) return { ok: false, reason: "smoothing system is not positive definite" };
    best = { ...sol, lambda };
    if (Math.abs(sol.rss - s) <= RSS_TOLERANCE * s) break;
    if (sol.rss > s) hi = mid; else lo = mid;
  }
  if (!best) return { ok: false, reason: "smoothing parameter search did not run" };

  const spline = buildSpline(x, best.g, best.gamma, best.lambda, best.rss);
  if (!spline.values.every(Number.isFinite)) return { ok: false, reason: "fit produced non-finite values" };
  return { ok: true, spline };
}
