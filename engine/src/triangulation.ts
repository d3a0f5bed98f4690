/**
 * Delaunay triangulation of the measurement cloud with point location and
 * barycentric (piecewise-linear) interpolation. Outside the convex hull the
 * interpolant is NaN.
 */
import Delaunator from "delaunator";

export interface Barycentric {
  vertices: [number, number, number];
  weights: [number, number, number];
}

/** Barycentric slack so points on a hull edge count as inside */
const EDGE_EPSILON = 1e-10;

export class Triangulation {
  private readonly triangles: Uint32Array;
  private readonly buckets: number[][] = [];
  private readonly bucketCount: number;
  private readonly minX: number;
  private readonly minY: number;
  private readonly cellW: number;
  private readonly cellH: number;

  private constructor(
    private readonly coords: Float64Array,
    triangles: Uint32Array,
  ) {
    this.triangles = triangles;
    const n = coords.length / 2;
    let minX = Infinity, minY = Infinity, maxX = -Infinity, maxY = -Infinity;
    for (let i = 0; i < n; i++) {
      minX = Math.min(minX, coords[2 * i]);
      maxX = Math.max(maxX, coords[2 * i]);
      minY = Math.min(minY, coords[2 * i + 1]);
      maxY = Math.max(maxY, coords[2 * i + 1]);
    }
    this.minX = minX;
    this.minY = minY;
    this.bucketCount = Math.max(1, Math.ceil(Math.sqrt(this.triangleCount)));
    this.cellW = (maxX - minX) / this.bucketCount || 1;
    this.cellH = (maxY - minY) / this.bucketCount || 1;
    this.buildIndex();
  }

  /** Triangulate points given as parallel coordinate arrays. */
  static build(xs: readonly number[], ys: readonly number[]): Triangulation {
    const coords = new Float64Array(xs.length * 2);
    xs.forEach((x, i) => {
      coords[2 * i] = x;
      coords[2 * i + 1] = ys[i];
    });
    const distinct = new Set(xs.map((x, i) => `${x},${ys[i]}`)).size;
    const triangles = distinct >= 3 ? new Delaunator(coords).triangles : new Uint32Array(0);
    return new Triangulation(coords, triangles);
  }

  get triangleCount(): number {
    return this.triangles.length / 3;
  }

  /** No triangle could be formed (fewer than 3 distinct points, or all collinear). */
  get isDegenerate(): boolean {
    return this.triangleCount === 0;
  }

  private cellOf(v: number, min: number, size: number): number {
    return Math.min(this.bucketCount - 1, Math.max(0, Math.floor((v - min) / size)));
  }

  private buildIndex(): void {
    const nb = this.bucketCount;
    for (let i = 0; i < nb * nb; i++) this.buckets.push([]);
    const { coords, triangles } = this;
    for (let t = 0; t < this.triangleCount; t++) {
      const xs = [0, 1, 2].map(k => coords[2 * triangles[3 * t + k]]);
      const ys = [0, 1, 2].map(k => coords[2 * triangles[3 * t + k] + 1]);
      const c0 = this.cellOf(Math.min(...xs), this.minX, this.cellW);
      const c1 = this.cellOf(Math.max(...xs), this.minX, this.cellW);
      const r0 = this.cellOf(Math.min(...ys), this.minY, this.cellH);
      const r1 = this.cellOf(Math.max(...ys), this.minY, this.cellH);
      for (let r = r0; r <= r1; r++) {
        for (let c = c0; c <= c1; c++) this.buckets[r * nb + c].push(t);
      }
    }
  }

  /** Triangle containing (x, y) and its barycentric weights, or null outside the hull. */
  locate(x: number, y: number): Barycentric | null {
    if (this.isDegenerate || !Number.isFinite(x) || !Number.isFinite(y)) return null;
    const { coords, triangles } = this;
    const bucket = this.buckets[this.cellOf(y, this.minY, this.cellH) * this.bucketCount + this.cellOf(x, this.minX, this.cellW)];

    for (const t of bucket) {
      const a = triangles[3 * t], b = triangles[3 * t + 1], c = triangles[3 * t + 2];
      const ax = coords[2 * a], ay = coords[2 * a + 1];
      const bx = coords[2 * b], by = coords[2 * b + 1];
      const cx = coords[2 * c], cy = coords[2 * c + 1];
      const det = (by - cy) * (ax - cx) + (cx - bx) * (ay - cy);
      if (det === 0) continue;
      const w0 = ((by - cy) * (x - cx) + (cx - bx) * (y - cy)) / det;
      const w1 = ((cy - ay) * (x - cx) + (ax - cx) * (y - cy)) / det;
      const w2 = 1 - w0 - w1;
      if (w0 >= -EDGE_EPSILON && w1 >= -EDGE_EPSILON && w2 >= -EDGE_EPSILON) {
        return { vertices: [a, b, c], weights: [w0, w1, w2] };
      }
    }
    return null;
  }

  /** Linear interpolation of per-point `values` at (x, y); NaN outside the hull. */
  interpolate(values: ArrayLike<number>, x: number, y: number): number {
    const hit = this.locate(x, y);
    return hit ? blend(hit, values) : Number.NaN;
  }
}

/** Weighted sum of the triangle's vertex values. */
export function blend(hit: Barycentric, values: ArrayLike<number>): number {
  const [a, b, c] = hit.vertices;
  const [w0, w1, w2] = hit.weights;
  return w0 * values[a] + w1 * values[b] + w2 * values[c];
}
