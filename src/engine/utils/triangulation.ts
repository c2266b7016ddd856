/**
 * Delaunay triangulation and piecewise-linear interpolation over scattered
 * 2-D points (Bowyer-Watson insertion).
 *
 * Orientation and in-circle predicates are evaluated exactly with BigInt when
 * every coordinate involved is a safe integer, which is the case for the
 * tabulated (temperature, hours) grid. Co-circular grid cells are therefore
 * split consistently and the cavity of each insertion stays star-shaped.
 * Non-integer coordinates fall back to floating point.
 *
 * Coordinates are used as given (no axis rescaling).
 */

export interface Point2 {
  x: number;
  y: number;
}

/** Vertex indices into `Triangulation.points`, counter-clockwise. */
export interface Triangle {
  i: number;
  j: number;
  k: number;
}

export interface Triangulation {
  points: readonly Point2[];
  triangles: readonly Triangle[];
}

export interface Location {
  triangle: Triangle;
  /** Barycentric weights for vertices i, j, k (sum to 1). */
  weights: [number, number, number];
}

/** Barycentric slack for points on a triangle edge. */
const EDGE_TOLERANCE = 1e-9;
/** Super-triangle size as a multiple of the data span. */
const SUPER_TRIANGLE_SCALE = 1000;

// ─── Predicates ───────────────────────────────────────────────────────────────

function isIntegral(...pts: Point2[]): boolean {
  return pts.every(p => Number.isSafeInteger(p.x) && Number.isSafeInteger(p.y));
}

function signOf(v: bigint | number): -1 | 0 | 1 {
  if (typeof v === 'bigint') return v > 0n ? 1 : v < 0n ? -1 : 0;
  return v > 0 ? 1 : v < 0 ? -1 : 0;
}

/** +1 when a → b → c turns counter-clockwise, −1 clockwise, 0 collinear. */
export function orient2d(a: Point2, b: Point2, c: Point2): -1 | 0 | 1 {
  if (isIntegral(a, b, c)) {
    const abx = BigInt(b.x) - BigInt(a.x);
    const aby = BigInt(b.y) - BigInt(a.y);
    const acx = BigInt(c.x) - BigInt(a.x);
    const acy = BigInt(c.y) - BigInt(a.y);
    return signOf(abx * acy - aby * acx);
  }
  return signOf((b.x - a.x) * (c.y - a.y) - (b.y - a.y) * (c.x - a.x));
}

/**
 * +1 when d lies strictly inside the circumcircle of the counter-clockwise
 * triangle abc, 0 on it, −1 outside.
 */
export function inCircle(a: Point2, b: Point2, c: Point2, d: Point2): -1 | 0 | 1 {
  if (isIntegral(a, b, c, d)) {
    const adx = BigInt(a.x) - BigInt(d.x);
    const ady = BigInt(a.y) - BigInt(d.y);
    const bdx = BigInt(b.x) - BigInt(d.x);
    const bdy = BigInt(b.y) - BigInt(d.y);
    const cdx = BigInt(c.x) - BigInt(d.x);
    const cdy = BigInt(c.y) - BigInt(d.y);
    const det =
      (adx * adx + ady * ady) * (bdx * cdy - cdx * bdy) +
      (bdx * bdx + bdy * bdy) * (cdx * ady - adx * cdy) +
      (cdx * cdx + cdy * cdy) * (adx * bdy - bdx * ady);
    return signOf(det);
  }
  const adx = a.x - d.x;
  const ady = a.y - d.y;
  const bdx = b.x - d.x;
  const bdy = b.y - d.y;
  const cdx = c.x - d.x;
  const cdy = c.y - d.y;
  const det =
    (adx * adx + ady * ady) * (bdx * cdy - cdx * bdy) +
    (bdx * bdx + bdy * bdy) * (cdx * ady - adx * cdy) +
    (cdx * cdx + cdy * cdy) * (adx * bdy - bdx * ady);
  return signOf(det);
}

// ─── Construction ─────────────────────────────────────────────────────────────

function counterClockwise(pts: readonly Point2[], i: number, j: number, k: number): Triangle {
  return orient2d(pts[i], pts[j], pts[k]) < 0 ? { i: j, j: i, k } : { i, j, k };
}

function insertPoint(pts: readonly Point2[], triangles: Triangle[], p: number): Triangle[] {
  const q = pts[p];
  const bad: Triangle[] = [];
  const kept: Triangle[] = [];
  for (const t of triangles) {
    if (inCircle(pts[t.i], pts[t.j], pts[t.k], q) > 0) bad.push(t);
    else kept.push(t);
  }

  // Cavity boundary: edges that belong to exactly one bad triangle
  const edgeCount = new Map<string, { a: number; b: number; count: number }>();
  for (const t of bad) {
    for (const [a, b] of [[t.i, t.j], [t.j, t.k], [t.k, t.i]] as const) {
      const key = a < b ? `${a},${b}` : `${b},${a}`;
      const existing = edgeCount.get(key);
      if (existing) existing.count++;
      else edgeCount.set(key, { a, b, count: 1 });
    }
  }

  for (const edge of edgeCount.values()) {
    if (edge.count !== 1) continue;
    if (orient2d(pts[edge.a], pts[edge.b], q) === 0) continue;
    kept.push(counterClockwise(pts, edge.a, edge.b, p));
  }
  return kept;
}

/**
 * Triangulate the given points. Duplicate points are ignored (the first
 * occurrence keeps its index). Fewer than three distinct points, or all points
 * collinear, yields an empty triangle list.
 */
export function triangulate(input: readonly Point2[]): Triangulation {
  const points = input.map(p => ({ x: p.x, y: p.y }));
  const n = points.length;
  if (n < 3) return { points, triangles: [] };

  let minX = Infinity, maxX = -Infinity;
  let minY = Infinity, maxY = -Infinity;
  for (const p of points) {
    minX = Math.min(minX, p.x);
    maxX = Math.max(maxX, p.x);
    minY = Math.min(minY, p.y);
    maxY = Math.max(maxY, p.y);
  }

  // Super-triangle far outside the data; integer vertices keep integer data exact
  const span = Math.ceil(Math.max(maxX - minX, maxY - minY, 1)) * SUPER_TRIANGLE_SCALE;
  const cx = Math.round((minX + maxX) / 2);
  const cy = Math.round((minY + maxY) / 2);
  const work: Point2[] = [
    ...points,
    { x: cx - 20 * span, y: cy - span },
    { x: cx + 20 * span, y: cy - span },
    { x: cx, y: cy + 20 * span },
  ];

  let triangles: Triangle[] = [counterClockwise(work, n, n + 1, n + 2)];
  const seen = new Set<string>();
  for (let p = 0; p < n; p++) {
    const key = `${points[p].x},${points[p].y}`;
    if (seen.has(key)) continue;
    seen.add(key);
    triangles = insertPoint(work, triangles, p);
  }

  return {
    points,
    triangles: triangles.filter(t => t.i < n && t.j < n && t.k < n),
  };
}

// ─── Location & interpolation ─────────────────────────────────────────────────

function barycentric(pts: readonly Point2[], t: Triangle, x: number, y: number): [number, number, number] | null {
  const { x: x1, y: y1 } = pts[t.i];
  const { x: x2, y: y2 } = pts[t.j];
  const { x: x3, y: y3 } = pts[t.k];

  const denom = (y2 - y3) * (x1 - x3) + (x3 - x2) * (y1 - y3);
  if (denom === 0 || !Number.isFinite(denom)) return null;

  const a = ((y2 - y3) * (x - x3) + (x3 - x2) * (y - y3)) / denom;
  const b = ((y3 - y1) * (x - x3) + (x1 - x3) * (y - y3)) / denom;
  return [a, b, 1 - a - b];
}

/**
 * Find the triangle containing (x, y), or null when the point lies outside the
 * convex hull of the triangulated points.
 */
export function locate(tri: Triangulation, x: number, y: number): Location | null {
  if (!Number.isFinite(x) || !Number.isFinite(y)) return null;
  for (const triangle of tri.triangles) {
    const weights = barycentric(tri.points, triangle, x, y);
    if (!weights) continue;
    if (weights.every(w => w >= -EDGE_TOLERANCE)) return { triangle, weights };
  }
  return null;
}

/**
 * Piecewise-linear interpolation of `values` (one per point) at (x, y).
 * Returns the stored value exactly at a data point, and null outside the hull.
 */
export function interpolateLinear(
  tri: Triangulation,
  values: readonly number[],
  x: number,
  y: number,
): number | null {
  const hit = tri.points.findIndex(p => p.x === x && p.y === y);
  if (hit >= 0 && tri.triangles.length > 0) return values[hit];

  const loc = locate(tri, x, y);
  if (!loc) return null;

  const { triangle: t, weights: [a, b, c] } = loc;
  const v = a * values[t.i] + b * values[t.j] + c * values[t.k];
  return Number.isFinite(v) ? v : null;
}
