import simplify from 'simplify-js';
import * as ClipperLib from 'clipper-lib';
import { GeometryError } from '../errors/nesting.errors';
import { BoundingBox, JoinType, Point, PointLocation, Polygon, Ring } from '../models/geometry.types';

export const TOLERANCE = 1e-9;
export const CLIPPER_SCALE = 1000;
/** Maximum deviation of round offset joins from the true arc, in drawing units. */
const ARC_TOLERANCE = 0.01;

export const ORIGIN: Point = { x: 0, y: 0 };

/** Collapses -0 to 0 so results compare cleanly. */
function clean(value: number): number {
  return value === 0 ? 0 : value;
}

export function almostEqual(a: number, b: number, tolerance: number = TOLERANCE): boolean {
  return Math.abs(a - b) < tolerance;
}

export function pointsEqual(a: Point, b: Point, tolerance: number = TOLERANCE): boolean {
  return almostEqual(a.x, b.x, tolerance) && almostEqual(a.y, b.y, tolerance);
}

function assertRing(ring: Ring, context: string): void {
  if (ring.length < 3) {
    throw new GeometryError(`${context}: polygon needs at least 3 points (got ${ring.length})`);
  }
  for (const point of ring) {
    if (!Number.isFinite(point.x) || !Number.isFinite(point.y)) {
      throw new GeometryError(`${context}: non-finite coordinate (${point.x}, ${point.y})`);
    }
  }
}

export function assertPolygon(polygon: Polygon, context: string = 'polygon'): void {
  assertRing(polygon.points, context);
  polygon.holes?.forEach((hole, index) => assertRing(hole, `${context} hole ${index}`));
}

/**
 * Build a validated polygon, copying the input rings.
 */
export function createPolygon(points: readonly Point[], holes?: readonly (readonly Point[])[]): Polygon {
  const polygon: Polygon = {
    points: points.map(p => ({ x: p.x, y: p.y })),
    ...(holes && holes.length > 0 ? { holes: holes.map(hole => hole.map(p => ({ x: p.x, y: p.y }))) } : {})
  };
  assertPolygon(polygon);
  return polygon;
}

export function rectanglePolygon(width: number, height: number, x: number = 0, y: number = 0): Polygon {
  return createPolygon([
    { x, y },
    { x: x + width, y },
    { x: x + width, y: y + height },
    { x, y: y + height }
  ]);
}

export function translatePoints(ring: Ring, dx: number, dy: number): Point[] {
  return ring.map(p => ({ x: p.x + dx, y: p.y + dy }));
}

export function translatePolygon(polygon: Polygon, dx: number, dy: number): Polygon {
  assertPolygon(polygon, 'translatePolygon');
  return {
    points: translatePoints(polygon.points, dx, dy),
    ...(polygon.holes ? { holes: polygon.holes.map(hole => translatePoints(hole, dx, dy)) } : {})
  };
}

/**
 * Sine and cosine with exact values for quarter turns, so axis-aligned
 * shapes stay on integer coordinates.
 */
function rotationTrig(degrees: number): { cos: number; sin: number } {
  const normalized = ((degrees % 360) + 360) % 360;
  switch (normalized) {
    case 0:
      return { cos: 1, sin: 0 };
    case 90:
      return { cos: 0, sin: 1 };
    case 180:
      return { cos: -1, sin: 0 };
    case 270:
      return { cos: 0, sin: -1 };
    default: {
      const radians = (normalized * Math.PI) / 180;
      return { cos: Math.cos(radians), sin: Math.sin(radians) };
    }
  }
}

export function rotatePoints(ring: Ring, degrees: number, pivot: Point = ORIGIN): Point[] {
  const { cos, sin } = rotationTrig(degrees);
  return ring.map(p => {
    const dx = p.x - pivot.x;
    const dy = p.y - pivot.y;
    return {
      x: clean(dx * cos - dy * sin + pivot.x),
      y: clean(dx * sin + dy * cos + pivot.y)
    };
  });
}

/**
 * Rigid rotation, counter-clockwise positive, angle in degrees.
 */
export function rotatePolygon(polygon: Polygon, degrees: number, pivot: Point = ORIGIN): Polygon {
  assertPolygon(polygon, 'rotatePolygon');
  return {
    points: rotatePoints(polygon.points, degrees, pivot),
    ...(polygon.holes ? { holes: polygon.holes.map(hole => rotatePoints(hole, degrees, pivot)) } : {})
  };
}

/**
 * Shoelace area; positive for counter-clockwise rings.
 */
export function signedArea(ring: Ring): number {
  if (ring.length < 3) return 0;
  let area = 0;
  for (let i = 0; i < ring.length; i++) {
    const j = (i + 1) % ring.length;
    area += ring[i].x * ring[j].y - ring[j].x * ring[i].y;
  }
  return area / 2;
}

/** Outer area minus holes. */
export function polygonArea(polygon: Polygon): number {
  const holes = polygon.holes ?? [];
  return Math.abs(signedArea(polygon.points)) - holes.reduce((sum, hole) => sum + Math.abs(signedArea(hole)), 0);
}

export function getBoundingBox(points: Ring): BoundingBox {
  if (points.length === 0) {
    return { minX: 0, minY: 0, maxX: 0, maxY: 0, width: 0, height: 0 };
  }

  let minX = Infinity;
  let minY = Infinity;
  let maxX = -Infinity;
  let maxY = -Infinity;
  for (const p of points) {
    minX = Math.min(minX, p.x);
    minY = Math.min(minY, p.y);
    maxX = Math.max(maxX, p.x);
    maxY = Math.max(maxY, p.y);
  }

  return { minX, minY, maxX, maxY, width: maxX - minX, height: maxY - minY };
}

export function distanceToSegment(point: Point, a: Point, b: Point): number {
  const dx = b.x - a.x;
  const dy = b.y - a.y;
  const lengthSq = dx * dx + dy * dy;
  if (lengthSq === 0) {
    return Math.hypot(point.x - a.x, point.y - a.y);
  }

  const t = Math.max(0, Math.min(1, ((point.x - a.x) * dx + (point.y - a.y) * dy) / lengthSq));
  return Math.hypot(point.x - (a.x + t * dx), point.y - (a.y + t * dy));
}

/**
 * Locate a point against a ring. Points within `tolerance` of an edge are on
 * the boundary. Rings of one or two points (collapsed fit regions) only have
 * a boundary. Results on self-intersecting rings are unspecified.
 */
export function classifyPoint(point: Point, ring: Ring, tolerance: number = TOLERANCE): PointLocation {
  const n = ring.length;
  if (n === 0) return 'outside';

  for (let i = 0; i < n; i++) {
    if (distanceToSegment(point, ring[i], ring[(i + 1) % n]) <= tolerance) {
      return 'boundary';
    }
  }
  if (n < 3) return 'outside';

  let inside = false;
  for (let i = 0, j = n - 1; i < n; j = i++) {
    const xi = ring[i].x;
    const yi = ring[i].y;
    const xj = ring[j].x;
    const yj = ring[j].y;
    if (yi > point.y !== yj > point.y && point.x < ((xj - xi) * (point.y - yi)) / (yj - yi) + xi) {
      inside = !inside;
    }
  }
  return inside ? 'inside' : 'outside';
}

/**
 * Ray-casting test; the boundary counts as inside.
 */
export function pointInPolygon(point: Point, ring: Ring): boolean {
  return classifyPoint(point, ring) !== 'outside';
}

function withinSpan(value: number, a: number, b: number, tolerance: number): boolean {
  return value >= Math.min(a, b) - tolerance && value <= Math.max(a, b) + tolerance;
}

/**
 * Intersection point of segments a1-a2 and b1-b2, or null when they are
 * parallel or do not meet.
 */
export function segmentIntersection(
  a1: Point,
  a2: Point,
  b1: Point,
  b2: Point,
  tolerance: number = TOLERANCE
): Point | null {
  const lineA = { a: a2.y - a1.y, b: a1.x - a2.x, c: a2.x * a1.y - a1.x * a2.y };
  const lineB = { a: b2.y - b1.y, b: b1.x - b2.x, c: b2.x * b1.y - b1.x * b2.y };

  const denom = lineA.a * lineB.b - lineB.a * lineA.b;
  if (Math.abs(denom) < tolerance) return null;

  const x = (lineA.b * lineB.c - lineB.b * lineA.c) / denom;
  const y = (lineB.a * lineA.c - lineA.a * lineB.c) / denom;
  if (!Number.isFinite(x) || !Number.isFinite(y)) return null;

  if (
    !withinSpan(x, a1.x, a2.x, tolerance) ||
    !withinSpan(y, a1.y, a2.y, tolerance) ||
    !withinSpan(x, b1.x, b2.x, tolerance) ||
    !withinSpan(y, b1.y, b2.y, tolerance)
  ) {
    return null;
  }

  return { x: clean(x), y: clean(y) };
}

export function ensureCounterClockwise(ring: Ring): Point[] {
  return signedArea(ring) < 0 ? [...ring].reverse() : [...ring];
}

function cross(o: Point, a: Point, b: Point): number {
  return (a.x - o.x) * (b.y - o.y) - (a.y - o.y) * (b.x - o.x);
}

/**
 * Drop repeated vertices and vertices lying on the line through their
 * neighbours.
 */
export function removeCollinearPoints(ring: Ring, tolerance: number = TOLERANCE): Point[] {
  const points: Point[] = [];
  for (const p of ring) {
    if (points.length === 0 || !pointsEqual(points[points.length - 1], p, tolerance)) {
      points.push(p);
    }
  }
  while (points.length > 1 && pointsEqual(points[0], points[points.length - 1], tolerance)) {
    points.pop();
  }

  let changed = true;
  while (changed && points.length >= 3) {
    changed = false;
    for (let i = 0; i < points.length; i++) {
      const prev = points[(i - 1 + points.length) % points.length];
      const current = points[i];
      const next = points[(i + 1) % points.length];
      const span = Math.hypot(current.x - prev.x, current.y - prev.y) * Math.hypot(next.x - current.x, next.y - current.y);
      if (Math.abs(cross(prev, current, next)) <= tolerance * Math.max(span, 1)) {
        points.splice(i, 1);
        changed = true;
        break;
      }
    }
  }
  return points;
}

export function isConvex(ring: Ring): boolean {
  const points = removeCollinearPoints(ring);
  if (points.length < 3) return false;

  let sign = 0;
  for (let i = 0; i < points.length; i++) {
    const turn = cross(points[i], points[(i + 1) % points.length], points[(i + 2) % points.length]);
    const turnSign = Math.sign(turn);
    if (turnSign === 0) continue;
    if (sign === 0) {
      sign = turnSign;
    } else if (turnSign !== sign) {
      return false;
    }
  }
  return true;
}

/**
 * Counter-clockwise convex hull (monotone chain), without collinear vertices.
 */
export function convexHull(points: Ring): Point[] {
  const sorted = [...points].sort((a, b) => a.x - b.x || a.y - b.y);
  if (sorted.length < 3) return sorted;

  const lower: Point[] = [];
  for (const p of sorted) {
    while (lower.length >= 2 && cross(lower[lower.length - 2], lower[lower.length - 1], p) <= 0) {
      lower.pop();
    }
    lower.push(p);
  }

  const upper: Point[] = [];
  for (let i = sorted.length - 1; i >= 0; i--) {
    const p = sorted[i];
    while (upper.length >= 2 && cross(upper[upper.length - 2], upper[upper.length - 1], p) <= 0) {
      upper.pop();
    }
    upper.push(p);
  }

  lower.pop();
  upper.pop();
  return [...lower, ...upper];
}

/**
 * Ramer-Douglas-Peucker simplification of a closed ring. Returns the ring
 * unchanged when simplification would leave fewer than 3 points.
 */
export function simplifyRing(ring: Ring, tolerance: number): Point[] {
  if (tolerance <= 0 || ring.length <= 3) return [...ring];

  const closed = [...ring, ring[0]].map(p => ({ x: p.x, y: p.y }));
  const simplified = removeCollinearPoints(simplify(closed, tolerance, true));
  return simplified.length >= 3 ? simplified : [...ring];
}

export function toClipperPath(ring: Ring): ClipperLib.Path {
  return ring.map(p => ({
    X: Math.round(p.x * CLIPPER_SCALE),
    Y: Math.round(p.y * CLIPPER_SCALE)
  }));
}

export function fromClipperPath(path: ClipperLib.Path): Point[] {
  return path.map(p => ({
    x: clean(p.X / CLIPPER_SCALE),
    y: clean(p.Y / CLIPPER_SCALE)
  }));
}

function clipperJoinType(joinType: JoinType): ClipperLib.JoinType {
  switch (joinType) {
    case 'miter':
      return ClipperLib.JoinType.jtMiter;
    case 'square':
      return ClipperLib.JoinType.jtSquare;
    case 'round':
      return ClipperLib.JoinType.jtRound;
  }
}

/**
 * Inflate (positive distance) or deflate (negative) the outer ring. Holes
 * are not carried over: nesting only uses the outer boundary.
 */
export function offsetPolygon(polygon: Polygon, distance: number, joinType: JoinType = 'round'): Polygon {
  assertPolygon(polygon, 'offsetPolygon');
  if (distance === 0) {
    return { points: [...polygon.points] };
  }

  const offset = new ClipperLib.ClipperOffset(2, ARC_TOLERANCE * CLIPPER_SCALE);
  offset.AddPath(toClipperPath(polygon.points), clipperJoinType(joinType), ClipperLib.EndType.etClosedPolygon);

  const solution: ClipperLib.Paths = [];
  offset.Execute(solution, distance * CLIPPER_SCALE);

  let largest: Point[] = [];
  let largestArea = 0;
  for (const path of solution) {
    const points = fromClipperPath(path);
    const area = Math.abs(signedArea(points));
    if (area > largestArea) {
      largest = points;
      largestArea = area;
    }
  }

  if (largest.length < 3) {
    throw new GeometryError(`offsetPolygon: offset of ${distance} collapsed the polygon`);
  }
  return { points: ensureCounterClockwise(largest) };
}
