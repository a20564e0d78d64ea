/**
 * No-fit and inner-fit polygons
 *
 * Every region returned here lives in translation space: a polygon B placed
 * at offset `t` (after rotation about the origin) overlaps A exactly when `t`
 * lies strictly inside NFP(A, B), and lies inside the container exactly when
 * `t` lies inside or on IFP(container, B).
 */
import * as ClipperLib from 'clipper-lib';
import { NFPError } from '../errors/nesting.errors';
import { Point, Polygon, Ring } from '../models/geometry.types';
import { NfpMode, NfpResult } from '../models/nesting.types';
import {
  TOLERANCE,
  convexHull,
  ensureCounterClockwise,
  fromClipperPath,
  getBoundingBox,
  isConvex,
  removeCollinearPoints,
  rotatePoints,
  signedArea,
  toClipperPath
} from './geometry.service';

function prepareRing(polygon: Polygon, rotation: number, role: string): Point[] {
  if (polygon.points.length < 3) {
    throw new NFPError(`${role} polygon is degenerate (${polygon.points.length} points)`);
  }
  const ring = ensureCounterClockwise(removeCollinearPoints(rotatePoints(polygon.points, rotation)));
  if (ring.length < 3 || Math.abs(signedArea(ring)) <= TOLERANCE) {
    throw new NFPError(`${role} polygon has no area`);
  }
  return ring;
}

/**
 * Compute the fit region of `orbiting` against `stationary`, both rotated
 * about the origin. `outer` gives the no-fit polygon, `inner` the inner-fit
 * polygon of `orbiting` inside `stationary`.
 */
export function computeNFP(
  stationary: Polygon,
  orbiting: Polygon,
  stationaryRotation: number,
  orbitingRotation: number,
  mode: NfpMode = 'outer'
): NfpResult {
  const a = prepareRing(stationary, stationaryRotation, 'stationary');
  const b = prepareRing(orbiting, orbitingRotation, 'orbiting');

  if (mode === 'inner') {
    return { innerFit: computeInnerFitPolygon(a, b), noFit: [] };
  }
  return { innerFit: null, noFit: [computeNoFitPolygon(a, b)] };
}

export function computeNoFitPolygon(stationary: Ring, orbiting: Ring): Point[] {
  const a = ensureCounterClockwise(stationary);
  const reflected = ensureCounterClockwise(orbiting.map(p => ({ x: -p.x, y: -p.y })));

  if (isConvex(a) && isConvex(reflected)) {
    return traceConvexNoFit(removeCollinearPoints(a), removeCollinearPoints(reflected));
  }
  return minkowskiNoFit(a, reflected);
}

/** Index of the lowest vertex, leftmost among equals. */
function bottomLeftIndex(ring: Ring): number {
  let best = 0;
  for (let i = 1; i < ring.length; i++) {
    const p = ring[i];
    const q = ring[best];
    if (p.y < q.y || (p.y === q.y && p.x < q.x)) best = i;
  }
  return best;
}

function edgeAngle(from: Point, to: Point): number {
  const angle = Math.atan2(to.y - from.y, to.x - from.x);
  return angle < 0 ? angle + 2 * Math.PI : angle;
}

/**
 * Orbit B's reference point around A: starting from the bottom-left contact,
 * follow whichever of A's edges or B's reversed edges turns least, until the
 * path closes. For convex pairs this traces the whole boundary.
 */
function traceConvexNoFit(a: Point[], reflectedB: Point[]): Point[] {
  const n = a.length;
  const m = reflectedB.length;
  const startA = bottomLeftIndex(a);
  const startB = bottomLeftIndex(reflectedB);
  const vertexA = (i: number) => a[(startA + i) % n];
  const vertexB = (j: number) => reflectedB[(startB + j) % m];

  const path: Point[] = [];
  let i = 0;
  let j = 0;
  while (i < n || j < m) {
    const pa = vertexA(i);
    const pb = vertexB(j);
    path.push({ x: pa.x + pb.x, y: pa.y + pb.y });

    if (i >= n) {
      j++;
      continue;
    }
    if (j >= m) {
      i++;
      continue;
    }

    const nextA = vertexA(i + 1);
    const nextB = vertexB(j + 1);
    const ea = { x: nextA.x - pa.x, y: nextA.y - pa.y };
    const eb = { x: nextB.x - pb.x, y: nextB.y - pb.y };
    const cross = ea.x * eb.y - ea.y * eb.x;
    const dot = ea.x * eb.x + ea.y * eb.y;

    if (Math.abs(cross) <= TOLERANCE * Math.hypot(ea.x, ea.y) * Math.hypot(eb.x, eb.y) && dot > 0) {
      i++;
      j++;
    } else if (edgeAngle(pa, nextA) < edgeAngle(pb, nextB)) {
      i++;
    } else {
      j++;
    }
  }

  return removeCollinearPoints(path);
}

/**
 * NFP of a concave pair from clipper's Minkowski sum of A and -B. Only the
 * outer loop is kept; loops for B sitting inside A's concavities are dropped.
 */
function minkowskiNoFit(a: Ring, reflectedB: Ring): Point[] {
  const sums = ClipperLib.Clipper.MinkowskiSum(toClipperPath(reflectedB), toClipperPath(a), true);

  let outer: Point[] = [];
  let outerArea = 0;
  for (const path of sums) {
    const ring = fromClipperPath(path);
    const area = Math.abs(signedArea(ring));
    if (area > outerArea) {
      outer = ring;
      outerArea = area;
    }
  }

  const cleaned = removeCollinearPoints(outer);
  if (cleaned.length < 3) {
    throw new NFPError('Minkowski sum produced no outer loop');
  }
  return ensureCounterClockwise(cleaned);
}

/**
 * Inner-fit polygon by clipping a generous box with one half-plane per
 * container hull edge, each shifted inward by the orbiting part's support
 * point. Exact for convex containers, a superset for concave ones.
 *
 * The result may collapse to a segment or a single point when the part
 * exactly spans the container.
 */
export function computeInnerFitPolygon(container: Ring, orbiting: Ring): Point[] {
  const hull = isConvex(container) ? removeCollinearPoints(ensureCounterClockwise(container)) : convexHull(container);
  const cb = getBoundingBox(hull);
  const bb = getBoundingBox(orbiting);

  const x0 = cb.minX - bb.maxX - 1;
  const x1 = cb.maxX - bb.minX + 1;
  const y0 = cb.minY - bb.maxY - 1;
  const y1 = cb.maxY - bb.minY + 1;
  let region: Point[] = [
    { x: x0, y: y0 },
    { x: x1, y: y0 },
    { x: x1, y: y1 },
    { x: x0, y: y1 }
  ];

  for (let i = 0; i < hull.length && region.length > 0; i++) {
    const from = hull[i];
    const to = hull[(i + 1) % hull.length];
    const edge = { x: to.x - from.x, y: to.y - from.y };

    let support = orbiting[0];
    let supportCross = edge.x * support.y - edge.y * support.x;
    for (const b of orbiting) {
      const c = edge.x * b.y - edge.y * b.x;
      if (c < supportCross) {
        support = b;
        supportCross = c;
      }
    }

    region = clipHalfPlane(region, { x: from.x - support.x, y: from.y - support.y }, edge);
  }

  const result = dedupeRing(region);
  if (result.length === 0) {
    throw new NFPError('part does not fit inside the container in this rotation');
  }
  if (result.length >= 3 && Math.abs(signedArea(result)) > TOLERANCE) {
    return removeCollinearPoints(result);
  }
  return collapseToSegment(result);
}

/** Endpoints of a region that has no area. */
function collapseToSegment(points: Point[]): Point[] {
  if (points.length <= 2) return points;
  let pair: [Point, Point] = [points[0], points[1]];
  let longest = -1;
  for (let i = 0; i < points.length; i++) {
    for (let j = i + 1; j < points.length; j++) {
      const distance = Math.hypot(points[j].x - points[i].x, points[j].y - points[i].y);
      if (distance > longest) {
        longest = distance;
        pair = [points[i], points[j]];
      }
    }
  }
  return longest <= TOLERANCE ? [pair[0]] : pair;
}

/**
 * Sutherland-Hodgman step keeping the points left of (or on) the directed
 * line through `anchor` along `direction`.
 */
function clipHalfPlane(region: Point[], anchor: Point, direction: Point): Point[] {
  const length = Math.hypot(direction.x, direction.y);
  const side = (p: Point) => (direction.x * (p.y - anchor.y) - direction.y * (p.x - anchor.x)) / length;
  const keep = (s: number) => s >= -TOLERANCE;

  const clipped: Point[] = [];
  for (let i = 0; i < region.length; i++) {
    const current = region[i];
    const next = region[(i + 1) % region.length];
    const sc = side(current);
    const sn = side(next);

    if (keep(sc)) clipped.push(current);
    if (keep(sc) !== keep(sn)) {
      const t = sc / (sc - sn);
      let x = current.x + (next.x - current.x) * t;
      let y = current.y + (next.y - current.y) * t;
      // axis-aligned clip lines get exact coordinates
      if (direction.y === 0) y = anchor.y;
      if (direction.x === 0) x = anchor.x;
      clipped.push({ x, y });
    }
  }
  return clipped;
}

function dedupeRing(ring: Point[]): Point[] {
  const result: Point[] = [];
  for (const p of ring) {
    if (!result.some(q => Math.abs(q.x - p.x) <= TOLERANCE && Math.abs(q.y - p.y) <= TOLERANCE)) {
      result.push(p);
    }
  }
  return result;
}
