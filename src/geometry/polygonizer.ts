import type { GdsElement, Vec2 } from "../types/layout-model";
import type { PolygonOptions } from "../types/options";

// Path types whose ends are pushed past the end vertices.
const PATHTYPE_HALF_WIDTH_EXTENSION = 2;
const PATHTYPE_CUSTOM_EXTENSION = 4;

export interface PathShape {
  pathType?: number;
  beginExtension?: number;
  endExtension?: number;
}

export interface ElementPolygons {
  polygons: Vec2[][];
  /** Rings dropped for having fewer than 3 distinct vertices. */
  discarded: number;
}

// -----------------------------------------------------------------------------
// Public API
// -----------------------------------------------------------------------------

/**
 * Convert one element into 2D rings.
 *
 * Boundaries and boxes come back as copies of their stored vertices.
 * Paths are stroked with pathToPolygon. Texts, nodes and references
 * produce nothing; references must be flattened first.
 */
export function polygonizeElement(
  el: GdsElement,
  options: PolygonOptions = {}
): ElementPolygons {
  const convertPaths = options.convertPaths ?? true;
  let candidates: Vec2[][] = [];

  switch (el.kind) {
    case "boundary":
    case "box":
      candidates = [el.points.map((p) => ({ x: p.x, y: p.y }))];
      break;
    case "path":
      if (convertPaths) {
        candidates = [
          pathToPolygon(el.points, el.width, {
            pathType: el.pathType,
            beginExtension: el.beginExtension,
            endExtension: el.endExtension,
          }),
        ];
      }
      break;
    case "text":
    case "node":
    case "sref":
    case "aref":
      break;
  }

  const polygons: Vec2[][] = [];
  let discarded = 0;
  for (const ring of candidates) {
    if (cleanRing(ring).length < 3) {
      discarded++;
    } else {
      polygons.push(ring);
    }
  }
  return { polygons, discarded };
}

export function extractElementPolygons(
  el: GdsElement,
  options: PolygonOptions = {}
): Vec2[][] {
  return polygonizeElement(el, options).polygons;
}

/**
 * Outline of a path centerline of the given width.
 *
 * Every vertex is pushed half the width to each side of its tangent. The
 * tangent is the adjacent segment at the ends and p[i+1] - p[i-1] inside.
 * Joints get no miter or bevel, so sharp turns can self-intersect.
 *
 * Returns the closed ring left rail, reversed right rail, first left point.
 */
export function pathToPolygon(
  points: readonly Vec2[],
  width: number,
  shape: PathShape = {}
): Vec2[] {
  const n = points.length;
  if (n === 0) return [];

  const half = Math.abs(width) / 2;
  const tangents: Vec2[] = [];

  for (let i = 0; i < n; i++) {
    let from = points[i];
    let to = points[i];
    if (n > 1) {
      if (i === 0) {
        to = points[1];
      } else if (i === n - 1) {
        from = points[n - 2];
      } else {
        from = points[i - 1];
        to = points[i + 1];
      }
    }
    tangents.push(normalize({ x: to.x - from.x, y: to.y - from.y }));
  }

  const { begin, end } = endExtensions(half, shape);
  const centers = points.map((p) => ({ x: p.x, y: p.y }));
  if (begin !== 0) centers[0] = add(centers[0], scale(tangents[0], -begin));
  if (end !== 0) centers[n - 1] = add(centers[n - 1], scale(tangents[n - 1], end));

  const left: Vec2[] = [];
  const right: Vec2[] = [];
  for (let i = 0; i < n; i++) {
    const t = tangents[i];
    left.push(add(centers[i], scale({ x: -t.y, y: t.x }, half)));
    right.push(add(centers[i], scale({ x: t.y, y: -t.x }, half)));
  }

  return [...left, ...right.reverse(), left[0]];
}

function endExtensions(half: number, shape: PathShape): { begin: number; end: number } {
  switch (shape.pathType) {
    case PATHTYPE_HALF_WIDTH_EXTENSION:
      return { begin: half, end: half };
    case PATHTYPE_CUSTOM_EXTENSION:
      return { begin: shape.beginExtension ?? 0, end: shape.endExtension ?? 0 };
    default:
      return { begin: 0, end: 0 };
  }
}

// -----------------------------------------------------------------------------
// Ring helpers
// -----------------------------------------------------------------------------

/**
 * Drop consecutive duplicate vertices and the closing duplicate. The
 * result is an open ring.
 */
export function cleanRing(points: readonly Vec2[], tolerance = 0): Vec2[] {
  const out: Vec2[] = [];
  for (const p of points) {
    const prev = out[out.length - 1];
    if (prev && samePoint(prev, p, tolerance)) continue;
    out.push(p);
  }
  while (out.length > 1 && samePoint(out[0], out[out.length - 1], tolerance)) {
    out.pop();
  }
  return out;
}

/** Shoelace area; positive for counter-clockwise rings, open or closed. */
export function signedArea(points: readonly Vec2[]): number {
  let sum = 0;
  for (let i = 0; i < points.length; i++) {
    const a = points[i];
    const b = points[(i + 1) % points.length];
    sum += a.x * b.y - b.x * a.y;
  }
  return sum / 2;
}

export function polygonArea(points: readonly Vec2[]): number {
  return Math.abs(signedArea(points));
}

export function samePoint(a: Vec2, b: Vec2, tolerance = 0): boolean {
  return Math.abs(a.x - b.x) <= tolerance && Math.abs(a.y - b.y) <= tolerance;
}

// -----------------------------------------------------------------------------
// Vec helpers
// -----------------------------------------------------------------------------

function add(a: Vec2, b: Vec2): Vec2 {
  return { x: a.x + b.x, y: a.y + b.y };
}

function scale(v: Vec2, s: number): Vec2 {
  return { x: v.x * s, y: v.y * s };
}

function normalize(v: Vec2): Vec2 {
  const len = Math.hypot(v.x, v.y);
  if (len === 0) return { x: 0, y: 0 };
  return { x: v.x / len, y: v.y / len };
}
