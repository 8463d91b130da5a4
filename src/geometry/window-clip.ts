// src/geometry/window-clip.ts

import type { BBox2, GdsElement, Vec2 } from "../types/layout-model";
import type { WindowBounds } from "../types/options";
import { ConfigError } from "../core/errors";
import { elementBounds } from "./bounds";
import { samePoint } from "./polygonizer";
import { CLIP_PARALLEL_EPSILON } from "./constants";

/** Axis-aligned rectangle used for prefiltering and clipping. */
export type ClipWindow = Readonly<BBox2>;

export interface WindowStats {
  kept: number;
  clipped: number;
  discarded: number;
}

export interface WindowedElements {
  elements: GdsElement[];
  stats: WindowStats;
}

function toBBox(bounds: WindowBounds): BBox2 {
  if (Array.isArray(bounds)) {
    const [minX, minY, maxX, maxY] = bounds;
    return { minX, minY, maxX, maxY };
  }
  return { ...bounds };
}

/**
 * Validate a window and grow it by `margin` on every side. An empty or
 * inverted window is rejected before the margin is applied.
 */
export function createWindow(bounds: WindowBounds, margin = 0): ClipWindow {
  const b = toBBox(bounds);
  if (!(b.minX < b.maxX) || !(b.minY < b.maxY)) {
    throw new ConfigError(
      "InvalidWindow",
      `Window [${b.minX}, ${b.minY}, ${b.maxX}, ${b.maxY}] has no area`
    );
  }
  return {
    minX: b.minX - margin,
    minY: b.minY - margin,
    maxX: b.maxX + margin,
    maxY: b.maxY + margin,
  };
}

/** Touching edges count as overlap. */
export function bboxOverlapsWindow(bbox: BBox2, window: ClipWindow): boolean {
  return (
    bbox.maxX >= window.minX &&
    bbox.minX <= window.maxX &&
    bbox.maxY >= window.minY &&
    bbox.minY <= window.maxY
  );
}

/**
 * Keep the elements that can touch the window.
 *
 * References and elements without bounds always pass. With `clip`,
 * boundaries and boxes are cut to the window and come back as
 * boundaries; those that vanish are dropped.
 */
export function windowElements(
  elements: readonly GdsElement[],
  window: ClipWindow,
  options: { clip?: boolean } = {}
): WindowedElements {
  const out: GdsElement[] = [];
  const stats: WindowStats = { kept: 0, clipped: 0, discarded: 0 };

  for (const el of elements) {
    if (el.kind === "sref" || el.kind === "aref") {
      out.push(el);
      stats.kept++;
      continue;
    }

    const bbox = elementBounds(el);
    if (bbox && !bboxOverlapsWindow(bbox, window)) {
      stats.discarded++;
      continue;
    }

    if (options.clip && (el.kind === "boundary" || el.kind === "box")) {
      const points = clipPolygonToWindow(el.points, window);
      if (points.length === 0) {
        stats.discarded++;
        continue;
      }
      out.push({
        kind: "boundary",
        layer: el.layer,
        datatype: el.datatype,
        elflags: el.elflags,
        plex: el.plex,
        properties: el.properties,
        points,
      });
      stats.clipped++;
      continue;
    }

    out.push(el);
    stats.kept++;
  }

  return { elements: out, stats };
}

// -----------------------------------------------------------------------------
// Sutherland-Hodgman
// -----------------------------------------------------------------------------

type Edge = readonly [Vec2, Vec2];

/**
 * Clip a ring to the window, one half-plane at a time (left, right,
 * bottom, top). Returns [] once any pass leaves fewer than 3 vertices.
 *
 * Only convex subjects come out exact; a concave ring may produce a
 * self-intersecting result.
 */
export function clipPolygonToWindow(
  points: readonly Vec2[],
  window: ClipWindow
): Vec2[] {
  let ring = points.slice();
  const closed = ring.length > 1 && samePoint(ring[0], ring[ring.length - 1]);
  if (closed) ring.pop();
  if (ring.length < 3) return [];

  const { minX, minY, maxX, maxY } = window;
  // Counter-clockwise around the window, so inside is on the left.
  const edges: Edge[] = [
    [{ x: minX, y: maxY }, { x: minX, y: minY }],
    [{ x: maxX, y: minY }, { x: maxX, y: maxY }],
    [{ x: minX, y: minY }, { x: maxX, y: minY }],
    [{ x: maxX, y: maxY }, { x: minX, y: maxY }],
  ];

  for (const edge of edges) {
    ring = clipAgainstEdge(ring, edge);
    if (ring.length < 3) return [];
  }

  if (closed) ring.push({ ...ring[0] });
  return ring;
}

function clipAgainstEdge(ring: readonly Vec2[], edge: Edge): Vec2[] {
  const out: Vec2[] = [];
  let s = ring[ring.length - 1];

  for (const e of ring) {
    const eInside = isInside(e, edge);
    const sInside = isInside(s, edge);
    if (eInside) {
      if (!sInside) out.push(intersect(s, e, edge));
      out.push(e);
    } else if (sInside) {
      out.push(intersect(s, e, edge));
    }
    s = e;
  }
  return out;
}

function isInside(p: Vec2, [a, b]: Edge): boolean {
  return (b.x - a.x) * (p.y - a.y) - (b.y - a.y) * (p.x - a.x) >= 0;
}

function intersect(p1: Vec2, p2: Vec2, [p3, p4]: Edge): Vec2 {
  const denom = (p1.x - p2.x) * (p3.y - p4.y) - (p1.y - p2.y) * (p3.x - p4.x);
  if (Math.abs(denom) < CLIP_PARALLEL_EPSILON) {
    return { x: (p1.x + p2.x) / 2, y: (p1.y + p2.y) / 2 };
  }
  const t =
    ((p1.x - p3.x) * (p3.y - p4.y) - (p1.y - p3.y) * (p3.x - p4.x)) / denom;
  return { x: p1.x + t * (p2.x - p1.x), y: p1.y + t * (p2.y - p1.y) };
}
