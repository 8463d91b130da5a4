// src/geometry/extruder.ts

import type { BBox3, Solid3D, Vec2, Vec3 } from "../types/layout-model";
import type { ExtrusionOptions } from "../types/options";
import { GeometryError } from "../core/errors";
import { DEFAULT_EXTRUSION_TOLERANCE } from "./constants";
import { polygonArea, signedArea } from "./polygonizer";

/**
 * Extrude a closed 2D ring into a prism between zBottom and zTop.
 *
 * The ring is cleaned of consecutive near-duplicates, closed, then opened
 * again and turned counter-clockwise. Vertices 0..N-1 sit at zBottom and
 * N..2N-1 repeat them at zTop.
 */
export function extrudePolygon(
  points: readonly Vec2[],
  zBottom: number,
  zTop: number,
  options: ExtrusionOptions = {}
): Solid3D {
  const tolerance = options.tolerance ?? DEFAULT_EXTRUSION_TOLERANCE;
  const checkOrientation = options.checkOrientation ?? true;

  if (!(zTop > zBottom)) {
    throw new GeometryError(
      "InvalidZRange",
      `zTop (${zTop}) must be greater than zBottom (${zBottom})`
    );
  }

  let ring = removeNearDuplicates(points, tolerance);
  if (ring.length > 0 && distance(ring[0], ring[ring.length - 1]) > tolerance) {
    ring.push(ring[0]);
  }
  ring = ring.slice(0, -1);

  if (checkOrientation && signedArea(ring) < 0) ring.reverse();
  if (options.simplify) ring = simplifyRing(ring, tolerance);

  if (ring.length < 3) {
    throw new GeometryError(
      "DegeneratePolygon",
      `Polygon has ${ring.length} distinct vertices after cleanup, need 3`
    );
  }

  const n = ring.length;
  const vertices: Vec3[] = [
    ...ring.map((p) => ({ x: p.x, y: p.y, z: zBottom })),
    ...ring.map((p) => ({ x: p.x, y: p.y, z: zTop })),
  ];

  const bottomFace = ring.map((_, i) => i);
  const topFace = ring.map((_, i) => n + i);
  const sideFaces: number[][] = [];
  for (let i = 0; i < n; i++) {
    const next = (i + 1) % n;
    sideFaces.push([i, next, n + next, n + i]);
  }

  const baseArea = polygonArea(ring);
  const height = zTop - zBottom;

  return {
    vertices,
    faces: [bottomFace, topFace, ...sideFaces],
    bottomFace,
    topFace,
    sideFaces,
    bbox: solidBounds(vertices),
    volume: baseArea * height,
    baseArea,
    zBottom,
    zTop,
    height,
  };
}

function distance(a: Vec2, b: Vec2): number {
  return Math.hypot(a.x - b.x, a.y - b.y);
}

function removeNearDuplicates(points: readonly Vec2[], tolerance: number): Vec2[] {
  const out: Vec2[] = [];
  for (const p of points) {
    const prev = out[out.length - 1];
    if (prev && distance(prev, p) < tolerance) continue;
    out.push({ x: p.x, y: p.y });
  }
  return out;
}

/**
 * Drop vertices whose neighbours make them collinear within `tolerance`
 * (a sine bound on the turn). The first and last vertex always stay.
 */
export function simplifyRing(ring: readonly Vec2[], tolerance: number): Vec2[] {
  if (ring.length <= 3) return ring.slice();

  const out: Vec2[] = [ring[0]];
  for (let i = 1; i < ring.length - 1; i++) {
    const prev = ring[i - 1];
    const curr = ring[i];
    const next = ring[i + 1];
    const v1 = { x: curr.x - prev.x, y: curr.y - prev.y };
    const v2 = { x: next.x - prev.x, y: next.y - prev.y };
    const len1 = Math.hypot(v1.x, v1.y);
    const len2 = Math.hypot(v2.x, v2.y);
    if (len1 < tolerance || len2 < tolerance) continue;

    const cross = v1.x * v2.y - v1.y * v2.x;
    if (Math.abs(cross) > tolerance * len1 * len2) out.push(curr);
  }
  out.push(ring[ring.length - 1]);
  return out;
}

function solidBounds(vertices: readonly Vec3[]): BBox3 {
  const b: BBox3 = {
    minX: Infinity,
    minY: Infinity,
    minZ: Infinity,
    maxX: -Infinity,
    maxY: -Infinity,
    maxZ: -Infinity,
  };
  for (const v of vertices) {
    b.minX = Math.min(b.minX, v.x);
    b.minY = Math.min(b.minY, v.y);
    b.minZ = Math.min(b.minZ, v.z);
    b.maxX = Math.max(b.maxX, v.x);
    b.maxY = Math.max(b.maxY, v.y);
    b.maxZ = Math.max(b.maxZ, v.z);
  }
  return b;
}
