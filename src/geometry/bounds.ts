// src/geometry/bounds.ts

import type { ARefElement, BBox2, GdsElement, Vec2 } from "../types/layout-model";

/**
 * Axis-aligned bounds of a point list, or null when it is empty or holds
 * non-finite coordinates.
 */
export function ringBounds(points: readonly Vec2[]): BBox2 | null {
  let minX = Infinity;
  let maxX = -Infinity;
  let minY = Infinity;
  let maxY = -Infinity;

  for (const p of points) {
    if (p.x < minX) minX = p.x;
    if (p.x > maxX) maxX = p.x;
    if (p.y < minY) minY = p.y;
    if (p.y > maxY) maxY = p.y;
  }

  if (!isFinite(minX) || !isFinite(minY) || !isFinite(maxX) || !isFinite(maxY)) {
    return null;
  }
  return { minX, minY, maxX, maxY };
}

export function mergeBounds(a: BBox2 | null, b: BBox2 | null): BBox2 | null {
  if (!a) return b;
  if (!b) return a;
  return {
    minX: Math.min(a.minX, b.minX),
    minY: Math.min(a.minY, b.minY),
    maxX: Math.max(a.maxX, b.maxX),
    maxY: Math.max(a.maxY, b.maxY),
  };
}

export function expandBounds(b: BBox2, amount: number): BBox2 {
  return {
    minX: b.minX - amount,
    minY: b.minY - amount,
    maxX: b.maxX + amount,
    maxY: b.maxY + amount,
  };
}

/** Per-instance offsets of an array reference along its two lattice axes. */
export function arefSteps(ref: ARefElement): { column: Vec2; row: Vec2 } {
  const cols = Math.max(ref.columns, 1);
  const rows = Math.max(ref.rows, 1);
  return {
    column: {
      x: (ref.columnPoint.x - ref.origin.x) / cols,
      y: (ref.columnPoint.y - ref.origin.y) / cols,
    },
    row: {
      x: (ref.rowPoint.x - ref.origin.x) / rows,
      y: (ref.rowPoint.y - ref.origin.y) / rows,
    },
  };
}

/**
 * Bounds of the instance origins of an array reference: the four corner
 * instances origin + c*colStep + r*rowStep for c in {0, cols-1} and
 * r in {0, rows-1}. The referenced structure's extent is not included.
 */
export function arefLatticeBounds(ref: ARefElement): BBox2 | null {
  const { column, row } = arefSteps(ref);
  const lastCol = Math.max(ref.columns, 1) - 1;
  const lastRow = Math.max(ref.rows, 1) - 1;

  const corners: Vec2[] = [];
  for (const c of [0, lastCol]) {
    for (const r of [0, lastRow]) {
      corners.push({
        x: ref.origin.x + c * column.x + r * row.x,
        y: ref.origin.y + c * column.y + r * row.y,
      });
    }
  }
  return ringBounds(corners);
}

/**
 * Bounds of an element in its own structure's coordinates. Paths are
 * widened by half their width; texts and single references reduce to
 * their position.
 */
export function elementBounds(el: GdsElement): BBox2 | null {
  switch (el.kind) {
    case "boundary":
    case "box":
    case "node":
      return ringBounds(el.points);
    case "path": {
      const b = ringBounds(el.points);
      return b ? expandBounds(b, Math.abs(el.width) / 2) : null;
    }
    case "text":
    case "sref":
      return ringBounds([el.position]);
    case "aref":
      return arefLatticeBounds(el);
  }
}
