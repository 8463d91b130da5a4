// src/geometry/boolean-ops.ts

import type { Vec2 } from "../types/layout-model";
import * as martinez from "martinez-polygon-clipping";
import { createLogger } from "../core/logger";
import { cleanRing } from "./polygonizer";

const log = createLogger("boolean-ops");

/**
 * Martinez uses nested arrays:
 * - Point: [x, y]
 * - Ring: Point[]
 * - Polygon: Ring[]           // [outer, hole1, hole2, ...]
 * - MultiPolygon: Polygon[]   // [polygon1, polygon2, ...]
 */

type Ring = number[][];
type PolygonCoords = Ring[];
type MultiPolygonCoords = PolygonCoords[];

function ringToMartinez(ring: readonly Vec2[]): PolygonCoords | null {
  const open = cleanRing(ring);
  if (open.length < 3) return null;
  const coords = open.map((p) => [p.x, p.y]);
  coords.push([open[0].x, open[0].y]);
  return [coords];
}

function isMultiPolygon(
  geom: PolygonCoords | MultiPolygonCoords
): geom is MultiPolygonCoords {
  return Array.isArray(geom[0]?.[0]?.[0]);
}

function toMultiPolygon(
  geom: PolygonCoords | MultiPolygonCoords | null | undefined
): MultiPolygonCoords {
  if (!geom || geom.length === 0) return [];
  return isMultiPolygon(geom) ? geom : [geom];
}

/**
 * Martinez union that never throws; null on failure.
 */
function safeUnion(
  a: PolygonCoords | MultiPolygonCoords,
  b: PolygonCoords | MultiPolygonCoords
): MultiPolygonCoords | null {
  try {
    return toMultiPolygon(martinez.union(a, b));
  } catch (err) {
    log.warn("Martinez error in union", err);
    return null;
  }
}

/**
 * Union the rings of one layer so overlapping shapes extrude as one solid.
 *
 * Extrusion takes simple rings only, so when the union fails, comes back
 * empty, or produces holes, the input rings are returned as they were.
 */
export function mergeLayerPolygons(rings: readonly Vec2[][]): Vec2[][] {
  const coordsList: PolygonCoords[] = [];
  const valid: Vec2[][] = [];
  for (const ring of rings) {
    const coords = ringToMartinez(ring);
    if (coords) {
      coordsList.push(coords);
      valid.push(ring);
    }
  }
  if (coordsList.length < 2) return valid;

  let result: MultiPolygonCoords = [coordsList[0]];
  for (let i = 1; i < coordsList.length; i++) {
    const next = safeUnion(result, coordsList[i]);
    if (!next) return valid;
    result = next;
  }

  if (result.length === 0) {
    log.warn("union produced no polygons, keeping the input rings");
    return valid;
  }
  if (result.some((poly) => poly.length > 1)) {
    log.warn("union produced polygons with holes, keeping the input rings");
    return valid;
  }

  const merged: Vec2[][] = [];
  for (const poly of result) {
    const [outer] = poly;
    if (!outer || outer.length < 3) continue;
    merged.push(outer.map(([x, y]) => ({ x, y })));
  }

  log.debug(`merged ${valid.length} rings into ${merged.length}`);
  return merged.length ? merged : valid;
}
