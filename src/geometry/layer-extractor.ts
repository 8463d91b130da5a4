// src/geometry/layer-extractor.ts

import type { BBox2, GdsElement, Vec2 } from "../types/layout-model";
import type { LayerRule } from "../types/layer-config";
import type { ExtractOptions } from "../types/options";
import { DiagnosticList } from "../core/diagnostics";
import { createLogger } from "../core/logger";
import { mergeBounds, ringBounds } from "./bounds";
import type { LayerTable } from "./layer-table";
import { polygonArea, polygonizeElement } from "./polygonizer";
import {
  bboxOverlapsWindow,
  clipPolygonToWindow,
  createWindow,
  type ClipWindow,
} from "./window-clip";

const log = createLogger("layer-extractor");

export interface LayerPolygons {
  rule: LayerRule;
  /** 1-based index into the table's rules. */
  ruleIndex: number;
  polygons: Vec2[][];
  bbox: BBox2 | null;
  /** Sum of the unsigned polygon areas. */
  area: number;
}

export interface ExtractionStatistics {
  totalElements: number;
  totalPolygons: number;
  /** References left in the input. */
  unresolved: number;
  /** Removed by the layer or datatype filter. */
  filtered: number;
  unmapped: number;
  disabled: number;
  degenerate: number;
  outsideWindow: number;
  clippedAway: number;
}

export interface LayerExtraction {
  layers: LayerPolygons[];
  statistics: ExtractionStatistics;
  diagnostics: DiagnosticList;
}

/**
 * Group the polygons of flattened elements by their layer rule.
 *
 * Elements go through, in order: reference check, layer/datatype filters,
 * table lookup, enabled check, polygon extraction, then the optional clip.
 * Only layers that end up with polygons are returned, in rule order.
 */
export function extractLayers(
  elements: readonly GdsElement[],
  table: LayerTable,
  options: ExtractOptions = {}
): LayerExtraction {
  const enabledOnly = options.enabledOnly ?? true;
  const layersFilter = options.layersFilter?.length ? new Set(options.layersFilter) : null;
  const datatypesFilter = options.datatypesFilter?.length
    ? new Set(options.datatypesFilter)
    : null;
  const window: ClipWindow | null = options.clipWindow
    ? createWindow(options.clipWindow)
    : null;

  const diagnostics = new DiagnosticList();
  const statistics: ExtractionStatistics = {
    totalElements: 0,
    totalPolygons: 0,
    unresolved: 0,
    filtered: 0,
    unmapped: 0,
    disabled: 0,
    degenerate: 0,
    outsideWindow: 0,
    clippedAway: 0,
  };
  const byRule = new Map<number, LayerPolygons>();

  for (const el of elements) {
    statistics.totalElements++;

    if (el.kind === "sref" || el.kind === "aref") {
      statistics.unresolved++;
      continue;
    }

    if (
      (layersFilter && !layersFilter.has(el.layer)) ||
      (datatypesFilter && !datatypesFilter.has(el.datatype))
    ) {
      statistics.filtered++;
      continue;
    }

    const ruleIndex = table.lookup(el.layer, el.datatype);
    const rule = table.ruleAt(ruleIndex);
    if (!rule) {
      statistics.unmapped++;
      continue;
    }
    if (enabledOnly && !rule.enabled) {
      statistics.disabled++;
      continue;
    }

    const { polygons, discarded } = polygonizeElement(el, options);
    if (discarded > 0) {
      statistics.degenerate += discarded;
      diagnostics.info(
        "degenerate-polygon",
        `Dropped ${discarded} degenerate ${el.kind} polygon(s) on ${rule.name}`
      );
    }

    for (const polygon of polygons) {
      let ring = polygon;
      if (window) {
        const bbox = ringBounds(ring);
        if (bbox && !bboxOverlapsWindow(bbox, window)) {
          statistics.outsideWindow++;
          continue;
        }
        ring = clipPolygonToWindow(ring, window);
        if (ring.length === 0) {
          statistics.clippedAway++;
          continue;
        }
      }

      let layer = byRule.get(ruleIndex);
      if (!layer) {
        layer = { rule, ruleIndex, polygons: [], bbox: null, area: 0 };
        byRule.set(ruleIndex, layer);
      }
      layer.polygons.push(ring);
      layer.bbox = mergeBounds(layer.bbox, ringBounds(ring));
      layer.area += polygonArea(ring);
      statistics.totalPolygons++;
    }
  }

  const layers = [...byRule.values()].sort((a, b) => a.ruleIndex - b.ruleIndex);

  log.debug(
    `extracted ${statistics.totalPolygons} polygons on ${layers.length} layers ` +
      `from ${statistics.totalElements} elements`
  );

  return { layers, statistics, diagnostics };
}
