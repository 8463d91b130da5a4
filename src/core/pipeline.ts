// src/core/pipeline.ts

import { unzipBundle, type BundleInput } from "../io/unzip";
import { classifyFiles } from "../io/file-classifier";
import { parseGdsLibrary, findTopStructures, type GdsLibrary } from "../parse/library-parser";
import { parseLayerConfig, type LayerConfig } from "../config/layer-config";
import { LayerTable } from "../geometry/layer-table";
import { flattenStructure, type FlattenStats } from "../geometry/hierarchy-flattener";
import { createWindow, windowElements, type WindowStats } from "../geometry/window-clip";
import { extractLayers, type ExtractionStatistics } from "../geometry/layer-extractor";
import { mergeLayerPolygons } from "../geometry/boolean-ops";
import { extrudePolygon } from "../geometry/extruder";
import { polygonArea } from "../geometry/polygonizer";
import { DiagnosticList } from "./diagnostics";
import { ConfigError, describeError, isLayoutError } from "./errors";
import { createLogger } from "./logger";

import type { BBox2, GdsElement, LibraryUnits, Solid3D, Vec2 } from "../types/layout-model";
import type { LayerRule } from "../types/layer-config";
import type {
  ConversionOptions,
  ExtrusionOptions,
  LoadLayoutOptions,
} from "../types/options";

const log = createLogger("pipeline");

export interface LayerSolids {
  rule: LayerRule;
  ruleIndex: number;
  polygons: Vec2[][];
  /** Empty when extrusion is turned off. */
  solids: Solid3D[];
  bbox: BBox2 | null;
  area: number;
  volume: number;
}

export interface ConversionStatistics extends ExtractionStatistics {
  flatten: FlattenStats | null;
  window: WindowStats | null;
  solids: number;
  extrusionFailures: number;
}

export interface ConversionResult {
  libraryName: string;
  structureName: string;
  units: LibraryUnits;
  layers: LayerSolids[];
  statistics: ConversionStatistics;
  diagnostics: DiagnosticList;
}

export interface LoadedLayout {
  library: GdsLibrary;
  layoutName: string;
  config: LayerConfig | null;
  configName: string | null;
}

export interface ConvertLayoutZipOptions extends ConversionOptions, LoadLayoutOptions {
  /** Used instead of the bundle's own config, or when it has none. */
  layers?: LayerConfig | LayerTable;
}

export interface ConvertedLayout extends LoadedLayout {
  result: ConversionResult;
}

function pickStructure(library: GdsLibrary, requested?: string): string | null {
  if (requested !== undefined) {
    if (!library.hasStructure(requested)) {
      throw new Error(`Structure "${requested}" not found in library ${library.name}`);
    }
    return requested;
  }
  const [top] = findTopStructures(library);
  return top?.name ?? library.structures[0]?.name ?? null;
}

/**
 * End to end conversion of one structure: flatten, window, extract per
 * layer, optionally merge, then extrude each polygon with its layer's
 * z-range. Per-polygon failures are reported in `diagnostics` and the
 * remaining polygons still convert.
 */
export function convertLibrary(
  library: GdsLibrary,
  layers: LayerConfig | LayerTable,
  options: ConversionOptions = {}
): ConversionResult {
  const table = layers instanceof LayerTable ? layers : layers.table;
  const settings = layers instanceof LayerTable ? null : layers.conversionOptions;

  const diagnostics = new DiagnosticList();
  const structureName = pickStructure(library, options.structureName);
  const statistics: ConversionStatistics = {
    totalElements: 0,
    totalPolygons: 0,
    unresolved: 0,
    filtered: 0,
    unmapped: 0,
    disabled: 0,
    degenerate: 0,
    outsideWindow: 0,
    clippedAway: 0,
    flatten: null,
    window: null,
    solids: 0,
    extrusionFailures: 0,
  };

  const result: ConversionResult = {
    libraryName: library.name,
    structureName: structureName ?? "",
    units: library.units,
    layers: [],
    statistics,
    diagnostics,
  };
  if (structureName === null) {
    log.warn(`library ${library.name} has no structures`);
    diagnostics.append(library.diagnostics.items);
    return result;
  }

  // 1) Hierarchy
  let elements: readonly GdsElement[];
  if (options.flatten ?? true) {
    const flat = flattenStructure(library, structureName, { maxDepth: options.maxDepth });
    elements = flat.elements;
    statistics.flatten = flat.stats;
    diagnostics.append(flat.diagnostics.items);
  } else {
    elements = library.elements(structureName);
  }
  // Element decoding is lazy, so the library's list is complete only now.
  diagnostics.append(library.diagnostics.items);

  // 2) Window prefilter
  const window = options.window
    ? createWindow(options.window.bounds, options.window.margin ?? 0)
    : null;
  if (window) {
    const windowed = windowElements(elements, window);
    elements = windowed.elements;
    statistics.window = windowed.stats;
  }

  // 3) Layers
  const extraction = extractLayers(elements, table, {
    layersFilter: options.layersFilter,
    datatypesFilter: options.datatypesFilter,
    enabledOnly: options.enabledOnly,
    convertPaths: options.convertPaths,
    clipWindow: window && options.window?.clip ? window : undefined,
  });
  Object.assign(statistics, extraction.statistics);
  diagnostics.append(extraction.diagnostics.items);

  // 4) Merge and extrude
  const merge = options.mergeOverlaps ?? false;
  const extrude = options.extrude ?? true;
  const extrusion = extrusionOptions(options.extrusion, settings?.simplifyPolygons);

  for (const layer of extraction.layers) {
    const polygons = merge ? mergeLayerPolygons(layer.polygons) : layer.polygons;
    const solids: Solid3D[] = [];

    if (extrude) {
      for (const polygon of polygons) {
        try {
          solids.push(
            extrudePolygon(polygon, layer.rule.zBottom, layer.rule.zTop, extrusion)
          );
        } catch (err) {
          if (!isLayoutError(err)) throw err;
          statistics.extrusionFailures++;
          diagnostics.warn(
            "extrusion-failed",
            `${layer.rule.name}: ${describeError(err)}`
          );
        }
      }
    }

    statistics.solids += solids.length;
    result.layers.push({
      rule: layer.rule,
      ruleIndex: layer.ruleIndex,
      polygons,
      solids,
      bbox: layer.bbox,
      area: merge ? polygons.reduce((sum, p) => sum + polygonArea(p), 0) : layer.area,
      volume: solids.reduce((sum, s) => sum + s.volume, 0),
    });
  }

  log.info(
    `${library.name}/${structureName}: ${statistics.totalPolygons} polygons, ` +
      `${statistics.solids} solids on ${result.layers.length} layers`
  );
  return result;
}

function extrusionOptions(
  explicit: ExtrusionOptions | undefined,
  simplifyTolerance: number | undefined
): ExtrusionOptions {
  if (explicit) return explicit;
  if (simplifyTolerance && simplifyTolerance > 0) {
    return { simplify: true, tolerance: simplifyTolerance };
  }
  return {};
}

/**
 * Unzip a bundle and parse its first layout stream and first layer config
 * (if any). Hints choose between several candidates.
 */
export async function loadLayoutFromZip(
  input: BundleInput,
  options: LoadLayoutOptions = {}
): Promise<LoadedLayout> {
  const entries = await unzipBundle(input);
  const classified = classifyFiles(entries, options.hints);

  const [layoutFile] = classified.layouts;
  if (!layoutFile) {
    throw new Error("Bundle contains no layout stream (.gds, .gds2, .gdsii, .gds.bin, .strm)");
  }

  const library = parseGdsLibrary(await layoutFile.getBytes(), options.parse);

  const [configFile] = classified.configs;
  const config = configFile ? parseLayerConfig(await configFile.getText()) : null;

  log.debug(
    `bundle: layout ${layoutFile.name}, config ${configFile?.name ?? "none"}, ` +
      `${classified.ignored.length} ignored`
  );

  return {
    library,
    layoutName: layoutFile.name,
    config,
    configName: configFile?.name ?? null,
  };
}

/**
 * loadLayoutFromZip followed by convertLibrary.
 */
export async function convertLayoutZip(
  input: BundleInput,
  options: ConvertLayoutZipOptions = {}
): Promise<ConvertedLayout> {
  const loaded = await loadLayoutFromZip(input, options);
  const layers = options.layers ?? loaded.config;
  if (!layers) {
    throw new ConfigError(
      "InvalidLayerConfig",
      "Bundle has no layer config and none was passed in"
    );
  }
  return { ...loaded, result: convertLibrary(loaded.library, layers, options) };
}
