// src/types/options.ts

import type { Endianness, BBox2 } from "./layout-model";

export interface ParseOptions {
  /**
   * Force a byte order instead of detecting it from the first records.
   */
  endianness?: Endianness;

  /**
   * Fail with UndeterminedEndianness when neither byte order decodes a
   * record, instead of falling back to big-endian.
   */
  strictEndianness?: boolean;

  /**
   * Materialize every structure's elements during the parse. By default
   * structures are only indexed and parsed on first access.
   */
  eager?: boolean;
}

export interface PolygonOptions {
  /** Convert path elements into outline polygons (default true). */
  convertPaths?: boolean;
}

export interface ExtractOptions extends PolygonOptions {
  /** Only keep elements whose layer is in this list. */
  layersFilter?: number[];
  /** Only keep elements whose datatype is in this list. */
  datatypesFilter?: number[];
  /** Skip elements mapped to a disabled rule (default true). */
  enabledOnly?: boolean;
  /** Clip extracted polygons against this window. */
  clipWindow?: WindowBounds;
}

export type WindowBounds =
  | BBox2
  | [xmin: number, ymin: number, xmax: number, ymax: number];

export interface WindowOptions {
  bounds: WindowBounds;
  /** Grow the window by this amount on every side (default 0). */
  margin?: number;
  /** Clip polygons at the window boundary instead of keeping them whole. */
  clip?: boolean;
}

export interface ExtrusionOptions {
  /** Point comparison tolerance (default 1e-9). */
  tolerance?: number;
  /** Reverse clockwise rings before building faces (default true). */
  checkOrientation?: boolean;
  /** Drop near-collinear points before extruding (default false). */
  simplify?: boolean;
}

export interface FlattenOptions {
  /** Maximum reference nesting followed before giving up (default 64). */
  maxDepth?: number;
}

export interface ConversionOptions extends FlattenOptions {
  /**
   * Structure to convert. Defaults to the first structure that no other
   * structure references.
   */
  structureName?: string;

  /** Resolve references before extraction (default true). */
  flatten?: boolean;

  window?: WindowOptions;

  layersFilter?: number[];
  datatypesFilter?: number[];
  enabledOnly?: boolean;
  convertPaths?: boolean;

  /** Union overlapping polygons of the same layer before extruding. */
  mergeOverlaps?: boolean;

  /** Skip extrusion and only return the 2D polygons per layer. */
  extrude?: boolean;

  extrusion?: ExtrusionOptions;
}

export interface LoadLayoutOptions {
  /** Patterns picking the layout and config entries of a bundle. */
  hints?: {
    layout?: string;
    config?: string;
  };
  parse?: ParseOptions;
}
