// src/index.ts

export * from "./types/layout-model";
export type * from "./types/layer-config";
export type * from "./types/options";

export * from "./core/errors";
export * from "./core/diagnostics";
export { createLogger, setLogLevel, getLogLevel, type Logger, type LogLevel } from "./core/logger";
export * from "./core/handle-registry";
export * from "./core/pipeline";
export * from "./core/layout-converter";

export {
  ByteCursor,
  detectEndianness,
  scoreEndianness,
  type RecordHeader,
  type EndiannessScore,
} from "./parse/byte-cursor";
export * from "./parse/record-decoder";
export { RecordType, recordTypeName, isKnownRecordType } from "./parse/record-types";
export * from "./parse/library-parser";

export * from "./config/layer-config";

export { LayerTable } from "./geometry/layer-table";
export { elementBounds, arefLatticeBounds, ringBounds, mergeBounds } from "./geometry/bounds";
export * from "./geometry/polygonizer";
export * from "./geometry/hierarchy-flattener";
export * from "./geometry/window-clip";
export * from "./geometry/extruder";
export { mergeLayerPolygons } from "./geometry/boolean-ops";
export * from "./geometry/layer-extractor";

export * from "./io/unzip";
export * from "./io/file-classifier";

export * from "./render/three/materials";
export * from "./render/three/mesh-builder";
