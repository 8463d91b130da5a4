// src/core/layout-converter.ts

import type * as THREE from "three";
import type { BundleInput } from "../io/unzip";
import type { LayerConfig } from "../config/layer-config";
import type { LayerTable } from "../geometry/layer-table";
import type { ConversionOptions, ParseOptions } from "../types/options";
import { parseGdsLibrary } from "../parse/library-parser";
import { buildLayerGroup } from "../render/three/mesh-builder";
import {
  convertLayoutZip,
  convertLibrary,
  type ConversionResult,
  type ConvertLayoutZipOptions,
} from "./pipeline";

export interface LayoutScene {
  result: ConversionResult;
  group: THREE.Group;
}

/**
 * Thin wrapper for callers that hold the raw stream bytes:
 *
 *   const { group } = convertGdsBytes(bytes, parseLayerConfig(json));
 */
export function convertGdsBytes(
  bytes: Uint8Array,
  layers: LayerConfig | LayerTable,
  options: ConversionOptions & { parse?: ParseOptions } = {}
): LayoutScene {
  const library = parseGdsLibrary(bytes, options.parse);
  const result = convertLibrary(library, layers, options);
  return { result, group: buildLayerGroup(result) };
}

/**
 * Same for a zip bundle holding the stream and its layer config.
 */
export async function loadLayoutSceneFromZip(
  input: BundleInput,
  options: ConvertLayoutZipOptions = {}
): Promise<LayoutScene> {
  const { result } = await convertLayoutZip(input, options);
  return { result, group: buildLayerGroup(result) };
}
