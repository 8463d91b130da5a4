// src/types/layer-config.ts

export type RGB = [r: number, g: number, b: number];

/**
 * How one (layer, datatype) pair becomes a solid. Only the z-range drives
 * geometry; the rest travels along for exporters.
 */
export interface LayerRule {
  layer: number;
  datatype: number;
  name: string;
  enabled: boolean;
  zBottom: number;
  zTop: number;
  thickness: number;
  material: string;
  /** 0..1 per channel */
  color: RGB;
  opacity: number;
  description: string;
  fillType: string;
  properties: Record<string, unknown>;
}

/** Input to LayerTable.fromRules; everything but the key and z-range is optional. */
export type LayerRuleInput = Pick<LayerRule, "layer" | "datatype" | "zBottom" | "zTop"> &
  Partial<Omit<LayerRule, "layer" | "datatype" | "zBottom" | "zTop">>;

export interface LayerConfigMetadata {
  project: string;
  units: string;
  foundry?: string;
  process?: string;
  reference?: string;
  date?: string;
  version?: string;
  notes?: string;
}

export interface LayerConversionSettings {
  substrateThickness: number;
  passivationThickness: number;
  mergeViasWithMetals: boolean;
  /** Simplification tolerance, 0 turns it off. */
  simplifyPolygons: number;
  tolerance: number;
}
