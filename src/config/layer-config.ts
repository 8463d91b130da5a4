// src/config/layer-config.ts

import Joi from "joi";
import type {
  LayerConfigMetadata,
  LayerConversionSettings,
  LayerRule,
  RGB,
} from "../types/layer-config";
import { ConfigError, describeError } from "../core/errors";
import { DiagnosticList } from "../core/diagnostics";
import { createLogger } from "../core/logger";
import { LayerTable } from "../geometry/layer-table";
import {
  DEFAULT_CONFIG_TOLERANCE,
  FALLBACK_LAYER_COLOR,
} from "../geometry/constants";

const log = createLogger("layer-config");

const NAMED_COLORS: Record<string, RGB> = {
  red: [1, 0, 0],
  green: [0, 1, 0],
  blue: [0, 0, 1],
  yellow: [1, 1, 0],
  cyan: [0, 1, 1],
  magenta: [1, 0, 1],
  white: [1, 1, 1],
  black: [0, 0, 0],
  gray: [0.5, 0.5, 0.5],
  grey: [0.5, 0.5, 0.5],
  orange: [1, 0.65, 0],
  purple: [0.5, 0, 0.5],
  brown: [0.65, 0.16, 0.16],
};

type ColorSpec = string | number[];

interface RawLayer {
  gds_layer: number;
  gds_datatype: number;
  name: string;
  z_bottom: number;
  z_top: number;
  thickness?: number;
  material: string;
  description: string;
  color?: ColorSpec;
  opacity: number;
  enabled: boolean;
  fill_type: string;
  properties: Record<string, unknown>;
}

interface RawConversionOptions {
  substrate_thickness: number;
  passivation_thickness: number;
  merge_vias_with_metals: boolean;
  simplify_polygons: number;
  tolerance: number;
}

interface RawLayerConfig {
  project: string;
  units: string;
  foundry?: string;
  process?: string;
  reference?: string;
  date?: string;
  version?: string;
  notes?: string;
  layers: RawLayer[];
  conversion_options: RawConversionOptions;
}

const layerKey = Joi.number().integer().min(0).max(255);

/**
 * One entry of `layers`
 */
export const layerRuleSchema = Joi.object<RawLayer>({
  gds_layer: layerKey.required(),
  gds_datatype: layerKey.required(),
  name: Joi.string().trim().min(1).required(),
  z_bottom: Joi.number().required(),
  z_top: Joi.number().required(),
  thickness: Joi.number().min(0).optional(),
  material: Joi.string().allow("").optional().default(""),
  description: Joi.string().allow("").optional().default(""),
  color: Joi.alternatives()
    .try(Joi.string().trim(), Joi.array().items(Joi.number()).length(3))
    .optional(),
  opacity: Joi.number().min(0).max(1).optional().default(1),
  enabled: Joi.boolean().optional().default(true),
  fill_type: Joi.string().optional().default("solid"),
  properties: Joi.object().unknown(true).optional().default({}),
}).unknown(true);

/**
 * Whole layer configuration document
 */
export const layerConfigSchema = Joi.object<RawLayerConfig>({
  project: Joi.string().required(),
  units: Joi.string().required(),
  foundry: Joi.string().allow("").optional(),
  process: Joi.string().allow("").optional(),
  reference: Joi.string().allow("").optional(),
  date: Joi.string().allow("").optional(),
  version: Joi.string().allow("").optional(),
  notes: Joi.string().allow("").optional(),
  layers: Joi.array().items(layerRuleSchema).min(1).required(),
  conversion_options: Joi.object({
    substrate_thickness: Joi.number().min(0).optional().default(0),
    passivation_thickness: Joi.number().min(0).optional().default(0),
    merge_vias_with_metals: Joi.boolean().optional().default(false),
    simplify_polygons: Joi.number().min(0).optional().default(0),
    tolerance: Joi.number().min(0).optional().default(DEFAULT_CONFIG_TOLERANCE),
  })
    .unknown(true)
    .optional()
    .default(),
}).unknown(true);

export interface LayerConfig {
  metadata: LayerConfigMetadata;
  rules: LayerRule[];
  conversionOptions: LayerConversionSettings;
  /** Lookup table built from `rules`. */
  table: LayerTable;
  diagnostics: DiagnosticList;
}

/**
 * Parse a color given as "#RRGGBB", "#RGB", a name, or an [r, g, b]
 * triple in 0..255 or 0..1. Returns null when it cannot be read.
 */
export function parseColor(spec: ColorSpec): RGB | null {
  if (typeof spec !== "string") {
    if (spec.length !== 3 || !spec.every((v) => Number.isFinite(v))) return null;
    const scale = Math.max(...spec) > 1 ? 255 : 1;
    const [r, g, b] = spec.map((v) => Math.min(1, Math.max(0, v / scale)));
    return [r, g, b];
  }

  if (spec.startsWith("#")) {
    let hex = spec.slice(1);
    if (hex.length === 3) {
      hex = hex
        .split("")
        .map((c) => c + c)
        .join("");
    }
    if (!/^[0-9a-fA-F]{6}$/.test(hex)) return null;
    return [
      parseInt(hex.slice(0, 2), 16) / 255,
      parseInt(hex.slice(2, 4), 16) / 255,
      parseInt(hex.slice(4, 6), 16) / 255,
    ];
  }

  const named = NAMED_COLORS[spec.toLowerCase()];
  return named ? [...named] : null;
}

function toRule(
  raw: RawLayer,
  tolerance: number,
  diagnostics: DiagnosticList
): LayerRule {
  const span = raw.z_top - raw.z_bottom;

  let thickness = span;
  if (raw.thickness !== undefined) {
    thickness = raw.thickness;
    if (Math.abs(span - thickness) > tolerance) {
      diagnostics.warn(
        "thickness-inconsistent",
        `Layer ${raw.name}: thickness=${thickness} but z_top-z_bottom=${span}`
      );
    }
  }

  let color: RGB = [...FALLBACK_LAYER_COLOR];
  if (raw.color !== undefined) {
    const parsed = parseColor(raw.color);
    if (parsed) {
      color = parsed;
    } else {
      diagnostics.warn(
        "invalid-color",
        `Layer ${raw.name}: unrecognized color ${JSON.stringify(raw.color)}, using gray`
      );
    }
  }

  return {
    layer: raw.gds_layer,
    datatype: raw.gds_datatype,
    name: raw.name,
    enabled: raw.enabled,
    zBottom: raw.z_bottom,
    zTop: raw.z_top,
    thickness,
    material: raw.material,
    color,
    opacity: raw.opacity,
    description: raw.description,
    fillType: raw.fill_type,
    properties: raw.properties,
  };
}

/**
 * Validate a layer configuration given as JSON text or an already parsed
 * value, and build its lookup table.
 *
 * Throws ConfigError("InvalidLayerConfig") listing every validation
 * message when the document does not match the schema.
 */
export function parseLayerConfig(input: string | unknown): LayerConfig {
  let data: unknown = input;
  if (typeof input === "string") {
    try {
      data = JSON.parse(input);
    } catch (err) {
      throw new ConfigError(
        "InvalidLayerConfig",
        `Layer config is not valid JSON: ${describeError(err)}`
      );
    }
  }

  const { error, value } = layerConfigSchema.validate(data, {
    abortEarly: false,
  });

  if (error || !value) {
    const details = error
      ? error.details.map((d) => d.message).join("; ")
      : "empty document";
    throw new ConfigError("InvalidLayerConfig", `Invalid layer config: ${details}`);
  }

  const diagnostics = new DiagnosticList();
  const options = value.conversion_options;
  const rules = value.layers.map((raw) =>
    toRule(raw, options.tolerance, diagnostics)
  );

  const table = LayerTable.fromRules(rules);
  diagnostics.append(table.diagnostics.items);

  for (const d of diagnostics.items) log.warn(d.message);

  return {
    metadata: {
      project: value.project,
      units: value.units,
      foundry: value.foundry,
      process: value.process,
      reference: value.reference,
      date: value.date,
      version: value.version,
      notes: value.notes,
    },
    rules,
    conversionOptions: {
      substrateThickness: options.substrate_thickness,
      passivationThickness: options.passivation_thickness,
      mergeViasWithMetals: options.merge_vias_with_metals,
      simplifyPolygons: options.simplify_polygons,
      tolerance: options.tolerance,
    },
    table,
    diagnostics,
  };
}
