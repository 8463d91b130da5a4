// src/geometry/layer-table.ts

import type { LayerRule, LayerRuleInput } from "../types/layer-config";
import { ConfigError } from "../core/errors";
import { DiagnosticList } from "../core/diagnostics";
import {
  FALLBACK_LAYER_COLOR,
  LAYER_TABLE_SIZE,
  MAX_LAYER_KEY,
} from "./constants";

function isLayerKey(v: number): boolean {
  return Number.isInteger(v) && v >= 0 && v <= MAX_LAYER_KEY;
}

function slotOf(layer: number, datatype: number): number {
  return layer * (MAX_LAYER_KEY + 1) + datatype;
}

function normalizeRule(input: LayerRuleInput): LayerRule {
  const { layer, datatype, zBottom, zTop } = input;

  if (!isLayerKey(layer) || !isLayerKey(datatype)) {
    throw new ConfigError(
      "InvalidLayerRule",
      `Layer rule key (${layer}, ${datatype}) must be integers in 0..${MAX_LAYER_KEY}`
    );
  }
  if (!Number.isFinite(zBottom) || !Number.isFinite(zTop)) {
    throw new ConfigError(
      "InvalidLayerRule",
      `Layer rule (${layer}, ${datatype}) has a non-finite z-range`
    );
  }

  return {
    layer,
    datatype,
    zBottom,
    zTop,
    name: input.name ?? `L${layer}D${datatype}`,
    enabled: input.enabled ?? true,
    thickness: input.thickness ?? zTop - zBottom,
    material: input.material ?? "",
    color: input.color ?? [...FALLBACK_LAYER_COLOR],
    opacity: input.opacity ?? 1,
    description: input.description ?? "",
    fillType: input.fillType ?? "solid",
    properties: input.properties ?? {},
  };
}

/**
 * Dense (layer, datatype) -> rule map. Each cell holds 0 for "not
 * configured" or the 1-based index of the rule.
 */
export class LayerTable {
  private readonly cells = new Int32Array(LAYER_TABLE_SIZE);
  private readonly entries: LayerRule[] = [];
  readonly diagnostics = new DiagnosticList();

  static fromRules(rules: Iterable<LayerRuleInput>): LayerTable {
    const table = new LayerTable();
    for (const input of rules) table.add(normalizeRule(input));
    return table;
  }

  private add(rule: LayerRule): void {
    const slot = slotOf(rule.layer, rule.datatype);
    const existing = this.cells[slot];

    if (existing !== 0) {
      this.diagnostics.warn(
        "duplicate-layer",
        `Layer (${rule.layer}, ${rule.datatype}) is configured twice, keeping "${rule.name}"`
      );
      this.entries[existing - 1] = rule;
      return;
    }

    this.entries.push(rule);
    this.cells[slot] = this.entries.length;
  }

  get rules(): readonly LayerRule[] {
    return this.entries;
  }

  get size(): number {
    return this.entries.length;
  }

  /**
   * 1-based rule index for the key, 0 when the key is out of range or not
   * configured. Enabled status is not considered.
   */
  lookup(layer: number, datatype: number): number {
    if (!isLayerKey(layer) || !isLayerKey(datatype)) return 0;
    return this.cells[slotOf(layer, datatype)];
  }

  ruleAt(index: number): LayerRule | undefined {
    if (!Number.isInteger(index) || index < 1) return undefined;
    return this.entries[index - 1];
  }

  ruleFor(layer: number, datatype: number): LayerRule | undefined {
    return this.ruleAt(this.lookup(layer, datatype));
  }

  isEnabled(layer: number, datatype: number): boolean {
    return this.ruleFor(layer, datatype)?.enabled ?? false;
  }
}
