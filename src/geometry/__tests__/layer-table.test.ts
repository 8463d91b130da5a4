import { describe, it, expect } from "vitest";
import { LayerTable } from "../layer-table";
import { ConfigError } from "../../core/errors";
import { codeOf } from "../../__tests__/helpers/errors";

describe("LayerTable", () => {
  it("fills defaults for omitted rule fields", () => {
    const table = LayerTable.fromRules([{ layer: 3, datatype: 1, zBottom: 0.5, zTop: 1.5 }]);
    expect(table.ruleFor(3, 1)).toEqual({
      layer: 3,
      datatype: 1,
      zBottom: 0.5,
      zTop: 1.5,
      name: "L3D1",
      enabled: true,
      thickness: 1,
      material: "",
      color: [0.5, 0.5, 0.5],
      opacity: 1,
      description: "",
      fillType: "solid",
      properties: {},
    });
  });

  it("maps keys to 1-based rule indices", () => {
    const table = LayerTable.fromRules([
      { layer: 1, datatype: 0, zBottom: 0, zTop: 1, name: "M1" },
      { layer: 2, datatype: 0, zBottom: 1, zTop: 2, name: "M2", enabled: false },
    ]);
    expect(table.size).toBe(2);
    expect(table.lookup(1, 0)).toBe(1);
    expect(table.lookup(2, 0)).toBe(2);
    expect(table.lookup(2, 1)).toBe(0);
    expect(table.ruleAt(2)?.name).toBe("M2");
    expect(table.isEnabled(1, 0)).toBe(true);
    expect(table.isEnabled(2, 0)).toBe(false);
    expect(table.isEnabled(9, 9)).toBe(false);
  });

  it("answers 0 for keys outside the 8-bit range", () => {
    const table = LayerTable.fromRules([{ layer: 0, datatype: 0, zBottom: 0, zTop: 1 }]);
    expect(table.lookup(-1, 0)).toBe(0);
    expect(table.lookup(0, 256)).toBe(0);
    expect(table.lookup(0.5, 0)).toBe(0);
    expect(table.ruleAt(0)).toBeUndefined();
  });

  it("lets a repeated key replace the earlier rule", () => {
    const table = LayerTable.fromRules([
      { layer: 5, datatype: 0, zBottom: 0, zTop: 1, name: "first" },
      { layer: 6, datatype: 0, zBottom: 0, zTop: 1, name: "other" },
      { layer: 5, datatype: 0, zBottom: 2, zTop: 3, name: "second" },
    ]);
    expect(table.size).toBe(2);
    expect(table.lookup(5, 0)).toBe(1);
    expect(table.ruleFor(5, 0)?.name).toBe("second");
    expect(table.diagnostics.count("duplicate-layer")).toBe(1);
  });

  it("rejects keys outside 0..255", () => {
    expect(() =>
      LayerTable.fromRules([{ layer: 256, datatype: 0, zBottom: 0, zTop: 1 }])
    ).toThrow(ConfigError);
    expect(
      codeOf(() => LayerTable.fromRules([{ layer: 1, datatype: -1, zBottom: 0, zTop: 1 }]))
    ).toBe("InvalidLayerRule");
  });

  it("rejects a non-finite z-range", () => {
    expect(
      codeOf(() => LayerTable.fromRules([{ layer: 1, datatype: 0, zBottom: 0, zTop: Infinity }]))
    ).toBe("InvalidLayerRule");
  });
});
