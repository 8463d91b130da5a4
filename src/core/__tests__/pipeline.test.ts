import { describe, it, expect } from "vitest";
import JSZip from "jszip";
import { convertLayoutZip, convertLibrary, loadLayoutFromZip } from "../pipeline";
import { ConfigError } from "../errors";
import { parseGdsLibrary } from "../../parse/library-parser";
import { parseLayerConfig } from "../../config/layer-config";
import { LayerTable } from "../../geometry/layer-table";
import { RecordType } from "../../parse/record-types";
import { GdsBuilder, buildLibrary } from "../../__tests__/helpers/gds-builder";

const layoutBytes = buildLibrary({
  TOP: (s) => {
    s.rect(1, 0, 0, 0, 10, 10);
    s.sref("CELL", [20, 0]);
    s.path(2, 0, 2, [
      [0, 20],
      [10, 20],
    ]);
  },
  CELL: (s) => {
    s.rect(1, 0, 0, 0, 5, 5);
  },
});

const overlapBytes = buildLibrary({
  TOP: (s) => {
    s.rect(1, 0, 0, 0, 2, 2);
    s.rect(1, 0, 1, 1, 3, 3);
  },
});

const table = LayerTable.fromRules([
  { layer: 1, datatype: 0, zBottom: 0, zTop: 1, name: "metal1" },
  { layer: 2, datatype: 0, zBottom: 1, zTop: 3, name: "metal2" },
]);

const configDoc = (conversion: Record<string, unknown> = {}) => ({
  project: "pipeline-test",
  units: "um",
  layers: [
    { gds_layer: 1, gds_datatype: 0, name: "metal1", z_bottom: 0, z_top: 1 },
    { gds_layer: 2, gds_datatype: 0, name: "metal2", z_bottom: 1, z_top: 3 },
  ],
  conversion_options: conversion,
});

describe("convertLibrary", () => {
  it("flattens, extracts and extrudes the top structure", () => {
    const result = convertLibrary(parseGdsLibrary(layoutBytes), table);

    expect(result.libraryName).toBe("TESTLIB");
    expect(result.structureName).toBe("TOP");
    expect(result.units).toEqual({ userUnitsPerDbUnit: 1e-3, metersPerDbUnit: 1e-9 });
    expect(result.layers.map((l) => l.rule.name)).toEqual(["metal1", "metal2"]);

    const [metal1, metal2] = result.layers;
    expect(metal1.polygons).toHaveLength(2);
    expect(metal1.solids).toHaveLength(2);
    expect(metal1.volume).toBeCloseTo(125, 9);
    expect(metal1.area).toBeCloseTo(125, 9);
    expect(metal2.volume).toBeCloseTo(40, 9);
    expect(metal2.solids[0].zBottom).toBe(1);
    expect(metal2.solids[0].zTop).toBe(3);

    expect(result.statistics).toMatchObject({
      totalElements: 3,
      totalPolygons: 3,
      solids: 3,
      extrusionFailures: 0,
      window: null,
      flatten: { refsResolved: 1, arefsResolved: 0, elementsCreated: 1, maxDepthReached: 1 },
    });
    expect(result.diagnostics.length).toBe(0);
  });

  it("converts a named structure", () => {
    const result = convertLibrary(parseGdsLibrary(layoutBytes), table, { structureName: "CELL" });
    expect(result.structureName).toBe("CELL");
    expect(result.layers).toHaveLength(1);
    expect(result.layers[0].volume).toBeCloseTo(25, 9);
  });

  it("throws for a structure that does not exist", () => {
    expect(() =>
      convertLibrary(parseGdsLibrary(layoutBytes), table, { structureName: "MISSING" })
    ).toThrow(/not found/);
  });

  it("leaves references unresolved without flattening", () => {
    const result = convertLibrary(parseGdsLibrary(layoutBytes), table, { flatten: false });
    expect(result.statistics.unresolved).toBe(1);
    expect(result.statistics.flatten).toBeNull();
    expect(result.layers[0].polygons).toHaveLength(1);
  });

  it("prefilters and clips to a window", () => {
    const result = convertLibrary(parseGdsLibrary(layoutBytes), table, {
      window: { bounds: [0, 0, 8, 8], clip: true },
    });
    expect(result.statistics.window).toEqual({ kept: 1, clipped: 0, discarded: 2 });
    expect(result.layers).toHaveLength(1);
    expect(result.layers[0].volume).toBeCloseTo(64, 9);
    expect(result.layers[0].bbox).toEqual({ minX: 0, minY: 0, maxX: 8, maxY: 8 });
  });

  it("keeps whole polygons when the window does not clip", () => {
    const result = convertLibrary(parseGdsLibrary(layoutBytes), table, {
      window: { bounds: [0, 0, 8, 8] },
    });
    expect(result.layers[0].volume).toBeCloseTo(100, 9);
  });

  it("unions overlapping polygons on request", () => {
    const lib = parseGdsLibrary(overlapBytes);
    const separate = convertLibrary(lib, table);
    expect(separate.layers[0].solids).toHaveLength(2);

    const merged = convertLibrary(lib, table, { mergeOverlaps: true });
    expect(merged.layers[0].polygons).toHaveLength(1);
    expect(merged.layers[0].area).toBeCloseTo(7, 9);
    expect(merged.layers[0].volume).toBeCloseTo(7, 9);
  });

  it("takes simplification from the layer config", () => {
    const lib = parseGdsLibrary(overlapBytes);
    const config = parseLayerConfig(configDoc({ merge_vias_with_metals: true }));
    expect(convertLibrary(lib, config).layers[0].solids).toHaveLength(2);

    const collinear = parseGdsLibrary(
      buildLibrary({
        TOP: (s) => {
          s.boundary(1, 0, [
            [0, 0],
            [1, 0],
            [2, 0],
            [2, 2],
            [0, 2],
            [0, 0],
          ]);
        },
      })
    );
    const plain = convertLibrary(collinear, parseLayerConfig(configDoc()));
    expect(plain.layers[0].solids[0].vertices).toHaveLength(10);
    const simplified = convertLibrary(
      collinear,
      parseLayerConfig(configDoc({ simplify_polygons: 0.01 }))
    );
    expect(simplified.layers[0].solids[0].vertices).toHaveLength(8);
  });

  it("returns polygons only when extrusion is off", () => {
    const result = convertLibrary(parseGdsLibrary(layoutBytes), table, { extrude: false });
    expect(result.layers[0].polygons).toHaveLength(2);
    expect(result.layers[0].solids).toEqual([]);
    expect(result.layers[0].volume).toBe(0);
    expect(result.statistics.solids).toBe(0);
  });

  it("records extrusion failures and carries on", () => {
    const flat = LayerTable.fromRules([
      { layer: 1, datatype: 0, zBottom: 1, zTop: 1, name: "flat" },
      { layer: 2, datatype: 0, zBottom: 1, zTop: 3, name: "metal2" },
    ]);
    const result = convertLibrary(parseGdsLibrary(layoutBytes), flat);
    expect(result.statistics.extrusionFailures).toBe(2);
    expect(result.diagnostics.count("extrusion-failed")).toBe(2);
    expect(result.layers[0].solids).toEqual([]);
    expect(result.layers[1].solids).toHaveLength(1);
  });

  it("handles a library without structures", () => {
    const empty = parseGdsLibrary(new GdsBuilder().beginLibrary().endLibrary().build());
    const result = convertLibrary(empty, table);
    expect(result.structureName).toBe("");
    expect(result.layers).toEqual([]);
  });

  it("carries parse diagnostics into the result", () => {
    const noUnits = new GdsBuilder()
      .beginLibrary("NOUNITS", null)
      .structure("TOP", (s) => {
        s.rect(1, 0, 0, 0, 1, 1);
      })
      .endLibrary()
      .build();
    const result = convertLibrary(parseGdsLibrary(noUnits), table);
    expect(result.diagnostics.count("missing-units")).toBe(1);
  });

  it("carries element decoding diagnostics from the first conversion", () => {
    const bytes = new GdsBuilder()
      .beginLibrary()
      .structure("TOP", (s) => {
        s.record(RecordType.BOUNDARY);
        s.int16(RecordType.LAYER, 1);
        s.record(0x7f00, new Uint8Array([0, 0]));
        s.xy([
          [0, 0],
          [2, 0],
          [2, 2],
          [0, 2],
          [0, 0],
        ]);
        s.record(RecordType.ENDEL);
      })
      .endLibrary()
      .build();
    const lib = parseGdsLibrary(bytes);
    const result = convertLibrary(lib, table);
    expect(result.diagnostics.count("unknown-record")).toBe(1);
    expect(result.layers[0].volume).toBeCloseTo(4, 9);

    const unflattened = convertLibrary(parseGdsLibrary(bytes), table, {
      structureName: "TOP",
      flatten: false,
    });
    expect(unflattened.diagnostics.count("unknown-record")).toBe(1);
  });
});

async function bundle(files: Record<string, Uint8Array | string>): Promise<Uint8Array> {
  const zip = new JSZip();
  for (const [name, data] of Object.entries(files)) zip.file(name, data);
  return zip.generateAsync({ type: "uint8array" });
}

describe("zip bundles", () => {
  it("loads the layout and config of a bundle", async () => {
    const data = await bundle({
      "chip/design.gds": layoutBytes,
      "chip/layers.json": JSON.stringify(configDoc()),
      "chip/README.txt": "notes",
    });
    const loaded = await loadLayoutFromZip(data);
    expect(loaded.layoutName).toBe("chip/design.gds");
    expect(loaded.configName).toBe("chip/layers.json");
    expect(loaded.library.structureCount).toBe(2);
    expect(loaded.config?.rules).toHaveLength(2);
  });

  it("converts a bundle end to end", async () => {
    const data = await bundle({
      "design.gds": layoutBytes,
      "layers.json": JSON.stringify(configDoc()),
    });
    const { result } = await convertLayoutZip(data);
    expect(result.layers.map((l) => l.volume)).toEqual([125, 40]);
  });

  it("uses the hints to choose between layouts", async () => {
    const data = await bundle({
      "a.gds": layoutBytes,
      "b.gds": overlapBytes,
    });
    const loaded = await loadLayoutFromZip(data, { hints: { layout: "b.*" } });
    expect(loaded.layoutName).toBe("b.gds");
    expect(loaded.config).toBeNull();
  });

  it("takes a layer table passed alongside the bundle", async () => {
    const data = await bundle({ "design.gds": layoutBytes });
    const { result, configName } = await convertLayoutZip(data, { layers: table });
    expect(configName).toBeNull();
    expect(result.layers).toHaveLength(2);
  });

  it("requires a layer config from somewhere", async () => {
    const data = await bundle({ "design.gds": layoutBytes });
    await expect(convertLayoutZip(data)).rejects.toThrow(ConfigError);
  });

  it("requires a layout stream", async () => {
    const data = await bundle({ "layers.json": JSON.stringify(configDoc()) });
    await expect(loadLayoutFromZip(data)).rejects.toThrow(/no layout stream/);
  });
});
