import { describe, it, expect } from "vitest";
import { extractLayers } from "../layer-extractor";
import { LayerTable } from "../layer-table";
import { boundaryEl, pathEl, pts, square, srefEl } from "../../__tests__/helpers/elements";

const table = LayerTable.fromRules([
  { layer: 1, datatype: 0, zBottom: 0, zTop: 1, name: "metal1" },
  { layer: 2, datatype: 0, zBottom: 1, zTop: 2, name: "via", enabled: false },
  { layer: 3, datatype: 0, zBottom: 2, zTop: 3, name: "metal2" },
]);

const elements = [
  boundaryEl(1, 0, square(0, 0, 2)),
  pathEl(1, 0, 2, pts([
    [0, 0],
    [10, 0],
  ])),
  boundaryEl(2, 0, square(0, 0, 1)),
  boundaryEl(9, 0, square(0, 0, 1)),
  srefEl("CELL", [0, 0]),
  boundaryEl(3, 0, pts([
    [0, 0],
    [1, 0],
    [0, 0],
  ])),
];

describe("extractLayers", () => {
  it("groups polygons by rule and counts what was skipped", () => {
    const { layers, statistics, diagnostics } = extractLayers(elements, table);

    expect(layers).toHaveLength(1);
    expect(layers[0].rule.name).toBe("metal1");
    expect(layers[0].ruleIndex).toBe(1);
    expect(layers[0].polygons).toHaveLength(2);
    expect(layers[0].area).toBeCloseTo(24, 9);
    expect(layers[0].bbox).toEqual({ minX: 0, minY: -1, maxX: 10, maxY: 2 });

    expect(statistics).toEqual({
      totalElements: 6,
      totalPolygons: 2,
      unresolved: 1,
      filtered: 0,
      unmapped: 1,
      disabled: 1,
      degenerate: 1,
      outsideWindow: 0,
      clippedAway: 0,
    });
    expect(diagnostics.count("degenerate-polygon")).toBe(1);
  });

  it("includes disabled rules when asked, in rule order", () => {
    const { layers } = extractLayers([...elements].reverse(), table, { enabledOnly: false });
    expect(layers.map((l) => l.rule.name)).toEqual(["metal1", "via"]);
  });

  it("applies layer and datatype filters", () => {
    const { statistics } = extractLayers(elements, table, { layersFilter: [1] });
    expect(statistics.filtered).toBe(3);
    expect(statistics.totalPolygons).toBe(2);

    const byDatatype = extractLayers(elements, table, { datatypesFilter: [7] });
    expect(byDatatype.statistics.filtered).toBe(5);
    expect(byDatatype.layers).toEqual([]);
  });

  it("skips paths when path conversion is off", () => {
    const { layers } = extractLayers(elements, table, { convertPaths: false });
    expect(layers[0].polygons).toHaveLength(1);
  });

  it("clips to a window", () => {
    const { layers, statistics } = extractLayers(
      [
        boundaryEl(1, 0, square(0, 0, 2)),
        pathEl(1, 0, 2, pts([
          [0, 0],
          [10, 0],
        ])),
        boundaryEl(1, 0, square(100, 100, 1)),
      ],
      table,
      { clipWindow: [0, 0, 5, 5] }
    );
    expect(statistics.outsideWindow).toBe(1);
    expect(statistics.totalPolygons).toBe(2);
    expect(layers[0].area).toBeCloseTo(9, 9);
    expect(layers[0].bbox).toEqual({ minX: 0, minY: 0, maxX: 5, maxY: 2 });
  });
});
