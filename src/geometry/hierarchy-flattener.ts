// src/geometry/hierarchy-flattener.ts

import type {
  ARefElement,
  GdsElement,
  RefTransform,
  ReferenceElement,
  ShapeElement,
  Vec2,
} from "../types/layout-model";
import type { FlattenOptions } from "../types/options";
import type { GdsLibrary } from "../parse/library-parser";
import { DiagnosticList } from "../core/diagnostics";
import { createLogger } from "../core/logger";
import { arefSteps } from "./bounds";
import { DEFAULT_MAX_DEPTH } from "./constants";

const log = createLogger("hierarchy-flattener");

/**
 * 2D affine map: x' = a*x + c*y + tx, y' = b*x + d*y + ty.
 */
export interface Affine {
  a: number;
  b: number;
  c: number;
  d: number;
  tx: number;
  ty: number;
}

export const IDENTITY: Affine = { a: 1, b: 0, c: 0, d: 1, tx: 0, ty: 0 };

export interface FlattenStats {
  refsResolved: number;
  arefsResolved: number;
  elementsCreated: number;
  maxDepthReached: number;
}

export interface FlattenResult {
  elements: ShapeElement[];
  stats: FlattenStats;
  diagnostics: DiagnosticList;
}

// Exact values keep 90 degree rotations on the integer grid.
function cosSin(angleDeg: number): [number, number] {
  const turned = ((angleDeg % 360) + 360) % 360;
  switch (turned) {
    case 0:
      return [1, 0];
    case 90:
      return [0, 1];
    case 180:
      return [-1, 0];
    case 270:
      return [0, -1];
    default: {
      const rad = (angleDeg * Math.PI) / 180;
      return [Math.cos(rad), Math.sin(rad)];
    }
  }
}

/**
 * Placement of one instance: reflect about X, magnify, rotate
 * counter-clockwise, then translate to `origin`.
 */
export function placementTransform(
  transform: RefTransform | null,
  origin: Vec2
): Affine {
  const mag = transform?.magnification ?? 1;
  const reflect = transform?.reflected ? -1 : 1;
  const [cos, sin] = cosSin(transform?.angle ?? 0);

  return {
    a: mag * cos,
    b: mag * sin,
    c: -mag * reflect * sin,
    d: mag * reflect * cos,
    tx: origin.x,
    ty: origin.y,
  };
}

/** outer(inner(p)) */
export function composeAffine(outer: Affine, inner: Affine): Affine {
  return {
    a: outer.a * inner.a + outer.c * inner.b,
    b: outer.b * inner.a + outer.d * inner.b,
    c: outer.a * inner.c + outer.c * inner.d,
    d: outer.b * inner.c + outer.d * inner.d,
    tx: outer.a * inner.tx + outer.c * inner.ty + outer.tx,
    ty: outer.b * inner.tx + outer.d * inner.ty + outer.ty,
  };
}

export function applyAffine(m: Affine, p: Vec2): Vec2 {
  return {
    x: m.a * p.x + m.c * p.y + m.tx,
    y: m.b * p.x + m.d * p.y + m.ty,
  };
}

/** Length scale of the map, used for path widths. */
function linearScale(m: Affine): number {
  return Math.sqrt(Math.abs(m.a * m.d - m.b * m.c));
}

function isIdentity(m: Affine): boolean {
  return (
    m.a === 1 && m.b === 0 && m.c === 0 && m.d === 1 && m.tx === 0 && m.ty === 0
  );
}

/**
 * Map a drawable element into the parent's coordinates. Boxes turn into
 * boundaries since a rotated box is no longer axis aligned.
 */
export function transformElement(el: ShapeElement, m: Affine): ShapeElement {
  if (isIdentity(m)) return el;

  const map = (pts: readonly Vec2[]) => pts.map((p) => applyAffine(m, p));
  const scale = linearScale(m);

  switch (el.kind) {
    case "boundary":
      return { ...el, points: map(el.points) };
    case "box":
      return {
        kind: "boundary",
        layer: el.layer,
        datatype: el.datatype,
        elflags: el.elflags,
        plex: el.plex,
        properties: el.properties,
        points: map(el.points),
      };
    case "path":
      return {
        ...el,
        points: map(el.points),
        width: el.width * scale,
        beginExtension: el.beginExtension * scale,
        endExtension: el.endExtension * scale,
      };
    case "node":
      return { ...el, points: map(el.points) };
    case "text":
      return { ...el, position: applyAffine(m, el.position) };
  }
}

/** Every placement of a reference, in the referencing structure's frame. */
export function instancePlacements(ref: ReferenceElement): Affine[] {
  if (ref.kind === "sref") {
    return [placementTransform(ref.transform, ref.position)];
  }
  return arefOrigins(ref).map((o) => placementTransform(ref.transform, o));
}

function arefOrigins(ref: ARefElement): Vec2[] {
  const { column, row } = arefSteps(ref);
  const origins: Vec2[] = [];
  for (let r = 0; r < Math.max(ref.rows, 1); r++) {
    for (let c = 0; c < Math.max(ref.columns, 1); c++) {
      origins.push({
        x: ref.origin.x + c * column.x + r * row.x,
        y: ref.origin.y + c * column.y + r * row.y,
      });
    }
  }
  return origins;
}

/**
 * Resolve every reference below a structure and return its drawable
 * elements in that structure's coordinates.
 *
 * Missing targets, reference cycles and nesting beyond `maxDepth` are
 * reported and skipped.
 */
export function flattenStructure(
  library: GdsLibrary,
  ref: number | string,
  options: FlattenOptions = {}
): FlattenResult {
  const maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH;
  const diagnostics = new DiagnosticList();
  const stats: FlattenStats = {
    refsResolved: 0,
    arefsResolved: 0,
    elementsCreated: 0,
    maxDepthReached: 0,
  };
  const elements: ShapeElement[] = [];
  const warnedAbsolute = new Set<string>();

  const root = library.structure(ref);
  if (!root) {
    diagnostics.warn("missing-structure", `Structure ${JSON.stringify(ref)} not found`);
    return { elements, stats, diagnostics };
  }

  const visit = (
    name: string,
    source: readonly GdsElement[],
    m: Affine,
    depth: number,
    stack: string[]
  ) => {
    stats.maxDepthReached = Math.max(stats.maxDepthReached, depth);

    for (const el of source) {
      if (el.kind !== "sref" && el.kind !== "aref") {
        elements.push(transformElement(el, m));
        if (depth > 0) stats.elementsCreated++;
        continue;
      }

      const target = library.structure(el.structureName);
      if (!target) {
        diagnostics.warn(
          "missing-structure",
          `${name} references missing structure ${el.structureName}`
        );
        continue;
      }
      if (stack.includes(target.name)) {
        diagnostics.warn(
          "reference-cycle",
          `Reference cycle ${[...stack, target.name].join(" -> ")}`
        );
        continue;
      }
      if (depth + 1 > maxDepth) {
        diagnostics.warn(
          "max-depth",
          `${name} -> ${target.name} exceeds the nesting limit of ${maxDepth}`
        );
        continue;
      }

      const t = el.transform;
      if (t && (t.absoluteMagnification || t.absoluteAngle) && !warnedAbsolute.has(name)) {
        warnedAbsolute.add(name);
        diagnostics.info(
          "absolute-transform",
          `${name}: absolute magnification or angle applied as relative`
        );
      }

      const children = library.elements(target.index);
      const placements = instancePlacements(el);
      for (const placement of placements) {
        visit(
          target.name,
          children,
          composeAffine(m, placement),
          depth + 1,
          [...stack, target.name]
        );
      }

      if (el.kind === "sref") stats.refsResolved++;
      else stats.arefsResolved++;
    }
  };

  visit(root.name, library.elements(root.index), IDENTITY, 0, [root.name]);

  log.debug(
    `flattened ${root.name}: ${elements.length} elements, ` +
      `${stats.refsResolved} srefs, ${stats.arefsResolved} arefs, depth ${stats.maxDepthReached}`
  );

  return { elements, stats, diagnostics };
}
