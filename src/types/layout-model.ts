// src/types/layout-model.ts

export type Endianness = "big" | "little";

export interface Vec2 {
  x: number;
  y: number;
}

export interface Vec3 {
  x: number;
  y: number;
  z: number;
}

export interface BBox2 {
  minX: number;
  minY: number;
  maxX: number;
  maxY: number;
}

export interface BBox3 extends BBox2 {
  minZ: number;
  maxZ: number;
}

export interface LibraryUnits {
  userUnitsPerDbUnit: number;
  metersPerDbUnit: number;
}

export interface GdsProperty {
  attribute: number;
  value: string;
}

/**
 * STRANS/MAG/ANGLE of a reference or text element.
 * `angle` is counter-clockwise in degrees, reflection is about the X axis
 * and happens before rotation.
 */
export interface RefTransform {
  reflected: boolean;
  absoluteMagnification: boolean;
  absoluteAngle: boolean;
  magnification: number;
  angle: number;
}

export interface TextPresentation {
  font: number;
  verticalJustification: number;
  horizontalJustification: number;
}

export type ElementKind =
  | "boundary"
  | "path"
  | "box"
  | "text"
  | "sref"
  | "aref"
  | "node";

interface ElementBase {
  layer: number;
  datatype: number;
  elflags: number;
  plex: number;
  properties: GdsProperty[];
}

export interface BoundaryElement extends ElementBase {
  kind: "boundary";
  points: Vec2[];
}

export interface PathElement extends ElementBase {
  kind: "path";
  points: Vec2[];
  width: number;
  pathType: number;
  beginExtension: number;
  endExtension: number;
}

export interface BoxElement extends ElementBase {
  kind: "box";
  boxType: number;
  points: Vec2[];
}

export interface NodeElement extends ElementBase {
  kind: "node";
  nodeType: number;
  points: Vec2[];
}

export interface TextElement extends ElementBase {
  kind: "text";
  text: string;
  textType: number;
  position: Vec2;
  presentation: TextPresentation;
  transform: RefTransform | null;
  width: number;
  pathType: number;
}

export interface SRefElement extends ElementBase {
  kind: "sref";
  structureName: string;
  position: Vec2;
  transform: RefTransform | null;
}

/**
 * Arrayed reference. `columnPoint` and `rowPoint` are the stream's lattice
 * end points: origin + columns * colStep and origin + rows * rowStep.
 */
export interface ARefElement extends ElementBase {
  kind: "aref";
  structureName: string;
  columns: number;
  rows: number;
  origin: Vec2;
  columnPoint: Vec2;
  rowPoint: Vec2;
  transform: RefTransform | null;
}

export type GdsElement =
  | BoundaryElement
  | PathElement
  | BoxElement
  | NodeElement
  | TextElement
  | SRefElement
  | ARefElement;

export type ReferenceElement = SRefElement | ARefElement;

/** Element kinds that carry drawable geometry once references are resolved. */
export type ShapeElement = Exclude<GdsElement, ReferenceElement>;

export function isReference(el: GdsElement): el is ReferenceElement {
  return el.kind === "sref" || el.kind === "aref";
}

export interface GdsStructure {
  index: number;
  name: string;
  /** Byte offset of the structure's BGNSTR record. */
  offset: number;
}

/**
 * Extruded prism. Vertices 0..N-1 form the bottom ring at zBottom,
 * N..2N-1 the same X/Y ring at zTop. Faces are 0-based vertex indices:
 * bottom ring, top ring, then N side quads.
 */
export interface Solid3D {
  vertices: Vec3[];
  faces: number[][];
  bottomFace: number[];
  topFace: number[];
  sideFaces: number[][];
  bbox: BBox3;
  volume: number;
  baseArea: number;
  zBottom: number;
  zTop: number;
  height: number;
}
