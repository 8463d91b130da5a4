// src/parse/library-parser.ts

import type {
  Endianness,
  GdsElement,
  GdsProperty,
  GdsStructure,
  LibraryUnits,
  RefTransform,
  Vec2,
  ElementKind,
} from "../types/layout-model";
import type { ParseOptions } from "../types/options";
import { GrammarError, StreamError } from "../core/errors";
import { DiagnosticList } from "../core/diagnostics";
import { createLogger } from "../core/logger";
import {
  DEFAULT_METERS_PER_DB_UNIT,
  DEFAULT_USER_UNITS_PER_DB_UNIT,
} from "../geometry/constants";
import { ByteCursor } from "./byte-cursor";
import {
  readRecord,
  decodeAscii,
  decodeBitArray,
  decodeFloat64,
  decodeFloat64List,
  decodeInt16,
  decodeInt16List,
  decodeInt32,
  decodePoints,
  type GdsRecord,
} from "./record-decoder";
import {
  RecordType,
  ELEMENT_BEGIN,
  STRANS_ABS_ANGLE,
  STRANS_ABS_MAG,
  STRANS_REFLECTION,
  isKnownRecordType,
  recordTypeName,
} from "./record-types";

const log = createLogger("library-parser");

const UNITS_PAYLOAD_SIZE = 16;
const DEFAULT_UNITS: LibraryUnits = {
  userUnitsPerDbUnit: DEFAULT_USER_UNITS_PER_DB_UNIT,
  metersPerDbUnit: DEFAULT_METERS_PER_DB_UNIT,
};

const LEADING_SEQUENCE: readonly number[] = [
  RecordType.HEADER,
  RecordType.BGNLIB,
  RecordType.LIBNAME,
];

interface LibraryInit {
  name: string;
  version: number;
  units: LibraryUnits;
  structures: GdsStructure[];
  cursor: ByteCursor;
  diagnostics: DiagnosticList;
}

/**
 * A decoded library. Pass 1 (done by parseGdsLibrary) only indexes
 * structures by name and offset; their elements are decoded on first
 * access through `elements()` and cached.
 */
export class GdsLibrary {
  readonly name: string;
  readonly version: number;
  readonly units: LibraryUnits;
  readonly structures: readonly GdsStructure[];
  readonly diagnostics: DiagnosticList;

  private readonly cursor: ByteCursor;
  private readonly byName = new Map<string, GdsStructure>();
  private readonly parsed = new Map<number, GdsElement[]>();

  constructor(init: LibraryInit) {
    this.name = init.name;
    this.version = init.version;
    this.units = init.units;
    this.structures = init.structures;
    this.cursor = init.cursor;
    this.diagnostics = init.diagnostics;
    for (const s of init.structures) this.byName.set(s.name, s);
  }

  get endianness(): Endianness {
    return this.cursor.endianness;
  }

  get structureCount(): number {
    return this.structures.length;
  }

  /** Look a structure up by index or name. */
  structure(ref: number | string): GdsStructure | undefined {
    if (typeof ref === "number") return this.structures[ref];
    return this.byName.get(ref);
  }

  hasStructure(name: string): boolean {
    return this.byName.has(name);
  }

  isParsed(ref: number | string): boolean {
    const s = this.structure(ref);
    return s !== undefined && this.parsed.has(s.index);
  }

  parsedStructureCount(): number {
    return this.parsed.size;
  }

  /**
   * Elements of a structure, decoding them on first call. Later calls
   * return the same array.
   */
  elements(ref: number | string): readonly GdsElement[] {
    const s = this.structure(ref);
    if (!s) {
      throw new Error(`Structure ${JSON.stringify(ref)} not found in library ${this.name}`);
    }

    const cached = this.parsed.get(s.index);
    if (cached) return cached;

    const elements = parseStructureElements(this.cursor, s, this.diagnostics);
    this.parsed.set(s.index, elements);
    log.debug(`parsed ${s.name}: ${elements.length} elements`);
    return elements;
  }
}

// -----------------------------------------------------------------------------
// Pass 1: library header and structure index
// -----------------------------------------------------------------------------

/**
 * Decode the library header and index its structures.
 *
 * Throws StreamError or GrammarError when the stream is unusable; no
 * partial library is returned in that case.
 */
export function parseGdsLibrary(
  bytes: Uint8Array,
  options: ParseOptions = {}
): GdsLibrary {
  const cursor = new ByteCursor(bytes, {
    endianness: options.endianness,
    strictEndianness: options.strictEndianness,
  });
  const diagnostics = new DiagnosticList();

  const header = expectLeading(cursor, 0);
  expectLeading(cursor, 1);
  const libName = expectLeading(cursor, 2);

  const version = decodeInt16(header);
  const name = decodeAscii(libName);

  let units: LibraryUnits | null = null;
  const structures: GdsStructure[] = [];
  const seen = new Set<string>();
  let ended = false;

  while (cursor.remaining > 0) {
    const rec = readRecord(cursor);

    if (rec.type === RecordType.UNITS) {
      units = decodeUnits(rec);
      continue;
    }

    if (rec.type === RecordType.BGNSTR) {
      const nameRec = readRecord(cursor);
      if (nameRec.type !== RecordType.STRNAME) {
        throw new GrammarError(
          "MissingRequiredRecord",
          `BGNSTR must be followed by STRNAME, got ${recordTypeName(nameRec.type)}`,
          nameRec.offset
        );
      }

      const structName = decodeAscii(nameRec);
      if (seen.has(structName)) {
        throw new GrammarError(
          "DuplicateStructureName",
          `Structure name "${structName}" appears twice`,
          rec.offset
        );
      }
      seen.add(structName);

      structures.push({
        index: structures.length,
        name: structName,
        offset: rec.offset,
      });
      skipStructureBody(cursor);
      continue;
    }

    if (rec.type === RecordType.ENDLIB) {
      ended = true;
      break;
    }

    if (!isKnownRecordType(rec.type)) {
      diagnostics.warn(
        "unknown-record",
        `Skipped ${recordTypeName(rec.type)} (${rec.payloadLength} bytes) at library level`,
        rec.offset
      );
    }
    // Other library level records (REFLIBS, FONTS, ATTRTABLE, ...) carry
    // nothing the model keeps.
  }

  if (!ended) {
    throw new StreamError(
      "TruncatedStream",
      "Stream ended before ENDLIB",
      cursor.position
    );
  }

  if (!units) {
    diagnostics.warn(
      "missing-units",
      "Library has no UNITS record, assuming 1e-3 user units and 1e-9 m per database unit"
    );
    units = { ...DEFAULT_UNITS };
  }

  const library = new GdsLibrary({
    name,
    version,
    units,
    structures,
    cursor,
    diagnostics,
  });

  log.debug(
    `indexed library ${name}: ${structures.length} structures, ${cursor.endianness}-endian`
  );

  if (options.eager) {
    for (const s of structures) library.elements(s.index);
  }

  return library;
}

function expectLeading(cursor: ByteCursor, slot: number): GdsRecord {
  const expected = LEADING_SEQUENCE[slot];

  if (cursor.remaining === 0) {
    throw new GrammarError(
      "MissingRequiredRecord",
      `Missing ${recordTypeName(expected)} record`,
      cursor.position
    );
  }

  const rec = readRecord(cursor);
  if (rec.type === expected) return rec;

  if (LEADING_SEQUENCE.includes(rec.type)) {
    throw new GrammarError(
      "RecordOutOfOrder",
      `Expected ${recordTypeName(expected)}, found ${recordTypeName(rec.type)}`,
      rec.offset
    );
  }

  throw new GrammarError(
    "MissingRequiredRecord",
    `Missing ${recordTypeName(expected)} record, found ${recordTypeName(rec.type)}`,
    rec.offset
  );
}

function decodeUnits(rec: GdsRecord): LibraryUnits {
  if (rec.payloadLength !== UNITS_PAYLOAD_SIZE) {
    throw new GrammarError(
      "MalformedFixedPayload",
      `UNITS payload must be 16 bytes, got ${rec.payloadLength}`,
      rec.offset
    );
  }
  const [userUnitsPerDbUnit, metersPerDbUnit] = decodeFloat64List(rec);
  return { userUnitsPerDbUnit, metersPerDbUnit };
}

function skipStructureBody(cursor: ByteCursor): void {
  while (cursor.remaining > 0) {
    const rec = readRecord(cursor);
    if (rec.type === RecordType.ENDSTR) return;
  }
  throw new StreamError(
    "TruncatedStream",
    "Stream ended inside a structure",
    cursor.position
  );
}

// -----------------------------------------------------------------------------
// Pass 2: elements of one structure
// -----------------------------------------------------------------------------

/**
 * Decode the elements between a structure's BGNSTR and ENDSTR.
 * Unknown records are skipped by their declared length and reported.
 */
export function parseStructureElements(
  cursor: ByteCursor,
  structure: GdsStructure,
  diagnostics: DiagnosticList
): GdsElement[] {
  cursor.seek(structure.offset);
  readRecord(cursor); // BGNSTR
  readRecord(cursor); // STRNAME

  const elements: GdsElement[] = [];

  for (;;) {
    const rec = readRecord(cursor);
    if (rec.type === RecordType.ENDSTR) break;

    const kind = ELEMENT_BEGIN.get(rec.type);
    if (kind) {
      elements.push(readElement(cursor, kind, rec.offset, diagnostics));
      continue;
    }

    if (rec.type === RecordType.STRCLASS) continue;

    diagnostics.warn(
      isKnownRecordType(rec.type) ? "misplaced-record" : "unknown-record",
      `Skipped ${recordTypeName(rec.type)} in structure ${structure.name}`,
      rec.offset
    );
  }

  return elements;
}

interface ElementDraft {
  kind: ElementKind;
  offset: number;
  layer: number;
  datatype: number;
  elflags: number;
  plex: number;
  points: Vec2[];
  width: number;
  pathType: number;
  beginExtension: number;
  endExtension: number;
  structureName: string;
  columns: number;
  rows: number;
  textType: number;
  text: string;
  presentation: number;
  boxType: number;
  nodeType: number;
  transform: RefTransform | null;
  properties: GdsProperty[];
  pendingAttribute: number | null;
}

function newDraft(kind: ElementKind, offset: number): ElementDraft {
  return {
    kind,
    offset,
    layer: 0,
    datatype: 0,
    elflags: 0,
    plex: 0,
    points: [],
    width: 0,
    pathType: 0,
    beginExtension: 0,
    endExtension: 0,
    structureName: "",
    columns: 1,
    rows: 1,
    textType: 0,
    text: "",
    presentation: 0,
    boxType: 0,
    nodeType: 0,
    transform: null,
    properties: [],
    pendingAttribute: null,
  };
}

function transformOf(draft: ElementDraft): RefTransform {
  if (!draft.transform) {
    draft.transform = {
      reflected: false,
      absoluteMagnification: false,
      absoluteAngle: false,
      magnification: 1,
      angle: 0,
    };
  }
  return draft.transform;
}

function readElement(
  cursor: ByteCursor,
  kind: ElementKind,
  offset: number,
  diagnostics: DiagnosticList
): GdsElement {
  const draft = newDraft(kind, offset);

  for (;;) {
    const rec = readRecord(cursor);
    if (rec.type === RecordType.ENDEL) break;
    if (rec.type === RecordType.ENDSTR || ELEMENT_BEGIN.has(rec.type)) {
      // Unterminated element: hand the record back to the structure loop.
      diagnostics.warn(
        "malformed-element",
        `${kind} element has no ENDEL before ${recordTypeName(rec.type)}`,
        offset
      );
      cursor.seek(rec.offset);
      break;
    }
    applySubRecord(draft, rec, diagnostics);
  }

  return finishElement(draft, diagnostics);
}

function applySubRecord(
  draft: ElementDraft,
  rec: GdsRecord,
  diagnostics: DiagnosticList
): void {
  switch (rec.type) {
    case RecordType.LAYER:
      draft.layer = decodeInt16(rec);
      return;
    case RecordType.DATATYPE:
      draft.datatype = decodeInt16(rec);
      return;
    case RecordType.ELFLAGS:
      draft.elflags = decodeBitArray(rec);
      return;
    case RecordType.PLEX:
      draft.plex = decodeInt32(rec);
      return;
    case RecordType.XY:
      if (rec.payloadLength % 8 !== 0) {
        diagnostics.warn(
          "xy-remainder",
          `XY payload of ${rec.payloadLength} bytes is not a whole number of vertices`,
          rec.offset
        );
      }
      draft.points = decodePoints(rec);
      return;
    case RecordType.WIDTH:
      draft.width = decodeInt32(rec);
      return;
    case RecordType.PATHTYPE:
      draft.pathType = decodeInt16(rec);
      return;
    case RecordType.BGNEXTN:
      draft.beginExtension = decodeInt32(rec);
      return;
    case RecordType.ENDEXTN:
      draft.endExtension = decodeInt32(rec);
      return;
    case RecordType.SNAME:
      draft.structureName = decodeAscii(rec);
      return;
    case RecordType.COLROW: {
      const [columns = 1, rows = 1] = decodeInt16List(rec);
      draft.columns = columns;
      draft.rows = rows;
      return;
    }
    case RecordType.STRANS: {
      const bits = decodeBitArray(rec);
      const t = transformOf(draft);
      t.reflected = (bits & STRANS_REFLECTION) !== 0;
      t.absoluteMagnification = (bits & STRANS_ABS_MAG) !== 0;
      t.absoluteAngle = (bits & STRANS_ABS_ANGLE) !== 0;
      return;
    }
    case RecordType.MAG:
      transformOf(draft).magnification = decodeFloat64(rec, 1);
      return;
    case RecordType.ANGLE:
      transformOf(draft).angle = decodeFloat64(rec, 0);
      return;
    case RecordType.TEXTTYPE:
      draft.textType = decodeInt16(rec);
      return;
    case RecordType.PRESENTATION:
      draft.presentation = decodeBitArray(rec);
      return;
    case RecordType.STRING:
      draft.text = decodeAscii(rec);
      return;
    case RecordType.BOXTYPE:
      draft.boxType = decodeInt16(rec);
      return;
    case RecordType.NODETYPE:
      draft.nodeType = decodeInt16(rec);
      return;
    case RecordType.PROPATTR:
      draft.pendingAttribute = decodeInt16(rec);
      return;
    case RecordType.PROPVALUE:
      draft.properties.push({
        attribute: draft.pendingAttribute ?? 0,
        value: decodeAscii(rec),
      });
      draft.pendingAttribute = null;
      return;
    default:
      diagnostics.warn(
        isKnownRecordType(rec.type) ? "misplaced-record" : "unknown-record",
        `Skipped ${recordTypeName(rec.type)} inside a ${draft.kind} element`,
        rec.offset
      );
  }
}

function finishElement(
  draft: ElementDraft,
  diagnostics: DiagnosticList
): GdsElement {
  const base = {
    layer: draft.layer,
    datatype: draft.datatype,
    elflags: draft.elflags,
    plex: draft.plex,
    properties: draft.properties,
  };
  const first = draft.points[0] ?? { x: 0, y: 0 };

  switch (draft.kind) {
    case "boundary":
      return { kind: "boundary", ...base, points: draft.points };

    case "path":
      return {
        kind: "path",
        ...base,
        points: draft.points,
        width: draft.width,
        pathType: draft.pathType,
        beginExtension: draft.beginExtension,
        endExtension: draft.endExtension,
      };

    case "box":
      return { kind: "box", ...base, boxType: draft.boxType, points: draft.points };

    case "node":
      return { kind: "node", ...base, nodeType: draft.nodeType, points: draft.points };

    case "text":
      return {
        kind: "text",
        ...base,
        // texts are keyed by layer/texttype
        datatype: draft.textType,
        text: draft.text,
        textType: draft.textType,
        position: first,
        presentation: {
          font: (draft.presentation >> 4) & 0x3,
          verticalJustification: (draft.presentation >> 2) & 0x3,
          horizontalJustification: draft.presentation & 0x3,
        },
        transform: draft.transform,
        width: draft.width,
        pathType: draft.pathType,
      };

    case "sref":
      return {
        kind: "sref",
        ...base,
        structureName: draft.structureName,
        position: first,
        transform: draft.transform,
      };

    case "aref": {
      if (draft.points.length < 3) {
        diagnostics.warn(
          "malformed-element",
          `AREF to ${draft.structureName} has ${draft.points.length} lattice points, expected 3`,
          draft.offset
        );
      }
      return {
        kind: "aref",
        ...base,
        structureName: draft.structureName,
        columns: draft.columns,
        rows: draft.rows,
        origin: first,
        columnPoint: draft.points[1] ?? first,
        rowPoint: draft.points[2] ?? first,
        transform: draft.transform,
      };
    }
  }
}

/**
 * Structures that no reference in the library points at, in stream
 * order. Parses every structure.
 */
export function findTopStructures(library: GdsLibrary): GdsStructure[] {
  const referenced = new Set<string>();
  for (const s of library.structures) {
    for (const el of library.elements(s.index)) {
      if (el.kind === "sref" || el.kind === "aref") {
        referenced.add(el.structureName);
      }
    }
  }
  return library.structures.filter((s) => !referenced.has(s.name));
}
