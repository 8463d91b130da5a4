// src/parse/record-types.ts

import type { ElementKind } from "../types/layout-model";

/**
 * Record type codes. The high byte is the record type, the low byte the
 * payload data type (0 none, 1 bit array, 2 int16, 3 int32, 5 float64, 6 ASCII).
 */
export const RecordType = {
  HEADER: 0x0002,
  BGNLIB: 0x0102,
  LIBNAME: 0x0206,
  UNITS: 0x0305,
  ENDLIB: 0x0400,
  BGNSTR: 0x0502,
  STRNAME: 0x0606,
  ENDSTR: 0x0700,
  BOUNDARY: 0x0800,
  PATH: 0x0900,
  SREF: 0x0a00,
  AREF: 0x0b00,
  TEXT: 0x0c00,
  LAYER: 0x0d02,
  DATATYPE: 0x0e02,
  WIDTH: 0x0f03,
  XY: 0x1003,
  ENDEL: 0x1100,
  SNAME: 0x1206,
  COLROW: 0x1302,
  TEXTNODE: 0x1400,
  NODE: 0x1500,
  TEXTTYPE: 0x1602,
  PRESENTATION: 0x1701,
  SPACING: 0x1802,
  STRING: 0x1906,
  STRANS: 0x1a01,
  MAG: 0x1b05,
  ANGLE: 0x1c05,
  UINTEGER: 0x1d02,
  USTRING: 0x1e06,
  REFLIBS: 0x1f06,
  FONTS: 0x2006,
  PATHTYPE: 0x2102,
  GENERATIONS: 0x2202,
  ATTRTABLE: 0x2306,
  STYPTABLE: 0x2406,
  STRTYPE: 0x2502,
  ELFLAGS: 0x2601,
  ELKEY: 0x2703,
  LINKTYPE: 0x2802,
  LINKKEYS: 0x2903,
  NODETYPE: 0x2a02,
  PROPATTR: 0x2b02,
  PROPVALUE: 0x2c06,
  BOX: 0x2d00,
  BOXTYPE: 0x2e02,
  PLEX: 0x2f03,
  BGNEXTN: 0x3003,
  ENDEXTN: 0x3103,
  TAPENUM: 0x3202,
  TAPECODE: 0x3302,
  STRCLASS: 0x3402,
  RESERVED: 0x3503,
  FORMAT: 0x3602,
  MASK: 0x3706,
  ENDMASKS: 0x3800,
  LIBDIRSIZE: 0x3902,
  SRFNAME: 0x3a06,
  LIBSECUR: 0x3b02,
} as const;

export type RecordTypeName = keyof typeof RecordType;

/** Largest type code in the closed set; anything above is not a record. */
export const MAX_KNOWN_RECORD_TYPE = RecordType.LIBSECUR;

const NAME_BY_CODE = new Map<number, string>();
for (const [name, code] of Object.entries(RecordType)) {
  NAME_BY_CODE.set(code, name);
}

export function isKnownRecordType(code: number): boolean {
  return NAME_BY_CODE.has(code);
}

export function recordTypeName(code: number): string {
  return (
    NAME_BY_CODE.get(code) ??
    `UNKNOWN_0x${code.toString(16).padStart(4, "0").toUpperCase()}`
  );
}

/** Record types that open an element, mapped to the element kind they start. */
export const ELEMENT_BEGIN = new Map<number, ElementKind>([
  [RecordType.BOUNDARY, "boundary"],
  [RecordType.PATH, "path"],
  [RecordType.SREF, "sref"],
  [RecordType.AREF, "aref"],
  [RecordType.TEXT, "text"],
  [RecordType.NODE, "node"],
  [RecordType.BOX, "box"],
]);

/** STRANS bit flags, counted from the most significant bit of the word. */
export const STRANS_REFLECTION = 0x8000;
export const STRANS_ABS_MAG = 0x0004;
export const STRANS_ABS_ANGLE = 0x0002;
