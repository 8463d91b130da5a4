// Test-only writer for small layout streams.

import { RecordType } from "../../parse/record-types";

export type ByteOrder = "big" | "little";
export type Pt = [number, number];

export interface StransSpec {
  reflected?: boolean;
  absoluteMagnification?: boolean;
  absoluteAngle?: boolean;
  magnification?: number;
  angle?: number;
}

const DATE_WORDS = 12;

export class GdsBuilder {
  private readonly chunks: Uint8Array[] = [];
  private readonly little: boolean;

  constructor(order: ByteOrder = "big") {
    this.little = order === "little";
  }

  /** Record with a raw payload; the length field covers header + payload. */
  record(type: number, payload: Uint8Array = new Uint8Array(0)): this {
    const out = new Uint8Array(4 + payload.byteLength);
    const view = new DataView(out.buffer);
    view.setUint16(0, out.byteLength, this.little);
    view.setUint16(2, type, this.little);
    out.set(payload, 4);
    this.chunks.push(out);
    return this;
  }

  /** Bytes appended as they are, for malformed streams. */
  raw(bytes: number[]): this {
    this.chunks.push(Uint8Array.from(bytes));
    return this;
  }

  int16(type: number, ...values: number[]): this {
    const payload = new Uint8Array(values.length * 2);
    const view = new DataView(payload.buffer);
    values.forEach((v, i) => view.setInt16(i * 2, v, this.little));
    return this.record(type, payload);
  }

  uint16(type: number, value: number): this {
    const payload = new Uint8Array(2);
    new DataView(payload.buffer).setUint16(0, value, this.little);
    return this.record(type, payload);
  }

  int32(type: number, ...values: number[]): this {
    const payload = new Uint8Array(values.length * 4);
    const view = new DataView(payload.buffer);
    values.forEach((v, i) => view.setInt32(i * 4, v, this.little));
    return this.record(type, payload);
  }

  float64(type: number, ...values: number[]): this {
    const payload = new Uint8Array(values.length * 8);
    const view = new DataView(payload.buffer);
    values.forEach((v, i) => view.setFloat64(i * 8, v, this.little));
    return this.record(type, payload);
  }

  /** NUL padded to an even length. */
  ascii(type: number, text: string): this {
    const length = text.length + (text.length % 2);
    const payload = new Uint8Array(length);
    for (let i = 0; i < text.length; i++) payload[i] = text.charCodeAt(i);
    return this.record(type, payload);
  }

  xy(points: Pt[]): this {
    return this.int32(RecordType.XY, ...points.flat());
  }

  // --- library framing ----------------------------------------------------

  beginLibrary(
    name = "TESTLIB",
    units: [number, number] | null = [1e-3, 1e-9]
  ): this {
    this.int16(RecordType.HEADER, 600);
    this.int16(RecordType.BGNLIB, ...new Array<number>(DATE_WORDS).fill(0));
    this.ascii(RecordType.LIBNAME, name);
    if (units) this.float64(RecordType.UNITS, ...units);
    return this;
  }

  endLibrary(): this {
    return this.record(RecordType.ENDLIB);
  }

  beginStructure(name: string): this {
    this.int16(RecordType.BGNSTR, ...new Array<number>(DATE_WORDS).fill(0));
    return this.ascii(RecordType.STRNAME, name);
  }

  endStructure(): this {
    return this.record(RecordType.ENDSTR);
  }

  structure(name: string, body: (b: this) => void): this {
    this.beginStructure(name);
    body(this);
    return this.endStructure();
  }

  // --- elements -------------------------------------------------------------

  boundary(layer: number, datatype: number, points: Pt[]): this {
    this.record(RecordType.BOUNDARY);
    this.int16(RecordType.LAYER, layer);
    this.int16(RecordType.DATATYPE, datatype);
    this.xy(points);
    return this.record(RecordType.ENDEL);
  }

  /** Axis aligned rectangle as a closed 5 point boundary. */
  rect(layer: number, datatype: number, x0: number, y0: number, x1: number, y1: number): this {
    return this.boundary(layer, datatype, [
      [x0, y0],
      [x1, y0],
      [x1, y1],
      [x0, y1],
      [x0, y0],
    ]);
  }

  path(
    layer: number,
    datatype: number,
    width: number,
    points: Pt[],
    pathType?: number
  ): this {
    this.record(RecordType.PATH);
    this.int16(RecordType.LAYER, layer);
    this.int16(RecordType.DATATYPE, datatype);
    if (pathType !== undefined) this.int16(RecordType.PATHTYPE, pathType);
    this.int32(RecordType.WIDTH, width);
    this.xy(points);
    return this.record(RecordType.ENDEL);
  }

  box(layer: number, boxType: number, points: Pt[]): this {
    this.record(RecordType.BOX);
    this.int16(RecordType.LAYER, layer);
    this.int16(RecordType.BOXTYPE, boxType);
    this.xy(points);
    return this.record(RecordType.ENDEL);
  }

  text(layer: number, textType: number, position: Pt, value: string): this {
    this.record(RecordType.TEXT);
    this.int16(RecordType.LAYER, layer);
    this.int16(RecordType.TEXTTYPE, textType);
    this.xy([position]);
    this.ascii(RecordType.STRING, value);
    return this.record(RecordType.ENDEL);
  }

  sref(name: string, position: Pt, strans?: StransSpec): this {
    this.record(RecordType.SREF);
    this.ascii(RecordType.SNAME, name);
    if (strans) this.strans(strans);
    this.xy([position]);
    return this.record(RecordType.ENDEL);
  }

  aref(
    name: string,
    columns: number,
    rows: number,
    lattice: [Pt, Pt, Pt],
    strans?: StransSpec
  ): this {
    this.record(RecordType.AREF);
    this.ascii(RecordType.SNAME, name);
    if (strans) this.strans(strans);
    this.int16(RecordType.COLROW, columns, rows);
    this.xy(lattice);
    return this.record(RecordType.ENDEL);
  }

  strans(spec: StransSpec): this {
    let bits = 0;
    if (spec.reflected) bits |= 0x8000;
    if (spec.absoluteMagnification) bits |= 0x0004;
    if (spec.absoluteAngle) bits |= 0x0002;
    this.uint16(RecordType.STRANS, bits);
    if (spec.magnification !== undefined) this.float64(RecordType.MAG, spec.magnification);
    if (spec.angle !== undefined) this.float64(RecordType.ANGLE, spec.angle);
    return this;
  }

  build(): Uint8Array {
    const total = this.chunks.reduce((n, c) => n + c.byteLength, 0);
    const out = new Uint8Array(total);
    let offset = 0;
    for (const c of this.chunks) {
      out.set(c, offset);
      offset += c.byteLength;
    }
    return out;
  }
}

/** Library with one structure per entry of `structures`. */
export function buildLibrary(
  structures: Record<string, (b: GdsBuilder) => void>,
  order: ByteOrder = "big"
): Uint8Array {
  const b = new GdsBuilder(order).beginLibrary();
  for (const [name, body] of Object.entries(structures)) {
    b.structure(name, body);
  }
  return b.endLibrary().build();
}
