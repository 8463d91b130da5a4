// src/parse/record-decoder.ts

import type { Vec2 } from "../types/layout-model";
import { StreamError } from "../core/errors";
import type { ByteCursor } from "./byte-cursor";

/**
 * One length-prefixed record. `payload` is a view into the source buffer,
 * decode it with the helpers below so the detected byte order is applied.
 */
export interface GdsRecord {
  type: number;
  offset: number;
  totalLength: number;
  payloadLength: number;
  payload: Uint8Array;
  littleEndian: boolean;
}

/**
 * Read the record at the cursor and leave the cursor on the next one.
 * Throws TruncatedRecord for a short header and TruncatedStream when the
 * declared payload runs past the end of the buffer.
 */
export function readRecord(cursor: ByteCursor): GdsRecord {
  const header = cursor.readHeader();

  if (header.payloadLength > cursor.remaining) {
    throw new StreamError(
      "TruncatedStream",
      `Record declares ${header.payloadLength} payload bytes, ${cursor.remaining} left`,
      header.offset
    );
  }

  return {
    type: header.type,
    offset: header.offset,
    totalLength: header.totalLength,
    payloadLength: header.payloadLength,
    payload: cursor.readBytes(header.payloadLength),
    littleEndian: cursor.littleEndian,
  };
}

function viewOf(rec: GdsRecord): DataView {
  return new DataView(
    rec.payload.buffer,
    rec.payload.byteOffset,
    rec.payload.byteLength
  );
}

/** ASCII payload with the trailing NUL padding removed. */
export function decodeAscii(rec: GdsRecord): string {
  let end = rec.payload.byteLength;
  while (end > 0 && rec.payload[end - 1] === 0) end--;

  let out = "";
  for (let i = 0; i < end; i++) {
    out += String.fromCharCode(rec.payload[i]);
  }
  return out;
}

export function decodeInt16List(rec: GdsRecord): number[] {
  const view = viewOf(rec);
  const count = Math.floor(rec.payloadLength / 2);
  const out: number[] = [];
  for (let i = 0; i < count; i++) {
    out.push(view.getInt16(i * 2, rec.littleEndian));
  }
  return out;
}

/** First int16 of the payload, or `fallback` when the payload is too short. */
export function decodeInt16(rec: GdsRecord, fallback = 0): number {
  if (rec.payloadLength < 2) return fallback;
  return viewOf(rec).getInt16(0, rec.littleEndian);
}

/** First word as an unsigned bit array (ELFLAGS, STRANS, PRESENTATION). */
export function decodeBitArray(rec: GdsRecord, fallback = 0): number {
  if (rec.payloadLength < 2) return fallback;
  return viewOf(rec).getUint16(0, rec.littleEndian);
}

export function decodeInt32List(rec: GdsRecord): number[] {
  const view = viewOf(rec);
  const count = Math.floor(rec.payloadLength / 4);
  const out: number[] = [];
  for (let i = 0; i < count; i++) {
    out.push(view.getInt32(i * 4, rec.littleEndian));
  }
  return out;
}

export function decodeInt32(rec: GdsRecord, fallback = 0): number {
  if (rec.payloadLength < 4) return fallback;
  return viewOf(rec).getInt32(0, rec.littleEndian);
}

/** 8-byte IEEE-754 values. */
export function decodeFloat64List(rec: GdsRecord): number[] {
  const view = viewOf(rec);
  const count = Math.floor(rec.payloadLength / 8);
  const out: number[] = [];
  for (let i = 0; i < count; i++) {
    out.push(view.getFloat64(i * 8, rec.littleEndian));
  }
  return out;
}

export function decodeFloat64(rec: GdsRecord, fallback = 0): number {
  if (rec.payloadLength < 8) return fallback;
  return viewOf(rec).getFloat64(0, rec.littleEndian);
}

/**
 * Coordinate payload: pairs of int32, vertex count = payload / 8.
 * A trailing partial vertex is ignored.
 */
export function decodePoints(rec: GdsRecord): Vec2[] {
  const view = viewOf(rec);
  const count = Math.floor(rec.payloadLength / 8);
  const out: Vec2[] = [];
  for (let i = 0; i < count; i++) {
    out.push({
      x: view.getInt32(i * 8, rec.littleEndian),
      y: view.getInt32(i * 8 + 4, rec.littleEndian),
    });
  }
  return out;
}
