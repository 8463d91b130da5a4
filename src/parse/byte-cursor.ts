// src/parse/byte-cursor.ts

import type { Endianness } from "../types/layout-model";
import { StreamError } from "../core/errors";
import { MAX_KNOWN_RECORD_TYPE, RecordType } from "./record-types";

const HEADER_SIZE = 4;

// Detection sampling
const SAMPLE_RECORDS = 5;
const MIN_RECORD_LENGTH = 4;
const MAX_RECORD_LENGTH = 20000;
const LEADING_RECORD_BONUS = 3;

export interface RecordHeader {
  /** Byte offset of the header itself. */
  offset: number;
  /** Declared length, header included. */
  totalLength: number;
  payloadLength: number;
  type: number;
}

export interface EndiannessScore {
  big: number;
  little: number;
}

/**
 * Score both byte orders over the first few records.
 *
 * A record counts when its length is in [4, 20000] and its type code does
 * not exceed the largest known one. Decoding the first record as HEADER
 * earns a bonus. The walk follows declared lengths and stops at the first
 * record that does not count.
 */
export function scoreEndianness(bytes: Uint8Array): EndiannessScore {
  return {
    big: scoreOrder(bytes, false),
    little: scoreOrder(bytes, true),
  };
}

function scoreOrder(bytes: Uint8Array, littleEndian: boolean): number {
  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  let pos = 0;
  let score = 0;

  for (let i = 0; i < SAMPLE_RECORDS; i++) {
    if (pos + HEADER_SIZE > bytes.byteLength) break;

    const length = view.getUint16(pos, littleEndian);
    const type = view.getUint16(pos + 2, littleEndian);

    const valid =
      length >= MIN_RECORD_LENGTH &&
      length <= MAX_RECORD_LENGTH &&
      type <= MAX_KNOWN_RECORD_TYPE;
    if (!valid) break;

    score++;
    if (i === 0 && type === RecordType.HEADER) {
      score += LEADING_RECORD_BONUS;
    }
    pos += length;
  }

  return score;
}

export interface DetectOptions {
  /** Throw instead of defaulting when neither order decodes a single record. */
  strict?: boolean;
}

/**
 * Decide the byte order of a stream. Ties and buffers too short to hold a
 * record header fall back to big-endian.
 */
export function detectEndianness(
  bytes: Uint8Array,
  options: DetectOptions = {}
): Endianness {
  if (bytes.byteLength < HEADER_SIZE) return "big";

  const { big, little } = scoreEndianness(bytes);

  if (options.strict && big === 0 && little === 0) {
    throw new StreamError(
      "UndeterminedEndianness",
      "Neither byte order decodes a valid record",
      0
    );
  }

  return little > big ? "little" : "big";
}

/**
 * Positional reader over an immutable buffer. The byte order is detected
 * on first use and never changes afterwards.
 */
export class ByteCursor {
  readonly bytes: Uint8Array;
  private readonly view: DataView;
  private pos = 0;
  private order: Endianness | null;
  private readonly strictDetection: boolean;
  private detections = 0;

  constructor(
    bytes: Uint8Array,
    options: { endianness?: Endianness; strictEndianness?: boolean } = {}
  ) {
    this.bytes = bytes;
    this.view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
    this.order = options.endianness ?? null;
    this.strictDetection = options.strictEndianness ?? false;
  }

  get endianness(): Endianness {
    if (this.order === null) {
      this.order = detectEndianness(this.bytes, { strict: this.strictDetection });
      this.detections++;
    }
    return this.order;
  }

  get littleEndian(): boolean {
    return this.endianness === "little";
  }

  /** How many times detection actually ran for this buffer (0 or 1). */
  get detectionCount(): number {
    return this.detections;
  }

  get position(): number {
    return this.pos;
  }

  get length(): number {
    return this.bytes.byteLength;
  }

  get remaining(): number {
    return this.bytes.byteLength - this.pos;
  }

  seek(offset: number): void {
    if (offset < 0 || offset > this.bytes.byteLength) {
      throw new StreamError(
        "TruncatedStream",
        `Seek to ${offset} outside a ${this.bytes.byteLength} byte buffer`,
        offset
      );
    }
    this.pos = offset;
  }

  skip(count: number): void {
    this.ensure(count);
    this.pos += count;
  }

  readHeader(): RecordHeader {
    const offset = this.pos;
    if (this.remaining < HEADER_SIZE) {
      throw new StreamError(
        "TruncatedRecord",
        `Record header needs 4 bytes, ${this.remaining} left`,
        offset
      );
    }

    const littleEndian = this.littleEndian;
    const totalLength = this.view.getUint16(offset, littleEndian);
    const type = this.view.getUint16(offset + 2, littleEndian);

    if (totalLength < HEADER_SIZE) {
      throw new StreamError(
        "TruncatedRecord",
        `Declared record length ${totalLength} is shorter than its header`,
        offset
      );
    }

    this.pos += HEADER_SIZE;
    return {
      offset,
      totalLength,
      payloadLength: totalLength - HEADER_SIZE,
      type,
    };
  }

  readUint16(): number {
    this.ensure(2);
    const v = this.view.getUint16(this.pos, this.littleEndian);
    this.pos += 2;
    return v;
  }

  readInt16(): number {
    this.ensure(2);
    const v = this.view.getInt16(this.pos, this.littleEndian);
    this.pos += 2;
    return v;
  }

  readInt32(): number {
    this.ensure(4);
    const v = this.view.getInt32(this.pos, this.littleEndian);
    this.pos += 4;
    return v;
  }

  readFloat64(): number {
    this.ensure(8);
    const v = this.view.getFloat64(this.pos, this.littleEndian);
    this.pos += 8;
    return v;
  }

  /** Zero-copy view of the next `count` bytes. */
  readBytes(count: number): Uint8Array {
    this.ensure(count);
    const out = this.bytes.subarray(this.pos, this.pos + count);
    this.pos += count;
    return out;
  }

  private ensure(count: number): void {
    if (count < 0 || this.pos + count > this.bytes.byteLength) {
      throw new StreamError(
        "TruncatedStream",
        `Need ${count} bytes, ${this.remaining} left`,
        this.pos
      );
    }
  }
}
