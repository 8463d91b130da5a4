import { describe, it, expect } from "vitest";
import { ByteCursor } from "../byte-cursor";
import {
  readRecord,
  decodeAscii,
  decodeFloat64List,
  decodeInt16,
  decodeInt16List,
  decodeInt32List,
  decodePoints,
} from "../record-decoder";
import { RecordType, recordTypeName, isKnownRecordType } from "../record-types";
import { StreamError } from "../../core/errors";
import { GdsBuilder } from "../../__tests__/helpers/gds-builder";

function cursorFor(b: GdsBuilder): ByteCursor {
  return new ByteCursor(b.build());
}

describe("readRecord", () => {
  it("reports payloadLength = totalLength - 4 for every record", () => {
    for (const order of ["big", "little"] as const) {
      const bytes = new GdsBuilder(order)
        .beginLibrary("LIB")
        .structure("TOP", (s) => {
          s.rect(1, 0, 0, 0, 10, 10);
          s.path(2, 0, 4, [
            [0, 0],
            [20, 0],
          ]);
          s.text(3, 0, [1, 1], "label");
        })
        .endLibrary()
        .build();

      const cursor = new ByteCursor(bytes);
      let count = 0;
      while (cursor.remaining > 0) {
        const rec = readRecord(cursor);
        expect(rec.payloadLength).toBe(rec.totalLength - 4);
        expect(rec.payload.byteLength).toBe(rec.payloadLength);
        count++;
      }
      expect(count).toBe(25);
    }
  });

  it("throws TruncatedStream when the payload runs past the buffer", () => {
    const cursor = new ByteCursor(new Uint8Array([0x00, 0x0a, 0x00, 0x02, 0x02, 0x58]), {
      endianness: "big",
    });
    try {
      readRecord(cursor);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(StreamError);
      if (err instanceof StreamError) expect(err.code).toBe("TruncatedStream");
    }
  });
});

describe("payload decoders", () => {
  it("strips NUL padding from ASCII payloads", () => {
    const rec = readRecord(cursorFor(new GdsBuilder().ascii(RecordType.LIBNAME, "ABC")));
    expect(rec.payloadLength).toBe(4);
    expect(decodeAscii(rec)).toBe("ABC");
  });

  it("decodes signed int16 and int32 lists in either byte order", () => {
    for (const order of ["big", "little"] as const) {
      const b = new GdsBuilder(order)
        .int16(RecordType.HEADER, 600)
        .int16(RecordType.COLROW, -3, 7)
        .int32(RecordType.WIDTH, -250, 1 << 30);
      const cursor = new ByteCursor(b.build(), { endianness: order });
      expect(decodeInt16(readRecord(cursor))).toBe(600);
      expect(decodeInt16List(readRecord(cursor))).toEqual([-3, 7]);
      expect(decodeInt32List(readRecord(cursor))).toEqual([-250, 1073741824]);
    }
  });

  it("falls back when a scalar payload is too short", () => {
    const rec = readRecord(cursorFor(new GdsBuilder().record(RecordType.LAYER)));
    expect(decodeInt16(rec)).toBe(0);
    expect(decodeInt16(rec, 5)).toBe(5);
  });

  it("reads 8-byte IEEE floats", () => {
    const rec = readRecord(cursorFor(new GdsBuilder().float64(RecordType.UNITS, 0.001, 1e-9)));
    expect(decodeFloat64List(rec)).toEqual([0.001, 1e-9]);
  });

  it("floors the vertex count of a coordinate payload", () => {
    const payload = new Uint8Array(20);
    const view = new DataView(payload.buffer);
    view.setInt32(0, 5);
    view.setInt32(4, -6);
    view.setInt32(8, 7);
    view.setInt32(12, 8);
    view.setInt32(16, 99);
    const rec = readRecord(cursorFor(new GdsBuilder().record(RecordType.XY, payload)));
    expect(decodePoints(rec)).toEqual([
      { x: 5, y: -6 },
      { x: 7, y: 8 },
    ]);
  });
});

describe("record type names", () => {
  it("names known codes and flags unknown ones", () => {
    expect(recordTypeName(0x0002)).toBe("HEADER");
    expect(recordTypeName(0x1003)).toBe("XY");
    expect(recordTypeName(0x7777)).toBe("UNKNOWN_0x7777");
    expect(isKnownRecordType(0x3b02)).toBe(true);
    expect(isKnownRecordType(0x7777)).toBe(false);
  });
});
