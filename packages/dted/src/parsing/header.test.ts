import { describe, it, expect } from "vitest";
import { decodeHeader, parseHeader } from "./header.js";
import { cursor } from "./fields.js";
import { Angle } from "../primitives/angle.js";
import { buildUhl } from "../testing/synthetic.js";
import {
  IncompleteInputError,
  InvalidFieldError,
  SentinelMismatchError,
} from "../errors.js";

describe("decodeHeader", () => {
  it("decodes a level-2 header", () => {
    const header = decodeHeader(
      buildUhl({
        origin: { lat: 42, lon: 15 },
        interval: { lat: 10, lon: 10 },
        accuracy: null,
        count: { lat: 3601, lon: 3601 },
      }),
    );

    expect(header.origin.lat.equals(new Angle(42, 0, 0))).toBe(true);
    expect(header.origin.lon.equals(new Angle(15, 0, 0))).toBe(true);
    expect(header.interval.toJSON()).toEqual({ lat: 10, lon: 10 });
    expect(header.count.toJSON()).toEqual({ lat: 3601, lon: 3601 });
    expect(header.accuracy).toBeNull();
  });

  it("decodes southern and western origins with minutes", () => {
    const header = decodeHeader(
      buildUhl({
        origin: { lat: -42.5, lon: -86 },
        interval: { lat: 30, lon: 60 },
        accuracy: 25,
        count: { lat: 1201, lon: 601 },
      }),
    );

    expect(header.origin.lat.equals(new Angle(42, 30, 0, true))).toBe(true);
    expect(header.origin.lon.equals(new Angle(86, 0, 0, true))).toBe(true);
    expect(header.interval.toJSON()).toEqual({ lat: 30, lon: 60 });
    expect(header.count.toJSON()).toEqual({ lat: 1201, lon: 601 });
    expect(header.accuracy).toBe(25);
  });

  it("consumes exactly 80 bytes", () => {
    const bytes = new Uint8Array(100);
    bytes.set(buildUhl({ count: { lat: 2, lon: 2 } }));
    expect(parseHeader(cursor(bytes)).rest.offset).toBe(80);
  });

  it("rejects a truncated header", () => {
    const bytes = buildUhl({ count: { lat: 2, lon: 2 } }).subarray(0, 79);
    expect(() => decodeHeader(bytes)).toThrow(IncompleteInputError);
  });

  it("rejects a buffer that is not a DTED file", () => {
    const bytes = buildUhl({ count: { lat: 2, lon: 2 } }).slice();
    bytes.set(new TextEncoder().encode("HDR1"), 0);
    expect(() => decodeHeader(bytes)).toThrow(SentinelMismatchError);
  });

  it("reports the offset of a malformed count", () => {
    const bytes = buildUhl({ count: { lat: 2, lon: 2 } }).slice();
    bytes[48] = 0x58; // "X" inside the longitude line count
    try {
      decodeHeader(bytes);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(InvalidFieldError);
      if (err instanceof InvalidFieldError) {
        expect(err.offset).toBe(47);
        expect(err.field).toBe("0X02");
      }
    }
  });
});
