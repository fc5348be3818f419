import { describe, it, expect } from "vitest";
import {
  RecognitionSentinel,
  angleField,
  count,
  cursor,
  decodeSignedMagnitude,
  hemisphere,
  optionalUint,
  peekTag,
  signedMagnitude16,
  tag,
  take,
  uint,
  uint32be,
  uint8,
  uintOr,
} from "./fields.js";
import {
  AngleRangeError,
  IncompleteInputError,
  InvalidFieldError,
  SentinelMismatchError,
} from "../errors.js";

const text = (s: string) => cursor(new TextEncoder().encode(s));

// ─── Tags ───────────────────────────────────────────────────────────────────

describe("tag", () => {
  it("consumes a matching sentinel", () => {
    const { rest } = tag(RecognitionSentinel.UHL)(text("UHL1rest"));
    expect(rest.offset).toBe(4);
  });

  it("rejects a different sentinel with its offset", () => {
    const input = { ...text("xxDSIU"), offset: 2 };
    try {
      tag(RecognitionSentinel.UHL)(input);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(SentinelMismatchError);
      if (err instanceof SentinelMismatchError) {
        expect(err.offset).toBe(2);
        expect(err.expected).toBe('"UHL1"');
        expect(err.actual).toBe('"DSIU"');
      }
    }
  });

  it("reports a short input as incomplete, not as a mismatch", () => {
    expect(() => tag(RecognitionSentinel.UHL)(text("UH"))).toThrow(IncompleteInputError);
  });

  it("peekTag never consumes or throws", () => {
    expect(peekTag(text("DSIU"), RecognitionSentinel.DSI)).toBe(true);
    expect(peekTag(text("ACC"), RecognitionSentinel.DSI)).toBe(false);
    expect(peekTag(text(""), RecognitionSentinel.ACC)).toBe(false);
  });
});

describe("take and count", () => {
  it("reports how many bytes were missing", () => {
    try {
      take(5)(text("abc"));
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(IncompleteInputError);
      if (err instanceof IncompleteInputError) {
        expect(err.offset).toBe(0);
        expect(err.needed).toBe(5);
        expect(err.available).toBe(3);
      }
    }
  });

  it("runs a parser back to back", () => {
    const { rest, value } = count(uint8, 3)(cursor(Uint8Array.of(1, 2, 3, 4)));
    expect(value).toEqual([1, 2, 3]);
    expect(rest.offset).toBe(3);
  });
});

// ─── Binary integers ────────────────────────────────────────────────────────

describe("signed magnitude", () => {
  it.each([
    [0x0000, 0],
    [0x0003, 3],
    [0x8003, -3],
    [0x7fff, 32767],
    [0xffff, -32767],
    [0x8000, 0],
  ])("decodes word %i as %i", (word, expected) => {
    expect(decodeSignedMagnitude(word)).toBe(expected);
  });

  it("reads a big-endian word from the input", () => {
    const { rest, value } = signedMagnitude16(cursor(Uint8Array.of(0x80, 0x03, 0xff)));
    expect(value).toBe(-3);
    expect(rest.offset).toBe(2);
  });

  it("reads unsigned 32-bit words above 2^31", () => {
    const { value } = uint32be(cursor(Uint8Array.of(0xff, 0x00, 0x00, 0x01)));
    expect(value).toBe(0xff000001);
  });
});

// ─── ASCII fields ───────────────────────────────────────────────────────────

describe("uint", () => {
  it("reads fixed-width decimal digits", () => {
    const { rest, value } = uint(3)(text("042x"));
    expect(value).toBe(42);
    expect(rest.offset).toBe(3);
  });

  it("rejects a non-digit with the field start offset", () => {
    const input = { ...text("ab12a4"), offset: 2 };
    try {
      uint(4)(input);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(InvalidFieldError);
      if (err instanceof InvalidFieldError) {
        expect(err.offset).toBe(2);
        expect(err.field).toBe("12a4");
      }
    }
  });

  it("uintOr with width 0 yields the fallback without consuming", () => {
    const { rest, value } = uintOr(0, 7)(text("99"));
    expect(value).toBe(7);
    expect(rest.offset).toBe(0);
  });
});

describe("optionalUint", () => {
  it("treats a field starting with NA as absent", () => {
    const { rest, value } = optionalUint(4)(text("NA$$0001"));
    expect(value).toBeNull();
    expect(rest.offset).toBe(4);
  });

  it("reads digits otherwise", () => {
    expect(optionalUint(4)(text("1234")).value).toBe(1234);
  });

  it("still rejects garbage", () => {
    expect(() => optionalUint(4)(text("N/A "))).toThrow(InvalidFieldError);
  });

  it("needs the full width even when absent", () => {
    expect(() => optionalUint(4)(text("NA"))).toThrow(IncompleteInputError);
  });
});

// ─── Hemisphere and angles ──────────────────────────────────────────────────

describe("hemisphere", () => {
  it.each([
    ["N", 1],
    ["E", 1],
    ["S", -1],
    ["W", -1],
  ])("%s → %i", (letter, sign) => {
    const { rest, value } = hemisphere(text(letter));
    expect(value).toBe(sign);
    expect(rest.offset).toBe(1);
  });

  it("defaults to +1 without consuming a non-letter", () => {
    const { rest, value } = hemisphere(text("1"));
    expect(value).toBe(1);
    expect(rest.offset).toBe(0);
  });

  it("defaults to +1 at end of input", () => {
    const { rest, value } = hemisphere(text(""));
    expect(value).toBe(1);
    expect(rest.offset).toBe(0);
  });
});

describe("angleField", () => {
  const dddmmssh = angleField(3, 2, 2);

  it("reads DDDMMSSH", () => {
    const { rest, value } = dddmmssh(text("0153015E"));
    expect(value.normalized()).toEqual({ deg: 15, min: 30, sec: 15, negative: false });
    expect(rest.offset).toBe(8);
  });

  it("negates southern and western angles", () => {
    expect(dddmmssh(text("0420000S")).value.toDegrees()).toBe(-42);
    expect(dddmmssh(text("0860000W")).value.toDegrees()).toBe(-86);
  });

  it("accepts a missing hemisphere letter", () => {
    const { rest, value } = dddmmssh(text("0420000"));
    expect(value.toDegrees()).toBe(42);
    expect(rest.offset).toBe(7);
  });

  it("rejects minutes of 60", () => {
    expect(() => dddmmssh(text("0426000N"))).toThrow(AngleRangeError);
  });

  it("omits components with zero width", () => {
    const degreesOnly = angleField(2, 0, 0);
    expect(degreesOnly(text("45S")).value.toDegrees()).toBe(-45);
  });
});
