/**
 * Primitive field decoders for the DTED byte layout.
 *
 * Every decoder is a pure function from an immutable cursor to the decoded
 * value and the cursor after it. Failures throw a DtedError subclass that
 * records the absolute byte offset.
 *
 * ```ts
 * const uhl = tag(RecognitionSentinel.UHL)(cursor(bytes));
 * const lonOrigin = angleField(3, 2, 2)(uhl.rest);
 * ```
 */

import {
  IncompleteInputError,
  InvalidFieldError,
  SentinelMismatchError,
} from "../errors.js";
import { Angle } from "../primitives/angle.js";

// ─── Cursor ─────────────────────────────────────────────────────────────────

/** Position within an input buffer */
export interface ByteInput {
  readonly bytes: Uint8Array;
  readonly offset: number;
}

/** A decoded value and the input that follows it */
export interface Parsed<T> {
  readonly rest: ByteInput;
  readonly value: T;
}

export type Parser<T> = (input: ByteInput) => Parsed<T>;

export function cursor(bytes: Uint8Array, offset = 0): ByteInput {
  return { bytes, offset };
}

export function remaining(input: ByteInput): number {
  return input.bytes.length - input.offset;
}

function advance(input: ByteInput, n: number): ByteInput {
  return { bytes: input.bytes, offset: input.offset + n };
}

function ensure(input: ByteInput, n: number): void {
  const available = remaining(input);
  if (available < n) {
    throw new IncompleteInputError(input.offset, n, Math.max(available, 0));
  }
}

/** Printable rendering of raw bytes for error messages */
function describeBytes(bytes: Uint8Array): string {
  let out = "";
  for (const b of bytes) {
    out += b >= 0x20 && b < 0x7f ? String.fromCharCode(b) : `\\x${b.toString(16).padStart(2, "0")}`;
  }
  return JSON.stringify(out);
}

// ─── Sentinels ──────────────────────────────────────────────────────────────

/** Recognition sentinels that locate DTED blocks and records */
export const RecognitionSentinel = {
  /** User Header Label */
  UHL: Uint8Array.of(0x55, 0x48, 0x4c, 0x31), // "UHL1"
  /** Data Set Identification */
  DSI: Uint8Array.of(0x44, 0x53, 0x49, 0x55), // "DSIU"
  /** Accuracy Description */
  ACC: Uint8Array.of(0x41, 0x43, 0x43), // "ACC"
  /** Data record */
  DATA: Uint8Array.of(0xaa),
  /** Not available */
  NA: Uint8Array.of(0x4e, 0x41), // "NA"
} as const;

function matches(input: ByteInput, literal: Uint8Array): boolean {
  if (remaining(input) < literal.length) return false;
  for (let i = 0; i < literal.length; i++) {
    if (input.bytes[input.offset + i] !== literal[i]) return false;
  }
  return true;
}

/**
 * Consume and verify a literal byte sequence.
 *
 * @throws IncompleteInputError when fewer bytes remain than the literal
 * @throws SentinelMismatchError when the bytes differ
 */
export function tag(literal: Uint8Array): Parser<Uint8Array> {
  return (input) => {
    ensure(input, literal.length);
    if (!matches(input, literal)) {
      const actual = input.bytes.subarray(input.offset, input.offset + literal.length);
      throw new SentinelMismatchError(input.offset, describeBytes(literal), describeBytes(actual));
    }
    return { rest: advance(input, literal.length), value: literal };
  };
}

/** Test for a literal without consuming it. Never throws. */
export function peekTag(input: ByteInput, literal: Uint8Array): boolean {
  return matches(input, literal);
}

// ─── Raw bytes ──────────────────────────────────────────────────────────────

export function take(n: number): Parser<Uint8Array> {
  return (input) => {
    ensure(input, n);
    return {
      rest: advance(input, n),
      value: input.bytes.subarray(input.offset, input.offset + n),
    };
  };
}

/** Consume n bytes whose contents are not interpreted. */
export function skip(n: number): Parser<undefined> {
  return (input) => {
    ensure(input, n);
    return { rest: advance(input, n), value: undefined };
  };
}

/** Run a parser exactly n times, back to back. */
export function count<T>(parser: Parser<T>, n: number): Parser<T[]> {
  return (input) => {
    const values: T[] = [];
    let rest = input;
    for (let i = 0; i < n; i++) {
      const parsed = parser(rest);
      values.push(parsed.value);
      rest = parsed.rest;
    }
    return { rest, value: values };
  };
}

// ─── Binary integers (big-endian) ───────────────────────────────────────────

function byteAt(input: ByteInput, index: number): number {
  return input.bytes[input.offset + index] ?? 0;
}

export const uint8: Parser<number> = (input) => {
  ensure(input, 1);
  return { rest: advance(input, 1), value: byteAt(input, 0) };
};

export const uint16be: Parser<number> = (input) => {
  ensure(input, 2);
  return {
    rest: advance(input, 2),
    value: (byteAt(input, 0) << 8) | byteAt(input, 1),
  };
};

export const uint32be: Parser<number> = (input) => {
  ensure(input, 4);
  const value =
    byteAt(input, 0) * 0x1000000 +
    ((byteAt(input, 1) << 16) | (byteAt(input, 2) << 8) | byteAt(input, 3));
  return { rest: advance(input, 4), value };
};

const SIGN_BIT = 0x8000;
const MAGNITUDE_MASK = 0x7fff;

/**
 * Convert a 16-bit signed-magnitude word to a number.
 *
 * Bit 15 is the sign and bits 0-14 the magnitude, so 0x8003 is -3 (not
 * -32765 as in two's complement). 0x8000 decodes as +0.
 */
export function decodeSignedMagnitude(word: number): number {
  const magnitude = word & MAGNITUDE_MASK;
  if (magnitude === 0) return 0;
  return (word & SIGN_BIT) !== 0 ? -magnitude : magnitude;
}

export const signedMagnitude16: Parser<number> = (input) => {
  const { rest, value } = uint16be(input);
  return { rest, value: decodeSignedMagnitude(value) };
};

// ─── ASCII numeric fields ───────────────────────────────────────────────────

const DIGIT_0 = 0x30;
const DIGIT_9 = 0x39;

/**
 * Fixed-width unsigned decimal: exactly `width` ASCII digits.
 *
 * @throws InvalidFieldError on a non-digit byte
 */
export function uint(width: number): Parser<number> {
  return (input) => {
    ensure(input, width);
    let value = 0;
    for (let i = 0; i < width; i++) {
      const b = byteAt(input, i);
      if (b < DIGIT_0 || b > DIGIT_9) {
        const field = input.bytes.subarray(input.offset, input.offset + width);
        throw new InvalidFieldError(input.offset, String.fromCharCode(...field));
      }
      value = value * 10 + (b - DIGIT_0);
    }
    return { rest: advance(input, width), value };
  };
}

/** Like {@link uint}, but a width of 0 yields `fallback` without consuming input. */
export function uintOr(width: number, fallback: number): Parser<number> {
  return width === 0 ? (input) => ({ rest: input, value: fallback }) : uint(width);
}

/**
 * NA-aware unsigned field of `width` bytes.
 *
 * A field that starts with the "NA" sentinel (e.g. "NA$$") is absent;
 * anything else must be a fixed-width decimal.
 */
export function optionalUint(width: number): Parser<number | null> {
  const digits = uint(width);
  return (input) => {
    ensure(input, width);
    if (peekTag(input, RecognitionSentinel.NA)) {
      return { rest: advance(input, width), value: null };
    }
    return digits(input);
  };
}

// ─── Hemisphere and angles ──────────────────────────────────────────────────

const HEMISPHERE_SIGNS: ReadonlyMap<number, 1 | -1> = new Map<number, 1 | -1>([
  [0x4e, 1], // N
  [0x45, 1], // E
  [0x53, -1], // S
  [0x57, -1], // W
]);

/**
 * Optional hemisphere letter: N/E → +1, S/W → -1.
 *
 * When the next byte is missing or is not a hemisphere letter, nothing is
 * consumed and the sign defaults to +1.
 */
export const hemisphere: Parser<1 | -1> = (input) => {
  if (remaining(input) < 1) return { rest: input, value: 1 };
  const sign = HEMISPHERE_SIGNS.get(byteAt(input, 0));
  if (sign === undefined) return { rest: input, value: 1 };
  return { rest: advance(input, 1), value: sign };
};

/**
 * Angle stored as zero-padded degrees, minutes and seconds digits followed by
 * a hemisphere letter. A width of 0 omits that component.
 *
 * @throws AngleRangeError when minutes or seconds are 60 or more
 */
export function angleField(
  degreeDigits: number,
  minuteDigits: number,
  secondDigits: number,
): Parser<Angle> {
  const deg = uintOr(degreeDigits, 0);
  const min = uintOr(minuteDigits, 0);
  const sec = uintOr(secondDigits, 0);
  return (input) => {
    const d = deg(input);
    const m = min(d.rest);
    const s = sec(m.rest);
    const sign = hemisphere(s.rest);
    return {
      rest: sign.rest,
      value: new Angle(d.value, m.value, s.value, sign.value < 0),
    };
  };
}
