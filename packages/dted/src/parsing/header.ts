/**
 * User Header Label (UHL) decoder.
 *
 * The UHL is the fixed 80-byte record at the start of every DTED file:
 *
 * | Bytes | Field                                   |
 * |-------|-----------------------------------------|
 * | 0-3   | "UHL1"                                  |
 * | 4-11  | longitude origin DDDMMSSH               |
 * | 12-19 | latitude origin DDDMMSSH                |
 * | 20-23 | longitude interval (tenths of a second) |
 * | 24-27 | latitude interval (tenths of a second)  |
 * | 28-31 | absolute vertical accuracy or "NA$$"    |
 * | 32-46 | reserved                                |
 * | 47-50 | number of longitude lines               |
 * | 51-54 | number of latitude points per line      |
 * | 55-79 | reserved                                |
 */

import { AxisElement } from "../primitives/axis-element.js";
import {
  RecognitionSentinel,
  angleField,
  cursor,
  optionalUint,
  skip,
  tag,
  uint,
  type ByteInput,
  type Parsed,
} from "./fields.js";
import type { DtedHeader } from "./types.js";

const originAngle = angleField(3, 2, 2);
const interval = uint(4);
const accuracy = optionalUint(4);
const lineCount = uint(4);

export function parseHeader(input: ByteInput): Parsed<DtedHeader> {
  const uhl = tag(RecognitionSentinel.UHL)(input);
  const lonOrigin = originAngle(uhl.rest);
  const latOrigin = originAngle(lonOrigin.rest);
  const lonInterval = interval(latOrigin.rest);
  const latInterval = interval(lonInterval.rest);
  const acc = accuracy(latInterval.rest);
  const reserved1 = skip(15)(acc.rest);
  const lonCount = lineCount(reserved1.rest);
  const latCount = lineCount(lonCount.rest);
  const reserved2 = skip(25)(latCount.rest);

  return {
    rest: reserved2.rest,
    value: {
      origin: new AxisElement(latOrigin.value, lonOrigin.value),
      interval: new AxisElement(latInterval.value, lonInterval.value),
      accuracy: acc.value,
      count: new AxisElement(latCount.value, lonCount.value),
    },
  };
}

/**
 * Decode the 80-byte User Header Label at the start of `bytes`.
 *
 * @throws IncompleteInputError when fewer than 80 bytes are given
 * @throws SentinelMismatchError when the buffer is not a DTED header
 * @throws InvalidFieldError / AngleRangeError on malformed fields
 */
export function decodeHeader(bytes: Uint8Array): DtedHeader {
  return parseHeader(cursor(bytes)).value;
}
