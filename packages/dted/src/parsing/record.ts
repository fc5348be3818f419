/**
 * Data record decoder.
 *
 * A record holds one longitude line of elevations:
 *
 *   0xAA | block count (3 bytes) | lon count (2) | lat count (2)
 *        | lineLength × signed-magnitude elevation (2) | checksum (4)
 *
 * A record does not carry its own length; `lineLength` must come from the
 * header's latitude count.
 */

import { ChecksumMismatchError } from "../errors.js";
import type { ChecksumMode } from "../config.js";
import {
  RecognitionSentinel,
  cursor,
  signedMagnitude16,
  tag,
  uint16be,
  uint32be,
  uint8,
  type ByteInput,
  type Parsed,
} from "./fields.js";
import type { DtedRecord } from "./types.js";

export interface RecordOptions {
  checksum?: ChecksumMode;
}

/**
 * Sum of every byte from the sentinel through the last elevation, each as
 * an unsigned 8-bit value, modulo 2^32.
 */
export function computeChecksum(bytes: Uint8Array, start: number, end: number): number {
  let sum = 0;
  for (let i = start; i < end; i++) {
    sum = (sum + (bytes[i] ?? 0)) >>> 0;
  }
  return sum;
}

export function parseRecord(
  input: ByteInput,
  lineLength: number,
  options: RecordOptions = {},
): Parsed<DtedRecord> {
  const sentinel = tag(RecognitionSentinel.DATA)(input);
  const blockHigh = uint8(sentinel.rest);
  const blockLow = uint16be(blockHigh.rest);
  const lonCount = uint16be(blockLow.rest);
  const latCount = uint16be(lonCount.rest);

  const elevations = new Int16Array(lineLength);
  let rest = latCount.rest;
  for (let i = 0; i < lineLength; i++) {
    const parsed = signedMagnitude16(rest);
    elevations[i] = parsed.value;
    rest = parsed.rest;
  }

  const dataEnd = rest.offset;
  const checksum = uint32be(rest);

  const mode = options.checksum ?? "ignore";
  if (mode !== "ignore") {
    const computed = computeChecksum(input.bytes, input.offset, dataEnd);
    if (computed !== checksum.value) {
      const error = new ChecksumMismatchError(input.offset, checksum.value, computed);
      if (mode === "strict") throw error;
      console.warn(`[dted] ${error.message}`);
    }
  }

  return {
    rest: checksum.rest,
    value: {
      blockCount: blockHigh.value * 0x10000 + blockLow.value,
      lonCount: lonCount.value,
      latCount: latCount.value,
      elevations,
      checksum: checksum.value,
    },
  };
}

/**
 * Decode a single data record at the start of `bytes`.
 *
 * @throws SentinelMismatchError when the record does not start with 0xAA
 * @throws IncompleteInputError when the record is truncated
 * @throws ChecksumMismatchError in strict checksum mode
 */
export function decodeRecord(
  bytes: Uint8Array,
  lineLength: number,
  options: RecordOptions = {},
): DtedRecord {
  return parseRecord(cursor(bytes), lineLength, options).value;
}
