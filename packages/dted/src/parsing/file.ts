/**
 * Whole-file decoder: header, two opaque metadata blocks, then one data
 * record per longitude line.
 */

import { TrailingBytesError } from "../errors.js";
import { resolveDecodeOptions, type DecodeOptions } from "../config.js";
import {
  RecognitionSentinel,
  cursor,
  peekTag,
  remaining,
  skip,
  type ByteInput,
  type Parsed,
} from "./fields.js";
import { parseHeader } from "./header.js";
import { parseRecord } from "./record.js";
import { ACC_LENGTH, DSI_LENGTH, type DtedFile, type DtedRecord } from "./types.js";

export function parseDtedFile(input: ByteInput, options: DecodeOptions = {}): Parsed<DtedFile> {
  const { checksum } = resolveDecodeOptions(options);

  const header = parseHeader(input);

  const dsi = peekTag(header.rest, RecognitionSentinel.DSI);
  const afterDsi = skip(DSI_LENGTH)(header.rest);
  const acc = peekTag(afterDsi.rest, RecognitionSentinel.ACC);
  const afterAcc = skip(ACC_LENGTH)(afterDsi.rest);

  const lineLength = header.value.count.lat;
  const records: DtedRecord[] = [];
  let rest = afterAcc.rest;
  for (let i = 0; i < header.value.count.lon; i++) {
    const record = parseRecord(rest, lineLength, { checksum });
    records.push(record.value);
    rest = record.rest;
  }

  return {
    rest,
    value: { header: header.value, records, blocks: { dsi, acc } },
  };
}

/**
 * Decode a complete DTED file held in memory.
 *
 * Decoding is all-or-nothing: any malformed field, short read or (unless
 * `allowTrailingBytes` is set) leftover byte fails the whole file.
 */
export function decodeDtedFile(bytes: Uint8Array, options: DecodeOptions = {}): DtedFile {
  const { allowTrailingBytes } = resolveDecodeOptions(options);
  const { rest, value } = parseDtedFile(cursor(bytes), options);

  const left = remaining(rest);
  if (left > 0 && !allowTrailingBytes) {
    throw new TrailingBytesError(rest.offset, left);
  }
  return value;
}
