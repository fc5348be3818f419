/**
 * Load DTED data from a file path or an in-memory buffer.
 *
 * File system errors (missing file, permissions) are thrown as-is by
 * node:fs; everything else is a DtedError from the decoder.
 */

import { closeSync, openSync, readFileSync, readSync } from "node:fs";
import { basename } from "node:path";
import type { DecodeOptions } from "../config.js";
import { DtedGrid } from "../elevation/grid.js";
import { decodeDtedFile } from "../parsing/file.js";
import { decodeHeader } from "../parsing/header.js";
import { UHL_LENGTH, type DtedHeader } from "../parsing/types.js";

/** A path to a DTED file, or its contents */
export type DtedInput = string | Uint8Array;

export interface LoadOptions extends DecodeOptions {
  /** Label stored on the grid metadata (defaults to the file name) */
  source?: string;
}

/**
 * Decode a whole DTED file into a queryable grid.
 *
 * ```ts
 * const grid = loadDted("./dted/e015/n42.dt2", { checksum: "strict" });
 * grid.getElevation(42.5, 15.5);
 * ```
 */
export function loadDted(input: DtedInput, options: LoadOptions = {}): DtedGrid {
  const bytes = typeof input === "string" ? readFileSync(input) : input;
  const file = decodeDtedFile(bytes, options);
  const source = options.source ?? (typeof input === "string" ? basename(input) : undefined);
  return DtedGrid.fromFile(file, { source });
}

/** Read at most the first `length` bytes of a file. */
function readPrefix(path: string, length: number): Uint8Array {
  const fd = openSync(path, "r");
  try {
    const buffer = new Uint8Array(length);
    let filled = 0;
    while (filled < length) {
      const n = readSync(fd, buffer, filled, length - filled, filled);
      if (n === 0) break;
      filled += n;
    }
    return buffer.subarray(0, filled);
  } finally {
    closeSync(fd);
  }
}

/**
 * Decode only the 80-byte User Header Label.
 *
 * For a path, only the first 80 bytes of the file are read.
 */
export function loadDtedHeader(input: DtedInput): DtedHeader {
  const bytes = typeof input === "string" ? readPrefix(input, UHL_LENGTH) : input;
  return decodeHeader(bytes);
}
