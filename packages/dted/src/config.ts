/**
 * Decode options shared by the loader, the tile reader and the server.
 */

import { DtedError } from "./errors.js";

/**
 * What to do with the trailing checksum of each data record.
 *
 * - ignore: keep the stored value, do not verify
 * - warn: verify, log a warning on mismatch and keep the record
 * - strict: verify, reject the file on mismatch
 */
export type ChecksumMode = "ignore" | "warn" | "strict";

export const CHECKSUM_MODES: readonly ChecksumMode[] = ["ignore", "warn", "strict"];

export interface DecodeOptions {
  /** Checksum policy (default: "ignore") */
  checksum?: ChecksumMode;
  /** Accept bytes after the last record instead of failing (default: false) */
  allowTrailingBytes?: boolean;
}

export const DEFAULT_DECODE_OPTIONS: Readonly<Required<DecodeOptions>> = {
  checksum: "ignore",
  allowTrailingBytes: false,
};

/** Merge caller options over the defaults. */
export function resolveDecodeOptions(options: DecodeOptions = {}): Required<DecodeOptions> {
  return {
    checksum: options.checksum ?? DEFAULT_DECODE_OPTIONS.checksum,
    allowTrailingBytes: options.allowTrailingBytes ?? DEFAULT_DECODE_OPTIONS.allowTrailingBytes,
  };
}

export function isChecksumMode(value: string): value is ChecksumMode {
  return CHECKSUM_MODES.some((mode) => mode === value);
}

function parseFlag(raw: string | undefined): boolean | undefined {
  if (raw === undefined || raw === "") return undefined;
  return raw === "1" || raw.toLowerCase() === "true";
}

/**
 * Read decode options from the environment.
 *
 * - DTED_CHECKSUM: ignore | warn | strict
 * - DTED_ALLOW_TRAILING_BYTES: "1" or "true" to accept trailing bytes
 *
 * Unset variables are left out so the defaults apply.
 */
export function decodeOptionsFromEnv(
  env: Record<string, string | undefined> = process.env,
): DecodeOptions {
  const options: DecodeOptions = {};

  const checksum = env["DTED_CHECKSUM"];
  if (checksum !== undefined && checksum !== "") {
    const mode = checksum.toLowerCase();
    if (!isChecksumMode(mode)) {
      throw new DtedError(
        `Unknown DTED_CHECKSUM "${checksum}" (expected one of: ${CHECKSUM_MODES.join(", ")})`,
      );
    }
    options.checksum = mode;
  }

  const allowTrailingBytes = parseFlag(env["DTED_ALLOW_TRAILING_BYTES"]);
  if (allowTrailingBytes !== undefined) {
    options.allowTrailingBytes = allowTrailingBytes;
  }

  return options;
}
