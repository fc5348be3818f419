import type { Angle } from "../primitives/angle.js";
import type { AxisElement } from "../primitives/axis-element.js";

/** User Header Label length in bytes */
export const UHL_LENGTH = 80;
/** Data Set Identification block length in bytes */
export const DSI_LENGTH = 648;
/** Accuracy Description block length in bytes */
export const ACC_LENGTH = 2700;
/** Offset of the first data record */
export const DATA_OFFSET = UHL_LENGTH + DSI_LENGTH + ACC_LENGTH;

/** Tenths of an arc-second per degree (interval fields are in tenths) */
export const INTERVAL_UNITS_PER_DEGREE = 36000;

/** Size of a data record holding `lineLength` elevations */
export function recordLength(lineLength: number): number {
  // sentinel + block count (3) + lon/lat counts (4) + elevations + checksum
  return 8 + 2 * lineLength + 4;
}

/** Decoded User Header Label */
export interface DtedHeader {
  /** South-west corner of the grid */
  origin: AxisElement<Angle>;
  /** Grid spacing in tenths of an arc-second */
  interval: AxisElement<number>;
  /** Absolute vertical accuracy in metres, null when "NA" */
  accuracy: number | null;
  /** `lon`: number of longitude lines; `lat`: points per line */
  count: AxisElement<number>;
}

/** One longitude line of elevations, south to north */
export interface DtedRecord {
  blockCount: number;
  lonCount: number;
  latCount: number;
  elevations: Int16Array;
  /** Checksum as stored in the file */
  checksum: number;
}

export interface DtedFile {
  header: DtedHeader;
  /** One record per longitude line, west to east */
  records: DtedRecord[];
  /** Whether the skipped metadata blocks start with their sentinels */
  blocks: { dsi: boolean; acc: boolean };
}
