import { describe, it, expect } from "vitest";
import { decodeDtedFile } from "./file.js";
import { DATA_OFFSET, recordLength } from "./types.js";
import { buildDtedFile } from "../testing/synthetic.js";
import {
  ChecksumMismatchError,
  IncompleteInputError,
  SentinelMismatchError,
  TrailingBytesError,
} from "../errors.js";

const elevations = [
  [1, 2, 3],
  [4, 5, 6],
];

describe("decodeDtedFile", () => {
  it("decodes the header and one record per longitude line", () => {
    const file = decodeDtedFile(buildDtedFile({ elevations }));

    expect(file.header.count.toJSON()).toEqual({ lat: 3, lon: 2 });
    expect(file.records).toHaveLength(2);
    expect(Array.from(file.records[0]?.elevations ?? [])).toEqual([1, 2, 3]);
    expect(Array.from(file.records[1]?.elevations ?? [])).toEqual([4, 5, 6]);
    expect(file.records[1]?.blockCount).toBe(1);
    expect(file.records[1]?.lonCount).toBe(1);
  });

  it("records whether the DSI and ACC sentinels are present", () => {
    expect(decodeDtedFile(buildDtedFile({ elevations })).blocks).toEqual({ dsi: true, acc: true });
    expect(decodeDtedFile(buildDtedFile({ elevations, sentinels: false })).blocks).toEqual({
      dsi: false,
      acc: false,
    });
  });

  it("places the first record at the data offset", () => {
    const bytes = buildDtedFile({ elevations });
    expect(bytes.length).toBe(DATA_OFFSET + 2 * recordLength(3));
    expect(bytes[DATA_OFFSET]).toBe(0xaa);
  });

  it("rejects trailing bytes by default", () => {
    const bytes = buildDtedFile({ elevations, trailing: Uint8Array.of(0, 0, 0) });
    try {
      decodeDtedFile(bytes);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(TrailingBytesError);
      if (err instanceof TrailingBytesError) {
        expect(err.remaining).toBe(3);
        expect(err.offset).toBe(DATA_OFFSET + 2 * recordLength(3));
      }
    }
  });

  it("accepts trailing bytes when allowed", () => {
    const bytes = buildDtedFile({ elevations, trailing: Uint8Array.of(0, 0, 0) });
    expect(decodeDtedFile(bytes, { allowTrailingBytes: true }).records).toHaveLength(2);
  });

  it("rejects a file cut short inside the last record", () => {
    const bytes = buildDtedFile({ elevations });
    expect(() => decodeDtedFile(bytes.subarray(0, bytes.length - 1))).toThrow(
      IncompleteInputError,
    );
  });

  it("rejects a file cut short inside the metadata blocks", () => {
    const bytes = buildDtedFile({ elevations });
    expect(() => decodeDtedFile(bytes.subarray(0, 1000))).toThrow(IncompleteInputError);
  });

  it("rejects a record without its sentinel", () => {
    const bytes = buildDtedFile({ elevations }).slice();
    bytes[DATA_OFFSET + recordLength(3)] = 0x00;
    expect(() => decodeDtedFile(bytes)).toThrow(SentinelMismatchError);
  });

  it("fails the whole file on a bad checksum in strict mode", () => {
    const bytes = buildDtedFile({ elevations, corruptChecksums: [1] });
    try {
      decodeDtedFile(bytes, { checksum: "strict" });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ChecksumMismatchError);
      if (err instanceof ChecksumMismatchError) {
        expect(err.offset).toBe(DATA_OFFSET + recordLength(3));
      }
    }
    expect(decodeDtedFile(bytes).records).toHaveLength(2);
  });
});
