export * from "./fields.js";
export * from "./types.js";
export { parseHeader, decodeHeader } from "./header.js";
export { parseRecord, decodeRecord, computeChecksum, type RecordOptions } from "./record.js";
export { parseDtedFile, decodeDtedFile } from "./file.js";
