/**
 * @dted-terrain/dted
 *
 * DTED decoding and elevation lookup.
 *
 * Pipeline:
 * 1. Read bytes (path or buffer)
 * 2. Decode header, skip DSI/ACC blocks, decode one record per longitude line
 * 3. Wrap the records in a DtedGrid and query with bilinear interpolation
 */

// Loading
export { loadDted, loadDtedHeader, type DtedInput, type LoadOptions } from "./io/load.js";

// Grid, tiles and profiles
export {
  DtedGrid,
  bilinear,
  deriveMetadata,
  type GridMetadata,
  type ElevationSource,
  DtedTileReader,
  type DtedLevel,
  type TileReaderConfig,
  type TileCacheStats,
  buildElevationProfile,
  fillElevationGaps,
} from "./elevation/index.js";

// Decoding
export {
  cursor,
  remaining,
  tag,
  peekTag,
  take,
  skip,
  count,
  uint8,
  uint16be,
  uint32be,
  decodeSignedMagnitude,
  signedMagnitude16,
  uint,
  uintOr,
  optionalUint,
  hemisphere,
  angleField,
  RecognitionSentinel,
  type ByteInput,
  type Parsed,
  type Parser,
  parseHeader,
  decodeHeader,
  parseRecord,
  decodeRecord,
  computeChecksum,
  type RecordOptions,
  parseDtedFile,
  decodeDtedFile,
  UHL_LENGTH,
  DSI_LENGTH,
  ACC_LENGTH,
  DATA_OFFSET,
  INTERVAL_UNITS_PER_DEGREE,
  recordLength,
  type DtedHeader,
  type DtedRecord,
  type DtedFile,
} from "./parsing/index.js";

// Primitives
export {
  Angle,
  angleAxis,
  type AngleParts,
  SECONDS_PER_DEGREE,
  SECONDS_PER_MINUTE,
  MINUTES_PER_DEGREE,
  MAX_DEGREES,
  AxisElement,
  toAxis,
  convertNumeric,
  axisMath,
  type Axis,
  type AxisOperand,
  type NumericKind,
} from "./primitives/index.js";

// Geo
export { haversineDistance, pathLength } from "./geo.js";

// Config
export {
  DEFAULT_DECODE_OPTIONS,
  CHECKSUM_MODES,
  resolveDecodeOptions,
  decodeOptionsFromEnv,
  isChecksumMode,
  type ChecksumMode,
  type DecodeOptions,
} from "./config.js";

// Errors
export {
  DtedError,
  IncompleteInputError,
  SentinelMismatchError,
  InvalidFieldError,
  AngleRangeError,
  NumericConversionError,
  ChecksumMismatchError,
  TrailingBytesError,
  InvalidGridError,
} from "./errors.js";
