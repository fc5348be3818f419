export {
  DtedGrid,
  bilinear,
  deriveMetadata,
  type GridMetadata,
  type ElevationSource,
} from "./grid.js";
export {
  DtedTileReader,
  type DtedLevel,
  type TileReaderConfig,
  type TileCacheStats,
} from "./tile-reader.js";
export { buildElevationProfile, fillElevationGaps } from "./profile.js";
