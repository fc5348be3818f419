import { existsSync } from "node:fs";
import type { Coordinate, ElevationPoint, ElevationProfile } from "@dted-terrain/types";
import {
  DtedTileReader,
  buildElevationProfile,
  deriveMetadata,
  loadDtedHeader,
  type TileCacheStats,
} from "@dted-terrain/dted";
import { NotFoundError } from "../errors.js";
import type { TileHeaderResponse } from "../models/responses.js";

/**
 * Elevation lookups over a tile directory.
 *
 * One instance is shared by every request so decoded tiles stay cached.
 */
export class ElevationService {
  constructor(private readonly reader: DtedTileReader) {}

  getElevation(coord: Coordinate): ElevationPoint {
    return { lat: coord.lat, lon: coord.lon, elevation: this.reader.getElevation(coord.lat, coord.lon) };
  }

  getElevations(coords: readonly Coordinate[]): ElevationPoint[] {
    const elevations = this.reader.getElevations(coords);
    return coords.map((c, i) => ({ lat: c.lat, lon: c.lon, elevation: elevations[i] ?? null }));
  }

  /**
   * @throws NotFoundError when fewer than two coordinates have elevation data
   */
  getProfile(coords: readonly Coordinate[]): ElevationProfile {
    const profile = buildElevationProfile(this.reader, coords);
    if (!profile) {
      throw new NotFoundError("Fewer than two coordinates have elevation data");
    }
    return profile;
  }

  /**
   * Summarize the header of the tile covering a point without decoding
   * its records.
   *
   * @throws NotFoundError when no tile file covers the point
   */
  getTileHeader(coord: Coordinate): TileHeaderResponse {
    const path = this.reader.tilePath(coord.lat, coord.lon);
    if (!existsSync(path)) {
      throw new NotFoundError(`No tile covers ${coord.lat},${coord.lon}`);
    }

    const tile = DtedTileReader.tileFilename(coord.lat, coord.lon, this.reader.level);
    const header = loadDtedHeader(path);
    const m = deriveMetadata(header, tile);
    return {
      tile,
      origin: m.origin.toJSON(),
      originDms: {
        lat: m.originAngle.lat.format("N", "S"),
        lon: m.originAngle.lon.format("E", "W"),
      },
      intervalSeconds: m.intervalSeconds.toJSON(),
      count: m.count.toJSON(),
      accuracy: m.accuracy,
      bounds: { minLat: m.min.lat, maxLat: m.max.lat, minLon: m.min.lon, maxLon: m.max.lon },
    };
  }

  cacheStats(): TileCacheStats {
    return this.reader.cacheStats();
  }
}

let shared: ElevationService | null = null;

/** Install the service that controllers built without arguments use */
export function setElevationService(service: ElevationService): void {
  shared = service;
}

export function getElevationService(): ElevationService {
  if (!shared) {
    throw new Error("Elevation service is not configured; call createApp first");
  }
  return shared;
}
