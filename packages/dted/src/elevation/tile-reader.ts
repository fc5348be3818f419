/**
 * DTED tile reader for elevation lookups across many cells.
 *
 * Tiles follow the standard DTED directory layout: one directory per
 * longitude, one file per latitude, named after the cell's south-west
 * corner, e.g. `e015/n42.dt2` covers N42-N43, E015-E016 at level 2.
 *
 * Features:
 * - Bilinear interpolation inside each decoded grid
 * - LRU grid cache (default 4 tiles; a level-2 cell is ~26MB decoded)
 * - null when a tile is missing or the point is outside it
 */

import { existsSync } from "node:fs";
import { join } from "node:path";
import type { Coordinate } from "@dted-terrain/types";
import type { DecodeOptions } from "../config.js";
import { loadDted } from "../io/load.js";
import type { DtedGrid, ElevationSource } from "./grid.js";

/** DTED level: 0 (30"), 1 (3"), 2 (1") */
export type DtedLevel = 0 | 1 | 2;

/** Configuration for the tile reader */
export interface TileReaderConfig {
  /** Root directory holding the longitude directories */
  tilesDir: string;
  /** DTED level, selects the file extension (default: 2) */
  level?: DtedLevel;
  /** Maximum number of decoded tiles to cache (default: 4) */
  maxCachedTiles?: number;
  /** Decoder options applied to every tile */
  decode?: DecodeOptions;
}

export interface TileCacheStats {
  tiles: number;
  maxTiles: number;
  hits: number;
  misses: number;
}

/** A cached decoded tile */
interface CachedTile {
  key: string;
  grid: DtedGrid;
  lastUsed: number;
}

/**
 * DTED reader with LRU tile cache.
 *
 * Usage:
 * ```ts
 * const reader = new DtedTileReader({ tilesDir: "./dted" });
 * const elev = reader.getElevation(42.5, 15.25);
 * ```
 */
export class DtedTileReader implements ElevationSource {
  private readonly tilesDir: string;
  readonly level: DtedLevel;
  private readonly maxCachedTiles: number;
  private readonly decode: DecodeOptions;
  private readonly cache: Map<string, CachedTile> = new Map();
  private accessCounter = 0;
  private hits = 0;
  private misses = 0;

  constructor(config: TileReaderConfig) {
    this.tilesDir = config.tilesDir;
    this.level = config.level ?? 2;
    this.maxCachedTiles = Math.max(1, config.maxCachedTiles ?? 4);
    this.decode = config.decode ?? {};
  }

  /**
   * Get elevation for a single coordinate.
   * Returns null if the tile is missing or the point is outside it.
   */
  getElevation(lat: number, lon: number): number | null {
    if (!Number.isFinite(lat) || !Number.isFinite(lon)) return null;
    const grid = this.getGrid(lat, lon);
    if (!grid) return null;
    return grid.getElevation(lat, lon);
  }

  /**
   * Get elevations for multiple coordinates (batch lookup).
   * Returns an array of elevations (or null for missing points).
   */
  getElevations(coords: readonly Coordinate[]): (number | null)[] {
    return coords.map((c) => this.getElevation(c.lat, c.lon));
  }

  /**
   * Relative path of the tile covering a coordinate.
   * E.g., (42.5, 15.2) → "e015/n42.dt2", (-0.5, -85.3) → "w086/s01.dt2"
   */
  static tileFilename(lat: number, lon: number, level: DtedLevel = 2): string {
    const latFloor = Math.floor(lat);
    const lonFloor = Math.floor(lon);
    const latPrefix = latFloor >= 0 ? "n" : "s";
    const lonPrefix = lonFloor >= 0 ? "e" : "w";
    const latStr = String(Math.abs(latFloor)).padStart(2, "0");
    const lonStr = String(Math.abs(lonFloor)).padStart(3, "0");
    return `${lonPrefix}${lonStr}/${latPrefix}${latStr}.dt${level}`;
  }

  /** Absolute path of the tile covering a coordinate. */
  tilePath(lat: number, lon: number): string {
    return join(this.tilesDir, DtedTileReader.tileFilename(lat, lon, this.level));
  }

  /**
   * Load the grid covering a coordinate from cache or disk.
   * Returns null if the tile file doesn't exist; decode errors propagate.
   */
  getGrid(lat: number, lon: number): DtedGrid | null {
    const key = DtedTileReader.tileFilename(lat, lon, this.level);

    const cached = this.cache.get(key);
    if (cached) {
      cached.lastUsed = ++this.accessCounter;
      this.hits++;
      return cached.grid;
    }

    const filePath = join(this.tilesDir, key);
    if (!existsSync(filePath)) return null;

    this.misses++;
    const start = performance.now();
    const grid = loadDted(filePath, { ...this.decode, source: key });
    const { count } = grid.metadata;
    console.log(
      `[tiles] loaded ${key} (${count.lon}×${count.lat}) in ${(performance.now() - start).toFixed(0)}ms`,
    );

    // Evict LRU if at capacity
    if (this.cache.size >= this.maxCachedTiles) {
      this.evictLru();
    }

    this.cache.set(key, { key, grid, lastUsed: ++this.accessCounter });
    return grid;
  }

  /** Keys of the cached tiles, least recently used first. */
  cachedTiles(): string[] {
    return [...this.cache.values()]
      .sort((a, b) => a.lastUsed - b.lastUsed)
      .map((tile) => tile.key);
  }

  cacheStats(): TileCacheStats {
    return {
      tiles: this.cache.size,
      maxTiles: this.maxCachedTiles,
      hits: this.hits,
      misses: this.misses,
    };
  }

  clearCache(): void {
    this.cache.clear();
  }

  /** Evict the least recently used tile from the cache. */
  private evictLru(): void {
    let oldestKey: string | undefined;
    let oldestTime = Infinity;
    for (const [key, tile] of this.cache) {
      if (tile.lastUsed < oldestTime) {
        oldestTime = tile.lastUsed;
        oldestKey = key;
      }
    }
    if (oldestKey) {
      this.cache.delete(oldestKey);
      console.log(`[tiles] evicted ${oldestKey}`);
    }
  }
}
