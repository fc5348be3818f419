import type { BoundingBox, ElevationPoint } from "@dted-terrain/types";
import type { TileCacheStats } from "@dted-terrain/dted";

export interface HealthResponse {
  status: "ok";
  uptime: number;
  cache: TileCacheStats;
}

export type ElevationResponse = ElevationPoint;

export interface BatchElevationResponse {
  results: ElevationPoint[];
}

/** Header summary of the tile covering a point */
export interface TileHeaderResponse {
  tile: string;
  origin: { lat: number; lon: number };
  /** Origin as D°MM'SS.ss" with hemisphere */
  originDms: { lat: string; lon: string };
  /** Spacing in arc-seconds */
  intervalSeconds: { lat: number; lon: number };
  count: { lat: number; lon: number };
  accuracy: number | null;
  bounds: BoundingBox;
}

export interface ErrorResponse {
  message: string;
  details?: unknown;
}
