import type { Coordinate } from "./geo.js";

/** A single elevation lookup result; `elevation` is null outside coverage */
export interface ElevationPoint extends Coordinate {
  elevation: number | null;
}

/**
 * Elevation metrics sampled along a polyline.
 *
 * `elevations` has one entry per input coordinate. Gaps (points outside
 * coverage) are filled by linear interpolation from their neighbours.
 */
export interface ElevationProfile {
  elevations: number[];
  /** Number of coordinates that had a real sample */
  sampled: number;
  distanceMeters: number;
  gainMeters: number;
  lossMeters: number;
  /** Net grade from first to last sample, in percent */
  averageGrade: number;
  /** Steepest grade between consecutive samples, in percent (absolute) */
  maxGrade: number;
}
