/**
 * Geographic utility types.
 */

/** A WGS84 position in decimal degrees */
export interface Coordinate {
  lat: number;
  lon: number;
}

/** Axis-aligned bounding box in WGS84 coordinates */
export interface BoundingBox {
  minLat: number;
  maxLat: number;
  minLon: number;
  maxLon: number;
}
