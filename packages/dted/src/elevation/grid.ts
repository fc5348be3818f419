/**
 * In-memory elevation grid decoded from one DTED file.
 *
 * Records run west to east (one per longitude line) and each record's
 * elevations run south to north, so a sample is addressed as
 * `records[lonIndex].elevations[latIndex]`.
 *
 * Usage:
 * ```ts
 * const grid = DtedGrid.fromFile(decodeDtedFile(bytes));
 * const elev = grid.getElevation(42.5, 15.25);
 * ```
 */

import type { BoundingBox, Coordinate } from "@dted-terrain/types";
import { InvalidGridError } from "../errors.js";
import { Angle, angleAxis } from "../primitives/angle.js";
import { AxisElement, axisMath } from "../primitives/axis-element.js";
import {
  INTERVAL_UNITS_PER_DEGREE,
  type DtedFile,
  type DtedHeader,
  type DtedRecord,
} from "../parsing/types.js";

/** Header-derived values used to answer queries */
export interface GridMetadata {
  /** File name or other label of the source, when known */
  source: string | null;
  originAngle: AxisElement<Angle>;
  /** Decimal-degree origin (= min) */
  origin: AxisElement<number>;
  /** Grid spacing in decimal degrees */
  interval: AxisElement<number>;
  /** Grid spacing in arc-seconds */
  intervalSeconds: AxisElement<number>;
  accuracy: number | null;
  count: AxisElement<number>;
  min: AxisElement<number>;
  max: AxisElement<number>;
}

/** Anything that answers point elevation queries */
export interface ElevationSource {
  getElevation(lat: number, lon: number): number | null;
}

interface AxisPosition {
  index: number;
  fraction: number;
}

/**
 * Derive query metadata from a header.
 *
 * @throws InvalidGridError when an axis has fewer than two points
 * @throws NumericConversionError when a derived value is not representable
 */
export function deriveMetadata(header: DtedHeader, source: string | null = null): GridMetadata {
  if (header.count.lat < 2 || header.count.lon < 2) {
    throw new InvalidGridError(
      `A grid needs at least 2 points per axis, got ${header.count.lat}×${header.count.lon}`,
    );
  }
  if (header.interval.lat === 0 || header.interval.lon === 0) {
    throw new InvalidGridError("Grid interval must be non-zero");
  }

  const origin = angleAxis.toDegrees(header.origin);
  const interval = axisMath.div(header.interval, INTERVAL_UNITS_PER_DEGREE);
  const intervalSeconds = axisMath.div(header.interval, 10);
  const lastIndex = axisMath.sub(header.count, 1, "u16");
  const max = axisMath.add(origin, axisMath.mul(interval, lastIndex));

  return {
    source,
    originAngle: header.origin,
    origin,
    interval,
    intervalSeconds,
    accuracy: header.accuracy,
    count: header.count,
    min: origin,
    max,
  };
}

export class DtedGrid implements ElevationSource {
  readonly metadata: GridMetadata;
  readonly records: readonly DtedRecord[];

  /**
   * @throws InvalidGridError when the records do not match the header counts
   */
  constructor(header: DtedHeader, records: readonly DtedRecord[], source: string | null = null) {
    const metadata = deriveMetadata(header, source);

    if (records.length !== header.count.lon) {
      throw new InvalidGridError(
        `Expected ${header.count.lon} longitude lines, got ${records.length}`,
      );
    }
    records.forEach((record, i) => {
      if (record.elevations.length !== header.count.lat) {
        throw new InvalidGridError(
          `Line ${i} has ${record.elevations.length} points, expected ${header.count.lat}`,
        );
      }
    });

    this.metadata = metadata;
    this.records = records;
  }

  static fromFile(file: DtedFile, options: { source?: string } = {}): DtedGrid {
    return new DtedGrid(file.header, file.records, options.source ?? null);
  }

  /** True when (lat, lon) lies within [min, max] on both axes. */
  contains(lat: number, lon: number): boolean {
    const { min, max } = this.metadata;
    return lat >= min.lat && lat <= max.lat && lon >= min.lon && lon <= max.lon;
  }

  bounds(): BoundingBox {
    const { min, max } = this.metadata;
    return { minLat: min.lat, maxLat: max.lat, minLon: min.lon, maxLon: max.lon };
  }

  /**
   * Bilinearly interpolated elevation in metres.
   * Returns null when the point lies outside the grid.
   */
  getElevation(lat: number, lon: number): number | null {
    if (!Number.isFinite(lat) || !Number.isFinite(lon)) return null;
    if (!this.contains(lat, lon)) return null;

    const latPos = this.position(lat, "lat");
    const lonPos = this.position(lon, "lon");

    return bilinear(
      this.sample(lonPos.index, latPos.index),
      this.sample(lonPos.index, latPos.index + 1),
      this.sample(lonPos.index + 1, latPos.index),
      this.sample(lonPos.index + 1, latPos.index + 1),
      lonPos.fraction,
      latPos.fraction,
    );
  }

  /**
   * Get elevations for multiple coordinates (batch lookup).
   * Returns an array of elevations (or null for points outside the grid).
   */
  getElevations(coords: readonly Coordinate[]): (number | null)[] {
    return coords.map((c) => this.getElevation(c.lat, c.lon));
  }

  /**
   * Integer index and fraction along one axis.
   *
   * A query on the axis maximum lands on the last index; it is moved one
   * cell back with a fraction of 1 so the four corners stay in range.
   */
  private position(value: number, axis: "lat" | "lon"): AxisPosition {
    const { min, interval, count } = this.metadata;
    const pos = (value - min.get(axis)) / interval.get(axis);
    const lastIndex = count.get(axis) - 1;

    let index = Math.floor(pos);
    let fraction = pos - index;
    if (index === lastIndex) {
      index -= 1;
      fraction += 1;
    }
    return { index, fraction };
  }

  private sample(lonIndex: number, latIndex: number): number {
    const value = this.records[lonIndex]?.elevations[latIndex];
    if (value === undefined) {
      throw new InvalidGridError(`No sample at line ${lonIndex}, point ${latIndex}`);
    }
    return value;
  }
}

/**
 * Weighted sum of four corners.
 *
 * `e00` is (lonIdx, latIdx), `e01` (lonIdx, latIdx+1), `e10` (lonIdx+1, latIdx)
 * and `e11` (lonIdx+1, latIdx+1).
 */
export function bilinear(
  e00: number,
  e01: number,
  e10: number,
  e11: number,
  lonFraction: number,
  latFraction: number,
): number {
  return (
    e00 * (1 - lonFraction) * (1 - latFraction) +
    e01 * (1 - lonFraction) * latFraction +
    e10 * lonFraction * (1 - latFraction) +
    e11 * lonFraction * latFraction
  );
}
