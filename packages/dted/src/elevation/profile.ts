/**
 * Elevation profiles along a polyline.
 *
 * Looks up every coordinate against an elevation source (a single grid or
 * a tile reader) and derives gain, loss and grades from the samples.
 *
 * Usage:
 * ```ts
 * const reader = new DtedTileReader({ tilesDir: "./dted" });
 * const profile = buildElevationProfile(reader, track);
 * ```
 */

import type { Coordinate, ElevationProfile } from "@dted-terrain/types";
import { haversineDistance, pathLength } from "../geo.js";
import type { ElevationSource } from "./grid.js";

/**
 * Build an elevation profile for a sequence of coordinates.
 *
 * Gain, loss and max grade are computed between consecutive points that
 * both have a sample; distance is measured along the whole polyline.
 *
 * @returns the profile, or null if fewer than 2 points have a sample
 */
export function buildElevationProfile(
  source: ElevationSource,
  coords: readonly Coordinate[],
): ElevationProfile | null {
  if (coords.length < 2) return null;

  const elevations = coords.map((c) => source.getElevation(c.lat, c.lon));

  const sampled = elevations.filter((e) => e != null).length;
  if (sampled < 2) return null;

  let gain = 0;
  let loss = 0;
  let maxAbsGrade = 0;

  let prevElev: number | null = null;
  let prevCoord: Coordinate | undefined;
  // Horizontal distance walked since the last sampled point
  let sinceLast = 0;

  for (let i = 0; i < coords.length; i++) {
    const coord = coords[i];
    if (!coord) continue;
    if (prevCoord) sinceLast += haversineDistance(prevCoord, coord);
    prevCoord = coord;

    const elev = elevations[i];
    if (elev == null) continue;

    if (prevElev != null) {
      const diff = elev - prevElev;
      if (diff > 0) gain += diff;
      else loss += -diff;

      if (sinceLast > 0) {
        const grade = Math.abs((diff / sinceLast) * 100);
        if (grade > maxAbsGrade) maxAbsGrade = grade;
      }
    }

    prevElev = elev;
    sinceLast = 0;
  }

  const filled = fillElevationGaps(elevations);
  if (!filled) return null;

  // Average grade: (end elevation - start elevation) / horizontal distance * 100
  const distanceMeters = pathLength(coords);
  const first = elevations.find((e) => e != null) ?? null;
  let last: number | null = null;
  for (let i = elevations.length - 1; i >= 0; i--) {
    const e = elevations[i];
    if (e != null) {
      last = e;
      break;
    }
  }
  let averageGrade = 0;
  if (first != null && last != null && distanceMeters > 0) {
    averageGrade = ((last - first) / distanceMeters) * 100;
  }

  return {
    elevations: filled,
    sampled,
    distanceMeters,
    gainMeters: gain,
    lossMeters: loss,
    averageGrade,
    maxGrade: maxAbsGrade,
  };
}

/**
 * Fill null gaps in an elevation array via linear interpolation.
 * Leading and trailing gaps take the nearest valid value.
 * Returns null if fewer than 2 valid values exist.
 */
export function fillElevationGaps(elevations: readonly (number | null)[]): number[] | null {
  const valid: { index: number; value: number }[] = [];
  elevations.forEach((value, index) => {
    if (value != null) valid.push({ index, value });
  });

  const firstValid = valid[0];
  const lastValid = valid[valid.length - 1];
  if (!firstValid || !lastValid || valid.length < 2) return null;

  const result: number[] = new Array<number>(elevations.length);

  // Extrapolate before first and after last valid value
  for (let i = 0; i < firstValid.index; i++) result[i] = firstValid.value;
  for (let i = lastValid.index + 1; i < elevations.length; i++) result[i] = lastValid.value;

  // Interpolate between consecutive valid values
  for (let k = 0; k < valid.length; k++) {
    const start = valid[k];
    if (!start) continue;
    result[start.index] = start.value;

    const end = valid[k + 1];
    if (!end) continue;
    for (let j = start.index + 1; j < end.index; j++) {
      const t = (j - start.index) / (end.index - start.index);
      result[j] = start.value + t * (end.value - start.value);
    }
  }

  return result;
}
