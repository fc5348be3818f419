import { describe, it, expect } from "vitest";
import type { Coordinate } from "@dted-terrain/types";
import { buildElevationProfile, fillElevationGaps } from "./profile.js";
import { DtedGrid, type ElevationSource } from "./grid.js";
import { decodeDtedFile } from "../parsing/file.js";
import { haversineDistance } from "../geo.js";
import { buildDtedFile } from "../testing/synthetic.js";

// ─── Helpers ────────────────────────────────────────────────────────────────

/** Source that answers from a fixed lookup keyed by "lat,lon" */
function fixedSource(values: Record<string, number | null>): ElevationSource {
  return {
    getElevation: (lat, lon) => values[`${lat},${lon}`] ?? null,
  };
}

/** Three points north along the prime meridian, ~111m apart */
const track: Coordinate[] = [
  { lat: 0, lon: 0 },
  { lat: 0.001, lon: 0 },
  { lat: 0.002, lon: 0 },
];

const seg1 = haversineDistance({ lat: 0, lon: 0 }, { lat: 0.001, lon: 0 });
const seg2 = haversineDistance({ lat: 0.001, lon: 0 }, { lat: 0.002, lon: 0 });

// ─── buildElevationProfile ──────────────────────────────────────────────────

describe("buildElevationProfile", () => {
  it("computes gain, loss and grades", () => {
    const source = fixedSource({ "0,0": 100, "0.001,0": 110, "0.002,0": 105 });
    const profile = buildElevationProfile(source, track);

    expect(profile).not.toBeNull();
    if (!profile) return;
    expect(profile.elevations).toEqual([100, 110, 105]);
    expect(profile.sampled).toBe(3);
    expect(profile.gainMeters).toBe(10);
    expect(profile.lossMeters).toBe(5);
    expect(profile.distanceMeters).toBeCloseTo(seg1 + seg2, 6);
    expect(profile.maxGrade).toBeCloseTo((10 / seg1) * 100, 6);
    expect(profile.averageGrade).toBeCloseTo((5 / (seg1 + seg2)) * 100, 6);
  });

  it("bridges points without a sample", () => {
    const source = fixedSource({ "0,0": 100, "0.002,0": 105 });
    const profile = buildElevationProfile(source, track);

    expect(profile).not.toBeNull();
    if (!profile) return;
    expect(profile.elevations).toEqual([100, 102.5, 105]);
    expect(profile.sampled).toBe(2);
    expect(profile.gainMeters).toBe(5);
    expect(profile.lossMeters).toBe(0);
    // Grade spans both segments since the middle point had no sample
    expect(profile.maxGrade).toBeCloseTo((5 / (seg1 + seg2)) * 100, 6);
  });

  it("returns null with fewer than 2 samples", () => {
    expect(buildElevationProfile(fixedSource({ "0,0": 100 }), track)).toBeNull();
  });

  it("returns null for a single coordinate", () => {
    expect(buildElevationProfile(fixedSource({ "0,0": 100 }), [{ lat: 0, lon: 0 }])).toBeNull();
  });

  it("profiles a decoded grid", () => {
    // 5×5 cell at 0.25° spacing, +10m per point northward
    const elevations = Array.from({ length: 5 }, () => [0, 10, 20, 30, 40]);
    const grid = DtedGrid.fromFile(
      decodeDtedFile(buildDtedFile({ elevations, interval: { lat: 9000, lon: 9000 } })),
    );

    const profile = buildElevationProfile(grid, [
      { lat: 42, lon: 15.5 },
      { lat: 42.5, lon: 15.5 },
      { lat: 43, lon: 15.5 },
    ]);

    expect(profile?.gainMeters).toBe(40);
    expect(profile?.lossMeters).toBe(0);
    expect(profile?.elevations).toEqual([0, 20, 40]);
  });
});

// ─── fillElevationGaps ──────────────────────────────────────────────────────

describe("fillElevationGaps", () => {
  it("interpolates interior gaps and extends the ends", () => {
    const filled = fillElevationGaps([null, 10, null, null, 40, null]);
    expect(filled).not.toBeNull();
    const expected = [10, 10, 20, 30, 40, 40];
    filled?.forEach((value, i) => expect(value).toBeCloseTo(expected[i] ?? Number.NaN, 9));
  });

  it("leaves complete input unchanged", () => {
    expect(fillElevationGaps([1, 2, 3])).toEqual([1, 2, 3]);
  });

  it("returns null with fewer than 2 values", () => {
    expect(fillElevationGaps([null, 5])).toBeNull();
    expect(fillElevationGaps([null, null])).toBeNull();
    expect(fillElevationGaps([])).toBeNull();
  });
});
