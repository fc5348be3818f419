/**
 * DTED file inspector.
 *
 * Decodes a DTED file and prints its header, derived grid metadata and
 * elevation range. With a coordinate, also prints the interpolated
 * elevation there.
 *
 * Usage: npx tsx scripts/dted-info.ts <file.dt2> [lat lon]
 *
 * Honors DTED_CHECKSUM and DTED_ALLOW_TRAILING_BYTES.
 */
import { resolve } from "node:path";
import { decodeOptionsFromEnv } from "../src/config.js";
import { DtedError } from "../src/errors.js";
import { loadDted } from "../src/io/load.js";
import type { DtedGrid } from "../src/elevation/grid.js";

// ── CLI ──────────────────────────────────────────────────────────────

const filePath = process.argv[2];
if (!filePath) {
  console.error("Usage: npx tsx scripts/dted-info.ts <file.dt2> [lat lon]");
  process.exit(1);
}

// ── Helpers ──────────────────────────────────────────────────────────

function pad(s: string, width: number): string {
  return s.padEnd(width);
}

function row(label: string, value: string): string {
  return `  ${pad(label, 22)} ${value}`;
}

function fmtDeg(v: number): string {
  return v.toFixed(6);
}

function elevationRange(grid: DtedGrid): { min: number; max: number } {
  let min = Infinity;
  let max = -Infinity;
  for (const record of grid.records) {
    for (const e of record.elevations) {
      if (e < min) min = e;
      if (e > max) max = e;
    }
  }
  return { min, max };
}

// ── Report ───────────────────────────────────────────────────────────

function report(grid: DtedGrid): void {
  const m = grid.metadata;
  const range = elevationRange(grid);

  console.log(`\nDTED ${m.source ?? filePath}\n`);
  console.log(row("Origin", `${m.originAngle.lat.format("N", "S")} ${m.originAngle.lon.format("E", "W")}`));
  console.log(row("Latitude", `${fmtDeg(m.min.lat)} → ${fmtDeg(m.max.lat)}`));
  console.log(row("Longitude", `${fmtDeg(m.min.lon)} → ${fmtDeg(m.max.lon)}`));
  console.log(row("Interval (arc-sec)", `${m.intervalSeconds.lat} lat × ${m.intervalSeconds.lon} lon`));
  console.log(row("Points", `${m.count.lat} per line × ${m.count.lon} lines`));
  console.log(row("Vertical accuracy", m.accuracy === null ? "n/a" : `${m.accuracy} m`));
  console.log(row("Elevation range", `${range.min} m → ${range.max} m`));
}

try {
  const grid = loadDted(resolve(filePath), decodeOptionsFromEnv());
  report(grid);

  const [latArg, lonArg] = process.argv.slice(3);
  if (latArg !== undefined && lonArg !== undefined) {
    const lat = Number(latArg);
    const lon = Number(lonArg);
    const elev = grid.getElevation(lat, lon);
    console.log(row(`Elevation @ ${lat},${lon}`, elev === null ? "outside coverage" : `${elev.toFixed(2)} m`));
  }
  console.log();
} catch (err) {
  if (err instanceof DtedError) {
    console.error(`[dted] ${err.name}: ${err.message}`);
    process.exit(1);
  }
  throw err;
}
