/**
 * @dted-terrain/types
 *
 * Shared plain types for the DTED terrain packages.
 *
 * - Geo: coordinates and bounding boxes
 * - Elevation: lookup results and profiles
 */

export * from "./geo.js";
export * from "./elevation.js";
