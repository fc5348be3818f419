import { decodeOptionsFromEnv, type DecodeOptions, type DtedLevel } from "@dted-terrain/dted";

export interface ServerConfig {
  port: number;
  /** Root of the e<DDD>/n<DD>.dt<level> tile tree */
  tilesDir: string;
  level: DtedLevel;
  maxCachedTiles: number;
  decode: DecodeOptions;
}

function parseInteger(env: Record<string, string | undefined>, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw === "") return fallback;
  const value = parseInt(raw, 10);
  if (Number.isNaN(value)) {
    throw new Error(`${name} must be an integer, got "${raw}"`);
  }
  return value;
}

function parseLevel(env: Record<string, string | undefined>): DtedLevel {
  const level = parseInteger(env, "DTED_LEVEL", 2);
  if (level === 0 || level === 1 || level === 2) return level;
  throw new Error(`DTED_LEVEL must be 0, 1 or 2, got ${level}`);
}

/**
 * Read server settings from the environment.
 *
 * PORT, DTED_TILES_DIR, DTED_LEVEL and DTED_MAX_CACHED_TILES, plus the
 * decoder's DTED_CHECKSUM and DTED_ALLOW_TRAILING_BYTES.
 */
export function loadServerConfig(
  env: Record<string, string | undefined> = process.env,
): ServerConfig {
  return {
    port: parseInteger(env, "PORT", 3000),
    tilesDir: env["DTED_TILES_DIR"] || "./data/dted",
    level: parseLevel(env),
    maxCachedTiles: parseInteger(env, "DTED_MAX_CACHED_TILES", 4),
    decode: decodeOptionsFromEnv(env),
  };
}
