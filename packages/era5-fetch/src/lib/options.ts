import { ARCHIVE_KINDS, type ArchiveKind, type BoundingBox, type DataFormat } from "./archive/types.js";
import { invalidOption } from "./errors/catalog.js";

// ---------------------------------------------------------------------------
// Command-line value parsers; each throws CONFIG_INVALID_OPTION
// ---------------------------------------------------------------------------

const DATA_FORMATS = ["grib", "netcdf"] as const satisfies readonly DataFormat[];

function isOneOf<T extends string>(values: readonly T[], value: string): value is T {
  return values.some((v) => v === value);
}

export function parseArchive(value: string): ArchiveKind {
  const normalized = value.trim().toLowerCase();
  if (isOneOf(ARCHIVE_KINDS, normalized)) return normalized;
  throw invalidOption("archive", `unknown archive "${value}"`, [...ARCHIVE_KINDS]);
}

export function parseFormat(value: string): DataFormat {
  const normalized = value.trim().toLowerCase();
  if (isOneOf(DATA_FORMATS, normalized)) return normalized;
  throw invalidOption("format", `unknown format "${value}"`, [...DATA_FORMATS]);
}

/**
 * Whole decimal number within [min, max].
 */
export function parseIntegerOption(name: string, value: string, min: number, max: number): number {
  const trimmed = value.trim();
  if (!/^-?\d+$/.test(trimmed)) {
    throw invalidOption(name, `expected a whole number, got "${value}"`);
  }
  const parsed = parseInt(trimmed, 10);
  if (parsed < min || parsed > max) {
    throw invalidOption(name, `expected ${min}-${max}, got ${parsed}`);
  }
  return parsed;
}

/**
 * Comma-separated list; blanks dropped.
 */
export function parseList(value: string): string[] {
  return value
    .split(",")
    .map((item) => item.trim())
    .filter(Boolean);
}

/**
 * `N,W,S,E` in degrees. Latitudes within ±90 with north ≥ south;
 * longitudes within -180..360.
 */
export function parseArea(value: string): BoundingBox {
  const parts = value.split(",").map((p) => p.trim());
  if (parts.length !== 4 || parts.some((p) => p === "")) {
    throw invalidOption("area", `expected N,W,S,E, got "${value}"`);
  }

  const numbers = parts.map(Number);
  if (numbers.some((n) => !Number.isFinite(n))) {
    throw invalidOption("area", `expected four numbers, got "${value}"`);
  }

  const [north, west, south, east] = numbers;
  for (const lat of [north, south]) {
    if (lat < -90 || lat > 90) {
      throw invalidOption("area", `latitude ${lat} is outside -90..90`);
    }
  }
  for (const lon of [west, east]) {
    if (lon < -180 || lon > 360) {
      throw invalidOption("area", `longitude ${lon} is outside -180..360`);
    }
  }
  if (north < south) {
    throw invalidOption("area", `north (${north}) is below south (${south})`);
  }
  return [north, west, south, east];
}
