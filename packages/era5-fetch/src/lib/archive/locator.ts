import { daysInMonth, pad2, yearMonth, yearMonthDay } from "./calendar.js";
import type {
  ArchiveKind,
  BoundingBox,
  BulkTarget,
  BulkUnit,
  DataFormat,
  DirectTarget,
  DirectUnit,
  DownloadUnit,
  LevelType,
  ParameterName,
  RemoteTarget,
} from "./types.js";
import { HOURLY_TIMES, PARAMETER_NAMES, lookupParameter } from "./variables.js";

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

/** THREDDS file server root for ds633.0 */
export const RDA_BASE_URL = "https://tds.gdex.ucar.edu/thredds/fileServer/files/g/d633000";

export const CDS_DATASETS: Record<LevelType, string> = {
  pl: "reanalysis-era5-pressure-levels",
  sfc: "reanalysis-era5-single-levels",
};

const BULK_LEVEL_KIND: Record<LevelType, string> = { pl: "pl", sfc: "sl" };

const FORMAT_EXTENSIONS: Record<DataFormat, string> = { grib: "grib", netcdf: "nc" };

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface Locator {
  readonly archive: ArchiveKind;
  locate(unit: DownloadUnit): RemoteTarget;
}

export interface DirectLocatorOptions {
  baseUrl?: string;
  parameterNames?: ReadonlyMap<string, ParameterName>;
}

export interface BulkLocatorOptions {
  area?: BoundingBox;
  format?: DataFormat;
  filePrefix?: string;
}

export type LocatorOptions = DirectLocatorOptions & BulkLocatorOptions;

// ---------------------------------------------------------------------------
// Strategy B: one URL per variable per day or month
// ---------------------------------------------------------------------------

/**
 * Build the RDA file name and URL for a unit.
 *
 * e5.oper.an.pl.128_129_z.ll025sc.2014050100_2014050123.nc      (daily)
 * e5.oper.an.sfc.128_034_sstk.ll025sc.2014050100_2014053123.nc   (monthly)
 */
export function locateDirect(unit: DirectUnit, options: DirectLocatorOptions = {}): DirectTarget {
  const { baseUrl = RDA_BASE_URL, parameterNames = PARAMETER_NAMES } = options;
  const { temporal, variable } = unit;
  const { shortName, gridKind } = lookupParameter(variable.code, parameterNames);

  const code = parseInt(variable.code, 10).toString().padStart(3, "0");
  const firstDay = temporal.kind === "day" ? temporal.day : 1;
  const lastDay = temporal.kind === "day" ? temporal.day : daysInMonth(temporal.year, temporal.month);
  const start = `${yearMonthDay(temporal.year, temporal.month, firstDay)}00`;
  const end = `${yearMonthDay(temporal.year, temporal.month, lastDay)}23`;

  const stream = `e5.oper.an.${variable.levelType}`;
  const filename = `${stream}.128_${code}_${shortName}.ll025${gridKind}.${start}_${end}.nc`;
  const url = [
    baseUrl.replace(/\/+$/, ""),
    stream,
    yearMonth(temporal.year, temporal.month),
    filename,
  ].join("/");

  return { kind: "direct", url, filename };
}

// ---------------------------------------------------------------------------
// Strategy A: one bulk request per day per level group
// ---------------------------------------------------------------------------

/**
 * Build the CDS request descriptor and file name for a unit.
 * Global coverage unless an area is given.
 */
export function locateBulk(unit: BulkUnit, options: BulkLocatorOptions = {}): BulkTarget {
  const { area, format = "grib", filePrefix = "era5" } = options;
  const { year, month, day } = unit.temporal;

  const filename =
    `${filePrefix}_${BULK_LEVEL_KIND[unit.levelType]}_${yearMonthDay(year, month, day)}` +
    `.${FORMAT_EXTENSIONS[format]}`;

  return {
    kind: "bulk",
    dataset: CDS_DATASETS[unit.levelType],
    filename,
    request: {
      product_type: ["reanalysis"],
      variable: [...unit.variables],
      ...(unit.levels && { pressure_level: [...unit.levels] }),
      year: [String(year)],
      month: [pad2(month)],
      day: [pad2(day)],
      time: [...HOURLY_TIMES],
      ...(area && { area: [...area] }),
      data_format: format,
      download_format: "unarchived",
    },
  };
}

// ---------------------------------------------------------------------------
// Dispatch
// ---------------------------------------------------------------------------

/**
 * Create the locator for an archive.
 * Each archive accepts only its own unit kind.
 */
export function createLocator(archive: ArchiveKind, options: LocatorOptions = {}): Locator {
  return {
    archive,
    locate(unit: DownloadUnit): RemoteTarget {
      if (archive === "rda" && unit.kind === "direct") {
        return locateDirect(unit, options);
      }
      if (archive === "cds" && unit.kind === "bulk") {
        return locateBulk(unit, options);
      }
      throw new TypeError(`The ${archive} archive cannot locate ${unit.kind} units`);
    },
  };
}

/**
 * Short human label for progress lines.
 */
export function describeUnit(unit: DownloadUnit): string {
  const { temporal } = unit;
  const date =
    temporal.kind === "day"
      ? `${temporal.year}-${pad2(temporal.month)}-${pad2(temporal.day)}`
      : `${temporal.year}-${pad2(temporal.month)}`;

  if (unit.kind === "bulk") {
    const group = unit.levelType === "pl" ? "pressure levels" : "single levels";
    return `${group} ${date} (${unit.variables.length} variables)`;
  }
  const span = temporal.kind === "day" ? "24h" : "monthly";
  return `[${unit.variable.mnemonic}] ${unit.variable.description} - ${date} (${span})`;
}
