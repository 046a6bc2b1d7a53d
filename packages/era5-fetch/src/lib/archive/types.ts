/** Pressure-level (`pl`) or surface/single-level (`sfc`) fields. */
export type LevelType = "pl" | "sfc";

/**
 * - `rda`: NCAR RDA ds633.0, one direct URL per variable per day or month
 * - `cds`: Copernicus CDS retrieve API, one bulk request per day per level group
 */
export type ArchiveKind = "rda" | "cds";

export const ARCHIVE_KINDS = ["rda", "cds"] as const satisfies readonly ArchiveKind[];

/** Vector (wind-like) or scalar field naming convention. */
export type GridKind = "uv" | "sc";

export interface DayKey {
  readonly kind: "day";
  readonly year: number;
  readonly month: number;
  readonly day: number;
}

export interface MonthKey {
  readonly kind: "month";
  readonly year: number;
  readonly month: number;
}

/** The span of time a single remote file covers. */
export type TemporalKey = DayKey | MonthKey;

export interface VariableSpec {
  readonly mnemonic: string;
  /** ECMWF parameter code, 1-3 digits */
  readonly code: string;
  readonly levelType: LevelType;
  readonly description: string;
}

export interface ParameterName {
  readonly shortName: string;
  readonly gridKind: GridKind;
}

export interface DirectUnit {
  readonly kind: "direct";
  readonly temporal: TemporalKey;
  readonly variable: VariableSpec;
}

export interface BulkUnit {
  readonly kind: "bulk";
  readonly temporal: DayKey;
  readonly levelType: LevelType;
  readonly variables: readonly string[];
  readonly levels?: readonly string[];
}

export type DownloadUnit = DirectUnit | BulkUnit;

/** Geographic subset, north/west/south/east in degrees. */
export type BoundingBox = readonly [north: number, west: number, south: number, east: number];

export type DataFormat = "grib" | "netcdf";

/** Request descriptor accepted by the CDS retrieve API. */
export interface BulkRequest {
  product_type: string[];
  variable: string[];
  pressure_level?: string[];
  year: string[];
  month: string[];
  day: string[];
  time: string[];
  area?: number[];
  data_format: DataFormat;
  download_format: "unarchived";
}

export interface DirectTarget {
  readonly kind: "direct";
  readonly url: string;
  readonly filename: string;
}

export interface BulkTarget {
  readonly kind: "bulk";
  readonly dataset: string;
  readonly request: BulkRequest;
  readonly filename: string;
}

export type RemoteTarget = DirectTarget | BulkTarget;
