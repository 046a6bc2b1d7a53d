import { unknownParameter } from "../errors/catalog.js";
import type { LevelType, ParameterName, VariableSpec } from "./types.js";

// ---------------------------------------------------------------------------
// RDA variable tables (ECMWF parameter codes, table 128)
// ---------------------------------------------------------------------------

function table(levelType: LevelType, rows: Array<[string, string, string]>): readonly VariableSpec[] {
  return Object.freeze(
    rows.map(([mnemonic, code, description]) =>
      Object.freeze({ mnemonic, code, levelType, description })
    )
  );
}

export const PRESSURE_LEVEL_VARIABLES = table("pl", [
  ["Z", "129", "Geopotential"],
  ["Q", "133", "Specific humidity"],
  ["T", "130", "Temperature"],
  ["U", "131", "U component of wind"],
  ["V", "132", "V component of wind"],
]);

export const SINGLE_LEVEL_VARIABLES = table("sfc", [
  ["SP", "134", "Surface pressure"],
  ["MSL", "151", "Mean sea level pressure"],
  ["2T", "167", "2m temperature"],
  ["2D", "168", "2m dewpoint temperature"],
  ["10U", "165", "10m U wind component"],
  ["10V", "166", "10m V wind component"],
  ["SSTK", "34", "Sea surface temperature"],
  ["SKT", "235", "Skin temperature"],
  ["LSM", "172", "Land-sea mask"],
  ["CI", "31", "Sea ice cover"],
  ["SD", "141", "Snow depth"],
  ["RSN", "33", "Snow density"],
  ["SWVL1", "39", "Volumetric soil water layer 1"],
  ["SWVL2", "40", "Volumetric soil water layer 2"],
  ["SWVL3", "41", "Volumetric soil water layer 3"],
  ["SWVL4", "42", "Volumetric soil water layer 4"],
  ["STL1", "139", "Soil temperature level 1"],
  ["STL2", "170", "Soil temperature level 2"],
  ["STL3", "183", "Soil temperature level 3"],
  ["STL4", "236", "Soil temperature level 4"],
]);

export function variablesFor(levelType: LevelType): readonly VariableSpec[] {
  return levelType === "pl" ? PRESSURE_LEVEL_VARIABLES : SINGLE_LEVEL_VARIABLES;
}

/** Short name and grid kind used in RDA file names, keyed by parameter code. */
export const PARAMETER_NAMES: ReadonlyMap<string, ParameterName> = new Map<string, ParameterName>([
  ["129", { shortName: "z", gridKind: "sc" }],
  ["130", { shortName: "t", gridKind: "sc" }],
  ["131", { shortName: "u", gridKind: "uv" }],
  ["132", { shortName: "v", gridKind: "uv" }],
  ["133", { shortName: "q", gridKind: "sc" }],
  ["134", { shortName: "sp", gridKind: "sc" }],
  ["151", { shortName: "msl", gridKind: "sc" }],
  ["167", { shortName: "2t", gridKind: "sc" }],
  ["168", { shortName: "2d", gridKind: "sc" }],
  ["165", { shortName: "10u", gridKind: "sc" }],
  ["166", { shortName: "10v", gridKind: "sc" }],
  ["34", { shortName: "sstk", gridKind: "sc" }],
  ["235", { shortName: "skt", gridKind: "sc" }],
  ["172", { shortName: "lsm", gridKind: "sc" }],
  ["31", { shortName: "ci", gridKind: "sc" }],
  ["141", { shortName: "sd", gridKind: "sc" }],
  ["33", { shortName: "rsn", gridKind: "sc" }],
  ["39", { shortName: "swvl1", gridKind: "sc" }],
  ["40", { shortName: "swvl2", gridKind: "sc" }],
  ["41", { shortName: "swvl3", gridKind: "sc" }],
  ["42", { shortName: "swvl4", gridKind: "sc" }],
  ["139", { shortName: "stl1", gridKind: "sc" }],
  ["170", { shortName: "stl2", gridKind: "sc" }],
  ["183", { shortName: "stl3", gridKind: "sc" }],
  ["236", { shortName: "stl4", gridKind: "sc" }],
]);

/**
 * Look up a parameter code's file-name parts.
 * Throws LOOKUP_UNKNOWN_PARAMETER instead of guessing a name.
 */
export function lookupParameter(
  code: string,
  names: ReadonlyMap<string, ParameterName> = PARAMETER_NAMES
): ParameterName {
  const normalized = String(parseInt(code, 10));
  const entry = names.get(normalized);
  if (!entry) {
    throw unknownParameter(code);
  }
  return entry;
}

/**
 * Codes from the variable tables that the parameter name table lacks.
 */
export function findUnmappedCodes(
  tables: ReadonlyArray<readonly VariableSpec[]> = [PRESSURE_LEVEL_VARIABLES, SINGLE_LEVEL_VARIABLES],
  names: ReadonlyMap<string, ParameterName> = PARAMETER_NAMES
): string[] {
  return tables
    .flat()
    .filter((spec) => !names.has(spec.code))
    .map((spec) => spec.code);
}

/**
 * Startup check: every variable the tool can request must have a file name.
 */
export function assertParameterCoverage(
  tables?: ReadonlyArray<readonly VariableSpec[]>,
  names?: ReadonlyMap<string, ParameterName>
): void {
  const [missing] = findUnmappedCodes(tables, names);
  if (missing !== undefined) {
    throw unknownParameter(missing);
  }
}

// ---------------------------------------------------------------------------
// CDS request contents
// ---------------------------------------------------------------------------

export const CDS_PRESSURE_LEVEL_VARIABLES: readonly string[] = Object.freeze([
  "divergence",
  "fraction_of_cloud_cover",
  "geopotential",
  "ozone_mass_mixing_ratio",
  "potential_vorticity",
  "relative_humidity",
  "specific_cloud_ice_water_content",
  "specific_cloud_liquid_water_content",
  "specific_humidity",
  "specific_rain_water_content",
  "specific_snow_water_content",
  "temperature",
  "u_component_of_wind",
  "v_component_of_wind",
  "vertical_velocity",
  "vorticity",
]);

export const CDS_SINGLE_LEVEL_VARIABLES: readonly string[] = Object.freeze([
  "10m_u_component_of_wind",
  "10m_v_component_of_wind",
  "2m_dewpoint_temperature",
  "2m_temperature",
  "land_sea_mask",
  "mean_sea_level_pressure",
  "sea_ice_cover",
  "sea_surface_temperature",
  "skin_temperature",
  "snow_density",
  "snow_depth",
  "soil_temperature_level_1",
  "soil_temperature_level_2",
  "soil_temperature_level_3",
  "soil_temperature_level_4",
  "surface_pressure",
  "volumetric_soil_water_layer_1",
  "volumetric_soil_water_layer_2",
  "volumetric_soil_water_layer_3",
  "volumetric_soil_water_layer_4",
]);

export function cdsVariablesFor(levelType: LevelType): readonly string[] {
  return levelType === "pl" ? CDS_PRESSURE_LEVEL_VARIABLES : CDS_SINGLE_LEVEL_VARIABLES;
}

// ---------------------------------------------------------------------------
// Pressure level sets (hPa)
// ---------------------------------------------------------------------------

/** The 32 levels requested from CDS (10-1000 hPa). */
export const CDS_PRESSURE_LEVELS: readonly string[] = Object.freeze([
  "10", "20", "30", "50", "70",
  "100", "125", "150", "175", "200",
  "225", "250", "300", "350", "400",
  "450", "500", "550", "600", "650",
  "700", "750", "775", "800", "825",
  "850", "875", "900", "925", "950",
  "975", "1000",
]);

/** The full 37-level set contained in every RDA pressure-level file. */
export const RDA_PRESSURE_LEVELS: readonly string[] = Object.freeze([
  "1", "2", "3", "5", "7",
  ...CDS_PRESSURE_LEVELS,
]);

/** 00:00 through 23:00 */
export const HOURLY_TIMES: readonly string[] = Object.freeze(
  Array.from({ length: 24 }, (_, hour) => `${hour.toString().padStart(2, "0")}:00`)
);
