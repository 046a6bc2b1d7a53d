import { invalidOption, missingArgument, unknownVariables } from "../errors/catalog.js";
import { daysInMonth } from "./calendar.js";
import type { BulkUnit, DirectUnit, LevelType, VariableSpec } from "./types.js";
import {
  CDS_PRESSURE_LEVELS,
  PRESSURE_LEVEL_VARIABLES,
  SINGLE_LEVEL_VARIABLES,
  cdsVariablesFor,
  variablesFor,
} from "./variables.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type DaySelection =
  | { day: number }
  | { startDay: number; endDay: number }
  | { fullMonth: true };

export interface EnumerationInput {
  year: number;
  month: number;
  /** Ordered, validated day numbers */
  days: readonly number[];
}

/** ERA5 starts in January 1940. */
export const FIRST_YEAR = 1940;

// ---------------------------------------------------------------------------
// Validation
// ---------------------------------------------------------------------------

export function validateYearMonth(year: number, month: number): void {
  if (!Number.isInteger(year) || year < FIRST_YEAR || year > 9999) {
    throw invalidOption("year", `expected a year from ${FIRST_YEAR}, got ${year}`);
  }
  if (!Number.isInteger(month) || month < 1 || month > 12) {
    throw invalidOption("month", `expected 1-12, got ${month}`);
  }
}

function checkDay(option: string, day: number, lastDay: number): void {
  if (!Number.isInteger(day) || day < 1 || day > lastDay) {
    throw invalidOption(option, `expected a day from 1 to ${lastDay}, got ${day}`);
  }
}

/**
 * Expand a day selection into the ordered day list for one month.
 * Empty or inverted ranges are configuration errors, never an empty list.
 */
export function resolveDays(
  year: number,
  month: number,
  selection: DaySelection | undefined
): number[] {
  validateYearMonth(year, month);
  const lastDay = daysInMonth(year, month);

  if (!selection) {
    throw missingArgument("--day, --start-day/--end-day or --full-month", "download", [
      "era5-fetch download --year 2014 --month 5 --day 1",
      "era5-fetch download --year 2014 --month 5 --start-day 1 --end-day 5",
      "era5-fetch download --year 2014 --month 5 --full-month",
    ]);
  }

  if ("fullMonth" in selection) {
    return range(1, lastDay);
  }

  if ("day" in selection) {
    checkDay("day", selection.day, lastDay);
    return [selection.day];
  }

  checkDay("start-day", selection.startDay, lastDay);
  checkDay("end-day", selection.endDay, lastDay);
  if (selection.startDay > selection.endDay) {
    throw invalidOption(
      "start-day",
      `start day ${selection.startDay} is after end day ${selection.endDay}`
    );
  }
  return range(selection.startDay, selection.endDay);
}

function range(from: number, to: number): number[] {
  return Array.from({ length: to - from + 1 }, (_, i) => from + i);
}

/**
 * Validate a variable filter against both tables.
 * Returns the normalized mnemonics, or undefined when every variable is wanted.
 */
export function resolveVariableFilter(
  filter: readonly string[] | undefined
): ReadonlySet<string> | undefined {
  if (!filter || filter.length === 0) return undefined;

  const known = [...PRESSURE_LEVEL_VARIABLES, ...SINGLE_LEVEL_VARIABLES].map((v) => v.mnemonic);
  const requested = filter.map((name) => name.trim().toUpperCase()).filter(Boolean);
  const unknown = requested.filter((name) => !known.includes(name));

  if (unknown.length > 0) {
    throw unknownVariables(unknown, known);
  }
  if (requested.length === 0) {
    throw invalidOption("vars", "no variable names given");
  }
  return new Set(requested);
}

/**
 * Variables of one level group that pass the filter, in table order.
 */
export function selectVariables(
  levelType: LevelType,
  filter?: ReadonlySet<string>
): VariableSpec[] {
  const all = variablesFor(levelType);
  return filter ? all.filter((spec) => filter.has(spec.mnemonic)) : [...all];
}

// ---------------------------------------------------------------------------
// Enumeration
// ---------------------------------------------------------------------------

/**
 * Direct-URL units.
 * Pressure levels: one file per day per variable (days outer, variables inner).
 * Single levels: one file per variable covering the whole month.
 */
export function enumerateDirectUnits(
  input: EnumerationInput,
  levelType: LevelType,
  variables: readonly VariableSpec[]
): DirectUnit[] {
  const { year, month, days } = input;

  if (levelType === "sfc") {
    return variables.map((variable): DirectUnit => ({
      kind: "direct",
      temporal: { kind: "month", year, month },
      variable,
    }));
  }

  return days.flatMap((day) =>
    variables.map((variable): DirectUnit => ({
      kind: "direct",
      temporal: { kind: "day", year, month, day },
      variable,
    }))
  );
}

/**
 * Bulk-request units: one per day covering the group's fixed variable list.
 */
export function enumerateBulkUnits(input: EnumerationInput, levelType: LevelType): BulkUnit[] {
  const { year, month, days } = input;
  const variables = cdsVariablesFor(levelType);

  return days.map((day): BulkUnit => ({
    kind: "bulk",
    temporal: { kind: "day", year, month, day },
    levelType,
    variables,
    ...(levelType === "pl" && { levels: CDS_PRESSURE_LEVELS }),
  }));
}
