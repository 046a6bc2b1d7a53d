import { describe, it, expect } from "vitest";
import {
  enumerateBulkUnits,
  enumerateDirectUnits,
  resolveDays,
  resolveVariableFilter,
  selectVariables,
} from "./enumerate.js";
import { CDS_PRESSURE_LEVELS, PRESSURE_LEVEL_VARIABLES, SINGLE_LEVEL_VARIABLES } from "./variables.js";

function thrownBy(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error("expected a throw");
}

describe("resolveDays", () => {
  it("expands an inclusive range", () => {
    expect(resolveDays(2016, 2, { startDay: 1, endDay: 5 })).toEqual([1, 2, 3, 4, 5]);
  });

  it("returns a single day", () => {
    expect(resolveDays(2014, 5, { day: 1 })).toEqual([1]);
  });

  it("expands a full leap-year February to 29 days", () => {
    const days = resolveDays(2016, 2, { fullMonth: true });
    expect(days).toHaveLength(29);
    expect(days[28]).toBe(29);
  });

  it("rejects an inverted range", () => {
    expect(thrownBy(() => resolveDays(2014, 5, { startDay: 10, endDay: 5 }))).toMatchObject({
      code: "CONFIG_INVALID_OPTION",
      message: "Invalid --start-day: start day 10 is after end day 5",
    });
  });

  it("rejects days beyond the end of the month", () => {
    expect(thrownBy(() => resolveDays(2015, 2, { day: 30 }))).toMatchObject({
      code: "CONFIG_INVALID_OPTION",
      message: "Invalid --day: expected a day from 1 to 28, got 30",
    });
  });

  it("requires some day selection", () => {
    expect(thrownBy(() => resolveDays(2014, 5, undefined))).toMatchObject({
      code: "CONFIG_MISSING_ARG",
    });
  });

  it("rejects years before the reanalysis starts", () => {
    expect(thrownBy(() => resolveDays(1939, 5, { day: 1 }))).toMatchObject({
      message: "Invalid --year: expected a year from 1940, got 1939",
    });
  });
});

describe("resolveVariableFilter", () => {
  it("returns undefined when no filter is given", () => {
    expect(resolveVariableFilter(undefined)).toBeUndefined();
    expect(resolveVariableFilter([])).toBeUndefined();
  });

  it("normalizes names to upper case", () => {
    expect(resolveVariableFilter(["z", " 2t "])).toEqual(new Set(["Z", "2T"]));
  });

  it("names the unknown variables", () => {
    expect(thrownBy(() => resolveVariableFilter(["Z", "FOO"]))).toMatchObject({
      code: "CONFIG_UNKNOWN_VARIABLE",
      message: "Unknown variable: FOO",
    });
  });

  it("rejects a filter made only of blanks", () => {
    expect(thrownBy(() => resolveVariableFilter([" "]))).toMatchObject({
      message: "Invalid --vars: no variable names given",
    });
  });
});

describe("selectVariables", () => {
  it("keeps table order", () => {
    const selected = selectVariables("pl", new Set(["T", "Z"]));
    expect(selected.map((v) => v.mnemonic)).toEqual(["Z", "T"]);
  });

  it("returns nothing for a group the filter does not touch", () => {
    expect(selectVariables("sfc", new Set(["Z"]))).toEqual([]);
  });
});

describe("enumerateDirectUnits", () => {
  const input = { year: 2016, month: 2, days: [1, 2, 3, 4, 5] };

  it("produces days outer, variables inner for pressure levels", () => {
    const units = enumerateDirectUnits(input, "pl", PRESSURE_LEVEL_VARIABLES);

    expect(units).toHaveLength(25);
    expect(units.slice(0, 5).map((u) => u.variable.mnemonic)).toEqual(["Z", "Q", "T", "U", "V"]);
    expect(units[0].temporal).toEqual({ kind: "day", year: 2016, month: 2, day: 1 });
    expect(units[5].temporal).toEqual({ kind: "day", year: 2016, month: 2, day: 2 });
    expect(units[5].variable.mnemonic).toBe("Z");
  });

  it("produces one monthly unit per single-level variable", () => {
    const units = enumerateDirectUnits(input, "sfc", SINGLE_LEVEL_VARIABLES);

    expect(units).toHaveLength(20);
    expect(units.every((u) => u.temporal.kind === "month")).toBe(true);
    expect(units[0].temporal).toEqual({ kind: "month", year: 2016, month: 2 });
  });
});

describe("enumerateBulkUnits", () => {
  const input = { year: 2020, month: 1, days: [1, 2, 3] };

  it("produces one pressure-level unit per day with the level set", () => {
    const units = enumerateBulkUnits(input, "pl");

    expect(units).toHaveLength(3);
    expect(units[2].temporal).toEqual({ kind: "day", year: 2020, month: 1, day: 3 });
    expect(units[0].levels).toEqual(CDS_PRESSURE_LEVELS);
    expect(units[0].variables).toHaveLength(16);
  });

  it("leaves levels off single-level units", () => {
    const units = enumerateBulkUnits(input, "sfc");

    expect(units).toHaveLength(3);
    expect(units[0].levels).toBeUndefined();
    expect(units[0].variables).toHaveLength(20);
  });
});
