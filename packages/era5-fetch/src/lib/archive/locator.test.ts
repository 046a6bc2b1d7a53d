import { describe, it, expect } from "vitest";
import { RDA_BASE_URL, createLocator, describeUnit, locateBulk, locateDirect } from "./locator.js";
import { enumerateBulkUnits } from "./enumerate.js";
import { PRESSURE_LEVEL_VARIABLES, SINGLE_LEVEL_VARIABLES } from "./variables.js";
import type { BulkUnit, DirectUnit, VariableSpec } from "./types.js";

function variable(tableRows: readonly VariableSpec[], mnemonic: string): VariableSpec {
  const found = tableRows.find((v) => v.mnemonic === mnemonic);
  if (!found) throw new Error(`no variable ${mnemonic}`);
  return found;
}

function dailyUnit(mnemonic: string): DirectUnit {
  return {
    kind: "direct",
    temporal: { kind: "day", year: 2014, month: 5, day: 1 },
    variable: variable(PRESSURE_LEVEL_VARIABLES, mnemonic),
  };
}

function monthlyUnit(mnemonic: string, year: number, month: number): DirectUnit {
  return {
    kind: "direct",
    temporal: { kind: "month", year, month },
    variable: variable(SINGLE_LEVEL_VARIABLES, mnemonic),
  };
}

function bulkUnit(levelType: "pl" | "sfc"): BulkUnit {
  return enumerateBulkUnits({ year: 2020, month: 1, days: [3] }, levelType)[0];
}

function thrownBy(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error("expected a throw");
}

describe("locateDirect", () => {
  it("builds the daily pressure-level file name and URL", () => {
    const target = locateDirect(dailyUnit("Z"));

    expect(target.filename).toBe("e5.oper.an.pl.128_129_z.ll025sc.2014050100_2014050123.nc");
    expect(target.url).toBe(
      `${RDA_BASE_URL}/e5.oper.an.pl/201405/e5.oper.an.pl.128_129_z.ll025sc.2014050100_2014050123.nc`
    );
  });

  it("uses the uv grid for wind components", () => {
    expect(locateDirect(dailyUnit("U")).filename).toBe(
      "e5.oper.an.pl.128_131_u.ll025uv.2014050100_2014050123.nc"
    );
  });

  it("zero-pads short codes and spans the whole leap-year month", () => {
    const target = locateDirect(monthlyUnit("SSTK", 2016, 2));

    expect(target.filename).toBe("e5.oper.an.sfc.128_034_sstk.ll025sc.2016020100_2016022923.nc");
    expect(target.url).toBe(
      `${RDA_BASE_URL}/e5.oper.an.sfc/201602/e5.oper.an.sfc.128_034_sstk.ll025sc.2016020100_2016022923.nc`
    );
  });

  it("names every monthly surface file after its lower-cased mnemonic on the sc grid", () => {
    const names = SINGLE_LEVEL_VARIABLES.map((spec) => locateDirect(monthlyUnit(spec.mnemonic, 2014, 5)).filename);

    expect(names).toEqual([
      "e5.oper.an.sfc.128_134_sp.ll025sc.2014050100_2014053123.nc",
      "e5.oper.an.sfc.128_151_msl.ll025sc.2014050100_2014053123.nc",
      "e5.oper.an.sfc.128_167_2t.ll025sc.2014050100_2014053123.nc",
      "e5.oper.an.sfc.128_168_2d.ll025sc.2014050100_2014053123.nc",
      "e5.oper.an.sfc.128_165_10u.ll025sc.2014050100_2014053123.nc",
      "e5.oper.an.sfc.128_166_10v.ll025sc.2014050100_2014053123.nc",
      "e5.oper.an.sfc.128_034_sstk.ll025sc.2014050100_2014053123.nc",
      "e5.oper.an.sfc.128_235_skt.ll025sc.2014050100_2014053123.nc",
      "e5.oper.an.sfc.128_172_lsm.ll025sc.2014050100_2014053123.nc",
      "e5.oper.an.sfc.128_031_ci.ll025sc.2014050100_2014053123.nc",
      "e5.oper.an.sfc.128_141_sd.ll025sc.2014050100_2014053123.nc",
      "e5.oper.an.sfc.128_033_rsn.ll025sc.2014050100_2014053123.nc",
      "e5.oper.an.sfc.128_039_swvl1.ll025sc.2014050100_2014053123.nc",
      "e5.oper.an.sfc.128_040_swvl2.ll025sc.2014050100_2014053123.nc",
      "e5.oper.an.sfc.128_041_swvl3.ll025sc.2014050100_2014053123.nc",
      "e5.oper.an.sfc.128_042_swvl4.ll025sc.2014050100_2014053123.nc",
      "e5.oper.an.sfc.128_139_stl1.ll025sc.2014050100_2014053123.nc",
      "e5.oper.an.sfc.128_170_stl2.ll025sc.2014050100_2014053123.nc",
      "e5.oper.an.sfc.128_183_stl3.ll025sc.2014050100_2014053123.nc",
      "e5.oper.an.sfc.128_236_stl4.ll025sc.2014050100_2014053123.nc",
    ]);
  });

  it("ends a non-leap February on the 28th", () => {
    expect(locateDirect(monthlyUnit("2T", 2015, 2)).filename).toBe(
      "e5.oper.an.sfc.128_167_2t.ll025sc.2015020100_2015022823.nc"
    );
  });

  it("joins a configured base URL without doubling slashes", () => {
    const target = locateDirect(dailyUnit("T"), { baseUrl: "https://mirror.example.org/rda/" });

    expect(target.url).toBe(
      "https://mirror.example.org/rda/e5.oper.an.pl/201405/e5.oper.an.pl.128_130_t.ll025sc.2014050100_2014050123.nc"
    );
  });

  it("is deterministic", () => {
    const unit = dailyUnit("Q");
    expect(locateDirect(unit)).toEqual(locateDirect(unit));
  });

  it("refuses codes without a registered short name", () => {
    expect(thrownBy(() => locateDirect(dailyUnit("Z"), { parameterNames: new Map() }))).toMatchObject({
      code: "LOOKUP_UNKNOWN_PARAMETER",
    });
  });
});

describe("locateBulk", () => {
  it("describes a global pressure-level day in GRIB", () => {
    const target = locateBulk(bulkUnit("pl"));

    expect(target.dataset).toBe("reanalysis-era5-pressure-levels");
    expect(target.filename).toBe("era5_pl_20200103.grib");
    expect(target.request.year).toEqual(["2020"]);
    expect(target.request.month).toEqual(["01"]);
    expect(target.request.day).toEqual(["03"]);
    expect(target.request.time).toHaveLength(24);
    expect(target.request.pressure_level).toHaveLength(32);
    expect(target.request.data_format).toBe("grib");
    expect(target.request.download_format).toBe("unarchived");
    expect("area" in target.request).toBe(false);
  });

  it("adds the area and switches the extension for NetCDF", () => {
    const target = locateBulk(bulkUnit("sfc"), { area: [60, -10, 35, 30], format: "netcdf" });

    expect(target.dataset).toBe("reanalysis-era5-single-levels");
    expect(target.filename).toBe("era5_sl_20200103.nc");
    expect(target.request.area).toEqual([60, -10, 35, 30]);
    expect(target.request.data_format).toBe("netcdf");
    expect(target.request.pressure_level).toBeUndefined();
  });
});

describe("createLocator", () => {
  it("dispatches on the archive", () => {
    expect(createLocator("rda").locate(dailyUnit("Z")).kind).toBe("direct");
    expect(createLocator("cds").locate(bulkUnit("pl")).kind).toBe("bulk");
  });

  it("rejects units of the other archive", () => {
    expect(() => createLocator("rda").locate(bulkUnit("pl"))).toThrow(
      "The rda archive cannot locate bulk units"
    );
  });
});

describe("describeUnit", () => {
  it("labels daily, monthly and bulk units", () => {
    expect(describeUnit(dailyUnit("Z"))).toBe("[Z] Geopotential - 2014-05-01 (24h)");
    expect(describeUnit(monthlyUnit("SSTK", 2016, 2))).toBe(
      "[SSTK] Sea surface temperature - 2016-02 (monthly)"
    );
    expect(describeUnit(bulkUnit("pl"))).toBe("pressure levels 2020-01-03 (16 variables)");
  });
});
