import { afterEach, beforeAll, beforeEach, describe, it, expect, vi, type MockInstance } from "vitest";
import { Command } from "commander";
import chalk from "chalk";
import { initContext, resetContext } from "../lib/cli-context.js";
import { describeVariables, registerVariablesCommands } from "./variables.js";

beforeAll(() => {
  chalk.level = 0;
});

describe("describeVariables", () => {
  it("lists RDA mnemonics with codes and the 37 file levels", () => {
    const { archive, groups } = describeVariables("rda");

    expect(archive).toBe("rda");
    expect(groups.map((g) => g.levelType)).toEqual(["pl", "sfc"]);
    expect(groups[0].variables[0]).toEqual({ name: "Z", code: "129", description: "Geopotential" });
    expect(groups[0].levels).toHaveLength(37);
    expect(groups[1].variables).toHaveLength(20);
    expect(groups[1].levels).toBeUndefined();
  });

  it("lists CDS request names and the 32 requested levels", () => {
    const { groups } = describeVariables("cds");

    expect(groups[0].variables).toHaveLength(16);
    expect(groups[0].variables).toContainEqual({ name: "geopotential" });
    expect(groups[0].levels?.[0]).toBe("10");
    expect(groups[0].levels).toHaveLength(32);
    expect(groups[1].variables).toContainEqual({ name: "2m_temperature" });
  });
});

describe("variables command", () => {
  let program: Command;
  let consoleLogSpy: MockInstance;

  beforeEach(() => {
    program = new Command();
    program.exitOverride();
    registerVariablesCommands(program);
    consoleLogSpy = vi.spyOn(console, "log").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
    resetContext();
  });

  it("prints a table per level group for the default archive", async () => {
    await program.parseAsync(["variables"], { from: "user" });

    const lines = consoleLogSpy.mock.calls.map(([line]) => String(line));
    expect(lines[0]).toBe("\nPressure levels (rda)");
    expect(lines[1]).toMatch(/│ Z\s+│ 129\s+│ Geopotential\s+│/);
    expect(lines[2]).toMatch(/^Levels \(hPa\): 1, 2, 3, 5, 7, 10,/);
    expect(lines[3]).toBe("\nSingle levels (rda)");
    expect(lines[lines.length - 1]).toBe("\nSelect a subset with --vars, e.g. --vars Z,T,2T");
  });

  it("prints request names without codes for the CDS archive", async () => {
    await program.parseAsync(["variables", "--archive", "cds"], { from: "user" });

    const lines = consoleLogSpy.mock.calls.map(([line]) => String(line));
    expect(lines[0]).toBe("\nPressure levels (cds)");
    expect(lines[1]).toMatch(/│ geopotential\s+│/);
    expect(lines[3]).toBe("\nSingle levels (cds)");
    expect(lines).toHaveLength(5);
    expect(lines[4]).toMatch(/│ 2m_temperature\s+│/);
  });

  it("prints the listing as JSON in JSON mode", async () => {
    initContext(["node", "test", "--json"], {});

    await program.parseAsync(["variables", "--archive", "cds"], { from: "user" });

    expect(consoleLogSpy).toHaveBeenCalledTimes(1);
    expect(JSON.parse(String(consoleLogSpy.mock.calls[0][0]))).toEqual({
      success: true,
      data: describeVariables("cds"),
    });
  });

  it("rejects an unknown archive", async () => {
    await expect(
      program.parseAsync(["variables", "--archive", "mars"], { from: "user" })
    ).rejects.toMatchObject({ code: "CONFIG_INVALID_OPTION" });
  });
});
