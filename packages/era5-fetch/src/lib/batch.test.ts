import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";
import { existsSync } from "fs";
import { mkdtemp, rm } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { createLocator } from "./archive/locator.js";
import type { DirectUnit, RemoteTarget } from "./archive/types.js";
import { PRESSURE_LEVEL_VARIABLES } from "./archive/variables.js";
import { runBatch } from "./batch.js";
import { createNoopLogger, type Logger } from "./logger.js";
import type { BatchGroup, BatchReporter } from "./reporter.js";
import type { TransferExecutor } from "./transfer/executor.js";
import type { TransferOutcome } from "./transfer/outcome.js";

function recordingReporter() {
  const events: string[] = [];
  const reporter: BatchReporter = {
    batchStart: (group, units) => events.push(`start ${group.levelType} ${units}`),
    unitStart: (unit) => events.push(`unit ${unit}`),
    unitDone: (_unit, outcome) => events.push(`done ${outcome.status}`),
    batchEnd: (group, result) =>
      events.push(`end ${group.levelType} ${result.downloaded}/${result.skipped}/${result.failed}`),
    runEnd: () => events.push("run end"),
  };
  return { reporter, events };
}

function unitsFor(mnemonics: string[], day = 1): DirectUnit[] {
  return mnemonics.map((mnemonic) => {
    const variable = PRESSURE_LEVEL_VARIABLES.find((v) => v.mnemonic === mnemonic);
    if (!variable) throw new Error(`no variable ${mnemonic}`);
    return { kind: "direct", temporal: { kind: "day", year: 2014, month: 5, day }, variable };
  });
}

describe("runBatch", () => {
  let dir: string;
  let group: BatchGroup;
  const locator = createLocator("rda", { baseUrl: "https://archive.example.org" });

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "era5-batch-"));
    group = { levelType: "pl", label: "Pressure levels", directory: join(dir, "pressure_levels") };
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  function executorFrom(handler: (target: RemoteTarget, localDir: string) => Promise<TransferOutcome>) {
    const transfer = vi.fn(handler);
    const executor: TransferExecutor = { transfer };
    return { executor, transfer };
  }

  it("attempts every unit and counts failures without stopping", async () => {
    const { executor, transfer } = executorFrom(async (target, localDir) => {
      const path = join(localDir, target.filename);
      return target.filename.includes("_133_")
        ? { status: "downloaded", path, bytes: 4096 }
        : { status: "failed", path, reason: "ServerError", message: "Archive returned 503" };
    });
    const { reporter, events } = recordingReporter();

    const result = await runBatch({
      group,
      units: unitsFor(["Z", "Q", "T"]),
      locator,
      executor,
      reporter,
      logger: createNoopLogger(),
    });

    expect(result).toEqual({ downloaded: 1, skipped: 0, failed: 2 });
    expect(transfer).toHaveBeenCalledTimes(3);
    expect(events).toEqual([
      "start pl 3",
      "unit [Z] Geopotential - 2014-05-01 (24h)",
      "done failed",
      "unit [Q] Specific humidity - 2014-05-01 (24h)",
      "done downloaded",
      "unit [T] Temperature - 2014-05-01 (24h)",
      "done failed",
      "end pl 1/0/2",
    ]);
  });

  it("creates the group directory before transferring", async () => {
    const { executor } = executorFrom(async (target, localDir) => ({
      status: "skipped",
      path: join(localDir, target.filename),
      reason: "AlreadyExists",
    }));

    await runBatch({
      group,
      units: unitsFor(["Z"]),
      locator,
      executor,
      reporter: recordingReporter().reporter,
      logger: createNoopLogger(),
    });

    expect(existsSync(group.directory)).toBe(true);
  });

  it("transfers units that share a file only once", async () => {
    const { executor, transfer } = executorFrom(async (target, localDir) => ({
      status: "downloaded",
      path: join(localDir, target.filename),
      bytes: 2048,
    }));
    const { reporter, events } = recordingReporter();

    const result = await runBatch({
      group,
      units: [...unitsFor(["Z", "T"]), ...unitsFor(["Z"])],
      locator,
      executor,
      reporter,
      logger: createNoopLogger(),
    });

    expect(transfer).toHaveBeenCalledTimes(2);
    expect(result).toEqual({ downloaded: 2, skipped: 0, failed: 0 });
    expect(events[0]).toBe("start pl 2");
  });

  it("logs the counts and queue latency when the batch ends", async () => {
    const { executor } = executorFrom(async (target, localDir) => ({
      status: "downloaded",
      path: join(localDir, target.filename),
      bytes: 2048,
    }));
    const logger: Logger = {
      debug: vi.fn(),
      info: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
      child: vi.fn().mockReturnThis(),
    };

    await runBatch({
      group,
      units: unitsFor(["Z", "T"]),
      locator,
      executor,
      reporter: recordingReporter().reporter,
      logger,
    });

    expect(logger.child).toHaveBeenCalledWith({ group: "pl" });
    expect(logger.debug).toHaveBeenLastCalledWith("Batch finished", {
      downloaded: 2,
      skipped: 0,
      failed: 0,
      directory: group.directory,
      averageLatencyMs: expect.any(Number),
      duplicates: 0,
    });
  });

  it("turns an unexpected executor error into a failed unit", async () => {
    const { executor } = executorFrom(async () => {
      throw new Error("disk full");
    });
    const { reporter } = recordingReporter();
    const unitDone = vi.spyOn(reporter, "unitDone");

    const result = await runBatch({
      group,
      units: unitsFor(["Z"]),
      locator,
      executor,
      reporter,
      logger: createNoopLogger(),
    });

    const { filename } = locator.locate(unitsFor(["Z"])[0]);
    expect(result).toEqual({ downloaded: 0, skipped: 0, failed: 1 });
    expect(unitDone).toHaveBeenCalledWith("[Z] Geopotential - 2014-05-01 (24h)", {
      status: "failed",
      path: join(group.directory, filename),
      reason: "NetworkError",
      message: "disk full",
    });
  });

  it("fails before any transfer when a unit cannot be located", async () => {
    const { executor, transfer } = executorFrom(async () => {
      throw new Error("unreachable");
    });
    const unknown: DirectUnit = {
      kind: "direct",
      temporal: { kind: "day", year: 2014, month: 5, day: 1 },
      variable: { mnemonic: "XX", code: "999", levelType: "pl", description: "Unknown" },
    };

    await expect(
      runBatch({
        group,
        units: [...unitsFor(["Z"]), unknown],
        locator,
        executor,
        reporter: recordingReporter().reporter,
        logger: createNoopLogger(),
      })
    ).rejects.toMatchObject({ code: "LOOKUP_UNKNOWN_PARAMETER" });
    expect(transfer).not.toHaveBeenCalled();
  });
});
