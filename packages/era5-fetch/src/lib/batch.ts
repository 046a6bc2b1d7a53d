import { mkdir } from "fs/promises";
import { join } from "path";
import type { DownloadUnit, RemoteTarget } from "./archive/types.js";
import { describeUnit, type Locator } from "./archive/locator.js";
import type { Logger } from "./logger.js";
import { createQueue } from "./queue.js";
import type { BatchGroup, BatchReporter } from "./reporter.js";
import type { TransferExecutor } from "./transfer/executor.js";
import { emptyResult, recordOutcome, type BatchResult, type TransferOutcome } from "./transfer/outcome.js";

export interface BatchOptions {
  group: BatchGroup;
  units: readonly DownloadUnit[];
  locator: Locator;
  executor: TransferExecutor;
  reporter: BatchReporter;
  logger: Logger;
  concurrency?: number;
}

interface LocatedUnit {
  label: string;
  target: RemoteTarget;
  path: string;
}

/**
 * Locate every unit first so a lookup error fails the run before any transfer.
 * Units that map to the same local file are kept once.
 */
function locateAll(units: readonly DownloadUnit[], locator: Locator, directory: string): LocatedUnit[] {
  const byPath = new Map<string, LocatedUnit>();
  for (const unit of units) {
    const target = locator.locate(unit);
    const path = join(directory, target.filename);
    if (!byPath.has(path)) {
      byPath.set(path, { label: describeUnit(unit), target, path });
    }
  }
  return [...byPath.values()];
}

/**
 * Transfer one variable group into its directory.
 * A failing unit is counted and the batch moves on; nothing escapes as an exception
 * once transfers have started.
 */
export async function runBatch(options: BatchOptions): Promise<BatchResult> {
  const { group, units, locator, executor, reporter, logger, concurrency = 1 } = options;
  const log = logger.child({ group: group.levelType });

  const located = locateAll(units, locator, group.directory);
  if (located.length < units.length) {
    log.debug("Duplicate targets dropped", { units: units.length, unique: located.length });
  }

  await mkdir(group.directory, { recursive: true });
  reporter.batchStart(group, located.length);

  let result = emptyResult();

  async function transferOne(entry: LocatedUnit): Promise<TransferOutcome> {
    reporter.unitStart(entry.label);
    let outcome: TransferOutcome;
    try {
      outcome = await executor.transfer(entry.target, group.directory);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      log.error("Unexpected transfer error", { file: entry.target.filename, error: message });
      outcome = { status: "failed", path: entry.path, reason: "NetworkError", message };
    }
    result = recordOutcome(result, outcome);
    reporter.unitDone(entry.label, outcome);
    return outcome;
  }

  const queue = createQueue<TransferOutcome>({ concurrency, logger: log });
  for (const entry of located) {
    queue.enqueue({ id: entry.path, execute: () => transferOne(entry) });
  }
  await queue.drain();

  reporter.batchEnd(group, result);
  const { averageLatencyMs, duplicates } = queue.getStats();
  log.debug("Batch finished", { ...result, directory: group.directory, averageLatencyMs, duplicates });
  return result;
}
