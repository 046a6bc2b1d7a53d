import { join } from "path";
import type { ArchiveKind, BoundingBox, DataFormat, DownloadUnit, LevelType } from "./archive/types.js";
import { enumerateBulkUnits, enumerateDirectUnits, selectVariables } from "./archive/enumerate.js";
import { createLocator } from "./archive/locator.js";
import { assertParameterCoverage } from "./archive/variables.js";
import { createCdsTransport } from "./adapters/cds-transport.js";
import { createDirectHttpTransport } from "./adapters/direct-http-transport.js";
import { runBatch } from "./batch.js";
import type { ResolvedConfig } from "./config.js";
import { authMissing } from "./errors/catalog.js";
import type { FetchLike } from "./http.js";
import type { Logger } from "./logger.js";
import type { Clock } from "./ports/clock.js";
import type { DelayFn } from "./ports/timer.js";
import type { Transport } from "./ports/transport.js";
import type { BatchGroup, BatchReporter } from "./reporter.js";
import { createTransferExecutor, type CredentialResolver } from "./transfer/executor.js";
import { exitCodeFor, mergeResults, type GroupResult, type RunSummary } from "./transfer/outcome.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Everything a run needs to know, validated by the command layer. */
export interface DownloadPlan {
  archive: ArchiveKind;
  year: number;
  month: number;
  days: readonly number[];
  /** Upper-case mnemonics; absent means every variable (direct archive only) */
  variables?: ReadonlySet<string>;
  outDir: string;
  skipPressure: boolean;
  skipSingle: boolean;
  area?: BoundingBox;
  format: DataFormat;
}

export type TransferSettings = Pick<
  ResolvedConfig,
  | "timeoutMs"
  | "attempts"
  | "retryDelayMs"
  | "concurrency"
  | "rdaBaseUrl"
  | "pollIntervalMs"
  | "pollMaxAttempts"
>;

export interface RunDependencies {
  settings: TransferSettings;
  credentials: CredentialResolver & { describe(): string[] };
  reporter: BatchReporter;
  logger: Logger;
  clock: Clock;
  /** Replaces the archive's network transport */
  transport?: Transport;
  fetchImpl?: FetchLike;
  delay?: DelayFn;
}

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

const GROUP_DIRECTORIES: Record<ArchiveKind, Record<LevelType, string>> = {
  rda: { pl: "pressure_levels", sfc: "single_levels" },
  cds: { pl: "p_levels", sfc: "s_levels" },
};

const GROUP_LABELS: Record<LevelType, string> = {
  pl: "Pressure levels",
  sfc: "Single levels",
};

// ---------------------------------------------------------------------------
// Implementation
// ---------------------------------------------------------------------------

export function groupDirectory(outDir: string, archive: ArchiveKind, levelType: LevelType): string {
  return join(outDir, GROUP_DIRECTORIES[archive][levelType]);
}

export function requestedGroups(plan: Pick<DownloadPlan, "skipPressure" | "skipSingle">): LevelType[] {
  const groups: LevelType[] = [];
  if (!plan.skipPressure) groups.push("pl");
  if (!plan.skipSingle) groups.push("sfc");
  return groups;
}

export function enumerateGroup(plan: DownloadPlan, levelType: LevelType): DownloadUnit[] {
  const input = { year: plan.year, month: plan.month, days: plan.days };
  if (plan.archive === "cds") {
    return enumerateBulkUnits(input, levelType);
  }
  return enumerateDirectUnits(input, levelType, selectVariables(levelType, plan.variables));
}

function createTransport(archive: ArchiveKind, deps: RunDependencies): Transport {
  if (deps.transport) return deps.transport;
  if (archive === "rda") return createDirectHttpTransport(deps.fetchImpl);
  return createCdsTransport({
    pollIntervalMs: deps.settings.pollIntervalMs,
    pollMaxAttempts: deps.settings.pollMaxAttempts,
    logger: deps.logger,
    fetchImpl: deps.fetchImpl,
    delay: deps.delay,
  });
}

/**
 * Run the requested level groups in order (pressure levels first) and
 * summarize. Throws only before the first transfer: missing credentials
 * for the whole run, or a naming table that does not cover its variables.
 */
export async function runDownloads(plan: DownloadPlan, deps: RunDependencies): Promise<RunSummary> {
  const { settings, credentials, reporter, logger, clock } = deps;
  const startedAt = clock.now();
  const log = logger.child({ archive: plan.archive });

  assertParameterCoverage();

  const resolved = credentials.resolve(plan.archive);
  if (!resolved) {
    throw authMissing(plan.archive, credentials.describe());
  }
  log.debug("Using credentials", { source: resolved.source });

  const locator = createLocator(plan.archive, {
    baseUrl: settings.rdaBaseUrl,
    area: plan.area,
    format: plan.format,
  });
  const executor = createTransferExecutor({
    archive: plan.archive,
    transport: createTransport(plan.archive, deps),
    credentials,
    timeoutMs: settings.timeoutMs,
    attempts: settings.attempts,
    retryDelayMs: settings.retryDelayMs,
    logger: log,
    delay: deps.delay,
  });

  const groups: GroupResult[] = [];
  for (const levelType of requestedGroups(plan)) {
    const group: BatchGroup = {
      levelType,
      label: GROUP_LABELS[levelType],
      directory: groupDirectory(plan.outDir, plan.archive, levelType),
    };
    const units = enumerateGroup(plan, levelType);
    if (units.length === 0) {
      log.info("No variables selected for group, skipping", { group: levelType });
      continue;
    }

    const result = await runBatch({
      group,
      units,
      locator,
      executor,
      reporter,
      logger: log,
      concurrency: settings.concurrency,
    });
    groups.push({ levelType, directory: group.directory, result });
  }

  const total = mergeResults(...groups.map((g) => g.result));
  const summary: RunSummary = {
    archive: plan.archive,
    groups,
    total,
    elapsedMs: clock.now() - startedAt,
    exitCode: exitCodeFor(total),
  };
  reporter.runEnd(summary);
  return summary;
}
