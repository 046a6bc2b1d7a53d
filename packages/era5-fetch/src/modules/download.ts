import { Command } from "commander";
import { resolveDays, resolveVariableFilter, type DaySelection } from "../lib/archive/enumerate.js";
import type { ArchiveKind } from "../lib/archive/types.js";
import { getContext, type CLIContext } from "../lib/cli-context.js";
import {
  loadConfig,
  MAX_ATTEMPTS,
  MAX_CONCURRENCY,
  MAX_TIMEOUT_MS,
  MIN_TIMEOUT_MS,
  type ResolvedConfig,
} from "../lib/config.js";
import { createCredentialChain, type CredentialStore } from "../lib/credentials.js";
import { invalidOption, missingArgument } from "../lib/errors/catalog.js";
import { createLogger } from "../lib/logger.js";
import { parseArchive, parseArea, parseFormat, parseIntegerOption, parseList } from "../lib/options.js";
import { getOutputMode } from "../lib/output/mode.js";
import type { Clock } from "../lib/ports/clock.js";
import type { Transport } from "../lib/ports/transport.js";
import { systemClock } from "../lib/adapters/system-clock.js";
import { createReporter, type BatchReporter } from "../lib/reporter.js";
import { runDownloads, type DownloadPlan } from "../lib/run.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface DownloadCommandOptions {
  year?: string;
  month?: string;
  day?: string;
  startDay?: string;
  endDay?: string;
  fullMonth?: boolean;
  archive?: string;
  vars?: string;
  area?: string;
  format?: string;
  outDir?: string;
  skipPressure?: boolean;
  skipSingle?: boolean;
  concurrency?: string;
  config?: string;
}

export interface DownloadDependencies {
  store?: CredentialStore;
  env?: NodeJS.ProcessEnv;
  clock?: Clock;
  transport?: Transport;
  reporter?: BatchReporter;
}

const EXAMPLES = [
  "era5-fetch download --year 2014 --month 5 --day 1",
  "era5-fetch download --year 2016 --month 2 --start-day 1 --end-day 5 --vars Z,T,2T",
  "era5-fetch download --archive cds --year 2020 --month 1 --full-month --area 60,-10,35,30",
];

// ---------------------------------------------------------------------------
// Option handling
// ---------------------------------------------------------------------------

/**
 * Config values the command line overrides.
 */
export function cliOverrides(
  options: DownloadCommandOptions,
  context: Pick<CLIContext, "timeout" | "retry">
): Partial<ResolvedConfig> {
  return {
    archive: options.archive !== undefined ? parseArchive(options.archive) : undefined,
    outDir: options.outDir,
    format: options.format !== undefined ? parseFormat(options.format) : undefined,
    concurrency:
      options.concurrency !== undefined
        ? parseIntegerOption("concurrency", options.concurrency, 1, MAX_CONCURRENCY)
        : undefined,
    timeoutMs:
      context.timeout !== undefined
        ? parseIntegerOption("timeout", context.timeout, MIN_TIMEOUT_MS, MAX_TIMEOUT_MS)
        : undefined,
    attempts:
      context.retry !== undefined ? parseIntegerOption("retry", context.retry, 1, MAX_ATTEMPTS) : undefined,
  };
}

function daySelection(options: DownloadCommandOptions): DaySelection | undefined {
  const ranged = options.startDay !== undefined || options.endDay !== undefined;
  const given = [options.day !== undefined, ranged, options.fullMonth === true].filter(Boolean).length;
  if (given > 1) {
    throw invalidOption("day", "use only one of --day, --start-day/--end-day or --full-month");
  }

  if (options.fullMonth) return { fullMonth: true };
  if (options.day !== undefined) {
    return { day: parseIntegerOption("day", options.day, 1, 31) };
  }
  if (ranged) {
    if (options.startDay === undefined) throw missingArgument("--start-day", "download", EXAMPLES);
    if (options.endDay === undefined) throw missingArgument("--end-day", "download", EXAMPLES);
    return {
      startDay: parseIntegerOption("start-day", options.startDay, 1, 31),
      endDay: parseIntegerOption("end-day", options.endDay, 1, 31),
    };
  }
  return undefined;
}

function rejectForArchive(archive: ArchiveKind, option: string, supported: ArchiveKind, reason: string): never {
  throw invalidOption(option, `not supported by the ${archive} archive (${reason})`, [supported]);
}

/**
 * Validate the command line against the resolved config.
 * Everything that can be wrong with the request fails here, before any transfer.
 */
export function buildPlan(options: DownloadCommandOptions, config: ResolvedConfig): DownloadPlan {
  if (options.year === undefined) throw missingArgument("--year", "download", EXAMPLES);
  if (options.month === undefined) throw missingArgument("--month", "download", EXAMPLES);

  const year = parseIntegerOption("year", options.year, 0, 9999);
  const month = parseIntegerOption("month", options.month, 1, 12);
  const days = resolveDays(year, month, daySelection(options));
  const { archive } = config;

  if (options.skipPressure && options.skipSingle) {
    throw invalidOption("skip-single", "--skip-pressure and --skip-single together leave nothing to download");
  }

  if (archive === "cds" && options.vars !== undefined) {
    rejectForArchive(archive, "vars", "rda", "bulk requests carry a fixed variable list");
  }
  if (archive === "rda" && options.area !== undefined) {
    rejectForArchive(archive, "area", "cds", "files are global");
  }
  if (archive === "rda" && options.format !== undefined) {
    rejectForArchive(archive, "format", "cds", "files are always NetCDF");
  }

  const variables = options.vars !== undefined ? resolveVariableFilter(parseList(options.vars)) : undefined;
  if (options.vars !== undefined && !variables) {
    throw invalidOption("vars", "no variable names given");
  }

  return {
    archive,
    year,
    month,
    days,
    variables,
    outDir: config.outDir,
    skipPressure: options.skipPressure === true,
    skipSingle: options.skipSingle === true,
    area: options.area !== undefined ? parseArea(options.area) : undefined,
    format: config.format,
  };
}

// ---------------------------------------------------------------------------
// Command Registration
// ---------------------------------------------------------------------------

export function registerDownloadCommands(program: Command, deps: DownloadDependencies = {}): void {
  program
    .command("download")
    .description("Download ERA5 pressure-level and single-level files for a month or part of one")
    .option("-y, --year <year>", "Year (1940 or later)")
    .option("-m, --month <month>", "Month (1-12)")
    .option("-d, --day <day>", "Single day of the month")
    .option("--start-day <day>", "First day of a range (inclusive)")
    .option("--end-day <day>", "Last day of a range (inclusive)")
    .option("--full-month", "Every day of the month")
    .option("-a, --archive <name>", "Source archive: rda or cds")
    .option("--vars <list>", "Comma-separated variable names, e.g. Z,T,2T (rda only)")
    .option("--area <N,W,S,E>", "Bounding box in degrees (cds only)")
    .option("--format <format>", "grib or netcdf (cds only)")
    .option("-o, --out-dir <dir>", "Output directory")
    .option("--skip-pressure", "Skip pressure-level files")
    .option("--skip-single", "Skip single-level files")
    .option("-c, --concurrency <n>", `Parallel transfers (1-${MAX_CONCURRENCY})`)
    .option("--config <path>", "Use this config file instead of the system and user files")
    .addHelpText("after", `\nExamples:\n${EXAMPLES.map((e) => `  $ ${e}`).join("\n")}\n`)
    .action(async (options: DownloadCommandOptions) => {
      const context = getContext();
      const { config, sources } = loadConfig(options.config, cliOverrides(options, context));
      const plan = buildPlan(options, config);

      const logger = createLogger({
        level: config.logLevel,
        json: config.logJson || context.json,
        stderr: true,
      });
      logger.debug("Configuration loaded", { sources, archive: config.archive });

      const reporter =
        deps.reporter ?? createReporter({ mode: getOutputMode(), quiet: context.quiet });
      const credentials = createCredentialChain({
        env: deps.env,
        store: deps.store,
        cdsUrl: config.cdsUrl,
      });

      const summary = await runDownloads(plan, {
        settings: config,
        credentials,
        reporter,
        logger,
        clock: deps.clock ?? systemClock,
        transport: deps.transport,
      });

      if (summary.exitCode !== 0) {
        process.exitCode = summary.exitCode;
      }
    });
}
