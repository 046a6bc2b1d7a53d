import chalk from "chalk";
import type { LevelType } from "./archive/types.js";
import { outputNdjson } from "./json-output.js";
import type { OutputMode } from "./output/mode.js";
import { createSpinner, type Spinner } from "./spinner.js";
import type { BatchResult, RunSummary, TransferOutcome } from "./transfer/outcome.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface BatchGroup {
  levelType: LevelType;
  /** Human name, e.g. "Pressure levels" */
  label: string;
  directory: string;
}

/**
 * Receives progress from the batch aggregator and run driver.
 * Calls for different units may interleave when concurrency > 1.
 */
export interface BatchReporter {
  batchStart(group: BatchGroup, units: number): void;
  unitStart(unit: string): void;
  unitDone(unit: string, outcome: TransferOutcome): void;
  batchEnd(group: BatchGroup, result: BatchResult): void;
  runEnd(summary: RunSummary): void;
}

export interface ReporterOptions {
  mode: OutputMode;
  /** Only failures and summaries are printed */
  quiet?: boolean;
  write?: (line: string) => void;
  spinner?: Spinner;
  now?: () => Date;
}

// ---------------------------------------------------------------------------
// Formatting
// ---------------------------------------------------------------------------

export function formatSize(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`;
  if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)} KB`;
  return `${(bytes / 1024 / 1024).toFixed(2)} MB`;
}

export function formatElapsed(ms: number): string {
  const totalSeconds = Math.round(ms / 1000);
  const hours = Math.floor(totalSeconds / 3600);
  const minutes = Math.floor((totalSeconds % 3600) / 60);
  const seconds = totalSeconds % 60;
  if (hours > 0) return `${hours}h ${minutes}m ${seconds}s`;
  if (minutes > 0) return `${minutes}m ${seconds}s`;
  return `${seconds}s`;
}

export function formatCounts(result: BatchResult): string {
  return `${result.downloaded} downloaded, ${result.skipped} skipped, ${result.failed} failed`;
}

// ---------------------------------------------------------------------------
// Console reporter
// ---------------------------------------------------------------------------

function outcomeLine(unit: string, outcome: TransferOutcome): string {
  switch (outcome.status) {
    case "downloaded":
      return `  ${chalk.green("✓")} ${unit} ${chalk.dim(`(${formatSize(outcome.bytes)})`)}`;
    case "skipped":
      return `  ${chalk.dim("-")} ${unit} ${chalk.dim("(already on disk)")}`;
    case "failed":
      return `  ${chalk.red("✗")} ${unit} ${chalk.red(`[${outcome.reason}] ${outcome.message}`)}`;
  }
}

/**
 * Human-readable progress on stderr: a spinner for the unit in flight,
 * one line per resolved unit, one summary line per batch and per run.
 */
export function createConsoleReporter(options: ReporterOptions): BatchReporter {
  const {
    mode,
    quiet = false,
    write = (line: string) => console.error(line),
    spinner = createSpinner(mode),
  } = options;
  const inFlight: string[] = [];

  function print(line: string): void {
    const spinning = spinner.isSpinning;
    if (spinning) spinner.stop();
    write(line);
    if (spinning && inFlight.length > 0) spinner.start(inFlight[0]);
  }

  return {
    batchStart(group, units) {
      print("");
      print(`${chalk.bold(group.label)} ${chalk.dim(`(${units} files)`)} ${chalk.dim("→")} ${group.directory}`);
    },

    unitStart(unit) {
      inFlight.push(unit);
      if (!spinner.isSpinning) spinner.start(unit);
    },

    unitDone(unit, outcome) {
      const index = inFlight.indexOf(unit);
      if (index !== -1) inFlight.splice(index, 1);
      if (inFlight.length === 0) spinner.stop();

      if (quiet && outcome.status !== "failed") return;
      print(outcomeLine(unit, outcome));
    },

    batchEnd(group, result) {
      const colour = result.failed > 0 ? chalk.yellow : chalk.green;
      print(colour(`${group.label}: ${formatCounts(result)}`));
    },

    runEnd(summary) {
      const { total, elapsedMs, exitCode } = summary;
      print("");
      const line = `Finished in ${formatElapsed(elapsedMs)}: ${formatCounts(total)}`;
      print(exitCode === 0 ? chalk.green.bold(line) : chalk.red.bold(line));
    },
  };
}

// ---------------------------------------------------------------------------
// JSON reporter
// ---------------------------------------------------------------------------

/**
 * NDJSON events on stdout, one per line.
 */
export function createJsonReporter(options: Pick<ReporterOptions, "write" | "now"> = {}): BatchReporter {
  const { write = (line: string) => console.log(line), now = () => new Date() } = options;
  const timestamp = (): string => now().toISOString();

  return {
    batchStart(group, units) {
      outputNdjson(
        {
          type: "batch-start",
          timestamp: timestamp(),
          data: { levelType: group.levelType, directory: group.directory, units },
        },
        write
      );
    },

    unitStart() {
      // only resolved units are reported
    },

    unitDone(unit, outcome) {
      const base = { unit, path: outcome.path, status: outcome.status };
      const data =
        outcome.status === "downloaded"
          ? { ...base, bytes: outcome.bytes }
          : outcome.status === "skipped"
            ? { ...base, reason: outcome.reason }
            : { ...base, reason: outcome.reason, error: outcome.message };
      outputNdjson({ type: "file", timestamp: timestamp(), data }, write);
    },

    batchEnd(group, result) {
      outputNdjson(
        { type: "batch-end", timestamp: timestamp(), data: { levelType: group.levelType, result } },
        write
      );
    },

    runEnd(summary) {
      outputNdjson(
        {
          type: "summary",
          timestamp: timestamp(),
          data: {
            archive: summary.archive,
            total: summary.total,
            elapsedMs: summary.elapsedMs,
            exitCode: summary.exitCode,
          },
        },
        write
      );
    },
  };
}

/**
 * Pick the reporter for the output mode.
 */
export function createReporter(options: ReporterOptions): BatchReporter {
  return options.mode === "json" ? createJsonReporter(options) : createConsoleReporter(options);
}
