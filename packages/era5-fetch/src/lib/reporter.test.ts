import { beforeAll, describe, it, expect, vi } from "vitest";
import chalk from "chalk";
import {
  createConsoleReporter,
  createJsonReporter,
  formatCounts,
  formatElapsed,
  formatSize,
  type BatchGroup,
} from "./reporter.js";
import type { Spinner } from "./spinner.js";
import type { RunSummary } from "./transfer/outcome.js";

const GROUP: BatchGroup = { levelType: "pl", label: "Pressure levels", directory: "/data/pressure_levels" };

function fakeSpinner(): Spinner {
  const spinner: Spinner = {
    text: "",
    isSpinning: false,
    start: vi.fn((text?: string) => {
      spinner.isSpinning = true;
      if (text !== undefined) spinner.text = text;
      return spinner;
    }),
    stop: vi.fn(() => {
      spinner.isSpinning = false;
      return spinner;
    }),
  };
  return spinner;
}

const SUMMARY: RunSummary = {
  archive: "rda",
  groups: [],
  total: { downloaded: 3, skipped: 1, failed: 0 },
  elapsedMs: 65_000,
  exitCode: 0,
};

beforeAll(() => {
  chalk.level = 0;
});

describe("formatting", () => {
  it("formats sizes", () => {
    expect(formatSize(512)).toBe("512 B");
    expect(formatSize(2048)).toBe("2.0 KB");
    expect(formatSize(5 * 1024 * 1024)).toBe("5.00 MB");
  });

  it("formats elapsed time", () => {
    expect(formatElapsed(4_400)).toBe("4s");
    expect(formatElapsed(65_000)).toBe("1m 5s");
    expect(formatElapsed(3_723_000)).toBe("1h 2m 3s");
  });

  it("formats counts", () => {
    expect(formatCounts({ downloaded: 2, skipped: 1, failed: 3 })).toBe("2 downloaded, 1 skipped, 3 failed");
  });
});

describe("createConsoleReporter", () => {
  function reporterWith(quiet = false) {
    const lines: string[] = [];
    const spinner = fakeSpinner();
    const reporter = createConsoleReporter({
      mode: "static",
      quiet,
      write: (line) => lines.push(line),
      spinner,
    });
    return { reporter, lines, spinner };
  }

  it("prints one line per resolved unit", () => {
    const { reporter, lines } = reporterWith();

    reporter.batchStart(GROUP, 3);
    reporter.unitDone("a.nc", { status: "downloaded", path: "/data/a.nc", bytes: 2048 });
    reporter.unitDone("b.nc", { status: "skipped", path: "/data/b.nc", reason: "AlreadyExists" });
    reporter.unitDone("c.nc", {
      status: "failed",
      path: "/data/c.nc",
      reason: "ServerError",
      message: "Archive returned 404 Not Found",
    });
    reporter.batchEnd(GROUP, { downloaded: 1, skipped: 1, failed: 1 });

    expect(lines).toEqual([
      "",
      "Pressure levels (3 files) → /data/pressure_levels",
      "  ✓ a.nc (2.0 KB)",
      "  - b.nc (already on disk)",
      "  ✗ c.nc [ServerError] Archive returned 404 Not Found",
      "Pressure levels: 1 downloaded, 1 skipped, 1 failed",
    ]);
  });

  it("prints only failures and summaries when quiet", () => {
    const { reporter, lines } = reporterWith(true);

    reporter.unitDone("a.nc", { status: "downloaded", path: "/data/a.nc", bytes: 10 });
    reporter.unitDone("c.nc", {
      status: "failed",
      path: "/data/c.nc",
      reason: "NetworkError",
      message: "Can't reach the archive",
    });
    reporter.runEnd(SUMMARY);

    expect(lines).toEqual([
      "  ✗ c.nc [NetworkError] Can't reach the archive",
      "",
      "Finished in 1m 5s: 3 downloaded, 1 skipped, 0 failed",
    ]);
  });

  it("spins while units are in flight", () => {
    const { reporter, spinner } = reporterWith();

    reporter.unitStart("a.nc");
    expect(spinner.isSpinning).toBe(true);
    expect(spinner.text).toBe("a.nc");

    reporter.unitDone("a.nc", { status: "downloaded", path: "/data/a.nc", bytes: 10 });
    expect(spinner.isSpinning).toBe(false);
  });

  it("keeps spinning for the units still in flight", () => {
    const { reporter, spinner, lines } = reporterWith();

    reporter.unitStart("a.nc");
    reporter.unitStart("b.nc");
    reporter.unitDone("a.nc", { status: "downloaded", path: "/data/a.nc", bytes: 10 });

    expect(lines).toEqual(["  ✓ a.nc (10 B)"]);
    expect(spinner.isSpinning).toBe(true);
    expect(spinner.text).toBe("b.nc");
  });
});

describe("createJsonReporter", () => {
  const now = () => new Date("2024-03-01T12:00:00.000Z");

  it("emits one NDJSON event per batch, file and run", () => {
    const lines: string[] = [];
    const reporter = createJsonReporter({ write: (line) => lines.push(line), now });

    reporter.batchStart(GROUP, 2);
    reporter.unitStart("a.nc");
    reporter.unitDone("a.nc", { status: "downloaded", path: "/data/a.nc", bytes: 2048 });
    reporter.unitDone("b.nc", {
      status: "failed",
      path: "/data/b.nc",
      reason: "CorruptOrErrorPayload",
      message: "Downloaded file looks like an error page (120 bytes)",
    });
    reporter.batchEnd(GROUP, { downloaded: 1, skipped: 0, failed: 1 });
    reporter.runEnd({ ...SUMMARY, total: { downloaded: 1, skipped: 0, failed: 1 }, exitCode: 1 });

    expect(lines.map((line) => JSON.parse(line))).toEqual([
      {
        type: "batch-start",
        timestamp: "2024-03-01T12:00:00.000Z",
        data: { levelType: "pl", directory: "/data/pressure_levels", units: 2 },
      },
      {
        type: "file",
        timestamp: "2024-03-01T12:00:00.000Z",
        data: { unit: "a.nc", path: "/data/a.nc", status: "downloaded", bytes: 2048 },
      },
      {
        type: "file",
        timestamp: "2024-03-01T12:00:00.000Z",
        data: {
          unit: "b.nc",
          path: "/data/b.nc",
          status: "failed",
          reason: "CorruptOrErrorPayload",
          error: "Downloaded file looks like an error page (120 bytes)",
        },
      },
      {
        type: "batch-end",
        timestamp: "2024-03-01T12:00:00.000Z",
        data: { levelType: "pl", result: { downloaded: 1, skipped: 0, failed: 1 } },
      },
      {
        type: "summary",
        timestamp: "2024-03-01T12:00:00.000Z",
        data: {
          archive: "rda",
          total: { downloaded: 1, skipped: 0, failed: 1 },
          elapsedMs: 65000,
          exitCode: 1,
        },
      },
    ]);
  });
});
