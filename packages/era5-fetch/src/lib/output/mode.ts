/**
 * Output mode detection for determining how to render CLI output.
 */

export type OutputMode = "tui" | "static" | "json";

/**
 * Detect the appropriate output mode based on environment and flags.
 *
 * - `tui`: Interactive terminal, progress shown with a spinner
 * - `static`: Plain lines (batch jobs, pipes, CI)
 * - `json`: NDJSON events for scripting
 */
export function getOutputMode(
  argv: string[] = process.argv,
  env: NodeJS.ProcessEnv = process.env,
  isTTY: boolean = process.stdout.isTTY === true
): OutputMode {
  if (argv.includes("--json") || env.ERA5_FETCH_JSON === "1" || env.ERA5_FETCH_JSON === "true") {
    return "json";
  }

  // Batch schedulers (SLURM, PBS) and CI runners
  if (env.CI || env.SLURM_JOB_ID || env.PBS_JOBID) {
    return "static";
  }

  if (!isTTY) {
    return "static";
  }

  if (env.TERM === "dumb") {
    return "static";
  }

  return "tui";
}
