/**
 * Global CLI context for shared options and state.
 * Provides consistent behavior across all commands.
 */

export interface CLIContext {
  /** Emit NDJSON events instead of human-readable text */
  json: boolean;
  /** Suppress spinners and per-file progress lines */
  quiet: boolean;
  /** Fail instead of prompting for input (batch jobs, CI) */
  noInput: boolean;
  /** Per-attempt transfer timeout in milliseconds, as given; validated by the download command */
  timeout?: string;
  /** Transfer attempts per file, as given */
  retry?: string;
}

const DEFAULT_CONTEXT: CLIContext = {
  json: false,
  quiet: false,
  noInput: false,
};

let currentContext: CLIContext = { ...DEFAULT_CONTEXT };

function readFlagValue(argv: string[], flag: string): string | undefined {
  const idx = argv.findIndex((arg) => arg === flag);
  if (idx !== -1) return argv[idx + 1];
  const inline = argv.find((arg) => arg.startsWith(`${flag}=`));
  return inline?.slice(flag.length + 1);
}

function isTruthy(value: string | undefined): boolean {
  return value === "1" || value === "true";
}

/**
 * Initialize CLI context from command line arguments and environment.
 * Flags win over ERA5_FETCH_* environment variables.
 */
export function initContext(
  argv: string[] = process.argv,
  env: NodeJS.ProcessEnv = process.env
): CLIContext {
  currentContext = { ...DEFAULT_CONTEXT };

  if (isTruthy(env.ERA5_FETCH_JSON) || argv.includes("--json")) {
    currentContext.json = true;
    currentContext.quiet = true; // JSON mode implies quiet
  }

  if (isTruthy(env.ERA5_FETCH_QUIET) || argv.includes("--quiet") || argv.includes("-q")) {
    currentContext.quiet = true;
  }

  if (env.CI || isTruthy(env.ERA5_FETCH_NO_INPUT) || argv.includes("--no-input")) {
    currentContext.noInput = true;
  }

  currentContext.timeout = readFlagValue(argv, "--timeout") ?? (env.ERA5_FETCH_TIMEOUT || undefined);
  currentContext.retry = readFlagValue(argv, "--retry") ?? (env.ERA5_FETCH_RETRY || undefined);

  return currentContext;
}

/**
 * Get the current CLI context.
 */
export function getContext(): CLIContext {
  return currentContext;
}

/**
 * Check if we're in JSON output mode.
 */
export function isJsonMode(): boolean {
  return currentContext.json;
}

/**
 * Check if we're in quiet mode (no spinners/progress).
 */
export function isQuietMode(): boolean {
  return currentContext.quiet;
}

/**
 * Check if we're in non-interactive mode.
 */
export function isNonInteractive(): boolean {
  return currentContext.noInput || !process.stdin.isTTY;
}

/**
 * Reset context to defaults (for testing).
 */
export function resetContext(): void {
  currentContext = { ...DEFAULT_CONTEXT };
}
