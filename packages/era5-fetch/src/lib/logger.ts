// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type LogLevel = "debug" | "info" | "warn" | "error";

export const LOG_LEVEL_NAMES = ["debug", "info", "warn", "error"] as const satisfies readonly LogLevel[];

export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: string;
  [key: string]: unknown;
}

export interface LoggerOptions {
  level: LogLevel;
  json: boolean;
  /** Defaults to the wall clock */
  now?: () => Date;
  /** Every level on stderr; the download command keeps stdout for NDJSON */
  stderr?: boolean;
}

export interface Logger {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
  child(defaultMeta: Record<string, unknown>): Logger;
}

const SEVERITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

// ---------------------------------------------------------------------------
// Formatting
// ---------------------------------------------------------------------------

function formatEntry(entry: LogEntry, json: boolean): string {
  if (json) return JSON.stringify(entry);

  const { timestamp, level, message, ...meta } = entry;
  const fields = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : "";
  return `[${timestamp}] ${level.toUpperCase().padEnd(5)} ${message}${fields}`;
}

// ---------------------------------------------------------------------------
// Logger
// ---------------------------------------------------------------------------

/**
 * Diagnostics for retries, polling and configuration. Per-file progress
 * belongs to the reporter.
 *
 * Without `stderr`, debug/info go to stdout and warn/error to stderr.
 */
export function createLogger(options: LoggerOptions): Logger {
  const threshold = SEVERITY[options.level];
  const now = options.now ?? (() => new Date());

  const emit = (level: LogLevel, line: string): void => {
    if (options.stderr || SEVERITY[level] >= SEVERITY.warn) {
      console.error(line);
    } else {
      console.log(line);
    }
  };

  function scoped(context: Record<string, unknown>): Logger {
    const write = (level: LogLevel) => (message: string, meta: Record<string, unknown> = {}) => {
      if (SEVERITY[level] < threshold) return;
      const entry: LogEntry = {
        timestamp: now().toISOString(),
        level,
        message,
        ...context,
        ...meta,
      };
      emit(level, formatEntry(entry, options.json));
    };

    return {
      debug: write("debug"),
      info: write("info"),
      warn: write("warn"),
      error: write("error"),
      child: (childMeta) => scoped({ ...context, ...childMeta }),
    };
  }

  return scoped({});
}

export function createNoopLogger(): Logger {
  const noop = () => {};
  const logger: Logger = {
    debug: noop,
    info: noop,
    warn: noop,
    error: noop,
    child: () => logger,
  };
  return logger;
}
