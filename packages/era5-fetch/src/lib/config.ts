import { z } from "zod";
import { readFileSync, existsSync } from "fs";
import { parse as parseYaml } from "yaml";
import { homedir } from "os";
import { join } from "path";
import { ARCHIVE_KINDS, type ArchiveKind, type DataFormat } from "./archive/types.js";
import { RDA_BASE_URL } from "./archive/locator.js";
import { invalidConfig } from "./errors/catalog.js";
import { LOG_LEVEL_NAMES, type LogLevel } from "./logger.js";

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

/** System-wide configuration path (Linux standard) */
export const SYSTEM_CONFIG_PATH = "/etc/era5-fetch/config.yaml";

/** User-level configuration path (XDG Base Directory Specification) */
export const USER_CONFIG_PATH = join(
  homedir(),
  ".config",
  "era5-fetch",
  "config.yaml"
);

/** Upper bound for --concurrency */
export const MAX_CONCURRENCY = 8;

/** Bounds for --timeout and transfer.timeoutMs */
export const MIN_TIMEOUT_MS = 1000;
export const MAX_TIMEOUT_MS = 3_600_000;

/** Upper bound for --retry and transfer.attempts */
export const MAX_ATTEMPTS = 10;

/** Default values for all configuration options */
export const CONFIG_DEFAULTS = {
  archive: "rda",
  outDir: "./era5_data",
  timeoutMs: 300_000,
  attempts: 3,
  retryDelayMs: 2000,
  concurrency: 1,
  rdaBaseUrl: RDA_BASE_URL,
  cdsUrl: "https://cds.climate.copernicus.eu/api",
  pollIntervalMs: 5000,
  pollMaxAttempts: 720,
  format: "grib",
  logLevel: "info",
  logJson: false,
} as const satisfies ResolvedConfig;

// ---------------------------------------------------------------------------
// Zod Schemas
// ---------------------------------------------------------------------------

const TransferSchema = z.object({
  timeoutMs: z.number().int().min(MIN_TIMEOUT_MS).max(MAX_TIMEOUT_MS).optional(),
  attempts: z.number().int().min(1).max(MAX_ATTEMPTS).optional(),
  retryDelayMs: z.number().int().min(0).max(300_000).optional(),
  concurrency: z.number().int().min(1).max(MAX_CONCURRENCY).optional(),
});

/** Complete configuration file schema */
export const ConfigFileSchema = z
  .object({
    archive: z.enum(ARCHIVE_KINDS).optional(),
    outDir: z.string().min(1).optional(),
    transfer: TransferSchema.optional(),
    rda: z
      .object({
        baseUrl: z.string().url().optional(),
      })
      .optional(),
    cds: z
      .object({
        url: z.string().url().optional(),
        pollIntervalMs: z.number().int().min(500).max(600_000).optional(),
        pollMaxAttempts: z.number().int().min(1).max(100_000).optional(),
        format: z.enum(["grib", "netcdf"]).optional(),
      })
      .optional(),
    logging: z
      .object({
        level: z.enum(LOG_LEVEL_NAMES).optional(),
        json: z.boolean().optional(),
      })
      .optional(),
  })
  .strict();

/** Type derived from the Zod schema */
export type ConfigFile = z.infer<typeof ConfigFileSchema>;

/** Resolved configuration with all defaults applied */
export interface ResolvedConfig {
  archive: ArchiveKind;
  outDir: string;
  timeoutMs: number;
  attempts: number;
  retryDelayMs: number;
  concurrency: number;
  rdaBaseUrl: string;
  cdsUrl: string;
  pollIntervalMs: number;
  pollMaxAttempts: number;
  format: DataFormat;
  logLevel: LogLevel;
  logJson: boolean;
}

const CONFIG_KEYS = [
  "archive",
  "outDir",
  "timeoutMs",
  "attempts",
  "retryDelayMs",
  "concurrency",
  "rdaBaseUrl",
  "cdsUrl",
  "pollIntervalMs",
  "pollMaxAttempts",
  "format",
  "logLevel",
  "logJson",
] as const satisfies readonly (keyof ResolvedConfig)[];

// ---------------------------------------------------------------------------
// Loader Functions
// ---------------------------------------------------------------------------

function messageOf(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Load a YAML config file from disk.
 * Returns undefined if file doesn't exist.
 * Throws CONFIG_FILE_INVALID if the file exists but is unreadable or invalid.
 */
export function loadConfigFile(path: string): ConfigFile | undefined {
  if (!existsSync(path)) {
    return undefined;
  }

  let content: string;
  try {
    content = readFileSync(path, "utf-8");
  } catch (err) {
    throw invalidConfig(path, [`cannot read file: ${messageOf(err)}`]);
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(content);
  } catch (err) {
    throw invalidConfig(path, [`invalid YAML: ${messageOf(err)}`]);
  }

  // Handle empty files
  if (parsed === null || parsed === undefined) {
    return {};
  }

  const result = ConfigFileSchema.safeParse(parsed);
  if (!result.success) {
    throw invalidConfig(
      path,
      result.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
    );
  }

  return result.data;
}

/**
 * Flatten the nested file layout onto resolved keys.
 */
function fromConfigFile(source: ConfigFile): Partial<ResolvedConfig> {
  return {
    archive: source.archive,
    outDir: source.outDir,
    timeoutMs: source.transfer?.timeoutMs,
    attempts: source.transfer?.attempts,
    retryDelayMs: source.transfer?.retryDelayMs,
    concurrency: source.transfer?.concurrency,
    rdaBaseUrl: source.rda?.baseUrl,
    cdsUrl: source.cds?.url,
    pollIntervalMs: source.cds?.pollIntervalMs,
    pollMaxAttempts: source.cds?.pollMaxAttempts,
    format: source.cds?.format,
    logLevel: source.logging?.level,
    logJson: source.logging?.json,
  };
}

/**
 * Copy only the values a layer explicitly sets.
 */
function applyLayer(target: ResolvedConfig, layer: Partial<ResolvedConfig>): void {
  function copy<K extends keyof ResolvedConfig>(key: K): void {
    const value = layer[key];
    if (value !== undefined) {
      target[key] = value;
    }
  }
  for (const key of CONFIG_KEYS) {
    copy(key);
  }
}

/**
 * Merge configuration sources with proper precedence:
 * CLI args > User config > System config > Defaults
 */
export function resolveConfig(
  cliOptions: Partial<ResolvedConfig> = {},
  userConfig: ConfigFile | undefined = undefined,
  systemConfig: ConfigFile | undefined = undefined
): ResolvedConfig {
  const config: ResolvedConfig = { ...CONFIG_DEFAULTS };

  if (systemConfig) {
    applyLayer(config, fromConfigFile(systemConfig));
  }

  if (userConfig) {
    applyLayer(config, fromConfigFile(userConfig));
  }

  applyLayer(config, cliOptions);

  return config;
}

export interface ConfigPaths {
  system: string;
  user: string;
}

/**
 * Load configuration from all sources.
 * An explicit path replaces both the system and the user file.
 *
 * @returns The resolved config and list of source files that were loaded
 */
export function loadConfig(
  explicitPath?: string,
  cliOptions: Partial<ResolvedConfig> = {},
  paths: ConfigPaths = { system: SYSTEM_CONFIG_PATH, user: USER_CONFIG_PATH }
): {
  config: ResolvedConfig;
  sources: string[];
} {
  const sources: string[] = [];

  let systemConfig: ConfigFile | undefined;
  let userConfig: ConfigFile | undefined;

  if (explicitPath) {
    if (!existsSync(explicitPath)) {
      throw invalidConfig(explicitPath, ["file not found"]);
    }
    userConfig = loadConfigFile(explicitPath);
    if (userConfig) sources.push(explicitPath);
  } else {
    systemConfig = loadConfigFile(paths.system);
    if (systemConfig) sources.push(paths.system);

    userConfig = loadConfigFile(paths.user);
    if (userConfig) sources.push(paths.user);
  }

  const config = resolveConfig(cliOptions, userConfig, systemConfig);

  return { config, sources };
}
