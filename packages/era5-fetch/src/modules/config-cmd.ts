import { Command } from "commander";
import { existsSync, mkdirSync, writeFileSync } from "fs";
import { dirname } from "path";
import chalk from "chalk";
import {
  loadConfig,
  loadConfigFile,
  USER_CONFIG_PATH,
  SYSTEM_CONFIG_PATH,
} from "../lib/config.js";
import { isCLIError } from "../lib/errors/types.js";
import { maybeOutputJson, type ConfigShowJson } from "../lib/json-output.js";

// ---------------------------------------------------------------------------
// Example Configuration Content
// ---------------------------------------------------------------------------

export const EXAMPLE_CONFIG = `# era5-fetch configuration
# Place at ~/.config/era5-fetch/config.yaml (user) or /etc/era5-fetch/config.yaml (system)
#
# Configuration precedence (highest to lowest):
# 1. CLI flags
# 2. User config (~/.config/era5-fetch/config.yaml)
# 3. System config (/etc/era5-fetch/config.yaml)
# 4. Built-in defaults

# Archive to download from: rda (NCAR RDA, one file per variable)
# or cds (Copernicus CDS, one bulk request per day)
archive: rda

# Root of the output tree; level groups get their own subdirectory
outDir: ./era5_data

transfer:
  # Upper bound for one attempt (ms)
  timeoutMs: 300000

  # Attempts per file, including the first
  attempts: 3

  # Base delay between attempts (doubled after each failure)
  retryDelayMs: 2000

  # Files transferred at once (1-8)
  concurrency: 1

rda:
  # THREDDS file server root for ds633.0
  baseUrl: "https://tds.gdex.ucar.edu/thredds/fileServer/files/g/d633000"

cds:
  # Used when CDSAPI_KEY is set without CDSAPI_URL
  url: "https://cds.climate.copernicus.eu/api"

  # How often to check a queued retrieve job (ms), and how many times
  pollIntervalMs: 5000
  pollMaxAttempts: 720

  # grib or netcdf
  format: grib

# Logging configuration
logging:
  # Log level: debug, info, warn, error
  level: info

  # Output JSON logs (recommended for batch schedulers)
  json: false
`;

function messageOf(error: unknown): string {
  if (isCLIError(error) && error.details) {
    return `${error.message}\n${error.details}`;
  }
  return error instanceof Error ? error.message : String(error);
}

// ---------------------------------------------------------------------------
// Command Registration
// ---------------------------------------------------------------------------

export function registerConfigCommands(program: Command): void {
  const config = program
    .command("config")
    .description("Manage era5-fetch configuration");

  config
    .command("init")
    .description("Create an example configuration file")
    .option(
      "-g, --global",
      "Create system-wide config at /etc/era5-fetch/config.yaml"
    )
    .action((options: { global?: boolean }) => {
      const targetPath = options.global ? SYSTEM_CONFIG_PATH : USER_CONFIG_PATH;

      if (existsSync(targetPath)) {
        console.error(chalk.yellow(`Config file already exists: ${targetPath}`));
        console.error(
          chalk.gray("Use a text editor to modify it, or delete it first.")
        );
        process.exitCode = 1;
        return;
      }

      try {
        mkdirSync(dirname(targetPath), { recursive: true });
        writeFileSync(targetPath, EXAMPLE_CONFIG, "utf-8");
        console.log(chalk.green(`Created config file: ${targetPath}`));
        console.log(chalk.gray("Edit this file to customize your settings."));
      } catch (error) {
        console.error(chalk.red(`Failed to create config: ${messageOf(error)}`));
        if (options.global) {
          console.error(chalk.gray("System config may require sudo."));
        }
        process.exitCode = 1;
      }
    });

  config
    .command("validate")
    .description("Validate configuration file(s)")
    .option("-c, --config <path>", "Specific config file to validate")
    .action((options: { config?: string }) => {
      const pathsToCheck = options.config
        ? [options.config]
        : [SYSTEM_CONFIG_PATH, USER_CONFIG_PATH];

      let hasErrors = false;
      let foundAny = false;

      for (const path of pathsToCheck) {
        if (!existsSync(path)) {
          if (options.config) {
            console.error(chalk.red(`File not found: ${path}`));
            hasErrors = true;
          }
          continue;
        }

        foundAny = true;
        console.log(chalk.cyan(`Checking ${path}...`));

        try {
          loadConfigFile(path);
          console.log(chalk.green(`  ✓ Valid`));
        } catch (error) {
          console.error(chalk.red(`  ✗ Invalid: ${messageOf(error)}`));
          hasErrors = true;
        }
      }

      if (!foundAny && !options.config) {
        console.log(chalk.yellow("No configuration files found."));
        console.log(chalk.gray(`Run 'era5-fetch config init' to create one.`));
      } else if (hasErrors) {
        process.exitCode = 1;
      } else if (foundAny) {
        console.log(chalk.green("\nAll configuration files are valid."));
      }
    });

  config
    .command("show")
    .description("Display the effective configuration")
    .option("-c, --config <path>", "Specific config file to use")
    .action((options: { config?: string }) => {
      try {
        const { config: resolved, sources } = loadConfig(options.config);

        const shown: ConfigShowJson = { effective: { ...resolved }, sources };
        if (maybeOutputJson(shown)) return;

        console.log(chalk.cyan("Effective Configuration:"));
        console.log(chalk.gray("─".repeat(40)));

        if (sources.length > 0) {
          console.log(chalk.gray(`Sources: ${sources.join(", ")}`));
        } else {
          console.log(chalk.gray("Sources: (defaults only)"));
        }

        console.log();
        console.log(`  archive:         ${resolved.archive}`);
        console.log(`  outDir:          ${resolved.outDir}`);

        console.log();
        console.log(chalk.bold("Transfer:"));
        console.log(`  timeoutMs:       ${resolved.timeoutMs}`);
        console.log(`  attempts:        ${resolved.attempts}`);
        console.log(`  retryDelayMs:    ${resolved.retryDelayMs}`);
        console.log(`  concurrency:     ${resolved.concurrency}`);

        console.log();
        console.log(chalk.bold("RDA:"));
        console.log(`  baseUrl:         ${resolved.rdaBaseUrl}`);

        console.log();
        console.log(chalk.bold("CDS:"));
        console.log(`  url:             ${resolved.cdsUrl}`);
        console.log(`  pollIntervalMs:  ${resolved.pollIntervalMs}`);
        console.log(`  pollMaxAttempts: ${resolved.pollMaxAttempts}`);
        console.log(`  format:          ${resolved.format}`);

        console.log();
        console.log(chalk.bold("Logging:"));
        console.log(`  level:           ${resolved.logLevel}`);
        console.log(`  json:            ${resolved.logJson}`);
      } catch (error) {
        console.error(chalk.red(`Failed to load config: ${messageOf(error)}`));
        process.exitCode = 1;
      }
    });

  config
    .command("path")
    .description("Show configuration file paths")
    .action(() => {
      console.log(chalk.cyan("Configuration file locations:"));
      console.log();
      console.log(chalk.bold("User config:"));
      console.log(`  ${USER_CONFIG_PATH}`);
      console.log(
        `  ${existsSync(USER_CONFIG_PATH) ? chalk.green("(exists)") : chalk.gray("(not found)")}`
      );
      console.log();
      console.log(chalk.bold("System config:"));
      console.log(`  ${SYSTEM_CONFIG_PATH}`);
      console.log(
        `  ${existsSync(SYSTEM_CONFIG_PATH) ? chalk.green("(exists)") : chalk.gray("(not found)")}`
      );
    });
}
