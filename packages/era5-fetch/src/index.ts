#!/usr/bin/env node
import { Command } from "commander";
import { readFileSync } from "fs";
import { initContext } from "./lib/cli-context.js";
import { ConfCredentialStore } from "./lib/credentials.js";
import { renderUnknownError } from "./lib/errors/renderer.js";
import { registerAuthCommands } from "./modules/auth.js";
import { registerConfigCommands } from "./modules/config-cmd.js";
import { registerDownloadCommands } from "./modules/download.js";
import { registerVariablesCommands } from "./modules/variables.js";

function readVersion(): string {
  const raw: unknown = JSON.parse(readFileSync(new URL("../package.json", import.meta.url), "utf-8"));
  if (typeof raw === "object" && raw !== null && "version" in raw && typeof raw.version === "string") {
    return raw.version;
  }
  return "0.0.0";
}

function createProgram(): Command {
  const program = new Command()
    .name("era5-fetch")
    .description("Download ERA5 reanalysis files from the NCAR RDA or the Copernicus CDS")
    .version(readVersion())
    .option("--json", "Emit NDJSON progress and JSON results")
    .option("-q, --quiet", "Only print failures and summaries")
    .option("--no-input", "Fail instead of prompting for input")
    .option("--timeout <ms>", "Per-attempt transfer timeout in milliseconds")
    .option("--retry <n>", "Transfer attempts per file");

  const store = new ConfCredentialStore();

  registerDownloadCommands(program, { store });
  registerVariablesCommands(program);
  registerAuthCommands(program, store);
  registerConfigCommands(program);

  return program;
}

export async function main(argv = process.argv): Promise<void> {
  initContext(argv);
  const program = createProgram();

  try {
    await program.parseAsync(argv);
  } catch (error) {
    renderUnknownError(error);
    process.exitCode = 1;
  }
}

void main();
