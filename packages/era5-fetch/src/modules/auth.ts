import { Command } from "commander";
import chalk from "chalk";
import type { ArchiveKind } from "../lib/archive/types.js";
import { isNonInteractive } from "../lib/cli-context.js";
import { CONFIG_DEFAULTS, loadConfig } from "../lib/config.js";
import {
  createCredentialChain,
  ENV_VARIABLES,
  type CredentialStore,
  type StoredCredentials,
} from "../lib/credentials.js";
import { missingArgument } from "../lib/errors/catalog.js";
import { maybeOutputJson, type AuthStatusJson } from "../lib/json-output.js";
import { parseArchive } from "../lib/options.js";
import type { PromptService } from "../lib/ports/prompt.js";
import { interactivePrompts } from "../lib/adapters/interactive-prompts.js";

export interface LoginOptions {
  archive?: string;
  user?: string;
  key?: string;
  nonInteractive?: boolean;
}

interface ArchiveOption {
  archive?: string;
}

interface StatusOptions extends ArchiveOption {
  config?: string;
}

const IDENTITY_LABELS: Record<ArchiveKind, string> = {
  rda: "RDA account e-mail",
  cds: "CDS API URL",
};

const IDENTITY_DEFAULTS: Partial<Record<ArchiveKind, string>> = {
  cds: CONFIG_DEFAULTS.cdsUrl,
};

function requireArchive(options: ArchiveOption, command: string): ArchiveKind {
  if (options.archive === undefined) {
    throw missingArgument("--archive", command, [`era5-fetch ${command} --archive rda`]);
  }
  return parseArchive(options.archive);
}

/**
 * Fill in whatever the flags leave out by prompting, unless prompts are disabled.
 */
export async function resolveLogin(
  archive: ArchiveKind,
  options: LoginOptions,
  prompts: PromptService = interactivePrompts
): Promise<StoredCredentials> {
  const interactive = !options.nonInteractive && !isNonInteractive();
  const vars = ENV_VARIABLES[archive];

  let identity = options.user?.trim() || undefined;
  if (!identity && interactive) {
    identity = (await prompts.text(IDENTITY_LABELS[archive], IDENTITY_DEFAULTS[archive]))?.trim();
  }
  identity = identity || IDENTITY_DEFAULTS[archive];
  if (!identity) {
    throw missingArgument("--user", "auth login", [
      `era5-fetch auth login --archive ${archive} --user you@example.org`,
      `${vars.identity}=you@example.org ${vars.secret}=... era5-fetch download ...`,
    ]);
  }

  let secret = options.key?.trim() || undefined;
  if (!secret && interactive) {
    secret = (await prompts.password(`${archive.toUpperCase()} API key`))?.trim();
  }
  if (!secret) {
    throw missingArgument("--key", "auth login", [
      `era5-fetch auth login --archive ${archive} --key <key>`,
    ]);
  }

  return { identity, secret };
}

export function registerAuthCommands(
  program: Command,
  store: CredentialStore,
  prompts: PromptService = interactivePrompts,
  env: NodeJS.ProcessEnv = process.env
): void {
  const auth = program.command("auth").description("Manage archive credentials");

  auth
    .command("login")
    .description("Save archive credentials for future downloads")
    .option("-a, --archive <name>", "Archive: rda or cds")
    .option("-u, --user <identity>", "Account e-mail (rda) or API URL (cds)")
    .option("-k, --key <key>", "API key")
    .option("--non-interactive", "Fail instead of prompting for input", false)
    .action(async (options: LoginOptions) => {
      const archive = requireArchive(options, "auth login");
      const credentials = await resolveLogin(archive, options, prompts);
      store.set(archive, credentials);
      console.log(chalk.green(`Saved ${archive} credentials for ${credentials.identity}`));
    });

  auth
    .command("logout")
    .description("Remove saved credentials")
    .option("-a, --archive <name>", "Archive: rda or cds")
    .action((options: ArchiveOption) => {
      const archive = requireArchive(options, "auth logout");
      store.clear(archive);
      console.log(chalk.green(`Removed saved ${archive} credentials.`));
    });

  auth
    .command("status")
    .description("Show which credentials a download would use")
    .option("-a, --archive <name>", "Archive: rda or cds")
    .option("--config <path>", "Read cds.url from this config file instead of the system and user files")
    .action((options: StatusOptions) => {
      const archive = requireArchive(options, "auth status");
      const { config } = loadConfig(options.config);
      const chain = createCredentialChain({ env, store, cdsUrl: config.cdsUrl });
      const found = chain.resolve(archive);

      const status: AuthStatusJson = found
        ? { archive, authenticated: true, source: found.source, identity: found.identity }
        : { archive, authenticated: false };
      if (!found) process.exitCode = 1;

      if (maybeOutputJson(status)) return;

      if (found) {
        console.log(chalk.cyan(`${archive}: ${found.identity}`));
        console.log(chalk.gray(`from ${found.source}`));
      } else {
        console.log(chalk.yellow(`${archive}: no credentials found`));
        console.log(chalk.gray(`Checked: ${chain.describe().join(", ")}`));
      }
    });
}
