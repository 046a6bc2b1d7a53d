import { existsSync, readFileSync } from "fs";
import { homedir } from "os";
import { join } from "path";
import Conf from "conf";
import type { ArchiveKind } from "./archive/types.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/**
 * `identity` is the account e-mail for RDA and the API endpoint URL for CDS.
 */
export interface Credentials {
  identity: string;
  secret: string;
  /** Name of the source that supplied them */
  source: string;
}

export type StoredCredentials = Omit<Credentials, "source">;

export interface CredentialSource {
  readonly name: string;
  resolve(archive: ArchiveKind): Credentials | undefined;
}

export interface CredentialStore {
  get(archive: ArchiveKind): StoredCredentials | undefined;
  set(archive: ArchiveKind, credentials: StoredCredentials): void;
  clear(archive: ArchiveKind): void;
}

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

export const ENV_VARIABLES: Record<ArchiveKind, { identity: string; secret: string }> = {
  rda: { identity: "RDA_EMAIL", secret: "RDA_KEY" },
  cds: { identity: "CDSAPI_URL", secret: "CDSAPI_KEY" },
};

export function defaultRcPath(env: NodeJS.ProcessEnv = process.env): string {
  return env.CDSAPI_RC ?? join(homedir(), ".cdsapirc");
}

// ---------------------------------------------------------------------------
// Sources
// ---------------------------------------------------------------------------

function complete(identity: string | undefined, secret: string | undefined, source: string) {
  return identity && secret ? { identity, secret, source } : undefined;
}

/**
 * Key/value pair from the environment.
 */
export class EnvCredentialSource implements CredentialSource {
  readonly name = "environment";

  /**
   * @param identityDefaults - used when only the secret is set, e.g. the CDS endpoint
   */
  constructor(
    private readonly env: NodeJS.ProcessEnv = process.env,
    private readonly identityDefaults: Partial<Record<ArchiveKind, string>> = {}
  ) {}

  resolve(archive: ArchiveKind): Credentials | undefined {
    const vars = ENV_VARIABLES[archive];
    return complete(
      this.env[vars.identity]?.trim() || this.identityDefaults[archive],
      this.env[vars.secret]?.trim(),
      `${this.name} (${vars.identity}/${vars.secret})`
    );
  }
}

/**
 * Credentials saved with `era5-fetch auth login`.
 */
export class StoredCredentialSource implements CredentialSource {
  readonly name = "saved login";

  constructor(private readonly store: CredentialStore) {}

  resolve(archive: ArchiveKind): Credentials | undefined {
    const stored = this.store.get(archive);
    return complete(stored?.identity, stored?.secret, this.name);
  }
}

/**
 * Parse a `.cdsapirc`-style file into sections.
 * Lines before the first `[SECTION]` header land in the "" section.
 */
export function parseRcFile(content: string): Map<string, Map<string, string>> {
  const sections = new Map<string, Map<string, string>>([["", new Map()]]);
  let current = "";

  for (const raw of content.split(/\r?\n/)) {
    const line = raw.trim();
    if (!line || line.startsWith("#")) continue;

    const header = /^\[(.+)\]$/.exec(line);
    if (header) {
      current = header[1].trim().toUpperCase();
      if (!sections.has(current)) sections.set(current, new Map());
      continue;
    }

    const separator = line.indexOf(":");
    if (separator === -1) continue;
    const key = line.slice(0, separator).trim().toLowerCase();
    const value = line.slice(separator + 1).trim();
    sections.get(current)?.set(key, value);
  }

  return sections;
}

/**
 * Structured config file: top-level `url`/`key` for CDS,
 * an `[RDA]` section with `email`/`key` for RDA.
 */
export class RcFileCredentialSource implements CredentialSource {
  readonly name: string;

  constructor(private readonly path: string = defaultRcPath()) {
    this.name = `config file (${path})`;
  }

  resolve(archive: ArchiveKind): Credentials | undefined {
    if (!existsSync(this.path)) return undefined;

    const sections = parseRcFile(readFileSync(this.path, "utf-8"));
    if (archive === "rda") {
      const section = sections.get("RDA");
      return complete(section?.get("email"), section?.get("key"), this.name);
    }
    const top = sections.get("");
    return complete(top?.get("url"), top?.get("key"), this.name);
  }
}

// ---------------------------------------------------------------------------
// Chain
// ---------------------------------------------------------------------------

/**
 * Ordered-source policy: the first source yielding both an identity
 * and a secret wins.
 */
export class CredentialChain {
  constructor(private readonly sources: readonly CredentialSource[]) {}

  resolve(archive: ArchiveKind): Credentials | undefined {
    for (const source of this.sources) {
      const found = source.resolve(archive);
      if (found) return found;
    }
    return undefined;
  }

  describe(): string[] {
    return this.sources.map((s) => s.name);
  }
}

// ---------------------------------------------------------------------------
// Conf-backed store
// ---------------------------------------------------------------------------

type StoreShape = Partial<Record<ArchiveKind, StoredCredentials>>;

export class ConfCredentialStore implements CredentialStore {
  private readonly conf = new Conf<StoreShape>({ projectName: "era5-fetch" });

  get(archive: ArchiveKind): StoredCredentials | undefined {
    return this.conf.get(archive);
  }

  set(archive: ArchiveKind, credentials: StoredCredentials): void {
    if (!credentials.identity || !credentials.secret) {
      throw new Error("Refusing to save credentials without both identity and secret.");
    }
    this.conf.set(archive, credentials);
  }

  clear(archive: ArchiveKind): void {
    this.conf.delete(archive);
  }
}

export interface CredentialChainOptions {
  env?: NodeJS.ProcessEnv;
  store?: CredentialStore;
  rcPath?: string;
  /** CDS endpoint for a CDSAPI_KEY given without CDSAPI_URL */
  cdsUrl?: string;
}

/**
 * Environment, then saved login, then the rc file.
 */
export function createCredentialChain(options: CredentialChainOptions = {}): CredentialChain {
  const env = options.env ?? process.env;
  const defaults = options.cdsUrl ? { cds: options.cdsUrl } : {};
  const sources: CredentialSource[] = [new EnvCredentialSource(env, defaults)];
  if (options.store) {
    sources.push(new StoredCredentialSource(options.store));
  }
  sources.push(new RcFileCredentialSource(options.rcPath ?? defaultRcPath(env)));
  return new CredentialChain(sources);
}
