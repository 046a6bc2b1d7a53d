import { existsSync } from "fs";
import { rm } from "fs/promises";
import { join } from "path";
import type { ArchiveKind, RemoteTarget } from "../archive/types.js";
import type { Credentials } from "../credentials.js";
import { corruptPayload } from "../errors/catalog.js";
import type { CLIError } from "../errors/types.js";
import { toTransferError } from "../http.js";
import type { Logger } from "../logger.js";
import type { DelayFn } from "../ports/timer.js";
import type { Transport } from "../ports/transport.js";
import { realDelay } from "../adapters/real-timers.js";
import type { FailureReason, TransferOutcome } from "./outcome.js";
import { sniffFile } from "./sniff.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface CredentialResolver {
  resolve(archive: ArchiveKind): Credentials | undefined;
}

export interface TransferExecutorOptions {
  archive: ArchiveKind;
  transport: Transport;
  credentials: CredentialResolver;
  /** Per-attempt bound handed to the transport */
  timeoutMs: number;
  /** Total attempts, including the first */
  attempts: number;
  /** Base backoff; doubles after each failed attempt */
  retryDelayMs: number;
  logger: Logger;
  delay?: DelayFn;
  fileExists?: (path: string) => boolean;
}

export interface TransferExecutor {
  transfer(target: RemoteTarget, localDir: string): Promise<TransferOutcome>;
}

// ---------------------------------------------------------------------------
// Classification
// ---------------------------------------------------------------------------

/**
 * Network trouble, 5xx and 429 are worth another attempt; other 4xx are not.
 */
export function isRetryable(error: CLIError): boolean {
  switch (error.code) {
    case "TRANSFER_NETWORK":
    case "TRANSFER_TIMEOUT":
      return true;
    case "TRANSFER_SERVER":
      return error.status !== undefined && (error.status >= 500 || error.status === 429);
    default:
      return false;
  }
}

export function failureReason(error: CLIError): FailureReason {
  switch (error.code) {
    case "TRANSFER_SERVER":
      return "ServerError";
    case "TRANSFER_CORRUPT_PAYLOAD":
      return "CorruptOrErrorPayload";
    case "AUTH_MISSING":
      return "AuthMissing";
    default:
      return "NetworkError";
  }
}

function describeError(error: CLIError): string {
  return error.details ? `${error.message}: ${error.details}` : error.message;
}

async function removeFile(path: string): Promise<void> {
  await rm(path, { force: true });
}

// ---------------------------------------------------------------------------
// Implementation
// ---------------------------------------------------------------------------

/**
 * Create the executor for one archive.
 * `transfer` never throws and never leaves a partial file behind on failure.
 */
export function createTransferExecutor(options: TransferExecutorOptions): TransferExecutor {
  const {
    archive,
    transport,
    credentials: resolver,
    timeoutMs,
    attempts,
    retryDelayMs,
    logger,
    delay = realDelay,
    fileExists = existsSync,
  } = options;

  async function attemptAll(
    target: RemoteTarget,
    credentials: Credentials,
    outputPath: string
  ): Promise<CLIError | undefined> {
    for (let attempt = 1; attempt <= attempts; attempt++) {
      try {
        await transport.retrieve({ target, credentials, outputPath, timeoutMs });
        return undefined;
      } catch (thrown) {
        const error = toTransferError(thrown, timeoutMs);
        await removeFile(outputPath);

        if (attempt === attempts || !isRetryable(error)) {
          return error;
        }

        const waitMs = retryDelayMs * Math.pow(2, attempt - 1);
        logger.warn("Transfer failed, retrying", {
          file: target.filename,
          attempt,
          maxAttempts: attempts,
          retryDelayMs: waitMs,
          error: describeError(error),
        });
        await delay(waitMs);
      }
    }
    return undefined;
  }

  async function transfer(target: RemoteTarget, localDir: string): Promise<TransferOutcome> {
    const path = join(localDir, target.filename);

    if (fileExists(path)) {
      return { status: "skipped", path, reason: "AlreadyExists" };
    }

    const credentials = resolver.resolve(archive);
    if (!credentials) {
      return {
        status: "failed",
        path,
        reason: "AuthMissing",
        message: `No ${archive} credentials found`,
      };
    }

    try {
      const error = await attemptAll(target, credentials, path);
      if (error) {
        return { status: "failed", path, reason: failureReason(error), message: describeError(error) };
      }

      const { size, suspicious } = await sniffFile(path);
      if (suspicious) {
        await removeFile(path);
        const corrupt = corruptPayload(size);
        return { status: "failed", path, reason: "CorruptOrErrorPayload", message: corrupt.message };
      }

      return { status: "downloaded", path, bytes: size };
    } catch (unexpected) {
      await removeFile(path);
      const error = toTransferError(unexpected, timeoutMs);
      logger.error("Transfer aborted unexpectedly", { file: target.filename, error: describeError(error) });
      return { status: "failed", path, reason: failureReason(error), message: describeError(error) };
    }
  }

  return { transfer };
}
