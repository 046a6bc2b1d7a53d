import { createWriteStream } from "fs";
import { pipeline } from "stream/promises";
import fetch, { type RequestInit, type Response } from "node-fetch";
import { fromHttpStatus, networkFailure, transferTimeout } from "./errors/catalog.js";
import { CLIError, isCLIError } from "./errors/types.js";

export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>;

export const defaultFetch: FetchLike = (url, init) => fetch(url, init);

export function basicAuthorization(user: string, password: string): string {
  return `Basic ${Buffer.from(`${user}:${password}`).toString("base64")}`;
}

/**
 * Read an error response body, parsed as JSON when it is JSON.
 */
export async function readErrorPayload(response: Response): Promise<unknown> {
  const text = await response.text().catch(() => "");
  if (!text) return undefined;
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
}

export async function assertOk(response: Response): Promise<void> {
  if (!response.ok) {
    throw fromHttpStatus(response.status, response.statusText, await readErrorPayload(response));
  }
}

/**
 * Stream a successful response body to disk.
 */
export async function writeBody(response: Response, outputPath: string): Promise<number> {
  if (!response.body) {
    throw networkFailure("Response had no body");
  }
  const file = createWriteStream(outputPath);
  await pipeline(response.body, file);
  return file.bytesWritten;
}

function isAbortError(error: unknown): boolean {
  return error instanceof Error && (error.name === "AbortError" || error.name === "TimeoutError");
}

/**
 * Normalize anything thrown by a fetch/stream call into a transfer CLIError.
 */
export function toTransferError(error: unknown, timeoutMs: number): CLIError {
  if (isCLIError(error)) return error;
  if (isAbortError(error)) return transferTimeout(timeoutMs);
  if (error instanceof Error) return networkFailure(error.message, error);
  return networkFailure(String(error));
}
