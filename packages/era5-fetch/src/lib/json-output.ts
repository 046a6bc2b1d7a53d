/**
 * JSON output utilities for machine-readable CLI output.
 * Provides consistent schemas and output helpers.
 */

import { isJsonMode } from "./cli-context.js";
import type { ArchiveKind, LevelType } from "./archive/types.js";
import type { BatchResult, FailureReason } from "./transfer/outcome.js";

// ============================================================================
// Base Types
// ============================================================================

export interface JsonSuccess<T> {
  success: true;
  data: T;
  meta?: {
    duration?: number;
    version?: string;
  };
}

// ============================================================================
// Command-Specific Schemas
// ============================================================================

export type DownloadEventJson =
  | {
      type: "batch-start";
      timestamp: string;
      data: { levelType: LevelType; directory: string; units: number };
    }
  | {
      type: "file";
      timestamp: string;
      data: {
        unit: string;
        path: string;
        status: "downloaded" | "skipped" | "failed";
        bytes?: number;
        reason?: FailureReason | "AlreadyExists";
        error?: string;
      };
    }
  | {
      type: "batch-end";
      timestamp: string;
      data: { levelType: LevelType; result: BatchResult };
    }
  | {
      type: "summary";
      timestamp: string;
      data: {
        archive: ArchiveKind;
        total: BatchResult;
        elapsedMs: number;
        exitCode: number;
      };
    };

export interface AuthStatusJson {
  archive: ArchiveKind;
  authenticated: boolean;
  source?: string;
  identity?: string;
}

export interface VariablesJson {
  archive: ArchiveKind;
  groups: Array<{
    levelType: LevelType;
    variables: Array<{ name: string; code?: string; description?: string }>;
    levels?: string[];
  }>;
}

export interface ConfigShowJson {
  effective: Record<string, unknown>;
  sources: string[];
}

// ============================================================================
// Output Functions
// ============================================================================

/**
 * Output a successful JSON result to stdout.
 */
export function outputSuccess<T>(data: T, meta?: JsonSuccess<T>["meta"]): void {
  const result: JsonSuccess<T> = {
    success: true,
    data,
    ...(meta && { meta }),
  };
  console.log(JSON.stringify(result, null, 2));
}

/**
 * Output an NDJSON event (one line per event while a download runs).
 */
export function outputNdjson(event: DownloadEventJson, write: (line: string) => void = console.log): void {
  write(JSON.stringify(event));
}

/**
 * Conditionally output JSON or return false for human output.
 * Use this to check if JSON mode is enabled before outputting.
 */
export function maybeOutputJson<T>(data: T, meta?: JsonSuccess<T>["meta"]): boolean {
  if (isJsonMode()) {
    outputSuccess(data, meta);
    return true;
  }
  return false;
}
