import type { ArchiveKind, LevelType } from "../archive/types.js";

export type FailureReason =
  | "AuthMissing"
  | "NetworkError"
  | "ServerError"
  | "CorruptOrErrorPayload";

export type TransferOutcome =
  | { status: "downloaded"; path: string; bytes: number }
  | { status: "skipped"; path: string; reason: "AlreadyExists" }
  | { status: "failed"; path: string; reason: FailureReason; message: string };

/** Per-batch counters; merging is associative and commutative. */
export interface BatchResult {
  downloaded: number;
  skipped: number;
  failed: number;
}

export function emptyResult(): BatchResult {
  return { downloaded: 0, skipped: 0, failed: 0 };
}

export function recordOutcome(result: BatchResult, outcome: TransferOutcome): BatchResult {
  switch (outcome.status) {
    case "downloaded":
      return { ...result, downloaded: result.downloaded + 1 };
    case "skipped":
      return { ...result, skipped: result.skipped + 1 };
    case "failed":
      return { ...result, failed: result.failed + 1 };
  }
}

export function mergeResults(...results: BatchResult[]): BatchResult {
  return results.reduce(
    (total, r) => ({
      downloaded: total.downloaded + r.downloaded,
      skipped: total.skipped + r.skipped,
      failed: total.failed + r.failed,
    }),
    emptyResult()
  );
}

export interface GroupResult {
  levelType: LevelType;
  directory: string;
  result: BatchResult;
}

export interface RunSummary {
  archive: ArchiveKind;
  groups: GroupResult[];
  total: BatchResult;
  elapsedMs: number;
  /** 1 when any unit failed */
  exitCode: 0 | 1;
}

export function exitCodeFor(total: BatchResult): 0 | 1 {
  return total.failed > 0 ? 1 : 0;
}
