import type { DelayFn } from "./ports/timer.js";
import { realDelay } from "./adapters/real-timers.js";
import { CLIError } from "./errors/types.js";

/**
 * Options for the generic polling function.
 */
export interface PollingOptions<T> {
  /** Function to fetch current status */
  fetchStatus: () => Promise<T>;
  /** Check if polling should complete successfully */
  isComplete: (result: T) => boolean;
  /** Return the error to raise when the result is terminal and unsuccessful */
  failure: (result: T) => CLIError | undefined;
  /** Interval between polls in milliseconds */
  intervalMs: number;
  /** Maximum number of poll attempts */
  maxAttempts: number;
  /** Optional callback for progress updates */
  onProgress?: (result: T, attempt: number) => void;
  /** Optional delay function for testing */
  delay?: DelayFn;
}

/**
 * Poll until a long-running server-side job completes.
 * The first status is fetched immediately; later ones after `intervalMs`.
 */
export async function poll<T>(options: PollingOptions<T>): Promise<T> {
  const {
    fetchStatus,
    isComplete,
    failure,
    intervalMs,
    maxAttempts,
    onProgress,
    delay = realDelay,
  } = options;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    if (attempt > 1) {
      await delay(intervalMs);
    }

    const result = await fetchStatus();

    if (isComplete(result)) {
      return result;
    }

    const error = failure(result);
    if (error) {
      throw error;
    }

    onProgress?.(result, attempt);
  }

  throw new CLIError(
    "TRANSFER_TIMEOUT",
    `Job did not finish after ${maxAttempts} status checks`,
    {
      suggestion: "The archive queue may be busy. Re-run later; finished files are skipped",
    }
  );
}
