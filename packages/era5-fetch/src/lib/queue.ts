import type { Logger } from "./logger.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface QueueTask<T> {
  /** Unique identifier for this task (the destination path for transfers) */
  id: string;
  /** Function that performs the actual work */
  execute: () => Promise<T>;
}

export interface QueueOptions {
  /** Maximum number of concurrent tasks */
  concurrency: number;
  /** Logger instance for queue operations */
  logger: Logger;
}

export interface QueueStats {
  /** Number of tasks waiting to be processed */
  pending: number;
  /** Number of tasks currently being processed */
  active: number;
  /** Number of tasks that resolved */
  completed: number;
  /** Number of tasks that threw */
  failed: number;
  /** Tasks dropped because a task with the same id was already queued */
  duplicates: number;
  /** Average processing time in milliseconds */
  averageLatencyMs: number;
}

export interface WorkQueue<T> {
  /** Add a task; returns false when its id was already seen */
  enqueue(task: QueueTask<T>): boolean;
  /** Get current queue statistics */
  getStats(): QueueStats;
  /** Wait for all pending and active tasks to complete */
  drain(): Promise<void>;
}

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

/** Maximum number of latency samples to keep for rolling average */
const MAX_LATENCY_SAMPLES = 100;

// ---------------------------------------------------------------------------
// Implementation
// ---------------------------------------------------------------------------

/**
 * Create a bounded-concurrency work queue.
 * With concurrency 1, tasks run strictly one after another in enqueue order.
 * Each id runs at most once per queue.
 */
export function createQueue<T>(options: QueueOptions): WorkQueue<T> {
  const { concurrency, logger } = options;

  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new RangeError(`concurrency must be a positive integer, got ${concurrency}`);
  }

  const pending: QueueTask<T>[] = [];
  const active = new Set<string>();
  const seen = new Set<string>();
  const latencies: number[] = [];
  const drainWaiters: Array<() => void> = [];

  let completed = 0;
  let failed = 0;
  let duplicates = 0;

  function getStats(): QueueStats {
    const avgLatency =
      latencies.length > 0
        ? latencies.reduce((a, b) => a + b, 0) / latencies.length
        : 0;

    return {
      pending: pending.length,
      active: active.size,
      completed,
      failed,
      duplicates,
      averageLatencyMs: Math.round(avgLatency),
    };
  }

  function checkDrainComplete(): void {
    if (pending.length === 0 && active.size === 0) {
      for (const resolve of drainWaiters.splice(0)) resolve();
    }
  }

  function processNext(): void {
    while (active.size < concurrency && pending.length > 0) {
      const task = pending.shift();
      if (task) {
        active.add(task.id);
        void processTask(task);
      }
    }
    checkDrainComplete();
  }

  async function processTask(task: QueueTask<T>): Promise<void> {
    const startTime = Date.now();
    logger.debug("Processing task", { taskId: task.id });

    try {
      await task.execute();
      latencies.push(Date.now() - startTime);
      if (latencies.length > MAX_LATENCY_SAMPLES) latencies.shift();
      completed++;
    } catch (error) {
      failed++;
      logger.error("Task failed", {
        taskId: task.id,
        error: error instanceof Error ? error.message : String(error),
      });
    } finally {
      active.delete(task.id);
      processNext();
    }
  }

  function enqueue(task: QueueTask<T>): boolean {
    if (seen.has(task.id)) {
      duplicates++;
      logger.debug("Duplicate task dropped", { taskId: task.id });
      return false;
    }
    seen.add(task.id);
    pending.push(task);
    processNext();
    return true;
  }

  function drain(): Promise<void> {
    if (pending.length === 0 && active.size === 0) {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      drainWaiters.push(resolve);
    });
  }

  return {
    enqueue,
    getStats,
    drain,
  };
}
