import type { Transport } from "../ports/transport.js";
import type { DelayFn } from "../ports/timer.js";
import type { Logger } from "../logger.js";
import { createCdsClient, type Job } from "../cds-client.js";
import { jobFailed } from "../errors/catalog.js";
import type { FetchLike } from "../http.js";
import { poll } from "../polling.js";

export interface CdsTransportOptions {
  pollIntervalMs: number;
  pollMaxAttempts: number;
  logger: Logger;
  fetchImpl?: FetchLike;
  delay?: DelayFn;
}

const TERMINAL_FAILURES: ReadonlySet<Job["status"]> = new Set(["failed", "rejected", "dismissed"]);

/**
 * CDS transport: submit the request, wait for the job, stream the result.
 * The server may queue a job for a long time; only the polling budget bounds that wait.
 */
export function createCdsTransport(options: CdsTransportOptions): Transport {
  const { pollIntervalMs, pollMaxAttempts, logger, fetchImpl, delay } = options;

  return {
    async retrieve({ target, credentials, outputPath, timeoutMs }): Promise<void> {
      if (target.kind !== "bulk") {
        throw new TypeError(`CDS transport cannot retrieve ${target.kind} targets`);
      }

      const client = createCdsClient({ credentials, timeoutMs, fetchImpl });
      const submitted = await client.submit(target.dataset, target.request);
      const log = logger.child({ jobId: submitted.jobID, file: target.filename });
      log.debug("Retrieve job submitted", { dataset: target.dataset, status: submitted.status });

      const finished =
        submitted.status === "successful"
          ? submitted
          : await poll({
              fetchStatus: () => client.getJob(submitted.jobID),
              isComplete: (job) => job.status === "successful",
              failure: (job) =>
                TERMINAL_FAILURES.has(job.status)
                  ? jobFailed(job.jobID, job.message ?? `status ${job.status}`)
                  : undefined,
              intervalMs: pollIntervalMs,
              maxAttempts: pollMaxAttempts,
              onProgress: (job, attempt) => log.debug("Waiting for retrieve job", { status: job.status, attempt }),
              delay,
            });

      const results = await client.getResults(finished.jobID);
      const bytes = await client.download(results.asset.value.href, outputPath);
      log.debug("Retrieve job downloaded", { bytes });
    },
  };
}
