import { z } from "zod";
import type { RequestInit } from "node-fetch";
import type { BulkRequest } from "./archive/types.js";
import type { Credentials } from "./credentials.js";
import { networkFailure } from "./errors/catalog.js";
import { assertOk, defaultFetch, toTransferError, writeBody, type FetchLike } from "./http.js";

// ---------------------------------------------------------------------------
// Response schemas
// ---------------------------------------------------------------------------

export const JobStatusSchema = z.enum([
  "accepted",
  "running",
  "successful",
  "failed",
  "rejected",
  "dismissed",
]);

export type JobStatus = z.infer<typeof JobStatusSchema>;

export const JobSchema = z.object({
  jobID: z.string(),
  status: JobStatusSchema,
  message: z.string().optional(),
});

export type Job = z.infer<typeof JobSchema>;

export const ResultsSchema = z.object({
  asset: z.object({
    value: z.object({
      href: z.string(),
      "file:size": z.number().optional(),
    }),
  }),
});

export type JobResults = z.infer<typeof ResultsSchema>;

// ---------------------------------------------------------------------------
// Client
// ---------------------------------------------------------------------------

export interface CdsClientOptions {
  credentials: Credentials;
  /** Upper bound for each HTTP exchange */
  timeoutMs: number;
  fetchImpl?: FetchLike;
}

export interface CdsClient {
  submit(dataset: string, request: BulkRequest): Promise<Job>;
  getJob(jobId: string): Promise<Job>;
  getResults(jobId: string): Promise<JobResults>;
  download(href: string, outputPath: string): Promise<number>;
}

/**
 * Client for the CDS retrieve API (OGC API - Processes).
 * `credentials.identity` is the API root, e.g. https://cds.climate.copernicus.eu/api
 */
export function createCdsClient({
  credentials,
  timeoutMs,
  fetchImpl = defaultFetch,
}: CdsClientOptions): CdsClient {
  const apiRoot = credentials.identity.replace(/\/+$/, "");

  async function request<T>(path: string, schema: z.ZodType<T>, init: RequestInit = {}): Promise<T> {
    const headers: Record<string, string> = {
      Accept: "application/json",
      "PRIVATE-TOKEN": credentials.secret,
    };
    if (init.body) headers["Content-Type"] = "application/json";

    try {
      const response = await fetchImpl(`${apiRoot}${path}`, {
        ...init,
        headers,
        signal: AbortSignal.timeout(timeoutMs),
      });
      await assertOk(response);

      const parsed = schema.safeParse(await response.json());
      if (!parsed.success) {
        const issues = parsed.error.issues
          .map((i) => `${i.path.join(".")}: ${i.message}`)
          .join("; ");
        throw networkFailure(`Unexpected response from ${path}: ${issues}`);
      }
      return parsed.data;
    } catch (error) {
      throw toTransferError(error, timeoutMs);
    }
  }

  return {
    submit: (dataset, body) =>
      request(`/retrieve/v1/processes/${encodeURIComponent(dataset)}/execution`, JobSchema, {
        method: "POST",
        body: JSON.stringify({ inputs: body }),
      }),
    getJob: (jobId) =>
      request(`/retrieve/v1/jobs/${encodeURIComponent(jobId)}`, JobSchema),
    getResults: (jobId) =>
      request(`/retrieve/v1/jobs/${encodeURIComponent(jobId)}/results`, ResultsSchema),
    async download(href, outputPath) {
      try {
        const response = await fetchImpl(new URL(href, `${apiRoot}/`).toString(), {
          method: "GET",
          signal: AbortSignal.timeout(timeoutMs),
        });
        await assertOk(response);
        return await writeBody(response, outputPath);
      } catch (error) {
        throw toTransferError(error, timeoutMs);
      }
    },
  };
}
