import { setTimeout as delay } from "node:timers/promises";

import type { RetrieverConfig } from "../config/retrieverConfig.js";
import { JobFailureError, NoUrlError, PollTimeoutError, SchemaError } from "../errors.js";
import type { Logger } from "../logger.js";
import { AdditiveBackoff } from "./backoff.js";
import type { ApiResponse, JobApi } from "./jobApiClient.js";
import { extractPreferredUrl, firstScalarAt, isJsonObject } from "./responseTree.js";

export type JobStatus = "pending" | "done" | "error" | "failed" | "cancelled" | "unknown";

/** Where the job identifier may live in a `POST /job` response, by priority. */
export const JOB_ID_POINTERS = [
  "/jobID",
  "/jobId",
  "/id",
  "/data/jobID",
  "/data/jobId",
  "/data/id",
  "/job/id",
  "/job/jobID",
  "/job/jobId",
  "/result/jobID",
  "/result/jobId",
  "/result/id",
] as const;

/** Where the status may live in a `GET /jobs/{id}` response, by priority. */
export const JOB_STATUS_POINTERS = ["/status", "/data/status", "/job/status"] as const;

const KNOWN_STATUSES = ["pending", "done", "error", "failed", "cancelled"] as const satisfies readonly JobStatus[];
const TERMINAL_FAILURES: ReadonlySet<JobStatus> = new Set<JobStatus>(["error", "failed", "cancelled"]);

/** Shape a whole response body must have to be taken as a bare identifier. */
const BARE_IDENTIFIER = /^[A-Za-z0-9._:-]+$/;

/** Longest body excerpt attached to diagnostics. */
const MAX_CONTEXT_BODY = 4_096;

/**
 * Reads the job identifier from a creation response. The bare-body fallback
 * only applies when the body is not a JSON object or array, so a well-formed
 * document with unexpected keys is never mistaken for an identifier.
 */
export function extractJobId(response: Pick<ApiResponse, "body" | "document">): string | null {
  const fromPointers = firstScalarAt(response.body, JOB_ID_POINTERS);
  if (fromPointers !== null && fromPointers !== "null") {
    return fromPointers;
  }

  if (isJsonObject(response.document) || Array.isArray(response.document)) {
    return null;
  }
  // A JSON string body counts as the identifier itself.
  const candidate = (typeof response.document === "string" ? response.document : response.body).trim();
  if (BARE_IDENTIFIER.test(candidate) && candidate !== "null") {
    return candidate;
  }
  return null;
}

export interface ObservedStatus {
  readonly status: JobStatus;
  /** Raw value found in the document, for diagnostics. */
  readonly raw: string | null;
}

export function readJobStatus(body: string): ObservedStatus {
  const raw = firstScalarAt(body, JOB_STATUS_POINTERS);
  const known = KNOWN_STATUSES.find((status) => status === raw);
  return { status: known ?? "unknown", raw };
}

/** "No URL present" is not fatal inside a polling loop: the next response may carry one. */
function urlOrNull(body: string): string | null {
  try {
    return extractPreferredUrl(body);
  } catch (error) {
    if (error instanceof NoUrlError) {
      return null;
    }
    throw error;
  }
}

function responseContext(response: ApiResponse): Record<string, unknown> {
  const body =
    response.body.length > MAX_CONTEXT_BODY ? `${response.body.slice(0, MAX_CONTEXT_BODY)}…` : response.body;
  return { httpStatus: response.status, lastResponse: body };
}

/** Result of {@link JobCoordinator.acquireUrl}. */
export interface AcquiredUrl {
  readonly url: string;
  readonly via: "job" | "sync";
  readonly jobId: string | null;
}

export interface JobCoordinatorDependencies {
  readonly api: JobApi;
  readonly logger: Logger;
  readonly sleep?: (ms: number) => Promise<void>;
  readonly now?: () => number;
}

type PollingSettings = Pick<RetrieverConfig, "pollIntervalSec" | "pollMaxIntervalSec" | "jobTimeoutSec" | "syncTimeoutSec">;

/**
 * Drives the acquisition state machine: create a job, poll it until a URL
 * appears, and fall back to the synchronous endpoint when no job could be
 * created. Every loop is cooperative: the timeout is checked once per
 * iteration and sleeps go through the injected `sleep`.
 */
export class JobCoordinator {
  private readonly api: JobApi;
  private readonly logger: Logger;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly now: () => number;

  constructor(
    private readonly settings: PollingSettings,
    deps: JobCoordinatorDependencies,
  ) {
    this.api = deps.api;
    this.logger = deps.logger;
    this.sleep = deps.sleep ?? ((ms: number) => delay(ms));
    this.now = deps.now ?? Date.now;
  }

  /**
   * Creates the remote job. Throws {@link SchemaError} on a non-2xx status or
   * when no identifier can be read; callers treat it as the signal to use the
   * synchronous fallback.
   */
  async createJob(client: string, provider?: string): Promise<string> {
    this.logger.info("job_create", { client, provider: provider ?? null });
    const response = await this.api.createJob(provider !== undefined ? { client, provider } : { client });
    this.logger.info("job_create_response", { httpStatus: response.status });

    if (!response.ok) {
      throw new SchemaError(`POST /job answered HTTP ${response.status}`, { context: responseContext(response) });
    }
    const jobId = extractJobId(response);
    if (jobId === null) {
      throw new SchemaError("Could not extract a job identifier from POST /job", {
        context: responseContext(response),
      });
    }
    this.logger.info("job_created", { jobId });
    return jobId;
  }

  /** Polls `GET /jobs/{id}` until the job is done and exposes a URL. */
  async pollJob(jobId: string, timeoutSec: number = this.settings.jobTimeoutSec): Promise<string> {
    this.logger.info("job_poll_start", { jobId, timeoutSec });
    const startedAt = this.now();
    const backoff = this.createBackoff();

    for (;;) {
      const response = await this.api.getJob(jobId);
      if (!response.ok) {
        this.logger.warn("job_poll_http_error", { jobId, httpStatus: response.status });
      }

      const observed = readJobStatus(response.body);
      if (observed.status === "done") {
        const url = urlOrNull(response.body);
        if (url !== null) {
          this.logger.info("job_done", { jobId, url });
          return url;
        }
        this.logger.info("job_done_without_url", { jobId });
      } else if (TERMINAL_FAILURES.has(observed.status)) {
        throw new JobFailureError(jobId, observed.raw ?? observed.status, { context: responseContext(response) });
      } else {
        this.logger.debug("job_poll_status", { jobId, status: observed.raw });
      }

      this.assertWithinBudget(startedAt, timeoutSec, response, `Timed out after ${timeoutSec}s waiting for job ${jobId}`);
      await this.sleep(backoff.currentSec * 1_000);
      backoff.advance();
    }
  }

  /** Polls `GET /url/client/{client}` until its body carries a URL. */
  async pollSync(client: string, timeoutSec: number = this.settings.syncTimeoutSec): Promise<string> {
    this.logger.info("sync_poll_start", { client, timeoutSec });
    const startedAt = this.now();
    const backoff = this.createBackoff();

    for (;;) {
      const response = await this.api.getClientUrl(client);
      if (!response.ok) {
        this.logger.warn("sync_poll_http_error", { client, httpStatus: response.status });
      }

      const url = urlOrNull(response.body);
      if (url !== null) {
        this.logger.info("sync_url_ready", { client, url });
        return url;
      }

      this.assertWithinBudget(startedAt, timeoutSec, response, `Timed out after ${timeoutSec}s waiting for a URL`);
      await this.sleep(backoff.currentSec * 1_000);
      backoff.advance();
    }
  }

  /** Full acquisition: asynchronous job path, synchronous fallback on {@link SchemaError}. */
  async acquireUrl(client: string, provider?: string): Promise<AcquiredUrl> {
    let jobId: string;
    try {
      jobId = await this.createJob(client, provider);
    } catch (error) {
      if (!(error instanceof SchemaError)) {
        throw error;
      }
      this.logger.warn("job_create_fallback", { reason: error.message, ...error.context });
      const url = await this.pollSync(client);
      return { url, via: "sync", jobId: null };
    }

    const url = await this.pollJob(jobId);
    return { url, via: "job", jobId };
  }

  private createBackoff(): AdditiveBackoff {
    return new AdditiveBackoff(this.settings.pollIntervalSec, this.settings.pollMaxIntervalSec);
  }

  private assertWithinBudget(startedAt: number, timeoutSec: number, response: ApiResponse, message: string): void {
    const elapsedSec = (this.now() - startedAt) / 1_000;
    if (elapsedSec >= timeoutSec) {
      throw new PollTimeoutError(message, timeoutSec, { context: responseContext(response) });
    }
  }
}
