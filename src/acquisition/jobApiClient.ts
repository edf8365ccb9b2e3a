import { NetworkError, describeError } from "../errors.js";
import { type JsonValue, parseResponseDocument } from "./responseTree.js";

/** Timeout applied to a single API request, in milliseconds. */
const DEFAULT_REQUEST_TIMEOUT_MS = 60_000;

/** Raw body plus its parsed document, whatever the HTTP status. */
export interface ApiResponse {
  readonly status: number;
  readonly ok: boolean;
  readonly body: string;
  /** Parsed JSON document, or `null` when the body is not JSON. */
  readonly document: JsonValue | null;
}

export interface CreateJobRequest {
  readonly client: string;
  readonly provider?: string;
}

/** Endpoints of the remote job service. */
export interface JobApi {
  createJob(request: CreateJobRequest): Promise<ApiResponse>;
  getJob(jobId: string): Promise<ApiResponse>;
  getClientUrl(client: string): Promise<ApiResponse>;
}

export interface JobApiClientOptions {
  readonly apiBase: string;
  readonly fetchImpl?: typeof fetch;
  readonly requestTimeoutMs?: number;
}

/**
 * HTTP client for the job service. Non-2xx statuses are returned to the
 * caller, which decides whether they are fatal; only transport failures
 * raise {@link NetworkError}.
 */
export class JobApiClient implements JobApi {
  private readonly apiBase: string;
  private readonly fetchImpl: typeof fetch;
  private readonly requestTimeoutMs: number;

  constructor(options: JobApiClientOptions) {
    this.apiBase = options.apiBase.replace(/\/+$/, "");
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.requestTimeoutMs = options.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
  }

  /** `POST /job` with `{client, provider?}`. */
  async createJob(request: CreateJobRequest): Promise<ApiResponse> {
    const payload: CreateJobRequest =
      request.provider !== undefined && request.provider.length > 0
        ? { client: request.client, provider: request.provider }
        : { client: request.client };
    return this.request("POST", "/job", JSON.stringify(payload));
  }

  /** `GET /jobs/{id}`. */
  async getJob(jobId: string): Promise<ApiResponse> {
    return this.request("GET", `/jobs/${encodeURIComponent(jobId)}`);
  }

  /** `GET /url/client/{client}`, the synchronous fallback endpoint. */
  async getClientUrl(client: string): Promise<ApiResponse> {
    return this.request("GET", `/url/client/${encodeURIComponent(client)}`);
  }

  private async request(method: "GET" | "POST", path: string, body?: string): Promise<ApiResponse> {
    const url = `${this.apiBase}${path}`;
    const headers = new Headers({ Accept: "application/json" });
    if (body !== undefined) {
      headers.set("Content-Type", "application/json");
    }

    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.requestTimeoutMs);
    try {
      const response = await this.fetchImpl(url, {
        method,
        headers,
        signal: controller.signal,
        ...(body !== undefined ? { body } : {}),
      });
      const text = await response.text();
      return {
        status: response.status,
        ok: response.ok,
        body: text,
        document: parseResponseDocument(text),
      };
    } catch (error) {
      const reason = controller.signal.aborted
        ? `timed out after ${this.requestTimeoutMs} ms`
        : describeError(error);
      throw new NetworkError(`${method} ${path} failed: ${reason}`, {
        cause: error,
        context: { url },
      });
    } finally {
      clearTimeout(timeout);
    }
  }
}
