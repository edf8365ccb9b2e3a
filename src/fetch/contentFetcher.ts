import { open, stat } from "node:fs/promises";
import { posix } from "node:path";
import { setTimeout as delay } from "node:timers/promises";

import type { RetrieverConfig } from "../config/retrieverConfig.js";
import { NetworkError, SchemaError, describeError, isErrnoException } from "../errors.js";
import type { Logger } from "../logger.js";

/**
 * Derives the local file name from the last path segment of the URL, query
 * string and fragment removed.
 */
export function fileNameFromUrl(url: string): string {
  const [withoutQuery = ""] = url.split(/[?#]/, 1);
  let pathname: string;
  try {
    pathname = new URL(withoutQuery).pathname;
  } catch (error) {
    throw new SchemaError(`Extracted value is not a valid URL: ${url}`, { cause: error, context: { url } });
  }
  const name = posix.basename(pathname);
  if (name.length === 0) {
    throw new SchemaError(`Could not derive a file name from URL: ${url}`, { context: { url } });
  }
  return name;
}

/** Walks the `cause` chain looking for a refused TCP connection. */
export function isConnectionRefused(error: unknown): boolean {
  let current: unknown = error;
  for (let depth = 0; depth < 5 && current !== undefined && current !== null; depth += 1) {
    if (isErrnoException(current) && current.code === "ECONNREFUSED") {
      return true;
    }
    current = current instanceof Error ? current.cause : undefined;
  }
  return false;
}

async function existingSize(path: string): Promise<number> {
  try {
    const stats = await stat(path);
    return stats.isFile() ? stats.size : 0;
  } catch (error) {
    if (isErrnoException(error) && error.code === "ENOENT") {
      return 0;
    }
    throw error;
  }
}

export interface DownloadResult {
  readonly path: string;
  /** Bytes written during this call. */
  readonly bytesWritten: number;
  /** True when an existing partial file was continued. */
  readonly resumed: boolean;
  /** Size of the file on disk after the call. */
  readonly sizeBytes: number;
}

export interface ContentFetcherDependencies {
  readonly logger: Logger;
  readonly fetchImpl?: typeof fetch;
  readonly sleep?: (ms: number) => Promise<void>;
}

type FetcherSettings = Pick<RetrieverConfig, "connectRetries" | "connectRetryDelayMs">;

/**
 * Streams a URL to a local file, continuing a partial download with a
 * `Range` request. Refused connections are retried a bounded number of
 * times; every other failure is fatal.
 */
export class ContentFetcher {
  private readonly logger: Logger;
  private readonly fetchImpl: typeof fetch;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(
    private readonly settings: FetcherSettings,
    deps: ContentFetcherDependencies,
  ) {
    this.logger = deps.logger;
    this.fetchImpl = deps.fetchImpl ?? fetch;
    this.sleep = deps.sleep ?? ((ms: number) => delay(ms));
  }

  async download(url: string, destination: string): Promise<DownloadResult> {
    const offset = await existingSize(destination);
    const response = await this.requestWithRetry(url, offset);

    if (response.status === 416 && offset > 0) {
      // The server has nothing past our offset: the partial file is complete.
      await response.body?.cancel();
      this.logger.info("download_already_complete", { url, path: destination, sizeBytes: offset });
      return { path: destination, bytesWritten: 0, resumed: true, sizeBytes: offset };
    }
    if (!response.ok) {
      await response.body?.cancel();
      throw new NetworkError(`Download failed with HTTP ${response.status}: ${url}`, {
        status: response.status,
        context: { url },
      });
    }

    const resumed = response.status === 206 && offset > 0;
    if (offset > 0 && !resumed) {
      this.logger.warn("download_restart", { url, reason: "range_ignored", discardedBytes: offset });
    }
    this.logger.info("download_start", {
      url,
      path: destination,
      resumeFrom: resumed ? offset : 0,
      contentLength: response.headers.get("content-length"),
    });

    const bytesWritten = await this.writeBody(url, response, destination, resumed ? "a" : "w");
    const sizeBytes = (resumed ? offset : 0) + bytesWritten;
    this.logger.info("download_complete", { url, path: destination, bytesWritten, sizeBytes });
    return { path: destination, bytesWritten, resumed, sizeBytes };
  }

  private async requestWithRetry(url: string, offset: number): Promise<Response> {
    const headers = new Headers({ Accept: "*/*" });
    if (offset > 0) {
      headers.set("Range", `bytes=${offset}-`);
    }

    for (let attempt = 1; ; attempt += 1) {
      try {
        return await this.fetchImpl(url, { headers, redirect: "follow" });
      } catch (error) {
        if (isConnectionRefused(error) && attempt <= this.settings.connectRetries) {
          this.logger.warn("download_connection_refused", { url, attempt, retryInMs: this.settings.connectRetryDelayMs });
          await this.sleep(this.settings.connectRetryDelayMs);
          continue;
        }
        throw new NetworkError(`Download request failed for ${url}: ${describeError(error)}`, {
          cause: error,
          context: { url, attempts: attempt },
        });
      }
    }
  }

  private async writeBody(url: string, response: Response, destination: string, flags: "a" | "w"): Promise<number> {
    const handle = await open(destination, flags);
    let written = 0;
    try {
      const body = response.body;
      if (!body) {
        return 0;
      }
      const reader = body.getReader();
      for (;;) {
        const { done, value } = await reader.read();
        if (done) {
          break;
        }
        await handle.write(value);
        written += value.byteLength;
      }
      return written;
    } catch (error) {
      throw new NetworkError(`Download interrupted after ${written} bytes: ${describeError(error)}`, {
        cause: error,
        context: { url, path: destination, bytesWritten: written },
      });
    } finally {
      await handle.close();
    }
  }
}
