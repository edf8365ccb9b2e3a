/**
 * Error taxonomy shared by every stage of the retriever. Each class carries a
 * stable machine-readable code plus an optional diagnostic context (last
 * response body, offending path, ...) that the top-level CLI handler prints
 * for operator triage.
 */

export const ERROR_CONFIG = "E-CONFIG" as const;
export const ERROR_USAGE = "E-USAGE" as const;
export const ERROR_NETWORK = "E-NETWORK" as const;
export const ERROR_SCHEMA = "E-SCHEMA" as const;
export const ERROR_NO_URL = "E-NO-URL" as const;
export const ERROR_JOB_FAILED = "E-JOB-FAILED" as const;
export const ERROR_TIMEOUT = "E-TIMEOUT" as const;
export const ERROR_UNSUPPORTED_FS = "E-UNSUPPORTED-FS" as const;
export const ERROR_CAR_NO_HEADER = "E-CAR-NO-HEADER" as const;
export const ERROR_CAR_TRUNCATED = "E-CAR-TRUNCATED" as const;
export const ERROR_CAR_NOT_FOUND = "E-CAR-NOT-FOUND" as const;
export const ERROR_EXTRACT_UNAVAILABLE = "E-EXTRACT-UNAVAILABLE" as const;
export const ERROR_EXTRACT_EXHAUSTED = "E-EXTRACT-EXHAUSTED" as const;

export type RetrieverErrorCode =
  | typeof ERROR_CONFIG
  | typeof ERROR_USAGE
  | typeof ERROR_NETWORK
  | typeof ERROR_SCHEMA
  | typeof ERROR_NO_URL
  | typeof ERROR_JOB_FAILED
  | typeof ERROR_TIMEOUT
  | typeof ERROR_UNSUPPORTED_FS
  | typeof ERROR_CAR_NO_HEADER
  | typeof ERROR_CAR_TRUNCATED
  | typeof ERROR_CAR_NOT_FOUND
  | typeof ERROR_EXTRACT_UNAVAILABLE
  | typeof ERROR_EXTRACT_EXHAUSTED;

export interface RetrieverErrorOptions {
  readonly context?: Record<string, unknown>;
  readonly cause?: unknown;
}

/** Base class of every failure surfaced by the retriever. */
export class RetrieverError extends Error {
  readonly code: RetrieverErrorCode;
  readonly context: Record<string, unknown>;

  constructor(code: RetrieverErrorCode, message: string, options: RetrieverErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = "RetrieverError";
    this.code = code;
    this.context = options.context ?? {};
  }
}

/** The resolved configuration failed validation. */
export class ConfigError extends RetrieverError {
  constructor(message: string, options?: RetrieverErrorOptions) {
    super(ERROR_CONFIG, message, options);
    this.name = "ConfigError";
  }
}

/** Command-line arguments could not be interpreted. */
export class UsageError extends RetrieverError {
  constructor(message: string, options?: RetrieverErrorOptions) {
    super(ERROR_USAGE, message, options);
    this.name = "UsageError";
  }
}

/** Request or transport failure. Not retried beyond the transport-level retry. */
export class NetworkError extends RetrieverError {
  readonly status: number | null;

  constructor(message: string, options: RetrieverErrorOptions & { status?: number | null } = {}) {
    super(ERROR_NETWORK, message, options);
    this.name = "NetworkError";
    this.status = options.status ?? null;
  }
}

/** An expected field is absent from a response. */
export class SchemaError extends RetrieverError {
  constructor(message: string, options?: RetrieverErrorOptions) {
    super(ERROR_SCHEMA, message, options);
    this.name = "SchemaError";
  }
}

/** A response document does not carry any absolute URL yet. */
export class NoUrlError extends RetrieverError {
  constructor(options?: RetrieverErrorOptions) {
    super(ERROR_NO_URL, "No URL present in response.", options);
    this.name = "NoUrlError";
  }
}

/** The remote job reported an explicit terminal failure. */
export class JobFailureError extends RetrieverError {
  readonly status: string;

  constructor(jobId: string, status: string, options?: RetrieverErrorOptions) {
    super(ERROR_JOB_FAILED, `Job ${jobId} ended with status: ${status}`, options);
    this.name = "JobFailureError";
    this.status = status;
  }
}

/** A polling loop exhausted its time budget. */
export class PollTimeoutError extends RetrieverError {
  readonly timeoutSec: number;

  constructor(message: string, timeoutSec: number, options?: RetrieverErrorOptions) {
    super(ERROR_TIMEOUT, message, options);
    this.name = "PollTimeoutError";
    this.timeoutSec = timeoutSec;
  }
}

/** No copy-on-write clone is possible and a full copy was not authorised. */
export class UnsupportedFilesystemError extends RetrieverError {
  constructor(source: string, options?: RetrieverErrorOptions) {
    super(
      ERROR_UNSUPPORTED_FS,
      `Fast clone unsupported on this filesystem for ${source}. Re-run with --allow-copy (or ALLOW_COPY=1) to permit a real copy.`,
      options,
    );
    this.name = "UnsupportedFilesystemError";
  }
}

/** The container does not start with a usable header length. */
export class NoHeaderError extends RetrieverError {
  constructor(path: string, options?: RetrieverErrorOptions) {
    super(ERROR_CAR_NO_HEADER, `CAR header length missing or invalid in ${path}`, options);
    this.name = "NoHeaderError";
  }
}

/** The stream ended before a section length prefix could be decoded. */
export class TruncatedSectionError extends RetrieverError {
  readonly offset: number;

  constructor(path: string, offset: number, options?: RetrieverErrorOptions) {
    super(ERROR_CAR_TRUNCATED, `CAR section prefix truncated at offset ${offset} in ${path}`, options);
    this.name = "TruncatedSectionError";
    this.offset = offset;
  }
}

/** Neither the given path nor its suffix variant exists. */
export class CarFileNotFoundError extends RetrieverError {
  constructor(path: string, options?: RetrieverErrorOptions) {
    super(ERROR_CAR_NOT_FOUND, `CAR file not found: ${path}`, options);
    this.name = "CarFileNotFoundError";
  }
}

/** No extractor executable could be located. */
export class ExtractorUnavailableError extends RetrieverError {
  constructor(message: string, options?: RetrieverErrorOptions) {
    super(ERROR_EXTRACT_UNAVAILABLE, message, options);
    this.name = "ExtractorUnavailableError";
  }
}

/** Every backend, including its single repair-retry, failed. */
export class ExtractionExhaustedError extends RetrieverError {
  constructor(message: string, options?: RetrieverErrorOptions) {
    super(ERROR_EXTRACT_EXHAUSTED, message, options);
    this.name = "ExtractionExhaustedError";
  }
}

/** Lightweight errno-flavoured error as thrown by `node:fs`. */
export interface ErrnoException extends Error {
  code?: string;
  errno?: number;
  syscall?: string;
  path?: string;
}

export function isErrnoException(error: unknown): error is ErrnoException {
  return error instanceof Error && "code" in error;
}

/** Renders an unknown thrown value as a message string. */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
