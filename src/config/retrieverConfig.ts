import { z } from "zod";

import { ConfigError } from "../errors.js";
import { omitUndefinedEntries } from "../utils/object.js";
import { DEFAULT_LOG_MAX_BYTES, DEFAULT_LOG_MAX_FILES, type LogLevel } from "../logger.js";
import {
  type EnvSource,
  readBool,
  readEnum,
  readInt,
  readOptionalEnum,
  readOptionalString,
  readString,
} from "./env.js";

export const DEFAULT_API_BASE = "https://api.sp-tool.allocator.tech";
const DEFAULT_POLL_INTERVAL_SEC = 2;
const DEFAULT_POLL_MAX_INTERVAL_SEC = 15;
const DEFAULT_JOB_TIMEOUT_SEC = 900;
const DEFAULT_SYNC_TIMEOUT_SEC = 900;
const DEFAULT_CONNECT_RETRIES = 5;
const DEFAULT_CONNECT_RETRY_DELAY_MS = 1_000;

export const OS_FAMILIES = ["macos", "debian", "fedora", "arch", "windows", "unknown"] as const;
export type OsFamily = (typeof OS_FAMILIES)[number];

const LOG_LEVELS = ["debug", "info", "warn", "error"] as const satisfies readonly LogLevel[];

/**
 * Immutable settings threaded through every component. Built once at start-up
 * from the environment, then overlaid with command-line flags.
 */
export interface RetrieverConfig {
  /** Base URL of the job API (no trailing slash). */
  readonly apiBase: string;
  /** First sleep between two polls, in seconds. */
  readonly pollIntervalSec: number;
  /** Ceiling of the additive backoff, in seconds. */
  readonly pollMaxIntervalSec: number;
  /** Budget of the asynchronous job polling loop, in seconds. */
  readonly jobTimeoutSec: number;
  /** Budget of the synchronous fallback loop, in seconds. */
  readonly syncTimeoutSec: number;
  /** Permit a full byte copy when the filesystem cannot clone. */
  readonly allowCopy: boolean;
  /** Move the ipfs-car backend in front of the go-car ones. */
  readonly preferIpfsCar: boolean;
  /** OS family hint for the dependency bootstrap; detected when null. */
  readonly osFamily: OsFamily | null;
  /** Attempts granted to a download when the connection is refused. */
  readonly connectRetries: number;
  readonly connectRetryDelayMs: number;
  /** Optional mirror file for structured logs. */
  readonly logFile: string | null;
  /** Size at which the mirror file is rotated, in bytes. */
  readonly logMaxBytes: number;
  /** Mirror files kept by rotation, the active one included. */
  readonly logMaxFiles: number;
  readonly logLevel: LogLevel;
}

const httpUrl = z
  .string()
  .url()
  .refine((value) => /^https?:\/\//i.test(value), { message: "must be an http(s) URL" })
  .transform((value) => value.replace(/\/+$/, ""));

const retrieverConfigSchema = z
  .object({
    apiBase: httpUrl,
    pollIntervalSec: z.number().int().positive(),
    pollMaxIntervalSec: z.number().int().positive(),
    jobTimeoutSec: z.number().int().nonnegative(),
    syncTimeoutSec: z.number().int().nonnegative(),
    allowCopy: z.boolean(),
    preferIpfsCar: z.boolean(),
    osFamily: z.enum(OS_FAMILIES).nullable(),
    connectRetries: z.number().int().nonnegative(),
    connectRetryDelayMs: z.number().int().nonnegative(),
    logFile: z.string().min(1).nullable(),
    logMaxBytes: z.number().int().positive(),
    logMaxFiles: z.number().int().positive(),
    logLevel: z.enum(LOG_LEVELS),
  })
  .refine((config) => config.pollMaxIntervalSec >= config.pollIntervalSec, {
    message: "pollMaxIntervalSec must be greater than or equal to pollIntervalSec",
    path: ["pollMaxIntervalSec"],
  });

/** Subset of fields the CLI is allowed to override. */
export type RetrieverConfigOverrides = Partial<{ -readonly [K in keyof RetrieverConfig]: RetrieverConfig[K] }>;

/** Reads the raw (unvalidated) settings from the environment. */
export function readRetrieverEnv(env: EnvSource = process.env): RetrieverConfig {
  return {
    apiBase: readString("API_BASE", DEFAULT_API_BASE, env),
    pollIntervalSec: readInt("POLL_INTERVAL", DEFAULT_POLL_INTERVAL_SEC, { min: 1 }, env),
    pollMaxIntervalSec: readInt("POLL_MAX_INTERVAL", DEFAULT_POLL_MAX_INTERVAL_SEC, { min: 1 }, env),
    jobTimeoutSec: readInt("POLL_TIMEOUT", DEFAULT_JOB_TIMEOUT_SEC, { min: 0 }, env),
    syncTimeoutSec: readInt("SYNC_TIMEOUT", DEFAULT_SYNC_TIMEOUT_SEC, { min: 0 }, env),
    allowCopy: readBool("ALLOW_COPY", false, env),
    preferIpfsCar: readBool("PREFER_IPFS_CAR", false, env),
    osFamily: readOptionalEnum("OS_FAMILY", OS_FAMILIES, env) ?? null,
    connectRetries: readInt("CONNECT_RETRIES", DEFAULT_CONNECT_RETRIES, { min: 0 }, env),
    connectRetryDelayMs: readInt("CONNECT_RETRY_DELAY_MS", DEFAULT_CONNECT_RETRY_DELAY_MS, { min: 0 }, env),
    logFile: readOptionalString("LOG_FILE", env) ?? null,
    logMaxBytes: readInt("LOG_MAX_BYTES", DEFAULT_LOG_MAX_BYTES, { min: 1 }, env),
    logMaxFiles: readInt("LOG_MAX_FILES", DEFAULT_LOG_MAX_FILES, { min: 1 }, env),
    logLevel: readEnum("LOG_LEVEL", LOG_LEVELS, "info", env),
  };
}

/**
 * Resolves the configuration from the environment, applies the overrides and
 * validates the result. The returned object is frozen.
 */
export function resolveRetrieverConfig(
  overrides: RetrieverConfigOverrides = {},
  env: EnvSource = process.env,
): RetrieverConfig {
  const merged: RetrieverConfig = { ...readRetrieverEnv(env), ...omitUndefinedEntries(overrides) };
  const parsed = retrieverConfigSchema.safeParse(merged);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".") || "config"}: ${issue.message}`);
    throw new ConfigError(`Invalid configuration: ${issues.join("; ")}`, { context: { issues } });
  }
  return Object.freeze(parsed.data);
}
