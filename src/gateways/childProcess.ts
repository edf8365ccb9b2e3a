/**
 * Gateway spawning external tools (extractors, package managers). Spawning is
 * always shell-less, arguments are validated, and the child's environment is
 * built from an allow-list so credentials present in the operator's shell do
 * not leak into third-party binaries.
 */
import { spawn as nodeSpawn, type ChildProcess, type SpawnOptions } from "node:child_process";

import { omitUndefinedEntries } from "../utils/object.js";

/** Variables external tools need to locate binaries, caches and locales. */
export const DEFAULT_TOOL_ENV_KEYS = [
  "PATH",
  "HOME",
  "USER",
  "TMPDIR",
  "TMP",
  "TEMP",
  "LANG",
  "LC_ALL",
  "GOPATH",
  "GOBIN",
  "GOROOT",
  "GOCACHE",
  "GOMODCACHE",
  "NPM_CONFIG_PREFIX",
  "SystemRoot",
  "APPDATA",
  "LOCALAPPDATA",
  "USERPROFILE",
] as const;

export interface SpawnChildProcessOptions {
  /** Executable name or absolute path. Must not be empty. */
  readonly command: string;
  readonly args?: readonly string[];
  readonly cwd?: string;
  /** Only these keys are copied from {@link inheritEnv} or {@link extraEnv}. */
  readonly allowedEnvKeys: readonly string[];
  /** Snapshot to inherit from; defaults to {@link process.env}. */
  readonly inheritEnv?: NodeJS.ProcessEnv;
  /** Overrides; every key must be allow-listed. */
  readonly extraEnv?: Record<string, string | undefined>;
  readonly stdio?: SpawnOptions["stdio"];
  /** The child is killed with SIGKILL once this budget elapses. */
  readonly timeoutMs?: number;
}

export interface SpawnedChildProcess {
  readonly child: ChildProcess;
  /** Aborted with a {@link ChildProcessTimeoutError} when the timeout fires. */
  readonly signal: AbortSignal | undefined;
  /** Clears the timeout guard. Safe to call more than once. */
  dispose(): void;
}

export class InvalidChildProcessCommandError extends Error {
  constructor(command: string) {
    super(`Child process command must be a non-empty string. Received: "${command}".`);
    this.name = "InvalidChildProcessCommandError";
  }
}

export class InvalidChildProcessArgumentError extends TypeError {
  constructor(value: unknown, index: number) {
    super(`Child process arguments must be strings without NUL bytes. Argument at index ${index} is invalid (${typeof value}).`);
    this.name = "InvalidChildProcessArgumentError";
  }
}

export class ChildProcessEnvViolationError extends Error {
  constructor(key: string) {
    super(`Environment variable "${key}" is not allow-listed for the spawned child process.`);
    this.name = "ChildProcessEnvViolationError";
  }
}

export class ChildProcessTimeoutError extends Error {
  constructor(timeoutMs: number) {
    super(`Child process exceeded its timeout of ${timeoutMs}ms.`);
    this.name = "ChildProcessTimeoutError";
  }
}

export interface ChildProcessGateway {
  spawn(options: SpawnChildProcessOptions): SpawnedChildProcess;
}

/** Shape of `child_process.spawn` the gateway relies on. */
export type SpawnImplementation = (command: string, args: readonly string[], options: SpawnOptions) => ChildProcess;

export interface ChildProcessGatewayDeps {
  /** Concrete spawn implementation (defaults to Node.js {@link nodeSpawn}). */
  readonly spawnImpl?: SpawnImplementation;
}

export function createChildProcessGateway({
  spawnImpl = nodeSpawn,
}: ChildProcessGatewayDeps = {}): ChildProcessGateway {
  return {
    spawn(options: SpawnChildProcessOptions): SpawnedChildProcess {
      const command = options.command;
      if (typeof command !== "string" || command.trim().length === 0) {
        throw new InvalidChildProcessCommandError(command);
      }

      const args = normaliseArgs(options.args);
      const env = buildWhitelistedEnv(options.allowedEnvKeys, options.inheritEnv ?? process.env, options.extraEnv ?? {});
      const controller = options.timeoutMs !== undefined ? new AbortController() : undefined;

      const spawnOptions: SpawnOptions = omitUndefinedEntries({
        cwd: options.cwd,
        env,
        stdio: options.stdio ?? "pipe",
        shell: false,
        windowsVerbatimArguments: false,
      });

      const child = spawnImpl(command, [...args], spawnOptions);

      let timeoutHandle: NodeJS.Timeout | null = null;
      if (controller !== undefined && options.timeoutMs !== undefined) {
        const timeoutMs = options.timeoutMs;
        timeoutHandle = setTimeout(() => {
          controller.abort(new ChildProcessTimeoutError(timeoutMs));
          if (!child.killed) {
            child.kill("SIGKILL");
          }
        }, timeoutMs);
        timeoutHandle.unref();
      }

      const settle = (): void => {
        if (timeoutHandle !== null) {
          clearTimeout(timeoutHandle);
          timeoutHandle = null;
        }
      };
      child.once("exit", settle);
      child.once("error", settle);

      return {
        child,
        signal: controller?.signal,
        dispose(): void {
          child.removeListener("exit", settle);
          child.removeListener("error", settle);
          settle();
        },
      };
    },
  };
}

function normaliseArgs(args: SpawnChildProcessOptions["args"]): readonly string[] {
  if (args === undefined) {
    return [];
  }
  return args.map((value, index) => {
    if (typeof value !== "string" || value.includes("\u0000")) {
      throw new InvalidChildProcessArgumentError(value, index);
    }
    return value;
  });
}

function buildWhitelistedEnv(
  allowedKeys: readonly string[],
  inheritEnv: NodeJS.ProcessEnv,
  extraEnv: Record<string, string | undefined>,
): NodeJS.ProcessEnv {
  const allowSet = new Set(allowedKeys);
  for (const key of Object.keys(extraEnv)) {
    if (!allowSet.has(key)) {
      throw new ChildProcessEnvViolationError(key);
    }
  }

  const env: NodeJS.ProcessEnv = {};
  for (const key of allowSet) {
    const value = Object.prototype.hasOwnProperty.call(extraEnv, key) ? extraEnv[key] : inheritEnv[key];
    if (value !== undefined) {
      env[key] = value;
    }
  }
  return env;
}
