import {
  type ChildProcessGateway,
  DEFAULT_TOOL_ENV_KEYS,
  type SpawnedChildProcess,
  createChildProcessGateway,
} from "./childProcess.js";

/** Upper bound of output retained per command; older bytes are dropped. */
const MAX_CAPTURED_OUTPUT = 256 * 1024;

export interface CommandInvocation {
  readonly command: string;
  readonly args: readonly string[];
  readonly cwd?: string;
  readonly timeoutMs?: number;
  /** Extra allow-listed variables (e.g. `GOBIN`) set for this invocation only. */
  readonly extraEnv?: Record<string, string>;
}

export interface CommandResult {
  /** Exit code, or `null` when the process could not start or was killed by a signal. */
  readonly exitCode: number | null;
  readonly signal: NodeJS.Signals | null;
  /** Interleaved stdout and stderr (tail only when very large). */
  readonly output: string;
  /** Spawn failure message, e.g. when the executable does not exist. */
  readonly spawnError: string | null;
  /** The invocation outlived its `timeoutMs` and was killed. */
  readonly timedOut: boolean;
}

export function succeeded(result: CommandResult): boolean {
  return result.exitCode === 0 && result.spawnError === null;
}

/** Runs a command to completion and captures what it printed. */
export type CommandRunner = (invocation: CommandInvocation) => Promise<CommandResult>;

/**
 * Builds a runner over `gateway`. Allow-listed variables are copied from `env`,
 * so tools see the same `PATH` the executable locator searched.
 */
export function createCommandRunner(
  gateway: ChildProcessGateway = createChildProcessGateway(),
  env: NodeJS.ProcessEnv = process.env,
): CommandRunner {
  return (invocation) =>
    new Promise<CommandResult>((resolve) => {
      const extraEnv = invocation.extraEnv ?? {};
      let handle: SpawnedChildProcess;
      try {
        handle = gateway.spawn({
          command: invocation.command,
          args: invocation.args,
          allowedEnvKeys: [...DEFAULT_TOOL_ENV_KEYS, ...Object.keys(extraEnv)],
          inheritEnv: env,
          extraEnv,
          stdio: ["ignore", "pipe", "pipe"],
          ...(invocation.cwd !== undefined ? { cwd: invocation.cwd } : {}),
          ...(invocation.timeoutMs !== undefined ? { timeoutMs: invocation.timeoutMs } : {}),
        });
      } catch (error) {
        resolve({
          exitCode: null,
          signal: null,
          output: "",
          spawnError: error instanceof Error ? error.message : String(error),
          timedOut: false,
        });
        return;
      }

      const { child } = handle;
      let output = "";
      const capture = (chunk: Buffer | string): void => {
        output += typeof chunk === "string" ? chunk : chunk.toString("utf8");
        if (output.length > MAX_CAPTURED_OUTPUT) {
          output = output.slice(output.length - MAX_CAPTURED_OUTPUT);
        }
      };
      child.stdout?.on("data", capture);
      child.stderr?.on("data", capture);

      let spawnError: string | null = null;
      child.once("error", (error: Error) => {
        spawnError = error.message;
        // `close` does not follow a failed spawn.
        if (child.pid === undefined) {
          handle.dispose();
          resolve({ exitCode: null, signal: null, output, spawnError, timedOut: false });
        }
      });
      child.once("close", (code: number | null, signal: NodeJS.Signals | null) => {
        handle.dispose();
        resolve({ exitCode: code, signal, output, spawnError, timedOut: handle.signal?.aborted ?? false });
      });
    });
}
