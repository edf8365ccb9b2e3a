import { access, constants } from "node:fs/promises";
import { homedir } from "node:os";
import path from "node:path";

import { type CommandResult, type CommandRunner, succeeded } from "../gateways/commandRunner.js";

/**
 * External program able to unpack a CAR file into the current directory.
 * Backends are stateless; the orchestrator decides ordering and retries.
 */
export interface ExtractorBackend {
  readonly name: string;
  /** Whether the backend can run on this machine. */
  probe(): Promise<boolean>;
  /** Unpacks `carPath` (absolute) into `outputDir`. */
  extract(carPath: string, outputDir: string): Promise<ExtractionOutcome>;
}

export interface ExtractionOutcome {
  readonly ok: boolean;
  readonly exitCode: number | null;
  /** Combined stdout and stderr of the run, used for failure classification. */
  readonly output: string;
}

/** Directories user-space installers drop binaries into, searched after PATH. */
export function userToolDirectories(env: NodeJS.ProcessEnv = process.env): string[] {
  const home = env.HOME ?? homedir();
  const dirs = [path.join(home, ".local", "bin"), path.join(home, "go", "bin"), path.join(home, ".npm-global", "bin")];
  if (env.GOBIN) {
    dirs.unshift(env.GOBIN);
  }
  if (env.GOPATH) {
    dirs.push(path.join(env.GOPATH, "bin"));
  }
  if (env.NPM_CONFIG_PREFIX) {
    dirs.push(path.join(env.NPM_CONFIG_PREFIX, "bin"));
  }
  return dirs;
}

export type ExecutableLocator = (name: string) => Promise<string | null>;

/** Batch shims only run through `cmd.exe`; tools are spawned without a shell. */
const WINDOWS_SHELL_ONLY_EXTENSIONS = new Set([".CMD", ".BAT"]);

function windowsExtensions(env: NodeJS.ProcessEnv): string[] {
  return (env.PATHEXT ?? ".COM;.EXE")
    .split(";")
    .filter((extension) => extension.length > 0 && !WINDOWS_SHELL_ONLY_EXTENSIONS.has(extension.toUpperCase()));
}

/**
 * Resolves an executable name the way a shell would, over `PATH` and then the
 * user tool directories. On Windows only the `PATHEXT` extensions of native
 * executables are tried, so `.cmd` and `.bat` shims are reported as missing.
 */
export function createExecutableLocator(
  env: NodeJS.ProcessEnv = process.env,
  platform: NodeJS.Platform = process.platform,
): ExecutableLocator {
  const mode = platform === "win32" ? constants.F_OK : constants.X_OK;

  // `env` is read on every lookup so directories prepended to PATH after an
  // install are picked up.
  return async (name) => {
    const searchPath = (env.PATH ?? env.Path ?? "").split(path.delimiter).filter((dir) => dir.length > 0);
    const directories = [...searchPath, ...userToolDirectories(env)];
    const extensions = platform === "win32" ? windowsExtensions(env) : [""];
    for (const dir of directories) {
      for (const extension of extensions) {
        const candidate = path.join(dir, `${name}${extension}`);
        try {
          await access(candidate, mode);
          return candidate;
        } catch {
          // Not in this directory.
        }
      }
    }
    return null;
  };
}

export interface CommandExtractorOptions {
  readonly name: string;
  readonly executable: string;
  readonly buildArgs: (carPath: string) => readonly string[];
  readonly runner: CommandRunner;
  readonly locate: ExecutableLocator;
}

/** Backend driving an extractor CLI through the command runner. */
export class CommandExtractorBackend implements ExtractorBackend {
  readonly name: string;
  private readonly executable: string;
  private readonly buildArgs: (carPath: string) => readonly string[];
  private readonly runner: CommandRunner;
  private readonly locate: ExecutableLocator;

  constructor(options: CommandExtractorOptions) {
    this.name = options.name;
    this.executable = options.executable;
    this.buildArgs = options.buildArgs;
    this.runner = options.runner;
    this.locate = options.locate;
  }

  async probe(): Promise<boolean> {
    return (await this.locate(this.executable)) !== null;
  }

  async extract(carPath: string, outputDir: string): Promise<ExtractionOutcome> {
    const resolved = (await this.locate(this.executable)) ?? this.executable;
    const result: CommandResult = await this.runner({
      command: resolved,
      args: this.buildArgs(carPath),
      cwd: outputDir,
    });
    const output = result.spawnError !== null ? `${result.output}${result.spawnError}` : result.output;
    return { ok: succeeded(result), exitCode: result.exitCode, output };
  }
}

export const CAR_PAD_BACKEND = "car-pad";
export const GO_CAR_BACKEND = "car";
export const IPFS_CAR_BACKEND = "ipfs-car";

export interface DefaultBackendDependencies {
  readonly runner: CommandRunner;
  readonly locate: ExecutableLocator;
}

/**
 * The three known extractors in their default priority: the padding-tolerant
 * go-car fork, upstream go-car, then ipfs-car.
 */
export function createDefaultBackends({ runner, locate }: DefaultBackendDependencies): ExtractorBackend[] {
  return [
    new CommandExtractorBackend({
      name: CAR_PAD_BACKEND,
      executable: "car-pad",
      buildArgs: (carPath) => ["x", "-f", carPath],
      runner,
      locate,
    }),
    new CommandExtractorBackend({
      name: GO_CAR_BACKEND,
      executable: "car",
      buildArgs: (carPath) => ["x", "-f", carPath],
      runner,
      locate,
    }),
    new CommandExtractorBackend({
      name: IPFS_CAR_BACKEND,
      executable: "ipfs-car",
      buildArgs: (carPath) => ["unpack", carPath, "--output", "."],
      runner,
      locate,
    }),
  ];
}

/** Applies the `preferIpfsCar` switch: the ipfs-car backend moves to the front. */
export function orderBackends(
  backends: readonly ExtractorBackend[],
  options: { readonly preferIpfsCar: boolean },
): ExtractorBackend[] {
  if (!options.preferIpfsCar) {
    return [...backends];
  }
  const preferred = backends.filter((backend) => backend.name === IPFS_CAR_BACKEND);
  const rest = backends.filter((backend) => backend.name !== IPFS_CAR_BACKEND);
  return [...preferred, ...rest];
}
