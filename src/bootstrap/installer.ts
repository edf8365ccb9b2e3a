import { mkdir, mkdtemp, rm } from "node:fs/promises";
import { homedir, tmpdir } from "node:os";
import path from "node:path";

import type { OsFamily, RetrieverConfig } from "../config/retrieverConfig.js";
import { ExtractorUnavailableError } from "../errors.js";
import type { ExecutableLocator } from "../extract/backends.js";
import { type CommandResult, type CommandRunner, succeeded } from "../gateways/commandRunner.js";
import type { Logger } from "../logger.js";
import { type InstallPlan, buildInstallPlan } from "./installPlan.js";
import { detectOsFamily } from "./osDetect.js";

const CAR_PAD_REPOSITORY = "https://github.com/kacperzuk-neti/go-car";
const GO_CAR_MODULE = "github.com/ipld/go-car/cmd/car@latest";
const IPFS_CAR_PACKAGE = "ipfs-car";

/** Package installs and builds can be slow on a cold cache. */
const INSTALL_STEP_TIMEOUT_MS = 20 * 60 * 1_000;

const EXTRACTOR_EXECUTABLES = ["car-pad", "car", "ipfs-car"] as const;

export interface BootstrapReport {
  readonly family: OsFamily;
  readonly plan: InstallPlan;
  /** Extractor executables reachable once the bootstrap finished. */
  readonly extractors: readonly string[];
}

export interface DependencyBootstrapperDependencies {
  readonly logger: Logger;
  readonly runner: CommandRunner;
  readonly locate: ExecutableLocator;
  /** Environment whose PATH receives the directories tools were installed into. */
  readonly env?: NodeJS.ProcessEnv;
  readonly isRoot?: boolean;
  readonly homeDir?: string;
  readonly detectOs?: (hint: OsFamily | null) => Promise<OsFamily>;
  readonly makeTempDir?: () => Promise<string>;
  readonly removeDir?: (dir: string) => Promise<void>;
  readonly makeDir?: (dir: string) => Promise<void>;
}

/** Log fields describing a failed step. */
function failureDetails(result: CommandResult): Record<string, unknown> {
  return { exitCode: result.exitCode, timedOut: result.timedOut, output: result.output.slice(-2_000) };
}

function currentUserIsRoot(): boolean {
  return typeof process.getuid === "function" && process.getuid() === 0;
}

/**
 * Installs the toolchains and at least one CAR extractor in user space.
 * Package-manager steps are best-effort; only the absence of every extractor
 * at the end is fatal.
 */
export class DependencyBootstrapper {
  private readonly logger: Logger;
  private readonly runner: CommandRunner;
  private readonly locate: ExecutableLocator;
  private readonly env: NodeJS.ProcessEnv;
  private readonly isRoot: boolean;
  private readonly homeDir: string;
  private readonly detectOs: (hint: OsFamily | null) => Promise<OsFamily>;
  private readonly makeTempDir: () => Promise<string>;
  private readonly removeDir: (dir: string) => Promise<void>;
  private readonly makeDir: (dir: string) => Promise<void>;

  constructor(
    private readonly settings: Pick<RetrieverConfig, "osFamily">,
    deps: DependencyBootstrapperDependencies,
  ) {
    this.logger = deps.logger;
    this.runner = deps.runner;
    this.locate = deps.locate;
    this.env = deps.env ?? process.env;
    this.isRoot = deps.isRoot ?? currentUserIsRoot();
    this.homeDir = deps.homeDir ?? this.env.HOME ?? homedir();
    this.detectOs = deps.detectOs ?? ((hint) => detectOsFamily({ hint }));
    this.makeTempDir = deps.makeTempDir ?? (() => mkdtemp(path.join(tmpdir(), "car-pad-")));
    this.removeDir = deps.removeDir ?? ((dir) => rm(dir, { recursive: true, force: true }));
    this.makeDir =
      deps.makeDir ??
      (async (dir) => {
        await mkdir(dir, { recursive: true });
      });
  }

  async run(hint: OsFamily | null = this.settings.osFamily): Promise<BootstrapReport> {
    const family = await this.detectOs(hint);
    const plan = buildInstallPlan(family, {
      isRoot: this.isRoot,
      hasSudo: (await this.locate("sudo")) !== null,
      hasDnf: (await this.locate("dnf")) !== null,
    });
    this.logger.info("bootstrap_start", { family, steps: plan.steps.length });
    for (const note of plan.notes) {
      this.logger.warn("bootstrap_note", { family, note });
    }

    await this.runPlan(plan);
    await this.ensureCarPad();
    const extractors = await this.ensureExtractor(family);

    this.logger.info("bootstrap_complete", { family, extractors });
    return { family, plan, extractors };
  }

  /** Runs every package-manager step; failures are logged and skipped. */
  async runPlan(plan: InstallPlan): Promise<void> {
    for (const step of plan.steps) {
      if ((await this.locate(step.requires)) === null) {
        this.logger.warn("bootstrap_step_skipped", { step: step.description, missing: step.requires });
        continue;
      }
      const result = await this.exec(step.command, step.args);
      if (succeeded(result)) {
        this.logger.info("bootstrap_step_ok", { step: step.description });
      } else {
        this.logger.warn("bootstrap_step_failed", {
          step: step.description,
          ...failureDetails(result),
        });
      }
    }
  }

  /**
   * Builds the padding-tolerant go-car fork as `car-pad` into
   * `~/.local/bin`. Returns whether `car-pad` is available afterwards.
   */
  async ensureCarPad(): Promise<boolean> {
    if ((await this.locate("car-pad")) !== null) {
      return true;
    }
    const go = await this.locate("go");
    const git = await this.locate("git");
    if (go === null || git === null) {
      this.logger.warn("car_pad_build_skipped", { go: go !== null, git: git !== null });
      return false;
    }

    const binDir = path.join(this.homeDir, ".local", "bin");
    await this.makeDir(binDir);
    const workDir = await this.makeTempDir();
    try {
      const checkout = path.join(workDir, "go-car");
      this.logger.info("car_pad_build_start", { repository: CAR_PAD_REPOSITORY, binDir });
      const clone = await this.exec(git, ["clone", "--depth", "1", CAR_PAD_REPOSITORY, checkout]);
      if (!succeeded(clone)) {
        this.logger.warn("car_pad_clone_failed", failureDetails(clone));
        return false;
      }
      const build = await this.exec(
        go,
        ["build", "-trimpath", "-ldflags", "-s -w", "-o", path.join(binDir, "car-pad"), "."],
        { cwd: path.join(checkout, "cmd", "car") },
      );
      if (!succeeded(build)) {
        this.logger.warn("car_pad_build_failed", failureDetails(build));
        return false;
      }
    } finally {
      await this.removeDir(workDir);
    }

    this.prependToPath(binDir);
    this.logger.info("car_pad_installed", { path: path.join(binDir, "car-pad") });
    return true;
  }

  /**
   * Makes sure at least one extractor exists, installing upstream go-car with
   * `go install` or ipfs-car with npm when none does.
   */
  async ensureExtractor(family: OsFamily): Promise<string[]> {
    let available = await this.availableExtractors();
    if (available.length > 0) {
      return available;
    }

    const go = await this.locate("go");
    if (go !== null) {
      const goBin = await this.resolveGoBin(go);
      this.logger.info("go_car_install_start", { module: GO_CAR_MODULE, goBin });
      const result = await this.exec(go, ["install", GO_CAR_MODULE], { extraEnv: { GOBIN: goBin } });
      if (succeeded(result)) {
        this.prependToPath(goBin);
      } else {
        this.logger.warn("go_car_install_failed", failureDetails(result));
      }
      available = await this.availableExtractors();
      if (available.length > 0) {
        return available;
      }
    }

    const npm = await this.locate("npm");
    if (npm !== null) {
      await this.installIpfsCar(npm, family);
      available = await this.availableExtractors();
      if (available.length > 0) {
        return available;
      }
    }

    throw new ExtractorUnavailableError("Could not install a CAR extractor (car-pad, car or ipfs-car).", {
      context: { family, go: go !== null, npm: npm !== null },
    });
  }

  async availableExtractors(): Promise<string[]> {
    const found: string[] = [];
    for (const name of EXTRACTOR_EXECUTABLES) {
      if ((await this.locate(name)) !== null) {
        found.push(name);
      }
    }
    return found;
  }

  private async installIpfsCar(npm: string, family: OsFamily): Promise<void> {
    this.logger.info("ipfs_car_install_start", { package: IPFS_CAR_PACKAGE });
    const result = await this.exec(npm, ["i", "-g", IPFS_CAR_PACKAGE]);
    if (succeeded(result)) {
      return;
    }
    // Global prefixes owned by root are common with the system Node on macOS.
    if (family === "macos" && /EACCES|permission denied/i.test(result.output)) {
      const prefix = path.join(this.homeDir, ".npm-global");
      this.logger.warn("ipfs_car_user_prefix", { prefix });
      await this.makeDir(path.join(prefix, "bin"));
      const retry = await this.exec(npm, ["i", "-g", IPFS_CAR_PACKAGE], { extraEnv: { NPM_CONFIG_PREFIX: prefix } });
      if (succeeded(retry)) {
        this.prependToPath(path.join(prefix, "bin"));
        return;
      }
      this.logger.warn("ipfs_car_install_failed", failureDetails(retry));
      return;
    }
    this.logger.warn("ipfs_car_install_failed", failureDetails(result));
  }

  /** `go env GOBIN`, else `$(go env GOPATH)/bin`, else `~/go/bin`. */
  private async resolveGoBin(go: string): Promise<string> {
    const gobin = await this.exec(go, ["env", "GOBIN"]);
    const fromGobin = succeeded(gobin) ? gobin.output.trim() : "";
    if (fromGobin.length > 0 && fromGobin !== "''") {
      return fromGobin;
    }
    const gopath = await this.exec(go, ["env", "GOPATH"]);
    const fromGopath = succeeded(gopath) ? gopath.output.trim() : "";
    if (fromGopath.length > 0) {
      return path.join(fromGopath, "bin");
    }
    return path.join(this.homeDir, "go", "bin");
  }

  private prependToPath(dir: string): void {
    const entries = (this.env.PATH ?? "").split(path.delimiter).filter((entry) => entry.length > 0);
    if (!entries.includes(dir)) {
      this.env.PATH = [dir, ...entries].join(path.delimiter);
    }
  }

  private exec(
    command: string,
    args: readonly string[],
    options: { readonly cwd?: string; readonly extraEnv?: Record<string, string> } = {},
  ): Promise<CommandResult> {
    return this.runner({ command, args, timeoutMs: INSTALL_STEP_TIMEOUT_MS, ...options });
  }
}
