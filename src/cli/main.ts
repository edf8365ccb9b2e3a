import { type RetrieverConfig, resolveRetrieverConfig } from "../config/retrieverConfig.js";
import type { EnvSource } from "../config/env.js";
import { RetrieverError, UsageError, describeError } from "../errors.js";
import { type Logger, StructuredLogger } from "../logger.js";
import {
  type RetrieverServiceDependencies,
  type RetrieverServices,
  createRetrieverServices,
  retrieveAndExtract,
  unpackExisting,
} from "../pipeline.js";
import { type CliOptions, USAGE, parseCliOptions } from "./options.js";

export interface CliDependencies {
  readonly env?: EnvSource;
  readonly cwd?: string;
  /** Receives usage text. Defaults to stdout. */
  readonly print?: (text: string) => void;
  /** Receives JSON log lines. Defaults to stderr. */
  readonly writeLog?: (line: string) => void;
  readonly createServices?: (config: RetrieverConfig, deps: RetrieverServiceDependencies) => RetrieverServices;
}

/** Single place where a fatal failure becomes a log entry. */
export function reportFailure(logger: Logger, error: unknown): void {
  if (error instanceof RetrieverError) {
    logger.error("fatal", { code: error.code, message: error.message, context: error.context });
    return;
  }
  logger.error("fatal", { code: "E-UNEXPECTED", message: describeError(error) });
}

async function execute(
  options: CliOptions,
  services: RetrieverServices,
  config: RetrieverConfig,
  logger: Logger,
  cwd: string,
): Promise<void> {
  if (options.installDeps) {
    await services.bootstrapper.run(config.osFamily);
    logger.info("install_deps_complete");
    if (options.installDepsOnly) {
      return;
    }
  }

  const mode = options.mode;
  if (mode === null) {
    return;
  }
  if (mode.kind === "unpack") {
    const report = await unpackExisting(services, {
      file: mode.file,
      cwd,
      ...(mode.dir !== undefined ? { dir: mode.dir } : {}),
    });
    logger.info("unpack_success", { backend: report.backend, file: report.file, repaired: report.repair !== null });
    return;
  }

  const report = await retrieveAndExtract(services, {
    client: mode.client,
    dir: mode.dir,
    ...(mode.provider !== undefined ? { provider: mode.provider } : {}),
  });
  logger.info("retrieve_success", {
    url: report.acquired.url,
    via: report.acquired.via,
    path: report.download.path,
    backend: report.extraction.backend,
    repaired: report.extraction.repair !== null,
  });
}

/**
 * Runs the command line and resolves with the process exit code: 0 on
 * success (and for `--help`), 1 on any failure.
 */
export async function runCli(argv: readonly string[], deps: CliDependencies = {}): Promise<number> {
  const env = deps.env ?? process.env;
  const print = deps.print ?? ((text: string) => process.stdout.write(text));
  const writeLog = deps.writeLog ?? ((line: string) => process.stderr.write(line));
  const createServices = deps.createServices ?? createRetrieverServices;

  let logger = new StructuredLogger({ write: writeLog });
  try {
    const options = parseCliOptions(argv);
    if (options.help) {
      print(USAGE);
      return 0;
    }

    const config = resolveRetrieverConfig(options.overrides, env);
    logger = new StructuredLogger({
      minLevel: config.logLevel,
      logFile: config.logFile,
      maxFileSizeBytes: config.logMaxBytes,
      maxFileCount: config.logMaxFiles,
      write: writeLog,
    });
    const services = createServices(config, { logger });
    await execute(options, services, config, logger, deps.cwd ?? process.cwd());
    return 0;
  } catch (error) {
    reportFailure(logger, error);
    if (error instanceof UsageError) {
      print(USAGE);
    }
    return 1;
  } finally {
    await logger.flush();
  }
}
