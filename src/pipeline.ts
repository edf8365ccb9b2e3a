import { mkdir } from "node:fs/promises";
import path from "node:path";

import { type AcquiredUrl, JobCoordinator } from "./acquisition/jobCoordinator.js";
import { JobApiClient } from "./acquisition/jobApiClient.js";
import { DependencyBootstrapper } from "./bootstrap/installer.js";
import { RepairEngine } from "./car/repairEngine.js";
import type { RetrieverConfig } from "./config/retrieverConfig.js";
import { ExtractorUnavailableError } from "./errors.js";
import {
  type ExecutableLocator,
  type ExtractorBackend,
  createDefaultBackends,
  createExecutableLocator,
  orderBackends,
} from "./extract/backends.js";
import { type ExtractionReport, ExtractionOrchestrator, resolveCandidatePath } from "./extract/orchestrator.js";
import { type DownloadResult, ContentFetcher, fileNameFromUrl } from "./fetch/contentFetcher.js";
import { type CommandRunner, createCommandRunner } from "./gateways/commandRunner.js";
import type { FileSystemGateway } from "./gateways/fs.js";
import type { Logger } from "./logger.js";

export interface RetrieverServices {
  readonly coordinator: JobCoordinator;
  readonly fetcher: ContentFetcher;
  readonly repair: RepairEngine;
  readonly orchestrator: ExtractionOrchestrator;
  readonly bootstrapper: DependencyBootstrapper;
}

export interface RetrieverServiceDependencies {
  readonly logger: Logger;
  readonly fetchImpl?: typeof fetch;
  readonly sleep?: (ms: number) => Promise<void>;
  readonly now?: () => number;
  readonly runner?: CommandRunner;
  readonly locate?: ExecutableLocator;
  readonly fs?: FileSystemGateway;
  /** Environment shared by tool spawning, executable lookup and the bootstrap's PATH updates. */
  readonly env?: NodeJS.ProcessEnv;
  /** Replaces the default car-pad/car/ipfs-car chain. */
  readonly backends?: readonly ExtractorBackend[];
}

/** Wires every component from one resolved configuration. */
export function createRetrieverServices(
  config: RetrieverConfig,
  deps: RetrieverServiceDependencies,
): RetrieverServices {
  const { logger } = deps;
  const env = deps.env ?? process.env;
  const runner = deps.runner ?? createCommandRunner(undefined, env);
  const locate = deps.locate ?? createExecutableLocator(env);

  const api = new JobApiClient({
    apiBase: config.apiBase,
    ...(deps.fetchImpl !== undefined ? { fetchImpl: deps.fetchImpl } : {}),
  });
  const coordinator = new JobCoordinator(config, {
    api,
    logger,
    ...(deps.sleep !== undefined ? { sleep: deps.sleep } : {}),
    ...(deps.now !== undefined ? { now: deps.now } : {}),
  });
  const fetcher = new ContentFetcher(config, {
    logger,
    ...(deps.fetchImpl !== undefined ? { fetchImpl: deps.fetchImpl } : {}),
    ...(deps.sleep !== undefined ? { sleep: deps.sleep } : {}),
  });
  const repair = new RepairEngine(config, { logger, ...(deps.fs !== undefined ? { fs: deps.fs } : {}) });
  const backends = orderBackends(deps.backends ?? createDefaultBackends({ runner, locate }), config);
  const orchestrator = new ExtractionOrchestrator({
    logger,
    backends,
    repair: (original) => repair.repair(original),
  });
  const bootstrapper = new DependencyBootstrapper(config, { logger, runner, locate, env });

  return { coordinator, fetcher, repair, orchestrator, bootstrapper };
}

export interface RetrievalRequest {
  readonly client: string;
  readonly provider?: string;
  readonly dir: string;
}

export interface RetrievalReport {
  readonly acquired: AcquiredUrl;
  readonly download: DownloadResult;
  readonly extraction: ExtractionReport;
}

/**
 * Full flow: obtain a URL for the client, download it into `dir` and unpack
 * it there. Extractor availability is checked before any network call.
 */
export async function retrieveAndExtract(
  services: RetrieverServices,
  request: RetrievalRequest,
): Promise<RetrievalReport> {
  const dir = path.resolve(request.dir);
  await mkdir(dir, { recursive: true });

  const available = await services.orchestrator.availableBackends();
  if (available.length === 0) {
    throw new ExtractorUnavailableError("No CAR extractor found. Run with --install-deps first.");
  }

  const acquired = await services.coordinator.acquireUrl(request.client, request.provider);
  const destination = path.join(dir, fileNameFromUrl(acquired.url));
  const download = await services.fetcher.download(acquired.url, destination);
  const extraction = await services.orchestrator.extract(download.path, dir);
  return { acquired, download, extraction };
}

export interface UnpackRequest {
  readonly file: string;
  /** Output directory; the working directory when omitted. */
  readonly dir?: string;
  readonly cwd?: string;
}

/** Extracts an already downloaded container. */
export async function unpackExisting(services: RetrieverServices, request: UnpackRequest): Promise<ExtractionReport> {
  const cwd = request.cwd ?? process.cwd();
  const carPath = await resolveCandidatePath(request.file, cwd);
  const outputDir = path.resolve(cwd, request.dir ?? ".");
  await mkdir(outputDir, { recursive: true });
  return services.orchestrator.extract(carPath, outputDir);
}
