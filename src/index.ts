export * from "./errors.js";
export { StructuredLogger, type Logger, type LogEntry, type LogLevel, type LoggerOptions } from "./logger.js";
export {
  DEFAULT_API_BASE,
  OS_FAMILIES,
  type OsFamily,
  type RetrieverConfig,
  type RetrieverConfigOverrides,
  resolveRetrieverConfig,
} from "./config/retrieverConfig.js";
export { AdditiveBackoff } from "./acquisition/backoff.js";
export { JobApiClient, type ApiResponse, type JobApi } from "./acquisition/jobApiClient.js";
export { JobCoordinator, extractJobId, readJobStatus, type AcquiredUrl } from "./acquisition/jobCoordinator.js";
export { collectUrls, extractPreferredUrl, isCarUrl, parseResponseDocument, type JsonValue } from "./acquisition/responseTree.js";
export { ContentFetcher, fileNameFromUrl, type DownloadResult } from "./fetch/contentFetcher.js";
export { decodeVarint, encodeVarint } from "./car/varint.js";
export { findZeroLengthSection, type ZeroLengthSection } from "./car/scanner.js";
export { RepairEngine, repairedPathFor, type RepairResult } from "./car/repairEngine.js";
export {
  CommandExtractorBackend,
  createDefaultBackends,
  createExecutableLocator,
  orderBackends,
  type ExtractorBackend,
} from "./extract/backends.js";
export {
  ExtractionOrchestrator,
  ZERO_LENGTH_SIGNATURE,
  resolveCandidatePath,
  type ExtractionAttempt,
  type ExtractionReport,
} from "./extract/orchestrator.js";
export { detectOsFamily } from "./bootstrap/osDetect.js";
export { buildInstallPlan, type InstallPlan } from "./bootstrap/installPlan.js";
export { DependencyBootstrapper } from "./bootstrap/installer.js";
export { createRetrieverServices, retrieveAndExtract, unpackExisting } from "./pipeline.js";
export { runCli } from "./cli/main.js";
