import { stat } from "node:fs/promises";
import path from "node:path";

import type { RepairResult } from "../car/repairEngine.js";
import {
  CarFileNotFoundError,
  ExtractionExhaustedError,
  ExtractorUnavailableError,
  isErrnoException,
} from "../errors.js";
import type { Logger } from "../logger.js";
import type { ExtractorBackend } from "./backends.js";

/** Extractor output that identifies a padded container worth repairing. */
export const ZERO_LENGTH_SIGNATURE = /ZeroLengthSectionAsEOF|zero length|null padding/i;

/** Tail of the extractor output kept in attempt records. */
const OUTPUT_EXCERPT_LENGTH = 2_000;

async function isFile(candidate: string): Promise<boolean> {
  try {
    return (await stat(candidate)).isFile();
  } catch (error) {
    if (isErrnoException(error) && (error.code === "ENOENT" || error.code === "ENOTDIR")) {
      return false;
    }
    throw error;
  }
}

/**
 * Resolves a user supplied container path, tolerating a missing or extra
 * `.car` suffix. The result is absolute so extractors can run from any
 * working directory.
 */
export async function resolveCandidatePath(input: string, cwd: string = process.cwd()): Promise<string> {
  const absolute = path.resolve(cwd, input);
  const candidates = [absolute];
  if (absolute.endsWith(".car")) {
    candidates.push(absolute.slice(0, -".car".length));
  }
  candidates.push(`${absolute}.car`);

  for (const candidate of candidates) {
    if (await isFile(candidate)) {
      return candidate;
    }
  }
  throw new CarFileNotFoundError(input, { context: { tried: candidates } });
}

export interface ExtractionAttempt {
  readonly backend: string;
  readonly file: string;
  readonly repaired: boolean;
  readonly ok: boolean;
  readonly exitCode: number | null;
  readonly signatureMatched: boolean;
  readonly output: string;
}

export interface ExtractionReport {
  readonly backend: string;
  readonly file: string;
  /** Present when the successful run used a repaired clone. */
  readonly repair: RepairResult | null;
  readonly attempts: readonly ExtractionAttempt[];
}

export interface ExtractionOrchestratorDependencies {
  readonly logger: Logger;
  /** Backends in priority order; see `orderBackends`. */
  readonly backends: readonly ExtractorBackend[];
  readonly repair: (original: string) => Promise<RepairResult>;
}

/**
 * Runs extractor backends in priority order. A failure carrying the
 * zero-length signature triggers one repair and one retry on the clone for
 * that backend before moving on to the next one.
 */
export class ExtractionOrchestrator {
  private readonly logger: Logger;
  private readonly backends: readonly ExtractorBackend[];
  private readonly repairFile: (original: string) => Promise<RepairResult>;

  constructor(deps: ExtractionOrchestratorDependencies) {
    this.logger = deps.logger;
    this.backends = deps.backends;
    this.repairFile = deps.repair;
  }

  /** Backends whose executable is currently reachable. */
  async availableBackends(): Promise<ExtractorBackend[]> {
    const available: ExtractorBackend[] = [];
    for (const backend of this.backends) {
      if (await backend.probe()) {
        available.push(backend);
      }
    }
    return available;
  }

  async extract(carPath: string, outputDir: string): Promise<ExtractionReport> {
    const backends = await this.availableBackends();
    if (backends.length === 0) {
      throw new ExtractorUnavailableError("No CAR extractor found (car-pad, car or ipfs-car).", {
        context: { searched: this.backends.map((backend) => backend.name) },
      });
    }

    const attempts: ExtractionAttempt[] = [];
    let repair: RepairResult | null = null;

    for (const backend of backends) {
      this.logger.info("extract_attempt", { backend: backend.name, file: carPath, outputDir });
      const first = await this.run(backend, carPath, outputDir, false);
      attempts.push(first);
      if (first.ok) {
        return this.succeed(backend, carPath, null, attempts);
      }
      if (!first.signatureMatched) {
        this.logger.warn("extract_failed", { backend: backend.name, exitCode: first.exitCode });
        continue;
      }

      this.logger.warn("extract_zero_length_detected", { backend: backend.name, file: carPath });
      repair ??= await this.repairFile(carPath);
      const retry = await this.run(backend, repair.clonePath, outputDir, true);
      attempts.push(retry);
      if (retry.ok) {
        return this.succeed(backend, repair.clonePath, repair, attempts);
      }
      this.logger.warn("extract_retry_failed", { backend: backend.name, exitCode: retry.exitCode });
    }

    throw new ExtractionExhaustedError(`All extractors failed for ${carPath}.`, {
      context: { file: carPath, attempts },
    });
  }

  private async run(
    backend: ExtractorBackend,
    file: string,
    outputDir: string,
    repaired: boolean,
  ): Promise<ExtractionAttempt> {
    const outcome = await backend.extract(file, outputDir);
    return {
      backend: backend.name,
      file,
      repaired,
      ok: outcome.ok,
      exitCode: outcome.exitCode,
      signatureMatched: !outcome.ok && ZERO_LENGTH_SIGNATURE.test(outcome.output),
      output: outcome.output.slice(-OUTPUT_EXCERPT_LENGTH),
    };
  }

  private succeed(
    backend: ExtractorBackend,
    file: string,
    repair: RepairResult | null,
    attempts: readonly ExtractionAttempt[],
  ): ExtractionReport {
    this.logger.info("extract_complete", { backend: backend.name, file, repaired: repair !== null });
    return { backend: backend.name, file, repair, attempts };
  }
}
