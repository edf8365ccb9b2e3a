import type { RetrieverConfig } from "../config/retrieverConfig.js";
import { UnsupportedFilesystemError, describeError, isErrnoException } from "../errors.js";
import { type FileSystemGateway, defaultFileSystemGateway } from "../gateways/fs.js";
import type { Logger } from "../logger.js";
import { findZeroLengthSection } from "./scanner.js";

/** errno codes reported when the filesystem cannot produce a copy-on-write clone. */
const CLONE_UNSUPPORTED_CODES = new Set(["ENOTSUP", "EOPNOTSUPP", "ENOSYS", "EXDEV", "EINVAL", "EPERM", "ENOTTY"]);

/** Name of the repaired duplicate written next to the original container. */
export function repairedPathFor(original: string): string {
  return `${original}.fixed.car`;
}

export interface RepairResult {
  readonly clonePath: string;
  /** Size of the clone after truncation. */
  readonly offset: number;
  /** True when a full copy replaced the copy-on-write clone. */
  readonly copied: boolean;
}

export interface RepairEngineDependencies {
  readonly logger: Logger;
  readonly fs?: FileSystemGateway;
  readonly scan?: typeof findZeroLengthSection;
}

/**
 * Produces a truncated duplicate of a padded container. The original is only
 * ever read: scanning opens it read-only and cloning uses it as a source.
 */
export class RepairEngine {
  private readonly logger: Logger;
  private readonly fs: FileSystemGateway;
  private readonly scan: typeof findZeroLengthSection;

  constructor(
    private readonly settings: Pick<RetrieverConfig, "allowCopy">,
    deps: RepairEngineDependencies,
  ) {
    this.logger = deps.logger;
    this.fs = deps.fs ?? defaultFileSystemGateway;
    this.scan = deps.scan ?? findZeroLengthSection;
  }

  /**
   * Duplicates `source` into `destination`, preferring a filesystem clone.
   * Returns true when a full copy was needed.
   */
  async clone(source: string, destination: string): Promise<boolean> {
    try {
      await this.fs.cloneFile(source, destination);
      return false;
    } catch (error) {
      if (!isErrnoException(error) || error.code === undefined || !CLONE_UNSUPPORTED_CODES.has(error.code)) {
        throw error;
      }
      if (!this.settings.allowCopy) {
        throw new UnsupportedFilesystemError(source, {
          cause: error,
          context: { source, destination, reason: describeError(error) },
        });
      }
      this.logger.warn("clone_unsupported_copying", { source, destination, code: error.code });
      await this.fs.copyFile(source, destination);
      return true;
    }
  }

  async truncate(destination: string, offset: number): Promise<void> {
    await this.fs.truncate(destination, offset);
  }

  /** Scans `original`, clones it and cuts the clone at the zero-length section. */
  async repair(original: string): Promise<RepairResult> {
    const { offset, sectionsVisited } = await this.scan(original);
    const clonePath = repairedPathFor(original);
    this.logger.info("car_repair_start", { original, clonePath, offset, sectionsVisited });

    const copied = await this.clone(original, clonePath);
    await this.truncate(clonePath, offset);

    this.logger.info("car_repair_complete", { clonePath, offset, copied });
    return { clonePath, offset, copied };
  }
}
