import { constants, copyFile, truncate } from "node:fs/promises";

/**
 * Narrow abstraction over the filesystem calls used by the repair engine, so
 * tests can simulate filesystems that cannot clone without needing one.
 */
export interface FileSystemGateway {
  /** Copy-on-write clone (APFS clonefile, Btrfs/XFS reflink). Fails when unsupported. */
  cloneFile(source: string, destination: string): Promise<void>;
  /** Plain byte-for-byte copy. */
  copyFile(source: string, destination: string): Promise<void>;
  truncate(path: string, length: number): Promise<void>;
}

export const defaultFileSystemGateway: FileSystemGateway = {
  async cloneFile(source: string, destination: string): Promise<void> {
    await copyFile(source, destination, constants.COPYFILE_FICLONE_FORCE);
  },
  async copyFile(source: string, destination: string): Promise<void> {
    await copyFile(source, destination);
  },
  async truncate(path: string, length: number): Promise<void> {
    await truncate(path, length);
  },
};
