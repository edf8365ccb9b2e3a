import { open } from "node:fs/promises";

import { NoHeaderError, TruncatedSectionError } from "../errors.js";
import { readVarintAt } from "./varint.js";

export interface ZeroLengthSection {
  /**
   * Offset of the zero-length prefix itself. Everything before it is kept
   * when the container is repaired.
   */
  readonly offset: number;
  /** Number of non-empty sections walked before the marker. */
  readonly sectionsVisited: number;
}

/**
 * Walks a CARv1 container section by section and locates the first
 * zero-length section, the end-of-stream marker that some producers follow
 * with padding.
 *
 * Only length prefixes are read: headers and section bodies are skipped by
 * advancing the read position, so the cost grows with the number of sections
 * and not with the size of the file.
 */
export async function findZeroLengthSection(path: string): Promise<ZeroLengthSection> {
  const handle = await open(path, "r");
  try {
    const header = await readVarintAt(handle, 0);
    if (header === null || header.value <= 0) {
      throw new NoHeaderError(path);
    }

    let position = header.length + header.value;
    let sectionsVisited = 0;
    for (;;) {
      const sectionStart = position;
      const prefix = Number.isSafeInteger(sectionStart) ? await readVarintAt(handle, sectionStart) : null;
      if (prefix === null) {
        throw new TruncatedSectionError(path, sectionStart, { context: { sectionsVisited } });
      }
      if (prefix.value === 0) {
        return { offset: sectionStart, sectionsVisited };
      }
      position = sectionStart + prefix.length + prefix.value;
      sectionsVisited += 1;
    }
  } finally {
    await handle.close();
  }
}
