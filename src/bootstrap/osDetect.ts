import { readFile } from "node:fs/promises";

import type { OsFamily } from "../config/retrieverConfig.js";
import { isErrnoException } from "../errors.js";

const OS_RELEASE_PATH = "/etc/os-release";

/** Parses the `KEY=value` lines of an os-release file, dropping quotes. */
export function parseOsRelease(text: string): Record<string, string> {
  const fields: Record<string, string> = {};
  for (const rawLine of text.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (line.length === 0 || line.startsWith("#")) {
      continue;
    }
    const separator = line.indexOf("=");
    if (separator <= 0) {
      continue;
    }
    const key = line.slice(0, separator).trim();
    let value = line.slice(separator + 1).trim();
    if (value.length >= 2 && (value[0] === '"' || value[0] === "'") && value.endsWith(value[0])) {
      value = value.slice(1, -1);
    }
    fields[key] = value;
  }
  return fields;
}

/** Maps the `ID_LIKE` (or `ID`) of an os-release file onto a package family. */
export function classifyOsRelease(text: string): OsFamily {
  const fields = parseOsRelease(text);
  const like = (fields.ID_LIKE || fields.ID || "").toLowerCase();
  if (/debian|ubuntu/.test(like)) {
    return "debian";
  }
  if (/rhel|fedora|centos|rocky|alma/.test(like)) {
    return "fedora";
  }
  if (/arch/.test(like)) {
    return "arch";
  }
  return "unknown";
}

export interface DetectOsOptions {
  /** Explicit family from `--os` or `OS_FAMILY`; always wins. */
  readonly hint?: OsFamily | null;
  readonly platform?: NodeJS.Platform;
  /** Reads the os-release file; resolves `null` when it does not exist. */
  readonly readOsRelease?: () => Promise<string | null>;
}

async function readSystemOsRelease(): Promise<string | null> {
  try {
    return await readFile(OS_RELEASE_PATH, "utf8");
  } catch (error) {
    if (isErrnoException(error) && error.code === "ENOENT") {
      return null;
    }
    throw error;
  }
}

export async function detectOsFamily(options: DetectOsOptions = {}): Promise<OsFamily> {
  if (options.hint) {
    return options.hint;
  }
  const platform = options.platform ?? process.platform;
  switch (platform) {
    case "darwin":
      return "macos";
    case "win32":
    case "cygwin":
      return "windows";
    case "linux": {
      const text = await (options.readOsRelease ?? readSystemOsRelease)();
      return text === null ? "unknown" : classifyOsRelease(text);
    }
    default:
      return "unknown";
  }
}
