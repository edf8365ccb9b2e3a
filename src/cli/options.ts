import { OS_FAMILIES, type OsFamily, type RetrieverConfigOverrides } from "../config/retrieverConfig.js";
import { UsageError } from "../errors.js";

export const USAGE = `Usage:
  car-retriever --install-deps [--os macos|debian|fedora|arch|windows] [--install-deps-only]
  car-retriever --client ID [--provider ID] --dir DIR [--api-base URL] [--timeout S] [--sync-timeout S]
  car-retriever --unpack-only FILE[.car] [--dir DIR]

Common options:
  --allow-copy        Permit a full copy when the filesystem cannot clone (ALLOW_COPY=1)
  --prefer-ipfs-car   Try ipfs-car before the go-car extractors (PREFER_IPFS_CAR=1)
  --log-file PATH     Mirror structured logs to PATH (LOG_FILE)
  -h, --help          Show this message

Environment: API_BASE, POLL_INTERVAL, POLL_MAX_INTERVAL, POLL_TIMEOUT, SYNC_TIMEOUT,
  CONNECT_RETRIES, CONNECT_RETRY_DELAY_MS, OS_FAMILY, LOG_LEVEL, LOG_MAX_BYTES, LOG_MAX_FILES.
`;

export type RunMode =
  | { readonly kind: "retrieve"; readonly client: string; readonly provider?: string; readonly dir: string }
  | { readonly kind: "unpack"; readonly file: string; readonly dir?: string };

export interface CliOptions {
  readonly help: boolean;
  /** Run the dependency bootstrap before anything else. */
  readonly installDeps: boolean;
  /** Stop after the bootstrap. */
  readonly installDepsOnly: boolean;
  readonly mode: RunMode | null;
  readonly overrides: RetrieverConfigOverrides;
}

const FLAG_WITH_VALUE = new Set([
  "--client",
  "--provider",
  "--dir",
  "--api-base",
  "--timeout",
  "--sync-timeout",
  "--os",
  "--unpack-only",
  "--log-file",
]);

const BOOLEAN_FLAGS = new Set([
  "--install-deps",
  "--install-deps-only",
  "--allow-copy",
  "--prefer-ipfs-car",
  "--help",
  "-h",
]);

function parseSeconds(value: string, flag: string): number {
  const num = Number(value);
  if (!Number.isFinite(num) || !Number.isInteger(num) || num < 0) {
    throw new UsageError(`The value ${value} for ${flag} must be a non-negative integer number of seconds.`);
  }
  return num;
}

function parseOsFamily(value: string): OsFamily {
  const family = OS_FAMILIES.find((candidate) => candidate === value.trim().toLowerCase());
  if (family === undefined) {
    throw new UsageError(`Unknown OS family "${value}". Expected one of: ${OS_FAMILIES.join(", ")}.`);
  }
  return family;
}

function nonEmpty(value: string, flag: string): string {
  const trimmed = value.trim();
  if (trimmed.length === 0) {
    throw new UsageError(`The flag ${flag} cannot be empty.`);
  }
  return trimmed;
}

/**
 * Parses `process.argv.slice(2)`. Values are accepted as the next argument or
 * inline (`--dir=out`). Unknown flags, stray positionals and missing values
 * are usage errors.
 */
export function parseCliOptions(argv: readonly string[]): CliOptions {
  let help = false;
  let installDeps = false;
  let installDepsOnly = false;
  let client: string | undefined;
  let provider: string | undefined;
  let dir: string | undefined;
  let unpackFile: string | undefined;
  const overrides: RetrieverConfigOverrides = {};

  for (let index = 0; index < argv.length; index += 1) {
    const arg = argv[index] ?? "";
    const separator = arg.startsWith("--") ? arg.indexOf("=") : -1;
    const flag = separator > 0 ? arg.slice(0, separator) : arg;
    const inlineValue = separator > 0 ? arg.slice(separator + 1) : undefined;

    if (!FLAG_WITH_VALUE.has(flag) && !BOOLEAN_FLAGS.has(flag)) {
      throw new UsageError(`Unknown argument: ${arg}`);
    }

    let value = inlineValue ?? "";
    if (FLAG_WITH_VALUE.has(flag) && inlineValue === undefined) {
      const next = argv[index + 1];
      if (next === undefined || next.startsWith("--")) {
        throw new UsageError(`The flag ${flag} requires a value.`);
      }
      value = next;
      index += 1;
    } else if (BOOLEAN_FLAGS.has(flag) && inlineValue !== undefined) {
      throw new UsageError(`The flag ${flag} does not take a value.`);
    }

    switch (flag) {
      case "--client":
        client = nonEmpty(value, flag);
        break;
      case "--provider":
        provider = value.trim();
        break;
      case "--dir":
        dir = nonEmpty(value, flag);
        break;
      case "--api-base":
        overrides.apiBase = nonEmpty(value, flag);
        break;
      case "--timeout":
        overrides.jobTimeoutSec = parseSeconds(value, flag);
        break;
      case "--sync-timeout":
        overrides.syncTimeoutSec = parseSeconds(value, flag);
        break;
      case "--os":
        overrides.osFamily = parseOsFamily(value);
        break;
      case "--unpack-only":
        unpackFile = nonEmpty(value, flag);
        break;
      case "--log-file":
        overrides.logFile = nonEmpty(value, flag);
        break;
      case "--install-deps":
        installDeps = true;
        break;
      case "--install-deps-only":
        installDeps = true;
        installDepsOnly = true;
        break;
      case "--allow-copy":
        overrides.allowCopy = true;
        break;
      case "--prefer-ipfs-car":
        overrides.preferIpfsCar = true;
        break;
      case "--help":
      case "-h":
        help = true;
        break;
    }
  }

  if (help) {
    return { help, installDeps: false, installDepsOnly: false, mode: null, overrides };
  }

  let mode: RunMode | null = null;
  if (unpackFile !== undefined) {
    mode = { kind: "unpack", file: unpackFile, ...(dir !== undefined ? { dir } : {}) };
  } else if (!installDepsOnly) {
    if (client === undefined) {
      throw new UsageError("Missing --client (or use --unpack-only).");
    }
    if (dir === undefined) {
      throw new UsageError("Missing --dir (or use --unpack-only).");
    }
    mode = {
      kind: "retrieve",
      client,
      dir,
      ...(provider !== undefined && provider.length > 0 ? { provider } : {}),
    };
  }

  return { help, installDeps, installDepsOnly, mode, overrides };
}
