import type { OsFamily } from "../config/retrieverConfig.js";

export interface InstallStep {
  readonly description: string;
  readonly command: string;
  readonly args: readonly string[];
  /** Executable that must exist for the step to run (the package manager). */
  readonly requires: string;
}

export interface InstallPlan {
  readonly family: OsFamily;
  readonly steps: readonly InstallStep[];
  /** Guidance for platforms without an automated path. */
  readonly notes: readonly string[];
}

export interface PrivilegeContext {
  readonly isRoot: boolean;
  readonly hasSudo: boolean;
  /** Fedora-like hosts fall back to yum when dnf is missing. */
  readonly hasDnf?: boolean;
}

/** Toolchains the extractor installers build or install with. */
const MACOS_PACKAGES = ["go", "node", "git"];
const DEBIAN_PACKAGES = ["nodejs", "npm", "golang-go", "git"];
const FEDORA_PACKAGES = ["nodejs", "npm", "golang", "git"];
const ARCH_PACKAGES = ["nodejs", "npm", "go", "git"];

const WINDOWS_NOTES = [
  "Automatic installation is not available on Windows.",
  "Install Node.js (for ipfs-car) or Go (for car), e.g. winget install OpenJS.NodeJS.LTS ; winget install GoLang.Go",
];

function systemStep(
  description: string,
  manager: string,
  args: readonly string[],
  privileges: PrivilegeContext,
): InstallStep {
  if (!privileges.isRoot && privileges.hasSudo) {
    return { description, command: "sudo", args: [manager, ...args], requires: manager };
  }
  return { description, command: manager, args, requires: manager };
}

/**
 * Package-manager steps installing the Go and Node.js toolchains. Homebrew is
 * never run through sudo; Linux package managers are when the caller is not
 * root and sudo exists.
 */
export function buildInstallPlan(family: OsFamily, privileges: PrivilegeContext): InstallPlan {
  switch (family) {
    case "macos":
      return {
        family,
        steps: [
          { description: "update Homebrew", command: "brew", args: ["update"], requires: "brew" },
          { description: "install toolchains", command: "brew", args: ["install", ...MACOS_PACKAGES], requires: "brew" },
        ],
        notes: [],
      };
    case "debian":
      return {
        family,
        steps: [
          systemStep("refresh package index", "apt-get", ["update", "-y"], privileges),
          systemStep("install toolchains", "apt-get", ["install", "-y", ...DEBIAN_PACKAGES], privileges),
        ],
        notes: [],
      };
    case "fedora": {
      const manager = privileges.hasDnf === false ? "yum" : "dnf";
      return {
        family,
        steps: [systemStep("install toolchains", manager, ["install", "-y", ...FEDORA_PACKAGES], privileges)],
        notes: [],
      };
    }
    case "arch":
      return {
        family,
        steps: [systemStep("install toolchains", "pacman", ["-Sy", "--noconfirm", ...ARCH_PACKAGES], privileges)],
        notes: [],
      };
    case "windows":
      return { family, steps: [], notes: WINDOWS_NOTES };
    case "unknown":
      return { family, steps: [], notes: ["Unknown OS family: install Go or Node.js manually."] };
  }
}
