import { describe, it } from "mocha";
import { expect } from "chai";

import { parseCliOptions } from "../../src/cli/options.js";
import { UsageError } from "../../src/errors.js";

function usageErrorOf(argv: string[]): string {
  try {
    parseCliOptions(argv);
  } catch (error) {
    if (error instanceof UsageError) {
      return error.message;
    }
    throw error;
  }
  throw new Error("expected a usage error");
}

describe("cli/options", () => {
  it("parses a retrieval run with overrides", () => {
    const options = parseCliOptions([
      "--client",
      "f01234",
      "--provider=f05678",
      "--dir",
      "out",
      "--api-base",
      "https://api.example.test",
      "--timeout=60",
      "--sync-timeout",
      "30",
      "--allow-copy",
      "--prefer-ipfs-car",
      "--log-file",
      "logs/run.log",
    ]);

    expect(options).to.deep.equal({
      help: false,
      installDeps: false,
      installDepsOnly: false,
      mode: { kind: "retrieve", client: "f01234", provider: "f05678", dir: "out" },
      overrides: {
        apiBase: "https://api.example.test",
        jobTimeoutSec: 60,
        syncTimeoutSec: 30,
        allowCopy: true,
        preferIpfsCar: true,
        logFile: "logs/run.log",
      },
    });
  });

  it("drops an empty provider", () => {
    expect(parseCliOptions(["--client", "f01234", "--provider=", "--dir", "out"]).mode).to.deep.equal({
      kind: "retrieve",
      client: "f01234",
      dir: "out",
    });
  });

  it("parses the unpack mode with and without an output directory", () => {
    expect(parseCliOptions(["--unpack-only", "bundle"]).mode).to.deep.equal({ kind: "unpack", file: "bundle" });
    expect(parseCliOptions(["--unpack-only", "bundle.car", "--dir", "out"]).mode).to.deep.equal({
      kind: "unpack",
      file: "bundle.car",
      dir: "out",
    });
  });

  it("lets --install-deps-only stand alone", () => {
    const options = parseCliOptions(["--install-deps-only", "--os", "Debian"]);

    expect(options.installDeps).to.equal(true);
    expect(options.installDepsOnly).to.equal(true);
    expect(options.mode).to.equal(null);
    expect(options.overrides).to.deep.equal({ osFamily: "debian" });
  });

  it("still requires a mode after --install-deps", () => {
    expect(usageErrorOf(["--install-deps"])).to.equal("Missing --client (or use --unpack-only).");
    expect(usageErrorOf(["--install-deps", "--client", "f01234"])).to.equal("Missing --dir (or use --unpack-only).");
  });

  it("returns early for --help", () => {
    expect(parseCliOptions(["-h"])).to.deep.equal({
      help: true,
      installDeps: false,
      installDepsOnly: false,
      mode: null,
      overrides: {},
    });
  });

  it("reports malformed arguments", () => {
    expect(usageErrorOf(["--bogus"])).to.equal("Unknown argument: --bogus");
    expect(usageErrorOf(["stray"])).to.equal("Unknown argument: stray");
    expect(usageErrorOf(["--client"])).to.equal("The flag --client requires a value.");
    expect(usageErrorOf(["--client", "--dir", "out"])).to.equal("The flag --client requires a value.");
    expect(usageErrorOf(["--allow-copy=yes"])).to.equal("The flag --allow-copy does not take a value.");
    expect(usageErrorOf(["--timeout", "1.5"])).to.equal(
      "The value 1.5 for --timeout must be a non-negative integer number of seconds.",
    );
    expect(usageErrorOf(["--os", "beos"])).to.equal(
      'Unknown OS family "beos". Expected one of: macos, debian, fedora, arch, windows, unknown.',
    );
    expect(usageErrorOf(["--client", " ", "--dir", "out"])).to.equal("The flag --client cannot be empty.");
  });
});
