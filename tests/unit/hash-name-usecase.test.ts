import { describe, expect, it } from "vitest";
import { runHashName, type HashNameDeps } from "../../src/application/hash-name/hash-name-usecase";
import { createLogger } from "../../src/cli/logging";

const ABC_DIGEST =
  "3a985da74fe225b2045c172d6bd390bd855f086e3e9d525b46bfe24511431532";

function recordingDeps(name: string) {
  const calls: string[] = [];
  const logs: string[] = [];
  const deps: HashNameDeps = {
    async readName() {
      calls.push("read");
      return name;
    },
    clearScreen() {
      calls.push("clear");
      return true;
    },
    print(result, labels) {
      calls.push(`print:${result.name}:${result.digestHex}:${labels ? "labelled" : "plain"}`);
    },
    logger: createLogger({ logLevel: "debug" }, (line) => logs.push(line)),
  };
  return { deps, calls, logs };
}

describe("runHashName", () => {
  it("reads, clears, hashes and prints once, in order", async () => {
    const { deps, calls } = recordingDeps("abc");
    const result = await runHashName(deps, { clearScreen: true });
    expect(result).toEqual({ name: "abc", digestHex: ABC_DIGEST });
    expect(calls).toEqual(["read", "clear", `print:abc:${ABC_DIGEST}:plain`]);
  });

  it("skips the clear when disabled", async () => {
    const { deps, calls } = recordingDeps("abc");
    await runHashName(deps, { clearScreen: false });
    expect(calls).toEqual(["read", `print:abc:${ABC_DIGEST}:plain`]);
  });

  it("hashes --text input without prompting or clearing", async () => {
    const { deps, calls } = recordingDeps("unused");
    const result = await runHashName(deps, { text: "abc", clearScreen: true });
    expect(result.digestHex).toBe(ABC_DIGEST);
    expect(calls).toEqual([`print:abc:${ABC_DIGEST}:plain`]);
  });

  it("hashes an empty name", async () => {
    const { deps } = recordingDeps("");
    const result = await runHashName(deps, { clearScreen: false });
    expect(result.digestHex).toBe(
      "a7ffc6f8bf1ed76651c14756a061d662f580ff4de43b49fa82d80a4b80f8434a",
    );
  });

  it("passes labels through to the printer", async () => {
    const { deps, calls } = recordingDeps("abc");
    await runHashName(deps, {
      clearScreen: false,
      labels: { beforeLabel: "a: ", afterLabel: "b: " },
    });
    expect(calls).toEqual(["read", `print:abc:${ABC_DIGEST}:labelled`]);
  });

  it("logs the byte length and digest", async () => {
    const { deps, logs } = recordingDeps("é");
    const result = await runHashName(deps, { clearScreen: true });
    expect(logs).toEqual([
      "Cleared terminal",
      "Hashing 2 UTF-8 bytes",
      `SHA3-256 digest computed: ${result.digestHex}`,
    ]);
  });
});
