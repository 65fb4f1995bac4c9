import type { Logger } from "../../cli/logging";
import type { NameDigest } from "../../domain/hash/digest";
import { encodeUtf8, hashName } from "../../infrastructure/crypto/hash";
import type { OutputLabels } from "../../infrastructure/terminal/output";

export type HashNameDeps = {
  /** Resolves with the name; skipped in favour of `text` when that is set. */
  readName: () => Promise<string>;
  clearScreen: () => boolean;
  print: (result: NameDigest, labels?: OutputLabels) => void;
  logger: Logger;
};

export type HashNameOptions = {
  /** Hash this value instead of prompting; also skips the screen clear. */
  text?: string;
  clearScreen: boolean;
  labels?: OutputLabels;
};

/**
 * read → clear → hash → print, each step once and in that order.
 */
export async function runHashName(
  deps: HashNameDeps,
  options: HashNameOptions,
): Promise<NameDigest> {
  const interactive = options.text === undefined;
  const name = options.text ?? (await deps.readName());

  if (interactive && options.clearScreen) {
    const cleared = deps.clearScreen();
    deps.logger.debug(cleared ? "Cleared terminal" : "Output is not a TTY; clear skipped");
  }

  deps.logger.debug(`Hashing ${encodeUtf8(name).length} UTF-8 bytes`);
  const result = hashName(name);
  deps.logger.info(`SHA3-256 digest computed: ${result.digestHex}`);

  deps.print(result, options.labels);
  return result;
}
