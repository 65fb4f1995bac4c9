import type { Command } from "commander";
import { z } from "zod";
import { runHashName } from "../../application/hash-name/hash-name-usecase";
import { toAppError } from "../../domain/common/errors";
import { loadConfig } from "../../infrastructure/config/load";
import { clearScreen, type ClearableStream } from "../../infrastructure/terminal/clear-screen";
import { readLine } from "../../infrastructure/terminal/line-reader";
import { printDigest } from "../../infrastructure/terminal/output";
import { ExitCode, exitCodeForError } from "../exit-codes";
import { createLogger } from "../logging";

export type CommandIo = {
  stdin: NodeJS.ReadableStream;
  stdout: ClearableStream;
  writeError: (line: string) => void;
};

const HashOptionsSchema = z.object({
  text: z.string().optional(),
  prompt: z.string().optional(),
  clear: z.boolean().default(true),
  labels: z.boolean().optional(),
  config: z.string().optional(),
  verbose: z.boolean().optional(),
  debug: z.boolean().optional(),
});

export async function runHashCommand(opts: unknown, io: CommandIo): Promise<ExitCode> {
  const parsed = HashOptionsSchema.safeParse(opts);
  if (!parsed.success) {
    io.writeError(parsed.error.issues.map((i) => i.message).join("\n"));
    return ExitCode.usage;
  }
  const args = parsed.data;
  // without a flag, LOG_LEVEL or the config file decide
  const logLevel = args.debug ? "debug" : args.verbose ? "info" : undefined;

  try {
    const config = await loadConfig({
      configPath: args.config,
      overrides: {
        logLevel,
        prompt: args.prompt,
        // commander reports `clear: true` unless --no-clear was given
        clearScreen: args.clear ? undefined : false,
        output: { labels: args.labels },
      },
    });
    const logger = createLogger(config, io.writeError);

    await runHashName(
      {
        readName: () =>
          readLine({ prompt: config.prompt, input: io.stdin, output: io.stdout }),
        clearScreen: () => clearScreen(io.stdout),
        print: (result, labels) => printDigest(io.stdout, result, labels),
        logger,
      },
      {
        text: args.text,
        clearScreen: config.clearScreen,
        labels: config.output.labels ? config.output : undefined,
      },
    );
    return ExitCode.success;
  } catch (error) {
    const appError = toAppError(error);
    if (args.debug) {
      io.writeError(appError.stack ?? appError.message);
    } else {
      io.writeError(appError.message);
    }
    return exitCodeForError(appError);
  }
}

export function registerHashCommand(program: Command, io: CommandIo): void {
  program
    .command("hash", { isDefault: true })
    .description("Read a name and print its SHA3-256 digest")
    .option("-t, --text <name>", "Hash this value instead of prompting for it")
    .option("-p, --prompt <text>", "Prompt shown before reading the name")
    .option("--no-clear", "Do not clear the terminal before printing")
    .option("--labels", "Prefix each output line with a label")
    .option("--no-labels", "Print the name and digest without labels")
    .option("--config <path>", "Path to YAML/JSON config file")
    .option("--verbose", "Verbose logs")
    .option("--debug", "Debug logs (includes stack traces)")
    .action(async (opts) => {
      process.exitCode = await runHashCommand(opts, io);
    });
}
