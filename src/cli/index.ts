#!/usr/bin/env node
import { ExitCode } from "./exit-codes";
import { createProgram } from "./program";

const program = createProgram({
  stdin: process.stdin,
  stdout: process.stdout,
  writeError: (line) => console.error(line),
});

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : String(error));
  process.exitCode = ExitCode.failure;
});
