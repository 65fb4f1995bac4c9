import { Command } from "commander";
import { registerHashCommand, type CommandIo } from "./commands/hash";

export function createProgram(io: CommandIo): Command {
  const program = new Command();

  const version = process.env.npm_package_version ?? "0.1.0";
  program
    .name("name-hash")
    .description("Read a name from stdin and print its SHA3-256 digest")
    .version(version);

  registerHashCommand(program, io);
  return program;
}
