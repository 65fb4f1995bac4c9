import { createInterface } from "node:readline";
import { InputError } from "../../domain/common/errors";

export type ReadLineOptions = {
  prompt: string;
  input: NodeJS.ReadableStream;
  output: NodeJS.WritableStream;
};

/**
 * Writes `prompt` and resolves with the first line read from `input`,
 * without its `\n` / `\r\n` terminator. Rejects with `InputError` when the
 * input ends before a line arrives.
 */
export function readLine(options: ReadLineOptions): Promise<string> {
  // terminal: false leaves echo and line editing to the tty driver
  const rl = createInterface({
    input: options.input,
    terminal: false,
    crlfDelay: Infinity,
  });
  options.output.write(options.prompt);

  return new Promise<string>((resolve, reject) => {
    let answered = false;
    rl.once("line", (line) => {
      answered = true;
      rl.close();
      resolve(line);
    });
    rl.once("close", () => {
      if (!answered) reject(new InputError("Input closed before a name was entered"));
    });
  });
}
