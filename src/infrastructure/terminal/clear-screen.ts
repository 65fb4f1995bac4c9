import { clearScreenDown, cursorTo } from "node:readline";

export type ClearableStream = NodeJS.WritableStream & { isTTY?: boolean };

/**
 * Clears an interactive terminal. Returns false without writing anything
 * when the stream is not a TTY (pipes, files, CI logs).
 */
export function clearScreen(stream: ClearableStream): boolean {
  if (!stream.isTTY) return false;
  cursorTo(stream, 0, 0);
  clearScreenDown(stream);
  return true;
}
