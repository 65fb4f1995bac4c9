import type { AppError } from "../domain/common/errors";

export const ExitCode = {
  success: 0,
  failure: 1,
  usage: 2,
} as const;

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];

/** Invalid options or configuration are usage errors; anything else is a failure. */
export function exitCodeForError(error: AppError): ExitCode {
  return error.kind === "validation" ? ExitCode.usage : ExitCode.failure;
}
