export type ErrorKind = "config" | "validation" | "input" | "unknown";

export class AppError extends Error {
  readonly kind: ErrorKind;
  override readonly cause?: unknown;

  constructor(kind: ErrorKind, message: string, cause?: unknown) {
    super(message);
    this.kind = kind;
    this.cause = cause;
  }
}

export class ConfigError extends AppError {
  constructor(message: string, cause?: unknown) {
    super("config", message, cause);
  }
}

export class ValidationError extends AppError {
  constructor(message: string, cause?: unknown) {
    super("validation", message, cause);
  }
}

/** Raised when stdin ends before a line could be read. */
export class InputError extends AppError {
  constructor(message: string, cause?: unknown) {
    super("input", message, cause);
  }
}

export function toAppError(error: unknown): AppError {
  if (error instanceof AppError) return error;
  if (error instanceof Error)
    return new AppError("unknown", error.message, error);
  return new AppError("unknown", String(error));
}
