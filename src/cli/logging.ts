import type { AppConfig, LogLevel } from "../infrastructure/config/schema";

export type Logger = {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
};

const LEVEL_ORDER: LogLevel[] = ["silent", "error", "warn", "info", "debug"];

export function createLogger(
  config: Pick<AppConfig, "logLevel">,
  write: (line: string) => void = (line) => console.error(line),
): Logger {
  const level = config.logLevel;
  const enabled = (target: LogLevel) =>
    level !== "silent" && LEVEL_ORDER.indexOf(level) >= LEVEL_ORDER.indexOf(target);

  const log = (target: LogLevel) => (m: string) => {
    if (enabled(target)) write(m);
  };

  return {
    debug: log("debug"),
    info: log("info"),
    warn: log("warn"),
    error: log("error"),
  };
}
