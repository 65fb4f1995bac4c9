import { z } from "zod";

export const LogLevelSchema = z
  .enum(["silent", "error", "warn", "info", "debug"])
  .default("error");

export const OutputSchema = z.object({
  /** Prefix each printed line with its label */
  labels: z.boolean().default(false),
  beforeLabel: z.string().default("Name before hash: "),
  afterLabel: z.string().default("Name after hash: "),
});

export const AppConfigSchema = z.object({
  logLevel: LogLevelSchema,
  prompt: z.string().default("Enter your name: "),
  /** Clear the terminal between reading the name and printing the digest */
  clearScreen: z.boolean().default(true),
  output: OutputSchema.default({}),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;
export type LogLevel = AppConfig["logLevel"];

export type AppConfigOverrides = {
  logLevel?: LogLevel;
  prompt?: string;
  clearScreen?: boolean;
  output?: Partial<AppConfig["output"]>;
};
