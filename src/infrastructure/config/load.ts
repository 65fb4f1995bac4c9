import { readFile } from "node:fs/promises";
import path from "node:path";
import YAML from "yaml";
import { ConfigError, ValidationError } from "../../domain/common/errors";
import {
  AppConfigSchema,
  type AppConfig,
  type AppConfigOverrides,
} from "./schema";

export type LoadConfigArgs = {
  configPath?: string;
  overrides?: AppConfigOverrides;
};

type UnknownRecord = Record<string, unknown>;

function isRecord(value: unknown): value is UnknownRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function definedEntries(layer: UnknownRecord): UnknownRecord {
  return Object.fromEntries(
    Object.entries(layer).filter(([, value]) => value !== undefined),
  );
}

/** Later layers win; `output` is the only nested section and merges by key. */
function mergeLayers(...layers: UnknownRecord[]): UnknownRecord {
  let out: UnknownRecord = {};
  for (const layer of layers) {
    const prior = out["output"];
    const next = layer["output"];
    out = { ...out, ...definedEntries(layer) };
    if (isRecord(next)) {
      const defined = definedEntries(next);
      if (isRecord(prior)) out["output"] = { ...prior, ...defined };
      else out["output"] = Object.keys(defined).length > 0 ? defined : prior;
    }
  }
  return out;
}

function envString(name: string): string | undefined {
  const v = process.env[name];
  return v && v.length > 0 ? v : undefined;
}

function envBool(name: string): boolean | undefined {
  const raw = envString(name);
  if (!raw) return undefined;
  if (raw === "true" || raw === "1") return true;
  if (raw === "false" || raw === "0") return false;
  return undefined;
}

function configFromEnv(): UnknownRecord {
  return {
    logLevel: envString("LOG_LEVEL"),
    prompt: envString("NAME_HASH_PROMPT"),
    clearScreen: envBool("NAME_HASH_CLEAR_SCREEN"),
    output: {
      labels: envBool("NAME_HASH_LABELS"),
    },
  };
}

async function readConfigFile(configPath: string): Promise<UnknownRecord> {
  const abs = path.isAbsolute(configPath)
    ? configPath
    : path.join(process.cwd(), configPath);
  let raw: string;
  try {
    raw = await readFile(abs, "utf8");
  } catch (error) {
    throw new ConfigError(`Failed to read config file: ${abs}`, error);
  }

  const ext = path.extname(abs).toLowerCase();
  try {
    if (ext === ".yaml" || ext === ".yml") {
      const parsed = YAML.parse(raw) as unknown;
      return isRecord(parsed) ? parsed : {};
    }
    const parsed = JSON.parse(raw) as unknown;
    return isRecord(parsed) ? parsed : {};
  } catch (error) {
    throw new ConfigError(`Failed to parse config file: ${abs}`, error);
  }
}

export async function loadConfig(
  args: LoadConfigArgs = {},
): Promise<AppConfig> {
  const fileConfig = args.configPath
    ? await readConfigFile(args.configPath)
    : {};
  const envConfig = configFromEnv();
  const merged = mergeLayers(fileConfig, envConfig, { ...args.overrides });

  const parsed = AppConfigSchema.safeParse(merged);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
      .join("\n");
    throw new ValidationError(
      `Invalid configuration:\n${issues}`,
      parsed.error,
    );
  }
  return parsed.data;
}
