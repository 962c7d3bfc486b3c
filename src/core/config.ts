import { readFile } from "node:fs/promises";
import { SESSION_SOURCES, isSessionSource } from "@shared/schema";
import type { AppConfig } from "@shared/types";
import { expandHome } from "./discovery";

export const DEFAULT_CONFIG_PATH = expandHome("~/.agent-usage/config.json");
const DEFAULT_DB_PATH = expandHome("~/.agent-usage/usage.db");
const DEFAULT_TIME_ZONE = "UTC";

type Env = Record<string, string | undefined>;

export class ConfigError extends Error {
  readonly path: string;

  constructor(path: string, reason: string, cause?: unknown) {
    super(`Failed to load config ${path}: ${reason}`, { cause });
    this.name = "ConfigError";
    this.path = path;
  }
}

export const defaultConfig = (): AppConfig => ({
  databasePath: DEFAULT_DB_PATH,
  agents: { codex: true, claude: true },
  paths: {},
  timeZone: DEFAULT_TIME_ZONE,
  autoSync: true,
});

const isRecord = (value: unknown): value is Record<string, unknown> =>
  Boolean(value) && typeof value === "object" && !Array.isArray(value);

const toNonEmptyString = (value: unknown): string | null =>
  typeof value === "string" && value.trim().length > 0 ? value.trim() : null;

/** Fill in defaults for anything missing or mistyped; unknown keys are ignored. */
export const normalizeConfig = (value: unknown): AppConfig => {
  const defaults = defaultConfig();
  if (!isRecord(value)) return defaults;

  const agentsInput = isRecord(value.agents) ? value.agents : {};
  const agents = { ...defaults.agents };
  for (const source of SESSION_SOURCES) {
    const enabled = agentsInput[source];
    if (typeof enabled === "boolean") agents[source] = enabled;
  }

  const pathsInput = isRecord(value.paths) ? value.paths : {};
  const paths: AppConfig["paths"] = {};
  for (const [source, pathValue] of Object.entries(pathsInput)) {
    const path = toNonEmptyString(pathValue);
    if (isSessionSource(source) && path) {
      paths[source] = expandHome(path);
    }
  }

  const databasePath = toNonEmptyString(value.database);

  return {
    databasePath: databasePath ? expandHome(databasePath) : defaults.databasePath,
    agents,
    paths,
    timeZone: toNonEmptyString(value.timeZone) ?? defaults.timeZone,
    autoSync: typeof value.autoSync === "boolean" ? value.autoSync : defaults.autoSync,
  };
};

const applyEnv = (config: AppConfig, env: Env): AppConfig => {
  const databasePath = toNonEmptyString(env.AGENT_USAGE_DB);
  const timeZone = toNonEmptyString(env.AGENT_USAGE_TZ);

  return {
    ...config,
    databasePath: databasePath ? expandHome(databasePath) : config.databasePath,
    timeZone: timeZone ?? config.timeZone,
  };
};

const isMissingFile = (error: unknown): boolean =>
  error instanceof Error && "code" in error && error.code === "ENOENT";

export interface LoadConfigOptions {
  // An explicit path must exist; the default path may be absent.
  path?: string;
  env?: Env;
}

export const loadConfig = async (options: LoadConfigOptions = {}): Promise<AppConfig> => {
  const env = options.env ?? process.env;
  const explicitPath = options.path ? expandHome(options.path) : null;
  const path = explicitPath ?? DEFAULT_CONFIG_PATH;

  let text: string;
  try {
    text = await readFile(path, "utf8");
  } catch (error) {
    if (!explicitPath && isMissingFile(error)) {
      return applyEnv(defaultConfig(), env);
    }
    throw new ConfigError(path, error instanceof Error ? error.message : String(error), error);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    throw new ConfigError(path, "invalid JSON", error);
  }

  return applyEnv(normalizeConfig(parsed), env);
};
