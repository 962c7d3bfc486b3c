import { join } from "node:path";
import { glob } from "glob";
import type { SessionSource } from "@shared/schema";
import type { AppConfig } from "@shared/types";
import { expandHome } from "./utils";

const SESSION_FILE_PATTERN = "**/*.jsonl";

type Env = Record<string, string | undefined>;

const envDir = (env: Env, name: string): string | null => {
  const value = env[name];
  return value && value.trim().length > 0 ? value.trim() : null;
};

const DEFAULT_ROOTS: Record<SessionSource, (env: Env) => string> = {
  codex: (env) => {
    const codexHome = envDir(env, "CODEX_HOME");
    return codexHome ? join(codexHome, "sessions") : expandHome("~/.codex/sessions");
  },
  claude: (env) => {
    const configDir = envDir(env, "CLAUDE_CONFIG_DIR");
    return configDir ? join(configDir, "projects") : expandHome("~/.claude/projects");
  },
};

export const resolveSourceRoot = (
  source: SessionSource,
  paths: AppConfig["paths"] = {},
  env: Env = process.env,
): string => {
  const override = paths[source];
  if (override && override.trim().length > 0) return expandHome(override.trim());
  return DEFAULT_ROOTS[source](env);
};

/** Every `*.jsonl` file under `root`, sorted by path. A missing root yields an empty list. */
export const discoverSessionFiles = async (root: string): Promise<string[]> => {
  const files = await glob(SESSION_FILE_PATTERN, { cwd: root, absolute: true, nodir: true });
  return files.sort((a, b) => a.localeCompare(b));
};

export { expandHome } from "./utils";
