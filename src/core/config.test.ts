import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { homedir, tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { ConfigError, defaultConfig, loadConfig, normalizeConfig } from "./config";

describe("normalizeConfig", () => {
  test("returns defaults for anything that is not an object", () => {
    expect(normalizeConfig(null)).toEqual(defaultConfig());
    expect(normalizeConfig([1, 2])).toEqual(defaultConfig());
  });

  test("keeps valid fields and falls back on mistyped ones", () => {
    const config = normalizeConfig({
      database: "~/data/usage.db",
      agents: { codex: false, claude: "yes", gemini: true },
      paths: { codex: "/logs/codex", claude: 7, other: "/x" },
      timeZone: "Europe/Berlin",
      autoSync: "no",
      extra: true,
    });

    expect(config).toEqual({
      databasePath: join(homedir(), "data/usage.db"),
      agents: { codex: false, claude: true },
      paths: { codex: "/logs/codex" },
      timeZone: "Europe/Berlin",
      autoSync: true,
    });
  });
});

describe("loadConfig", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "agent-usage-config-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  test("reads a JSON file and applies environment overrides", async () => {
    const path = join(dir, "config.json");
    writeFileSync(path, JSON.stringify({ database: "/data/a.db", timeZone: "Asia/Tokyo", autoSync: false }));

    const config = await loadConfig({ path, env: { AGENT_USAGE_DB: "/data/b.db" } });

    expect(config.databasePath).toBe("/data/b.db");
    expect(config.timeZone).toBe("Asia/Tokyo");
    expect(config.autoSync).toBe(false);

    const zoned = await loadConfig({ path, env: { AGENT_USAGE_TZ: "UTC" } });
    expect(zoned.timeZone).toBe("UTC");
    expect(zoned.databasePath).toBe("/data/a.db");
  });

  test("fails for an explicit file that does not exist", async () => {
    const path = join(dir, "missing.json");

    await expect(loadConfig({ path, env: {} })).rejects.toBeInstanceOf(ConfigError);
  });

  test("fails for a file that is not valid JSON", async () => {
    const path = join(dir, "broken.json");
    writeFileSync(path, "{ database = ");

    await expect(loadConfig({ path, env: {} })).rejects.toThrow(`Failed to load config ${path}: invalid JSON`);
  });
});
