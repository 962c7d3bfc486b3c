import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { homedir, tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { discoverSessionFiles, resolveSourceRoot } from "./index";
import { expandHome } from "./utils";

describe("discoverSessionFiles", () => {
  let root: string;

  beforeEach(() => {
    root = mkdtempSync(join(tmpdir(), "agent-usage-discovery-"));
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  test("finds nested jsonl files sorted by path", async () => {
    mkdirSync(join(root, "2026", "03", "02"), { recursive: true });
    mkdirSync(join(root, "2026", "03", "01"), { recursive: true });
    mkdirSync(join(root, "folder.jsonl"), { recursive: true });
    writeFileSync(join(root, "2026", "03", "02", "rollout-b.jsonl"), "");
    writeFileSync(join(root, "2026", "03", "01", "rollout-a.jsonl"), "");
    writeFileSync(join(root, "2026", "03", "01", "notes.txt"), "");
    writeFileSync(join(root, "top.jsonl"), "");

    expect(await discoverSessionFiles(root)).toEqual([
      join(root, "2026", "03", "01", "rollout-a.jsonl"),
      join(root, "2026", "03", "02", "rollout-b.jsonl"),
      join(root, "top.jsonl"),
    ]);
  });

  test("returns nothing for a missing root", async () => {
    expect(await discoverSessionFiles(join(root, "absent"))).toEqual([]);
  });
});

describe("resolveSourceRoot", () => {
  test("uses agent home variables when set", () => {
    expect(resolveSourceRoot("codex", {}, { CODEX_HOME: "/opt/codex" })).toBe("/opt/codex/sessions");
    expect(resolveSourceRoot("claude", {}, { CLAUDE_CONFIG_DIR: "/opt/claude" })).toBe("/opt/claude/projects");
  });

  test("defaults to the home directory", () => {
    expect(resolveSourceRoot("codex", {}, {})).toBe(join(homedir(), ".codex/sessions"));
    expect(resolveSourceRoot("claude", {}, {})).toBe(join(homedir(), ".claude/projects"));
  });

  test("prefers a configured path", () => {
    expect(resolveSourceRoot("codex", { codex: "~/logs" }, { CODEX_HOME: "/opt/codex" })).toBe(
      join(homedir(), "logs"),
    );
  });
});

describe("expandHome", () => {
  test("expands only a leading tilde", () => {
    expect(expandHome("~")).toBe(homedir());
    expect(expandHome("/a/~/b")).toBe("/a/~/b");
  });
});
