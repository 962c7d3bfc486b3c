import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import type { AppConfig } from "@shared/types";
import { defaultConfig } from "./config";
import type { AppContext } from "./context";
import { DB, IN_MEMORY_DB_PATH } from "./db";
import { isTotalFailure, syncAll, syncSource } from "./scan";

// 2026-03-10T12:00:00Z
const NOW_SECONDS = 1_773_144_000;

const codexLog = (id: string, text: string): string =>
  [
    JSON.stringify({ type: "session_meta", timestamp: "2026-03-10T10:00:00Z", payload: { id, cwd: "/work/app" } }),
    JSON.stringify({
      type: "response_item",
      timestamp: "2026-03-10T10:00:05Z",
      payload: { type: "message", role: "user", content: [{ type: "input_text", text }] },
    }),
  ].join("\n");

const claudeLog = (id: string): string =>
  JSON.stringify({
    type: "assistant",
    timestamp: "2026-03-10T11:00:00Z",
    sessionId: id,
    message: { role: "assistant", content: "done", usage: { input_tokens: 4, output_tokens: 2 } },
  });

describe("sync", () => {
  let root: string;
  let db: DB;
  let ctx: AppContext;

  const withConfig = (overrides: Partial<AppConfig>): AppContext => ({
    ...ctx,
    config: { ...ctx.config, ...overrides },
  });

  beforeEach(() => {
    root = mkdtempSync(join(tmpdir(), "agent-usage-sync-"));
    db = new DB(IN_MEMORY_DB_PATH);
    ctx = {
      config: {
        ...defaultConfig(),
        databasePath: IN_MEMORY_DB_PATH,
        paths: { codex: join(root, "codex"), claude: join(root, "claude") },
      },
      db,
      now: () => new Date(NOW_SECONDS * 1000),
    };

    mkdirSync(join(root, "codex", "2026", "03", "10"), { recursive: true });
    mkdirSync(join(root, "claude", "-work-app"), { recursive: true });
    writeFileSync(join(root, "codex", "2026", "03", "10", "rollout-a.jsonl"), codexLog("codex-a", "first"));
    writeFileSync(join(root, "codex", "2026", "03", "10", "rollout-b.jsonl"), codexLog("codex-b", "second"));
    writeFileSync(join(root, "claude", "-work-app", "k-1.jsonl"), claudeLog("claude-1"));
  });

  afterEach(() => {
    db.close();
    rmSync(root, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  test("imports discovered files and records the sync time", async () => {
    const summary = await syncSource(ctx, "codex");

    expect(summary).toEqual({
      source: "codex",
      files: 2,
      failedFiles: 0,
      inserted: 2,
      backfilled: 0,
      alreadyTracked: 0,
      errors: 0,
    });
    expect(db.countSessions("codex")).toBe(2);
    expect(db.getLastSyncTime("codex")).toBe(NOW_SECONDS);
  });

  test("is idempotent across runs", async () => {
    await syncSource(ctx, "codex");
    const second = await syncSource(ctx, "codex");

    expect(second.inserted).toBe(0);
    expect(second.alreadyTracked).toBe(2);
    expect(db.countSessions()).toBe(2);
  });

  test("counts unreadable files and keeps going", async () => {
    const errorSpy = vi.spyOn(console, "error").mockImplementation(() => undefined);
    const missing = join(root, "codex", "gone.jsonl");

    const summary = await syncSource(ctx, "codex", {
      paths: [missing, join(root, "codex", "2026", "03", "10", "rollout-a.jsonl")],
    });

    expect(summary.files).toBe(2);
    expect(summary.failedFiles).toBe(1);
    expect(summary.inserted).toBe(1);
    expect(errorSpy).toHaveBeenCalledTimes(1);
    expect(String(errorSpy.mock.calls[0]?.[0])).toBe(`[sync] Failed codex ${missing}`);
  });

  test("leaves the sync time alone when nothing was processed", async () => {
    vi.spyOn(console, "error").mockImplementation(() => undefined);

    const summary = await syncSource(ctx, "claude", { paths: [join(root, "nope.jsonl")] });

    expect(summary.failedFiles).toBe(1);
    expect(db.getLastSyncTime("claude")).toBe(0);
    expect(isTotalFailure([summary])).toBe(true);
  });

  test("syncs every enabled source", async () => {
    const summaries = await syncAll(withConfig({ agents: { codex: false, claude: true } }));

    expect(summaries.map((summary) => [summary.source, summary.inserted])).toEqual([["claude", 1]]);
    expect(db.countSessions("codex")).toBe(0);
    expect(db.getSessionByExternalId("claude-1")?.tokens.total).toBe(6);
  });

  test("returns an empty summary for a missing root", async () => {
    const summary = await syncSource(withConfig({ paths: { codex: join(root, "absent") } }), "codex");

    expect(summary.files).toBe(0);
    expect(isTotalFailure([summary])).toBe(false);
    expect(db.getLastSyncTime("codex")).toBe(0);
  });
});
