import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import type { ParsedMessage, ParsedSession } from "@shared/schema";
import { DB, IN_MEMORY_DB_PATH } from "./db";
import { assembleCodexSession } from "./parsers/codex";
import { reconcile } from "./reconciler";

const makeSession = (overrides: Partial<ParsedSession> = {}): ParsedSession => ({
  externalId: "claude-7",
  source: "claude",
  projectPath: "/work/site",
  model: "claude-sonnet",
  provider: "anthropic",
  startedAt: "2026-03-01T10:00:00.000Z",
  endedAt: "2026-03-01T10:10:00.000Z",
  tokens: { input: 100, output: 50, cacheCreation: 0, cacheRead: 0, reasoning: 0, total: 150 },
  cost: 0.00105,
  messages: [],
  toolCalls: [],
  ...overrides,
});

const transcript = (count: number): ParsedMessage[] =>
  Array.from({ length: count }, (_, index) => ({
    role: index % 2 === 0 ? "user" : "assistant",
    content: `message ${index}`,
    timestamp: "2026-03-01T10:05:00.000Z",
  }));

describe("reconcile", () => {
  let db: DB;

  beforeEach(() => {
    db = new DB(IN_MEMORY_DB_PATH);
  });

  afterEach(() => {
    vi.restoreAllMocks();
    db.close();
  });

  test("inserts once and reports the resync as already tracked", () => {
    const parsed = assembleCodexSession(
      [
        JSON.stringify({ type: "session_meta", timestamp: "2026-03-01T10:00:00Z", payload: { id: "codex-9" } }),
        JSON.stringify({
          type: "response_item",
          timestamp: "2026-03-01T10:00:01Z",
          payload: { type: "message", role: "user", content: [{ type: "input_text", text: "hello" }] },
        }),
        JSON.stringify({
          type: "event_msg",
          timestamp: "2026-03-01T10:00:02Z",
          payload: { type: "tool_use", name: "shell", input: { cmd: "pwd" } },
        }),
      ].join("\n"),
    );

    const first = reconcile(db, parsed);
    const second = reconcile(db, parsed);

    expect(first.status).toBe("inserted");
    expect(second).toEqual({
      status: "already_tracked",
      sessionId: first.status === "inserted" ? first.sessionId : -1,
    });
    expect(db.countSessions()).toBe(1);

    const stored = db.getSessionByExternalId("codex-9");
    expect(stored?.messageCount).toBe(1);
    expect(db.getToolCalls(stored?.id ?? -1)).toHaveLength(1);
  });

  test("backfills messages without touching stored scalars", () => {
    const first = reconcile(db, makeSession());
    expect(first.status).toBe("inserted");

    const before = db.getSessionByExternalId("claude-7");

    const outcome = reconcile(
      db,
      makeSession({
        messages: transcript(3),
        tokens: { input: 900, output: 400, cacheCreation: 10, cacheRead: 20, reasoning: 0, total: 1330 },
        cost: 9,
        endedAt: "2026-03-01T11:00:00.000Z",
      }),
    );

    expect(outcome).toEqual({ status: "backfilled", sessionId: before?.id, messageCount: 3 });

    const after = db.getSessionByExternalId("claude-7");
    expect(after?.messageCount).toBe(3);
    expect(after?.tokens).toEqual(before?.tokens);
    expect(after?.cost).toBe(before?.cost);
    expect(after?.startedAt).toBe(before?.startedAt);
    expect(after?.endedAt).toBe(before?.endedAt);
  });

  test("backfills only once", () => {
    reconcile(db, makeSession());
    reconcile(db, makeSession({ messages: transcript(2) }));

    const outcome = reconcile(db, makeSession({ messages: transcript(5) }));

    expect(outcome.status).toBe("already_tracked");
    expect(db.getSessionByExternalId("claude-7")?.messageCount).toBe(2);
  });

  test("decides a backfill from the stored message count", () => {
    reconcile(db, makeSession());
    const countSpy = vi.spyOn(db, "getMessageCountBySessionId");

    expect(reconcile(db, makeSession({ messages: transcript(2) })).status).toBe("backfilled");
    expect(countSpy).not.toHaveBeenCalled();
  });

  test("does nothing when neither side has messages", () => {
    reconcile(db, makeSession());

    expect(reconcile(db, makeSession()).status).toBe("already_tracked");
    expect(db.getSessionByExternalId("claude-7")?.messageCount).toBe(0);
  });

  test("treats a lost insert race as already tracked", () => {
    reconcile(db, makeSession());
    // The lookup misses, as if another writer inserted in between.
    vi.spyOn(db, "getSessionByExternalId").mockReturnValue(null);

    expect(reconcile(db, makeSession({ messages: transcript(1) }))).toEqual({
      status: "already_tracked",
      sessionId: null,
    });
    expect(db.countSessions()).toBe(1);
  });

  test("returns storage failures as an error outcome and rolls back", () => {
    vi.spyOn(db, "insertMessages").mockImplementation(() => {
      throw new Error("disk full");
    });

    const outcome = reconcile(db, makeSession({ messages: transcript(1) }));

    expect(outcome.status).toBe("error");
    expect(outcome.status === "error" ? outcome.error.message : "").toBe("disk full");
    expect(db.countSessions()).toBe(0);
  });
});
