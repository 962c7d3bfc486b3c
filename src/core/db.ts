import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import Database from "better-sqlite3";
import type {
  AggregatedStats,
  ModelUsage,
  ParsedMessage,
  ParsedSession,
  ParsedToolCall,
  SessionSource,
  SourceStats,
  StoredMessage,
  StoredSession,
  StoredToolCall,
  TokenUsage,
} from "@shared/schema";
import { emptyTokenUsage, toEpochSeconds } from "./normalizer";

type Sqlite = Database.Database;

export const IN_MEMORY_DB_PATH = ":memory:";

const schemaStatements = [
  "PRAGMA foreign_keys = ON",
  `CREATE TABLE IF NOT EXISTS sessions (
    id            INTEGER PRIMARY KEY AUTOINCREMENT,
    external_id   TEXT NOT NULL UNIQUE,
    source        TEXT NOT NULL,
    project_path  TEXT,
    model         TEXT,
    provider      TEXT,
    started_at    INTEGER NOT NULL,
    ended_at      INTEGER,
    input_tokens          INTEGER NOT NULL DEFAULT 0,
    output_tokens         INTEGER NOT NULL DEFAULT 0,
    cache_creation_tokens INTEGER NOT NULL DEFAULT 0,
    cache_read_tokens     INTEGER NOT NULL DEFAULT 0,
    reasoning_tokens      INTEGER NOT NULL DEFAULT 0,
    total_tokens          INTEGER NOT NULL DEFAULT 0,
    cost                  REAL NOT NULL DEFAULT 0
  )`,
  "CREATE INDEX IF NOT EXISTS idx_sessions_source_started ON sessions(source, started_at)",
  "CREATE INDEX IF NOT EXISTS idx_sessions_started ON sessions(started_at)",
  `CREATE TABLE IF NOT EXISTS messages (
    id         INTEGER PRIMARY KEY AUTOINCREMENT,
    session_id INTEGER NOT NULL REFERENCES sessions(id),
    role       TEXT NOT NULL,
    content    TEXT NOT NULL,
    timestamp  INTEGER NOT NULL
  )`,
  "CREATE INDEX IF NOT EXISTS idx_messages_session ON messages(session_id)",
  `CREATE TABLE IF NOT EXISTS tool_calls (
    id         INTEGER PRIMARY KEY AUTOINCREMENT,
    session_id INTEGER NOT NULL REFERENCES sessions(id),
    tool_name  TEXT NOT NULL,
    arguments  TEXT NOT NULL,
    result     TEXT NOT NULL DEFAULT '',
    timestamp  INTEGER NOT NULL
  )`,
  "CREATE INDEX IF NOT EXISTS idx_tool_calls_session ON tool_calls(session_id)",
  `CREATE TABLE IF NOT EXISTS metadata (
    key        TEXT PRIMARY KEY,
    value      TEXT NOT NULL,
    updated_at INTEGER NOT NULL
  )`,
];

// Columns that databases from older releases lack. Migration only ever adds them.
const additiveSessionColumns: Array<{ name: string; definition: string }> = [
  { name: "cache_creation_tokens", definition: "INTEGER NOT NULL DEFAULT 0" },
  { name: "cache_read_tokens", definition: "INTEGER NOT NULL DEFAULT 0" },
  { name: "reasoning_tokens", definition: "INTEGER NOT NULL DEFAULT 0" },
];

const MESSAGE_COUNT_SUBQUERY =
  "COALESCE((SELECT COUNT(*) FROM messages m WHERE m.session_id = s.id), 0) AS message_count";

const SESSION_COLUMNS = `s.id, s.external_id, s.source, s.project_path, s.model, s.provider,
  s.started_at, s.ended_at, s.input_tokens, s.output_tokens, s.cache_creation_tokens,
  s.cache_read_tokens, s.reasoning_tokens, s.total_tokens, s.cost, ${MESSAGE_COUNT_SUBQUERY}`;

const TOKEN_SUMS = `COALESCE(SUM(s.input_tokens), 0) AS input_tokens,
  COALESCE(SUM(s.output_tokens), 0) AS output_tokens,
  COALESCE(SUM(s.cache_creation_tokens), 0) AS cache_creation_tokens,
  COALESCE(SUM(s.cache_read_tokens), 0) AS cache_read_tokens,
  COALESCE(SUM(s.reasoning_tokens), 0) AS reasoning_tokens,
  COALESCE(SUM(s.total_tokens), 0) AS total_tokens,
  COALESCE(SUM(s.cost), 0) AS cost`;

// Unterminated or inverted sessions count as zero, never negative.
const DURATION_SQL =
  "CASE WHEN s.ended_at IS NOT NULL AND s.ended_at > s.started_at THEN s.ended_at - s.started_at ELSE 0 END";

interface TokenColumns {
  input_tokens: number;
  output_tokens: number;
  cache_creation_tokens: number;
  cache_read_tokens: number;
  reasoning_tokens: number;
  total_tokens: number;
}

interface SessionRow extends TokenColumns {
  id: number;
  external_id: string;
  source: SessionSource;
  project_path: string | null;
  model: string | null;
  provider: string | null;
  started_at: number;
  ended_at: number | null;
  cost: number;
  message_count: number;
}

interface AggregateRow extends TokenColumns {
  session_count: number;
  cost: number;
  duration_seconds: number;
}

interface SourceStatsRow extends AggregateRow {
  source: SessionSource;
  message_count: number;
}

interface MessageRow {
  id: number;
  session_id: number;
  role: string;
  content: string;
  timestamp: number;
}

interface ToolCallRow {
  id: number;
  session_id: number;
  tool_name: string;
  arguments: string;
  result: string;
  timestamp: number;
}

/** A window over the sessions table: everything started at or after `since`, optionally one source. */
export interface QueryScope {
  since: number;
  source?: SessionSource;
}

/** The part of a session row the bucketing in the aggregator needs. */
export interface SessionSpan {
  startedAt: number;
  endedAt: number | null;
  totalTokens: number;
}

const toTokenUsage = (row: TokenColumns): TokenUsage => ({
  input: row.input_tokens ?? 0,
  output: row.output_tokens ?? 0,
  cacheCreation: row.cache_creation_tokens ?? 0,
  cacheRead: row.cache_read_tokens ?? 0,
  reasoning: row.reasoning_tokens ?? 0,
  total: row.total_tokens ?? 0,
});

const mapSessionRow = (row: SessionRow): StoredSession => ({
  id: row.id,
  externalId: row.external_id,
  source: row.source,
  projectPath: row.project_path,
  model: row.model,
  provider: row.provider,
  startedAt: row.started_at,
  endedAt: row.ended_at,
  tokens: toTokenUsage(row),
  cost: row.cost,
  messageCount: row.message_count,
});

const mapAggregateRow = (row: AggregateRow | undefined): AggregatedStats => {
  if (!row) return { sessionCount: 0, tokens: emptyTokenUsage(), cost: 0, durationSeconds: 0 };

  return {
    sessionCount: row.session_count,
    tokens: toTokenUsage(row),
    cost: row.cost,
    durationSeconds: row.duration_seconds,
  };
};

const mapMessageRow = (row: MessageRow): StoredMessage => ({
  id: row.id,
  sessionId: row.session_id,
  role: row.role,
  content: row.content,
  timestamp: row.timestamp,
});

const mapToolCallRow = (row: ToolCallRow): StoredToolCall => ({
  id: row.id,
  sessionId: row.session_id,
  toolName: row.tool_name,
  argumentsJson: row.arguments,
  result: row.result,
  timestamp: row.timestamp,
});

const nullIfEmpty = (value: string): string | null => (value.length > 0 ? value : null);

const lastSyncKey = (source: SessionSource): string => `last_sync_${source}`;

const scopeWhere = (scope: QueryScope): { sql: string; params: Array<string | number> } => {
  const where = ["s.started_at >= ?"];
  const params: Array<string | number> = [scope.since];

  if (scope.source) {
    where.push("s.source = ?");
    params.push(scope.source);
  }

  return { sql: `WHERE ${where.join(" AND ")}`, params };
};

export const isUniqueConstraintError = (error: unknown): boolean =>
  error instanceof Error && "code" in error && error.code === "SQLITE_CONSTRAINT_UNIQUE";

export class DB {
  private readonly sqlite: Sqlite;
  readonly dbPath: string;

  constructor(dbPath: string) {
    this.dbPath = dbPath;
    if (dbPath !== IN_MEMORY_DB_PATH) {
      mkdirSync(dirname(dbPath), { recursive: true });
      this.sqlite = new Database(dbPath);
      this.sqlite.pragma("journal_mode = WAL");
    } else {
      this.sqlite = new Database(dbPath);
    }
    this.migrate();
  }

  private migrate(): void {
    for (const statement of schemaStatements) {
      this.sqlite.exec(statement);
    }

    const existing = new Set(
      this.sqlite
        .prepare<[], { name: string }>("PRAGMA table_info(sessions)")
        .all()
        .map((column) => column.name),
    );

    for (const column of additiveSessionColumns) {
      if (existing.has(column.name)) continue;
      this.sqlite.exec(`ALTER TABLE sessions ADD COLUMN ${column.name} ${column.definition}`);
      console.info(`[db] Added column sessions.${column.name}`);
    }
  }

  transaction<T>(run: () => T): T {
    return this.sqlite.transaction(run)();
  }

  insertSession(session: ParsedSession): number {
    const result = this.sqlite
      .prepare(
        `INSERT INTO sessions (
          external_id, source, project_path, model, provider, started_at, ended_at,
          input_tokens, output_tokens, cache_creation_tokens, cache_read_tokens, reasoning_tokens,
          total_tokens, cost
        ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
      )
      .run(
        session.externalId,
        session.source,
        nullIfEmpty(session.projectPath),
        nullIfEmpty(session.model),
        nullIfEmpty(session.provider),
        toEpochSeconds(session.startedAt) ?? 0,
        toEpochSeconds(session.endedAt),
        session.tokens.input,
        session.tokens.output,
        session.tokens.cacheCreation,
        session.tokens.cacheRead,
        session.tokens.reasoning,
        session.tokens.total,
        session.cost,
      );

    return Number(result.lastInsertRowid);
  }

  getSessionByExternalId(externalId: string): StoredSession | null {
    const row = this.sqlite
      .prepare<[string], SessionRow>(`SELECT ${SESSION_COLUMNS} FROM sessions s WHERE s.external_id = ?`)
      .get(externalId);

    return row ? mapSessionRow(row) : null;
  }

  insertMessages(sessionId: number, messages: ParsedMessage[]): void {
    const insert = this.sqlite.prepare(
      "INSERT INTO messages (session_id, role, content, timestamp) VALUES (?, ?, ?, ?)",
    );

    for (const message of messages) {
      insert.run(sessionId, message.role, message.content, toEpochSeconds(message.timestamp) ?? 0);
    }
  }

  insertToolCalls(sessionId: number, toolCalls: ParsedToolCall[]): void {
    const insert = this.sqlite.prepare(
      "INSERT INTO tool_calls (session_id, tool_name, arguments, result, timestamp) VALUES (?, ?, ?, ?, ?)",
    );

    for (const call of toolCalls) {
      insert.run(
        sessionId,
        call.toolName,
        call.argumentsJson,
        call.result,
        toEpochSeconds(call.timestamp) ?? 0,
      );
    }
  }

  getMessageCountBySessionId(sessionId: number): number {
    const row = this.sqlite
      .prepare<[number], { total: number }>("SELECT COUNT(*) AS total FROM messages WHERE session_id = ?")
      .get(sessionId);

    return row?.total ?? 0;
  }

  getMessages(sessionId: number): StoredMessage[] {
    return this.sqlite
      .prepare<[number], MessageRow>(
        `SELECT id, session_id, role, content, timestamp
         FROM messages WHERE session_id = ? ORDER BY id ASC`,
      )
      .all(sessionId)
      .map(mapMessageRow);
  }

  getToolCalls(sessionId: number): StoredToolCall[] {
    return this.sqlite
      .prepare<[number], ToolCallRow>(
        `SELECT id, session_id, tool_name, arguments, result, timestamp
         FROM tool_calls WHERE session_id = ? ORDER BY id ASC`,
      )
      .all(sessionId)
      .map(mapToolCallRow);
  }

  countSessions(source?: SessionSource): number {
    const row = source
      ? this.sqlite
          .prepare<[string], { total: number }>("SELECT COUNT(*) AS total FROM sessions WHERE source = ?")
          .get(source)
      : this.sqlite.prepare<[], { total: number }>("SELECT COUNT(*) AS total FROM sessions").get();

    return row?.total ?? 0;
  }

  getLastSession(scope: QueryScope): StoredSession | null {
    const { sql, params } = scopeWhere(scope);
    const row = this.sqlite
      .prepare<Array<string | number>, SessionRow>(
        `SELECT ${SESSION_COLUMNS} FROM sessions s ${sql} ORDER BY s.started_at DESC, s.id DESC LIMIT 1`,
      )
      .get(...params);

    return row ? mapSessionRow(row) : null;
  }

  getAggregatedStats(scope: QueryScope): AggregatedStats {
    const { sql, params } = scopeWhere(scope);
    const row = this.sqlite
      .prepare<Array<string | number>, AggregateRow>(
        `SELECT COUNT(*) AS session_count, ${TOKEN_SUMS},
          COALESCE(SUM(${DURATION_SQL}), 0) AS duration_seconds
         FROM sessions s ${sql}`,
      )
      .get(...params);

    return mapAggregateRow(row);
  }

  getTopModels(scope: QueryScope, limit: number): ModelUsage[] {
    const { sql, params } = scopeWhere(scope);

    return this.sqlite
      .prepare<Array<string | number>, { model: string; session_count: number }>(
        `SELECT s.model AS model, COUNT(*) AS session_count
         FROM sessions s ${sql} AND s.model IS NOT NULL AND s.model != ''
         GROUP BY s.model
         ORDER BY session_count DESC, s.model ASC
         LIMIT ?`,
      )
      .all(...params, limit)
      .map((row) => ({ model: row.model, sessionCount: row.session_count }));
  }

  getUniqueProjects(scope: QueryScope): number {
    const { sql, params } = scopeWhere(scope);
    const row = this.sqlite
      .prepare<Array<string | number>, { total: number }>(
        `SELECT COUNT(DISTINCT s.project_path) AS total
         FROM sessions s ${sql} AND s.project_path IS NOT NULL`,
      )
      .get(...params);

    return row?.total ?? 0;
  }

  getMessageCount(scope: QueryScope): number {
    const { sql, params } = scopeWhere(scope);
    const row = this.sqlite
      .prepare<Array<string | number>, { total: number }>(
        `SELECT COUNT(m.id) AS total
         FROM messages m JOIN sessions s ON s.id = m.session_id ${sql}`,
      )
      .get(...params);

    return row?.total ?? 0;
  }

  getToolCallCount(scope: QueryScope): number {
    const { sql, params } = scopeWhere(scope);
    const row = this.sqlite
      .prepare<Array<string | number>, { total: number }>(
        `SELECT COUNT(t.id) AS total
         FROM tool_calls t JOIN sessions s ON s.id = t.session_id ${sql}`,
      )
      .get(...params);

    return row?.total ?? 0;
  }

  getSessionSpans(scope: QueryScope): SessionSpan[] {
    const { sql, params } = scopeWhere(scope);

    return this.sqlite
      .prepare<Array<string | number>, { started_at: number; ended_at: number | null; total_tokens: number }>(
        `SELECT s.started_at, s.ended_at, s.total_tokens
         FROM sessions s ${sql}
         ORDER BY s.started_at ASC, s.id ASC`,
      )
      .all(...params)
      .map((row) => ({
        startedAt: row.started_at,
        endedAt: row.ended_at,
        totalTokens: row.total_tokens,
      }));
  }

  /** Every session in the window, newest first. */
  getSessionsInPeriod(scope: QueryScope): StoredSession[] {
    const { sql, params } = scopeWhere(scope);

    return this.sqlite
      .prepare<Array<string | number>, SessionRow>(
        `SELECT ${SESSION_COLUMNS} FROM sessions s ${sql} ORDER BY s.started_at DESC, s.id DESC`,
      )
      .all(...params)
      .map(mapSessionRow);
  }

  getRecentSessions(limit: number): StoredSession[] {
    return this.sqlite
      .prepare<[number], SessionRow>(
        `SELECT ${SESSION_COLUMNS} FROM sessions s ORDER BY s.started_at DESC, s.id DESC LIMIT ?`,
      )
      .all(limit)
      .map(mapSessionRow);
  }

  getSourceStats(since: number): SourceStats[] {
    return this.sqlite
      .prepare<[number], SourceStatsRow>(
        `SELECT s.source AS source, COUNT(*) AS session_count, ${TOKEN_SUMS},
          COALESCE(SUM(${DURATION_SQL}), 0) AS duration_seconds,
          COALESCE(SUM(mc.message_count), 0) AS message_count
         FROM sessions s
         LEFT JOIN (
           SELECT session_id, COUNT(*) AS message_count FROM messages GROUP BY session_id
         ) mc ON mc.session_id = s.id
         WHERE s.started_at >= ?
         GROUP BY s.source
         ORDER BY session_count DESC, s.source ASC`,
      )
      .all(since)
      .map((row) => ({
        ...mapAggregateRow(row),
        source: row.source,
        messageCount: row.message_count,
      }));
  }

  setLastSyncTime(source: SessionSource, timestamp: number): void {
    this.sqlite
      .prepare("INSERT OR REPLACE INTO metadata (key, value, updated_at) VALUES (?, ?, ?)")
      .run(lastSyncKey(source), String(timestamp), timestamp);
  }

  /** Epoch seconds of the last sync that processed anything; 0 when never synced. */
  getLastSyncTime(source: SessionSource): number {
    const row = this.sqlite
      .prepare<[string], { value: string }>("SELECT value FROM metadata WHERE key = ?")
      .get(lastSyncKey(source));
    if (!row) return 0;

    const parsed = Number.parseInt(row.value, 10);
    return Number.isFinite(parsed) ? parsed : 0;
  }

  close(): void {
    this.sqlite.close();
  }
}
