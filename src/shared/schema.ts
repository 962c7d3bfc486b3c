export type SessionSource = "codex" | "claude";

export const SESSION_SOURCES: SessionSource[] = ["codex", "claude"];

export const isSessionSource = (value: unknown): value is SessionSource =>
  typeof value === "string" && SESSION_SOURCES.some((source) => source === value);

export interface TokenUsage {
  input: number;
  output: number;
  cacheCreation: number;
  cacheRead: number;
  reasoning: number;
  total: number;
}

export const EMPTY_TOKEN_USAGE: TokenUsage = {
  input: 0,
  output: 0,
  cacheCreation: 0,
  cacheRead: 0,
  reasoning: 0,
  total: 0,
};

export interface ParsedMessage {
  role: string;
  content: string;
  timestamp: string | null;
}

export interface ParsedToolCall {
  toolName: string;
  argumentsJson: string;
  // Never correlated with a later result event; kept for the schema.
  result: string;
  timestamp: string | null;
}

/**
 * One log file folded into a session. Timestamps are ISO-8601 strings, `null` when
 * absent or unparsable.
 */
export interface ParsedSession {
  externalId: string;
  source: SessionSource;
  projectPath: string;
  model: string;
  provider: string;
  startedAt: string | null;
  endedAt: string | null;
  tokens: TokenUsage;
  cost: number;
  messages: ParsedMessage[];
  toolCalls: ParsedToolCall[];
}

/** Persisted session row. Times are epoch seconds; `startedAt` is 0 when unknown. */
export interface StoredSession {
  id: number;
  externalId: string;
  source: SessionSource;
  projectPath: string | null;
  model: string | null;
  provider: string | null;
  startedAt: number;
  endedAt: number | null;
  tokens: TokenUsage;
  cost: number;
  messageCount: number;
}

export interface StoredMessage {
  id: number;
  sessionId: number;
  role: string;
  content: string;
  timestamp: number;
}

export interface StoredToolCall {
  id: number;
  sessionId: number;
  toolName: string;
  argumentsJson: string;
  result: string;
  timestamp: number;
}

export type ReconcileOutcome =
  | { status: "inserted"; sessionId: number }
  | { status: "backfilled"; sessionId: number; messageCount: number }
  | { status: "already_tracked"; sessionId: number | null }
  | { status: "error"; error: Error };

export interface SyncSummary {
  source: SessionSource;
  files: number;
  failedFiles: number;
  inserted: number;
  backfilled: number;
  alreadyTracked: number;
  errors: number;
}

export type Period = "day" | "week" | "month";

export const PERIODS: Period[] = ["day", "week", "month"];

export const isPeriod = (value: unknown): value is Period =>
  typeof value === "string" && PERIODS.some((period) => period === value);

export interface AggregatedStats {
  sessionCount: number;
  tokens: TokenUsage;
  cost: number;
  // Seconds; sessions without a positive span contribute 0.
  durationSeconds: number;
}

export interface ModelUsage {
  model: string;
  sessionCount: number;
}

export interface BucketSummary {
  key: string;
  label: string;
  sessionCount: number;
  durationSeconds: number;
  totalTokens: number;
}

export interface SourceStats extends AggregatedStats {
  source: SessionSource;
  messageCount: number;
}

export interface UsageStats {
  source: SessionSource | "all";
  period: Period;
  since: number;
  lastSession: StoredSession | null;
  recentSessions: StoredSession[];
  topModels: ModelUsage[];
  totals: AggregatedStats;
  messageCount: number;
  toolCallCount: number;
  uniqueProjects: number;
  dailySummaries: BucketSummary[];
  weeklySummaries: BucketSummary[];
  bySource: SourceStats[];
  lastSyncTime: number;
}
