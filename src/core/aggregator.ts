import {
  SESSION_SOURCES,
  type BucketSummary,
  type Period,
  type SessionSource,
  type UsageStats,
} from "@shared/schema";
import type { AppContext } from "./context";
import type { QueryScope, SessionSpan } from "./db";

const DEFAULT_TIME_ZONE = "UTC";
const SECONDS_PER_DAY = 86_400;
const TOP_MODELS_LIMIT = 3;
const RECENT_SESSIONS_LIMIT = 5;

const PERIOD_DAYS: Record<Period, number> = {
  day: 1,
  week: 7,
  month: 30,
};

/** Start of the lookback window for `period`, in epoch seconds. */
export const periodSince = (period: Period, now: Date): number =>
  Math.floor(now.getTime() / 1000) - PERIOD_DAYS[period] * SECONDS_PER_DAY;

export const resolveAggregationTimeZone = (timeZone?: string): string => {
  const candidate = typeof timeZone === "string" ? timeZone.trim() : "";
  if (!candidate) return DEFAULT_TIME_ZONE;

  try {
    // Validate the zone before use. Falls back to UTC for invalid identifiers.
    void new Intl.DateTimeFormat("en-US", { timeZone: candidate });
    return candidate;
  } catch {
    return DEFAULT_TIME_ZONE;
  }
};

interface CalendarDate {
  year: number;
  month: number;
  day: number;
}

const createDateFormatter = (timeZone: string): Intl.DateTimeFormat =>
  new Intl.DateTimeFormat("en-US", {
    timeZone: resolveAggregationTimeZone(timeZone),
    year: "numeric",
    month: "2-digit",
    day: "2-digit",
  });

const toCalendarDate = (epochSeconds: number, formatter: Intl.DateTimeFormat): CalendarDate => {
  const date = new Date(epochSeconds * 1000);
  const parts = formatter.formatToParts(date);
  const year = Number(parts.find((part) => part.type === "year")?.value);
  const month = Number(parts.find((part) => part.type === "month")?.value);
  const day = Number(parts.find((part) => part.type === "day")?.value);

  if (!Number.isFinite(year) || !Number.isFinite(month) || !Number.isFinite(day)) {
    return { year: date.getUTCFullYear(), month: date.getUTCMonth() + 1, day: date.getUTCDate() };
  }

  return { year, month, day };
};

const pad = (value: number, width = 2): string => String(value).padStart(width, "0");

const formatDateKey = ({ year, month, day }: CalendarDate): string =>
  `${pad(year, 4)}-${pad(month)}-${pad(day)}`;

// ISO 8601: weeks start on Monday; week 1 holds the year's first Thursday.
const isoWeekOf = ({ year, month, day }: CalendarDate): { key: string; monday: CalendarDate } => {
  const date = new Date(Date.UTC(year, month - 1, day));
  const weekday = date.getUTCDay() || 7;

  const monday = new Date(date);
  monday.setUTCDate(date.getUTCDate() - weekday + 1);

  const thursday = new Date(date);
  thursday.setUTCDate(date.getUTCDate() + 4 - weekday);
  const weekYear = thursday.getUTCFullYear();
  const yearStart = Date.UTC(weekYear, 0, 1);
  const week = Math.ceil(((thursday.getTime() - yearStart) / 1000 / SECONDS_PER_DAY + 1) / 7);

  return {
    key: `${weekYear}-W${pad(week)}`,
    monday: {
      year: monday.getUTCFullYear(),
      month: monday.getUTCMonth() + 1,
      day: monday.getUTCDate(),
    },
  };
};

const spanDuration = (span: Pick<SessionSpan, "startedAt" | "endedAt">): number =>
  span.endedAt !== null && span.endedAt > span.startedAt ? span.endedAt - span.startedAt : 0;

const bucketSpans = (
  spans: SessionSpan[],
  toBucket: (date: CalendarDate) => { key: string; label: string },
  timeZone: string,
): BucketSummary[] => {
  const formatter = createDateFormatter(timeZone);
  const buckets = new Map<string, BucketSummary>();

  for (const span of spans) {
    const { key, label } = toBucket(toCalendarDate(span.startedAt, formatter));
    const bucket = buckets.get(key) ?? { key, label, sessionCount: 0, durationSeconds: 0, totalTokens: 0 };

    bucket.sessionCount += 1;
    bucket.durationSeconds += spanDuration(span);
    bucket.totalTokens += span.totalTokens;
    buckets.set(key, bucket);
  }

  // Newest bucket first.
  return [...buckets.values()].sort((a, b) => b.key.localeCompare(a.key));
};

export const buildDailySummaries = (spans: SessionSpan[], timeZone = DEFAULT_TIME_ZONE): BucketSummary[] =>
  bucketSpans(
    spans,
    (date) => {
      const key = formatDateKey(date);
      return { key, label: key };
    },
    timeZone,
  );

/** Buckets keyed `YYYY-Www`, labelled with the Monday that opens the week. */
export const buildWeeklySummaries = (spans: SessionSpan[], timeZone = DEFAULT_TIME_ZONE): BucketSummary[] =>
  bucketSpans(
    spans,
    (date) => {
      const { key, monday } = isoWeekOf(date);
      return { key, label: formatDateKey(monday) };
    },
    timeZone,
  );

export interface UsageStatsOptions {
  // Omitted means every source.
  source?: SessionSource;
  signal?: AbortSignal;
}

export const getUsageStats = (
  ctx: AppContext,
  period: Period,
  options: UsageStatsOptions = {},
): UsageStats => {
  const { db, config } = ctx;
  const { source, signal } = options;
  const since = periodSince(period, ctx.now());
  const scope: QueryScope = source ? { since, source } : { since };

  const step = <T>(run: () => T): T => {
    signal?.throwIfAborted();
    return run();
  };

  const lastSession = step(() => db.getLastSession(scope));
  const totals = step(() => db.getAggregatedStats(scope));
  const topModels = step(() => db.getTopModels(scope, TOP_MODELS_LIMIT));
  const uniqueProjects = step(() => db.getUniqueProjects(scope));
  const messageCount = step(() => db.getMessageCount(scope));
  const toolCallCount = step(() => db.getToolCallCount(scope));

  const spans = period === "day" ? [] : step(() => db.getSessionSpans(scope));
  const dailySummaries = period === "week" ? buildDailySummaries(spans, config.timeZone) : [];
  const weeklySummaries = period === "month" ? buildWeeklySummaries(spans, config.timeZone) : [];

  const recentSessions = source ? [] : step(() => db.getRecentSessions(RECENT_SESSIONS_LIMIT));
  const bySource = source ? [] : step(() => db.getSourceStats(since));

  const lastSyncTime = step(() =>
    source
      ? db.getLastSyncTime(source)
      : Math.max(0, ...SESSION_SOURCES.map((candidate) => db.getLastSyncTime(candidate))),
  );

  return {
    source: source ?? "all",
    period,
    since,
    lastSession,
    recentSessions,
    topModels,
    totals,
    messageCount,
    toolCallCount,
    uniqueProjects,
    dailySummaries,
    weeklySummaries,
    bySource,
    lastSyncTime,
  };
};
