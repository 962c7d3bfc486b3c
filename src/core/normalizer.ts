import { EMPTY_TOKEN_USAGE, type TokenUsage } from "@shared/schema";

// RFC 3339 with optional fractional seconds (any precision) and a Z or numeric offset.
const RFC3339_PATTERN =
  /^(\d{4}-\d{2}-\d{2}[Tt ]\d{2}:\d{2}:\d{2})(?:\.(\d+))?([Zz]|[+-]\d{2}:\d{2})$/;

export const asRecord = (value: unknown): Record<string, unknown> | null => {
  if (!value || typeof value !== "object" || Array.isArray(value)) return null;
  return value as Record<string, unknown>;
};

export const getString = (value: unknown): string | null => {
  return typeof value === "string" && value.trim().length > 0 ? value : null;
};

const toFiniteNumber = (value: unknown): number | null => {
  if (typeof value === "number" && Number.isFinite(value)) return value;
  return null;
};

/** Integer token count from a JSON value; anything non-numeric is `null`. */
export const toTokenCount = (value: unknown): number | null => {
  const parsed = toFiniteNumber(value);
  if (parsed === null) return null;
  return Math.max(0, Math.trunc(parsed));
};

export const parseJsonl = (content: string): Array<Record<string, unknown>> => {
  const records: Array<Record<string, unknown>> = [];

  for (const line of content.split(/\r?\n/)) {
    const trimmed = line.trim();
    if (!trimmed) continue;

    try {
      const parsed = JSON.parse(trimmed) as unknown;
      const record = asRecord(parsed);
      if (record) records.push(record);
    } catch {
      // Skip malformed lines and keep parsing remaining JSONL records.
    }
  }

  return records;
};

export const normalizeTimestamp = (input: unknown): string | null => {
  if (typeof input !== "string") return null;

  const match = RFC3339_PATTERN.exec(input.trim());
  if (!match) return null;

  const [, base = "", fraction, zone = "Z"] = match;
  // Date.parse only keeps milliseconds; nanosecond fractions are truncated first.
  const millis = fraction ? `.${fraction.slice(0, 3).padEnd(3, "0")}` : "";
  const time = Date.parse(`${base.replace(/[t ]/, "T")}${millis}${zone.toUpperCase()}`);
  if (Number.isNaN(time)) return null;

  return new Date(time).toISOString();
};

export const toEpochSeconds = (timestamp: string | null): number | null => {
  if (!timestamp) return null;
  const time = Date.parse(timestamp);
  if (Number.isNaN(time)) return null;
  return Math.floor(time / 1000);
};

export const emptyTokenUsage = (): TokenUsage => ({ ...EMPTY_TOKEN_USAGE });
