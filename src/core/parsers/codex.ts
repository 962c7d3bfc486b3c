import { readFile } from "node:fs/promises";
import type { ParsedMessage, ParsedSession, ParsedToolCall, TokenUsage } from "@shared/schema";
import { asRecord, emptyTokenUsage, getString, normalizeTimestamp, parseJsonl, toTokenCount } from "../normalizer";
import { computeCost, estimateTokensFromMessages } from "../pricing";
import { SessionFileError, type SessionParser } from "./types";

const MESSAGE_TEXT_TYPES = new Set(["output_text", "input_text"]);

const extractCodexMessageText = (content: unknown): string => {
  if (!Array.isArray(content)) return "";

  let text = "";
  for (const entry of content) {
    const item = asRecord(entry);
    if (!item) continue;

    const itemType = getString(item.type);
    if (itemType && MESSAGE_TEXT_TYPES.has(itemType) && typeof item.text === "string") {
      text += item.text;
    }
  }

  return text;
};

// token_count events carry running totals; each field present overwrites the previous value.
const applyTotalTokenUsage = (tokens: TokenUsage, payload: Record<string, unknown> | null): void => {
  const info = asRecord(payload?.info);
  const usage = asRecord(info?.total_token_usage);
  if (!usage) return;

  tokens.input = toTokenCount(usage.input_tokens) ?? tokens.input;
  tokens.cacheRead = toTokenCount(usage.cached_input_tokens) ?? tokens.cacheRead;
  tokens.output = toTokenCount(usage.output_tokens) ?? tokens.output;
  tokens.reasoning = toTokenCount(usage.reasoning_output_tokens) ?? tokens.reasoning;
  tokens.total = toTokenCount(usage.total_tokens) ?? tokens.total;
};

const serializeToolInput = (input: unknown): string => {
  if (input === undefined) return "null";
  return JSON.stringify(input) ?? "null";
};

export const assembleCodexSession = (content: string): ParsedSession => {
  let externalId: string | null = null;
  let projectPath = "";
  let model = "";
  let provider = "";
  let metaStartedAt: string | null = null;
  let firstTimestamp: string | null = null;
  let lastTimestamp: string | null = null;
  let tokens = emptyTokenUsage();

  const messages: ParsedMessage[] = [];
  const toolCalls: ParsedToolCall[] = [];

  for (const record of parseJsonl(content)) {
    const type = getString(record.type);
    const payload = asRecord(record.payload);
    const timestamp = normalizeTimestamp(record.timestamp);

    firstTimestamp = firstTimestamp ?? timestamp;
    lastTimestamp = timestamp;

    if (type === "session_meta") {
      externalId = externalId ?? getString(payload?.id);
      projectPath = getString(payload?.cwd) ?? projectPath;
      provider = getString(payload?.model_provider) ?? provider;
      model = getString(payload?.originator) ?? model;
      metaStartedAt = normalizeTimestamp(payload?.timestamp) ?? metaStartedAt;
      continue;
    }

    if (type === "turn_context") {
      model = getString(payload?.model) ?? model;
      continue;
    }

    if (type === "response_item") {
      if (getString(payload?.type) !== "message") continue;

      const text = extractCodexMessageText(payload?.content);
      if (text.length === 0) continue;

      messages.push({
        role: typeof payload?.role === "string" ? payload.role : "",
        content: text,
        timestamp,
      });
      continue;
    }

    if (type === "event_msg") {
      const eventType = getString(payload?.type);

      if (eventType === "tool_use") {
        toolCalls.push({
          toolName: typeof payload?.name === "string" ? payload.name : "",
          argumentsJson: serializeToolInput(payload?.input),
          result: "",
          timestamp,
        });
        continue;
      }

      if (eventType === "token_count") {
        applyTotalTokenUsage(tokens, payload);
      }
    }
  }

  if (tokens.total === 0) {
    tokens = estimateTokensFromMessages(messages);
  }

  return {
    externalId: externalId ?? "",
    source: "codex",
    projectPath,
    model,
    provider,
    startedAt: firstTimestamp ?? metaStartedAt,
    endedAt: lastTimestamp,
    tokens,
    cost: computeCost("codex", tokens),
    messages,
    toolCalls,
  };
};

export const codexParser: SessionParser = {
  source: "codex",
  async parse(path: string): Promise<ParsedSession> {
    let content: string;
    try {
      content = await readFile(path, "utf8");
    } catch (error) {
      throw new SessionFileError(path, error);
    }

    return assembleCodexSession(content);
  },
};
