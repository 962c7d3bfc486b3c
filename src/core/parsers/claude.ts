import { readFile } from "node:fs/promises";
import type { ParsedMessage, ParsedSession } from "@shared/schema";
import { asRecord, emptyTokenUsage, getString, normalizeTimestamp, parseJsonl, toTokenCount } from "../normalizer";
import { computeCost } from "../pricing";
import { SessionFileError, type SessionParser } from "./types";

const DEFAULT_PROVIDER = "anthropic";

const stringField = (record: Record<string, unknown>, key: string): string => {
  const value = record[key];
  return typeof value === "string" ? value : "";
};

const extractBlockText = (block: Record<string, unknown>): string[] => {
  const type = stringField(block, "type");

  switch (type) {
    case "text": {
      const text = stringField(block, "text");
      return text ? [text] : [];
    }
    case "thinking": {
      const thinking = stringField(block, "thinking");
      return thinking ? [thinking] : [];
    }
    case "tool_use": {
      const name = stringField(block, "name");
      return [name ? `[tool_use:${name}]` : "[tool_use]"];
    }
    case "tool_result": {
      const content = stringField(block, "content");
      return [content || "[tool_result]"];
    }
    default: {
      const parts: string[] = [];
      const text = stringField(block, "text");
      const content = stringField(block, "content");
      if (text) parts.push(text);
      if (content) parts.push(content);
      return parts;
    }
  }
};

/**
 * Content arrives as a plain string, an array of typed blocks, or an object with a
 * `text`/`content` string. Anything else has no content.
 */
export const extractClaudeMessageText = (content: unknown): string => {
  if (typeof content === "string") return content;

  if (Array.isArray(content)) {
    const parts: string[] = [];
    for (const entry of content) {
      const block = asRecord(entry);
      if (block) parts.push(...extractBlockText(block));
    }
    return parts.join("\n");
  }

  const record = asRecord(content);
  if (record) {
    if (typeof record.text === "string") return record.text;
    if (typeof record.content === "string") return record.content;
  }

  return "";
};

export const assembleClaudeSession = (content: string): ParsedSession => {
  let externalId = "";
  let projectPath = "";
  let model = "";
  let firstTimestamp: string | null = null;
  let lastTimestamp: string | null = null;
  const tokens = emptyTokenUsage();
  const messages: ParsedMessage[] = [];

  for (const record of parseJsonl(content)) {
    const timestamp = normalizeTimestamp(record.timestamp);
    firstTimestamp = firstTimestamp ?? timestamp;
    if (timestamp) lastTimestamp = timestamp;

    // Identity is first-wins: later records never overwrite it.
    if (!externalId) {
      externalId = getString(record.sessionId) ?? getString(record.session_id) ?? "";
    }
    if (!projectPath) {
      projectPath = getString(record.cwd) ?? getString(record.project_path) ?? "";
    }
    if (!model) {
      model = getString(record.model) ?? "";
    }

    const message = asRecord(record.message);
    let text = "";
    let role = "";

    if (message) {
      text = extractClaudeMessageText(message.content);
      role = stringField(message, "role");
      model = getString(message.model) ?? model;

      // Usage is reported per turn, so it accumulates.
      const usage = asRecord(message.usage);
      if (usage) {
        tokens.input += toTokenCount(usage.input_tokens) ?? 0;
        tokens.output += toTokenCount(usage.output_tokens) ?? 0;
        tokens.cacheCreation += toTokenCount(usage.cache_creation_input_tokens) ?? 0;
        tokens.cacheRead += toTokenCount(usage.cache_read_input_tokens) ?? 0;
      }
    } else {
      text = extractClaudeMessageText(record.content);
      role = stringField(record, "role");
    }

    switch (stringField(record, "type")) {
      case "user": {
        const input = stringField(record, "input");
        if (input) {
          messages.push({ role: "user", content: input, timestamp });
        } else if (text) {
          messages.push({ role: role || "user", content: text, timestamp });
        }
        break;
      }
      case "assistant":
        if (text) {
          messages.push({ role: role || "assistant", content: text, timestamp });
        }
        break;
      case "system":
        break;
      default:
        if (text && role) {
          messages.push({ role, content: text, timestamp });
        }
    }
  }

  tokens.total = tokens.input + tokens.output + tokens.cacheCreation + tokens.cacheRead;

  return {
    externalId,
    source: "claude",
    projectPath,
    model,
    provider: DEFAULT_PROVIDER,
    startedAt: firstTimestamp,
    endedAt: lastTimestamp,
    tokens,
    cost: computeCost("claude", tokens),
    messages,
    toolCalls: [],
  };
};

export const claudeParser: SessionParser = {
  source: "claude",
  async parse(path: string): Promise<ParsedSession> {
    let content: string;
    try {
      content = await readFile(path, "utf8");
    } catch (error) {
      throw new SessionFileError(path, error);
    }

    return assembleClaudeSession(content);
  },
};
