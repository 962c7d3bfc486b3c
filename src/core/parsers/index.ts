import type { ParsedSession, SessionSource } from "@shared/schema";
import { claudeParser } from "./claude";
import { codexParser } from "./codex";
import type { SessionParser } from "./types";

export const PARSERS: Record<SessionSource, SessionParser> = {
  codex: codexParser,
  claude: claudeParser,
};

export const parseSessionFile = (source: SessionSource, path: string): Promise<ParsedSession> =>
  PARSERS[source].parse(path);
