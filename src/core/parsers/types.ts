import type { ParsedSession, SessionSource } from "@shared/schema";

export interface SessionParser {
  source: SessionSource;
  parse(path: string): Promise<ParsedSession>;
}

/** Raised when a session log cannot be read at all; malformed lines never raise. */
export class SessionFileError extends Error {
  readonly path: string;

  constructor(path: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Failed to read session file ${path}: ${reason}`, { cause });
    this.name = "SessionFileError";
    this.path = path;
  }
}
