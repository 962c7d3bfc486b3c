import type { ParsedSession, ReconcileOutcome } from "@shared/schema";
import { isUniqueConstraintError, type DB } from "./db";

const toError = (error: unknown): Error => (error instanceof Error ? error : new Error(String(error)));

/**
 * Merge a freshly parsed session into the store.
 *
 * New sessions are inserted with their messages and tool calls. A stored session that
 * has no messages yet is backfilled when the new parse carries some; its scalar
 * columns are never touched. Everything else is already tracked.
 */
export const reconcile = (db: DB, parsed: ParsedSession): ReconcileOutcome => {
  try {
    return db.transaction((): ReconcileOutcome => {
      const existing = db.getSessionByExternalId(parsed.externalId);

      if (!existing) {
        const sessionId = db.insertSession(parsed);
        db.insertMessages(sessionId, parsed.messages);
        db.insertToolCalls(sessionId, parsed.toolCalls);
        return { status: "inserted", sessionId };
      }

      if (parsed.messages.length > 0 && existing.messageCount === 0) {
        db.insertMessages(existing.id, parsed.messages);
        return { status: "backfilled", sessionId: existing.id, messageCount: parsed.messages.length };
      }

      return { status: "already_tracked", sessionId: existing.id };
    });
  } catch (error) {
    // Another writer got there between the lookup and the insert.
    if (isUniqueConstraintError(error)) {
      return { status: "already_tracked", sessionId: null };
    }
    return { status: "error", error: toError(error) };
  }
};
