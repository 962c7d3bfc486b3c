import type { SessionSource } from "./schema";

export interface AppConfig {
  databasePath: string;
  agents: Record<SessionSource, boolean>;
  // Overrides for the session log roots; discovery defaults apply when absent.
  paths: Partial<Record<SessionSource, string>>;
  // IANA zone for daily and weekly buckets.
  timeZone: string;
  // Sync before answering usage queries.
  autoSync: boolean;
}
