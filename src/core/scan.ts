import { SESSION_SOURCES, type ParsedSession, type SessionSource, type SyncSummary } from "@shared/schema";
import type { AppContext } from "./context";
import { discoverSessionFiles, resolveSourceRoot } from "./discovery";
import { parseSessionFile } from "./parsers";
import { reconcile } from "./reconciler";

export interface SyncOptions {
  // Explicit file list; skips discovery.
  paths?: string[];
  signal?: AbortSignal;
}

const emptySummary = (source: SessionSource, files: number): SyncSummary => ({
  source,
  files,
  failedFiles: 0,
  inserted: 0,
  backfilled: 0,
  alreadyTracked: 0,
  errors: 0,
});

export const syncSource = async (
  ctx: AppContext,
  source: SessionSource,
  options: SyncOptions = {},
): Promise<SyncSummary> => {
  const paths =
    options.paths ?? (await discoverSessionFiles(resolveSourceRoot(source, ctx.config.paths)));
  const summary = emptySummary(source, paths.length);

  for (const path of paths) {
    options.signal?.throwIfAborted();

    let parsed: ParsedSession;
    try {
      parsed = await parseSessionFile(source, path);
    } catch (error) {
      summary.failedFiles += 1;
      console.error(`[sync] Failed ${source} ${path}`, error);
      continue;
    }

    const outcome = reconcile(ctx.db, parsed);
    switch (outcome.status) {
      case "inserted":
        summary.inserted += 1;
        break;
      case "backfilled":
        summary.backfilled += 1;
        break;
      case "already_tracked":
        summary.alreadyTracked += 1;
        break;
      case "error":
        summary.errors += 1;
        console.error(`[sync] Failed to store ${source} ${path}`, outcome.error);
        break;
    }
  }

  if (summary.inserted + summary.backfilled + summary.alreadyTracked > 0) {
    ctx.db.setLastSyncTime(source, Math.floor(ctx.now().getTime() / 1000));
  }

  return summary;
};

/** Sync every source enabled in the config, one after another. */
export const syncAll = async (
  ctx: AppContext,
  options: Pick<SyncOptions, "signal"> = {},
): Promise<SyncSummary[]> => {
  const summaries: SyncSummary[] = [];

  for (const source of SESSION_SOURCES) {
    if (!ctx.config.agents[source]) continue;
    summaries.push(await syncSource(ctx, source, options));
  }

  return summaries;
};

/** True when files were found but not one of them could be processed. */
export const isTotalFailure = (summaries: SyncSummary[]): boolean => {
  const files = summaries.reduce((total, summary) => total + summary.files, 0);
  const processed = summaries.reduce(
    (total, summary) => total + summary.inserted + summary.backfilled + summary.alreadyTracked,
    0,
  );
  return files > 0 && processed === 0;
};
