import { SESSION_SOURCES, isPeriod, isSessionSource, type Period, type SessionSource } from "@shared/schema";
import type { AppConfig } from "@shared/types";
import { getUsageStats } from "./core/aggregator";
import { loadConfig } from "./core/config";
import { withContext, type AppContext } from "./core/context";
import { resolveSourceRoot } from "./core/discovery";
import { isTotalFailure, syncAll, syncSource } from "./core/scan";

export type CliCommand =
  | { kind: "help" }
  | { kind: "sync" }
  | { kind: "usage"; source: SessionSource; period: Period; debug: boolean }
  | { kind: "stats"; period: Period }
  | { kind: "info" };

export interface CliArgs {
  configPath?: string;
  command: CliCommand;
}

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CliUsageError";
  }
}

export const HELP_TEXT = `Usage: agent-usage [--config <path>] <command>

Commands:
  sync                               Import new Codex and Claude sessions
  usage <codex|claude> [day|week|month]  Usage for one agent (default: day)
    --debug, -d                      Also list every session in the window
  stats [day|week|month]             Usage across all agents (default: day)
  info                               Show config, store and last sync times

Options:
  --config <path>   JSON config file (default: ~/.agent-usage/config.json)
  --help, -h        Show this help`;

const parsePeriod = (value: string | undefined): Period => {
  if (value === undefined) return "day";
  if (!isPeriod(value)) {
    throw new CliUsageError(`Invalid period "${value}". Expected day, week or month.`);
  }
  return value;
};

export const parseCliArgs = (argv: string[]): CliArgs => {
  const positional: string[] = [];
  let configPath: string | undefined;
  let debug = false;

  for (let index = 0; index < argv.length; index += 1) {
    const arg = argv[index];
    if (arg === "--help" || arg === "-h") return { command: { kind: "help" } };

    if (arg === "--config") {
      configPath = argv[index + 1];
      if (!configPath) throw new CliUsageError("--config needs a path.");
      index += 1;
      continue;
    }

    if (arg?.startsWith("--config=")) {
      configPath = arg.slice("--config=".length);
      continue;
    }

    if (arg === "--debug" || arg === "-d") {
      debug = true;
      continue;
    }

    if (arg?.startsWith("-")) throw new CliUsageError(`Unknown option ${arg}.`);
    if (arg !== undefined) positional.push(arg);
  }

  const [name, ...rest] = positional;
  const withConfig = (command: CliCommand): CliArgs => (configPath ? { configPath, command } : { command });

  if (debug && name !== "usage") throw new CliUsageError("--debug only applies to usage.");

  switch (name) {
    case undefined:
    case "help":
      return withConfig({ kind: "help" });
    case "sync":
      return withConfig({ kind: "sync" });
    case "info":
      return withConfig({ kind: "info" });
    case "stats":
      return withConfig({ kind: "stats", period: parsePeriod(rest[0]) });
    case "usage": {
      const source = rest[0];
      if (!isSessionSource(source)) {
        throw new CliUsageError(`Unknown agent "${source ?? ""}". Expected codex or claude.`);
      }
      return withConfig({ kind: "usage", source, period: parsePeriod(rest[1]), debug });
    }
    default:
      throw new CliUsageError(`Unknown command "${name}".`);
  }
};

const printJson = (value: unknown): void => {
  console.log(JSON.stringify(value, null, 2));
};

type StoreCommand = Exclude<CliCommand, { kind: "help" }>;

const runCommand = async (ctx: AppContext, command: StoreCommand, signal: AbortSignal): Promise<number> => {
  switch (command.kind) {
    case "sync": {
      const summaries = await syncAll(ctx, { signal });
      printJson(summaries);
      return isTotalFailure(summaries) ? 1 : 0;
    }

    case "usage": {
      if (!ctx.config.agents[command.source]) {
        console.error(`[cli] ${command.source} is disabled in the config`);
        return 1;
      }
      if (ctx.config.autoSync) {
        await syncSource(ctx, command.source, { signal });
      }
      const stats = getUsageStats(ctx, command.period, { source: command.source, signal });
      if (!command.debug) {
        printJson(stats);
        return 0;
      }

      printJson({
        ...stats,
        debug: {
          since: stats.since,
          now: Math.floor(ctx.now().getTime() / 1000),
          sessions: ctx.db.getSessionsInPeriod({ since: stats.since, source: command.source }),
        },
      });
      return 0;
    }

    case "stats":
      if (ctx.config.autoSync) {
        await syncAll(ctx, { signal });
      }
      printJson(getUsageStats(ctx, command.period, { signal }));
      return 0;

    case "info":
      printJson({
        databasePath: ctx.db.dbPath,
        timeZone: ctx.config.timeZone,
        sources: SESSION_SOURCES.map((source) => ({
          source,
          enabled: ctx.config.agents[source],
          root: resolveSourceRoot(source, ctx.config.paths),
          sessions: ctx.db.countSessions(source),
          lastSyncTime: ctx.db.getLastSyncTime(source),
        })),
      });
      return 0;
  }
};

/** Run one invocation and resolve to the process exit code. */
export const runCli = async (argv: string[], signal: AbortSignal = new AbortController().signal): Promise<number> => {
  let args: CliArgs;
  try {
    args = parseCliArgs(argv);
  } catch (error) {
    if (error instanceof CliUsageError) {
      console.error(`${error.message}\n\n${HELP_TEXT}`);
      return 1;
    }
    throw error;
  }

  if (args.command.kind === "help") {
    console.log(HELP_TEXT);
    return 0;
  }

  const config: AppConfig = await loadConfig(args.configPath ? { path: args.configPath } : {});
  const { command } = args;
  return withContext(config, (ctx) => runCommand(ctx, command, signal));
};
