import type { AppConfig } from "@shared/types";
import { DB } from "./db";

/** Everything one command invocation needs. Built once and passed down explicitly. */
export interface AppContext {
  config: AppConfig;
  db: DB;
  now: () => Date;
}

export interface ContextOptions {
  now?: () => Date;
}

export const createContext = (config: AppConfig, options: ContextOptions = {}): AppContext => ({
  config,
  db: new DB(config.databasePath),
  now: options.now ?? (() => new Date()),
});

export const withContext = async <T>(
  config: AppConfig,
  run: (ctx: AppContext) => Promise<T> | T,
  options: ContextOptions = {},
): Promise<T> => {
  const ctx = createContext(config, options);
  try {
    return await run(ctx);
  } finally {
    ctx.db.close();
  }
};
