#!/usr/bin/env tsx

import { runCli } from "../src/cli";

const controller = new AbortController();
process.once("SIGINT", () => controller.abort());

runCli(process.argv.slice(2), controller.signal)
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    console.error(`[cli] ${err instanceof Error ? err.message : String(err)}`);
    process.exitCode = 1;
  });
