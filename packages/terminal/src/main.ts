#!/usr/bin/env node
/**
 * main.ts: tradewatch entry point
 * Usage: npm start -- [--url <url>] [--symbol <symbol>] [--trade-capacity <n>] ...
 */

import "dotenv/config";
import { isMainModule } from "@tradewatch/kit";
import { logger } from "@tradewatch/feed";
import { Dashboard } from "./dashboard.js";
import { loadConfig } from "./lib/load-config.js";
import { parseArgs } from "./lib/parse-args.js";
import { TerminalSession } from "./terminal-session.js";

const log = logger.createChild("main");

/** Resolves with the process exit code. */
export async function main(argv: string[] = process.argv): Promise<number> {
  const parsed = parseArgs(argv);
  if (parsed.kind === "help") return 0;
  if (parsed.kind === "invalid") {
    console.error(parsed.message);
    return 1;
  }

  const loaded = loadConfig(parsed.args);
  if (!loaded.success) {
    console.error(loaded.message);
    return 1;
  }
  const { config } = loaded;
  logger.setLogConfig(config.logLevels);

  const session = new TerminalSession(process.stdin, process.stdout);
  const dashboard = new Dashboard(config, session);

  const shutdown = (signal: NodeJS.Signals) => {
    log.info({ action: "signal", signal }, "Shutting down...");
    dashboard.quit();
  };
  process.once("SIGTERM", shutdown);
  process.once("SIGINT", shutdown);

  try {
    await dashboard.run();
  } finally {
    process.off("SIGTERM", shutdown);
    process.off("SIGINT", shutdown);
  }
  return 0;
}

if (isMainModule(import.meta.url)) {
  main().then(
    (code) => process.exit(code),
    (err: unknown) => {
      log.fatal({ err }, "Fatal error");
      console.error(err);
      process.exit(1);
    },
  );
}
