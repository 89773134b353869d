import pino from "pino";
import { join, dirname } from "node:path";
import { fileURLToPath } from "node:url";
import { LogLevelSchema, type LogLevel } from "./env.js";

/** Per-module log level overrides, set at runtime via logger.setLogConfig() */
let logLevelOverrides: Record<string, string> = {};

/** Unknown LOG_LEVEL values fall back to "info"; config loading reports them. */
export function resolveBaseLevel(raw: string | undefined): LogLevel {
  return LogLevelSchema.catch("info").parse(raw);
}

/**
 * Build the base pino instance. Without a destination, logs go only to the
 * rolled file because stdout belongs to the dashboard.
 */
export function createPinoLogger(
  env: NodeJS.ProcessEnv = process.env,
  destination?: pino.DestinationStream,
): pino.Logger {
  if (env.VITEST) {
    return pino({ level: "silent" });
  }

  const level = resolveBaseLevel(env.LOG_LEVEL);
  if (destination) {
    return pino({ level }, destination);
  }

  const __dirname = dirname(fileURLToPath(import.meta.url));
  const LOG_DIR = env.LOG_DIR || join(__dirname, "../../../../logs");

  return pino(
    { level },
    pino.transport({
      target: "pino-roll",
      options: {
        file: join(LOG_DIR, "tradewatch"),
        frequency: "daily",
        dateFormat: "yyyy-MM-dd",
        extension: ".ndjson",
        mkdir: true,
      },
    }),
  );
}

const pinoInstance = createPinoLogger();

const children = new Map<string, pino.Logger[]>();

function applyLevel(module: string, child: pino.Logger): void {
  const level = logLevelOverrides[module];
  child.level = level ?? pinoInstance.level;
}

/** Unified logger export with base pino instance, config setter, and child factory. */
export const logger = Object.assign(pinoInstance, {
  /** Set per-module log level overrides. Children created earlier pick them up too. */
  setLogConfig(overrides: Record<string, string>): void {
    logLevelOverrides = overrides;
    for (const [module, list] of children) {
      for (const child of list) applyLevel(module, child);
    }
  },

  /** Create a child logger with per-module log level from config */
  createChild(module: string): pino.Logger {
    const child = pinoInstance.child({ module });
    applyLevel(module, child);
    const list = children.get(module) ?? [];
    list.push(child);
    children.set(module, list);
    return child;
  },
});
