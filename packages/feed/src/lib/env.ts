import { z } from "zod";
import { parseEnv } from "@tradewatch/kit";

const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;

export const LogLevelSchema = z.enum(LOG_LEVELS);
export type LogLevel = z.infer<typeof LogLevelSchema>;

function isLogLevel(value: string): boolean {
  return LogLevelSchema.safeParse(value).success;
}

export const EnvSchema = z.object({
  FEED_URL: z.string().min(1).optional(),
  LOG_LEVEL: LogLevelSchema.default("info"),
  LOG_DIR: z.string().min(1).optional(),
  /** Per-module overrides, e.g. "feedConnector=debug,pipeline=warn". */
  LOG_MODULE_LEVELS: z
    .string()
    .optional()
    .transform((raw, ctx) => {
      const levels: Record<string, string> = {};
      if (!raw) return levels;
      for (const entry of raw.split(",")) {
        const [module, level, ...rest] = entry.split("=").map((part) => part.trim());
        if (!module || !level || rest.length > 0 || !isLogLevel(level)) {
          ctx.addIssue({ code: z.ZodIssueCode.custom, message: `invalid entry ${entry.trim()}` });
          return z.NEVER;
        }
        levels[module] = level;
      }
      return levels;
    }),
});

export type Env = z.output<typeof EnvSchema>;

/** Read the dashboard's environment. Callers load `.env` (dotenv/config) before importing this. */
export function readEnv(source: NodeJS.ProcessEnv = process.env): Env {
  return parseEnv(EnvSchema, source);
}
