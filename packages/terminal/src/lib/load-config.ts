import { ZodError } from "zod";
import { describeZodError } from "@tradewatch/kit";
import { DashboardConfigSchema, readEnv, type DashboardConfig, type Env } from "@tradewatch/feed";
import type { CliArgs } from "./parse-args.js";

export type LoadConfigResult =
  | { success: true; config: DashboardConfig }
  | { success: false; message: string };

/**
 * Merge CLI flags over environment over defaults and validate the result.
 */
export function loadConfig(args: CliArgs, env: NodeJS.ProcessEnv = process.env): LoadConfigResult {
  let parsedEnv: Env;
  try {
    parsedEnv = readEnv(env);
  } catch (err) {
    if (err instanceof ZodError) {
      return { success: false, message: describeZodError("Invalid environment", err) };
    }
    throw err;
  }

  const result = DashboardConfigSchema.safeParse({
    feedUrl: args.url ?? parsedEnv.FEED_URL,
    tradeCapacity: args.tradeCapacity,
    priceCapacity: args.priceCapacity,
    refreshMs: args.refreshMs,
    initialSymbol: args.symbol,
    logLevels: parsedEnv.LOG_MODULE_LEVELS,
  });
  if (!result.success) {
    return { success: false, message: describeZodError("Invalid configuration", result.error) };
  }
  return { success: true, config: result.data };
}
