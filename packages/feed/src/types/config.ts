import { z } from "zod";

export const DEFAULT_FEED_URL = "wss://ws.rugplay.com/";

export const DashboardConfigSchema = z.object({
  feedUrl: z
    .string()
    .url()
    .refine((url) => /^wss?:\/\//i.test(url), "must use the ws:// or wss:// scheme")
    .default(DEFAULT_FEED_URL),
  tradeCapacity: z.number().int().positive().default(1000),
  priceCapacity: z.number().int().positive().default(100),
  handoffCapacity: z.number().int().positive().default(100),
  commandCapacity: z.number().int().positive().default(10),
  refreshMs: z.number().int().positive().default(100),
  initialSymbol: z
    .string()
    .trim()
    .min(1)
    .transform((s) => s.toUpperCase())
    .optional(),
  logLevels: z.record(z.string()).default({}),
});

export type DashboardConfigInput = z.input<typeof DashboardConfigSchema>;
export type DashboardConfig = z.infer<typeof DashboardConfigSchema>;
