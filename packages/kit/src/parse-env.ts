import type { z } from "zod";

/** Validate an environment map (process.env by default) against a zod schema. */
export function parseEnv<T extends z.ZodTypeAny>(
  schema: T,
  source: NodeJS.ProcessEnv = process.env,
): z.output<T> {
  return schema.parse(source);
}
