import type { z } from "zod";

export function formatZodErrors(error: z.ZodError): string[] {
  return error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`);
}

/** One-line summary of a zod error, prefixed with what was being validated. */
export function describeZodError(label: string, error: z.ZodError): string {
  return `${label}: ${formatZodErrors(error).join("; ")}`;
}
