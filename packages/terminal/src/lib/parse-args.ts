import { cac } from "cac";
import { z } from "zod";
import { describeZodError } from "@tradewatch/kit";

const CliOptionsSchema = z.object({
  url: z.string().optional(),
  // mri turns numeric-looking values into numbers
  symbol: z.union([z.string(), z.number()]).transform(String).optional(),
  tradeCapacity: z.coerce.number().optional(),
  priceCapacity: z.coerce.number().optional(),
  refreshMs: z.coerce.number().optional(),
});

export type CliArgs = z.output<typeof CliOptionsSchema>;

export type ParsedArgs =
  | { kind: "run"; args: CliArgs }
  | { kind: "help" }
  | { kind: "invalid"; message: string };

/**
 * Parse command-line flags. cac prints the usage text itself on --help.
 */
export function parseArgs(argv: string[] = process.argv): ParsedArgs {
  const cli = cac("tradewatch");
  cli.option("--url <url>", "Feed WebSocket URL (ws:// or wss://)");
  cli.option("--symbol <symbol>", "Coin to track on start (e.g. DOGE)");
  cli.option("--trade-capacity <n>", "Trades kept in memory");
  cli.option("--price-capacity <n>", "Price updates kept in memory");
  cli.option("--refresh-ms <n>", "Redraw interval in milliseconds");
  cli.help();

  const { options } = cli.parse(argv);
  if (options.help) return { kind: "help" };

  const parsed = CliOptionsSchema.safeParse(options);
  if (!parsed.success) {
    return { kind: "invalid", message: describeZodError("Invalid arguments", parsed.error) };
  }
  return { kind: "run", args: parsed.data };
}
