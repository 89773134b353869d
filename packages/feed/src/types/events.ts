import { z } from "zod";

// ── Wire payloads ─────────────────────────────

export const TradeDataSchema = z.object({
  /** Trade direction as sent by the feed, e.g. "BUY" or "SELL". */
  type: z.string(),
  username: z.string(),
  userImage: z.string(),
  amount: z.number(),
  coinSymbol: z.string(),
  coinName: z.string(),
  coinIcon: z.string(),
  totalValue: z.number(),
  price: z.number(),
  timestamp: z.number().int(),
  userId: z.string(),
});

export const TradeFrameSchema = z.object({
  type: z.string(),
  data: TradeDataSchema,
});

export const PriceUpdateFrameSchema = z.object({
  type: z.literal("price_update"),
  coinSymbol: z.string(),
  currentPrice: z.number(),
  marketCap: z.number(),
  change24h: z.number(),
  volume24h: z.number(),
  poolCoinAmount: z.number(),
  poolBaseCurrencyAmount: z.number(),
});

export type TradeData = z.infer<typeof TradeDataSchema>;
export type TradeFrame = z.infer<typeof TradeFrameSchema>;
export type PriceUpdateFrame = z.infer<typeof PriceUpdateFrameSchema>;

// ── Buffered events ───────────────────────────

/** Trade channel discriminators. Any other frame type that carries trade data is kept as-is. */
export const ALL_TRADES_KIND = "all-trades";
export const LARGE_TRADES_KIND = "live-trade";

export interface TradeEvent {
  readonly kind: string;
  readonly data: Readonly<TradeData>;
  /** Local wall-clock time the frame was received. */
  readonly receivedAt: Date;
}

export interface PriceUpdateEvent {
  readonly coinSymbol: string;
  readonly currentPrice: number;
  readonly marketCap: number;
  readonly change24h: number;
  readonly volume24h: number;
  readonly poolCoinAmount: number;
  readonly poolBaseCurrencyAmount: number;
  readonly receivedAt: Date;
}

export function toTradeEvent(frame: TradeFrame, receivedAt: Date): TradeEvent {
  return Object.freeze({
    kind: frame.type,
    data: Object.freeze({ ...frame.data }),
    receivedAt,
  });
}

export function toPriceUpdateEvent(frame: PriceUpdateFrame, receivedAt: Date): PriceUpdateEvent {
  return Object.freeze({
    coinSymbol: frame.coinSymbol,
    currentPrice: frame.currentPrice,
    marketCap: frame.marketCap,
    change24h: frame.change24h,
    volume24h: frame.volume24h,
    poolCoinAmount: frame.poolCoinAmount,
    poolBaseCurrencyAmount: frame.poolBaseCurrencyAmount,
    receivedAt,
  });
}

// ── View enums ────────────────────────────────

export type Page = "trades" | "priceTracker";
export type TradeFilter = "all" | "large";
export type InputMode = "normal" | "coinFilter" | "traderFilter" | "coinSelection";
