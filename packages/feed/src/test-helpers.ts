import { toPriceUpdateEvent, toTradeEvent } from "./types/events.js";
import type { PriceUpdateEvent, TradeData, TradeEvent } from "./types/events.js";

export const RECEIVED_AT = new Date("2026-03-01T12:00:00Z");

export function tradeData(overrides: Partial<TradeData> = {}): TradeData {
  return {
    type: "BUY",
    username: "alice",
    userImage: "avatars/alice.png",
    amount: 12.5,
    coinSymbol: "ABC",
    coinName: "Alpha Beta Coin",
    coinIcon: "icons/abc.png",
    totalValue: 250,
    price: 20,
    timestamp: 1772366400000,
    userId: "user-1",
    ...overrides,
  };
}

export function makeTrade(
  kind: string,
  overrides: Partial<TradeData> = {},
  receivedAt: Date = RECEIVED_AT,
): TradeEvent {
  return toTradeEvent({ type: kind, data: tradeData(overrides) }, receivedAt);
}

export function makePrice(
  coinSymbol: string,
  currentPrice = 1,
  receivedAt: Date = RECEIVED_AT,
): PriceUpdateEvent {
  return toPriceUpdateEvent(
    {
      type: "price_update",
      coinSymbol,
      currentPrice,
      marketCap: 1_000_000,
      change24h: 2.5,
      volume24h: 50_000,
      poolCoinAmount: 400,
      poolBaseCurrencyAmount: 800,
    },
    receivedAt,
  );
}
