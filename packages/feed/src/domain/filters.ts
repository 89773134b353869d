import { ALL_TRADES_KIND, LARGE_TRADES_KIND } from "../types/events.js";
import type { TradeEvent, TradeFilter } from "../types/events.js";

export interface TradeCriteria {
  tradeFilter: TradeFilter;
  coinFilter: string;
  traderFilter: string;
}

const KIND_BY_FILTER: Record<TradeFilter, string> = {
  all: ALL_TRADES_KIND,
  large: LARGE_TRADES_KIND,
};

export function kindForFilter(filter: TradeFilter): string {
  return KIND_BY_FILTER[filter];
}

/** Case-insensitive substring test; an empty needle matches everything. */
export function containsIgnoreCase(haystack: string, needle: string): boolean {
  if (needle.length === 0) return true;
  return haystack.toLowerCase().includes(needle.toLowerCase());
}

export function matchesTrade(trade: TradeEvent, criteria: TradeCriteria): boolean {
  return (
    trade.kind === kindForFilter(criteria.tradeFilter) &&
    containsIgnoreCase(trade.data.coinSymbol, criteria.coinFilter) &&
    containsIgnoreCase(trade.data.username, criteria.traderFilter)
  );
}

/** Highest valid scroll offset for a list of itemCount rows. */
export function maxScrollOffset(itemCount: number): number {
  return Math.max(0, itemCount - 1);
}

export function clampScroll(offset: number, itemCount: number): number {
  return Math.min(Math.max(0, offset), maxScrollOffset(itemCount));
}

/** Trim and uppercase a symbol typed by the user; null when nothing is left. */
export function normalizeSymbol(input: string): string | null {
  const trimmed = input.trim();
  return trimmed.length > 0 ? trimmed.toUpperCase() : null;
}
