import { LARGE_TRADES_KIND } from "@tradewatch/feed";
import type { FeedFailurePhase, FeedStatus, PriceUpdateEvent, TradeEvent, ViewSnapshot } from "@tradewatch/feed";
import { fixed, formatClock, signedPercent, truncate } from "./format.js";

/** Everything one frame needs, read from ViewState once per render. */
export interface FrameData {
  view: ViewSnapshot;
  /** Filtered trades, newest first. */
  trades: readonly TradeEvent[];
  /** Trades buffered before filtering. */
  totalTrades: number;
  /** Buffered updates for the tracked symbol, newest first. */
  priceHistory: readonly PriceUpdateEvent[];
  /** Why the feed stopped, once it has failed. */
  feedError?: string;
}

export interface TerminalSize {
  columns: number;
  rows: number;
}

const HEADER_ROWS = 3;
const FOOTER_ROWS = 2;

const HELP_TRADES = "p: Pages | Tab: Filter | c: Coin filter | t: Trader filter | ↑/↓ j/k: Scroll | q: Quit";
const HELP_PRICE_TRACKER = "p: Pages | s: Select coin | ↑/↓ j/k: Scroll | q: Quit";
const HELP_COIN_SELECTION = "Enter: Confirm coin | Esc: Cancel | Backspace: Delete";
const HELP_EDITING = "Enter: Confirm | Esc: Cancel | Backspace: Delete";

function tab(label: string, selected: boolean): string {
  return selected ? `[${label}]` : ` ${label} `;
}

function pageTabs(view: ViewSnapshot): string {
  return `Pages: ${tab("Trade Monitor", view.page === "trades")} ${tab("Price Tracker", view.page === "priceTracker")}`.trimEnd();
}

// Field text while editing shows the buffer with a cursor.
function fieldText(view: ViewSnapshot, mode: ViewSnapshot["mode"], committed: string): string {
  return view.mode === mode ? `${view.inputBuffer}_` : committed;
}

function filterBar(view: ViewSnapshot): string {
  const type = view.tradeFilter === "all" ? "All Trades" : "Large Trades";
  const coin = fieldText(view, "coinFilter", view.coinFilter);
  const trader = fieldText(view, "traderFilter", view.traderFilter);
  return `Type (Tab): ${type} | Coin Filter (c): ${coin} | Trader Filter (t): ${trader}`;
}

function trackedBar(view: ViewSnapshot): string {
  return `Tracked Coin (s: select): ${fieldText(view, "coinSelection", view.trackedSymbol ?? "No coin selected")}`;
}

function tradeLines(trade: TradeEvent): string[] {
  const { data } = trade;
  const size = trade.kind === LARGE_TRADES_KIND ? " [LARGE]" : "";
  return [
    `${data.type}${size} - ${data.username} @ ${formatClock(trade.receivedAt)}`,
    `  ${data.coinSymbol} (${data.coinName})`,
    `  Amount: ${fixed(data.amount, 2)} | Value: $${fixed(data.totalValue, 2)} | Price: $${fixed(data.price, 8)}`,
    "",
  ];
}

function priceHistoryLines(update: PriceUpdateEvent): string[] {
  return [
    `Price: $${fixed(update.currentPrice, 8)}   Change: ${signedPercent(update.change24h)}   @ ${formatClock(update.receivedAt)}`,
    `  Market Cap: $${fixed(update.marketCap, 2)}   Volume: $${fixed(update.volume24h, 2)}`,
    "",
  ];
}

function latestPriceLines(symbol: string, latest: PriceUpdateEvent | null): string[] {
  if (!latest) return [`${symbol} - Latest Price`, "Waiting for price data..."];
  return [
    `${symbol} - Latest Price`,
    `Price: $${fixed(latest.currentPrice, 8)}   24h Change: ${signedPercent(latest.change24h)}`,
    `Market Cap: $${fixed(latest.marketCap, 2)}   Volume 24h: $${fixed(latest.volume24h, 2)}`,
    `Pool Coin: ${fixed(latest.poolCoinAmount, 2)}   Pool Base: ${fixed(latest.poolBaseCurrencyAmount, 2)}`,
    `Last Updated: ${formatClock(latest.receivedAt)}`,
  ];
}

/** Append item blocks from offset until rows lines are filled. */
function scrolledList<T>(
  head: string[],
  items: readonly T[],
  offset: number,
  rows: number,
  linesOf: (item: T) => string[],
): string[] {
  const lines = [...head];
  for (let i = offset; i < items.length && lines.length < rows; i++) {
    lines.push(...linesOf(items[i]));
  }
  return lines;
}

function tradesBody(data: FrameData, rows: number): string[] {
  const title = `Trades (${data.trades.length}/${data.totalTrades})`;
  return scrolledList([title], data.trades, data.view.scrollOffset, rows, tradeLines);
}

function priceTrackerBody(data: FrameData, rows: number): string[] {
  const { view } = data;
  if (view.trackedSymbol === null) return ["Press 's' to select a coin to track"];
  const head = [
    ...latestPriceLines(view.trackedSymbol, view.latestPrice),
    "",
    `Price History (${data.priceHistory.length})`,
  ];
  return scrolledList(head, data.priceHistory, view.scrollOffset, rows, priceHistoryLines);
}

function helpLine(view: ViewSnapshot): string {
  switch (view.mode) {
    case "normal":
      return view.page === "trades" ? HELP_TRADES : HELP_PRICE_TRACKER;
    case "coinSelection":
      return HELP_COIN_SELECTION;
    default:
      return HELP_EDITING;
  }
}

export function statusLabel(status: FeedStatus): string {
  switch (status) {
    case "idle":
    case "connecting":
      return "connecting";
    case "connected":
      return "connected";
    case "closed":
    case "failed":
      return "disconnected";
  }
}

export function failureLabel(phase: FeedFailurePhase): string {
  switch (phase) {
    case "connect":
      return "connect failed";
    case "send":
      return "send failed";
    case "closed":
      return "connection closed";
  }
}

function statusLine(status: FeedStatus, feedError: string | undefined): string {
  const label = statusLabel(status);
  return feedError ? `Feed: ${label} (${feedError})` : `Feed: ${label}`;
}

function fitRows(lines: string[], rows: number): string[] {
  const out = lines.slice(0, rows);
  while (out.length < rows) out.push("");
  return out;
}

/**
 * Lay out one full screen: page tabs, filter or tracked-coin bar, rule,
 * the page body, help and status. Always exactly size.rows lines, none
 * wider than size.columns.
 */
export function renderFrame(data: FrameData, status: FeedStatus, size: TerminalSize): string[] {
  const { view } = data;
  const bodyRows = Math.max(0, size.rows - HEADER_ROWS - FOOTER_ROWS);
  const body = view.page === "trades" ? tradesBody(data, bodyRows) : priceTrackerBody(data, bodyRows);

  const lines = [
    pageTabs(view),
    view.page === "trades" ? filterBar(view) : trackedBar(view),
    "─".repeat(Math.max(0, size.columns)),
    ...fitRows(body, bodyRows),
    helpLine(view),
    statusLine(status, data.feedError),
  ];
  return lines.slice(0, Math.max(0, size.rows)).map((line) => truncate(line, size.columns));
}
