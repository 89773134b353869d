import { describe, it, expect } from "vitest";
import type { PriceUpdateEvent, TradeData, TradeEvent, ViewSnapshot } from "@tradewatch/feed";
import { failureLabel, renderFrame, statusLabel, type FrameData } from "./render-frame.js";

function view(overrides: Partial<ViewSnapshot> = {}): ViewSnapshot {
  return {
    mode: "normal",
    page: "trades",
    tradeFilter: "all",
    coinFilter: "",
    traderFilter: "",
    scrollOffset: 0,
    trackedSymbol: null,
    latestPrice: null,
    inputBuffer: "",
    ...overrides,
  };
}

function trade(kind: string, data: Partial<TradeData>, receivedAt: Date): TradeEvent {
  return {
    kind,
    receivedAt,
    data: {
      type: "BUY",
      username: "alice",
      userImage: "avatars/alice.png",
      amount: 12.5,
      coinSymbol: "ABC",
      coinName: "Alpha Beta Coin",
      coinIcon: "icons/abc.png",
      totalValue: 250,
      price: 0.5,
      timestamp: 1772366400000,
      userId: "user-1",
      ...data,
    },
  };
}

function price(currentPrice: number, change24h: number, receivedAt: Date): PriceUpdateEvent {
  return {
    coinSymbol: "ABC",
    currentPrice,
    marketCap: 1_000_000,
    change24h,
    volume24h: 50_000,
    poolCoinAmount: 400,
    poolBaseCurrencyAmount: 800,
    receivedAt,
  };
}

const whale = trade("live-trade", { type: "SELL", username: "whale", amount: 1000, totalValue: 20000, price: 20 }, new Date(2026, 2, 1, 9, 5, 7));
const small = trade("all-trades", {}, new Date(2026, 2, 1, 9, 5, 8));

function frame(overrides: Partial<FrameData> = {}): FrameData {
  return { view: view(), trades: [], totalTrades: 0, priceHistory: [], ...overrides };
}

describe("renderFrame: trades page", () => {
  it("lays out header, trade list, help and status", () => {
    const lines = renderFrame(
      frame({
        view: view({ coinFilter: "ab", mode: "traderFilter", inputBuffer: "wh" }),
        trades: [whale, small],
        totalTrades: 5,
      }),
      "connected",
      { columns: 100, rows: 14 },
    );

    expect(lines).toEqual([
      "Pages: [Trade Monitor]  Price Tracker",
      "Type (Tab): All Trades | Coin Filter (c): ab | Trader Filter (t): wh_",
      "─".repeat(100),
      "Trades (2/5)",
      "SELL [LARGE] - whale @ 09:05:07",
      "  ABC (Alpha Beta Coin)",
      "  Amount: 1000.00 | Value: $20000.00 | Price: $20.00000000",
      "",
      "BUY - alice @ 09:05:08",
      "  ABC (Alpha Beta Coin)",
      "  Amount: 12.50 | Value: $250.00 | Price: $0.50000000",
      "",
      "Enter: Confirm | Esc: Cancel | Backspace: Delete",
      "Feed: connected",
    ]);
  });

  it("starts the list at the scroll offset and cuts it to the body height", () => {
    const lines = renderFrame(
      frame({ view: view({ scrollOffset: 1, tradeFilter: "large" }), trades: [whale, small], totalTrades: 5 }),
      "connecting",
      { columns: 100, rows: 8 },
    );

    expect(lines).toEqual([
      "Pages: [Trade Monitor]  Price Tracker",
      "Type (Tab): Large Trades | Coin Filter (c):  | Trader Filter (t): ",
      "─".repeat(100),
      "Trades (2/5)",
      "BUY - alice @ 09:05:08",
      "  ABC (Alpha Beta Coin)",
      "p: Pages | Tab: Filter | c: Coin filter | t: Trader filter | ↑/↓ j/k: Scroll | q: Quit",
      "Feed: connecting",
    ]);
  });

  it("never exceeds the terminal width", () => {
    const lines = renderFrame(frame({ trades: [whale] }), "connected", { columns: 10, rows: 12 });
    expect(lines).toHaveLength(12);
    expect(lines[0]).toBe("Pages: [Tr");
    for (const line of lines) expect(Array.from(line).length).toBeLessThanOrEqual(10);
  });

  it("returns exactly the terminal height, even when tiny", () => {
    expect(renderFrame(frame(), "connected", { columns: 40, rows: 3 })).toEqual([
      "Pages: [Trade Monitor]  Price Tracker",
      "Type (Tab): All Trades | Coin Filter (c)",
      "─".repeat(40),
    ]);
    expect(renderFrame(frame(), "connected", { columns: 40, rows: 0 })).toEqual([]);
    expect(renderFrame(frame(), "connected", { columns: 40, rows: 30 })).toHaveLength(30);
  });
});

describe("renderFrame: price tracker page", () => {
  it("prompts for a symbol when none is tracked", () => {
    const lines = renderFrame(frame({ view: view({ page: "priceTracker" }) }), "failed", { columns: 80, rows: 8 });
    expect(lines).toEqual([
      "Pages:  Trade Monitor  [Price Tracker]",
      "Tracked Coin (s: select): No coin selected",
      "─".repeat(80),
      "Press 's' to select a coin to track",
      "",
      "",
      "p: Pages | s: Select coin | ↑/↓ j/k: Scroll | q: Quit",
      "Feed: disconnected",
    ]);
  });

  it("shows the latest price and the history", () => {
    const latest = price(1.5, -1.25, new Date(2026, 2, 1, 10, 0, 0));
    const older = price(1, 2.5, new Date(2026, 2, 1, 9, 59, 0));
    const lines = renderFrame(
      frame({
        view: view({ page: "priceTracker", trackedSymbol: "ABC", latestPrice: latest }),
        priceHistory: [latest, older],
      }),
      "connected",
      { columns: 120, rows: 20 },
    );

    expect(lines.slice(3, 18)).toEqual([
      "ABC - Latest Price",
      "Price: $1.50000000   24h Change: -1.25%",
      "Market Cap: $1000000.00   Volume 24h: $50000.00",
      "Pool Coin: 400.00   Pool Base: 800.00",
      "Last Updated: 10:00:00",
      "",
      "Price History (2)",
      "Price: $1.50000000   Change: -1.25%   @ 10:00:00",
      "  Market Cap: $1000000.00   Volume: $50000.00",
      "",
      "Price: $1.00000000   Change: +2.50%   @ 09:59:00",
      "  Market Cap: $1000000.00   Volume: $50000.00",
      "",
      "",
      "",
    ]);
    expect(lines[1]).toBe("Tracked Coin (s: select): ABC");
  });

  it("waits for the first price of a new symbol", () => {
    const lines = renderFrame(
      frame({ view: view({ page: "priceTracker", trackedSymbol: "XYZ" }) }),
      "connected",
      { columns: 80, rows: 9 },
    );
    expect(lines.slice(3, 7)).toEqual(["XYZ - Latest Price", "Waiting for price data...", "", "Price History (0)"]);
  });

  it("shows the edit buffer while selecting a coin", () => {
    const lines = renderFrame(
      frame({ view: view({ page: "priceTracker", mode: "coinSelection", inputBuffer: "DO", trackedSymbol: "ABC" }) }),
      "connected",
      { columns: 80, rows: 12 },
    );
    expect(lines[1]).toBe("Tracked Coin (s: select): DO_");
    expect(lines[10]).toBe("Enter: Confirm coin | Esc: Cancel | Backspace: Delete");
  });
});

describe("renderFrame: status line", () => {
  it("appends why the feed stopped", () => {
    const lines = renderFrame(frame({ feedError: "connection closed" }), "failed", { columns: 80, rows: 6 });
    expect(lines[5]).toBe("Feed: disconnected (connection closed)");
  });

  it("shows the bare state while the feed is healthy", () => {
    const lines = renderFrame(frame(), "connecting", { columns: 80, rows: 6 });
    expect(lines[5]).toBe("Feed: connecting");
  });
});

describe("failureLabel", () => {
  it("names each failure phase", () => {
    expect(failureLabel("connect")).toBe("connect failed");
    expect(failureLabel("send")).toBe("send failed");
    expect(failureLabel("closed")).toBe("connection closed");
  });
});

describe("statusLabel", () => {
  it("collapses connector states", () => {
    expect(statusLabel("idle")).toBe("connecting");
    expect(statusLabel("connecting")).toBe("connecting");
    expect(statusLabel("connected")).toBe("connected");
    expect(statusLabel("closed")).toBe("disconnected");
    expect(statusLabel("failed")).toBe("disconnected");
  });
});
