/**
 * view-machine.ts: xstate v5 machine for the dashboard's view state.
 *
 * The state value is the input mode (normal / coinFilter / traderFilter /
 * coinSelection); the context holds page, filters, scroll position and the
 * tracked symbol. This is the only place view transitions are decided. The
 * input layer and the renderer both read the same snapshot.
 */

import { setup, assign, emit } from "xstate";
import type { Page, PriceUpdateEvent, TradeFilter } from "../types/events.js";
import { clampScroll, normalizeSymbol } from "./filters.js";

// ---------------------------------------------------------------------------
// Context
// ---------------------------------------------------------------------------
export interface ViewContext {
  page: Page;
  tradeFilter: TradeFilter;
  coinFilter: string;
  traderFilter: string;
  scrollOffset: number;
  /** Always uppercase when set. */
  trackedSymbol: string | null;
  latestPrice: PriceUpdateEvent | null;
  /** Text being edited; empty whenever the machine is in `normal`. */
  inputBuffer: string;
}

// ---------------------------------------------------------------------------
// Commands (what the input layer may ask for) and machine events
// ---------------------------------------------------------------------------
export type ViewCommand =
  | { type: "SWITCH_PAGE" }
  | { type: "TOGGLE_TRADE_FILTER" }
  | { type: "SCROLL_UP" }
  | { type: "SCROLL_DOWN" }
  | { type: "EDIT_COIN_FILTER" }
  | { type: "EDIT_TRADER_FILTER" }
  | { type: "EDIT_TRACKED_SYMBOL" }
  | { type: "CONFIRM" }
  | { type: "CANCEL" }
  | { type: "APPEND_CHAR"; char: string }
  | { type: "DELETE_CHAR" };

export type ViewEvent =
  | Exclude<ViewCommand, { type: "SCROLL_DOWN" }>
  /** itemCount is the length of the list currently on screen. */
  | { type: "SCROLL_DOWN"; itemCount: number }
  | { type: "PRICE_OBSERVED"; update: PriceUpdateEvent };

export type ViewEmitted = { type: "symbolTracked"; symbol: string };

export interface ViewInput {
  page?: Page;
  tradeFilter?: TradeFilter;
  coinFilter?: string;
  traderFilter?: string;
  trackedSymbol?: string;
}

// ---------------------------------------------------------------------------
// Events shared by the three editing states
// ---------------------------------------------------------------------------
const editingEvents = {
  CANCEL: { target: "normal" as const },
  APPEND_CHAR: { actions: "appendChar" as const },
  DELETE_CHAR: { actions: "deleteChar" as const },
};

// ---------------------------------------------------------------------------
// Machine definition
// ---------------------------------------------------------------------------
export const viewMachine = setup({
  types: {
    context: {} as ViewContext,
    events: {} as ViewEvent,
    input: {} as ViewInput,
    emitted: {} as ViewEmitted,
  },
  guards: {
    onTradesPage: ({ context }) => context.page === "trades",
    onPriceTrackerPage: ({ context }) => context.page === "priceTracker",
    hasSymbolInput: ({ context }) => normalizeSymbol(context.inputBuffer) !== null,
  },
  actions: {
    clearInput: assign({ inputBuffer: "" }),
    resetScroll: assign({ scrollOffset: 0 }),
    switchPage: assign({
      page: ({ context }): Page => (context.page === "trades" ? "priceTracker" : "trades"),
      scrollOffset: 0,
    }),
    toggleTradeFilter: assign({
      tradeFilter: ({ context }): TradeFilter => (context.tradeFilter === "all" ? "large" : "all"),
      scrollOffset: 0,
    }),
    scrollUp: assign({
      scrollOffset: ({ context }) => Math.max(0, context.scrollOffset - 1),
    }),
    scrollDown: assign({
      scrollOffset: ({ context, event }) => {
        if (event.type !== "SCROLL_DOWN") return context.scrollOffset;
        return clampScroll(context.scrollOffset + 1, event.itemCount);
      },
    }),
    seedFromCoinFilter: assign({
      inputBuffer: ({ context }) => context.coinFilter,
    }),
    seedFromTraderFilter: assign({
      inputBuffer: ({ context }) => context.traderFilter,
    }),
    seedFromTrackedSymbol: assign({
      inputBuffer: ({ context }) => context.trackedSymbol ?? "",
    }),
    appendChar: assign({
      inputBuffer: ({ context, event }) => {
        if (event.type !== "APPEND_CHAR") return context.inputBuffer;
        return context.inputBuffer + event.char;
      },
    }),
    deleteChar: assign({
      // Drop one code point, not one UTF-16 unit.
      inputBuffer: ({ context }) => Array.from(context.inputBuffer).slice(0, -1).join(""),
    }),
    commitCoinFilter: assign({
      coinFilter: ({ context }) => context.inputBuffer,
    }),
    commitTraderFilter: assign({
      traderFilter: ({ context }) => context.inputBuffer,
    }),
    commitTrackedSymbol: assign({
      trackedSymbol: ({ context }) => normalizeSymbol(context.inputBuffer),
      latestPrice: null,
      scrollOffset: 0,
    }),
    emitTrackedSymbol: emit(({ context }) => ({
      type: "symbolTracked" as const,
      symbol: context.trackedSymbol ?? "",
    })),
    observePrice: assign({
      latestPrice: ({ context, event }) => {
        if (event.type !== "PRICE_OBSERVED") return context.latestPrice;
        if (context.trackedSymbol === null || event.update.coinSymbol !== context.trackedSymbol) {
          return context.latestPrice;
        }
        return event.update;
      },
    }),
  },
}).createMachine({
  id: "view",
  context: ({ input }) => ({
    page: input?.page ?? "trades",
    tradeFilter: input?.tradeFilter ?? "all",
    coinFilter: input?.coinFilter ?? "",
    traderFilter: input?.traderFilter ?? "",
    scrollOffset: 0,
    trackedSymbol: normalizeSymbol(input?.trackedSymbol ?? ""),
    latestPrice: null,
    inputBuffer: "",
  }),
  initial: "normal",
  on: {
    PRICE_OBSERVED: { actions: "observePrice" },
  },
  states: {
    normal: {
      entry: "clearInput",
      on: {
        SWITCH_PAGE: { actions: "switchPage" },
        TOGGLE_TRADE_FILTER: { guard: "onTradesPage", actions: "toggleTradeFilter" },
        SCROLL_UP: { actions: "scrollUp" },
        SCROLL_DOWN: { actions: "scrollDown" },
        EDIT_COIN_FILTER: {
          guard: "onTradesPage",
          target: "coinFilter",
          actions: "seedFromCoinFilter",
        },
        EDIT_TRADER_FILTER: {
          guard: "onTradesPage",
          target: "traderFilter",
          actions: "seedFromTraderFilter",
        },
        EDIT_TRACKED_SYMBOL: {
          guard: "onPriceTrackerPage",
          target: "coinSelection",
          actions: "seedFromTrackedSymbol",
        },
      },
    },

    coinFilter: {
      on: {
        ...editingEvents,
        CONFIRM: { target: "normal", actions: ["commitCoinFilter", "resetScroll"] },
      },
    },

    traderFilter: {
      on: {
        ...editingEvents,
        CONFIRM: { target: "normal", actions: ["commitTraderFilter", "resetScroll"] },
      },
    },

    coinSelection: {
      on: {
        ...editingEvents,
        CONFIRM: [
          {
            guard: "hasSymbolInput",
            target: "normal",
            actions: ["commitTrackedSymbol", "emitTrackedSymbol"],
          },
          // Blank input leaves the tracked symbol as it was.
          { target: "normal" },
        ],
      },
    },
  },
});
