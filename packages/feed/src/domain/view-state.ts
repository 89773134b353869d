import { createActor, type Actor, type SnapshotFrom } from "xstate";
import type { InputMode, Page, PriceUpdateEvent, TradeEvent, TradeFilter } from "../types/events.js";
import type { BoundedBuffer } from "./bounded-buffer.js";
import { matchesTrade } from "./filters.js";
import { viewMachine, type ViewCommand, type ViewInput } from "./view-machine.js";

export interface ViewStateDeps {
  trades: BoundedBuffer<TradeEvent>;
  prices: BoundedBuffer<PriceUpdateEvent>;
  /** Receives every newly confirmed tracked symbol, already uppercased. */
  onTrackSymbol?: (symbol: string) => void;
  initial?: ViewInput;
}

/** Point-in-time, read-only copy of the view state for the presentation layer. */
export interface ViewSnapshot {
  readonly mode: InputMode;
  readonly page: Page;
  readonly tradeFilter: TradeFilter;
  readonly coinFilter: string;
  readonly traderFilter: string;
  readonly scrollOffset: number;
  readonly trackedSymbol: string | null;
  readonly latestPrice: PriceUpdateEvent | null;
  readonly inputBuffer: string;
}

type ViewMachineSnapshot = SnapshotFrom<typeof viewMachine>;

function modeOf(snapshot: ViewMachineSnapshot): InputMode {
  if (snapshot.matches("coinFilter")) return "coinFilter";
  if (snapshot.matches("traderFilter")) return "traderFilter";
  if (snapshot.matches("coinSelection")) return "coinSelection";
  return "normal";
}

/**
 * Filtered, scrollable view over the two event buffers.
 *
 * Holds the view machine and answers the presentation layer's queries. The
 * buffers are only ever read through snapshots; nothing here mutates them.
 */
export class ViewState {
  private deps: ViewStateDeps;
  private actor: Actor<typeof viewMachine>;

  constructor(deps: ViewStateDeps) {
    this.deps = deps;
    this.actor = createActor(viewMachine, { input: deps.initial ?? {} });
    const onTrackSymbol = deps.onTrackSymbol;
    if (onTrackSymbol) {
      this.actor.on("symbolTracked", (event) => onTrackSymbol(event.symbol));
    }
    this.actor.start();
  }

  dispatch(command: ViewCommand): void {
    if (command.type === "SCROLL_DOWN") {
      this.actor.send({ type: "SCROLL_DOWN", itemCount: this.visibleItemCount() });
      return;
    }
    this.actor.send(command);
  }

  filteredTrades(): TradeEvent[] {
    const { tradeFilter, coinFilter, traderFilter } = this.actor.getSnapshot().context;
    const criteria = { tradeFilter, coinFilter, traderFilter };
    return this.deps.trades.snapshotFilter((trade) => matchesTrade(trade, criteria));
  }

  /** Buffered updates for the tracked symbol, newest first. */
  trackedPriceUpdates(): PriceUpdateEvent[] {
    const tracked = this.actor.getSnapshot().context.trackedSymbol;
    if (tracked === null) return [];
    return this.deps.prices.snapshotFilter((update) => update.coinSymbol === tracked);
  }

  /** Pick up the newest buffered price for the tracked symbol. Called once per render tick. */
  refreshLatestPrice(): void {
    const tracked = this.actor.getSnapshot().context.trackedSymbol;
    if (tracked === null) return;
    const latest = this.deps.prices.find((update) => update.coinSymbol === tracked);
    if (latest && latest !== this.actor.getSnapshot().context.latestPrice) {
      this.actor.send({ type: "PRICE_OBSERVED", update: latest });
    }
  }

  /** Length of the list on the active page; bounds scrolling. */
  visibleItemCount(): number {
    return this.actor.getSnapshot().context.page === "trades"
      ? this.filteredTrades().length
      : this.trackedPriceUpdates().length;
  }

  isEditing(): boolean {
    return !this.actor.getSnapshot().matches("normal");
  }

  snapshot(): ViewSnapshot {
    const snap = this.actor.getSnapshot();
    const ctx = snap.context;
    return {
      mode: modeOf(snap),
      page: ctx.page,
      tradeFilter: ctx.tradeFilter,
      coinFilter: ctx.coinFilter,
      traderFilter: ctx.traderFilter,
      scrollOffset: ctx.scrollOffset,
      trackedSymbol: ctx.trackedSymbol,
      latestPrice: ctx.latestPrice,
      inputBuffer: ctx.inputBuffer,
    };
  }

  stop(): void {
    this.actor.stop();
  }
}
