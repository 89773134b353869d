import pTimeout from "p-timeout";
import { BoundedBuffer } from "../domain/bounded-buffer.js";
import { FeedConnector, type FeedConnectorDeps } from "../adapters/feed-connector.js";
import { Channel } from "../lib/channel.js";
import { logger } from "../lib/logger.js";
import type { DashboardConfig } from "../types/config.js";
import type { PriceUpdateEvent, TradeEvent } from "../types/events.js";
import { runBufferWriter } from "./buffer-writer.js";

const log = logger.createChild("pipeline");

const STOP_TIMEOUT_MS = 2_000;

export type PipelineConfig = Pick<
  DashboardConfig,
  "feedUrl" | "tradeCapacity" | "priceCapacity" | "handoffCapacity" | "commandCapacity" | "initialSymbol"
>;

export interface PipelineOptions {
  now?: FeedConnectorDeps["now"];
  createSocket?: FeedConnectorDeps["createSocket"];
}

/**
 * The event pipeline, wired once at startup:
 * connector → handoff channels → buffer writers → bounded buffers,
 * plus the command channel carrying tracked-symbol requests back to the connector.
 */
export class FeedPipeline {
  readonly trades: BoundedBuffer<TradeEvent>;
  readonly prices: BoundedBuffer<PriceUpdateEvent>;
  readonly connector: FeedConnector;
  private tradeHandoff: Channel<TradeEvent>;
  private priceHandoff: Channel<PriceUpdateEvent>;
  private commands: Channel<string>;
  private writers: Promise<[number, number]> | null = null;
  private running: Promise<void> | null = null;

  constructor(config: PipelineConfig, options: PipelineOptions = {}) {
    this.trades = new BoundedBuffer<TradeEvent>(config.tradeCapacity);
    this.prices = new BoundedBuffer<PriceUpdateEvent>(config.priceCapacity);
    this.tradeHandoff = new Channel<TradeEvent>(config.handoffCapacity);
    this.priceHandoff = new Channel<PriceUpdateEvent>(config.handoffCapacity);
    this.commands = new Channel<string>(config.commandCapacity);
    this.connector = new FeedConnector({
      url: config.feedUrl,
      trades: this.tradeHandoff,
      prices: this.priceHandoff,
      commands: this.commands,
      now: options.now,
      createSocket: options.createSocket,
    });
    if (config.initialSymbol) {
      this.trackSymbol(config.initialSymbol);
    }
  }

  /**
   * Start the buffer writers and the connector. The returned promise settles
   * with the connector: it rejects with FeedConnectionError on transport failure.
   */
  start(): Promise<void> {
    if (this.running) return this.running;
    this.writers = Promise.all([
      runBufferWriter("trades", this.tradeHandoff, this.trades),
      runBufferWriter("prices", this.priceHandoff, this.prices),
    ]);
    this.running = this.connector.run();
    return this.running;
  }

  /** Queue a tracked-symbol request. Returns false when the request was dropped. */
  trackSymbol(symbol: string): boolean {
    const accepted = this.commands.trySend(symbol);
    if (!accepted) {
      log.debug({ action: "dropTrackRequest", symbol }, "Command channel full, tracking request dropped");
    }
    return accepted;
  }

  /**
   * Close the command channel (the connector exits cleanly) and then the
   * handoff channels. Resolves once the writers have drained. A connector
   * still stuck connecting is abandoned after timeoutMs.
   */
  async stop(timeoutMs = STOP_TIMEOUT_MS): Promise<void> {
    this.commands.close();
    if (this.running) {
      try {
        await pTimeout(this.running, { milliseconds: timeoutMs });
      } catch (err) {
        log.debug({ action: "stop", err, status: this.connector.status }, "Connector did not stop cleanly");
      }
    }
    this.tradeHandoff.close();
    this.priceHandoff.close();
    if (this.writers) {
      const [trades, prices] = await this.writers;
      log.info({ action: "stopped", trades, prices }, "Pipeline stopped");
    }
  }
}
