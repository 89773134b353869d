import { EventEmitter, once } from "node:events";
import WebSocket from "ws";
import type { Channel } from "../lib/channel.js";
import { FeedConnectionError } from "../lib/errors.js";
import { logger } from "../lib/logger.js";
import type { PriceUpdateEvent, TradeEvent } from "../types/events.js";
import { PONG_FRAME, STARTUP_FRAMES, setCoinFrame, type OutboundFrame } from "../types/protocol.js";
import { decodeFrame } from "./decode-frame.js";

const log = logger.createChild("feedConnector");

export type FeedStatus = "idle" | "connecting" | "connected" | "closed" | "failed";

export interface FeedConnectorDeps {
  url: string;
  /** Handoff to the trade buffer writer. */
  trades: Channel<TradeEvent>;
  /** Handoff to the price buffer writer. */
  prices: Channel<PriceUpdateEvent>;
  /** Tracked-symbol requests from the view. Closing it ends run() cleanly. */
  commands: Channel<string>;
  now?: () => Date;
  createSocket?: (url: string) => WebSocket;
}

export interface FeedConnectorStats {
  framesReceived: number;
  framesDropped: number;
  eventsDropped: number;
}

export interface FeedConnectorEvents {
  "status": [status: FeedStatus];
}

export declare interface FeedConnector {
  on<K extends keyof FeedConnectorEvents>(event: K, listener: (...args: FeedConnectorEvents[K]) => void): this;
  emit<K extends keyof FeedConnectorEvents>(event: K, ...args: FeedConnectorEvents[K]): boolean;
}

function rawToText(raw: WebSocket.RawData): string {
  if (Array.isArray(raw)) return Buffer.concat(raw).toString("utf8");
  if (Buffer.isBuffer(raw)) return raw.toString("utf8");
  return Buffer.from(raw).toString("utf8");
}

/**
 * Owns the single feed WebSocket for the life of the process.
 *
 * run() connects, sends the startup subscriptions, then services inbound
 * frames and tracking commands one event at a time. It resolves when the
 * command channel is closed and rejects with FeedConnectionError on any
 * transport failure. There is no reconnect.
 */
export class FeedConnector extends EventEmitter {
  private deps: FeedConnectorDeps;
  private currentStatus: FeedStatus = "idle";
  private stats: FeedConnectorStats = { framesReceived: 0, framesDropped: 0, eventsDropped: 0 };

  constructor(deps: FeedConnectorDeps) {
    super();
    this.deps = deps;
  }

  get status(): FeedStatus {
    return this.currentStatus;
  }

  getStats(): FeedConnectorStats {
    return { ...this.stats };
  }

  async run(): Promise<void> {
    if (this.currentStatus !== "idle") {
      throw new Error(`FeedConnector.run() called while ${this.currentStatus}`);
    }
    const { url } = this.deps;
    this.setStatus("connecting");

    const socket = (this.deps.createSocket ?? ((u: string) => new WebSocket(u)))(url);
    // Keeps late transport errors from surfacing as unhandled 'error' events.
    socket.on("error", (err) => {
      log.debug({ action: "socketError", err }, "Feed socket error");
    });

    try {
      await once(socket, "open");
    } catch (err) {
      this.setStatus("failed");
      throw new FeedConnectionError("connect", `Failed to connect to ${url}`, { cause: err });
    }

    this.setStatus("connected");
    log.info({ action: "connected", url }, "Feed connected");

    try {
      await this.serve(socket);
    } catch (err) {
      this.setStatus("failed");
      socket.terminate();
      throw err;
    }

    this.setStatus("closed");
    socket.close(1000);
    log.info({ action: "closed", ...this.stats }, "Feed connector stopped");
  }

  private serve(socket: WebSocket): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      let settled = false;

      const finish = (err?: unknown): void => {
        if (settled) return;
        settled = true;
        socket.off("message", onMessage);
        socket.off("close", onClose);
        socket.off("error", onError);
        if (err === undefined) {
          resolve();
        } else {
          reject(err);
        }
      };

      const onMessage = (raw: WebSocket.RawData): void => {
        this.handleFrame(socket, rawToText(raw), finish);
      };
      const onClose = (code: number): void => {
        finish(new FeedConnectionError("closed", `Feed connection closed (code ${code})`));
      };
      const onError = (err: Error): void => {
        finish(new FeedConnectionError("closed", "Feed connection error", { cause: err }));
      };

      socket.on("message", onMessage);
      socket.on("close", onClose);
      socket.on("error", onError);

      const pumpCommands = async (): Promise<void> => {
        // Subscriptions go out once; tracking commands wait until they are sent.
        await Promise.all(STARTUP_FRAMES.map((frame) => this.sendFrame(socket, frame)));
        log.info({ action: "subscribed" }, "Subscribed to trade channels");

        for await (const symbol of this.deps.commands) {
          if (settled) return;
          await this.sendFrame(socket, setCoinFrame(symbol));
          log.info({ action: "trackSymbol", symbol }, "Tracking symbol");
        }
        finish();
      };

      pumpCommands().catch(finish);
    });
  }

  private handleFrame(socket: WebSocket, text: string, onFatal: (err: unknown) => void): void {
    this.stats.framesReceived++;
    const frame = decodeFrame(text, (this.deps.now ?? (() => new Date()))());

    switch (frame.kind) {
      case "ping":
        this.sendFrame(socket, PONG_FRAME).catch(onFatal);
        break;
      case "price":
        if (!this.deps.prices.trySend(frame.event)) {
          this.stats.eventsDropped++;
          log.debug({ action: "dropPrice", coin: frame.event.coinSymbol }, "Price handoff full");
        }
        break;
      case "trade":
        if (!this.deps.trades.trySend(frame.event)) {
          this.stats.eventsDropped++;
          log.debug({ action: "dropTrade", coin: frame.event.data.coinSymbol }, "Trade handoff full");
        }
        break;
      case "drop":
        this.stats.framesDropped++;
        log.debug({ action: "dropFrame", reason: frame.reason }, "Discarded inbound frame");
        break;
    }
  }

  private sendFrame(socket: WebSocket, frame: OutboundFrame): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      socket.send(JSON.stringify(frame), (err) => {
        if (err) {
          reject(new FeedConnectionError("send", `Failed to send ${frame.type} frame`, { cause: err }));
          return;
        }
        resolve();
      });
    });
  }

  private setStatus(status: FeedStatus): void {
    this.currentStatus = status;
    this.emit("status", status);
  }
}
