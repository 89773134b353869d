import {
  FeedPipeline,
  ViewState,
  isFeedConnectionError,
  logger,
  type DashboardConfig,
  type FeedStatus,
} from "@tradewatch/feed";
import { decodeKey, type KeyPress } from "./input/decode-key.js";
import { failureLabel, renderFrame, type FrameData } from "./render/render-frame.js";
import type { TerminalSession } from "./terminal-session.js";

const log = logger.createChild("dashboard");

export interface DashboardOptions {
  /** Replaces the pipeline built from config. */
  pipeline?: FeedPipeline;
}

/**
 * The render/input loop. Redraws on every keypress, on every connector
 * status change and on a refresh timer that also picks up the latest price
 * for the tracked symbol. A feed failure is shown on the status line; the
 * dashboard keeps running on what it has buffered until the user quits.
 */
export class Dashboard {
  readonly pipeline: FeedPipeline;
  readonly view: ViewState;
  private config: DashboardConfig;
  private session: TerminalSession;
  private feedStatus: FeedStatus = "idle";
  private feedError: string | undefined;
  private timer: ReturnType<typeof setInterval> | null = null;
  private started = false;
  private requestQuit: () => void = () => {};
  private quitRequested: Promise<void>;

  constructor(config: DashboardConfig, session: TerminalSession, options: DashboardOptions = {}) {
    this.config = config;
    this.session = session;
    this.pipeline = options.pipeline ?? new FeedPipeline(config);
    this.view = new ViewState({
      trades: this.pipeline.trades,
      prices: this.pipeline.prices,
      onTrackSymbol: (symbol) => {
        this.pipeline.trackSymbol(symbol);
      },
      initial: { trackedSymbol: config.initialSymbol },
    });
    this.quitRequested = new Promise<void>((resolve) => {
      this.requestQuit = resolve;
    });
  }

  get status(): FeedStatus {
    return this.feedStatus;
  }

  /** Run until quit() (or the quit key), then shut everything down. */
  async run(): Promise<void> {
    if (this.started) throw new Error("Dashboard.run() called twice");
    this.started = true;

    this.pipeline.connector.on("status", this.onStatus);
    this.session.on("key", this.onKey);
    this.session.on("resize", this.render);
    this.session.start();
    this.timer = setInterval(this.tick, this.config.refreshMs);

    this.pipeline.start().then(
      () => {
        log.info({ action: "feedStopped" }, "Feed connector finished");
      },
      (err: unknown) => {
        if (isFeedConnectionError(err)) {
          this.feedError = failureLabel(err.phase);
          log.error({ action: "feedFailed", phase: err.phase, err }, "Feed connection lost");
        } else {
          this.feedError = "unexpected error";
          log.error({ action: "feedFailed", err }, "Feed connector crashed");
        }
        this.render();
      },
    );
    this.render();
    log.info({ action: "started", url: this.config.feedUrl }, "Dashboard started");

    await this.quitRequested;
    await this.shutdown();
  }

  quit(): void {
    this.requestQuit();
  }

  frameData(): FrameData {
    return {
      view: this.view.snapshot(),
      trades: this.view.filteredTrades(),
      totalTrades: this.pipeline.trades.size,
      priceHistory: this.view.trackedPriceUpdates(),
      feedError: this.feedError,
    };
  }

  private async shutdown(): Promise<void> {
    if (this.timer) clearInterval(this.timer);
    this.timer = null;
    this.session.off("key", this.onKey);
    this.session.off("resize", this.render);
    this.session.stop();
    this.pipeline.connector.off("status", this.onStatus);
    await this.pipeline.stop();
    this.view.stop();
    log.info({ action: "stopped", feed: this.pipeline.connector.getStats() }, "Dashboard stopped");
  }

  private render = (): void => {
    this.session.draw(renderFrame(this.frameData(), this.feedStatus, this.session.size()));
  };

  private tick = (): void => {
    this.view.refreshLatestPrice();
    this.render();
  };

  private onStatus = (status: FeedStatus): void => {
    this.feedStatus = status;
    this.render();
  };

  private onKey = (key: KeyPress): void => {
    const command = decodeKey(key, this.view.isEditing(), this.view.snapshot().page);
    if (!command) return;
    if (command.type === "QUIT") {
      this.quit();
      return;
    }
    this.view.dispatch(command);
    this.render();
  };
}
