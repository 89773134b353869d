// Types
export type {
  TradeData,
  TradeEvent,
  PriceUpdateEvent,
  Page,
  TradeFilter,
  InputMode,
} from "./types/events.js";
export {
  ALL_TRADES_KIND,
  LARGE_TRADES_KIND,
  TradeDataSchema,
  TradeFrameSchema,
  PriceUpdateFrameSchema,
} from "./types/events.js";
export type { OutboundFrame, SubscriptionChannel } from "./types/protocol.js";
export { GLOBAL_TRACKING_TARGET, STARTUP_FRAMES, setCoinFrame } from "./types/protocol.js";
export type { DashboardConfig, DashboardConfigInput } from "./types/config.js";
export { DashboardConfigSchema, DEFAULT_FEED_URL } from "./types/config.js";

// Lib
export { Channel } from "./lib/channel.js";
export { FeedConnectionError, isFeedConnectionError } from "./lib/errors.js";
export type { FeedFailurePhase } from "./lib/errors.js";
export { logger } from "./lib/logger.js";
export { readEnv, EnvSchema } from "./lib/env.js";
export type { Env } from "./lib/env.js";

// Domain
export { BoundedBuffer } from "./domain/bounded-buffer.js";
export { matchesTrade, containsIgnoreCase, clampScroll, normalizeSymbol } from "./domain/filters.js";
export type { TradeCriteria } from "./domain/filters.js";
export { viewMachine } from "./domain/view-machine.js";
export type { ViewCommand, ViewContext, ViewInput } from "./domain/view-machine.js";
export { ViewState } from "./domain/view-state.js";
export type { ViewSnapshot, ViewStateDeps } from "./domain/view-state.js";

// Adapters
export { decodeFrame } from "./adapters/decode-frame.js";
export type { DecodedFrame, DropReason } from "./adapters/decode-frame.js";
export { FeedConnector } from "./adapters/feed-connector.js";
export type { FeedStatus, FeedConnectorDeps, FeedConnectorStats } from "./adapters/feed-connector.js";

// Application
export { runBufferWriter } from "./application/buffer-writer.js";
export { FeedPipeline } from "./application/pipeline.js";
export type { PipelineConfig, PipelineOptions } from "./application/pipeline.js";
