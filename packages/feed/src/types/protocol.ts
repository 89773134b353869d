/** Tracking target that selects no particular coin. */
export const GLOBAL_TRACKING_TARGET = "@global";

export type SubscriptionChannel = "trades:all" | "trades:large";

export type OutboundFrame =
  | { type: "subscribe"; channel: SubscriptionChannel }
  | { type: "set_coin"; coinSymbol: string }
  | { type: "pong" };

export function setCoinFrame(coinSymbol: string): OutboundFrame {
  return { type: "set_coin", coinSymbol };
}

/** Sent once per connection, in this order, before any tracking command. */
export const STARTUP_FRAMES: readonly OutboundFrame[] = [
  { type: "subscribe", channel: "trades:all" },
  { type: "subscribe", channel: "trades:large" },
  setCoinFrame(GLOBAL_TRACKING_TARGET),
];

export const PONG_FRAME: OutboundFrame = { type: "pong" };
