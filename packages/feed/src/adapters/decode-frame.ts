import { z } from "zod";
import {
  PriceUpdateFrameSchema,
  TradeFrameSchema,
  toPriceUpdateEvent,
  toTradeEvent,
  type PriceUpdateEvent,
  type TradeEvent,
} from "../types/events.js";

export type DropReason = "invalid-json" | "missing-type" | "invalid-price" | "invalid-trade";

export type DecodedFrame =
  | { kind: "ping" }
  | { kind: "price"; event: PriceUpdateEvent }
  | { kind: "trade"; event: TradeEvent }
  | { kind: "drop"; reason: DropReason };

const FrameHeadSchema = z.object({ type: z.string() });

/**
 * Decode one inbound text frame.
 *
 * The `type` field is read first and selects the payload schema. Anything
 * that is not a ping or a price update is tried as a trade. Frames that fail
 * any step come back as `drop`; decoding never throws.
 */
export function decodeFrame(text: string, receivedAt: Date): DecodedFrame {
  let value: unknown;
  try {
    value = JSON.parse(text);
  } catch {
    return { kind: "drop", reason: "invalid-json" };
  }

  const head = FrameHeadSchema.safeParse(value);
  if (!head.success) return { kind: "drop", reason: "missing-type" };

  switch (head.data.type) {
    case "ping":
      return { kind: "ping" };
    case "price_update": {
      const parsed = PriceUpdateFrameSchema.safeParse(value);
      if (!parsed.success) return { kind: "drop", reason: "invalid-price" };
      return { kind: "price", event: toPriceUpdateEvent(parsed.data, receivedAt) };
    }
    default: {
      const parsed = TradeFrameSchema.safeParse(value);
      if (!parsed.success) return { kind: "drop", reason: "invalid-trade" };
      return { kind: "trade", event: toTradeEvent(parsed.data, receivedAt) };
    }
  }
}
