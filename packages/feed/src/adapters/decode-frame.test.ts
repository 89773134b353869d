import { describe, it, expect } from "vitest";
import { RECEIVED_AT, tradeData } from "../test-helpers.js";
import { decodeFrame } from "./decode-frame.js";

const priceFrame = {
  type: "price_update",
  coinSymbol: "ABC",
  currentPrice: 0.00012345,
  marketCap: 12345.67,
  change24h: -3.5,
  volume24h: 999.5,
  poolCoinAmount: 100,
  poolBaseCurrencyAmount: 200,
};

describe("decodeFrame", () => {
  it("recognises ping", () => {
    expect(decodeFrame('{"type":"ping"}', RECEIVED_AT)).toEqual({ kind: "ping" });
  });

  it("decodes a price update and stamps the receipt time", () => {
    const frame = decodeFrame(JSON.stringify(priceFrame), RECEIVED_AT);
    expect(frame).toEqual({
      kind: "price",
      event: {
        coinSymbol: "ABC",
        currentPrice: 0.00012345,
        marketCap: 12345.67,
        change24h: -3.5,
        volume24h: 999.5,
        poolCoinAmount: 100,
        poolBaseCurrencyAmount: 200,
        receivedAt: RECEIVED_AT,
      },
    });
  });

  it("drops a price update with a missing field", () => {
    const { marketCap: _omit, ...partial } = priceFrame;
    expect(decodeFrame(JSON.stringify(partial), RECEIVED_AT)).toEqual({ kind: "drop", reason: "invalid-price" });
  });

  it("decodes any other type as a trade, keeping the discriminator", () => {
    const data = tradeData({ coinSymbol: "XYZ" });
    const frame = decodeFrame(JSON.stringify({ type: "live-trade", data }), RECEIVED_AT);
    expect(frame.kind).toBe("trade");
    if (frame.kind === "trade") {
      expect(frame.event.kind).toBe("live-trade");
      expect(frame.event.data).toEqual(data);
      expect(frame.event.receivedAt).toBe(RECEIVED_AT);
      expect(Object.isFrozen(frame.event)).toBe(true);
      expect(Object.isFrozen(frame.event.data)).toBe(true);
    }
  });

  it("drops trade frames whose data does not match", () => {
    const frame = decodeFrame(JSON.stringify({ type: "all-trades", data: { username: "bob" } }), RECEIVED_AT);
    expect(frame).toEqual({ kind: "drop", reason: "invalid-trade" });
  });

  it("drops unknown frames without trade data", () => {
    expect(decodeFrame('{"type":"welcome"}', RECEIVED_AT)).toEqual({ kind: "drop", reason: "invalid-trade" });
  });

  it("drops frames without a string type", () => {
    expect(decodeFrame('{"data":1}', RECEIVED_AT)).toEqual({ kind: "drop", reason: "missing-type" });
    expect(decodeFrame('{"type":5}', RECEIVED_AT)).toEqual({ kind: "drop", reason: "missing-type" });
    expect(decodeFrame("[1,2]", RECEIVED_AT)).toEqual({ kind: "drop", reason: "missing-type" });
  });

  it("drops text that is not JSON", () => {
    expect(decodeFrame("hello", RECEIVED_AT)).toEqual({ kind: "drop", reason: "invalid-json" });
  });
});
