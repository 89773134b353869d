import { describe, it, expect, afterEach } from "vitest";
import { z } from "zod";
import { parseEnv } from "./parse-env.js";

describe("parseEnv", () => {
  const originalEnv = { ...process.env };

  afterEach(() => {
    process.env = originalEnv;
  });

  it("parses process.env by default", () => {
    process.env.TEST_REFRESH_MS = "250";
    const schema = z.object({ TEST_REFRESH_MS: z.coerce.number() });
    expect(parseEnv(schema).TEST_REFRESH_MS).toBe(250);
  });

  it("parses an explicit source map", () => {
    const schema = z.object({ FEED_URL: z.string().url() });
    const env = parseEnv(schema, { FEED_URL: "ws://127.0.0.1:9000/" });
    expect(env.FEED_URL).toBe("ws://127.0.0.1:9000/");
  });

  it("applies defaults from the schema", () => {
    const schema = z.object({ LOG_LEVEL: z.string().default("info") });
    expect(parseEnv(schema, {}).LOG_LEVEL).toBe("info");
  });

  it("throws on invalid env", () => {
    const schema = z.object({ FEED_URL: z.string().url() });
    expect(() => parseEnv(schema, { FEED_URL: "nope" })).toThrow();
  });
});
