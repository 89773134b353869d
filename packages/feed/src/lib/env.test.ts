import { describe, it, expect } from "vitest";
import { readEnv } from "./env.js";

describe("readEnv", () => {
  it("defaults the log level and leaves the rest unset", () => {
    expect(readEnv({})).toEqual({ LOG_LEVEL: "info", LOG_MODULE_LEVELS: {} });
  });

  it("reads every variable", () => {
    expect(
      readEnv({ FEED_URL: "ws://localhost:8080", LOG_LEVEL: "debug", LOG_DIR: "/tmp/logs" }),
    ).toEqual({
      FEED_URL: "ws://localhost:8080",
      LOG_LEVEL: "debug",
      LOG_DIR: "/tmp/logs",
      LOG_MODULE_LEVELS: {},
    });
  });

  it("parses per-module log levels", () => {
    expect(readEnv({ LOG_MODULE_LEVELS: "feedConnector=debug, pipeline = warn" }).LOG_MODULE_LEVELS).toEqual({
      feedConnector: "debug",
      pipeline: "warn",
    });
  });

  it("rejects a malformed per-module entry", () => {
    expect(() => readEnv({ LOG_MODULE_LEVELS: "feedConnector" })).toThrow("invalid entry feedConnector");
    expect(() => readEnv({ LOG_MODULE_LEVELS: "pipeline=loud" })).toThrow("invalid entry pipeline=loud");
  });

  it("rejects an unknown log level", () => {
    expect(() => readEnv({ LOG_LEVEL: "verbose" })).toThrow();
  });
});
