import { describe, it, expect, afterEach } from "vitest";
import { createPinoLogger, logger, resolveBaseLevel } from "./logger.js";

afterEach(() => {
  logger.setLogConfig({});
});

describe("logger", () => {
  it("is silent under vitest", () => {
    expect(logger.level).toBe("silent");
  });

  it("children inherit the base level without an override", () => {
    expect(logger.createChild("plain").level).toBe("silent");
  });

  it("applies a per-module override to new children", () => {
    logger.setLogConfig({ noisy: "debug" });
    expect(logger.createChild("noisy").level).toBe("debug");
    expect(logger.createChild("other").level).toBe("silent");
  });

  it("applies overrides to children created before the config", () => {
    const early = logger.createChild("early");
    logger.setLogConfig({ early: "warn" });
    expect(early.level).toBe("warn");
    logger.setLogConfig({});
    expect(early.level).toBe("silent");
  });
});

describe("createPinoLogger", () => {
  function collect(): { lines: string[]; write(msg: string): void } {
    const lines: string[] = [];
    return { lines, write: (msg: string) => lines.push(msg) };
  }

  it("falls back to info for an unknown LOG_LEVEL", () => {
    const dest = collect();
    const built = createPinoLogger({ LOG_LEVEL: "loud" }, dest);
    expect(built.level).toBe("info");

    built.info("hello");
    built.debug("hidden");
    expect(dest.lines).toHaveLength(1);
    expect(JSON.parse(dest.lines[0] ?? "{}")).toMatchObject({ level: 30, msg: "hello" });
  });

  it("uses a valid LOG_LEVEL", () => {
    expect(createPinoLogger({ LOG_LEVEL: "debug" }, collect()).level).toBe("debug");
  });

  it("stays silent when VITEST is set", () => {
    expect(createPinoLogger({ VITEST: "true", LOG_LEVEL: "loud" }).level).toBe("silent");
  });
});

describe("resolveBaseLevel", () => {
  it.each([
    [undefined, "info"],
    ["", "info"],
    ["LOUD", "info"],
    ["warn", "warn"],
    ["silent", "silent"],
  ])("%j resolves to %s", (raw, expected) => {
    expect(resolveBaseLevel(raw)).toBe(expected);
  });
});
