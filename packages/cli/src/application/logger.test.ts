import { createBufferedSink } from "@blameweight/reporter";
import { describe, expect, it } from "vitest";
import { createLogger, parseLogLevel } from "./logger.js";

describe("createLogger", () => {
  it("writes messages at or above the configured level", () => {
    const sink = createBufferedSink();
    const logger = createLogger("warn", sink);

    logger.debug("hidden");
    logger.info("hidden");
    logger.warn("slow blame");
    logger.error("git missing");

    expect(sink.contents()).toBe("[blameweight] WARN slow blame\n[blameweight] ERROR git missing\n");
  });

  it("writes nothing when silent", () => {
    const sink = createBufferedSink();
    createLogger("silent", sink).error("ignored");

    expect(sink.contents()).toBe("");
  });
});

describe("parseLogLevel", () => {
  it("accepts known levels and falls back to info", () => {
    expect(parseLogLevel("debug")).toBe("debug");
    expect(parseLogLevel("loud")).toBe("info");
    expect(parseLogLevel(undefined)).toBe("info");
  });
});
