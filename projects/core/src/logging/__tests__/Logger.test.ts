import { beforeEach, describe, expect, it, vi } from "vitest";

import { createConsoleLogger, silentLogger } from "../Logger.js";

describe("createConsoleLogger()", () => {
  const sink = {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  };

  beforeEach(() => {
    vi.clearAllMocks();
  });

  it("prefixes messages with the tag", () => {
    const logger = createConsoleLogger({ sink });

    logger.info("Ready");

    expect(sink.info).toHaveBeenCalledWith("[VoiceStudio] Ready");
  });

  it("drops messages below the configured level", () => {
    const logger = createConsoleLogger({ level: "warn", sink });

    logger.debug("noise");
    logger.info("noise");
    logger.warn("careful");
    logger.error("broken");

    expect(sink.debug).not.toHaveBeenCalled();
    expect(sink.info).not.toHaveBeenCalled();
    expect(sink.warn).toHaveBeenCalledWith("[VoiceStudio] careful");
    expect(sink.error).toHaveBeenCalledWith("[VoiceStudio] broken");
  });

  it("nests child tags", () => {
    const logger = createConsoleLogger({ tag: "Studio", sink }).child("Batch");

    logger.info("Starting");

    expect(sink.info).toHaveBeenCalledWith("[Studio:Batch] Starting");
  });

  it("passes a non-empty context as a second argument", () => {
    const logger = createConsoleLogger({ sink });

    logger.warn("Clamped", { parameter: "speed" });
    logger.warn("Plain", {});

    expect(sink.warn).toHaveBeenNthCalledWith(1, "[VoiceStudio] Clamped", { parameter: "speed" });
    expect(sink.warn).toHaveBeenNthCalledWith(2, "[VoiceStudio] Plain");
  });

  it("emits nothing at the silent level", () => {
    const logger = createConsoleLogger({ level: "silent", sink });

    logger.error("ignored");

    expect(sink.error).not.toHaveBeenCalled();
  });
});

describe("silentLogger", () => {
  it("returns itself as a child", () => {
    expect(silentLogger.child("Any")).toBe(silentLogger);
  });
});
