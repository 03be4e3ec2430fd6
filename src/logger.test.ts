import { describe, it, expect } from "vitest";
import { createLogger, createSilentLogger } from "./logger.js";

describe("createLogger", () => {
  it("creates a logger with the configured level", () => {
    const logger = createLogger({ logLevel: "debug", pretty: false });
    expect(logger.level).toBe("debug");
  });

  it("child loggers inherit the level", () => {
    const logger = createLogger({ logLevel: "error", pretty: false });
    expect(logger.child({ component: "agent-client" }).level).toBe("error");
  });
});

describe("createSilentLogger", () => {
  it("logs nothing", () => {
    expect(createSilentLogger().level).toBe("silent");
  });
});
