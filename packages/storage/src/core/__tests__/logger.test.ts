import { afterEach, describe, expect, it, vi } from "vitest";
import { createLogger } from "../logger.js";

describe("createLogger", () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it("takes the level from LOG_LEVEL", () => {
    vi.stubEnv("LOG_LEVEL", "debug");
    expect(createLogger().level).toBe("debug");
  });

  it("falls back to info for an unknown level", () => {
    vi.stubEnv("LOG_LEVEL", "loud");
    expect(createLogger().level).toBe("info");
  });

  it("lets explicit options win", () => {
    vi.stubEnv("LOG_LEVEL", "debug");
    expect(createLogger({ level: "silent" }).level).toBe("silent");
  });
});
