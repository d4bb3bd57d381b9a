/**
 * Tests for environment configuration
 */
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

describe("config", () => {
  beforeEach(() => {
    vi.resetModules();
    vi.spyOn(process, "exit").mockImplementation(() => {
      throw new Error("process.exit");
    });
    vi.spyOn(console, "error").mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    vi.restoreAllMocks();
  });

  it("ignores a host application's LOG_LEVEL and NODE_ENV", async () => {
    vi.stubEnv("LOG_LEVEL", "warning");
    vi.stubEnv("NODE_ENV", "staging");

    const { config } = await import("../config.js");

    expect(process.exit).not.toHaveBeenCalled();
    expect(config.OCMF_LOG_LEVEL).toBe("silent");
    expect(config.OCMF_ENV).toBe("test");
  });

  it("defaults to production without OCMF_ENV", async () => {
    const previous = process.env["OCMF_ENV"];
    delete process.env["OCMF_ENV"];
    try {
      const { config } = await import("../config.js");

      expect(config.OCMF_ENV).toBe("production");
    } finally {
      if (previous !== undefined) {
        process.env["OCMF_ENV"] = previous;
      }
    }
  });

  it("exits on an invalid OCMF_LOG_LEVEL", async () => {
    vi.stubEnv("OCMF_LOG_LEVEL", "warning");

    await expect(import("../config.js")).rejects.toThrow("process.exit");
    expect(process.exit).toHaveBeenCalledWith(1);
  });
});
