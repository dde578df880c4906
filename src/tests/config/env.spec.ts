import { describe, expect, it } from "vitest";
import { loadConfig } from "../../config/env";

describe("loadConfig", () => {
  it("applies defaults", () => {
    const config = loadConfig({});

    expect(config.port).toBe(3000);
    expect(config.fanout).toEqual({
      maxSources: 5,
      maxConcurrency: 5,
      perSourceTimeoutSeconds: 10,
      overallTimeoutSeconds: 20,
      earlyStopThreshold: 2,
      substantialLength: 100
    });
    expect(config.cache).toEqual({ maxEntries: 200, ttlSeconds: 3600 });
    expect(config.credentials.wolframAppId).toBeUndefined();
  });

  it("reads overrides and treats blank credentials as missing", () => {
    const config = loadConfig({ FANOUT_MAX_SOURCES: "3", GOOGLE_API_KEY: "test-secret", WOLFRAM_APP_ID: "  " });

    expect(config.fanout.maxSources).toBe(3);
    expect(config.credentials.googleApiKey).toBe("test-secret");
    expect(config.credentials.wolframAppId).toBeUndefined();
  });

  it("rejects malformed numbers", () => {
    expect(() => loadConfig({ FANOUT_OVERALL_TIMEOUT_SECONDS: "soon" })).toThrow("Invalid environment configuration");
  });
});
