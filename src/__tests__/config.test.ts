import { describe, expect, it } from "vitest";
import { GEMINI_OPENAI_BASE_URL, loadConfig } from "../config/env";
import { ConfigurationError } from "../utils/errors";

const credentials = {
  RELAY_API_TOKEN: "test-token",
  GEMINI_API_KEY: "test-key",
};

describe("loadConfig", () => {
  it("applies defaults", () => {
    expect(loadConfig(credentials)).toEqual({
      relayApiToken: "test-token",
      generation: {
        apiKey: "test-key",
        baseURL: GEMINI_OPENAI_BASE_URL,
        model: "gemini-2.5-flash",
        timeoutSeconds: 30,
      },
      rateLimit: { limit: 10, windowSeconds: 60, sweepIntervalSeconds: 300 },
      maxChunkLength: 4096,
      creatorName: "Rafsan Maruf",
      port: 3000,
      debug: false,
    });
  });

  it("reads overrides", () => {
    const config = loadConfig({
      ...credentials,
      RATE_LIMIT_PER_USER: "5",
      RATE_LIMIT_WINDOW: "120",
      MAX_MESSAGE_LENGTH: "2000",
      REQUEST_TIMEOUT: "10",
      DEBUG_MODE: "True",
      PORT: "8080",
    });

    expect(config.rateLimit).toMatchObject({ limit: 5, windowSeconds: 120 });
    expect(config.maxChunkLength).toBe(2000);
    expect(config.generation.timeoutSeconds).toBe(10);
    expect(config.debug).toBe(true);
    expect(config.port).toBe(8080);
  });

  it("treats blank values as unset", () => {
    expect(loadConfig({ ...credentials, RATE_LIMIT_PER_USER: "" }).rateLimit.limit).toBe(10);
  });

  it("requires both credentials", () => {
    let error: unknown;
    try {
      loadConfig({});
    } catch (err) {
      error = err;
    }

    expect(error).toBeInstanceOf(ConfigurationError);
    if (error instanceof ConfigurationError) {
      expect(error.issues).toEqual([
        "RELAY_API_TOKEN: RELAY_API_TOKEN is required",
        "GEMINI_API_KEY: GEMINI_API_KEY is required",
      ]);
    }
  });

  it("rejects non-positive or non-numeric limits", () => {
    expect(() => loadConfig({ ...credentials, RATE_LIMIT_PER_USER: "0" })).toThrow(
      ConfigurationError
    );
    expect(() => loadConfig({ ...credentials, RATE_LIMIT_WINDOW: "soon" })).toThrow(
      ConfigurationError
    );
    expect(() => loadConfig({ ...credentials, MAX_MESSAGE_LENGTH: "-1" })).toThrow(
      ConfigurationError
    );
  });
});
