import { describe, expect, it } from "vitest";
import { loadConfig } from "../../src/config.js";

describe("config.ts", () => {
  it("should apply defaults to an empty environment", () => {
    expect(loadConfig({})).toEqual({
      baseUrl: undefined,
      requestTimeoutMs: 12000,
      retryMax: 2,
      retryBaseMs: 250,
      maxPages: 20,
      logLevel: "info",
      logFile: undefined
    });
  });

  it("should coerce numbers and strip the trailing slash of the base URL", () => {
    const config = loadConfig({
      JSONAPI_BASE_URL: "https://api.example.com/v1/",
      JSONAPI_RETRY_MAX: "5",
      JSONAPI_MAX_PAGES: "3",
      LOG_LEVEL: "debug"
    });

    expect(config.baseUrl).toBe("https://api.example.com/v1");
    expect(config.retryMax).toBe(5);
    expect(config.maxPages).toBe(3);
    expect(config.logLevel).toBe("debug");
  });

  it("should treat blank values as unset", () => {
    const config = loadConfig({ JSONAPI_BASE_URL: "  ", LOG_FILE: "" });
    expect(config.baseUrl).toBeUndefined();
    expect(config.logFile).toBeUndefined();
  });

  it("should name the invalid fields", () => {
    expect(() => loadConfig({ JSONAPI_RETRY_MAX: "20" })).toThrow(/^Invalid configuration: JSONAPI_RETRY_MAX: /);
    expect(() => loadConfig({ JSONAPI_BASE_URL: "not a url" })).toThrow(/JSONAPI_BASE_URL/);
  });
});
