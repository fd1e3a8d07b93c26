import { describe, it, expect, beforeEach, afterEach } from "@jest/globals";
import {
  ConfigurationError,
  DEFAULT_SCHEMA_CACHE_DIR,
  getConfig,
  loadConfig,
  resetConfig,
} from "../../src/config/index.js";

describe("loadConfig", () => {
  const originalEnv = { ...process.env };

  beforeEach(() => {
    resetConfig();
  });

  afterEach(() => {
    process.env = { ...originalEnv };
    resetConfig();
  });

  it("applies defaults", () => {
    delete process.env["GRAPHQL_RETRY_ATTEMPTS"];
    delete process.env["RATE_LIMIT_MAX_CALLS"];
    delete process.env["SCHEMA_CACHE_DIR"];
    delete process.env["SCHEMA_CACHE_ENABLED"];
    delete process.env["SDK_SKIP_CHECKS"];

    const config = loadConfig();

    expect(config.graphql.apiKey).toBe("test-secret");
    expect(config.graphql.clientName).toBe("typescript-sdk");
    expect(config.graphql.retryAttempts).toBe(10);
    expect(config.graphql.verifyTls).toBe(true);
    expect(config.rateLimit).toEqual({ maxCalls: 250, windowMs: 60_000, maxWaitMs: 300_000 });
    expect(config.schemaCache).toEqual({ enabled: true, directory: DEFAULT_SCHEMA_CACHE_DIR });
    expect(config.subscription.maxReconnects).toBe(10);
    expect(config.skipChecks).toBe(false);
  });

  it("reads overrides from the environment", () => {
    process.env["API_CLIENT_NAME"] = "typescript-cli";
    process.env["GRAPHQL_VERIFY_TLS"] = "false";
    process.env["RATE_LIMIT_MAX_CALLS"] = "5";
    process.env["SCHEMA_CACHE_ENABLED"] = "false";
    process.env["SDK_SKIP_CHECKS"] = "1";

    const config = loadConfig();

    expect(config.graphql.clientName).toBe("typescript-cli");
    expect(config.graphql.verifyTls).toBe(false);
    expect(config.rateLimit.maxCalls).toBe(5);
    expect(config.schemaCache.enabled).toBe(false);
    expect(config.skipChecks).toBe(true);
  });

  it("rejects an unknown client name", () => {
    process.env["API_CLIENT_NAME"] = "browser";

    expect(() => loadConfig()).toThrow(ConfigurationError);
  });

  it("rejects a non-http endpoint", () => {
    process.env["API_ENDPOINT"] = "ftp://example.test/graphql";

    expect(() => loadConfig()).toThrow("Endpoint must be an http(s) URL");
  });

  it("rejects non-positive numbers", () => {
    process.env["GRAPHQL_TIMEOUT_MS"] = "-5";

    expect(() => loadConfig()).toThrow("Number must be positive: -5");
  });

  it("rejects a wait budget shorter than the window", () => {
    process.env["RATE_LIMIT_WINDOW_MS"] = "60000";
    process.env["RATE_LIMIT_MAX_WAIT_MS"] = "1000";

    expect(() => loadConfig()).toThrow("Max wait must be >= the rate limit window");
  });

  it("memoizes until reset", () => {
    const first = getConfig();
    expect(getConfig()).toBe(first);

    resetConfig();
    expect(getConfig()).not.toBe(first);
  });
});
