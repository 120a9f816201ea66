import { describe, it, expect, afterEach, vi } from "vitest";
import { getConfig, _resetConfigCache, DEFAULT_ALLOWED_ORIGINS } from "../../src/config/index.js";

describe("config", () => {
  afterEach(() => {
    vi.unstubAllEnvs();
    _resetConfigCache();
  });

  it("applies defaults when variables are unset", () => {
    vi.stubEnv("PORT", "");
    vi.stubEnv("USERS_CSV_PATH", "");
    vi.stubEnv("ALLOWED_ORIGINS", "");
    vi.stubEnv("GLOBAL_RATE_LIMIT_RPM", "");
    vi.stubEnv("INFO_SAMPLE_RATE", "");
    vi.stubEnv("LOG_STACK", "");

    const config = getConfig();
    expect(config.server.port).toBe(5000);
    expect(config.data.usersCsvPath).toBe("data/mock_user_data.csv");
    expect(config.cors.allowedOrigins).toEqual(DEFAULT_ALLOWED_ORIGINS);
    expect(config.rateLimits.defaultRpm).toBe(120);
    expect(config.observability.infoSampleRate).toBe(0.1);
    expect(config.observability.logStack).toBe(false);
  });

  it("reads and coerces environment variables", () => {
    vi.stubEnv("PORT", "8080");
    vi.stubEnv("USERS_CSV_PATH", "/data/users.csv");
    vi.stubEnv("ALLOWED_ORIGINS", "https://a.test, https://b.test,,");
    vi.stubEnv("LOG_STACK", "true");
    vi.stubEnv("INFO_SAMPLE_RATE", "1");

    const config = getConfig();
    expect(config.server.port).toBe(8080);
    expect(config.data.usersCsvPath).toBe("/data/users.csv");
    expect(config.cors.allowedOrigins).toEqual(["https://a.test", "https://b.test"]);
    expect(config.observability.logStack).toBe(true);
    expect(config.observability.infoSampleRate).toBe(1);
  });

  it("reads the Datadog agent settings", () => {
    vi.stubEnv("NODE_ENV", "test");
    vi.stubEnv("DD_AGENT_HOST", "statsd.internal");
    vi.stubEnv("DD_AGENT_PORT", "9125");
    vi.stubEnv("DD_SERVICE", "");
    vi.stubEnv("DD_ENV", "staging");

    expect(getConfig().datadog).toEqual({
      agentHost: "statsd.internal",
      agentPort: 9125,
      service: "personalization-recommendation-service",
      env: "staging",
    });
  });

  it("leaves Datadog disabled without an agent host", () => {
    vi.stubEnv("DD_AGENT_HOST", "");
    vi.stubEnv("DD_AGENT_PORT", "");

    const { datadog } = getConfig();
    expect(datadog.agentHost).toBeUndefined();
    expect(datadog.agentPort).toBe(8125);
  });

  it("rejects a non-numeric Datadog port", () => {
    vi.stubEnv("DD_AGENT_PORT", "statsd");
    expect(() => getConfig()).toThrow(/Invalid configuration.*datadog\.agentPort/);
  });

  it("caches until reset", () => {
    vi.stubEnv("PORT", "6000");
    expect(getConfig().server.port).toBe(6000);
    vi.stubEnv("PORT", "6001");
    expect(getConfig().server.port).toBe(6000);
    _resetConfigCache();
    expect(getConfig().server.port).toBe(6001);
  });

  it("rejects invalid values", () => {
    vi.stubEnv("PORT", "not-a-port");
    expect(() => getConfig()).toThrow(/Invalid configuration.*server\.port/);
  });

  it("rejects a wildcard origin in production", () => {
    vi.stubEnv("NODE_ENV", "production");
    vi.stubEnv("ALLOWED_ORIGINS", "*");
    expect(() => getConfig()).toThrow("ALLOWED_ORIGINS cannot contain '*' in production");
  });

  it("allows a wildcard origin outside production", () => {
    vi.stubEnv("NODE_ENV", "development");
    vi.stubEnv("ALLOWED_ORIGINS", "*");
    expect(getConfig().cors.allowedOrigins).toEqual(["*"]);
  });
});
