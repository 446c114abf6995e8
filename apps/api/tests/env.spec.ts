import { describe, expect, it } from "vitest";
import { DEFAULT_INSTRUCTIONS, loadConfig } from "../src/config/env.js";
import { ConfigError } from "../src/utils/errors.js";

describe("loadConfig", () => {
  it("falls back to local development defaults", () => {
    const config = loadConfig({});

    expect(config).toEqual({
      PORT: 3001,
      HOST: "0.0.0.0",
      LOG_LEVEL: "info",
      VOICERAG_URL: "ws://localhost:8765/realtime",
      VOICERAG_INSTRUCTIONS: DEFAULT_INSTRUCTIONS,
      VOICERAG_CONNECT_TIMEOUT_MS: 10000,
      VOICERAG_REST_URL: "http://localhost:8765/",
      KNOWLEDGE_BASE_TIMEOUT_MS: 30000,
    });
  });

  it("treats empty values as unset", () => {
    const config = loadConfig({ PORT: "", VOICERAG_URL: "", ACS_BOT_ID: "" });

    expect(config.PORT).toBe(3001);
    expect(config.VOICERAG_URL).toBe("ws://localhost:8765/realtime");
    expect(config.ACS_BOT_ID).toBeUndefined();
  });

  it("coerces numeric settings", () => {
    const config = loadConfig({ PORT: "8080", KNOWLEDGE_BASE_TIMEOUT_MS: "5000" });

    expect(config.PORT).toBe(8080);
    expect(config.KNOWLEDGE_BASE_TIMEOUT_MS).toBe(5000);
  });

  it("lists every invalid setting", () => {
    let caught: unknown;
    try {
      loadConfig({ PORT: "abc", VOICERAG_URL: "not a url" });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigError);
    expect(caught).toMatchObject({
      issues: [expect.stringMatching(/^PORT: /), expect.stringMatching(/^VOICERAG_URL: /)],
    });
  });

  it("rejects a connection string without an endpoint and key", () => {
    expect(() => loadConfig({ ACS_CONNECTION_STRING: "not-a-connection-string" })).toThrow(ConfigError);
  });

  it("accepts a connection string with an endpoint and key", () => {
    const connectionString = "endpoint=https://example.communication.azure.com/;accesskey=test-secret";

    const config = loadConfig({ ACS_CONNECTION_STRING: connectionString, ACS_BOT_ID: "8:acs:bot" });

    expect(config.ACS_CONNECTION_STRING).toBe(connectionString);
    expect(config.ACS_BOT_ID).toBe("8:acs:bot");
  });
});
