import { describe, test, expect } from "vitest";
import { loadConfig } from "./env";

const required = {
  PROVIDER_URL: "https://provider.test/v1/",
  DEFAULT_MODEL: "test-model",
};

describe("loadConfig", () => {
  test("applies defaults", () => {
    expect(loadConfig(required)).toEqual({
      PORT: 3000,
      PROVIDER_URL: "https://provider.test/v1",
      DEFAULT_MODEL: "test-model",
      FALLBACK_API_KEY: undefined,
      MAX_PLUGIN_TOKENS: 2000,
      CORS_ORIGIN: "*",
      CORS_METHODS: "POST, OPTIONS",
      CORS_HEADERS: "Content-Type, Authorization, HTTP-Referer, X-Title",
      HTTP_REFERER: "http://localhost",
      PROXY_TITLE: "Datetime Tidy Proxy",
    });
  });

  test("reads overrides", () => {
    const config = loadConfig({
      ...required,
      PORT: "8080",
      MAX_PLUGIN_TOKENS: "50",
      FALLBACK_API_KEY: "test-secret",
      CORS_ORIGIN: "https://app.test",
    });

    expect(config.PORT).toBe(8080);
    expect(config.MAX_PLUGIN_TOKENS).toBe(50);
    expect(config.FALLBACK_API_KEY).toBe("test-secret");
    expect(config.CORS_ORIGIN).toBe("https://app.test");
  });

  test("lists every missing required variable", () => {
    expect(() => loadConfig({})).toThrow("Missing required environment variables: PROVIDER_URL, DEFAULT_MODEL");
    expect(() => loadConfig({ PROVIDER_URL: "https://provider.test" })).toThrow("Missing required environment variables: DEFAULT_MODEL");
  });

  test("rejects non-numeric ports", () => {
    expect(() => loadConfig({ ...required, PORT: "eighty" })).toThrow("Invalid numeric environment variable: PORT");
  });
});
