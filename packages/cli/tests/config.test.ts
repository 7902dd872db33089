import { describe, it, expect } from "vitest";
import { ValidationError } from "@linkvault/types";
import { loadConfig } from "../src/config.js";

describe("loadConfig", () => {
  it("applies defaults", () => {
    expect(loadConfig({})).toEqual({
      LINKVAULT_API_URL: "http://127.0.0.1:8787",
      LINKVAULT_HTTP_TIMEOUT_MS: 15000,
      LINKVAULT_RETRY_ATTEMPTS: 3,
      LINKVAULT_RETRY_BASE_MS: 500,
      LINKVAULT_KDF_COST: 32768,
      LINKVAULT_AUTO_RECONCILE: true,
      LOG_LEVEL: "warn",
      NODE_ENV: "production",
    });
  });

  it("parses overrides", () => {
    const config = loadConfig({
      LINKVAULT_API_URL: "https://market.example",
      LINKVAULT_API_KEY: "test-secret",
      LINKVAULT_KDF_COST: "1024",
      LINKVAULT_AUTO_RECONCILE: "0",
      LOG_LEVEL: "debug",
    });
    expect(config.LINKVAULT_API_URL).toBe("https://market.example");
    expect(config.LINKVAULT_API_KEY).toBe("test-secret");
    expect(config.LINKVAULT_KDF_COST).toBe(1024);
    expect(config.LINKVAULT_AUTO_RECONCILE).toBe(false);
    expect(config.LOG_LEVEL).toBe("debug");
  });

  it("names the invalid variable", () => {
    expect(() => loadConfig({ LINKVAULT_RETRY_ATTEMPTS: "0" })).toThrow(
      "Invalid configuration: LINKVAULT_RETRY_ATTEMPTS: Number must be greater than or equal to 1",
    );
  });

  it("rejects a cost that is not a power of two", () => {
    expect(() => loadConfig({ LINKVAULT_KDF_COST: "3000" })).toThrow(ValidationError);
  });

  it("rejects a malformed URL", () => {
    expect(() => loadConfig({ LINKVAULT_API_URL: "not a url" })).toThrow(ValidationError);
  });
});
