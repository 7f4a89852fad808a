import { describe, it, expect } from "vitest";
import { loadConfig } from "../config.js";

describe("loadConfig", () => {
  it("applies defaults", () => {
    expect(loadConfig({})).toEqual({
      port: 5000,
      env: "development",
      allowedOrigins: [
        "http://localhost:3000",
        "http://localhost:5173",
        "http://localhost:5174",
        "http://localhost:8080",
      ],
      model: {
        apiKey: undefined,
        model: "gemini-2.5-flash",
        endpoint: "https://generativelanguage.googleapis.com/v1beta",
        timeoutMs: 10_000,
      },
      generationLogLimit: 100,
    });
  });

  it("reads overrides", () => {
    const config = loadConfig({
      PORT: "8081",
      NODE_ENV: "production",
      ALLOWED_ORIGINS: "https://rehab.example, https://admin.rehab.example,",
      MODEL_API_KEY: "test-key",
      MODEL_NAME: "gemini-2.0-flash",
      MODEL_ENDPOINT: "https://model.test/v1/",
      MODEL_TIMEOUT_MS: "2500",
      GENERATION_LOG_LIMIT: "5",
    });

    expect(config.port).toBe(8081);
    expect(config.env).toBe("production");
    expect(config.allowedOrigins).toEqual(["https://rehab.example", "https://admin.rehab.example"]);
    expect(config.model).toEqual({
      apiKey: "test-key",
      model: "gemini-2.0-flash",
      endpoint: "https://model.test/v1",
      timeoutMs: 2500,
    });
    expect(config.generationLogLimit).toBe(5);
  });

  it("allows no origins outside development by default", () => {
    expect(loadConfig({ NODE_ENV: "production" }).allowedOrigins).toEqual([]);
  });

  it("treats an empty API key as unset", () => {
    expect(loadConfig({ MODEL_API_KEY: "" }).model.apiKey).toBeUndefined();
  });

  it("lists invalid variables", () => {
    expect(() => loadConfig({ PORT: "http", MODEL_TIMEOUT_MS: "-1" })).toThrow(/^Invalid configuration: PORT: .*, MODEL_TIMEOUT_MS: /);
  });
});
