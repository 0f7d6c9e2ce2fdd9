import { describe, it, expect } from "vitest";
import { validateConfig } from "../config-validator.js";
import { loadConfig, type AppConfig } from "../config.js";

function validConfig(): AppConfig {
  return loadConfig({ LLM_API_KEY: "test-key", LLM_API_KEY_SECONDARY: "test-backup" });
}

describe("validateConfig", () => {
  it("passes a valid config", () => {
    const result = validateConfig(validConfig());
    expect(result.errors).toEqual([]);
    expect(result.warnings).toEqual([]);
  });

  it("rejects a non-positive timeout", () => {
    const cfg = validConfig();
    cfg.llm.timeoutMs = 0;
    expect(validateConfig(cfg).errors).toContain("llm.timeoutMs must be positive, got 0");
  });

  it("rejects negative or fractional retry settings", () => {
    const cfg = validConfig();
    cfg.llm.retries = -1;
    cfg.llm.retryDelayMs = 1.5;
    expect(validateConfig(cfg).errors).toEqual([
      "llm.retries must be a non-negative integer, got -1",
      "llm.retryDelayMs must be a non-negative integer, got 1.5",
    ]);
  });

  it("rejects NaN coming from a malformed variable", () => {
    const cfg = loadConfig({ LLM_API_KEY: "test-key", LLM_MAX_TOKENS: "many" });
    expect(validateConfig(cfg).errors).toEqual(["llm.maxTokens must be positive, got NaN"]);
  });

  it("requires at least one attempt and one valid response", () => {
    const cfg = validConfig();
    cfg.ensemble.maxAttempts = 0;
    cfg.ensemble.minValid = 0;
    expect(validateConfig(cfg).errors).toEqual([
      "ensemble.maxAttempts must be at least 1, got 0",
      "ensemble.minValid must be at least 1, got 0",
    ]);
  });

  it("bounds the confidence threshold to [0, 1]", () => {
    const cfg = validConfig();
    cfg.ensemble.confidenceThreshold = 1.2;
    expect(validateConfig(cfg).errors).toContain("ensemble.confidenceThreshold must be between 0 and 1, got 1.2");

    cfg.ensemble.confidenceThreshold = 1;
    expect(validateConfig(cfg).errors).toEqual([]);
  });

  it("bounds maxConcurrent to 1-20", () => {
    const cfg = validConfig();
    cfg.ensemble.maxConcurrent = 21;
    expect(validateConfig(cfg).errors).toContain("ensemble.maxConcurrent must be between 1 and 20, got 21");
  });

  it("rejects a non-positive cleanup interval", () => {
    const cfg = validConfig();
    cfg.progress.cleanupIntervalMs = -5;
    expect(validateConfig(cfg).errors).toContain("progress.cleanupIntervalMs must be positive, got -5");
  });

  it("warns when no API key is set", () => {
    const result = validateConfig(loadConfig({}));
    expect(result.errors).toEqual([]);
    expect(result.warnings).toEqual(["LLM_API_KEY is not set; every provider call will fail authentication"]);
  });

  it("warns when the backup key equals the primary key", () => {
    const cfg = loadConfig({ LLM_API_KEY: "test-key", LLM_API_KEY_SECONDARY: "test-key" });
    expect(validateConfig(cfg).warnings).toEqual([
      "LLM_API_KEY_SECONDARY equals LLM_API_KEY; rate-limit fallback will not help",
    ]);
  });
});
