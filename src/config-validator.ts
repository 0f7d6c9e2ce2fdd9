import type { AppConfig } from "./config.js";

/**
 * Validation result with errors (fatal) and warnings (non-fatal).
 */
export interface ValidationResult {
  errors: string[];
  warnings: string[];
}

/**
 * Validates configuration values.
 *
 * Checks:
 * - llm.timeoutMs is positive
 * - llm.retries and llm.retryDelayMs are non-negative integers
 * - llm.maxTokens is positive
 * - ensemble.maxAttempts and ensemble.minValid are at least 1
 * - ensemble.confidenceThreshold is in [0, 1]
 * - ensemble.maxConcurrent is in valid range (1-20)
 * - progress.cleanupIntervalMs is positive
 * - A primary API key is configured (warning)
 * - The backup API key differs from the primary (warning)
 */
export function validateConfig(cfg: AppConfig): ValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];

  if (!isPositive(cfg.llm.timeoutMs)) {
    errors.push(`llm.timeoutMs must be positive, got ${cfg.llm.timeoutMs}`);
  }

  if (!Number.isInteger(cfg.llm.retries) || cfg.llm.retries < 0) {
    errors.push(`llm.retries must be a non-negative integer, got ${cfg.llm.retries}`);
  }

  if (!Number.isInteger(cfg.llm.retryDelayMs) || cfg.llm.retryDelayMs < 0) {
    errors.push(`llm.retryDelayMs must be a non-negative integer, got ${cfg.llm.retryDelayMs}`);
  }

  if (!isPositive(cfg.llm.maxTokens)) {
    errors.push(`llm.maxTokens must be positive, got ${cfg.llm.maxTokens}`);
  }

  if (!Number.isInteger(cfg.ensemble.maxAttempts) || cfg.ensemble.maxAttempts < 1) {
    errors.push(`ensemble.maxAttempts must be at least 1, got ${cfg.ensemble.maxAttempts}`);
  }

  if (!Number.isInteger(cfg.ensemble.minValid) || cfg.ensemble.minValid < 1) {
    errors.push(`ensemble.minValid must be at least 1, got ${cfg.ensemble.minValid}`);
  }

  if (!isValidThreshold(cfg.ensemble.confidenceThreshold)) {
    errors.push(`ensemble.confidenceThreshold must be between 0 and 1, got ${cfg.ensemble.confidenceThreshold}`);
  }

  if (!Number.isInteger(cfg.ensemble.maxConcurrent) || cfg.ensemble.maxConcurrent < 1 || cfg.ensemble.maxConcurrent > 20) {
    errors.push(`ensemble.maxConcurrent must be between 1 and 20, got ${cfg.ensemble.maxConcurrent}`);
  }

  if (!isPositive(cfg.progress.cleanupIntervalMs)) {
    errors.push(`progress.cleanupIntervalMs must be positive, got ${cfg.progress.cleanupIntervalMs}`);
  }

  if (!cfg.llm.apiKey) {
    warnings.push("LLM_API_KEY is not set; every provider call will fail authentication");
  } else if (cfg.llm.backupApiKey && cfg.llm.backupApiKey === cfg.llm.apiKey) {
    warnings.push("LLM_API_KEY_SECONDARY equals LLM_API_KEY; rate-limit fallback will not help");
  }

  return { errors, warnings };
}

function isPositive(n: number): boolean {
  return Number.isFinite(n) && n > 0;
}

function isValidThreshold(n: number): boolean {
  return Number.isFinite(n) && n >= 0 && n <= 1;
}
