import dotenv from "dotenv";

type Env = Record<string, string | undefined>;

function int(env: Env, key: string, fallback: number): number {
  return parseInt(env[key] ?? String(fallback), 10);
}

function float(env: Env, key: string, fallback: number): number {
  return parseFloat(env[key] ?? String(fallback));
}

/**
 * Build the process configuration from environment variables.
 * Called once at startup; components receive the slices they need.
 */
export function loadConfig(env: Env = process.env) {
  return {
    llm: {
      apiKey: env.LLM_API_KEY ?? "",
      backupApiKey: env.LLM_API_KEY_SECONDARY ?? "",
      baseUrl: env.LLM_BASE_URL ?? "https://openrouter.ai/api/v1",
      timeoutMs: int(env, "LLM_TIMEOUT_MS", 30_000),
      maxTokens: int(env, "LLM_MAX_TOKENS", 300),
      temperature: float(env, "LLM_TEMPERATURE", 0.7),
      retries: int(env, "LLM_RETRIES", 2),
      retryDelayMs: int(env, "LLM_RETRY_DELAY_MS", 1000),
    },
    ensemble: {
      maxAttempts: int(env, "ENSEMBLE_MAX_ATTEMPTS", 6),
      minValid: int(env, "ENSEMBLE_MIN_VALID", 1),
      confidenceThreshold: float(env, "ENSEMBLE_CONFIDENCE_THRESHOLD", 0.5),
      maxConcurrent: int(env, "ENSEMBLE_MAX_CONCURRENT", 1),
    },
    progress: {
      cleanupIntervalMs: int(env, "PROGRESS_CLEANUP_INTERVAL_MS", 60_000),
    },
    scoring: {
      compositeConfigPath: env.COMPOSITE_CONFIG_PATH ?? "configs/composite-score.json",
      biasViewTtlMs: int(env, "BIAS_VIEW_TTL_MS", 30_000),
    },
    db: {
      path: env.DB_PATH ?? "data/scores.db",
    },
  };
}

export type AppConfig = ReturnType<typeof loadConfig>;

/** Load `.env` into process.env, then build the config. */
export function loadConfigFromEnvFile(): AppConfig {
  dotenv.config();
  return loadConfig(process.env);
}
