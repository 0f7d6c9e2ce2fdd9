export type ScoringErrorKind =
  | "AllScoresZeroConfidence"
  | "AllPerspectivesInvalid"
  | "BothLLMKeysRateLimited"
  | "Provider"
  | "Persistence"
  | "NoValidResponses"
  | "InvalidConfig"
  | "Cancelled"
  | "NotFound";

const DEFAULT_MESSAGES: Record<ScoringErrorKind, string> = {
  AllScoresZeroConfidence: "all scores have zero confidence",
  AllPerspectivesInvalid: "all perspectives invalid",
  BothLLMKeysRateLimited: "rate limited on both keys",
  Provider: "LLM provider error",
  Persistence: "persistence failure",
  NoValidResponses: "no valid high-confidence LLM responses from any model",
  InvalidConfig: "invalid configuration",
  Cancelled: "operation cancelled",
  NotFound: "not found",
};

export class ScoringError extends Error {
  readonly kind: ScoringErrorKind;

  constructor(kind: ScoringErrorKind, message?: string, options?: { cause?: unknown }) {
    super(message ?? DEFAULT_MESSAGES[kind], options);
    this.name = "ScoringError";
    this.kind = kind;
  }
}

/**
 * Type guard for scoring errors, optionally narrowed to one kind.
 * Follows `cause` chains so wrapped errors are still recognised.
 */
export function isScoringError<K extends ScoringErrorKind>(
  err: unknown,
  kind?: K,
): err is ScoringError & { kind: K } {
  let current: unknown = err;
  for (let depth = 0; depth < 8 && current instanceof Error; depth++) {
    if (current instanceof ScoringError && (kind === undefined || current.kind === kind)) {
      return true;
    }
    current = current.cause;
  }
  return false;
}

// ── Provider errors ──────────────────────────────────────────────────────

export type ProviderErrorCategory =
  | "RateLimit"
  | "Authentication"
  | "InsufficientCredits"
  | "Streaming"
  | "Unknown";

export interface ProviderErrorDetails {
  type: ProviderErrorCategory;
  status_code: number;
  message: string;
  retry_after?: number;
}

export class ProviderError extends ScoringError {
  readonly category: ProviderErrorCategory;
  readonly statusCode: number;
  /** Seconds, from the provider's Retry-After header */
  readonly retryAfter?: number;

  constructor(
    category: ProviderErrorCategory,
    statusCode: number,
    message: string,
    opts: { retryAfter?: number; cause?: unknown } = {},
  ) {
    super("Provider", message, { cause: opts.cause });
    this.name = "ProviderError";
    this.category = category;
    this.statusCode = statusCode;
    this.retryAfter = opts.retryAfter;
  }

  details(): ProviderErrorDetails {
    const details: ProviderErrorDetails = {
      type: this.category,
      status_code: this.statusCode,
      message: this.message,
    };
    if (this.retryAfter !== undefined && this.retryAfter > 0) details.retry_after = this.retryAfter;
    return details;
  }
}

/** Find the first ProviderError in a cause chain. */
export function findProviderError(err: unknown): ProviderError | null {
  let current: unknown = err;
  for (let depth = 0; depth < 8 && current instanceof Error; depth++) {
    if (current instanceof ProviderError) return current;
    current = current.cause;
  }
  return null;
}

// ── Persistence errors ───────────────────────────────────────────────────

export type PersistenceStep = "begin" | "insert" | "update" | "commit";

export class PersistenceError extends ScoringError {
  readonly step: PersistenceStep;

  constructor(step: PersistenceStep, message: string, cause?: unknown) {
    super("Persistence", message, { cause });
    this.name = "PersistenceError";
    this.step = step;
  }
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
