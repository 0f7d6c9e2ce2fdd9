import type { Logger } from "pino";
import { ProviderError, ScoringError, isScoringError, type ProviderErrorCategory } from "../errors.js";
import { withRetry } from "../retry.js";
import { extractEmbeddedError, isRateLimitError, parseProviderResponse, type ParsedScore } from "./parser.js";
import { hashPrompt } from "./prompt.js";
import { logProvider } from "../../logging.js";

export interface ProviderClientOptions {
  apiKey: string;
  backupApiKey?: string;
  baseUrl: string;
  timeoutMs: number;
  maxTokens: number;
  temperature: number;
  retries: number;
  retryDelayMs: number;
  fetchImpl?: typeof fetch;
  log?: Logger;
}

export interface ProviderResult extends ParsedScore {
  model: string;
  promptHash: string;
  /** Message body with credentials redacted */
  rawResponse: string;
  latencyMs: number;
}

/** Anything that can turn (model, prompt) into a bias judgment. */
export interface Scorer {
  score(model: string, prompt: string, signal?: AbortSignal): Promise<ProviderResult>;
}

type Attempt =
  | { kind: "ok"; result: ProviderResult }
  | { kind: "rate_limited"; error: ProviderError };

const KEY_PATTERN = /(sk-|or-)[A-Za-z0-9]{20,}/g;

export function redactKeys(text: string): string {
  return text.replace(KEY_PATTERN, "[REDACTED]");
}

export function chatCompletionsUrl(baseUrl: string): string {
  const trimmed = baseUrl.replace(/\/+$/, "");
  return trimmed.endsWith("/chat/completions") ? trimmed : `${trimmed}/chat/completions`;
}

function parseRetryAfter(header: string | null): number | undefined {
  if (!header) return undefined;
  const seconds = parseInt(header, 10);
  return Number.isFinite(seconds) && seconds > 0 ? seconds : undefined;
}

function categorize(status: number, message: string): ProviderErrorCategory {
  if (status === 429) return "RateLimit";
  if (status === 401 || status === 403) return "Authentication";
  if (status === 402) return "InsufficientCredits";
  const lower = message.toLowerCase();
  if (lower.includes("stream") || lower.includes("sse")) return "Streaming";
  return "Unknown";
}

const MESSAGE_PREFIX: Record<ProviderErrorCategory, string> = {
  RateLimit: "LLM rate limit exceeded: ",
  Authentication: "LLM authentication failed: ",
  InsufficientCredits: "LLM credits exhausted: ",
  Streaming: "LLM streaming failed: ",
  Unknown: "LLM service error: ",
};

function providerError(status: number, message: string, retryAfter?: number): ProviderError {
  const category = categorize(status, message);
  return new ProviderError(category, status, MESSAGE_PREFIX[category] + message, { retryAfter });
}

/**
 * Abort when either the per-call timeout elapses or the caller's signal
 * fires. `dispose` must run once the call settles.
 */
function linkSignals(timeoutMs: number, outer?: AbortSignal) {
  const controller = new AbortController();
  let timedOut = false;
  const timer = setTimeout(() => {
    timedOut = true;
    controller.abort();
  }, timeoutMs);
  const onAbort = () => controller.abort();
  outer?.addEventListener("abort", onAbort, { once: true });
  return {
    signal: controller.signal,
    timedOut: () => timedOut,
    dispose: () => {
      clearTimeout(timer);
      outer?.removeEventListener("abort", onAbort);
    },
  };
}

/**
 * Client for an OpenAI-compatible chat-completions endpoint.
 *
 * A rate-limited primary key falls back to the backup key once. When both
 * are limited (or there is no backup) the call fails with
 * BothLLMKeysRateLimited, which is never retried here. Other failures are
 * retried with linear backoff and then surface as ProviderError.
 */
export class ProviderClient implements Scorer {
  private readonly url: string;
  private readonly fetchImpl: typeof fetch;
  private readonly log: Logger;

  constructor(private readonly opts: ProviderClientOptions) {
    this.url = chatCompletionsUrl(opts.baseUrl);
    this.fetchImpl = opts.fetchImpl ?? globalThis.fetch;
    this.log = opts.log ?? logProvider;
  }

  get hasBackupKey(): boolean {
    return Boolean(this.opts.backupApiKey);
  }

  async score(model: string, prompt: string, signal?: AbortSignal): Promise<ProviderResult> {
    const promptHash = hashPrompt(prompt);
    return withRetry(() => this.scoreOnce(model, prompt, promptHash, signal), {
      retries: this.opts.retries,
      delayMs: this.opts.retryDelayMs,
      label: `LLM call ${model}`,
      shouldRetry: (err) => !isScoringError(err, "BothLLMKeysRateLimited") && !isScoringError(err, "Cancelled"),
      signal,
      log: this.log,
    });
  }

  private async scoreOnce(
    model: string,
    prompt: string,
    promptHash: string,
    signal?: AbortSignal,
  ): Promise<ProviderResult> {
    const primary = await this.call(model, prompt, promptHash, this.opts.apiKey, signal);
    if (primary.kind === "ok") return primary.result;

    const backupKey = this.opts.backupApiKey;
    if (!backupKey) {
      this.log.warn({ model }, "Rate limited on primary key, no backup key configured");
      throw new ScoringError("BothLLMKeysRateLimited", undefined, { cause: primary.error });
    }

    this.log.warn({ model }, "Rate limited on primary key, retrying with backup key");
    const backup = await this.call(model, prompt, promptHash, backupKey, signal);
    if (backup.kind === "ok") return backup.result;

    this.log.error({ model, retryAfter: backup.error.retryAfter }, "Rate limited on both keys");
    throw new ScoringError("BothLLMKeysRateLimited", undefined, { cause: backup.error });
  }

  private async call(
    model: string,
    prompt: string,
    promptHash: string,
    apiKey: string,
    signal?: AbortSignal,
  ): Promise<Attempt> {
    if (signal?.aborted) throw new ScoringError("Cancelled");

    const started = Date.now();
    const linked = linkSignals(this.opts.timeoutMs, signal);
    let status: number;
    let retryAfterHeader: string | null;
    let body: string;
    try {
      const res = await this.fetchImpl(this.url, {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
          Authorization: `Bearer ${apiKey}`,
        },
        body: JSON.stringify({
          model,
          messages: [{ role: "user", content: prompt }],
          max_tokens: this.opts.maxTokens,
          temperature: this.opts.temperature,
        }),
        signal: linked.signal,
      });
      status = res.status;
      retryAfterHeader = res.headers.get("retry-after");
      body = await res.text();
    } catch (e: unknown) {
      if (signal?.aborted) throw new ScoringError("Cancelled", undefined, { cause: e });
      const message = linked.timedOut()
        ? `request timed out after ${this.opts.timeoutMs}ms`
        : `request failed: ${e instanceof Error ? e.message : String(e)}`;
      throw new ProviderError("Unknown", 0, MESSAGE_PREFIX.Unknown + message, { cause: e });
    } finally {
      linked.dispose();
    }

    const latencyMs = Date.now() - started;
    const retryAfter = parseRetryAfter(retryAfterHeader);
    this.log.debug({ model, status, latencyMs, promptHash, body: redactKeys(body).slice(0, 500) }, "LLM response");

    if (status === 429) {
      const embedded = extractEmbeddedError(body);
      return { kind: "rate_limited", error: providerError(429, embedded?.message || "Too Many Requests", retryAfter) };
    }

    const embedded = extractEmbeddedError(body);
    if (embedded) {
      if (isRateLimitError(embedded)) {
        return { kind: "rate_limited", error: providerError(429, embedded.message, retryAfter) };
      }
      const code = typeof embedded.code === "number" ? embedded.code : parseInt(embedded.code ?? "", 10);
      const effective = status >= 400 ? status : Number.isFinite(code) ? code : status;
      throw providerError(effective, embedded.message || `HTTP ${status}`, retryAfter);
    }

    if (status >= 400) {
      const message = body.trim() ? redactKeys(body).slice(0, 200) : `HTTP ${status}`;
      throw providerError(status, message, retryAfter);
    }

    const parsed = parseProviderResponse(body);
    if (!parsed.ok) {
      this.log.warn({ model, reason: parsed.reason }, "Unusable LLM response");
      throw new ProviderError("Unknown", status, `${MESSAGE_PREFIX.Unknown}${parsed.reason}`);
    }

    return {
      kind: "ok",
      result: {
        ...parsed.value,
        model,
        promptHash,
        rawResponse: redactKeys(body),
        latencyMs,
      },
    };
  }
}
