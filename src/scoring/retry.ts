import type { Logger } from "pino";
import { ScoringError } from "./errors.js";
import { logger } from "../logging.js";

/** Resolve after `ms`, or reject with Cancelled as soon as `signal` aborts. */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) return Promise.reject(new ScoringError("Cancelled"));
  return new Promise((resolve, reject) => {
    const onAbort = () => {
      clearTimeout(timer);
      reject(new ScoringError("Cancelled"));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

export function throwIfAborted(signal?: AbortSignal): void {
  if (signal?.aborted) throw new ScoringError("Cancelled");
}

export interface RetryOptions {
  retries?: number;
  delayMs?: number;
  label?: string;
  /** Errors for which this returns false are rethrown at once. */
  shouldRetry?: (err: Error) => boolean;
  signal?: AbortSignal;
  log?: Logger;
}

/**
 * Retry an async operation with linear backoff (`delayMs × attempt`).
 */
export async function withRetry<T>(fn: (attempt: number) => Promise<T>, opts: RetryOptions = {}): Promise<T> {
  const { retries = 2, delayMs = 500, label = "operation", shouldRetry = () => true, signal, log = logger } = opts;
  let lastErr: Error = new Error(`${label} was not attempted`);
  for (let attempt = 0; attempt <= retries; attempt++) {
    throwIfAborted(signal);
    try {
      return await fn(attempt);
    } catch (e: unknown) {
      lastErr = e instanceof Error ? e : new Error(String(e));
      if (!shouldRetry(lastErr)) throw lastErr;
      if (attempt < retries) {
        const wait = delayMs * (attempt + 1);
        log.warn({ attempt: attempt + 1, wait, err: lastErr.message }, `${label} failed, retrying`);
        await sleep(wait, signal);
      }
    }
  }
  throw lastErr;
}
