import type { Logger } from "pino";
import { errorMessage, findProviderError, type ProviderErrorDetails } from "./errors.js";
import { logProgress } from "../logging.js";

export type ProgressStatus = "InProgress" | "Success" | "Error";

export interface ProgressState {
  step: string;
  message: string;
  percent: number;
  status: ProgressStatus;
  error?: string;
  errorDetails?: ProviderErrorDetails;
  finalScore?: number;
  /** Epoch seconds */
  lastUpdated: number;
}

export const TERMINAL_TTL_MS = 5 * 60 * 1000;
export const STUCK_TTL_MS = 30 * 60 * 1000;

export interface ProgressTrackerOptions {
  cleanupIntervalMs?: number;
  now?: () => number;
  log?: Logger;
}

/**
 * Per-article progress for running scoring jobs. Stale entries are swept by
 * `cleanup()`, which `start()` schedules on an interval.
 */
export class ProgressTracker {
  private states = new Map<number, ProgressState>();
  private timer: ReturnType<typeof setInterval> | null = null;
  private readonly cleanupIntervalMs: number;
  private readonly now: () => number;
  private readonly log: Logger;

  constructor(opts: ProgressTrackerOptions = {}) {
    this.cleanupIntervalMs = opts.cleanupIntervalMs ?? 60_000;
    this.now = opts.now ?? Date.now;
    this.log = opts.log ?? logProgress;
  }

  setProgress(articleId: number, state: Omit<ProgressState, "lastUpdated"> & { lastUpdated?: number }): void {
    this.states.set(articleId, { ...state, lastUpdated: state.lastUpdated ?? this.epochSeconds() });
  }

  updateProgress(articleId: number, step: string, percent: number, status: ProgressStatus, err?: unknown): void {
    const state: ProgressState = {
      step,
      message: step,
      percent,
      status,
      lastUpdated: this.epochSeconds(),
    };
    if (err !== undefined) {
      state.error = errorMessage(err);
      state.message = `${step}: ${state.error}`;
      const providerErr = findProviderError(err);
      if (providerErr) state.errorDetails = providerErr.details();
    }
    this.states.set(articleId, state);
    this.log.debug({ articleId, step, percent, status }, "Progress updated");
  }

  /** Snapshot copy; mutating it does not touch the tracker. */
  getProgress(articleId: number): ProgressState | undefined {
    const state = this.states.get(articleId);
    if (!state) return undefined;
    return { ...state, errorDetails: state.errorDetails ? { ...state.errorDetails } : undefined };
  }

  /** Remove stale entries. Returns how many were removed. */
  cleanup(): number {
    const nowSec = this.epochSeconds();
    let removed = 0;
    for (const [articleId, state] of this.states) {
      const ageMs = (nowSec - state.lastUpdated) * 1000;
      const ttl = state.status === "InProgress" ? STUCK_TTL_MS : TERMINAL_TTL_MS;
      if (ageMs > ttl) {
        this.states.delete(articleId);
        removed++;
      }
    }
    if (removed > 0) this.log.debug({ removed }, "Swept stale progress entries");
    return removed;
  }

  start(): void {
    if (this.timer) return;
    this.timer = setInterval(() => this.cleanup(), this.cleanupIntervalMs);
    this.timer.unref();
    this.log.info({ intervalMs: this.cleanupIntervalMs }, "Progress sweep started");
  }

  stop(): void {
    if (!this.timer) return;
    clearInterval(this.timer);
    this.timer = null;
    this.log.info("Progress sweep stopped");
  }

  get running(): boolean {
    return this.timer !== null;
  }

  get size(): number {
    return this.states.size;
  }

  private epochSeconds(): number {
    return Math.floor(this.now() / 1000);
  }
}
