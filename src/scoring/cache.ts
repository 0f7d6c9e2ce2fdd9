import type { ModelScore } from "./types.js";

/**
 * Memo of the last ModelScore per (content hash, model). Lives for the
 * process only and never expires entries on its own.
 */
export class ResponseCache {
  private entries = new Map<string, Map<string, ModelScore>>();

  get(contentHash: string, model: string): ModelScore | undefined {
    return this.entries.get(contentHash)?.get(model);
  }

  set(contentHash: string, model: string, score: ModelScore): void {
    let byModel = this.entries.get(contentHash);
    if (!byModel) {
      byModel = new Map();
      this.entries.set(contentHash, byModel);
    }
    byModel.set(model, score);
  }

  delete(contentHash: string, model: string): boolean {
    const byModel = this.entries.get(contentHash);
    if (!byModel) return false;
    const removed = byModel.delete(model);
    if (byModel.size === 0) this.entries.delete(contentHash);
    return removed;
  }

  /** Drop every model's entry for one content hash. Returns how many went. */
  remove(contentHash: string): number {
    const count = this.entries.get(contentHash)?.size ?? 0;
    this.entries.delete(contentHash);
    return count;
  }

  get size(): number {
    let total = 0;
    for (const byModel of this.entries.values()) total += byModel.size;
    return total;
  }
}

interface ViewEntry<V> {
  value: V;
  expiresAt: number;
}

/** Keyed cache for read views (`bias:<id>` and friends) with a fixed TTL. */
export class ViewCache<V> {
  private entries = new Map<string, ViewEntry<V>>();

  constructor(
    private readonly ttlMs: number,
    private readonly now: () => number = Date.now,
  ) {}

  get(key: string): V | undefined {
    const entry = this.entries.get(key);
    if (!entry) return undefined;
    if (entry.expiresAt <= this.now()) {
      this.entries.delete(key);
      return undefined;
    }
    return entry.value;
  }

  set(key: string, value: V): void {
    this.entries.set(key, { value, expiresAt: this.now() + this.ttlMs });
  }

  delete(key: string): boolean {
    return this.entries.delete(key);
  }

  has(key: string): boolean {
    return this.get(key) !== undefined;
  }
}

export const articleViewKeys = (articleId: number): string[] => [
  `article:${articleId}`,
  `ensemble:${articleId}`,
  `bias:${articleId}`,
];
