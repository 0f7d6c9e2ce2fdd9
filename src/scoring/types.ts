export type Perspective = "left" | "center" | "right";

export const PERSPECTIVES: readonly Perspective[] = ["left", "center", "right"];

/** Model name of the synthetic row that stores multi-model aggregation. */
export const ENSEMBLE_MODEL = "ensemble";

export interface ModelScore {
  id?: number;
  articleId: number;
  model: string;
  score: number;
  /** Opaque JSON blob; carries at least a `confidence` field. */
  metadata: string;
  createdAt: Date;
}

export interface AggregationResult {
  score: number;
  confidence: number;
}

export interface PerspectiveEntry {
  modelName: string;
  perspective: string;
  weight?: number;
  url?: string;
}

export type CompositeFormula = "average" | "weighted" | "min" | "max";
export type InvalidScorePolicy = "ignore" | "default";
export type ConfidenceMethod = "count_valid" | "spread";

export interface CompositeConfig {
  formula: CompositeFormula;
  weights: Record<string, number>;
  minScore: number;
  maxScore: number;
  defaultMissing: number;
  handleInvalid: InvalidScorePolicy;
  confidenceMethod: ConfidenceMethod;
  minConfidence: number;
  maxConfidence: number;
  models: PerspectiveEntry[];
}

/** Seam between ScoreManager and the aggregation algorithm. */
export interface ScoreCalculator {
  /** Throws AllScoresZeroConfidence when every provider abstained. */
  checkForAllZeroConfidence(scores: readonly ModelScore[]): void;
  calculateScore(scores: readonly ModelScore[], cfg: CompositeConfig): AggregationResult;
}

// ── Relational store ─────────────────────────────────────────────────────

export type SqlParam = string | number | bigint | null;

export interface ExecuteResult {
  changes: number;
  lastInsertRowid?: number | bigint;
}

export interface StoreTransaction {
  execute(sql: string, params?: readonly SqlParam[]): Promise<ExecuteResult>;
  commit(): Promise<void>;
  rollback(): Promise<void>;
}

export interface ScoreStore {
  begin(): Promise<StoreTransaction>;
}
