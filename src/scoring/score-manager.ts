import type { Logger } from "pino";
import { articleViewKeys, type ResponseCache, type ViewCache } from "./cache.js";
import { PersistenceError, ScoringError, errorMessage, isScoringError, type PersistenceStep } from "./errors.js";
import type { EnsembleMetadata, FinalAggregation, ModelAggregation, SubResult } from "./ensemble/types.js";
import { KeyedMutex } from "./keyed-mutex.js";
import type { ProgressState, ProgressStatus, ProgressTracker } from "./progress.js";
import { throwIfAborted } from "./retry.js";
import {
  ENSEMBLE_MODEL,
  type AggregationResult,
  type CompositeConfig,
  type CompositeFormula,
  type ModelScore,
  type ScoreCalculator,
  type ScoreStore,
  type StoreTransaction,
} from "./types.js";
import { logScoring } from "../logging.js";

export const Step = {
  Start: { name: "Start", percent: 0 },
  Calculating: { name: "Calculating", percent: 20 },
  Storing: { name: "Storing", percent: 60 },
  Updating: { name: "Updating", percent: 80 },
  Complete: { name: "Complete", percent: 100 },
} as const;

type StepInfo = (typeof Step)[keyof typeof Step];

export interface ScoreManagerDeps {
  store: ScoreStore | null;
  calculator: ScoreCalculator | null;
  progress?: ProgressTracker | null;
  responseCache?: ResponseCache | null;
  views?: ViewCache<unknown> | null;
  log?: Logger;
  now?: () => Date;
}

export interface UpdateScoreOptions {
  /** Sub-results and per-model aggregation from the ensemble run, stored on the ensemble row */
  ensembleMetadata?: EnsembleMetadata | null;
  /** Content hash whose ResponseCache entries are dropped after commit */
  contentHash?: string;
  /**
   * Replace the article's stored rows with `scores` inside the same
   * transaction as the ensemble row, so a failed run leaves them untouched.
   */
  replaceModelScores?: boolean;
  signal?: AbortSignal;
}

/** Metadata persisted on the ensemble row written by `updateArticleScore`. */
export interface StoredEnsembleMetadata {
  confidence: number;
  all_sub_results: SubResult[];
  per_model_results: Record<string, SubResult[]>;
  per_model_aggregation: Record<string, ModelAggregation>;
  final_aggregation: {
    weighted_mean: number;
    confidence: number;
    formula: CompositeFormula;
    ensemble: FinalAggregation | null;
  };
  timestamp: string;
}

const DELETE_SCORES_SQL = "DELETE FROM llm_scores WHERE article_id = ?";
const INSERT_SCORE_SQL =
  "INSERT INTO llm_scores (article_id, model, score, metadata, created_at) VALUES (?, ?, ?, ?, ?)";
const UPDATE_ARTICLE_SQL =
  "UPDATE articles SET composite_score = ?, confidence = ?, score_source = 'llm' WHERE id = ?";

/**
 * Turns a set of model scores into an article's composite score: aggregate,
 * write the ensemble row and the article update in one transaction, then
 * drop cached views. Every step is reported to the ProgressTracker; a
 * failure leaves the article untouched and the progress entry in Error.
 */
export class ScoreManager {
  private readonly store: ScoreStore | null;
  private readonly calculator: ScoreCalculator | null;
  private readonly progress: ProgressTracker | null;
  private readonly responseCache: ResponseCache | null;
  private readonly views: ViewCache<unknown> | null;
  private readonly log: Logger;
  private readonly now: () => Date;
  private readonly locks = new KeyedMutex<number>();

  constructor(deps: ScoreManagerDeps) {
    this.store = deps.store;
    this.calculator = deps.calculator;
    this.progress = deps.progress ?? null;
    this.responseCache = deps.responseCache ?? null;
    this.views = deps.views ?? null;
    this.log = deps.log ?? logScoring;
    this.now = deps.now ?? (() => new Date());
  }

  async updateArticleScore(
    articleId: number,
    scores: readonly ModelScore[],
    cfg: CompositeConfig | null,
    options: UpdateScoreOptions = {},
  ): Promise<AggregationResult> {
    const { store, calculator } = this;
    if (!calculator) throw new ScoringError("InvalidConfig", "score calculator is not set");
    if (!cfg) throw new ScoringError("InvalidConfig", "composite score config is not set");
    if (!store) throw new ScoringError("InvalidConfig", "score store is not set");

    return this.locks.runExclusive(articleId, () =>
      this.runUpdate(articleId, scores, cfg, store, calculator, options),
    );
  }

  private async runUpdate(
    articleId: number,
    scores: readonly ModelScore[],
    cfg: CompositeConfig,
    store: ScoreStore,
    calculator: ScoreCalculator,
    options: UpdateScoreOptions,
  ): Promise<AggregationResult> {
    const { signal } = options;

    this.report(articleId, Step.Start, "InProgress");
    this.checkCancelled(articleId, Step.Start, signal);

    this.report(articleId, Step.Calculating, "InProgress");
    let result: AggregationResult;
    try {
      calculator.checkForAllZeroConfidence(scores);
      result = calculator.calculateScore(scores, cfg);
    } catch (e: unknown) {
      this.log.warn({ articleId, err: errorMessage(e) }, "Composite score calculation failed");
      this.report(articleId, Step.Calculating, "Error", e);
      throw e;
    }
    this.checkCancelled(articleId, Step.Calculating, signal);

    this.report(articleId, Step.Storing, "InProgress");
    let tx: StoreTransaction;
    try {
      tx = await store.begin();
    } catch (e: unknown) {
      throw this.persistenceFailure(articleId, Step.Storing, "begin", e);
    }

    let step: StepInfo = Step.Storing;
    let persistStep: PersistenceStep = "insert";
    try {
      throwIfAborted(signal);
      if (options.replaceModelScores) {
        await tx.execute(DELETE_SCORES_SQL, [articleId]);
        for (const s of scores) {
          if (s.model === ENSEMBLE_MODEL) continue;
          await tx.execute(INSERT_SCORE_SQL, [articleId, s.model, s.score, s.metadata, s.createdAt.toISOString()]);
        }
        throwIfAborted(signal);
      }

      const createdAt = this.now();
      const metadata = this.buildEnsembleMetadata(result, cfg, options.ensembleMetadata ?? null, createdAt);
      await tx.execute(INSERT_SCORE_SQL, [
        articleId,
        ENSEMBLE_MODEL,
        result.score,
        JSON.stringify(metadata),
        createdAt.toISOString(),
      ]);

      throwIfAborted(signal);
      step = Step.Updating;
      persistStep = "update";
      this.report(articleId, Step.Updating, "InProgress");
      const updated = await tx.execute(UPDATE_ARTICLE_SQL, [result.score, result.confidence, articleId]);
      if (updated.changes === 0) {
        throw new ScoringError("NotFound", `article ${articleId} not found`);
      }

      throwIfAborted(signal);
      persistStep = "commit";
      await tx.commit();
    } catch (e: unknown) {
      await this.rollback(tx, articleId, persistStep);
      if (isScoringError(e, "Cancelled")) {
        this.log.warn({ articleId, step: step.name }, "Score update cancelled, transaction rolled back");
        this.report(articleId, step, "Error", e);
        throw e;
      }
      throw this.persistenceFailure(articleId, step, persistStep, e);
    }

    this.invalidateScoreCache(articleId, options.contentHash);
    this.progress?.setProgress(articleId, {
      step: Step.Complete.name,
      message: "Scoring complete",
      percent: Step.Complete.percent,
      status: "Success",
      finalScore: result.score,
    });
    this.log.info({ articleId, score: result.score, confidence: result.confidence }, "Article score updated");
    return result;
  }

  /** Drop the article, ensemble and bias views of one article, and its cached provider responses. */
  invalidateScoreCache(articleId: number, contentHash?: string): void {
    if (this.views) {
      for (const key of articleViewKeys(articleId)) this.views.delete(key);
    }
    if (contentHash && this.responseCache) {
      const removed = this.responseCache.remove(contentHash);
      this.log.debug({ articleId, removed }, "Dropped cached provider responses");
    }
  }

  getProgress(articleId: number): ProgressState | undefined {
    return this.progress?.getProgress(articleId);
  }

  private buildEnsembleMetadata(
    result: AggregationResult,
    cfg: CompositeConfig,
    ensemble: EnsembleMetadata | null,
    createdAt: Date,
  ): StoredEnsembleMetadata {
    return {
      confidence: result.confidence,
      all_sub_results: ensemble?.all_sub_results ?? [],
      per_model_results: ensemble?.per_model_results ?? {},
      per_model_aggregation: ensemble?.per_model_aggregation ?? {},
      final_aggregation: {
        weighted_mean: result.score,
        confidence: result.confidence,
        formula: cfg.formula,
        ensemble: ensemble?.final_aggregation ?? null,
      },
      timestamp: createdAt.toISOString(),
    };
  }

  private persistenceFailure(articleId: number, step: StepInfo, persistStep: PersistenceStep, cause: unknown): PersistenceError {
    const err = new PersistenceError(persistStep, `${persistStep} failed: ${errorMessage(cause)}`, cause);
    this.log.error({ articleId, step: persistStep, err: errorMessage(cause) }, "Score persistence failed");
    this.report(articleId, step, "Error", err);
    return err;
  }

  private async rollback(tx: StoreTransaction, articleId: number, step: PersistenceStep): Promise<void> {
    try {
      await tx.rollback();
    } catch (e: unknown) {
      this.log.error({ articleId, step, err: errorMessage(e) }, "Rollback failed");
    }
  }

  private checkCancelled(articleId: number, step: StepInfo, signal?: AbortSignal): void {
    if (!signal?.aborted) return;
    const err = new ScoringError("Cancelled");
    this.report(articleId, step, "Error", err);
    throw err;
  }

  private report(articleId: number, step: StepInfo, status: ProgressStatus, err?: unknown): void {
    this.progress?.updateProgress(articleId, step.name, step.percent, status, err);
  }
}
