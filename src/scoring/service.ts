import type { Logger } from "pino";
import type { ArticleRepository } from "../db/database.js";
import type { ViewCache } from "./cache.js";
import type { EnsembleCoordinator, EnsembleResult } from "./ensemble/coordinator.js";
import { ScoringError, errorMessage, isScoringError } from "./errors.js";
import { decodeScoreMetadata } from "./metadata.js";
import type { ProgressTracker } from "./progress.js";
import type { ScoreManager } from "./score-manager.js";
import type { AggregationResult, CompositeConfig } from "./types.js";
import { logScoring } from "../logging.js";

export interface ModelResultView {
  model: string;
  score: number;
  confidence: number;
  explanation?: string;
  createdAt: string;
}

export interface ArticleBias {
  articleId: number;
  compositeScore: number | null;
  confidence: number | null;
  scoreSource: string | null;
  results: ModelResultView[];
}

export interface ScoringServiceDeps {
  articles: ArticleRepository;
  ensemble: EnsembleCoordinator;
  scoreManager: ScoreManager;
  progress: ProgressTracker;
  compositeConfig: CompositeConfig;
  views: ViewCache<ArticleBias>;
  log?: Logger;
}

export interface BatchResult {
  scored: number;
  failed: number;
}

export class ScoringService {
  private readonly log: Logger;

  constructor(private readonly deps: ScoringServiceDeps) {
    this.log = deps.log ?? logScoring;
  }

  /**
   * Re-run the ensemble for one article, then replace its stored model
   * scores and commit a fresh composite score in one transaction.
   */
  async reanalyzeArticle(articleId: number, signal?: AbortSignal): Promise<AggregationResult> {
    const { articles, ensemble, scoreManager, progress, compositeConfig } = this.deps;
    progress.updateProgress(articleId, "Analyzing", 0, "InProgress");

    let analysis: EnsembleResult;
    try {
      const article = await articles.getArticle(articleId);
      if (!article) throw new ScoringError("NotFound", `article ${articleId} not found`);
      analysis = await ensemble.analyze(articleId, article.content, signal);
    } catch (e: unknown) {
      this.log.warn({ articleId, err: errorMessage(e) }, "Reanalysis failed before scoring");
      progress.updateProgress(articleId, "Analyzing", 0, "Error", e);
      throw e;
    }

    return scoreManager.updateArticleScore(articleId, analysis.modelScores, compositeConfig, {
      ensembleMetadata: analysis.metadata,
      contentHash: analysis.contentHash,
      replaceModelScores: true,
      signal,
    });
  }

  /**
   * Score every article that has no composite score yet, one at a time.
   * Stops early when both provider keys are rate limited.
   */
  async processUnscoredArticles(signal?: AbortSignal): Promise<BatchResult> {
    const pending = await this.deps.articles.listUnscoredArticles();
    const result: BatchResult = { scored: 0, failed: 0 };
    this.log.info({ count: pending.length }, "Scoring unscored articles");

    for (const article of pending) {
      if (signal?.aborted) throw new ScoringError("Cancelled");
      try {
        await this.reanalyzeArticle(article.id, signal);
        result.scored++;
      } catch (e: unknown) {
        if (isScoringError(e, "Cancelled")) throw e;
        result.failed++;
        this.log.error({ articleId: article.id, err: errorMessage(e) }, "Failed to score article");
        if (isScoringError(e, "BothLLMKeysRateLimited")) {
          this.log.warn({ remaining: pending.length - result.scored - result.failed }, "Rate limited on both keys, stopping batch");
          break;
        }
      }
    }

    this.log.info(result, "Finished scoring unscored articles");
    return result;
  }

  /** Composite score plus per-model results, memoised under `bias:<id>`. */
  async getArticleBias(articleId: number): Promise<ArticleBias> {
    const key = `bias:${articleId}`;
    const cached = this.deps.views.get(key);
    if (cached) return cached;

    const article = await this.deps.articles.getArticle(articleId);
    if (!article) throw new ScoringError("NotFound", `article ${articleId} not found`);
    const scores = await this.deps.articles.fetchModelScores(articleId);

    const view: ArticleBias = {
      articleId,
      compositeScore: article.composite_score,
      confidence: article.confidence,
      scoreSource: article.score_source,
      results: scores.map((s) => {
        const meta = decodeScoreMetadata(s.metadata);
        return {
          model: s.model,
          score: s.score,
          confidence: meta.confidence,
          explanation: meta.explanation,
          createdAt: s.createdAt.toISOString(),
        };
      }),
    };
    this.deps.views.set(key, view);
    return view;
  }
}
