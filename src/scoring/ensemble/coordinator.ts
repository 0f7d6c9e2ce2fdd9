import type { Logger } from "pino";
import { z } from "zod";
import type { ResponseCache } from "../cache.js";
import { ScoringError, errorMessage, isScoringError } from "../errors.js";
import type { Scorer } from "../models/client.js";
import { DEFAULT_PROMPT_VARIANTS, formatPrompt, hashContent, type PromptVariant } from "../models/prompt.js";
import { throwIfAborted } from "../retry.js";
import { ENSEMBLE_MODEL, type ModelScore } from "../types.js";
import type {
  EnsembleMetadata,
  FinalAggregation,
  ModelAggregation,
  ModelScoreMetadata,
  SubResult,
} from "./types.js";
import { logEnsemble } from "../../logging.js";

export interface EnsembleOptions {
  models: string[];
  variants?: readonly PromptVariant[];
  minValid: number;
  maxAttempts: number;
  confidenceThreshold: number;
  maxConcurrent: number;
}

export interface EnsembleResult {
  contentHash: string;
  /** One row per model that produced an accepted response, in configuration order */
  modelScores: ModelScore[];
  ensemble: ModelScore;
  metadata: EnsembleMetadata;
}

/** Attempts per prompt variant before moving to the next one. */
const TRIES_PER_VARIANT = 2;
const UNCERTAINTY_VARIANCE = 0.1;

interface ModelOutcome {
  model: string;
  subResults: SubResult[];
  valid: SubResult[];
  aggregation: ModelAggregation | null;
  attempts: number;
  rateLimited: boolean;
  score: ModelScore | null;
}

const SubResultSchema = z.object({
  model: z.string(),
  prompt_variant: z.string(),
  score: z.number(),
  explanation: z.string(),
  confidence: z.number(),
  raw_response: z.string(),
});

const CachedMetadataSchema = z.object({
  confidence: z.number(),
  explanation: z.string(),
  aggregation: z.object({
    mean: z.number(),
    weighted_mean: z.number(),
    variance: z.number(),
    count: z.number(),
    sum_confidence: z.number(),
  }),
  sub_results: z.array(SubResultSchema),
  valid_results: z.array(SubResultSchema),
});

function decodeCached(score: ModelScore): ModelScoreMetadata | null {
  let raw: unknown;
  try {
    raw = JSON.parse(score.metadata);
  } catch {
    return null;
  }
  const parsed = CachedMetadataSchema.safeParse(raw);
  return parsed.success ? parsed.data : null;
}

export function aggregateModel(valid: readonly SubResult[]): ModelAggregation {
  let sum = 0;
  let weightedSum = 0;
  let sumConfidence = 0;
  for (const r of valid) {
    sum += r.score;
    weightedSum += r.score * r.confidence;
    sumConfidence += r.confidence;
  }
  const mean = sum / valid.length;
  const variance = valid.reduce((s, r) => s + (r.score - mean) ** 2, 0) / valid.length;
  return {
    mean,
    weighted_mean: weightedSum / Math.max(sumConfidence, 1e-6),
    variance,
    count: valid.length,
    sum_confidence: sumConfidence,
  };
}

/** Combine per-model aggregations, each weighted by its summed confidence. */
export function aggregateAcrossModels(aggregations: readonly ModelAggregation[]): FinalAggregation {
  let weighted = 0;
  let varianceSum = 0;
  let totalWeight = 0;
  for (const agg of aggregations) {
    weighted += agg.weighted_mean * agg.sum_confidence;
    varianceSum += agg.variance * agg.sum_confidence;
    totalWeight += agg.sum_confidence;
  }
  const variance = varianceSum / Math.max(totalWeight, 1e-9);
  return {
    weighted_mean: weighted / Math.max(totalWeight, 1e-9),
    variance,
    uncertainty_flag: variance > UNCERTAINTY_VARIANCE,
    total_weight: totalWeight,
  };
}

/**
 * Collects judgments for one article from every configured model, cycling
 * prompt variants until each model yields enough confident responses or
 * runs out of attempts, and folds them into the synthetic "ensemble" score.
 */
export class EnsembleCoordinator {
  private readonly variants: readonly PromptVariant[];
  private readonly log: Logger;
  private readonly now: () => Date;

  constructor(
    private readonly scorer: Scorer,
    private readonly opts: EnsembleOptions,
    private readonly cache: ResponseCache | null = null,
    deps: { log?: Logger; now?: () => Date } = {},
  ) {
    this.variants = opts.variants ?? DEFAULT_PROMPT_VARIANTS;
    this.log = deps.log ?? logEnsemble;
    this.now = deps.now ?? (() => new Date());
  }

  async analyze(articleId: number, content: string, signal?: AbortSignal): Promise<EnsembleResult> {
    const models = this.opts.models.filter((m) => m.trim() !== "");
    if (models.length === 0) throw new ScoringError("InvalidConfig", "no models configured for ensemble analysis");
    if (this.variants.length === 0) throw new ScoringError("InvalidConfig", "no prompt variants configured");

    const contentHash = hashContent(content);
    const batchSize = Math.max(1, this.opts.maxConcurrent);
    const outcomes: ModelOutcome[] = [];

    this.log.info({ articleId, models, contentHash: contentHash.slice(0, 12) }, "Ensemble analysis started");

    for (let i = 0; i < models.length; i += batchSize) {
      throwIfAborted(signal);
      const batch = models.slice(i, i + batchSize);
      const results = await Promise.allSettled(
        batch.map((model) => this.collectModel(articleId, model, content, contentHash, signal)),
      );
      for (const result of results) {
        if (result.status === "rejected") throw result.reason;
        outcomes.push(result.value);
      }
    }

    const accepted = outcomes.filter(
      (o): o is ModelOutcome & { aggregation: ModelAggregation; score: ModelScore } =>
        o.aggregation !== null && o.score !== null,
    );

    if (accepted.length === 0) {
      const attempted = outcomes.some((o) => o.attempts > 0);
      if (attempted && outcomes.every((o) => o.rateLimited)) {
        throw new ScoringError("BothLLMKeysRateLimited");
      }
      this.log.error({ articleId }, "No valid high-confidence responses from any model");
      throw new ScoringError("NoValidResponses");
    }

    const createdAt = this.now();
    const modelScores = accepted.map((o) => ({ ...o.score, id: undefined, articleId }));
    const final = aggregateAcrossModels(accepted.map((o) => o.aggregation));
    const confidence = Math.max(0, 1 - final.variance);

    const metadata: EnsembleMetadata = {
      confidence,
      all_sub_results: outcomes.flatMap((o) => o.subResults),
      per_model_results: Object.fromEntries(accepted.map((o) => [o.model, o.valid])),
      per_model_aggregation: Object.fromEntries(accepted.map((o) => [o.model, o.aggregation])),
      final_aggregation: final,
      timestamp: createdAt.toISOString(),
    };

    this.log.info(
      {
        articleId,
        score: final.weighted_mean,
        confidence,
        variance: final.variance,
        models: accepted.length,
      },
      "Ensemble analysis complete",
    );

    return {
      contentHash,
      modelScores,
      ensemble: {
        articleId,
        model: ENSEMBLE_MODEL,
        score: final.weighted_mean,
        metadata: JSON.stringify(metadata),
        createdAt,
      },
      metadata,
    };
  }

  private buildModelScore(
    articleId: number,
    model: string,
    aggregation: ModelAggregation,
    subResults: SubResult[],
    valid: SubResult[],
  ): ModelScore {
    const best = [...valid].sort((a, b) => b.confidence - a.confidence)[0];
    const metadata: ModelScoreMetadata = {
      confidence: aggregation.sum_confidence / aggregation.count,
      explanation: best.explanation,
      aggregation,
      sub_results: subResults,
      valid_results: valid,
    };
    return {
      articleId,
      model,
      score: aggregation.weighted_mean,
      metadata: JSON.stringify(metadata),
      createdAt: this.now(),
    };
  }

  private async collectModel(
    articleId: number,
    model: string,
    content: string,
    contentHash: string,
    signal?: AbortSignal,
  ): Promise<ModelOutcome> {
    const cached = this.cache?.get(contentHash, model);
    if (cached) {
      const meta = decodeCached(cached);
      if (meta) {
        this.log.debug({ articleId, model }, "Using cached model score");
        return {
          model,
          subResults: meta.sub_results,
          valid: meta.valid_results,
          aggregation: meta.aggregation,
          attempts: 0,
          rateLimited: false,
          score: cached,
        };
      }
      this.log.warn({ articleId, model }, "Discarding cached model score with unreadable metadata");
      this.cache?.delete(contentHash, model);
    }

    const { minValid, maxAttempts, confidenceThreshold } = this.opts;
    const subResults: SubResult[] = [];
    const valid: SubResult[] = [];
    let attempts = 0;
    let rateLimited = false;

    outer: while (attempts < maxAttempts && valid.length < minValid) {
      for (const variant of this.variants) {
        for (let retry = 0; retry < TRIES_PER_VARIANT && attempts < maxAttempts && valid.length < minValid; retry++) {
          throwIfAborted(signal);
          attempts++;
          try {
            const result = await this.scorer.score(model, formatPrompt(variant, content), signal);
            const sub: SubResult = {
              model,
              prompt_variant: variant.id,
              score: result.score,
              explanation: result.explanation,
              confidence: result.confidence,
              raw_response: result.rawResponse,
            };
            subResults.push(sub);
            if (result.confidence >= confidenceThreshold) valid.push(sub);
          } catch (e: unknown) {
            if (isScoringError(e, "Cancelled")) throw e;
            if (isScoringError(e, "BothLLMKeysRateLimited")) {
              this.log.warn({ articleId, model, attempts }, "Both keys rate limited, skipping model");
              rateLimited = true;
              break outer;
            }
            this.log.warn({ articleId, model, variant: variant.id, err: errorMessage(e) }, "Ensemble call failed");
          }
        }
        if (attempts >= maxAttempts || valid.length >= minValid) break outer;
      }
    }

    if (valid.length === 0) {
      this.log.warn({ articleId, model, attempts }, "No confident responses, skipping model");
      return { model, subResults, valid, aggregation: null, attempts, rateLimited, score: null };
    }

    const aggregation = aggregateModel(valid);
    const score = this.buildModelScore(articleId, model, aggregation, subResults, valid);
    this.cache?.set(contentHash, model, score);
    this.log.debug(
      { articleId, model, count: valid.length, weightedMean: aggregation.weighted_mean, variance: aggregation.variance },
      "Model aggregated",
    );
    return { model, subResults, valid, aggregation, attempts, rateLimited: false, score };
  }
}
