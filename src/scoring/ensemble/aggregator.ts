import type { Logger } from "pino";
import { ScoringError } from "../errors.js";
import { confidenceOf } from "../metadata.js";
import {
  ENSEMBLE_MODEL,
  PERSPECTIVES,
  type AggregationResult,
  type CompositeConfig,
  type ModelScore,
  type Perspective,
  type ScoreCalculator,
} from "../types.js";
import { isPerspective, mapModelToPerspective, normalizeModelName } from "./perspective.js";
import { logScoring } from "../../logging.js";

interface Candidate {
  score: ModelScore;
  confidence: number;
}

function isEnsemble(score: ModelScore): boolean {
  return normalizeModelName(score.model) === ENSEMBLE_MODEL;
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

function isInvalidScore(value: number, cfg: CompositeConfig): boolean {
  return !Number.isFinite(value) || value < cfg.minScore || value > cfg.maxScore;
}

/**
 * Fails with AllScoresZeroConfidence when every non-ensemble score carries
 * confidence ≤ 0 (malformed or missing metadata counts as 0). A list with no
 * non-ensemble scores passes; the aggregation reports that case itself.
 */
export function checkForAllZeroConfidence(scores: readonly ModelScore[], log: Logger = logScoring): void {
  const providerScores = scores.filter((s) => !isEnsemble(s));
  if (providerScores.length === 0) return;

  if (providerScores.every((s) => confidenceOf(s.metadata) <= 0)) {
    log.error({ models: providerScores.length }, "All non-ensemble model scores have zero confidence");
    throw new ScoringError("AllScoresZeroConfidence");
  }
}

function groupByPerspective(
  scores: readonly ModelScore[],
  cfg: CompositeConfig,
  log: Logger,
): Map<Perspective, Candidate[]> {
  const groups = new Map<Perspective, Candidate[]>();
  for (const score of scores) {
    const perspective = mapModelToPerspective(score.model, cfg.models);
    if (!perspective) {
      log.warn({ model: score.model, articleId: score.articleId }, "Dropping score from model with no perspective");
      continue;
    }
    if (!isPerspective(perspective)) {
      log.warn({ model: score.model, perspective }, "Dropping score mapped to unknown perspective");
      continue;
    }
    const list = groups.get(perspective) ?? [];
    list.push({ score, confidence: confidenceOf(score.metadata) });
    groups.set(perspective, list);
  }
  return groups;
}

/**
 * Pick one value per perspective. Candidates are ordered by confidence desc,
 * then created-at desc; the first valid one wins. Under the "default" policy
 * an invalid first candidate is replaced by default_missing and the
 * perspective still counts as present.
 */
function selectPerspectiveValues(
  groups: Map<Perspective, Candidate[]>,
  cfg: CompositeConfig,
  log: Logger,
): Map<Perspective, number> {
  const present = new Map<Perspective, number>();

  for (const perspective of PERSPECTIVES) {
    const candidates = groups.get(perspective);
    if (!candidates || candidates.length === 0) continue;

    const ordered = [...candidates].sort(
      (a, b) => b.confidence - a.confidence || b.score.createdAt.getTime() - a.score.createdAt.getTime(),
    );

    for (const { score } of ordered) {
      if (!isInvalidScore(score.score, cfg)) {
        present.set(perspective, score.score);
        break;
      }
      if (cfg.handleInvalid === "ignore") {
        log.debug({ perspective, model: score.model, score: score.score }, "Skipping invalid score");
        continue;
      }
      log.debug({ perspective, model: score.model, score: score.score }, "Replacing invalid score with default");
      present.set(perspective, cfg.defaultMissing);
      break;
    }
  }

  return present;
}

/**
 * Only `average` sees synthetic defaults for absent perspectives; `weighted`,
 * `min` and `max` work over present perspectives alone.
 */
function combine(present: Map<Perspective, number>, cfg: CompositeConfig): number {
  const averageInputs: number[] = [];
  for (const perspective of PERSPECTIVES) {
    const value = present.get(perspective);
    if (value !== undefined) averageInputs.push(value);
    else if (cfg.handleInvalid === "default") averageInputs.push(cfg.defaultMissing);
  }
  const average = averageInputs.reduce((s, v) => s + v, 0) / averageInputs.length;
  const values = [...present.values()];

  switch (cfg.formula) {
    case "weighted": {
      let weighted = 0;
      let totalWeight = 0;
      for (const [perspective, value] of present) {
        const weight = cfg.weights[perspective] ?? 1;
        weighted += value * weight;
        totalWeight += weight;
      }
      if (totalWeight === 0) return average;
      return weighted / totalWeight;
    }
    case "min":
      return Math.min(...values);
    case "max":
      return Math.max(...values);
    case "average":
      return average;
  }
}

function computeConfidence(present: Map<Perspective, number>, cfg: CompositeConfig): number {
  const count = present.size;
  let confidence: number;

  if (cfg.confidenceMethod === "spread") {
    const values = [...present.values()];
    const spread = Math.max(...values) - Math.min(...values);
    const range = cfg.maxScore - cfg.minScore;
    confidence = 1 - (range > 0 ? spread / range : 0);
  } else {
    confidence = count / PERSPECTIVES.length;
  }

  // Full three-perspective coverage is reported uncapped. Unset bounds
  // (max <= min) disable the clamp.
  if (count < PERSPECTIVES.length && cfg.maxConfidence > cfg.minConfidence) {
    confidence = clamp(confidence, cfg.minConfidence, cfg.maxConfidence);
  }
  return confidence;
}

/**
 * Reduce raw model judgments to one composite score and confidence.
 *
 * Under the "default" invalid-score policy an absent perspective adds
 * default_missing to the `average` formula; it never counts towards
 * confidence.
 */
export function computeCompositeScore(
  scores: readonly ModelScore[],
  cfg: CompositeConfig,
  log: Logger = logScoring,
): AggregationResult {
  const groups = groupByPerspective(scores, cfg, log);
  const present = selectPerspectiveValues(groups, cfg, log);

  if (present.size === 0) {
    throw new ScoringError("AllPerspectivesInvalid", "no valid perspective scores after selection");
  }

  if ([...present.values()].every((v) => v === 0)) {
    throw new ScoringError("AllPerspectivesInvalid", "every selected perspective score is exactly zero");
  }

  if (present.size === 1) {
    const [only] = present.values();
    return {
      score: clamp(only, cfg.minScore, cfg.maxScore),
      confidence: computeConfidence(present, cfg),
    };
  }

  const composite = clamp(combine(present, cfg), cfg.minScore, cfg.maxScore);
  const confidence = computeConfidence(present, cfg);

  log.debug(
    { perspectives: Object.fromEntries(present), formula: cfg.formula, composite, confidence },
    "Composite score computed",
  );
  return { score: composite, confidence };
}

export class CompositeAggregator implements ScoreCalculator {
  constructor(private readonly log: Logger = logScoring) {}

  checkForAllZeroConfidence(scores: readonly ModelScore[]): void {
    checkForAllZeroConfidence(scores, this.log);
  }

  calculateScore(scores: readonly ModelScore[], cfg: CompositeConfig): AggregationResult {
    return computeCompositeScore(scores, cfg, this.log);
  }
}
