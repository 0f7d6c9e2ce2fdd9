import { readFileSync } from "node:fs";
import { z } from "zod";
import { ScoringError } from "./errors.js";
import type { CompositeConfig } from "./types.js";
import { logScoring } from "../logging.js";

const PerspectiveEntrySchema = z.object({
  modelName: z.string().default(""),
  perspective: z.string(),
  weight: z.number().optional(),
  url: z.string().optional(),
});

export const CompositeConfigSchema = z
  .object({
    formula: z.enum(["average", "weighted", "min", "max"]).default("average"),
    weights: z.record(z.number()).default({}),
    min_score: z.number().default(-1),
    max_score: z.number().default(1),
    default_missing: z.number().default(0),
    handle_invalid: z.enum(["ignore", "default"]).default("default"),
    confidence_method: z.enum(["count_valid", "spread"]).default("count_valid"),
    min_confidence: z.number().default(0),
    max_confidence: z.number().default(1),
    models: z.array(PerspectiveEntrySchema).default([]),
  })
  .superRefine((cfg, ctx) => {
    if (cfg.min_score > cfg.max_score) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["min_score"],
        message: `min_score (${cfg.min_score}) must not exceed max_score (${cfg.max_score})`,
      });
    }
    if (cfg.min_confidence > cfg.max_confidence) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["min_confidence"],
        message: `min_confidence (${cfg.min_confidence}) must not exceed max_confidence (${cfg.max_confidence})`,
      });
    }
  })
  .transform((cfg): CompositeConfig => ({
    formula: cfg.formula,
    weights: cfg.weights,
    minScore: cfg.min_score,
    maxScore: cfg.max_score,
    defaultMissing: cfg.default_missing,
    handleInvalid: cfg.handle_invalid,
    confidenceMethod: cfg.confidence_method,
    minConfidence: cfg.min_confidence,
    maxConfidence: cfg.max_confidence,
    models: cfg.models,
  }));

export type CompositeConfigInput = z.input<typeof CompositeConfigSchema>;

/**
 * Validate a decoded composite-score config (snake_case JSON shape) and
 * convert it to the internal form.
 */
export function parseCompositeConfig(raw: unknown): CompositeConfig {
  const result = CompositeConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`).join("; ");
    throw new ScoringError("InvalidConfig", `invalid composite score config: ${issues}`, { cause: result.error });
  }
  return result.data;
}

export function loadCompositeConfig(filePath: string): CompositeConfig {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(filePath, "utf-8"));
  } catch (e: unknown) {
    throw new ScoringError("InvalidConfig", `cannot read composite score config ${filePath}`, { cause: e });
  }
  const cfg = parseCompositeConfig(raw);
  if (cfg.models.length === 0) {
    logScoring.warn({ path: filePath }, "Composite score config has no models; every score will be dropped");
  }
  logScoring.info(
    { path: filePath, formula: cfg.formula, models: cfg.models.length },
    "Loaded composite score config",
  );
  return cfg;
}

/** Distinct, non-empty model names in table order. */
export function configuredModels(cfg: CompositeConfig): string[] {
  const seen = new Set<string>();
  const models: string[] = [];
  for (const entry of cfg.models) {
    const name = entry.modelName.trim();
    if (!name || seen.has(name)) continue;
    seen.add(name);
    models.push(name);
  }
  return models;
}
