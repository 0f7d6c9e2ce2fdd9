import { z } from "zod";

/**
 * Typed view of a ModelScore metadata blob. Only the fields the aggregation
 * reads are decoded; everything else stays opaque.
 */
export interface ScoreMetadata {
  confidence: number;
  explanation?: string;
}

const MetadataSchema = z.object({
  confidence: z.number().finite().catch(0),
  explanation: z.string().optional().catch(undefined),
});

/**
 * Tolerant decoder: malformed JSON, a non-object payload, or a missing or
 * non-numeric confidence all decode to confidence 0.
 */
export function decodeScoreMetadata(raw: string | null | undefined): ScoreMetadata {
  if (!raw) return { confidence: 0 };
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return { confidence: 0 };
  }
  const result = MetadataSchema.safeParse(parsed);
  return result.success ? result.data : { confidence: 0 };
}

export function confidenceOf(raw: string | null | undefined): number {
  return decodeScoreMetadata(raw).confidence;
}
