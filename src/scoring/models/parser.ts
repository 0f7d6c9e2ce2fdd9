import { z } from "zod";

export interface ParsedScore {
  score: number;
  confidence: number;
  explanation: string;
}

export type ParseResult =
  | { ok: true; value: ParsedScore; method: "json" | "fenced_json" | "text" }
  | { ok: false; reason: string };

const EnvelopeSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string().nullable().optional() }),
      }),
    )
    .min(1),
});

const EmbeddedErrorSchema = z.object({
  error: z.object({
    message: z.string().default(""),
    type: z.string().optional(),
    code: z.union([z.string(), z.number()]).optional(),
  }),
});

export type EmbeddedError = z.infer<typeof EmbeddedErrorSchema>["error"];

const InnerSchema = z.object({
  score: z.number().finite(),
  confidence: z.number().finite().optional(),
  explanation: z.string().optional(),
});

const FENCE_RE = /```(?:json)?\s*([\s\S]*?)\s*```/;
const SCORE_RE = /Score:\s*(-?\d+(?:\.\d+)?)/i;
const CONFIDENCE_RE = /Confidence:\s*(\d+(?:\.\d+)?)/i;
const REASONING_RE = /Reasoning:\s*(.+)/i;

const TEXT_EXPLANATION = "Extracted from text response";
/** Used when free text carries a score but no confidence. */
export const TEXT_DEFAULT_CONFIDENCE = 0.5;

function tryJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

/** `{error:{message,type,code}}` objects some providers return with a 2xx status. */
export function extractEmbeddedError(body: string): EmbeddedError | null {
  const parsed = EmbeddedErrorSchema.safeParse(tryJson(body));
  return parsed.success ? parsed.data.error : null;
}

export function isRateLimitError(err: EmbeddedError): boolean {
  return err.message.toLowerCase().includes("rate limit") || String(err.code ?? "") === "429";
}

function parseInner(text: string): ParsedScore | null {
  const parsed = InnerSchema.safeParse(tryJson(text.trim()));
  if (!parsed.success) return null;
  return {
    score: parsed.data.score,
    confidence: parsed.data.confidence ?? 0,
    explanation: parsed.data.explanation ?? "",
  };
}

function parseText(text: string): ParsedScore | null {
  const scoreMatch = SCORE_RE.exec(text);
  if (!scoreMatch) return null;
  const score = parseFloat(scoreMatch[1]);
  if (!Number.isFinite(score)) return null;

  const confidenceMatch = CONFIDENCE_RE.exec(text);
  const confidence = confidenceMatch ? parseFloat(confidenceMatch[1]) : TEXT_DEFAULT_CONFIDENCE;
  const reasoningMatch = REASONING_RE.exec(text);

  return {
    score,
    confidence,
    explanation: reasoningMatch ? reasoningMatch[1].trim() : TEXT_EXPLANATION,
  };
}

/**
 * Extract a bias judgment from a chat-completion response body.
 *
 * Tries the message content as JSON, then the content of a ``` fence, then
 * `Score:` / `Confidence:` / `Reasoning:` lines. Zero confidence is a
 * failure.
 */
export function parseProviderResponse(body: string): ParseResult {
  const envelope = EnvelopeSchema.safeParse(tryJson(body));
  if (!envelope.success) {
    return { ok: false, reason: "response is not a chat-completion envelope" };
  }
  const content = envelope.data.choices[0].message.content ?? "";
  if (!content.trim()) return { ok: false, reason: "empty message content" };

  let result: ParseResult | null = null;
  const direct = parseInner(content);
  if (direct) {
    result = { ok: true, value: direct, method: "json" };
  } else {
    const fenced = FENCE_RE.exec(content);
    const fromFence = fenced ? parseInner(fenced[1]) : null;
    if (fromFence) {
      result = { ok: true, value: fromFence, method: "fenced_json" };
    } else {
      const fromText = parseText(content);
      if (fromText) result = { ok: true, value: fromText, method: "text" };
    }
  }

  if (!result) return { ok: false, reason: "no score found in message content" };
  if (result.ok && result.value.confidence <= 0) {
    return { ok: false, reason: "response reported zero confidence" };
  }
  return result;
}
