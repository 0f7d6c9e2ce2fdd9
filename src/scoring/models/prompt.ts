import { createHash } from "node:crypto";

export interface PromptVariant {
  id: string;
  template: string;
  examples: string[];
}

const JSON_INSTRUCTION =
  "Respond ONLY with a valid JSON object containing 'score', 'explanation', and 'confidence'. " +
  "Do not include any other text or formatting.";

const EXAMPLES = [
  `{"score": -1.0, "explanation": "Strongly left-leaning language", "confidence": 0.9}`,
  `{"score": 0.0, "explanation": "Neutral reporting", "confidence": 0.95}`,
  `{"score": 1.0, "explanation": "Strongly right-leaning language", "confidence": 0.9}`,
];

export const DEFAULT_PROMPT_VARIANTS: readonly PromptVariant[] = [
  {
    id: "default",
    template:
      "Please analyze the political bias of the following article on a scale from -1.0 (strongly left) " +
      `to 1.0 (strongly right). ${JSON_INSTRUCTION}`,
    examples: EXAMPLES,
  },
  {
    id: "left_focus",
    template:
      "Read the following article as a progressive media critic would. Rate its political bias from -1.0 " +
      `(strongly left) to 1.0 (strongly right). ${JSON_INSTRUCTION}`,
    examples: EXAMPLES,
  },
  {
    id: "center_focus",
    template:
      "Read the following article as a neutral fact-checker would, weighing sourcing and framing. Rate its " +
      `political bias from -1.0 (strongly left) to 1.0 (strongly right). ${JSON_INSTRUCTION}`,
    examples: EXAMPLES,
  },
  {
    id: "right_focus",
    template:
      "Read the following article as a conservative media critic would. Rate its political bias from -1.0 " +
      `(strongly left) to 1.0 (strongly right). ${JSON_INSTRUCTION}`,
    examples: EXAMPLES,
  },
];

/** Template, then few-shot examples, then the article body. */
export function formatPrompt(variant: PromptVariant, content: string): string {
  return `${variant.template}\n${variant.examples.join("\n")}\nArticle:\n${content}`;
}

/**
 * SHA-256 hash of the prompt text (first 16 hex chars), logged with each
 * provider call.
 */
export function hashPrompt(prompt: string): string {
  return createHash("sha256").update(prompt).digest("hex").slice(0, 16);
}

/** Full SHA-256 of article content; the ResponseCache key. */
export function hashContent(content: string): string {
  return createHash("sha256").update(content).digest("hex");
}
