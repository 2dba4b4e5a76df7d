import type { GenerationClient } from "@costwise/provider-sdk";
import type { JudgeVerdict, PromptCategory } from "./types.js";

const JUDGE_MAX_TOKENS = 500;
const JUDGE_TEMPERATURE = 0.3;
const UNPARSEABLE_SCORE = 0.5;
const DECIMAL_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)(e[+-]?\d+)?$/i;
const INFINITY_PATTERN = /^([+-]?)inf(inity)?$/i;

export function buildEvaluationPrompt(prompt: string, response: string, category: PromptCategory): string {
  return `You are an expert evaluator of AI responses. Rate the following response on a scale of 0.0 to 1.0 based on these criteria:
- Accuracy and correctness
- Completeness and thoroughness
- Clarity and coherence
- Relevance to the prompt
- Overall quality

Prompt Category: ${category}
Original Prompt: ${prompt}

Response to Evaluate:
${response}

Provide your evaluation in the following format:
Score: [0.0-1.0]
Reasoning: [Your detailed explanation]

Be strict but fair. Only exceptional responses should score above 0.9.
`;
}

/**
 * Reads the judge output. A `Score:` line that does not parse scores 0.5; a missing
 * score line scores 0. The rationale is everything after the first `Reasoning:` marker.
 */
export function parseJudgeEvaluation(text: string): JudgeVerdict {
  let score = 0;
  for (const line of text.trim().split("\n")) {
    if (!line.startsWith("Score:")) continue;
    const raw = line.replace("Score:", "").replace(/[[\]]/g, "").trim();
    const parsed = parseScoreValue(raw);
    score = parsed === undefined ? UNPARSEABLE_SCORE : clampScore(parsed);
  }

  const marker = text.indexOf("Reasoning:");
  const rationale = marker === -1 ? "" : text.slice(marker + "Reasoning:".length).trim();
  return { score, rationale };
}

/** Decimal or exponent notation, or a signed infinity; anything else is undefined. */
function parseScoreValue(raw: string): number | undefined {
  if (DECIMAL_PATTERN.test(raw)) return Number.parseFloat(raw);
  const infinity = INFINITY_PATTERN.exec(raw);
  if (infinity) return infinity[1] === "-" ? Number.NEGATIVE_INFINITY : Number.POSITIVE_INFINITY;
  return undefined;
}

export function clampScore(value: number): number {
  return Math.max(0, Math.min(1, value));
}

export class LlmJudge {
  public constructor(private readonly client: GenerationClient) {}

  public async evaluate(prompt: string, response: string, category: PromptCategory): Promise<JudgeVerdict> {
    try {
      const result = await this.client.generate({
        prompt: buildEvaluationPrompt(prompt, response, category),
        maxTokens: JUDGE_MAX_TOKENS,
        temperature: JUDGE_TEMPERATURE
      });
      return parseJudgeEvaluation(result.text);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      // eslint-disable-next-line no-console
      console.error(`[judge] evaluation failed: ${message}`);
      return { score: 0, rationale: `Evaluation failed: ${message}` };
    }
  }
}
