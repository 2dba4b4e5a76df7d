export type PromptCategory = "coding" | "summarization" | "creative_writing";

export const PROMPT_CATEGORIES: PromptCategory[] = ["coding", "summarization", "creative_writing"];

export function isPromptCategory(value: unknown): value is PromptCategory {
  return PROMPT_CATEGORIES.some((category) => category === value);
}

export interface BenchmarkPrompt {
  id: string;
  category: PromptCategory;
  prompt: string;
  followUps?: string[];
}

export interface JudgeVerdict {
  /** Always within [0, 1]. */
  score: number;
  rationale: string;
}

export interface EvaluationResultInput {
  runId: number;
  modelName: string;
  provider: string;
  promptId: string;
  promptText: string;
  category: PromptCategory;
  turnNumber: number;
  responseText: string | null;
  qualityScore: number | null;
  judgeReasoning: string | null;
  inputTokens: number;
  outputTokens: number;
  totalCost: number;
  timeToFirstToken: number | null;
  totalLatency: number;
  tokensPerSecond: number;
  metadata: Record<string, unknown>;
  timestamp: string;
  errorMessage: string | null;
}

/**
 * Persistence port the sweep writes through. Inserts may arrive concurrently from
 * every model's unit of work; `completeRun` and `recomputePerformance` are called once,
 * after all units have settled.
 */
export interface BenchmarkRepository {
  createRun(totalPrompts: number): { id: number };
  completeRun(runId: number): void;
  saveResult(result: EvaluationResultInput): void;
  recomputePerformance(): void;
}
