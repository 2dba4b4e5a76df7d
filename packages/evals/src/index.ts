export {
  BenchmarkOrchestrator,
  countExpectedEvaluations,
  type BenchmarkOrchestratorOptions,
  type ResponseJudge
} from "./benchmarkRunner.js";
export { LlmJudge, buildEvaluationPrompt, clampScore, parseJudgeEvaluation } from "./judge.js";
export { PromptSetValidationError, loadPromptSet, parsePromptSet, selectPrompts, validatePromptSet } from "./prompts.js";
export {
  PROMPT_CATEGORIES,
  isPromptCategory,
  type BenchmarkPrompt,
  type BenchmarkRepository,
  type EvaluationResultInput,
  type JudgeVerdict,
  type PromptCategory
} from "./types.js";
