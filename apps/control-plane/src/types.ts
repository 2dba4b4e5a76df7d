import type { EvaluationResultInput, PromptCategory } from "@costwise/evals";

export interface BenchmarkRunItem {
  id: number;
  startedAt: string;
  completedAt?: string;
  status: "running" | "completed";
  totalPrompts: number;
}

export interface EvaluationResultItem extends EvaluationResultInput {
  id: number;
}

export interface PerformanceSummaryItem {
  modelName: string;
  category: PromptCategory;
  avgQualityScore: number;
  avgCost: number;
  avgLatency: number;
  avgTokensPerSecond: number;
  totalSamples: number;
  qualityPerDollar: number;
  lastUpdated: string;
}

export interface ModelPerformance {
  modelName: string;
  category?: PromptCategory;
  avgQualityScore: number;
  avgCost: number;
  avgLatency: number;
  avgTokensPerSecond: number;
  totalSamples: number;
  qualityPerDollar: number;
}

export interface ModelSelection {
  modelName: string;
  reasoning: string;
  qualityThreshold: number;
  category?: PromptCategory;
  usedFallback: boolean;
  expectedQuality?: number;
  expectedCost?: number;
  expectedLatency?: number;
  qualityPerDollar?: number;
}
