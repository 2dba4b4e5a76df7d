import type { PromptCategory } from "@costwise/evals";
import type { PerformanceStore } from "../stores/performanceStore.js";
import type { ModelSelection, PerformanceSummaryItem } from "../types.js";

export interface ValueRouterOptions {
  fallbackModel: string;
  defaultThreshold?: number;
  minSamples?: number;
}

export interface SelectModelInput {
  qualityThreshold?: number;
  category?: PromptCategory;
  maxCost?: number;
}

/**
 * Picks the cheapest model whose cached mean quality meets the threshold. Any doubt about
 * the data (no candidate, too few samples, over the cost ceiling) yields the fallback model
 * with the reason spelled out; nothing here throws for missing data or writes to the store.
 */
export class ValueRouter {
  public readonly fallbackModel: string;
  public readonly defaultThreshold: number;
  public readonly minSamples: number;

  public constructor(
    private readonly performance: PerformanceStore,
    options: ValueRouterOptions
  ) {
    this.fallbackModel = options.fallbackModel;
    this.defaultThreshold = options.defaultThreshold ?? 0.8;
    this.minSamples = options.minSamples ?? 5;
  }

  public selectModel(input: SelectModelInput = {}): ModelSelection {
    const threshold = input.qualityThreshold ?? this.defaultThreshold;
    const base = { qualityThreshold: threshold, category: input.category };

    const candidate = this.performance.cheapestMeeting(threshold, input.category);
    if (!candidate) {
      return this.fallback(base, `No model meets threshold ${String(threshold)}, using fallback ${this.fallbackModel}`);
    }

    if (candidate.totalSamples < this.minSamples) {
      return this.fallback(
        base,
        `Insufficient data for ${candidate.modelName} (only ${candidate.totalSamples} samples, need ${this.minSamples}), ` +
          `using fallback ${this.fallbackModel}`
      );
    }

    if (input.maxCost !== undefined && candidate.avgCost > input.maxCost) {
      return this.fallback(
        base,
        `${candidate.modelName} exceeds max cost $${input.maxCost.toFixed(4)} ` +
          `(average $${candidate.avgCost.toFixed(4)}), using fallback ${this.fallbackModel}`
      );
    }

    return {
      ...base,
      modelName: candidate.modelName,
      reasoning: `Best value: ${candidate.qualityPerDollar.toFixed(2)} quality/$`,
      usedFallback: false,
      expectedQuality: candidate.avgQualityScore,
      expectedCost: candidate.avgCost,
      expectedLatency: candidate.avgLatency,
      qualityPerDollar: candidate.qualityPerDollar
    };
  }

  /** Summaries with enough samples, best quality-per-dollar first. */
  public getEfficiencyFrontier(category?: PromptCategory): PerformanceSummaryItem[] {
    return this.performance.rankedByValue(this.minSamples, category);
  }

  private fallback(base: { qualityThreshold: number; category?: PromptCategory }, reasoning: string): ModelSelection {
    return { ...base, modelName: this.fallbackModel, reasoning, usedFallback: true };
  }
}
