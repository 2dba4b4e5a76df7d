import type Database from "better-sqlite3";
import { isPromptCategory, type PromptCategory } from "@costwise/evals";
import { getControlPlaneDatabase } from "../database.js";
import type { ModelPerformance, PerformanceSummaryItem } from "../types.js";
import { EvaluationResultStore } from "./evaluationResultStore.js";

interface AggregateRow {
  total_samples: number;
  successes: number | null;
  avg_quality: number | null;
  avg_cost: number | null;
  avg_latency: number | null;
  avg_tokens_per_second: number | null;
}

interface CacheRow {
  model_name: string;
  category: string;
  avg_quality_score: number;
  avg_cost: number;
  avg_latency: number;
  avg_tokens_per_second: number;
  total_samples: number;
  quality_per_dollar: number;
  last_updated: string;
}

const CACHE_COLUMNS =
  "model_name, category, avg_quality_score, avg_cost, avg_latency, avg_tokens_per_second, total_samples, quality_per_dollar, last_updated";

/**
 * Per-(model, category) summaries derived from evaluation results. Every refresh
 * recomputes each pair from scratch and replaces the cached numbers.
 */
export class PerformanceStore {
  private readonly results: EvaluationResultStore;

  public constructor(private readonly db: Database.Database = getControlPlaneDatabase()) {
    this.results = new EvaluationResultStore(db);
  }

  /**
   * Aggregates over every row of a model (optionally one category). Returns undefined when
   * the rows hold no successful evaluation, so error-only pairs never look cheap.
   */
  public getModelPerformance(modelName: string, category?: PromptCategory): ModelPerformance | undefined {
    const row = this.db
      .prepare(
        `SELECT
          COUNT(*) as total_samples,
          SUM(CASE WHEN error_message IS NULL THEN 1 ELSE 0 END) as successes,
          AVG(quality_score) as avg_quality,
          AVG(total_cost) as avg_cost,
          AVG(total_latency) as avg_latency,
          AVG(tokens_per_second) as avg_tokens_per_second
         FROM evaluation_results
         WHERE model_name = ? AND (? IS NULL OR prompt_category = ?)`
      )
      .get(modelName, category ?? null, category ?? null) as AggregateRow;

    if (!row.successes || row.avg_quality === null || row.avg_cost === null) return undefined;
    const avgCost = row.avg_cost;
    const performance: ModelPerformance = {
      modelName,
      avgQualityScore: row.avg_quality,
      avgCost,
      avgLatency: row.avg_latency ?? 0,
      avgTokensPerSecond: row.avg_tokens_per_second ?? 0,
      totalSamples: Number(row.total_samples),
      qualityPerDollar: avgCost > 0 ? row.avg_quality / avgCost : 0
    };
    if (category) performance.category = category;
    return performance;
  }

  public recomputeAll(): number {
    const upsert = this.db.prepare(
      `INSERT INTO performance_cache (${CACHE_COLUMNS}) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
       ON CONFLICT(model_name, category) DO UPDATE SET
         avg_quality_score = excluded.avg_quality_score,
         avg_cost = excluded.avg_cost,
         avg_latency = excluded.avg_latency,
         avg_tokens_per_second = excluded.avg_tokens_per_second,
         total_samples = excluded.total_samples,
         quality_per_dollar = excluded.quality_per_dollar,
         last_updated = excluded.last_updated`
    );
    const remove = this.db.prepare("DELETE FROM performance_cache WHERE model_name = ? AND category = ?");

    const refresh = this.db.transaction(() => {
      const now = new Date().toISOString();
      let written = 0;
      for (const pair of this.results.distinctModelCategories()) {
        const perf = this.getModelPerformance(pair.modelName, pair.category);
        if (!perf) {
          remove.run(pair.modelName, pair.category);
          continue;
        }
        upsert.run(
          perf.modelName,
          pair.category,
          perf.avgQualityScore,
          perf.avgCost,
          perf.avgLatency,
          perf.avgTokensPerSecond,
          perf.totalSamples,
          perf.qualityPerDollar,
          now
        );
        written += 1;
      }
      this.db
        .prepare(
          `DELETE FROM performance_cache WHERE NOT EXISTS (
            SELECT 1 FROM evaluation_results r
            WHERE r.model_name = performance_cache.model_name AND r.prompt_category = performance_cache.category
          )`
        )
        .run();
      return written;
    });
    return refresh();
  }

  public list(category?: PromptCategory): PerformanceSummaryItem[] {
    const rows = this.db
      .prepare(
        `SELECT ${CACHE_COLUMNS} FROM performance_cache
         WHERE (? IS NULL OR category = ?)
         ORDER BY model_name ASC, category ASC`
      )
      .all(category ?? null, category ?? null) as CacheRow[];
    return rows.flatMap(toSummaryItem);
  }

  /** Lowest mean cost among summaries at or above the threshold; ties go to the smaller model name. */
  public cheapestMeeting(qualityThreshold: number, category?: PromptCategory): PerformanceSummaryItem | undefined {
    const row = this.db
      .prepare(
        `SELECT ${CACHE_COLUMNS} FROM performance_cache
         WHERE avg_quality_score >= ? AND (? IS NULL OR category = ?)
         ORDER BY avg_cost ASC, model_name ASC, category ASC
         LIMIT 1`
      )
      .get(qualityThreshold, category ?? null, category ?? null) as CacheRow | undefined;
    return row ? toSummaryItem(row)[0] : undefined;
  }

  public rankedByValue(minSamples: number, category?: PromptCategory): PerformanceSummaryItem[] {
    const rows = this.db
      .prepare(
        `SELECT ${CACHE_COLUMNS} FROM performance_cache
         WHERE total_samples >= ? AND (? IS NULL OR category = ?)
         ORDER BY quality_per_dollar DESC, model_name ASC, category ASC`
      )
      .all(minSamples, category ?? null, category ?? null) as CacheRow[];
    return rows.flatMap(toSummaryItem);
  }
}

function toSummaryItem(row: CacheRow): PerformanceSummaryItem[] {
  if (!isPromptCategory(row.category)) return [];
  return [
    {
      modelName: row.model_name,
      category: row.category,
      avgQualityScore: row.avg_quality_score,
      avgCost: row.avg_cost,
      avgLatency: row.avg_latency,
      avgTokensPerSecond: row.avg_tokens_per_second,
      totalSamples: row.total_samples,
      qualityPerDollar: row.quality_per_dollar,
      lastUpdated: row.last_updated
    }
  ];
}
