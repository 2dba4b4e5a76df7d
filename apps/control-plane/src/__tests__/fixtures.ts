import type Database from "better-sqlite3";
import type { EvaluationResultInput } from "@costwise/evals";
import { openControlPlaneDatabase } from "../database.js";
import { EvaluationResultStore } from "../stores/evaluationResultStore.js";
import { RunStore } from "../stores/runStore.js";

export function createTestDatabase(): Database.Database {
  return openControlPlaneDatabase(":memory:");
}

export interface SeedRow {
  modelName: string;
  category?: EvaluationResultInput["category"];
  score: number;
  cost: number;
  latency?: number;
  tokensPerSecond?: number;
  error?: string;
}

/** Creates a run and appends one evaluation row per seed entry. Returns the run id. */
export function seedResults(db: Database.Database, rows: SeedRow[]): number {
  const run = new RunStore(db).create(rows.length);
  const results = new EvaluationResultStore(db);
  rows.forEach((row, index) => {
    results.save({
      runId: run.id,
      modelName: row.modelName,
      provider: "openai",
      promptId: `prompt_${index}`,
      promptText: `prompt ${index}`,
      category: row.category ?? "coding",
      turnNumber: 1,
      responseText: row.error ? null : `response ${index}`,
      qualityScore: row.score,
      judgeReasoning: row.error ? null : "ok",
      inputTokens: row.error ? 0 : 12,
      outputTokens: row.error ? 0 : 30,
      totalCost: row.cost,
      timeToFirstToken: row.error ? null : 0.2,
      totalLatency: row.latency ?? (row.error ? 0 : 1),
      tokensPerSecond: row.tokensPerSecond ?? (row.error ? 0 : 30),
      metadata: { provider: "openai" },
      timestamp: new Date(Date.UTC(2026, 0, 1, 0, 0, index)).toISOString(),
      errorMessage: row.error ?? null
    });
  });
  return run.id;
}

/** Repeats one seed row `count` times. */
export function repeat(row: SeedRow, count: number): SeedRow[] {
  return Array.from({ length: count }, () => ({ ...row }));
}
