import type Database from "better-sqlite3";
import type { BenchmarkRepository, EvaluationResultInput } from "@costwise/evals";
import { getControlPlaneDatabase } from "../database.js";
import { EvaluationResultStore } from "./evaluationResultStore.js";
import { PerformanceStore } from "./performanceStore.js";
import { RunStore } from "./runStore.js";

export class SqliteBenchmarkRepository implements BenchmarkRepository {
  public readonly runs: RunStore;
  public readonly results: EvaluationResultStore;
  public readonly performance: PerformanceStore;

  public constructor(db: Database.Database = getControlPlaneDatabase()) {
    this.runs = new RunStore(db);
    this.results = new EvaluationResultStore(db);
    this.performance = new PerformanceStore(db);
  }

  public createRun(totalPrompts: number): { id: number } {
    return this.runs.create(totalPrompts);
  }

  public completeRun(runId: number): void {
    if (!this.runs.complete(runId)) {
      throw new Error(`Benchmark run ${runId} is not running.`);
    }
  }

  public saveResult(result: EvaluationResultInput): void {
    this.results.save(result);
  }

  public recomputePerformance(): void {
    const written = this.performance.recomputeAll();
    // eslint-disable-next-line no-console
    console.log(`[performance] refreshed ${written} summaries`);
  }
}
