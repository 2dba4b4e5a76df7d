import type Database from "better-sqlite3";
import { getControlPlaneDatabase } from "../database.js";
import type { BenchmarkRunItem } from "../types.js";

interface RunRow {
  id: number;
  started_at: string;
  completed_at: string | null;
  status: BenchmarkRunItem["status"];
  total_prompts: number;
}

export class RunStore {
  public constructor(private readonly db: Database.Database = getControlPlaneDatabase()) {}

  public list(): BenchmarkRunItem[] {
    const rows = this.db
      .prepare("SELECT id, started_at, completed_at, status, total_prompts FROM benchmark_runs ORDER BY id DESC")
      .all() as RunRow[];
    return rows.map(toRunItem);
  }

  public get(runId: number): BenchmarkRunItem | undefined {
    const row = this.db
      .prepare("SELECT id, started_at, completed_at, status, total_prompts FROM benchmark_runs WHERE id = ?")
      .get(runId) as RunRow | undefined;
    return row ? toRunItem(row) : undefined;
  }

  public create(totalPrompts: number): BenchmarkRunItem {
    const startedAt = new Date().toISOString();
    const result = this.db
      .prepare("INSERT INTO benchmark_runs (started_at, status, total_prompts) VALUES (?, 'running', ?)")
      .run(startedAt, totalPrompts);
    return {
      id: Number(result.lastInsertRowid),
      startedAt,
      status: "running",
      totalPrompts
    };
  }

  /** Returns false when the run does not exist or was already completed. */
  public complete(runId: number): boolean {
    const result = this.db
      .prepare("UPDATE benchmark_runs SET status = 'completed', completed_at = ? WHERE id = ? AND status = 'running'")
      .run(new Date().toISOString(), runId);
    return result.changes > 0;
  }
}

function toRunItem(row: RunRow): BenchmarkRunItem {
  const item: BenchmarkRunItem = {
    id: row.id,
    startedAt: row.started_at,
    status: row.status,
    totalPrompts: row.total_prompts
  };
  if (row.completed_at) item.completedAt = row.completed_at;
  return item;
}
