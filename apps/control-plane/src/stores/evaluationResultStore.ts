import type Database from "better-sqlite3";
import { isPromptCategory, type EvaluationResultInput, type PromptCategory } from "@costwise/evals";
import { getControlPlaneDatabase } from "../database.js";
import type { EvaluationResultItem } from "../types.js";

export class InvalidEvaluationResultError extends Error {
  public constructor(message: string) {
    super(message);
    this.name = "InvalidEvaluationResultError";
  }
}

interface ResultRow {
  id: number;
  run_id: number;
  model_name: string;
  provider: string;
  prompt_id: string;
  prompt_text: string;
  prompt_category: string;
  turn_number: number;
  response_text: string | null;
  quality_score: number | null;
  judge_reasoning: string | null;
  input_tokens: number;
  output_tokens: number;
  total_cost: number;
  time_to_first_token: number | null;
  total_latency: number;
  tokens_per_second: number;
  metadata_json: string;
  timestamp: string;
  error_message: string | null;
}

export interface ResultFilter {
  modelName?: string;
  category?: PromptCategory;
  runId?: number;
  limit?: number;
}

/**
 * Append-only record of every evaluation attempt. Rows are never updated or deleted.
 */
export class EvaluationResultStore {
  public constructor(private readonly db: Database.Database = getControlPlaneDatabase()) {}

  public save(input: EvaluationResultInput): EvaluationResultItem {
    const hasResponse = input.responseText !== null;
    const hasError = input.errorMessage !== null;
    if (hasResponse === hasError) {
      throw new InvalidEvaluationResultError("Exactly one of responseText and errorMessage must be set.");
    }
    if (input.qualityScore !== null && (input.qualityScore < 0 || input.qualityScore > 1)) {
      throw new InvalidEvaluationResultError(`qualityScore ${input.qualityScore} is outside [0, 1].`);
    }

    const result = this.db
      .prepare(
        `INSERT INTO evaluation_results (
          run_id, model_name, provider, prompt_id, prompt_text, prompt_category, turn_number,
          response_text, quality_score, judge_reasoning, input_tokens, output_tokens, total_cost,
          time_to_first_token, total_latency, tokens_per_second, metadata_json, timestamp, error_message
        ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`
      )
      .run(
        input.runId,
        input.modelName,
        input.provider,
        input.promptId,
        input.promptText,
        input.category,
        input.turnNumber,
        input.responseText,
        input.qualityScore,
        input.judgeReasoning,
        input.inputTokens,
        input.outputTokens,
        finiteOrZero(input.totalCost),
        input.timeToFirstToken,
        finiteOrZero(input.totalLatency),
        finiteOrZero(input.tokensPerSecond),
        JSON.stringify(input.metadata),
        input.timestamp,
        input.errorMessage
      );
    return { ...input, id: Number(result.lastInsertRowid) };
  }

  public list(filter: ResultFilter = {}): EvaluationResultItem[] {
    const clauses: string[] = [];
    const params: Array<string | number> = [];
    if (filter.modelName) {
      clauses.push("model_name = ?");
      params.push(filter.modelName);
    }
    if (filter.category) {
      clauses.push("prompt_category = ?");
      params.push(filter.category);
    }
    if (filter.runId !== undefined) {
      clauses.push("run_id = ?");
      params.push(filter.runId);
    }
    const where = clauses.length > 0 ? `WHERE ${clauses.join(" AND ")}` : "";
    params.push(Math.max(1, filter.limit ?? 1000));
    const rows = this.db
      .prepare(`SELECT * FROM evaluation_results ${where} ORDER BY timestamp DESC, id DESC LIMIT ?`)
      .all(...params) as ResultRow[];
    return rows.map(toResultItem);
  }

  public countByRun(runId: number): { total: number; failed: number } {
    const row = this.db
      .prepare(
        "SELECT COUNT(*) as total, COALESCE(SUM(CASE WHEN error_message IS NOT NULL THEN 1 ELSE 0 END), 0) as failed FROM evaluation_results WHERE run_id = ?"
      )
      .get(runId) as { total: number; failed: number };
    return { total: Number(row.total), failed: Number(row.failed) };
  }

  public distinctModelCategories(): Array<{ modelName: string; category: PromptCategory }> {
    const rows = this.db
      .prepare(
        "SELECT DISTINCT model_name, prompt_category FROM evaluation_results ORDER BY model_name ASC, prompt_category ASC"
      )
      .all() as Array<{ model_name: string; prompt_category: string }>;
    return rows.flatMap((row) =>
      isPromptCategory(row.prompt_category) ? [{ modelName: row.model_name, category: row.prompt_category }] : []
    );
  }
}

function toResultItem(row: ResultRow): EvaluationResultItem {
  return {
    id: row.id,
    runId: row.run_id,
    modelName: row.model_name,
    provider: row.provider,
    promptId: row.prompt_id,
    promptText: row.prompt_text,
    category: isPromptCategory(row.prompt_category) ? row.prompt_category : "coding",
    turnNumber: row.turn_number,
    responseText: row.response_text,
    qualityScore: row.quality_score,
    judgeReasoning: row.judge_reasoning,
    inputTokens: row.input_tokens,
    outputTokens: row.output_tokens,
    totalCost: row.total_cost,
    timeToFirstToken: row.time_to_first_token,
    totalLatency: row.total_latency,
    tokensPerSecond: row.tokens_per_second,
    metadata: parseMetadata(row.metadata_json),
    timestamp: row.timestamp,
    errorMessage: row.error_message
  };
}

function parseMetadata(value: string): Record<string, unknown> {
  try {
    const parsed = JSON.parse(value) as unknown;
    return typeof parsed === "object" && parsed !== null && !Array.isArray(parsed) ? { ...parsed } : {};
  } catch {
    return {};
  }
}

function finiteOrZero(value: number): number {
  return Number.isFinite(value) ? value : 0;
}
