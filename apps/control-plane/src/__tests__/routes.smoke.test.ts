import test from "node:test";
import assert from "node:assert/strict";
import { createRouteContext, dispatch } from "../app.js";
import type { RouteContext } from "../routes/routeTypes.js";
import { validateRouteRequest } from "../routes/routing.js";
import type { BenchmarkRunItem, PerformanceSummaryItem } from "../types.js";
import { createTestDatabase, repeat, seedResults } from "./fixtures.js";

function createContext(): { ctx: RouteContext; runId: number } {
  const db = createTestDatabase();
  const runId = seedResults(db, [
    ...repeat({ modelName: "small", score: 1, cost: 0.25 }, 5),
    ...repeat({ modelName: "large", score: 1, cost: 0.5 }, 5),
    { modelName: "large", score: 0, cost: 0, error: "timeout" }
  ]);
  const ctx = createRouteContext({ fallbackModel: "large", defaultThreshold: 0.8, minSamples: 5 }, db);
  ctx.performance.recomputeAll();
  return { ctx, runId };
}

test("health route reports ok", () => {
  const { ctx } = createContext();
  const result = dispatch("/api/health", "GET", undefined, ctx);
  assert.equal(result.status, 200);
  assert.equal((result.body as { status: string }).status, "ok");
});

test("dashboard stats count runs and summaries", () => {
  const { ctx } = createContext();
  const result = dispatch("/api/dashboard/stats", "GET", undefined, ctx);
  assert.deepEqual(result.body, {
    totalRuns: 1,
    runningRuns: 1,
    completedRuns: 0,
    trackedModels: 2,
    summaries: 2
  });
});

test("route endpoint selects the cheapest qualifying model", () => {
  const { ctx } = createContext();
  const result = dispatch("/api/route", "POST", { prompt: "Sort a list", qualityThreshold: 0.9 }, ctx);
  assert.equal(result.status, 200);
  const body = result.body as { selectedModel: string; reasoning: string };
  assert.equal(body.selectedModel, "small");
  assert.equal(body.reasoning, "Best value: 4.00 quality/$");
});

test("route endpoint falls back with a reason", () => {
  const { ctx } = createContext();
  const result = dispatch("/api/route", "POST", { prompt: "Sort a list", qualityThreshold: 0.9, maxCost: 0.1 }, ctx);
  assert.equal(result.status, 200);
  assert.deepEqual(result.body, {
    selectedModel: "large",
    reasoning: "small exceeds max cost $0.1000 (average $0.2500), using fallback large",
    selection: {
      modelName: "large",
      reasoning: "small exceeds max cost $0.1000 (average $0.2500), using fallback large",
      qualityThreshold: 0.9,
      category: undefined,
      usedFallback: true
    }
  });
});

test("route endpoint rejects malformed requests", () => {
  const { ctx } = createContext();
  const result = dispatch("/api/route", "POST", { qualityThreshold: 2 }, ctx);
  assert.equal(result.status, 400);
  assert.equal(
    (result.body as { error: string }).error,
    "prompt is required; qualityThreshold must be within [0, 1]"
  );
  assert.deepEqual(validateRouteRequest({ prompt: "x", maxCost: -1, category: "poetry" }), [
    "maxCost must be a non-negative number",
    "category must be one of coding, summarization, creative_writing"
  ]);
});

test("efficiency route lists the frontier and validates the category", () => {
  const { ctx } = createContext();
  const result = dispatch("/api/models/efficiency", "GET", undefined, ctx, new URLSearchParams("category=coding"));
  assert.equal(result.status, 200);
  const body = result.body as { category: string | null; models: PerformanceSummaryItem[] };
  assert.equal(body.category, "coding");
  assert.deepEqual(
    body.models.map((model) => model.modelName),
    ["small", "large"]
  );

  const invalid = dispatch("/api/models/efficiency", "GET", undefined, ctx, new URLSearchParams("category=poetry"));
  assert.equal(invalid.status, 400);
});

test("runs routes expose runs, their counts and results", () => {
  const { ctx, runId } = createContext();
  const list = dispatch("/api/runs", "GET", undefined, ctx);
  assert.equal((list.body as { runs: BenchmarkRunItem[] }).runs.length, 1);

  const detail = dispatch(`/api/runs/${runId}`, "GET", undefined, ctx);
  assert.equal(detail.status, 200);
  const run = detail.body as BenchmarkRunItem & { resultCount: number; failedCount: number };
  assert.equal(run.resultCount, 11);
  assert.equal(run.failedCount, 1);

  assert.equal(dispatch("/api/runs/9999", "GET", undefined, ctx).status, 404);
  assert.equal(dispatch("/api/runs/abc", "GET", undefined, ctx).status, 400);

  const results = dispatch("/api/results", "GET", undefined, ctx, new URLSearchParams("model=small&limit=3"));
  assert.equal((results.body as { results: unknown[] }).results.length, 3);
  assert.equal(dispatch("/api/results", "GET", undefined, ctx, new URLSearchParams("limit=0")).status, 400);
});

test("unknown routes return 404", () => {
  const { ctx } = createContext();
  assert.equal(dispatch("/api/unknown", "GET", undefined, ctx).status, 404);
  assert.equal(dispatch("/api/runs", "DELETE", undefined, ctx).status, 404);
});
