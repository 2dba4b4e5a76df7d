import { isPromptCategory } from "@costwise/evals";
import type { ResultFilter } from "../stores/evaluationResultStore.js";
import type { RouteContext, RouteResult } from "./routeTypes.js";

export function handleRunsRoute(
  pathname: string,
  method: string,
  _body: unknown,
  ctx: RouteContext,
  query: URLSearchParams
): RouteResult | undefined {
  if (method !== "GET") return undefined;

  if (pathname === "/api/runs") {
    return { status: 200, body: { runs: ctx.runs.list() } };
  }

  if (pathname.startsWith("/api/runs/")) {
    const runId = parseId(pathname.replace("/api/runs/", ""));
    if (runId === undefined) return { status: 400, body: { error: "Run id must be a positive integer" } };
    const run = ctx.runs.get(runId);
    if (!run) return { status: 404, body: { error: "Run not found" } };
    const counts = ctx.results.countByRun(runId);
    return { status: 200, body: { ...run, resultCount: counts.total, failedCount: counts.failed } };
  }

  if (pathname === "/api/results") {
    const filter: ResultFilter = {};
    const model = query.get("model");
    if (model) filter.modelName = model;
    const category = query.get("category");
    if (category) {
      if (!isPromptCategory(category)) return { status: 400, body: { error: `Unknown category: ${category}` } };
      filter.category = category;
    }
    const runId = query.get("runId");
    if (runId) {
      const parsed = parseId(runId);
      if (parsed === undefined) return { status: 400, body: { error: "runId must be a positive integer" } };
      filter.runId = parsed;
    }
    const limit = query.get("limit");
    if (limit) {
      const parsed = parseId(limit);
      if (parsed === undefined) return { status: 400, body: { error: "limit must be a positive integer" } };
      filter.limit = parsed;
    }
    return { status: 200, body: { results: ctx.results.list(filter) } };
  }

  return undefined;
}

function parseId(value: string): number | undefined {
  if (!/^\d+$/.test(value)) return undefined;
  const parsed = Number.parseInt(value, 10);
  return parsed > 0 ? parsed : undefined;
}
