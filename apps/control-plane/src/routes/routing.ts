import { PROMPT_CATEGORIES, isPromptCategory, type PromptCategory } from "@costwise/evals";
import type { RouteContext, RouteResult } from "./routeTypes.js";

export function handleRoutingRoute(
  pathname: string,
  method: string,
  body: unknown,
  ctx: RouteContext,
  query: URLSearchParams
): RouteResult | undefined {
  if (pathname === "/api/route" && method === "POST") {
    const payload = isRecord(body) ? body : {};
    const errors = validateRouteRequest(payload);
    if (errors.length > 0) {
      return { status: 400, body: { error: errors.join("; ") } };
    }
    const selection = ctx.router.selectModel({
      qualityThreshold: typeof payload.qualityThreshold === "number" ? payload.qualityThreshold : undefined,
      category: isPromptCategory(payload.category) ? payload.category : undefined,
      maxCost: typeof payload.maxCost === "number" ? payload.maxCost : undefined
    });
    return {
      status: 200,
      body: {
        selectedModel: selection.modelName,
        reasoning: selection.reasoning,
        selection
      }
    };
  }

  if (pathname === "/api/models/efficiency" && method === "GET") {
    const rawCategory = query.get("category");
    let category: PromptCategory | undefined;
    if (rawCategory) {
      if (!isPromptCategory(rawCategory)) {
        return { status: 400, body: { error: `Unknown category: ${rawCategory}` } };
      }
      category = rawCategory;
    }
    return {
      status: 200,
      body: { category: category ?? null, models: ctx.router.getEfficiencyFrontier(category) }
    };
  }

  return undefined;
}

export function validateRouteRequest(payload: Record<string, unknown>): string[] {
  const errors: string[] = [];
  if (typeof payload.prompt !== "string" || !payload.prompt.trim()) errors.push("prompt is required");
  const threshold = payload.qualityThreshold;
  if (
    threshold !== undefined &&
    threshold !== null &&
    (typeof threshold !== "number" || !Number.isFinite(threshold) || threshold < 0 || threshold > 1)
  ) {
    errors.push("qualityThreshold must be within [0, 1]");
  }
  const maxCost = payload.maxCost;
  if (maxCost !== undefined && maxCost !== null && (typeof maxCost !== "number" || !Number.isFinite(maxCost) || maxCost < 0)) {
    errors.push("maxCost must be a non-negative number");
  }
  if (payload.category !== undefined && payload.category !== null && !isPromptCategory(payload.category)) {
    errors.push(`category must be one of ${PROMPT_CATEGORIES.join(", ")}`);
  }
  return errors;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}
