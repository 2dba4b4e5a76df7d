import type Database from "better-sqlite3";
import type { RouterSettings } from "./config.js";
import { getControlPlaneDatabase } from "./database.js";
import { ValueRouter } from "./router/valueRouter.js";
import { handleDashboardRoute } from "./routes/dashboard.js";
import type { RouteContext, RouteResult } from "./routes/routeTypes.js";
import { handleRoutingRoute } from "./routes/routing.js";
import { handleRunsRoute } from "./routes/runs.js";
import { EvaluationResultStore } from "./stores/evaluationResultStore.js";
import { PerformanceStore } from "./stores/performanceStore.js";
import { RunStore } from "./stores/runStore.js";

export function createRouteContext(
  router: RouterSettings,
  db: Database.Database = getControlPlaneDatabase()
): RouteContext {
  const performance = new PerformanceStore(db);
  return {
    runs: new RunStore(db),
    results: new EvaluationResultStore(db),
    performance,
    router: new ValueRouter(performance, router)
  };
}

export function dispatch(
  pathname: string,
  method: string,
  body: unknown,
  ctx: RouteContext,
  query: URLSearchParams = new URLSearchParams()
): RouteResult {
  try {
    const result =
      handleDashboardRoute(pathname, method, ctx) ??
      handleRoutingRoute(pathname, method, body, ctx, query) ??
      handleRunsRoute(pathname, method, body, ctx, query);
    return result ?? { status: 404, body: { error: "Route not found" } };
  } catch (error) {
    // eslint-disable-next-line no-console
    console.error(`[server] ${method} ${pathname} failed:`, error);
    return { status: 500, body: { error: error instanceof Error ? error.message : "Internal error" } };
  }
}
