import type { RouteContext, RouteResult } from "./routeTypes.js";

export function handleDashboardRoute(pathname: string, method: string, ctx: RouteContext): RouteResult | undefined {
  if (method !== "GET") return undefined;

  if (pathname === "/api/health") {
    return {
      status: 200,
      body: { service: "@costwise/control-plane", status: "ok", timestamp: new Date().toISOString() }
    };
  }

  if (pathname !== "/api/dashboard/stats") return undefined;

  const runs = ctx.runs.list();
  const summaries = ctx.performance.list();
  return {
    status: 200,
    body: {
      totalRuns: runs.length,
      runningRuns: runs.filter((run) => run.status === "running").length,
      completedRuns: runs.filter((run) => run.status === "completed").length,
      trackedModels: new Set(summaries.map((summary) => summary.modelName)).size,
      summaries: summaries.length
    }
  };
}
