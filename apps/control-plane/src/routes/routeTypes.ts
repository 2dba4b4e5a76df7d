import type { ValueRouter } from "../router/valueRouter.js";
import type { EvaluationResultStore } from "../stores/evaluationResultStore.js";
import type { PerformanceStore } from "../stores/performanceStore.js";
import type { RunStore } from "../stores/runStore.js";

export interface RouteContext {
  runs: RunStore;
  results: EvaluationResultStore;
  performance: PerformanceStore;
  router: ValueRouter;
}

export interface RouteResult {
  status: number;
  body: unknown;
}
