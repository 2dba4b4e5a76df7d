export { createRouteContext, dispatch } from "./app.js";
export { parseBenchmarkArgs, runBenchmarkCommand, type BenchmarkCliOptions } from "./benchmarkCli.js";
export {
  ConfigValidationError,
  getApiKeys,
  loadBenchmarkConfig,
  parseBenchmarkConfig,
  resolveModelClients,
  type BenchmarkConfig,
  type ModelEntry,
  type RouterSettings
} from "./config.js";
export { getControlPlaneDatabase, openControlPlaneDatabase } from "./database.js";
export { ValueRouter, type SelectModelInput, type ValueRouterOptions } from "./router/valueRouter.js";
export { SqliteBenchmarkRepository } from "./stores/benchmarkRepository.js";
export { EvaluationResultStore, InvalidEvaluationResultError } from "./stores/evaluationResultStore.js";
export { PerformanceStore } from "./stores/performanceStore.js";
export { RunStore } from "./stores/runStore.js";
export type {
  BenchmarkRunItem,
  EvaluationResultItem,
  ModelPerformance,
  ModelSelection,
  PerformanceSummaryItem
} from "./types.js";
