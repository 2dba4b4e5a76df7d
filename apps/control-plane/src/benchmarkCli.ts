import type Database from "better-sqlite3";
import {
  BenchmarkOrchestrator,
  LlmJudge,
  PROMPT_CATEGORIES,
  isPromptCategory,
  loadPromptSet,
  selectPrompts,
  type PromptCategory
} from "@costwise/evals";
import { resolveModelClient, resolveModelClients, type ApiKeys, type BenchmarkConfig } from "./config.js";
import { SqliteBenchmarkRepository } from "./stores/benchmarkRepository.js";

export interface BenchmarkCliOptions {
  configPath?: string;
  category?: PromptCategory;
  numPrompts?: number;
  includeFollowUps: boolean;
}

const USAGE = `Usage: runBenchmark [--config <path>] [--category <${PROMPT_CATEGORIES.join("|")}>] [--num-prompts <n>] [--no-follow-ups]`;

export function parseBenchmarkArgs(argv: string[]): BenchmarkCliOptions {
  const options: BenchmarkCliOptions = { includeFollowUps: true };
  for (let index = 0; index < argv.length; index += 1) {
    const arg = argv[index];
    const next = argv[index + 1];
    if (arg === "--no-follow-ups") {
      options.includeFollowUps = false;
    } else if (arg === "--config" && next) {
      options.configPath = next;
      index += 1;
    } else if (arg === "--category" && next) {
      if (!isPromptCategory(next)) throw new Error(`Unknown category: ${next}. ${USAGE}`);
      options.category = next;
      index += 1;
    } else if (arg === "--num-prompts" && next) {
      const parsed = Number.parseInt(next, 10);
      if (!Number.isInteger(parsed) || parsed <= 0) throw new Error(`--num-prompts must be a positive integer. ${USAGE}`);
      options.numPrompts = parsed;
      index += 1;
    } else {
      throw new Error(`Unrecognized argument: ${arg ?? ""}. ${USAGE}`);
    }
  }
  return options;
}

export interface BenchmarkCommandDeps {
  config: BenchmarkConfig;
  apiKeys: ApiKeys;
  db?: Database.Database;
}

/** Returns the run id, or undefined when no model or no judge could be initialized. */
export async function runBenchmarkCommand(
  options: BenchmarkCliOptions,
  deps: BenchmarkCommandDeps
): Promise<number | undefined> {
  const { clients, skipped } = resolveModelClients(deps.config.models, deps.apiKeys);
  for (const entry of skipped) {
    // eslint-disable-next-line no-console
    console.warn(`[benchmark] skipping ${entry.name}: ${entry.reason}`);
  }
  if (clients.size === 0) {
    // eslint-disable-next-line no-console
    console.error("[benchmark] no models initialized; check API keys and providers");
    return undefined;
  }

  const judgeClient = resolveModelClient(deps.config.judgeModel, deps.apiKeys);
  if (typeof judgeClient === "string") {
    // eslint-disable-next-line no-console
    console.error(`[benchmark] judge model unavailable: ${judgeClient}`);
    return undefined;
  }

  const prompts = selectPrompts(loadPromptSet(deps.config.promptsPath), {
    category: options.category,
    limit: options.numPrompts
  });
  // eslint-disable-next-line no-console
  console.log(`[benchmark] testing ${clients.size} models with ${prompts.length} prompts`);

  const orchestrator = new BenchmarkOrchestrator({
    models: clients,
    judge: new LlmJudge(judgeClient),
    repository: new SqliteBenchmarkRepository(deps.db)
  });
  return orchestrator.runBenchmark(prompts, options.includeFollowUps);
}
