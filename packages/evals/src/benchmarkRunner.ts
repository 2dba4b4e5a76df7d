import type { GenerationClient } from "@costwise/provider-sdk";
import type { BenchmarkPrompt, BenchmarkRepository, JudgeVerdict, PromptCategory } from "./types.js";

const GENERATION_MAX_TOKENS = 1000;

export interface ResponseJudge {
  evaluate(prompt: string, response: string, category: PromptCategory): Promise<JudgeVerdict>;
}

export interface BenchmarkOrchestratorOptions {
  /** Keyed by the model name recorded on every result row. */
  models: Map<string, GenerationClient>;
  judge: ResponseJudge;
  repository: BenchmarkRepository;
}

interface TurnInput {
  runId: number;
  modelName: string;
  client: GenerationClient;
  prompt: BenchmarkPrompt;
  promptText: string;
  turnNumber: number;
}

export function countExpectedEvaluations(prompts: BenchmarkPrompt[], modelCount: number, includeFollowUps: boolean): number {
  let total = prompts.length * modelCount;
  if (includeFollowUps) {
    total += prompts.reduce((sum, prompt) => sum + (prompt.followUps?.length ?? 0), 0) * modelCount;
  }
  return total;
}

export class BenchmarkOrchestrator {
  private readonly models: Map<string, GenerationClient>;
  private readonly judge: ResponseJudge;
  private readonly repository: BenchmarkRepository;

  public constructor(options: BenchmarkOrchestratorOptions) {
    this.models = options.models;
    this.judge = options.judge;
    this.repository = options.repository;
  }

  public async runBenchmark(prompts: BenchmarkPrompt[], includeFollowUps = true): Promise<number> {
    const totalPrompts = countExpectedEvaluations(prompts, this.models.size, includeFollowUps);
    const run = this.repository.createRun(totalPrompts);
    // eslint-disable-next-line no-console
    console.log(`[benchmark] started run ${run.id} with ${totalPrompts} total prompts`);

    const units = [...this.models].map(([modelName, client]) =>
      this.benchmarkModel(run.id, modelName, client, prompts, includeFollowUps)
    );
    const settled = await Promise.allSettled(units);
    for (const outcome of settled) {
      if (outcome.status === "rejected") {
        // eslint-disable-next-line no-console
        console.error(`[benchmark] model unit aborted: ${describeError(outcome.reason)}`);
      }
    }

    this.repository.completeRun(run.id);
    this.repository.recomputePerformance();
    // eslint-disable-next-line no-console
    console.log(`[benchmark] completed run ${run.id}`);
    return run.id;
  }

  private async benchmarkModel(
    runId: number,
    modelName: string,
    client: GenerationClient,
    prompts: BenchmarkPrompt[],
    includeFollowUps: boolean
  ): Promise<void> {
    // eslint-disable-next-line no-console
    console.log(`[benchmark] starting ${modelName}`);
    for (const prompt of prompts) {
      await this.benchmarkTurn({ runId, modelName, client, prompt, promptText: prompt.prompt, turnNumber: 1 });
      if (!includeFollowUps) continue;
      const followUps = prompt.followUps ?? [];
      for (const [index, followUp] of followUps.entries()) {
        await this.benchmarkTurn({ runId, modelName, client, prompt, promptText: followUp, turnNumber: index + 2 });
      }
    }
    // eslint-disable-next-line no-console
    console.log(`[benchmark] completed ${modelName}`);
  }

  private async benchmarkTurn(input: TurnInput): Promise<void> {
    const { prompt, promptText, turnNumber, modelName } = input;
    try {
      const response = await input.client.generate({ prompt: promptText, maxTokens: GENERATION_MAX_TOKENS });
      const verdict = await this.judge.evaluate(promptText, response.text, prompt.category);
      this.repository.saveResult({
        runId: input.runId,
        modelName,
        provider: typeof response.metadata.provider === "string" ? response.metadata.provider : input.client.providerKind,
        promptId: prompt.id,
        promptText,
        category: prompt.category,
        turnNumber,
        responseText: response.text,
        qualityScore: verdict.score,
        judgeReasoning: verdict.rationale,
        inputTokens: response.inputTokens,
        outputTokens: response.outputTokens,
        totalCost: response.totalCost,
        timeToFirstToken: response.timeToFirstToken ?? null,
        totalLatency: response.totalLatency,
        tokensPerSecond: response.tokensPerSecond,
        metadata: response.metadata,
        timestamp: new Date().toISOString(),
        errorMessage: null
      });
      // eslint-disable-next-line no-console
      console.log(
        `[benchmark] ✓ ${modelName} - ${prompt.id} (turn ${turnNumber}): score=${verdict.score.toFixed(2)}, ` +
          `cost=$${response.totalCost.toFixed(4)}, latency=${response.totalLatency.toFixed(2)}s`
      );
    } catch (error) {
      const message = describeError(error);
      this.repository.saveResult({
        runId: input.runId,
        modelName,
        provider: input.client.providerKind,
        promptId: prompt.id,
        promptText,
        category: prompt.category,
        turnNumber,
        responseText: null,
        qualityScore: 0,
        judgeReasoning: null,
        inputTokens: 0,
        outputTokens: 0,
        totalCost: 0,
        timeToFirstToken: null,
        totalLatency: 0,
        tokensPerSecond: 0,
        metadata: {},
        timestamp: new Date().toISOString(),
        errorMessage: message
      });
      // eslint-disable-next-line no-console
      console.error(`[benchmark] ✗ ${modelName} - ${prompt.id} (turn ${turnNumber}): ${message}`);
    }
  }
}

function describeError(error: unknown): string {
  const message = error instanceof Error ? error.message : String(error);
  return message.trim() === "" ? "Unknown error" : message;
}
