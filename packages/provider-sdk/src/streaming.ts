import { ProviderRequestError } from "./errors.js";
import { calculateCost, calculateTokensPerSecond, estimateTokens, type TokenPricing } from "./pricing.js";
import type { GenerationResult, ProviderKind } from "./types.js";

export interface StreamChunk {
  delta?: string;
  inputTokens?: number;
  outputTokens?: number;
}

export interface StreamGenerationInput {
  provider: ProviderKind;
  model: string;
  pricing: TokenPricing;
  prompt: string;
  url: string;
  headers: Record<string, string>;
  body: unknown;
  parseChunk(payload: string): StreamChunk;
}

export async function streamGeneration(input: StreamGenerationInput): Promise<GenerationResult> {
  const started = Date.now();
  let response: Response;
  try {
    response = await fetch(input.url, {
      method: "POST",
      headers: { "content-type": "application/json", ...input.headers },
      body: JSON.stringify(input.body)
    });
  } catch (error) {
    throw new ProviderRequestError(input.provider, error instanceof Error ? error.message : String(error));
  }

  if (!response.ok) {
    const detail = (await response.text()).slice(0, 200);
    throw new ProviderRequestError(input.provider, detail || response.statusText, response.status);
  }

  let text = "";
  let timeToFirstToken: number | undefined;
  let reportedInput: number | undefined;
  let reportedOutput: number | undefined;

  for await (const payload of readServerSentData(response)) {
    if (payload === "[DONE]") continue;
    const chunk = input.parseChunk(payload);
    if (chunk.delta) {
      if (timeToFirstToken === undefined) timeToFirstToken = (Date.now() - started) / 1000;
      text += chunk.delta;
    }
    if (chunk.inputTokens !== undefined) reportedInput = chunk.inputTokens;
    if (chunk.outputTokens !== undefined) reportedOutput = chunk.outputTokens;
  }

  const totalLatency = (Date.now() - started) / 1000;
  const inputTokens = reportedInput ?? estimateTokens(input.prompt);
  const outputTokens = reportedOutput ?? estimateTokens(text);
  return {
    text,
    inputTokens,
    outputTokens,
    totalCost: calculateCost(input.pricing, inputTokens, outputTokens),
    timeToFirstToken,
    totalLatency,
    tokensPerSecond: calculateTokensPerSecond(outputTokens, totalLatency),
    metadata: {
      provider: input.provider,
      model: input.model,
      usageReported: reportedInput !== undefined && reportedOutput !== undefined
    }
  };
}

/**
 * Yields the joined `data:` lines of each server-sent event in the response body. The body
 * is cancelled when the consumer stops early or a read fails.
 */
export async function* readServerSentData(response: Response): AsyncGenerator<string> {
  if (!response.body) return;
  const reader = response.body.getReader();
  const decoder = new TextDecoder();
  let buffer = "";
  let drained = false;
  try {
    for (;;) {
      const { done, value } = await reader.read();
      if (done) break;
      buffer += decoder.decode(value, { stream: true }).replace(/\r\n/g, "\n");
      let boundary = buffer.indexOf("\n\n");
      while (boundary !== -1) {
        const data = extractData(buffer.slice(0, boundary));
        buffer = buffer.slice(boundary + 2);
        if (data) yield data;
        boundary = buffer.indexOf("\n\n");
      }
    }
    drained = true;
    const rest = extractData(buffer + decoder.decode());
    if (rest) yield rest;
  } finally {
    try {
      if (!drained) await reader.cancel();
    } finally {
      reader.releaseLock();
    }
  }
}

function extractData(event: string): string {
  return event
    .split("\n")
    .filter((line) => line.startsWith("data:"))
    .map((line) => line.slice(5).replace(/^ /, ""))
    .join("\n")
    .trim();
}

export function parseChunkJson<T>(provider: ProviderKind, payload: string): T {
  try {
    return JSON.parse(payload) as T;
  } catch {
    throw new ProviderRequestError(provider, `malformed stream chunk: ${payload.slice(0, 80)}`);
  }
}
