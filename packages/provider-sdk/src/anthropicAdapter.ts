import { ProviderRequestError } from "./errors.js";
import { parseChunkJson, streamGeneration, type StreamChunk } from "./streaming.js";
import type { GenerationClient, GenerationRequest, GenerationResult, ModelClientConfig } from "./types.js";

interface AnthropicStreamEvent {
  type?: string;
  message?: { usage?: { input_tokens?: number; output_tokens?: number } };
  delta?: { type?: string; text?: string };
  usage?: { output_tokens?: number };
  error?: { message?: string };
}

export class AnthropicAdapter implements GenerationClient {
  public readonly providerKind = "anthropic" as const;
  public readonly model: string;

  public constructor(private readonly config: ModelClientConfig) {
    this.model = config.model;
  }

  public async generate(request: GenerationRequest): Promise<GenerationResult> {
    const baseUrl = (this.config.baseUrl ?? "https://api.anthropic.com/v1").replace(/\/$/, "");
    return streamGeneration({
      provider: this.providerKind,
      model: this.model,
      pricing: this.config,
      prompt: request.prompt,
      url: `${baseUrl}/messages`,
      headers: {
        "x-api-key": this.config.apiKey,
        "anthropic-version": "2023-06-01"
      },
      body: {
        model: this.model,
        messages: [{ role: "user", content: request.prompt }],
        max_tokens: request.maxTokens ?? 1000,
        temperature: request.temperature ?? 0.7,
        stream: true
      },
      parseChunk: (payload) => parseAnthropicEvent(parseChunkJson<AnthropicStreamEvent>(this.providerKind, payload))
    });
  }
}

function parseAnthropicEvent(raw: AnthropicStreamEvent): StreamChunk {
  if (raw.type === "error") {
    throw new ProviderRequestError("anthropic", `stream error: ${raw.error?.message ?? "unknown"}`);
  }
  if (raw.type === "message_start") {
    return { inputTokens: raw.message?.usage?.input_tokens };
  }
  if (raw.type === "content_block_delta" && raw.delta?.type === "text_delta") {
    return { delta: raw.delta.text };
  }
  if (raw.type === "message_delta") {
    return { outputTokens: raw.usage?.output_tokens };
  }
  return {};
}
