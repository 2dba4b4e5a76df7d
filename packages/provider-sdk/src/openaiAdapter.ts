import { parseChunkJson, streamGeneration, type StreamChunk } from "./streaming.js";
import type { GenerationClient, GenerationRequest, GenerationResult, ModelClientConfig } from "./types.js";

interface OpenAIStreamChunk {
  choices?: Array<{
    delta?: { content?: string | null };
    finish_reason?: string | null;
  }>;
  usage?: { prompt_tokens?: number; completion_tokens?: number } | null;
}

export class OpenAIAdapter implements GenerationClient {
  public readonly providerKind = "openai" as const;
  public readonly model: string;

  public constructor(private readonly config: ModelClientConfig) {
    this.model = config.model;
  }

  public async generate(request: GenerationRequest): Promise<GenerationResult> {
    const baseUrl = (this.config.baseUrl ?? "https://api.openai.com/v1").replace(/\/$/, "");
    return streamGeneration({
      provider: this.providerKind,
      model: this.model,
      pricing: this.config,
      prompt: request.prompt,
      url: `${baseUrl}/chat/completions`,
      headers: { authorization: `Bearer ${this.config.apiKey}` },
      body: {
        model: this.model,
        messages: [{ role: "user", content: request.prompt }],
        max_tokens: request.maxTokens ?? 1000,
        temperature: request.temperature ?? 0.7,
        stream: true,
        stream_options: { include_usage: true }
      },
      parseChunk: (payload) => parseOpenAIChunk(parseChunkJson<OpenAIStreamChunk>(this.providerKind, payload))
    });
  }
}

function parseOpenAIChunk(raw: OpenAIStreamChunk): StreamChunk {
  return {
    delta: raw.choices?.[0]?.delta?.content ?? undefined,
    inputTokens: raw.usage?.prompt_tokens,
    outputTokens: raw.usage?.completion_tokens
  };
}
