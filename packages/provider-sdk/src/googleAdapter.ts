import { parseChunkJson, streamGeneration, type StreamChunk } from "./streaming.js";
import type { GenerationClient, GenerationRequest, GenerationResult, ModelClientConfig } from "./types.js";

interface GeminiStreamChunk {
  candidates?: Array<{
    content?: { parts?: Array<{ text?: string }> };
    finishReason?: string;
  }>;
  usageMetadata?: { promptTokenCount?: number; candidatesTokenCount?: number };
}

export class GoogleAdapter implements GenerationClient {
  public readonly providerKind = "google" as const;
  public readonly model: string;

  public constructor(private readonly config: ModelClientConfig) {
    this.model = config.model;
  }

  public async generate(request: GenerationRequest): Promise<GenerationResult> {
    const baseUrl = (this.config.baseUrl ?? "https://generativelanguage.googleapis.com/v1beta").replace(/\/$/, "");
    return streamGeneration({
      provider: this.providerKind,
      model: this.model,
      pricing: this.config,
      prompt: request.prompt,
      url: `${baseUrl}/models/${encodeURIComponent(this.model)}:streamGenerateContent?alt=sse`,
      headers: { "x-goog-api-key": this.config.apiKey },
      body: {
        contents: [{ role: "user", parts: [{ text: request.prompt }] }],
        generationConfig: {
          maxOutputTokens: request.maxTokens ?? 1000,
          temperature: request.temperature ?? 0.7
        }
      },
      parseChunk: (payload) => parseGeminiChunk(parseChunkJson<GeminiStreamChunk>(this.providerKind, payload))
    });
  }
}

function parseGeminiChunk(raw: GeminiStreamChunk): StreamChunk {
  const parts = raw.candidates?.[0]?.content?.parts ?? [];
  const delta = parts.map((part) => part.text ?? "").join("");
  return {
    delta: delta || undefined,
    inputTokens: raw.usageMetadata?.promptTokenCount,
    outputTokens: raw.usageMetadata?.candidatesTokenCount
  };
}
