export type ProviderKind = "openai" | "anthropic" | "google";

export const PROVIDER_KINDS: ProviderKind[] = ["openai", "anthropic", "google"];

export interface ModelClientConfig {
  providerKind: ProviderKind;
  model: string;
  apiKey: string;
  inputCostPer1k: number;
  outputCostPer1k: number;
  baseUrl?: string;
}

export interface GenerationRequest {
  prompt: string;
  maxTokens?: number;
  temperature?: number;
}

export interface GenerationResult {
  text: string;
  inputTokens: number;
  outputTokens: number;
  totalCost: number;
  /** Seconds until the first non-empty text chunk; absent when nothing was streamed. */
  timeToFirstToken?: number;
  /** Seconds. */
  totalLatency: number;
  tokensPerSecond: number;
  metadata: Record<string, unknown>;
}

export interface GenerationClient {
  readonly providerKind: ProviderKind;
  readonly model: string;
  generate(request: GenerationRequest): Promise<GenerationResult>;
}

export function isProviderKind(value: unknown): value is ProviderKind {
  return PROVIDER_KINDS.some((kind) => kind === value);
}
