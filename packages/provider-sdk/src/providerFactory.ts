import { AnthropicAdapter } from "./anthropicAdapter.js";
import { UnknownProviderError } from "./errors.js";
import { GoogleAdapter } from "./googleAdapter.js";
import { OpenAIAdapter } from "./openaiAdapter.js";
import type { GenerationClient, ModelClientConfig, ProviderKind } from "./types.js";

type ClientConstructor = (config: ModelClientConfig) => GenerationClient;

const constructors = new Map<ProviderKind, ClientConstructor>([
  ["openai", (config) => new OpenAIAdapter(config)],
  ["anthropic", (config) => new AnthropicAdapter(config)],
  ["google", (config) => new GoogleAdapter(config)]
]);

export function createGenerationClient(config: ModelClientConfig): GenerationClient {
  const construct = constructors.get(config.providerKind);
  if (!construct) {
    throw new UnknownProviderError(String(config.providerKind));
  }
  return construct(config);
}
