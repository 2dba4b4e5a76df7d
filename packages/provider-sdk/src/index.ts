export { AnthropicAdapter } from "./anthropicAdapter.js";
export { ProviderRequestError, UnknownProviderError } from "./errors.js";
export { GoogleAdapter } from "./googleAdapter.js";
export { OpenAIAdapter } from "./openaiAdapter.js";
export { calculateCost, calculateTokensPerSecond, estimateTokens, type TokenPricing } from "./pricing.js";
export { createGenerationClient } from "./providerFactory.js";
export { readServerSentData, streamGeneration, type StreamChunk } from "./streaming.js";
export {
  PROVIDER_KINDS,
  isProviderKind,
  type GenerationClient,
  type GenerationRequest,
  type GenerationResult,
  type ModelClientConfig,
  type ProviderKind
} from "./types.js";
