export interface TokenPricing {
  inputCostPer1k: number;
  outputCostPer1k: number;
}

export function calculateCost(pricing: TokenPricing, inputTokens: number, outputTokens: number): number {
  const inputCost = (inputTokens / 1000) * pricing.inputCostPer1k;
  const outputCost = (outputTokens / 1000) * pricing.outputCostPer1k;
  return inputCost + outputCost;
}

export function calculateTokensPerSecond(outputTokens: number, latencySeconds: number): number {
  if (latencySeconds > 0) return outputTokens / latencySeconds;
  return 0;
}

export function estimateTokens(text: string): number {
  // Whitespace approximation for streams that never report usage.
  const words = text.split(/\s+/).filter((word) => word.length > 0).length;
  return Math.floor(words * 1.3);
}
