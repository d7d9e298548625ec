import { lookupPricing } from "./registry";

export interface TokenCounts {
  inputTokens: number;
  outputTokens: number;
  cacheCreationTokens: number;
  cacheReadTokens: number;
}

export interface CostBreakdown {
  input: number;
  output: number;
  cacheWrite: number;
  cacheRead: number;
  total: number;
}

/**
 * Per-category cost in USD for a set of token counts on one model.
 * Unknown models are priced with the default tuple, never at zero.
 */
export function costBreakdown(tokens: TokenCounts, model: string): CostBreakdown {
  const pricing = lookupPricing(model);

  const input = (tokens.inputTokens / 1_000_000) * pricing.inputPerMTok;
  const output = (tokens.outputTokens / 1_000_000) * pricing.outputPerMTok;
  const cacheWrite = (tokens.cacheCreationTokens / 1_000_000) * pricing.cacheWritePerMTok;
  const cacheRead = (tokens.cacheReadTokens / 1_000_000) * pricing.cacheReadPerMTok;

  return { input, output, cacheWrite, cacheRead, total: input + output + cacheWrite + cacheRead };
}

/** Estimated cost in USD. */
export function computeCost(tokens: TokenCounts, model: string): number {
  return costBreakdown(tokens, model).total;
}
