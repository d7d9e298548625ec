/**
 * Model registry: context window sizes and pricing per model family.
 *
 * Prices are in USD per million tokens (MTok).
 */

export interface ModelPricing {
  inputPerMTok: number;
  outputPerMTok: number;
  cacheWritePerMTok: number;
  cacheReadPerMTok: number;
}

export interface ModelInfo extends ModelPricing {
  /** Maximum tokens retained as conversational context. */
  contextWindow: number;
}

export const DEFAULT_CONTEXT_WINDOW = 200_000;

/**
 * Applied to model ids that resolve to no known family. Sonnet-level rates,
 * so an unknown model reports an estimate rather than zero.
 */
export const DEFAULT_PRICING: ModelPricing = {
  inputPerMTok: 3,
  outputPerMTok: 15,
  cacheWritePerMTok: 3.75,
  cacheReadPerMTok: 0.3,
};

const OPUS: ModelPricing = {
  inputPerMTok: 15,
  outputPerMTok: 75,
  cacheWritePerMTok: 18.75,
  cacheReadPerMTok: 1.5,
};

const SONNET: ModelPricing = {
  inputPerMTok: 3,
  outputPerMTok: 15,
  cacheWritePerMTok: 3.75,
  cacheReadPerMTok: 0.3,
};

const HAIKU_35: ModelPricing = {
  inputPerMTok: 0.8,
  outputPerMTok: 4,
  cacheWritePerMTok: 1,
  cacheReadPerMTok: 0.08,
};

const HAIKU_3: ModelPricing = {
  inputPerMTok: 0.25,
  outputPerMTok: 1.25,
  cacheWritePerMTok: 0.3,
  cacheReadPerMTok: 0.03,
};

export const MODEL_REGISTRY: Readonly<Record<string, ModelInfo>> = {
  "claude-opus-4": { contextWindow: 200_000, ...OPUS },
  "claude-sonnet-4": { contextWindow: 200_000, ...SONNET },
  "claude-haiku-4": { contextWindow: 200_000, ...HAIKU_35 },
  "claude-3-5-sonnet": { contextWindow: 200_000, ...SONNET },
  "claude-3-5-haiku": { contextWindow: 200_000, ...HAIKU_35 },
  "claude-3-opus": { contextWindow: 200_000, ...OPUS },
  "claude-3-sonnet": { contextWindow: 200_000, ...SONNET },
  "claude-3-haiku": { contextWindow: 200_000, ...HAIKU_3 },
};

// Longest first, so "claude-3-5-sonnet" wins over any shorter family it shares a prefix with.
const FAMILIES_BY_LENGTH = Object.keys(MODEL_REGISTRY).sort(
  (a, b) => b.length - a.length || a.localeCompare(b),
);

/**
 * Resolve a full model id such as "claude-sonnet-4-5-20250929" to its family.
 *
 * Tries the longest known family the id starts with, then strips trailing
 * `-` segments one at a time looking for an exact family. An id matching
 * neither is returned unchanged.
 */
export function resolveModelFamily(model: string): string {
  for (const family of FAMILIES_BY_LENGTH) {
    if (model.startsWith(family)) return family;
  }

  const parts = model.split("-");
  for (let length = parts.length; length > 1; length--) {
    const candidate = parts.slice(0, length).join("-");
    if (Object.hasOwn(MODEL_REGISTRY, candidate)) return candidate;
  }

  return model;
}

/**
 * Look up registry data for a model id. Returns null for unknown families.
 */
export function lookupModel(model: string): ModelInfo | null {
  const family = resolveModelFamily(model);
  return Object.hasOwn(MODEL_REGISTRY, family) ? MODEL_REGISTRY[family] : null;
}

/** Pricing for a model id, falling back to {@link DEFAULT_PRICING}. */
export function lookupPricing(model: string): ModelPricing {
  return lookupModel(model) ?? DEFAULT_PRICING;
}

/** Context window for a model id, falling back to {@link DEFAULT_CONTEXT_WINDOW}. */
export function contextWindowFor(model: string): number {
  return lookupModel(model)?.contextWindow ?? DEFAULT_CONTEXT_WINDOW;
}
