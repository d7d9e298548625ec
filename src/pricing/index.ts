// Public API — pricing module
export {
  MODEL_REGISTRY,
  DEFAULT_CONTEXT_WINDOW,
  DEFAULT_PRICING,
  resolveModelFamily,
  lookupModel,
  lookupPricing,
  contextWindowFor,
} from "./registry";
export { computeCost, costBreakdown } from "./cost";

export type { ModelPricing, ModelInfo } from "./registry";
export type { TokenCounts, CostBreakdown } from "./cost";
