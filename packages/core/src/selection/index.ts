export {
  SELECTION_CRITERIA,
  DEFAULT_SELECTION_WEIGHTS,
  isSelectionCriterion,
  type SelectionCriterion,
  type VendorCandidate,
  type SelectionWeights,
  type RankedCandidate,
  type ExclusionReason,
  type ExcludedCandidate,
  type RankRequest,
  type SelectionResult,
} from "./types.js";
export { normalize, totalCost, type Direction } from "./normalize.js";
export {
  strategyFor,
  lowestPrice,
  fastestDelivery,
  closestDistance,
  highestRating,
  balanced,
  type SelectionStrategy,
  type PricedCandidate,
  type StrategyOutput,
} from "./strategies.js";
export {
  rankVendors,
  resolveWeights,
  createSelectionEngine,
  SelectionError,
  type SelectionEngine,
  type RankOptions,
} from "./engine.js";
