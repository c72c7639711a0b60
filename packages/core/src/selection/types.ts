/**
 * ## Vendor Selection Types
 *
 * Candidates are computed per request from the catalog and never stored.
 */

export const SELECTION_CRITERIA = [
  "lowest-price",
  "fastest-delivery",
  "closest-distance",
  "highest-rating",
  "balanced",
] as const;

export type SelectionCriterion = (typeof SELECTION_CRITERIA)[number];

export function isSelectionCriterion(value: string): value is SelectionCriterion {
  return SELECTION_CRITERIA.some((criterion) => criterion === value);
}

export interface VendorCandidate {
  vendorId: string;
  locationId: string;
  distanceKm: number;
  unitPrice: number;
  deliveryFee: number;
  surcharge: number;
  estimatedDeliveryHours: number;
  /** 0-5 stars */
  rating: number;
  availableQuantity: number;
}

/**
 * Weights for the balanced criterion. Need not sum to 1; scores are divided
 * by the total.
 */
export interface SelectionWeights {
  distance: number;
  cost: number;
  quality: number;
  availability: number;
}

export const DEFAULT_SELECTION_WEIGHTS: Readonly<SelectionWeights> = {
  distance: 0.4,
  cost: 0.3,
  quality: 0.2,
  availability: 0.1,
};

export interface RankedCandidate extends VendorCandidate {
  /** 1-based position */
  rank: number;
  /** Goodness in [0, 1] for the criterion, relative to this candidate set */
  score: number;
  totalCost: number;
}

export type ExclusionReason = "out-of-stock" | "insufficient-quantity" | "inactive";

export interface ExcludedCandidate {
  vendorId: string;
  locationId: string;
  reason: ExclusionReason;
}

export interface RankRequest {
  criterion: SelectionCriterion;
  /** Units the order needs from one location. Defaults to 1. */
  requiredQuantity?: number | undefined;
  /** Balanced-criterion overrides, merged over the defaults */
  weights?: Partial<SelectionWeights> | undefined;
}

export type SelectionResult =
  | {
      status: "ranked";
      criterion: SelectionCriterion;
      ranking: RankedCandidate[];
      excluded: ExcludedCandidate[];
    }
  | {
      status: "rejected";
      code: "NO_CANDIDATES_AVAILABLE";
      reason: string;
      excluded: ExcludedCandidate[];
    };
