/**
 * ## Vendor Selection Engine
 *
 * Produces a deterministic total order of vendor candidates for one order.
 *
 * 1. Exclude candidates that cannot supply the required quantity.
 * 2. Score the rest with the criterion's strategy.
 * 3. Sort by strategy key, then distance, then vendorId, then locationId.
 *
 * @example
 * ```typescript
 * const result = rankVendors(candidates, { criterion: "lowest-price", requiredQuantity: 2 });
 * if (result.status === "ranked") {
 *   const best = result.ranking[0];
 * }
 * ```
 */

import { FulfillmentError } from "../errors/index.js";
import { createNoOpLogger, type Logger } from "../logging/index.js";
import { totalCost } from "./normalize.js";
import { strategyFor, type PricedCandidate } from "./strategies.js";
import {
  DEFAULT_SELECTION_WEIGHTS,
  type ExcludedCandidate,
  type RankRequest,
  type RankedCandidate,
  type SelectionResult,
  type SelectionWeights,
  type VendorCandidate,
} from "./types.js";

export const SelectionError = FulfillmentError.forContext<"INVALID_WEIGHTS" | "INVALID_QUANTITY">(
  "Selection"
);

/**
 * Merge overrides over the defaults and check them.
 *
 * @throws SelectionError INVALID_WEIGHTS for a negative or non-finite weight,
 * or when all weights are zero
 */
export function resolveWeights(overrides?: Partial<SelectionWeights>): SelectionWeights {
  const weights: SelectionWeights = { ...DEFAULT_SELECTION_WEIGHTS, ...overrides };
  const entries = Object.entries(weights);

  for (const [name, value] of entries) {
    if (!Number.isFinite(value) || value < 0) {
      throw new SelectionError("INVALID_WEIGHTS", `Weight "${name}" must be a non-negative number`, {
        weights,
      });
    }
  }
  if (entries.reduce((sum, [, value]) => sum + value, 0) <= 0) {
    throw new SelectionError("INVALID_WEIGHTS", "Weights must sum to a positive number", {
      weights,
    });
  }
  return weights;
}

function exclusionFor(
  candidate: VendorCandidate,
  requiredQuantity: number
): ExcludedCandidate | null {
  if (candidate.availableQuantity <= 0) {
    return { vendorId: candidate.vendorId, locationId: candidate.locationId, reason: "out-of-stock" };
  }
  if (candidate.availableQuantity < requiredQuantity) {
    return {
      vendorId: candidate.vendorId,
      locationId: candidate.locationId,
      reason: "insufficient-quantity",
    };
  }
  return null;
}

function compareTieBreak(a: VendorCandidate, b: VendorCandidate): number {
  if (a.distanceKm !== b.distanceKm) {
    return a.distanceKm - b.distanceKm;
  }
  if (a.vendorId !== b.vendorId) {
    return a.vendorId < b.vendorId ? -1 : 1;
  }
  if (a.locationId !== b.locationId) {
    return a.locationId < b.locationId ? -1 : 1;
  }
  return 0;
}

export interface RankOptions {
  logger?: Logger | undefined;
}

export function rankVendors(
  candidates: readonly VendorCandidate[],
  request: RankRequest,
  options: RankOptions = {}
): SelectionResult {
  const logger = options.logger ?? createNoOpLogger();
  const quantity = request.requiredQuantity ?? 1;
  if (!Number.isFinite(quantity) || quantity <= 0) {
    throw new SelectionError("INVALID_QUANTITY", `Required quantity must be > 0, got ${quantity}`);
  }
  const weights = resolveWeights(request.weights);

  const excluded: ExcludedCandidate[] = [];
  const eligible: PricedCandidate[] = [];
  for (const candidate of candidates) {
    const exclusion = exclusionFor(candidate, quantity);
    if (exclusion) {
      excluded.push(exclusion);
    } else {
      eligible.push({ candidate, totalCost: totalCost(candidate, quantity) });
    }
  }

  if (eligible.length === 0) {
    logger.info("No eligible vendor candidates", {
      criterion: request.criterion,
      offered: candidates.length,
      excluded: excluded.length,
    });
    return {
      status: "rejected",
      code: "NO_CANDIDATES_AVAILABLE",
      reason:
        candidates.length === 0
          ? "No vendor candidates were offered"
          : `All ${candidates.length} candidates were excluded`,
      excluded,
    };
  }

  const { scores, keys } = strategyFor(request.criterion)(eligible, weights);

  const order = eligible.map((_, index) => index);
  order.sort((i, j) => {
    const keyDiff = (keys[i] ?? 0) - (keys[j] ?? 0);
    if (keyDiff !== 0) return keyDiff;
    const a = eligible[i];
    const b = eligible[j];
    return a && b ? compareTieBreak(a.candidate, b.candidate) : 0;
  });

  const ranking: RankedCandidate[] = [];
  for (const index of order) {
    const item = eligible[index];
    if (!item) continue;
    ranking.push({
      ...item.candidate,
      rank: ranking.length + 1,
      score: scores[index] ?? 0,
      totalCost: item.totalCost,
    });
  }

  logger.debug("Ranked vendor candidates", {
    criterion: request.criterion,
    ranking: ranking.map((entry) => `${entry.vendorId}/${entry.locationId}`),
    excluded: excluded.length,
  });

  return { status: "ranked", criterion: request.criterion, ranking, excluded };
}

/**
 * Ranker bound to configured default weights and a logger.
 */
export interface SelectionEngine {
  rank(candidates: readonly VendorCandidate[], request: RankRequest): SelectionResult;
}

export function createSelectionEngine(
  options: { weights?: Partial<SelectionWeights> | undefined; logger?: Logger | undefined } = {}
): SelectionEngine {
  const defaults = resolveWeights(options.weights);
  return {
    rank(candidates, request) {
      return rankVendors(
        candidates,
        { ...request, weights: { ...defaults, ...request.weights } },
        { logger: options.logger }
      );
    },
  };
}
