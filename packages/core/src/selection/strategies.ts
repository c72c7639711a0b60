/**
 * Scoring strategies, one per selection criterion.
 *
 * A strategy returns, for each candidate, its reported `score` and a `key`
 * that sorts ascending with the best candidate first. Ties on `key` are
 * broken by the engine (distance, then vendorId, then locationId).
 */

import { assertNever } from "../types.js";
import { normalize, type Direction } from "./normalize.js";
import type { SelectionCriterion, SelectionWeights, VendorCandidate } from "./types.js";

export interface PricedCandidate {
  candidate: VendorCandidate;
  totalCost: number;
}

export interface StrategyOutput {
  scores: number[];
  keys: number[];
}

export type SelectionStrategy = (
  items: readonly PricedCandidate[],
  weights: SelectionWeights
) => StrategyOutput;

const SCORE_PRECISION = 1e9;

function roundScore(score: number): number {
  return Math.round(score * SCORE_PRECISION) / SCORE_PRECISION;
}

function singleDimension(
  metric: (item: PricedCandidate) => number,
  direction: Direction
): SelectionStrategy {
  return (items) => {
    const raw = items.map(metric);
    return {
      scores: normalize(raw, direction).map(roundScore),
      keys: raw.map((value) => (direction === "lower-is-better" ? value : -value)),
    };
  };
}

export const lowestPrice = singleDimension((item) => item.totalCost, "lower-is-better");

export const fastestDelivery = singleDimension(
  (item) => item.candidate.estimatedDeliveryHours,
  "lower-is-better"
);

export const closestDistance = singleDimension(
  (item) => item.candidate.distanceKm,
  "lower-is-better"
);

export const highestRating = singleDimension((item) => item.candidate.rating, "higher-is-better");

/**
 * Weighted min-max score. Normalisation is relative to `items`, so scores are
 * comparable only within one ranking call.
 */
export const balanced: SelectionStrategy = (items, weights) => {
  const distance = normalize(
    items.map((item) => item.candidate.distanceKm),
    "lower-is-better"
  );
  const cost = normalize(
    items.map((item) => item.totalCost),
    "lower-is-better"
  );
  const quality = normalize(
    items.map((item) => item.candidate.rating),
    "higher-is-better"
  );
  const availability = normalize(
    items.map((item) => item.candidate.availableQuantity),
    "higher-is-better"
  );
  const weightSum = weights.distance + weights.cost + weights.quality + weights.availability;

  const scores = items.map((_, i) =>
    roundScore(
      (weights.distance * (distance[i] ?? 0) +
        weights.cost * (cost[i] ?? 0) +
        weights.quality * (quality[i] ?? 0) +
        weights.availability * (availability[i] ?? 0)) /
        weightSum
    )
  );

  return { scores, keys: scores.map((score) => -score) };
};

export function strategyFor(criterion: SelectionCriterion): SelectionStrategy {
  switch (criterion) {
    case "lowest-price":
      return lowestPrice;
    case "fastest-delivery":
      return fastestDelivery;
    case "closest-distance":
      return closestDistance;
    case "highest-rating":
      return highestRating;
    case "balanced":
      return balanced;
    default:
      return assertNever(criterion, `Unknown selection criterion: ${String(criterion)}`);
  }
}
