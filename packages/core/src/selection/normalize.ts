/**
 * Min-max normalisation across one candidate set. 1 is the best value, 0 the
 * worst; when every value is equal all candidates get 1.
 */

export type Direction = "lower-is-better" | "higher-is-better";

export function normalize(values: readonly number[], direction: Direction): number[] {
  if (values.length === 0) return [];

  const min = Math.min(...values);
  const max = Math.max(...values);
  const span = max - min;

  if (span === 0) {
    return values.map(() => 1);
  }

  return values.map((value) =>
    direction === "lower-is-better" ? (max - value) / span : (value - min) / span
  );
}

export function totalCost(
  candidate: { unitPrice: number; deliveryFee: number; surcharge: number },
  quantity: number
): number {
  return candidate.unitPrice * quantity + candidate.deliveryFee + candidate.surcharge;
}
