import type { WeightTermV1 } from "../weights/allocator";

export type HealthAggregateV1 = {
  health: number;
  contributions: Record<string, number>;
  max_contributions: Record<string, number>;
  normalized: Record<string, number>;
  weights: Record<string, number>;
};

/** Health = sum of weight x normalized x 100 over the active terms, in term order. */
export function aggregateHealth(terms: ReadonlyArray<WeightTermV1>): HealthAggregateV1 {
  const contributions: Record<string, number> = {};
  const max_contributions: Record<string, number> = {};
  const normalized: Record<string, number> = {};
  const weights: Record<string, number> = {};

  let health = 0;
  for (const t of terms) {
    const points = t.weight * t.normalized * 100;
    contributions[t.label] = points;
    max_contributions[t.label] = t.weight * 100;
    normalized[t.label] = t.normalized;
    weights[t.label] = t.weight;
    health += points;
  }

  return { health, contributions, max_contributions, normalized, weights };
}
