// Dynamic weight allocation: gate nominal weights on data presence, then renormalize
// the active set to sum to 1. Terms are rebuilt per project-week; nothing is shared.

import { METRIC_LABELS_V1, type MetricKeyV1 } from "@healthgauge/contracts";

import type { NormalizedMetricsV1 } from "../normalize/metric_values";
import type { WeightSchemeV1 } from "./schemes";

export const TOTAL_WEIGHT_FLOOR = 0.01;

export type WeightTermV1 = Readonly<{
  key: MetricKeyV1;
  label: string;
  // renormalized, sums to 1 across the active set
  weight: number;
  normalized: number;
}>;

export function allocateWeights(
  scheme: WeightSchemeV1,
  proximity: number,
  normalized: NormalizedMetricsV1
): ReadonlyArray<WeightTermV1> {
  const active: { key: MetricKeyV1; weight: number; normalized: number }[] = [];
  for (const nw of scheme.nominal(proximity)) {
    const m = normalized[nw.key];
    if (!m.present) continue;
    active.push({ key: nw.key, weight: nw.weight, normalized: m.value });
  }

  const total = active.reduce((acc, t) => acc + t.weight, 0);
  const denom = Math.max(total, TOTAL_WEIGHT_FLOOR);

  return Object.freeze(
    active.map((t) =>
      Object.freeze({
        key: t.key,
        label: METRIC_LABELS_V1[t.key],
        weight: t.weight / denom,
        normalized: t.normalized,
      })
    )
  );
}
