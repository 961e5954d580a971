// packages/scoring-kernel/src/weights/schemes.ts
//
// Nominal weight schemes per delivery framework.
// A scheme only says which metrics it wants and how much; gating on data presence
// and renormalization happen in allocator.ts for both schemes alike.

import type { DeliveryFrameworkV1, MetricKeyV1 } from "@healthgauge/contracts";

export type NominalWeight = {
  key: MetricKeyV1;
  weight: number;
};

export type WeightSchemeV1 = {
  framework: DeliveryFrameworkV1;
  nominal(proximity: number): ReadonlyArray<NominalWeight>;
};

/**
 * Planned (schedule / EVM driven).
 * Schedule and quality weights grow with proximity; unplanned work and
 * dependencies matter less near the end. EVM / milestone terms are gated.
 */
export const PLANNED_SCHEME_V1: WeightSchemeV1 = {
  framework: "planned",
  nominal: (p) => [
    { key: "sched_var", weight: 0.12 + 0.08 * p },
    { key: "forecast_slip", weight: 0.1 + 0.08 * p },
    { key: "backlog", weight: 0.1 },
    { key: "req_churn", weight: 0.08 },
    { key: "defect_escape", weight: 0.1 + 0.05 * p },
    { key: "critical", weight: 0.1 + 0.03 * p },
    { key: "team_churn", weight: 0.08 },
    { key: "blocked", weight: 0.08 },
    { key: "unplanned", weight: 0.1 - 0.04 * p },
    { key: "deps", weight: 0.06 - 0.03 * p },
    { key: "cpi", weight: 0.08 },
    { key: "spi", weight: 0.06 },
    { key: "milestones", weight: 0.06 },
  ],
};

/** Kanban (flow driven). Fixed weights, no proximity scaling. */
export const KANBAN_SCHEME_V1: WeightSchemeV1 = {
  framework: "kanban",
  nominal: () => [
    { key: "throughput", weight: 0.14 },
    { key: "cycle_time", weight: 0.12 },
    { key: "wip", weight: 0.1 },
    { key: "aging_wip", weight: 0.1 },
    { key: "backlog", weight: 0.08 },
    { key: "req_churn", weight: 0.06 },
    { key: "defect_escape", weight: 0.1 },
    { key: "critical", weight: 0.08 },
    { key: "team_churn", weight: 0.06 },
    { key: "blocked", weight: 0.06 },
    { key: "cpi", weight: 0.05 },
    { key: "milestones", weight: 0.04 },
    { key: "forecast_slip", weight: 0.06 },
  ],
};

export function schemeFor(framework: DeliveryFrameworkV1): WeightSchemeV1 {
  switch (framework) {
    case "planned":
      return PLANNED_SCHEME_V1;
    case "kanban":
      return KANBAN_SCHEME_V1;
    default: {
      const _never: never = framework;
      throw new Error(`UNKNOWN_DELIVERY_FRAMEWORK: ${String(_never)}`);
    }
  }
}
