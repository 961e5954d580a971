// Confidence score: 100 minus forecast-reliability penalties, clamped to [0,100].

import type { ConfidencePenaltiesV1, DeliveryFrameworkV1, VolatilityBreakdownV1 } from "@healthgauge/contracts";

import type { Maybe } from "../util/maybe";
import { clamp } from "../util/numeric";

export const CHURN_PENALTY_PER_CHANGE = 1.0;
export const BACKLOG_PENALTY_PER_ITEM = 0.5;

// Slip is a secondary signal for kanban teams.
export const SLIP_PENALTY_PER_DAY: Readonly<Record<DeliveryFrameworkV1, number>> = Object.freeze({
  planned: 0.25,
  kanban: 0.15,
});

export type ConfidenceInputV1 = {
  framework: DeliveryFrameworkV1;
  requirements_changed: number;
  net_backlog: number;
  slip_days: Maybe<number>;
  volatility: VolatilityBreakdownV1;
};

export type ConfidenceAggregateV1 = {
  confidence: number;
  penalties: ConfidencePenaltiesV1;
};

export function computeConfidence(input: ConfidenceInputV1): ConfidenceAggregateV1 {
  const churn = Math.max(0, input.requirements_changed) * CHURN_PENALTY_PER_CHANGE;
  const backlog = Math.max(0, input.net_backlog) * BACKLOG_PENALTY_PER_ITEM;
  // No target date, no slip penalty.
  const slip = input.slip_days.present
    ? Math.max(0, input.slip_days.value) * SLIP_PENALTY_PER_DAY[input.framework]
    : 0;
  const volatility = input.volatility.penalty;

  return {
    confidence: clamp(100 - volatility - churn - backlog - slip, 0, 100),
    penalties: { volatility, churn, backlog, slip },
  };
}
