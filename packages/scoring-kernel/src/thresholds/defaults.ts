// Default normalizer thresholds (v1).
//
// Process-wide constant: never merged into an override object, never mutated.
// Override resolution (overrides.ts) always builds a new frozen object.

import type { ThresholdConfigV1 } from "@healthgauge/contracts";

export const DEFAULT_THRESHOLDS_V1: ThresholdConfigV1 = Object.freeze({
  sched_var_floor: -0.2,
  slip_days_max: 140,
  net_backlog_max: 50,
  req_churn_max: 15,
  defect_escape_max: 0.15,
  critical_per_member_max: 2,
  team_churn_ratio_max: 1,
  blocked_days_max: 10,
  unplanned_ratio_max: 0.6,
  dependency_max: 15,
  cpi_floor: 0.8,
  spi_floor: 0.8,
  milestone_rate_floor: 0.5,
  throughput_ratio_floor: 0.5,
  cycle_time_max: 20,
  wip_overage_max: 0.5,
  aging_wip_max: 10,
});

export function getDefaultThresholds(): ThresholdConfigV1 {
  return DEFAULT_THRESHOLDS_V1;
}
