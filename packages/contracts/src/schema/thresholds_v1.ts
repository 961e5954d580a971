// packages/contracts/src/schema/thresholds_v1.ts

/**
 * Threshold names understood by the metric normalizer.
 * Frozen for v1: unknown names are ignored when supplied as overrides.
 */
export const THRESHOLD_KEYS_V1 = [
  "sched_var_floor",
  "slip_days_max",
  "net_backlog_max",
  "req_churn_max",
  "defect_escape_max",
  "critical_per_member_max",
  "team_churn_ratio_max",
  "blocked_days_max",
  "unplanned_ratio_max",
  "dependency_max",
  "cpi_floor",
  "spi_floor",
  "milestone_rate_floor",
  "throughput_ratio_floor",
  "cycle_time_max",
  "wip_overage_max",
  "aging_wip_max",
] as const;

export type ThresholdKeyV1 = (typeof THRESHOLD_KEYS_V1)[number];

export type ThresholdConfigV1 = Readonly<Record<ThresholdKeyV1, number>>;

export function isThresholdKey(x: unknown): x is ThresholdKeyV1 {
  return typeof x === "string" && THRESHOLD_KEYS_V1.some((k) => k === x);
}
