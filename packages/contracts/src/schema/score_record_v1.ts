// packages/contracts/src/schema/score_record_v1.ts
//
// Output records of the scoring engine. Plain types: records are produced
// in-process and serialized as JSON by the presentation layer.

import type { DeliveryFrameworkV1 } from "./delivery_framework_v1";

export const METRIC_KEYS_V1 = [
  "sched_var",
  "forecast_slip",
  "backlog",
  "req_churn",
  "defect_escape",
  "critical",
  "team_churn",
  "blocked",
  "unplanned",
  "deps",
  "cpi",
  "spi",
  "milestones",
  "throughput",
  "cycle_time",
  "wip",
  "aging_wip",
] as const;

export type MetricKeyV1 = (typeof METRIC_KEYS_V1)[number];

/** Display labels; these are the keys of `contributions` / `max_contributions`. */
export const METRIC_LABELS_V1: Readonly<Record<MetricKeyV1, string>> = Object.freeze({
  sched_var: "Schedule Variance",
  forecast_slip: "Forecast Slip",
  backlog: "Backlog Growth",
  req_churn: "Req. Churn",
  defect_escape: "Defect Escape Rate",
  critical: "Critical Defects",
  team_churn: "Team Churn",
  blocked: "Blocked Days",
  unplanned: "Unplanned Work",
  deps: "Dependencies",
  cpi: "CPI (Cost)",
  spi: "SPI (Schedule)",
  milestones: "Milestone Hit Rate",
  throughput: "Throughput",
  cycle_time: "Cycle Time",
  wip: "WIP Adherence",
  aging_wip: "Aging WIP",
});

export type VolatilitySourceV1 = "forecast_slip" | "throughput";

export type VolatilityBreakdownV1 = {
  source: VolatilitySourceV1;
  // trailing window actually used (current included)
  window: number[];
  deltas: number[];
  mean_delta: number;
  std_delta: number;
  reference: number;
  delta_cov: number;
  base_penalty: number;
  dir_factor: number;
  multiplier: number;
  floor: number;
  penalty: number;
  insufficient_history: boolean;
};

export type ConfidencePenaltiesV1 = {
  volatility: number;
  churn: number;
  backlog: number;
  slip: number;
};

export type ScoreDiagnosticsV1 = {
  pct_complete: number;
  planned_pct: number;
  sched_var_pct: number;
  slip_days: number | null;
  net_backlog: number;
  req_churn: number;
  defect_escape: number;
  critical_defects: number;
  team_churn: number;
  blocked_days: number;
  unplanned_pct: number;
  dependencies: number;
  proximity_pct: number;

  cpi: number | null;
  spi: number | null;
  milestone_rate: number | null;
  risks_open: number | null;
  risks_high: number | null;

  throughput: number | null;
  throughput_avg: number | null;
  throughput_ratio: number | null;
  cycle_time_days: number | null;
  wip_current: number | null;
  wip_limit: number | null;
  aging_wip_items: number | null;

  // keyed by metric label, active metrics only
  normalized: Record<string, number>;
  weights: Record<string, number>;

  penalties: ConfidencePenaltiesV1;
  volatility: VolatilityBreakdownV1;
};

export type ScoreRecordV1 = {
  project_id: string;
  project_name: string;
  week_ending: string;
  delivery_framework: DeliveryFrameworkV1;
  health_score: number;
  confidence_score: number;
  trend_delta: number;
  contributions: Record<string, number>;
  max_contributions: Record<string, number>;
  raw: ScoreDiagnosticsV1;
};
