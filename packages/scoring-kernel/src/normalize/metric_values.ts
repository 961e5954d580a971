// Maps derived signals to normalized [0,1] values per metric key.
// Absent signals stay absent: the weight allocator drops them from the active set.

import type { MetricKeyV1, ThresholdConfigV1, WeeklySnapshotV1 } from "@healthgauge/contracts";

import { mapMaybe, some, type Maybe } from "../util/maybe";
import { normalizePenalty, normalizeRatio } from "./normalizer";
import type { DerivedSignalsV1 } from "./signals";

export type NormalizedMetricsV1 = Readonly<Record<MetricKeyV1, Maybe<number>>>;

export function normalizeMetrics(
  row: WeeklySnapshotV1,
  s: DerivedSignalsV1,
  t: ThresholdConfigV1
): NormalizedMetricsV1 {
  return {
    sched_var: some(normalizeRatio(s.sched_var, t.sched_var_floor, 0)),
    forecast_slip: mapMaybe(s.slip_days, (d) => normalizePenalty(d, t.slip_days_max)),
    backlog: some(normalizePenalty(s.net_backlog, t.net_backlog_max)),
    req_churn: some(normalizePenalty(row.requirements_changed_last_4w, t.req_churn_max)),
    defect_escape: some(normalizePenalty(row.defect_escape_rate_last_4w, t.defect_escape_max)),
    critical: some(normalizePenalty(s.crit_ratio, t.critical_per_member_max)),
    team_churn: some(normalizePenalty(s.team_churn_ratio, t.team_churn_ratio_max)),
    blocked: some(normalizePenalty(row.blocked_days_last_2w, t.blocked_days_max)),
    unplanned: some(normalizePenalty(row.unplanned_work_ratio_last_4w, t.unplanned_ratio_max)),
    deps: some(normalizePenalty(row.dependency_count, t.dependency_max)),
    cpi: mapMaybe(s.cpi, (v) => normalizeRatio(v, t.cpi_floor)),
    spi: mapMaybe(s.spi, (v) => normalizeRatio(v, t.spi_floor)),
    milestones: mapMaybe(s.milestone_rate, (v) => normalizeRatio(v, t.milestone_rate_floor)),
    throughput: mapMaybe(s.throughput, (v) => normalizeRatio(v.ratio, t.throughput_ratio_floor)),
    cycle_time: mapMaybe(s.cycle_time, (v) => normalizePenalty(v, t.cycle_time_max)),
    wip: mapMaybe(s.wip_overage, (v) => normalizePenalty(v, t.wip_overage_max)),
    aging_wip: mapMaybe(s.aging_wip, (v) => normalizePenalty(v, t.aging_wip_max)),
  };
}
