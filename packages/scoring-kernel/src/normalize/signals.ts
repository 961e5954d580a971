// packages/scoring-kernel/src/normalize/signals.ts
//
// Per-row derived quantities. Optional inputs become Maybe<> here and nowhere else;
// a defective value (zero actual cost, zero planned milestones) is "absent", not a 0 or a 1.

import { daysBetween, type WeeklySnapshotV1 } from "@healthgauge/contracts";

import { clamp01 } from "../util/numeric";
import { fromOptional, none, some, type Maybe } from "../util/maybe";
import { throughputRatio, type ThroughputRatio } from "./normalizer";

export const PLANNED_PCT_FLOOR = 0.01;
export const MIN_TEAM_SIZE = 1;
export const MIN_WIP_LIMIT = 1;

// Proximity ramp: 0 below 30% complete, 1 at 100%.
export const PROXIMITY_START = 0.3;
export const PROXIMITY_SPAN = 0.7;

export type DerivedSignalsV1 = {
  proximity: number;
  sched_var: number;
  slip_days: Maybe<number>;
  net_backlog: number;
  crit_ratio: number;
  team_churn_ratio: number;
  cpi: Maybe<number>;
  spi: Maybe<number>;
  milestone_rate: Maybe<number>;
  throughput: Maybe<ThroughputRatio>;
  cycle_time: Maybe<number>;
  wip_overage: Maybe<number>;
  aging_wip: Maybe<number>;
};

export function proximityFactor(actualPercentComplete: number): number {
  return clamp01((actualPercentComplete - PROXIMITY_START) / PROXIMITY_SPAN);
}

export function deriveSlipDays(row: Pick<WeeklySnapshotV1, "planned_end_date" | "forecast_end_date">): Maybe<number> {
  if (!row.planned_end_date || !row.forecast_end_date) return none("date_unparseable");
  return some(daysBetween(row.planned_end_date, row.forecast_end_date));
}

type EvmIndices = { cpi: Maybe<number>; spi: Maybe<number> };

export function deriveEvm(row: WeeklySnapshotV1): EvmIndices {
  const pv = row.planned_cost_to_date;
  const ac = row.actual_cost_to_date;
  if (pv === undefined || ac === undefined) {
    return { cpi: none("field_missing"), spi: none("field_missing") };
  }
  if (!(ac > 0)) {
    return { cpi: none("zero_denominator"), spi: none("zero_denominator") };
  }
  const plannedPct = Math.max(row.planned_percent_complete, PLANNED_PCT_FLOOR);
  const progressRatio = row.actual_percent_complete / plannedPct;
  // EV is estimated from the planned-value curve scaled by progress against plan.
  const ev = pv * progressRatio;
  return { cpi: some(ev / ac), spi: some(progressRatio) };
}

export function deriveMilestoneRate(row: WeeklySnapshotV1): Maybe<number> {
  if (row.milestones_planned === undefined || row.milestones_hit === undefined) return none("field_missing");
  if (!(row.milestones_planned > 0)) return none("zero_denominator");
  return some(row.milestones_hit / row.milestones_planned);
}

export function deriveWipOverage(row: WeeklySnapshotV1): Maybe<number> {
  if (row.wip_current === undefined || row.wip_limit === undefined) return none("field_missing");
  const over = Math.max(0, row.wip_current - row.wip_limit);
  return some(over / Math.max(MIN_WIP_LIMIT, row.wip_limit));
}

/**
 * @param throughputWindow trailing throughput observations of this project,
 *   current row last; empty when the row carries no throughput.
 */
export function deriveSignals(row: WeeklySnapshotV1, throughputWindow: ReadonlyArray<number>): DerivedSignalsV1 {
  const teamSize = Math.max(MIN_TEAM_SIZE, row.team_size);
  const evm = deriveEvm(row);

  return {
    proximity: proximityFactor(row.actual_percent_complete),
    sched_var: row.actual_percent_complete - row.planned_percent_complete,
    slip_days: deriveSlipDays(row),
    net_backlog: row.backlog_items_added_last_4w - row.backlog_items_closed_last_4w,
    crit_ratio: row.defects_open_critical / teamSize,
    team_churn_ratio: row.team_churn_last_4w / teamSize,
    cpi: evm.cpi,
    spi: evm.spi,
    milestone_rate: deriveMilestoneRate(row),
    throughput:
      row.throughput !== undefined && throughputWindow.length
        ? some(throughputRatio(throughputWindow))
        : none("field_missing"),
    cycle_time: fromOptional(row.cycle_time_days),
    wip_overage: deriveWipOverage(row),
    aging_wip: fromOptional(row.aging_wip_items),
  };
}
