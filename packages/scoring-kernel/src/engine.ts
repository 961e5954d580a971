// packages/scoring-kernel/src/engine.ts
//
// Scoring entry point.
//
// Contract:
// - input: snapshots of any number of projects + an immutable threshold config
// - output: per project, one ScoreRecordV1 per week in week_ending order
// - every rolling window (slip / throughput history, previous health) only sees
//   rows at or before the current one
// - one project's failure never aborts the others; it is reported in `failures`

import {
  formatIsoDate,
  type ProjectScoringFailureV1,
  type ScoreRecordV1,
  type ThresholdConfigV1,
  type WeeklySnapshotV1,
} from "@healthgauge/contracts";

import { computeConfidence } from "./aggregate/confidence";
import { aggregateHealth } from "./aggregate/health";
import { trendDelta } from "./aggregate/trend";
import { normalizeMetrics } from "./normalize/metric_values";
import { deriveSignals } from "./normalize/signals";
import { toNullable } from "./util/maybe";
import { clamp, round1, roundTo, tail } from "./util/numeric";
import {
  directionalCovPenalty,
  SLIP_VOLATILITY_PROFILE,
  THROUGHPUT_VOLATILITY_PROFILE,
  VOLATILITY_WINDOW,
} from "./volatility/directional_cov";
import { allocateWeights } from "./weights/allocator";
import { schemeFor } from "./weights/schemes";

/** pino-compatible subset; fastify's `app.log` satisfies it. */
export type ScoringLogger = {
  warn(obj: object, msg: string): void;
  debug(obj: object, msg: string): void;
};

export type ScoreOptionsV1 = {
  logger?: ScoringLogger;
};

export type ScoringResultV1 = {
  byProject: Map<string, ScoreRecordV1[]>;
  failures: ProjectScoringFailureV1[];
};

/**
 * Groups rows by project_id (first appearance order) and stably sorts each
 * group by week_ending.
 */
export function groupByProject(snapshots: ReadonlyArray<WeeklySnapshotV1>): Map<string, WeeklySnapshotV1[]> {
  const groups = new Map<string, WeeklySnapshotV1[]>();
  for (const s of snapshots) {
    const g = groups.get(s.project_id);
    if (g) g.push(s);
    else groups.set(s.project_id, [s]);
  }
  for (const g of groups.values()) {
    g.sort((a, b) => a.week_ending.getTime() - b.week_ending.getTime());
  }
  return groups;
}

function percent(x: number): number {
  return round1(x * 100);
}

function nullableNumber(v: number | undefined): number | null {
  return v === undefined ? null : v;
}

/** Scores one project's chronologically ordered rows. */
export function scoreProject(rows: ReadonlyArray<WeeklySnapshotV1>, thresholds: ThresholdConfigV1): ScoreRecordV1[] {
  if (!rows.length) throw new Error("EMPTY_PROJECT_GROUP: a project group must contain at least one row");

  const slipHistory: number[] = [];
  const throughputHistory: number[] = [];
  const out: ScoreRecordV1[] = [];
  let previousHealth: number | null = null;

  for (const row of rows) {
    if (row.throughput !== undefined) throughputHistory.push(row.throughput);
    const throughputWindow = row.throughput !== undefined ? tail(throughputHistory, VOLATILITY_WINDOW) : [];

    const signals = deriveSignals(row, throughputWindow);
    if (signals.slip_days.present) slipHistory.push(signals.slip_days.value);

    const normalized = normalizeMetrics(row, signals, thresholds);
    const terms = allocateWeights(schemeFor(row.delivery_framework), signals.proximity, normalized);
    const health = aggregateHealth(terms);

    const volatility =
      row.delivery_framework === "kanban"
        ? directionalCovPenalty(throughputHistory, THROUGHPUT_VOLATILITY_PROFILE)
        : directionalCovPenalty(slipHistory, SLIP_VOLATILITY_PROFILE);

    const confidence = computeConfidence({
      framework: row.delivery_framework,
      requirements_changed: row.requirements_changed_last_4w,
      net_backlog: signals.net_backlog,
      slip_days: signals.slip_days,
      volatility,
    });

    const healthScore = round1(clamp(health.health, 0, 100));
    const throughput = toNullable(signals.throughput);
    const cpi = toNullable(signals.cpi);
    const spi = toNullable(signals.spi);
    const milestoneRate = toNullable(signals.milestone_rate);

    out.push({
      project_id: row.project_id,
      project_name: row.project_name,
      week_ending: formatIsoDate(row.week_ending),
      delivery_framework: row.delivery_framework,
      health_score: healthScore,
      confidence_score: round1(confidence.confidence),
      trend_delta: trendDelta(previousHealth, healthScore),
      contributions: health.contributions,
      max_contributions: health.max_contributions,
      raw: {
        pct_complete: percent(row.actual_percent_complete),
        planned_pct: percent(row.planned_percent_complete),
        sched_var_pct: percent(signals.sched_var),
        slip_days: toNullable(signals.slip_days),
        net_backlog: signals.net_backlog,
        req_churn: row.requirements_changed_last_4w,
        defect_escape: percent(row.defect_escape_rate_last_4w),
        critical_defects: row.defects_open_critical,
        team_churn: row.team_churn_last_4w,
        blocked_days: row.blocked_days_last_2w,
        unplanned_pct: percent(row.unplanned_work_ratio_last_4w),
        dependencies: row.dependency_count,
        proximity_pct: percent(signals.proximity),

        cpi: cpi === null ? null : roundTo(cpi, 3),
        spi: spi === null ? null : roundTo(spi, 3),
        milestone_rate: milestoneRate === null ? null : roundTo(milestoneRate, 3),
        risks_open: nullableNumber(row.risks_open),
        risks_high: nullableNumber(row.risks_high),

        throughput: throughput === null ? null : throughput.current,
        throughput_avg: throughput === null ? null : roundTo(throughput.rolling_avg, 3),
        throughput_ratio: throughput === null ? null : roundTo(throughput.ratio, 3),
        cycle_time_days: nullableNumber(row.cycle_time_days),
        wip_current: nullableNumber(row.wip_current),
        wip_limit: nullableNumber(row.wip_limit),
        aging_wip_items: nullableNumber(row.aging_wip_items),

        normalized: health.normalized,
        weights: health.weights,
        penalties: confidence.penalties,
        volatility,
      },
    });

    previousHealth = healthScore;
  }

  return out;
}

/**
 * score(snapshots, thresholds) -> project_id -> ScoreRecordV1[]
 *
 * Synchronous and side-effect free apart from logging.
 */
export function score(
  snapshots: ReadonlyArray<WeeklySnapshotV1>,
  thresholds: ThresholdConfigV1,
  options: ScoreOptionsV1 = {}
): ScoringResultV1 {
  const byProject = new Map<string, ScoreRecordV1[]>();
  const failures: ProjectScoringFailureV1[] = [];

  for (const [projectId, rows] of groupByProject(snapshots)) {
    try {
      byProject.set(projectId, scoreProject(rows, thresholds));
    } catch (err: unknown) {
      const message = err instanceof Error ? err.message : String(err);
      options.logger?.warn({ project_id: projectId, err: message }, "project scoring failed");
      failures.push({ project_id: projectId, code: "PROJECT_SCORING_FAILED", message });
    }
  }

  options.logger?.debug(
    { projects: byProject.size, failures: failures.length, rows: snapshots.length },
    "scoring run complete"
  );
  return { byProject, failures };
}
