// Shared fixtures for scoring-kernel tests.

import assert from "node:assert/strict";

import type { WeeklySnapshotV1 } from "@healthgauge/contracts";

export function d(iso: string): Date {
  return new Date(`${iso}T00:00:00Z`);
}

/**
 * Planned project at 50% actual vs 55% planned, no slip, nothing else wrong,
 * no EVM / milestone / flow data.
 */
export function makeSnapshot(overrides: Partial<WeeklySnapshotV1> = {}): WeeklySnapshotV1 {
  return {
    project_id: "P1",
    project_name: "Apollo",
    week_ending: d("2024-03-01"),
    planned_end_date: d("2024-09-27"),
    forecast_end_date: d("2024-09-27"),
    delivery_framework: "planned",
    actual_percent_complete: 0.5,
    planned_percent_complete: 0.55,
    backlog_items_added_last_4w: 0,
    backlog_items_closed_last_4w: 0,
    requirements_changed_last_4w: 0,
    defect_escape_rate_last_4w: 0,
    defects_open_critical: 0,
    team_size: 8,
    team_churn_last_4w: 0,
    blocked_days_last_2w: 0,
    unplanned_work_ratio_last_4w: 0,
    dependency_count: 0,
    ...overrides,
  };
}

export function makeKanbanSnapshot(overrides: Partial<WeeklySnapshotV1> = {}): WeeklySnapshotV1 {
  return makeSnapshot({
    project_id: "K1",
    project_name: "Flowline",
    delivery_framework: "kanban",
    planned_end_date: null,
    forecast_end_date: null,
    throughput: 10,
    cycle_time_days: 5,
    wip_current: 8,
    wip_limit: 10,
    aging_wip_items: 1,
    ...overrides,
  });
}

/** Consecutive weekly rows starting at `start`, one per override. */
export function weekly(
  start: string,
  rows: ReadonlyArray<Partial<WeeklySnapshotV1>>,
  make: (o: Partial<WeeklySnapshotV1>) => WeeklySnapshotV1 = makeSnapshot
): WeeklySnapshotV1[] {
  const t0 = d(start).getTime();
  return rows.map((o, i) => make({ week_ending: new Date(t0 + i * 7 * 86_400_000), ...o }));
}

export function approx(actual: number, expected: number, eps = 1e-9, msg?: string): void {
  assert.ok(
    Math.abs(actual - expected) <= eps,
    msg ?? `expected ${actual} to be within ${eps} of ${expected}`
  );
}

export function sum(xs: Record<string, number>): number {
  return Object.values(xs).reduce((a, b) => a + b, 0);
}
