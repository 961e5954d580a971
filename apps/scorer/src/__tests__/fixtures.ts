// Shared fixtures for scorer tests: raw rows as they arrive from a CSV or JSON body.

export const SNAPSHOT_HEADER = [
  "project_id",
  "project_name",
  "week_ending",
  "planned_end_date",
  "forecast_end_date",
  "delivery_framework",
  "actual_percent_complete",
  "planned_percent_complete",
  "backlog_items_added_last_4w",
  "backlog_items_closed_last_4w",
  "requirements_changed_last_4w",
  "defect_escape_rate_last_4w",
  "defects_open_critical",
  "team_size",
  "team_churn_last_4w",
  "blocked_days_last_2w",
  "unplanned_work_ratio_last_4w",
  "dependency_count",
] as const;

/** Planned row at 50% vs 55% with nothing else wrong; scores 96.3 health / 100 confidence. */
export function rawRow(overrides: Record<string, string> = {}): Record<string, string> {
  return {
    project_id: "P1",
    project_name: "Apollo",
    week_ending: "2024-03-01",
    planned_end_date: "2024-09-27",
    forecast_end_date: "2024-09-27",
    delivery_framework: "planned",
    actual_percent_complete: "0.5",
    planned_percent_complete: "0.55",
    backlog_items_added_last_4w: "0",
    backlog_items_closed_last_4w: "0",
    requirements_changed_last_4w: "0",
    defect_escape_rate_last_4w: "0",
    defects_open_critical: "0",
    team_size: "8",
    team_churn_last_4w: "0",
    blocked_days_last_2w: "0",
    unplanned_work_ratio_last_4w: "0",
    dependency_count: "0",
    ...overrides,
  };
}

export function toCsv(rows: ReadonlyArray<Record<string, string>>): string {
  const lines = [SNAPSHOT_HEADER.join(",")];
  for (const r of rows) lines.push(SNAPSHOT_HEADER.map((h) => r[h] ?? "").join(","));
  return lines.join("\n") + "\n";
}
