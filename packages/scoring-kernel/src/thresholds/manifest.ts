// packages/scoring-kernel/src/thresholds/manifest.ts
//
// Threshold manifest (v1).
//
// Contract:
// - every ThresholdKeyV1 has exactly one editable item
// - min/max bound what an override may set; anything outside is ignored, not fatal
// - `defaults` is for display only and is a copy of the frozen defaults

import { THRESHOLD_KEYS_V1, type ThresholdConfigV1, type ThresholdKeyV1 } from "@healthgauge/contracts";

import { DEFAULT_THRESHOLDS_V1 } from "./defaults";

export type ThresholdEditableItem = {
  key: ThresholdKeyV1;
  type: "number";
  min: number;
  max: number;
  // Human readable hint for UI (non-semantic)
  description: string;
};

export type ThresholdManifestV1 = {
  manifest_version: "1.0.0";
  override_policy: {
    unknown_keys: "ignore";
    invalid_values: "ignore";
  };
  editable: ThresholdEditableItem[];
  defaults: ThresholdConfigV1;
};

const EDITABLE_V1: ReadonlyArray<ThresholdEditableItem> = [
  { key: "sched_var_floor", type: "number", min: -1, max: -0.01, description: "Schedule variance (actual - planned) scoring 0" },
  { key: "slip_days_max", type: "number", min: 1, max: 1000, description: "Forecast slip in days scoring 0" },
  { key: "net_backlog_max", type: "number", min: 1, max: 10000, description: "Net backlog growth (4w) scoring 0" },
  { key: "req_churn_max", type: "number", min: 1, max: 1000, description: "Requirements changed (4w) scoring 0" },
  { key: "defect_escape_max", type: "number", min: 0.01, max: 1, description: "Defect escape rate (4w) scoring 0" },
  { key: "critical_per_member_max", type: "number", min: 0.1, max: 100, description: "Open critical defects per team member scoring 0" },
  { key: "team_churn_ratio_max", type: "number", min: 0.05, max: 10, description: "Team churn / team size scoring 0" },
  { key: "blocked_days_max", type: "number", min: 1, max: 100, description: "Blocked days (2w) scoring 0" },
  { key: "unplanned_ratio_max", type: "number", min: 0.05, max: 1, description: "Unplanned work ratio scoring 0" },
  { key: "dependency_max", type: "number", min: 1, max: 1000, description: "Dependency count scoring 0" },
  { key: "cpi_floor", type: "number", min: 0, max: 0.99, description: "CPI scoring 0 (1.0 scores 1)" },
  { key: "spi_floor", type: "number", min: 0, max: 0.99, description: "SPI scoring 0 (1.0 scores 1)" },
  { key: "milestone_rate_floor", type: "number", min: 0, max: 0.99, description: "Milestone hit rate scoring 0" },
  { key: "throughput_ratio_floor", type: "number", min: 0, max: 0.99, description: "Throughput / trailing mean scoring 0" },
  { key: "cycle_time_max", type: "number", min: 1, max: 365, description: "Cycle time in days scoring 0" },
  { key: "wip_overage_max", type: "number", min: 0.05, max: 10, description: "WIP overage / WIP limit scoring 0" },
  { key: "aging_wip_max", type: "number", min: 1, max: 1000, description: "Aging WIP items scoring 0" },
];

const EDITABLE_BY_KEY: ReadonlyMap<ThresholdKeyV1, ThresholdEditableItem> = new Map(EDITABLE_V1.map((it) => [it.key, it]));

export function getEditableItem(key: ThresholdKeyV1): ThresholdEditableItem {
  const it = EDITABLE_BY_KEY.get(key);
  if (!it) throw new Error(`THRESHOLD_NOT_IN_MANIFEST: ${key}`);
  return it;
}

export function getThresholdManifest(): ThresholdManifestV1 {
  return {
    manifest_version: "1.0.0",
    override_policy: { unknown_keys: "ignore", invalid_values: "ignore" },
    editable: THRESHOLD_KEYS_V1.map((k) => ({ ...getEditableItem(k) })),
    defaults: { ...DEFAULT_THRESHOLDS_V1 },
  };
}
