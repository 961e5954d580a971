// packages/contracts/src/schema/scoring_response_v1.ts
import type { DeliveryFrameworkV1 } from "./delivery_framework_v1";
import type { ScoreDiagnosticsV1 } from "./score_record_v1";
import type { ThresholdConfigV1 } from "./thresholds_v1";

export type HealthBandV1 = "good" | "moderate" | "critical";
export type ConfidenceBandV1 = "high" | "moderate" | "low";

export type NarrativeV1 = {
  health_band: HealthBandV1;
  confidence_band: ConfidenceBandV1;
  top_detractor: { label: string; gap: number } | null;
  top_performer: { label: string; points: number } | null;
  confidence_drivers: string[];
  clauses: string[];
  text: string;
};

export type ProjectSummaryV1 = {
  project_id: string;
  project_name: string;
  delivery_framework: DeliveryFrameworkV1;
  week_ending: string;
  health_score: number;
  confidence_score: number;
  trend_delta: number;
  contributions: Record<string, number>;
  max_contributions: Record<string, number>;
  raw: ScoreDiagnosticsV1;
  narrative: NarrativeV1;
};

export type ProjectSeriesV1 = {
  project_id: string;
  project_name: string;
  weeks: string[];
  health: number[];
  confidence: number[];
  trend: number[];
  contributions_by_week: Record<string, number>[];
  raw_by_week: ScoreDiagnosticsV1[];
};

export type ProjectScoringFailureV1 = {
  project_id: string;
  code: "PROJECT_SCORING_FAILED";
  message: string;
};

export type RowRejectionV1 = {
  row_index: number;
  project_id: string | null;
  issues: { path: string; message: string }[];
};

export type ThresholdOverrideRejectionV1 = {
  code: "UNKNOWN_KEY" | "VALUE_TYPE_MISMATCH" | "VALUE_OUT_OF_RANGE";
  key: string;
  message: string;
  meta?: Record<string, unknown>;
};

export type ScoringResponseV1 = {
  summaries: ProjectSummaryV1[];
  series: ProjectSeriesV1[];
  failures: ProjectScoringFailureV1[];
  rejected_rows: RowRejectionV1[];
  dropped_empty_rows: number;
  meta: {
    pipeline_version: "scoring_pipeline_v1";
    thresholds: ThresholdConfigV1;
    thresholds_hash: string;
    thresholds_applied: string[];
    thresholds_ignored: ThresholdOverrideRejectionV1[];
    determinism_hash: string;
    generated_at_ts: number;
  };
};
