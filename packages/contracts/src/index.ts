// @healthgauge/contracts
// Shared schemas and record shapes for snapshot ingestion and scoring output.

export * from "./schema/delivery_framework_v1";
export * from "./schema/thresholds_v1";
export * from "./schema/weekly_snapshot_v1";
export * from "./schema/score_record_v1";
export * from "./schema/scoring_response_v1";
