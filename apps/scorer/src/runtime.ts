// apps/scorer/src/runtime.ts
//
// Scoring runtime: source rows -> validated snapshots -> engine -> response.
//
// Contract:
// - stateless: nothing is persisted between runs
// - threshold overrides apply to one run only; the defaults are never touched
// - summaries carry the latest week of each project, series every week

import type {
  ProjectSeriesV1,
  ProjectSummaryV1,
  RowRejectionV1,
  ScoreRecordV1,
  ScoringResponseV1,
  ThresholdConfigV1,
  WeeklySnapshotV1,
} from "@healthgauge/contracts";
import { buildNarrative, resolveThresholds, score, type ScoringLogger } from "@healthgauge/scoring-kernel";

import { mapSnapshotRows } from "./ingest/row_mapper";
import type { SnapshotSource } from "./source/snapshot_source";
import { nowMs, sha256Hex, stableStringify } from "./util";

export const PIPELINE_VERSION = "scoring_pipeline_v1";

export type ThresholdOverrides = Readonly<Record<string, unknown>>;

export type ScoringRunOptions = {
  thresholds?: ThresholdOverrides;
  logger?: ScoringLogger;
};

type IngestReport = {
  rejected_rows: RowRejectionV1[];
  dropped_empty_rows: number;
};

export function thresholdsHash(t: ThresholdConfigV1): string {
  return `sha256:${sha256Hex(stableStringify(t))}`;
}

function toSummary(latest: ScoreRecordV1): ProjectSummaryV1 {
  return { ...latest, narrative: buildNarrative(latest) };
}

function toSeries(records: ReadonlyArray<ScoreRecordV1>): ProjectSeriesV1 {
  const first = records[0];
  return {
    project_id: first.project_id,
    project_name: first.project_name,
    weeks: records.map((r) => r.week_ending),
    health: records.map((r) => r.health_score),
    confidence: records.map((r) => r.confidence_score),
    trend: records.map((r) => r.trend_delta),
    contributions_by_week: records.map((r) => r.contributions),
    raw_by_week: records.map((r) => r.raw),
  };
}

export class ScoringRuntime {
  constructor(
    private readonly source: SnapshotSource | null,
    private readonly now: () => number = nowMs
  ) {}

  /** Check the configured source is reachable. Without a source there is nothing to check. */
  async ping(): Promise<void> {
    if (this.source) await this.source.ping();
  }

  /** Load every row from the configured source and score it. */
  async run(options: ScoringRunOptions = {}): Promise<ScoringResponseV1> {
    if (!this.source) throw new Error("SNAPSHOT_SOURCE_MISSING: runtime was built without a source");
    const records = await this.source.load();
    options.logger?.debug({ source: this.source.kind, rows: records.length }, "snapshot rows loaded");
    return this.scoreRows(records, options);
  }

  /** Score rows supplied by the caller (JSON body, uploaded CSV). */
  scoreRows(records: ReadonlyArray<Readonly<Record<string, unknown>>>, options: ScoringRunOptions = {}): ScoringResponseV1 {
    const mapped = mapSnapshotRows(records);
    if (mapped.rejected_rows.length) {
      options.logger?.warn(
        { rejected: mapped.rejected_rows.length, first: mapped.rejected_rows[0] },
        "snapshot rows rejected"
      );
    }
    return this.scoreSnapshots(mapped.snapshots, options, mapped);
  }

  scoreSnapshots(
    snapshots: ReadonlyArray<WeeklySnapshotV1>,
    options: ScoringRunOptions = {},
    ingest: IngestReport = { rejected_rows: [], dropped_empty_rows: 0 }
  ): ScoringResponseV1 {
    const resolved = resolveThresholds(options.thresholds);
    if (resolved.ignored.length) {
      options.logger?.warn({ ignored: resolved.ignored }, "threshold overrides ignored");
    }

    const { byProject, failures } = score(snapshots, resolved.thresholds, { logger: options.logger });

    const summaries: ProjectSummaryV1[] = [];
    const series: ProjectSeriesV1[] = [];
    for (const records of byProject.values()) {
      if (!records.length) continue;
      summaries.push(toSummary(records[records.length - 1]));
      series.push(toSeries(records));
    }

    const thresholds_hash = thresholdsHash(resolved.thresholds);
    const determinism_hash = `sha256:${sha256Hex(
      stableStringify({
        pipeline_version: PIPELINE_VERSION,
        thresholds_hash,
        projects: series.map((s) => ({ project_id: s.project_id, weeks: s.weeks.length })),
      })
    )}`;

    return {
      summaries,
      series,
      failures,
      rejected_rows: ingest.rejected_rows,
      dropped_empty_rows: ingest.dropped_empty_rows,
      meta: {
        pipeline_version: PIPELINE_VERSION,
        thresholds: resolved.thresholds,
        thresholds_hash,
        thresholds_applied: resolved.applied,
        thresholds_ignored: resolved.ignored,
        determinism_hash,
        generated_at_ts: this.now(),
      },
    };
  }

  async close(): Promise<void> {
    await this.source?.close();
  }
}
