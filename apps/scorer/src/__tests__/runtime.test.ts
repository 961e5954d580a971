import assert from "node:assert/strict";
import { describe, it } from "node:test";

import { getDefaultThresholds } from "@healthgauge/scoring-kernel";

import { PIPELINE_VERSION, ScoringRuntime, thresholdsHash } from "../runtime";
import type { SnapshotSource } from "../source/snapshot_source";
import { rawRow } from "./fixtures";

function memorySource(rows: Record<string, unknown>[]): SnapshotSource & { closed: boolean; pings: number } {
  return {
    kind: "memory",
    closed: false,
    pings: 0,
    async ping() {
      this.pings += 1;
    },
    async load() {
      return rows;
    },
    async close() {
      this.closed = true;
    },
  };
}

const ROWS = [
  rawRow({ week_ending: "2024-03-08", blocked_days_last_2w: "5" }),
  rawRow(),
  rawRow({ project_id: "K1", project_name: "Flowline", delivery_framework: "kanban", planned_end_date: "", forecast_end_date: "" }),
  { project_id: "", week_ending: "" },
  rawRow({ project_id: "BAD", team_size: "" }),
];

describe("ScoringRuntime", () => {
  it("pings its source, and passes without one", async () => {
    const src = memorySource(ROWS);
    await new ScoringRuntime(src).ping();
    assert.equal(src.pings, 1);
    await new ScoringRuntime(null).ping();
  });

  it("surfaces a failing ping", async () => {
    const src: SnapshotSource = {
      kind: "memory",
      async ping() {
        throw new Error("PG_PING_FAILED: empty result");
      },
      async load() {
        return [];
      },
      async close() {},
    };
    await assert.rejects(new ScoringRuntime(src).ping(), /PG_PING_FAILED/);
  });

  it("summarizes the latest week per project and keeps the full series", async () => {
    const rt = new ScoringRuntime(memorySource(ROWS), () => 1_700_000_000_000);
    const out = await rt.run();

    assert.deepEqual(
      out.summaries.map((s) => [s.project_id, s.week_ending]),
      [
        ["P1", "2024-03-08"],
        ["K1", "2024-03-01"],
      ]
    );
    const p1 = out.series[0];
    assert.deepEqual(p1.weeks, ["2024-03-01", "2024-03-08"]);
    assert.equal(p1.health[0], 96.3);
    assert.equal(p1.trend[0], 0);
    assert.equal(p1.trend[1], out.summaries[0].trend_delta);
    assert.equal(p1.contributions_by_week.length, 2);
    assert.ok(out.summaries[0].narrative.text.startsWith("Apollo is in good health"));

    assert.equal(out.dropped_empty_rows, 1);
    assert.deepEqual(
      out.rejected_rows.map((r) => [r.row_index, r.project_id]),
      [[4, "BAD"]]
    );
    assert.deepEqual(out.failures, []);
    assert.equal(out.meta.generated_at_ts, 1_700_000_000_000);
    assert.equal(out.meta.pipeline_version, PIPELINE_VERSION);
  });

  it("hashes thresholds and the input bundle deterministically", async () => {
    const rt = new ScoringRuntime(memorySource(ROWS));
    const a = await rt.run();
    const b = await rt.run();
    assert.match(a.meta.thresholds_hash, /^sha256:[0-9a-f]{64}$/);
    assert.equal(a.meta.thresholds_hash, thresholdsHash(getDefaultThresholds()));
    assert.equal(a.meta.determinism_hash, b.meta.determinism_hash);

    const c = await rt.run({ thresholds: { slip_days_max: "120" } });
    assert.notEqual(c.meta.thresholds_hash, a.meta.thresholds_hash);
    assert.notEqual(c.meta.determinism_hash, a.meta.determinism_hash);
  });

  it("reports applied and ignored overrides", () => {
    const out = new ScoringRuntime(null).scoreRows([rawRow()], {
      thresholds: { blocked_days_max: "5", nope: "1", cpi_floor: "2" },
    });
    assert.equal(out.meta.thresholds.blocked_days_max, 5);
    assert.deepEqual(out.meta.thresholds_applied, ["blocked_days_max"]);
    assert.deepEqual(
      out.meta.thresholds_ignored.map((x) => x.code),
      ["UNKNOWN_KEY", "VALUE_OUT_OF_RANGE"]
    );
    assert.equal(getDefaultThresholds().blocked_days_max, 10);
  });

  it("refuses to run without a source and closes the one it has", async () => {
    await assert.rejects(new ScoringRuntime(null).run(), /SNAPSHOT_SOURCE_MISSING/);
    const src = memorySource([]);
    await new ScoringRuntime(src).close();
    assert.equal(src.closed, true);
  });
});
