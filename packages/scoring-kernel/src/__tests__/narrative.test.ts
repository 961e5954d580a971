import assert from "node:assert/strict";
import { describe, it } from "node:test";

import type { ScoreRecordV1 } from "@healthgauge/contracts";

import { scoreProject } from "../engine";
import {
  buildNarrative,
  confidenceBand,
  confidenceDrivers,
  healthBand,
  rankDetractors,
  topPerformer,
} from "../narrative/narrative";
import { DEFAULT_THRESHOLDS_V1 } from "../thresholds/defaults";
import { makeKanbanSnapshot, makeSnapshot } from "./fixtures";

function scoreOne(...args: Parameters<typeof makeSnapshot>): ScoreRecordV1 {
  const rs = scoreProject([makeSnapshot(...args)], DEFAULT_THRESHOLDS_V1);
  return rs[0];
}

describe("bands", () => {
  it("splits at 75 and 50", () => {
    assert.equal(healthBand(75), "good");
    assert.equal(healthBand(74.9), "moderate");
    assert.equal(healthBand(50), "moderate");
    assert.equal(healthBand(49.9), "critical");
    assert.equal(confidenceBand(80), "high");
    assert.equal(confidenceBand(60), "moderate");
    assert.equal(confidenceBand(10), "low");
  });
});

describe("rankDetractors / topPerformer", () => {
  it("breaks ties by metric order", () => {
    const rec = {
      contributions: { A: 5, B: 5, C: 9 },
      max_contributions: { A: 10, B: 10, C: 10 },
    };
    assert.deepEqual(rankDetractors(rec), [
      { label: "A", gap: 5 },
      { label: "B", gap: 5 },
      { label: "C", gap: 1 },
    ]);
    assert.deepEqual(topPerformer(rec), { label: "C", points: 9 });
    assert.deepEqual(topPerformer({ contributions: { A: 4, B: 4 } }), { label: "A", points: 4 });
    assert.equal(topPerformer({ contributions: {} }), null);
  });
});

describe("confidenceDrivers", () => {
  it("lists positive penalties, largest first", () => {
    const rec = scoreOne();
    const drivers = confidenceDrivers({
      raw: { ...rec.raw, penalties: { volatility: 5, churn: 10, backlog: 0, slip: 2 } },
    });
    assert.deepEqual(drivers, ["requirements churn", "forecast volatility", "schedule slip"]);
  });
});

describe("buildNarrative", () => {
  it("explains the reference planned row", () => {
    const n = buildNarrative(scoreOne());
    assert.equal(
      n.text,
      "Apollo is in good health (96.3/100). " +
        "Forecast end date is on or ahead of plan. " +
        "Progress trails plan by 5.0 points (50.0% vs 55.0% planned). " +
        "Forecast confidence is high (100.0/100). " +
        "The largest drag on health is Schedule Variance, costing 3.7 points."
    );
    assert.equal(n.health_band, "good");
    assert.equal(n.confidence_band, "high");
    assert.deepEqual(n.confidence_drivers, []);
    assert.equal(n.top_detractor?.label, "Schedule Variance");
    assert.equal(n.top_performer?.label, "Forecast Slip");
    assert.equal(n.clauses.length, 5);
  });

  it("mentions slip, EVM, risks and milestones when present", () => {
    const rec = scoreOne({
      forecast_end_date: new Date("2024-10-07T00:00:00Z"),
      planned_cost_to_date: 1000,
      actual_cost_to_date: 1000,
      risks_open: 4,
      risks_high: 1,
      milestones_planned: 4,
      milestones_hit: 3,
    });
    const n = buildNarrative(rec);
    assert.ok(n.clauses.includes("Forecast end date is slipping by 10 days."));
    assert.ok(n.clauses.includes("CPI is 0.91 and SPI is 0.91."));
    assert.ok(n.clauses.includes("1 high risk is open."));
    assert.ok(n.clauses.includes("75.0% of planned milestones were hit."));
    assert.ok(n.text.includes("driven mainly by schedule slip."));
  });

  it("falls back to the project id when the name is blank", () => {
    const n = buildNarrative(scoreOne({ project_name: "" }));
    assert.ok(n.text.startsWith("P1 is in good health"));
  });

  it("uses flow clauses for kanban", () => {
    const rec = scoreProject([makeKanbanSnapshot({ wip_current: 12, wip_limit: 10, cycle_time_days: 6.5 })], DEFAULT_THRESHOLDS_V1)[0];
    const n = buildNarrative(rec);
    assert.ok(n.clauses.includes("Throughput is at 100.0% of its trailing average."));
    assert.ok(n.clauses.includes("Cycle time is 6.5 days."));
    assert.ok(n.clauses.includes("WIP is over limit (12/10)."));
    assert.ok(!n.text.includes("Progress trails plan"));
  });

  it("reports the trend when health moved at least a point", () => {
    const rec = { ...scoreOne(), trend_delta: -4.1 };
    assert.ok(buildNarrative(rec).clauses.includes("Health declined by 4.1 points since last week."));
    const flat = { ...scoreOne(), trend_delta: 0.6 };
    assert.ok(!buildNarrative(flat).text.includes("since last week"));
  });
});
