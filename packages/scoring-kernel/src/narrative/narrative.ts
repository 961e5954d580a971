// packages/scoring-kernel/src/narrative/narrative.ts
//
// Templated explanation of one finished ScoreRecord.
// Presentation only: reads the record, computes point gaps, never feeds back into scoring.

import type {
  ConfidenceBandV1,
  ConfidencePenaltiesV1,
  HealthBandV1,
  NarrativeV1,
  ScoreRecordV1,
} from "@healthgauge/contracts";

export type ConfidenceDriverV1 =
  | "forecast volatility"
  | "throughput volatility"
  | "requirements churn"
  | "backlog growth"
  | "schedule slip";

export type DetractorV1 = { label: string; gap: number };

export function healthBand(score: number): HealthBandV1 {
  if (score >= 75) return "good";
  if (score >= 50) return "moderate";
  return "critical";
}

export function confidenceBand(score: number): ConfidenceBandV1 {
  if (score >= 75) return "high";
  if (score >= 50) return "moderate";
  return "low";
}

/**
 * Points lost per metric (max contribution - contribution), largest first.
 * Ties keep the record's metric order, so the first listed metric wins.
 */
export function rankDetractors(record: Pick<ScoreRecordV1, "contributions" | "max_contributions">): DetractorV1[] {
  const out = Object.keys(record.max_contributions).map((label) => ({
    label,
    gap: (record.max_contributions[label] ?? 0) - (record.contributions[label] ?? 0),
  }));
  // Array.prototype.sort is stable.
  return out.sort((a, b) => b.gap - a.gap);
}

export function topPerformer(record: Pick<ScoreRecordV1, "contributions">): { label: string; points: number } | null {
  let best: { label: string; points: number } | null = null;
  for (const [label, points] of Object.entries(record.contributions)) {
    if (!best || points > best.points) best = { label, points };
  }
  return best;
}

/** Confidence penalties above zero, largest first. */
export function confidenceDrivers(record: Pick<ScoreRecordV1, "raw">): ConfidenceDriverV1[] {
  const p: ConfidencePenaltiesV1 = record.raw.penalties;
  const volatilityLabel: ConfidenceDriverV1 =
    record.raw.volatility.source === "throughput" ? "throughput volatility" : "forecast volatility";
  const items: { driver: ConfidenceDriverV1; amount: number }[] = [
    { driver: volatilityLabel, amount: p.volatility },
    { driver: "schedule slip", amount: p.slip },
    { driver: "requirements churn", amount: p.churn },
    { driver: "backlog growth", amount: p.backlog },
  ];
  return items
    .filter((it) => it.amount > 0)
    .sort((a, b) => b.amount - a.amount)
    .map((it) => it.driver);
}

function fmt1(x: number): string {
  return x.toFixed(1);
}

function openerClause(name: string, score: number): string {
  switch (healthBand(score)) {
    case "good":
      return `${name} is in good health (${fmt1(score)}/100).`;
    case "moderate":
      return `${name} is in moderate health (${fmt1(score)}/100) and needs attention.`;
    case "critical":
      return `${name} is in critical health (${fmt1(score)}/100).`;
  }
}

function trendClause(delta: number): string | null {
  if (Math.abs(delta) < 1) return null;
  const verb = delta > 0 ? "improved" : "declined";
  return `Health ${verb} by ${fmt1(Math.abs(delta))} points since last week.`;
}

function evmClause(raw: ScoreRecordV1["raw"]): string | null {
  if (raw.cpi === null) return null;
  const spi = raw.spi === null ? "" : ` and SPI is ${raw.spi.toFixed(2)}`;
  return `CPI is ${raw.cpi.toFixed(2)}${spi}.`;
}

function plannedClauses(raw: ScoreRecordV1["raw"]): string[] {
  const out: string[] = [];
  if (raw.slip_days !== null) {
    out.push(
      raw.slip_days > 0
        ? `Forecast end date is slipping by ${raw.slip_days} days.`
        : "Forecast end date is on or ahead of plan."
    );
  }
  if (raw.sched_var_pct < 0) {
    out.push(
      `Progress trails plan by ${fmt1(-raw.sched_var_pct)} points (${fmt1(raw.pct_complete)}% vs ${fmt1(raw.planned_pct)}% planned).`
    );
  }
  const evm = evmClause(raw);
  if (evm) out.push(evm);
  if (raw.risks_high !== null && raw.risks_high > 0) {
    out.push(`${raw.risks_high} high risk${raw.risks_high === 1 ? " is" : "s are"} open.`);
  }
  if (raw.milestone_rate !== null) {
    out.push(`${fmt1(raw.milestone_rate * 100)}% of planned milestones were hit.`);
  }
  return out;
}

function kanbanClauses(raw: ScoreRecordV1["raw"]): string[] {
  const out: string[] = [];
  if (raw.throughput_ratio !== null) {
    out.push(`Throughput is at ${fmt1(raw.throughput_ratio * 100)}% of its trailing average.`);
  }
  if (raw.cycle_time_days !== null) {
    out.push(`Cycle time is ${fmt1(raw.cycle_time_days)} days.`);
  }
  if (raw.wip_current !== null && raw.wip_limit !== null) {
    out.push(
      raw.wip_current > raw.wip_limit
        ? `WIP is over limit (${raw.wip_current}/${raw.wip_limit}).`
        : `WIP is within limit (${raw.wip_current}/${raw.wip_limit}).`
    );
  }
  const evm = evmClause(raw);
  if (evm) out.push(evm);
  return out;
}

function confidenceClause(score: number, drivers: ReadonlyArray<string>): string {
  const driven = drivers.length ? `, driven mainly by ${drivers.join(" and ")}` : "";
  return `Forecast confidence is ${confidenceBand(score)} (${fmt1(score)}/100)${driven}.`;
}

function detractorClause(top: DetractorV1 | null): string {
  if (!top || !(top.gap > 0)) return "No metric is currently costing health points.";
  return `The largest drag on health is ${top.label}, costing ${fmt1(top.gap)} points.`;
}

export function buildNarrative(
  record: ScoreRecordV1,
  drivers: ReadonlyArray<ConfidenceDriverV1> = confidenceDrivers(record)
): NarrativeV1 {
  const name = record.project_name || record.project_id;
  const detractors = rankDetractors(record);
  const top = detractors.length ? detractors[0] : null;

  const clauses: string[] = [openerClause(name, record.health_score)];
  const trend = trendClause(record.trend_delta);
  if (trend) clauses.push(trend);
  clauses.push(...(record.delivery_framework === "kanban" ? kanbanClauses(record.raw) : plannedClauses(record.raw)));
  clauses.push(confidenceClause(record.confidence_score, drivers));
  clauses.push(detractorClause(top));

  return {
    health_band: healthBand(record.health_score),
    confidence_band: confidenceBand(record.confidence_score),
    top_detractor: top,
    top_performer: topPerformer(record),
    confidence_drivers: [...drivers],
    clauses,
    text: clauses.join(" "),
  };
}
