#!/usr/bin/env node
/**
 * Score a snapshot CSV from the command line.
 *
 * Contract:
 * - prints the scoring response JSON to stdout (summaries only with --summary)
 * - threshold overrides use the same per-key rules as the HTTP API
 * - exits 1 on a missing or unreadable file
 *
 * Usage:
 *   npm run score:csv -- --file data/snapshots.csv --thresholds slip_days_max=120,cpi_floor=0.85 --summary
 */

import fs from "node:fs";
import path from "node:path";

import type { ScoringLogger } from "@healthgauge/scoring-kernel";

import { parseCsv } from "../apps/scorer/src/ingest/csv";
import { ScoringRuntime } from "../apps/scorer/src/runtime";

/* -------------------- CLI utils -------------------- */

function arg(name: string, fallback: string | null = null): string | null {
  const i = process.argv.indexOf(name);
  if (i === -1) return fallback;
  const v = process.argv[i + 1];
  return v == null ? fallback : String(v);
}

function flag(name: string): boolean {
  return process.argv.includes(name);
}

function die(msg: string): never {
  console.error(msg);
  process.exit(1);
}

function parseThresholdArg(s: string | null): Record<string, string> {
  const out: Record<string, string> = {};
  if (!s) return out;
  for (const pair of s.split(",")) {
    const t = pair.trim();
    if (!t) continue;
    const eq = t.indexOf("=");
    if (eq <= 0) die(`bad --thresholds entry: ${t} (expected key=value)`);
    out[t.slice(0, eq).trim()] = t.slice(eq + 1).trim();
  }
  return out;
}

const stderrLogger: ScoringLogger = {
  warn: (obj, msg) => console.error(`[warn] ${msg} ${JSON.stringify(obj)}`),
  debug: (obj, msg) => {
    if (process.env.LOG_LEVEL === "debug") console.error(`[debug] ${msg} ${JSON.stringify(obj)}`);
  },
};

/* -------------------- main -------------------- */

async function main(): Promise<void> {
  const file = arg("--file");
  if (!file) die("usage: score_csv --file <snapshots.csv> [--thresholds k=v,k=v] [--summary]");

  const fp = path.resolve(process.cwd(), file);
  if (!fs.existsSync(fp)) die(`file not found: ${fp}`);

  const text = await fs.promises.readFile(fp, "utf8");
  const runtime = new ScoringRuntime(null);
  const out = runtime.scoreRows(parseCsv(text).records, {
    thresholds: parseThresholdArg(arg("--thresholds")),
    logger: stderrLogger,
  });

  const printed = flag("--summary")
    ? {
        summaries: out.summaries.map((s) => ({
          project_id: s.project_id,
          week_ending: s.week_ending,
          health_score: s.health_score,
          confidence_score: s.confidence_score,
          trend_delta: s.trend_delta,
          narrative: s.narrative.text,
        })),
        failures: out.failures,
        rejected_rows: out.rejected_rows,
        meta: out.meta,
      }
    : out;
  console.log(JSON.stringify(printed, null, 2));
}

main().catch((e: unknown) => {
  die(e instanceof Error ? e.message : String(e));
});
