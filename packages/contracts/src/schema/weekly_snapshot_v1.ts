// packages/contracts/src/schema/weekly_snapshot_v1.ts
import { z } from "zod";

import { DeliveryFrameworkInputV1 } from "./delivery_framework_v1";

const DAY_MS = 86_400_000;

function utcDate(yyyy: number, mm: number, dd: number): Date | null {
  const t = Date.UTC(yyyy, mm - 1, dd);
  const d = new Date(t);
  // Reject rollovers such as 2024-02-31.
  if (d.getUTCFullYear() !== yyyy || d.getUTCMonth() !== mm - 1 || d.getUTCDate() !== dd) return null;
  return d;
}

function isUtcMidnight(d: Date): boolean {
  return d.getUTCHours() === 0 && d.getUTCMinutes() === 0 && d.getUTCSeconds() === 0 && d.getUTCMilliseconds() === 0;
}

/**
 * Parse a date-like cell into a calendar date, held as a Date at UTC midnight.
 *
 * Accepted: Date instances, unix ms, `YYYY-MM-DD` (optionally followed by a time part,
 * which is dropped), `M/D/YYYY`. Blank cells are `undefined`; anything else unparseable
 * is `null`.
 *
 * A Date that is not at UTC midnight is read on its local calendar day: pg hands back
 * DATE columns as local midnight.
 */
export function parseDateLike(v: unknown): Date | null | undefined {
  if (v === undefined || v === null) return undefined;
  if (v instanceof Date) {
    if (!Number.isFinite(v.getTime())) return null;
    if (isUtcMidnight(v)) return v;
    return utcDate(v.getFullYear(), v.getMonth() + 1, v.getDate());
  }
  if (typeof v === "number") {
    if (!Number.isFinite(v)) return null;
    const d = new Date(v);
    return utcDate(d.getUTCFullYear(), d.getUTCMonth() + 1, d.getUTCDate());
  }
  if (typeof v !== "string") return null;

  const s = v.trim();
  if (!s || s.toUpperCase() === "NA" || s.toUpperCase() === "NAT") return undefined;

  const iso = s.match(/^(\d{4})-(\d{2})-(\d{2})$/);
  if (iso) return utcDate(Number(iso[1]), Number(iso[2]), Number(iso[3]));

  const us = s.match(/^(\d{1,2})\/(\d{1,2})\/(\d{4})$/);
  if (us) return utcDate(Number(us[3]), Number(us[1]), Number(us[2]));

  const stamped = s.match(/^(\d{4})-(\d{2})-(\d{2})[T ]/);
  if (stamped) {
    if (!Number.isFinite(Date.parse(s.replace(" ", "T")))) return null;
    return utcDate(Number(stamped[1]), Number(stamped[2]), Number(stamped[3]));
  }
  return null;
}

function utcDayNumber(d: Date): number {
  return Date.UTC(d.getUTCFullYear(), d.getUTCMonth(), d.getUTCDate()) / DAY_MS;
}

/** Calendar days from `a` to `b` (negative when `b` is earlier). */
export function daysBetween(a: Date, b: Date): number {
  return utcDayNumber(b) - utcDayNumber(a);
}

export function formatIsoDate(d: Date): string {
  return d.toISOString().slice(0, 10);
}

function toNumberish(v: unknown): number | undefined {
  if (v === undefined || v === null) return undefined;
  if (typeof v === "number") return v;
  if (typeof v === "string") {
    const s = v.trim();
    if (!s) return undefined;
    const u = s.toUpperCase();
    if (u === "NA" || u === "NAN" || u === "NULL") return undefined;
    return Number(s);
  }
  return NaN;
}

// Required signal: blank -> "Required", garbage -> NaN (rejected as not a number).
const RequiredNumber = z.preprocess(toNumberish, z.number().finite());

// Optional signal: absent-or-present. Garbage counts as absent.
const OptionalNumber = z.preprocess((v) => {
  const n = toNumberish(v);
  return typeof n === "number" && Number.isFinite(n) ? n : undefined;
}, z.number().finite().optional());

const RequiredDate = z.preprocess(
  parseDateLike,
  z.date({ required_error: "date is required", invalid_type_error: "date is not parseable" })
);

// Malformed optional dates become null; dependent metrics fall back to their gate.
const OptionalDate = z.preprocess((v) => parseDateLike(v) ?? null, z.date().nullable());

const Identifier = z.preprocess((v) => (typeof v === "number" ? String(v) : v), z.string().trim().min(1));

/**
 * WeeklySnapshotV1Schema
 *
 * One row per project per week. Fractions (percent complete, ratios) are 0..1.
 * Optional signals stay `undefined` when absent; they are never defaulted.
 */
export const WeeklySnapshotV1Schema = z.object({
  project_id: Identifier,
  project_name: z.preprocess((v) => (v === undefined || v === null ? "" : String(v).trim()), z.string()),
  week_ending: RequiredDate,
  planned_end_date: OptionalDate,
  forecast_end_date: OptionalDate,
  delivery_framework: DeliveryFrameworkInputV1,

  actual_percent_complete: RequiredNumber,
  planned_percent_complete: RequiredNumber,
  backlog_items_added_last_4w: RequiredNumber,
  backlog_items_closed_last_4w: RequiredNumber,
  requirements_changed_last_4w: RequiredNumber,
  defect_escape_rate_last_4w: RequiredNumber,
  defects_open_critical: RequiredNumber,
  team_size: RequiredNumber,
  team_churn_last_4w: RequiredNumber,
  blocked_days_last_2w: RequiredNumber,
  unplanned_work_ratio_last_4w: RequiredNumber,
  dependency_count: RequiredNumber,

  planned_cost_to_date: OptionalNumber,
  actual_cost_to_date: OptionalNumber,
  milestones_planned: OptionalNumber,
  milestones_hit: OptionalNumber,
  risks_open: OptionalNumber,
  risks_high: OptionalNumber,
  throughput: OptionalNumber,
  cycle_time_days: OptionalNumber,
  wip_current: OptionalNumber,
  wip_limit: OptionalNumber,
  aging_wip_items: OptionalNumber,
});

export type WeeklySnapshotV1 = z.output<typeof WeeklySnapshotV1Schema>;
export type WeeklySnapshotInputV1 = z.input<typeof WeeklySnapshotV1Schema>;
