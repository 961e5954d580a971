// apps/scorer/src/ingest/row_mapper.ts
//
// Raw records (CSV cells, pg rows, JSON bodies) -> validated WeeklySnapshotV1.
//
// Contract:
// - rows whose cells are all blank are dropped and counted, never rejected
// - a row failing the schema is reported with its index and issues; the rest still load
// - row_index is the 0-based position in the input record list

import {
  WeeklySnapshotV1Schema,
  type RowRejectionV1,
  type WeeklySnapshotV1,
} from "@healthgauge/contracts";

export type MappedSnapshotsV1 = {
  snapshots: WeeklySnapshotV1[];
  rejected_rows: RowRejectionV1[];
  dropped_empty_rows: number;
};

function isBlankCell(v: unknown): boolean {
  return v === undefined || v === null || (typeof v === "string" && v.trim() === "");
}

export function isEmptyRecord(rec: Readonly<Record<string, unknown>>): boolean {
  return Object.values(rec).every(isBlankCell);
}

function rawProjectId(rec: Readonly<Record<string, unknown>>): string | null {
  const v = rec.project_id;
  if (typeof v === "number") return String(v);
  if (typeof v === "string" && v.trim()) return v.trim();
  return null;
}

export function mapSnapshotRows(records: ReadonlyArray<Readonly<Record<string, unknown>>>): MappedSnapshotsV1 {
  const snapshots: WeeklySnapshotV1[] = [];
  const rejected_rows: RowRejectionV1[] = [];
  let dropped_empty_rows = 0;

  records.forEach((rec, row_index) => {
    if (isEmptyRecord(rec)) {
      dropped_empty_rows++;
      return;
    }
    const r = WeeklySnapshotV1Schema.safeParse(rec);
    if (r.success) {
      snapshots.push(r.data);
      return;
    }
    rejected_rows.push({
      row_index,
      project_id: rawProjectId(rec),
      issues: r.error.issues.map((i) => ({ path: i.path.join("."), message: i.message })),
    });
  });

  return { snapshots, rejected_rows, dropped_empty_rows };
}
