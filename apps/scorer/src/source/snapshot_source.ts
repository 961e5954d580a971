// apps/scorer/src/source/snapshot_source.ts
//
// Where raw snapshot rows come from. Sources return untyped records;
// validation happens once, in ingest/row_mapper.ts, whatever the origin.

import fs from "node:fs";

import { Pool } from "pg";

import type { ScorerEnv } from "../config/env";
import { parseCsv } from "../ingest/csv";
import { isRecord } from "../util";

export interface SnapshotSource {
  readonly kind: string;
  /** Fails when the source cannot be read; run once at startup. */
  ping(): Promise<void>;
  load(): Promise<Record<string, unknown>[]>;
  close(): Promise<void>;
}

export class CsvFileSnapshotSource implements SnapshotSource {
  readonly kind = "csv";

  constructor(private readonly filePath: string) {}

  async ping(): Promise<void> {
    if (!fs.existsSync(this.filePath)) throw new Error(`SNAPSHOT_CSV_NOT_FOUND: ${this.filePath}`);
  }

  async load(): Promise<Record<string, unknown>[]> {
    await this.ping();
    const text = await fs.promises.readFile(this.filePath, "utf8");
    return parseCsv(text).records;
  }

  async close(): Promise<void> {}
}

/** The slice of pg.Pool / pg.Client the source needs. */
export type Queryable = {
  query(sql: string): Promise<{ rows: unknown[] }>;
};

export function quoteTableName(name: string): string {
  const parts = name.split(".");
  if (parts.length > 2 || !parts.every((p) => /^[A-Za-z_][A-Za-z0-9_]*$/.test(p))) {
    throw new Error(`INVALID_TABLE_NAME: ${name}`);
  }
  return parts.map((p) => `"${p}"`).join(".");
}

export class PgSnapshotSource implements SnapshotSource {
  readonly kind = "pg";
  private readonly sql: string;

  /**
   * @param end called by close(); pass the pool's `end` when this source owns the pool.
   */
  constructor(
    private readonly db: Queryable,
    table: string,
    private readonly end: () => Promise<void> = async () => {}
  ) {
    this.sql = `select * from ${quoteTableName(table)} order by project_id, week_ending`;
  }

  async ping(): Promise<void> {
    const r = await this.db.query("select 1 as ok");
    if (!r.rows.length) throw new Error("PG_PING_FAILED: empty result");
  }

  async load(): Promise<Record<string, unknown>[]> {
    const r = await this.db.query(this.sql);
    return r.rows.filter(isRecord);
  }

  async close(): Promise<void> {
    await this.end();
  }
}

export function makeSnapshotSourceFromEnv(env: ScorerEnv): SnapshotSource {
  switch (env.SNAPSHOT_SOURCE) {
    case "csv":
      return new CsvFileSnapshotSource(env.SNAPSHOT_CSV_PATH);
    case "pg": {
      if (!env.DATABASE_URL) throw new Error("MISSING_DATABASE_URL: SNAPSHOT_SOURCE=pg needs DATABASE_URL");
      const pool = new Pool({ connectionString: env.DATABASE_URL });
      return new PgSnapshotSource({ query: (sql) => pool.query(sql) }, env.SNAPSHOT_TABLE, () => pool.end());
    }
  }
}
