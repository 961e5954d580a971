// apps/scorer/src/config/env.ts
//
// Process configuration.
//
// Contract:
// - .env files never overwrite variables already set in the environment
// - repo-root .env is read first, then apps/scorer/.env
// - readScorerEnv() is the only place that reads process.env; everything
//   downstream takes a ScorerEnv

import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";

import { z } from "zod";

import { findRepoRoot } from "../util";

// Only the root tsconfig.json sits at the repo root; each workspace has its own package.json.
const REPO_ROOT_MARKER = "tsconfig.json";

const APP_DIR = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "..", "..");

export function findScorerRepoRoot(): string {
  return findRepoRoot(APP_DIR, REPO_ROOT_MARKER);
}

export function loadDotEnvFile(fp: string, env: NodeJS.ProcessEnv = process.env): void {
  if (!fs.existsSync(fp)) return;
  const raw = fs.readFileSync(fp, "utf8");
  for (const line of raw.split(/\r?\n/)) {
    const s = line.trim();
    if (!s || s.startsWith("#")) continue;
    const m = s.match(/^([A-Za-z_][A-Za-z0-9_]*)=(.*)$/);
    if (!m) continue;
    const key = m[1];
    let val = m[2] ?? "";
    // Strip surrounding quotes if present
    if ((val.startsWith('"') && val.endsWith('"')) || (val.startsWith("'") && val.endsWith("'"))) {
      val = val.slice(1, -1);
    }
    if (env[key] == null) env[key] = val;
  }
}

export function loadEnv(): void {
  loadDotEnvFile(path.join(findScorerRepoRoot(), ".env"));
  loadDotEnvFile(path.join(APP_DIR, ".env"));
}

const blankAsUndefined = (v: unknown) => (typeof v === "string" && v.trim() === "" ? undefined : v);

// schema.table or table; quoted as identifiers by the pg source.
const TABLE_NAME_RE = /^[A-Za-z_][A-Za-z0-9_]*(\.[A-Za-z_][A-Za-z0-9_]*)?$/;

const ScorerEnvSchema = z
  .object({
    PORT: z.preprocess(blankAsUndefined, z.coerce.number().int().min(1).max(65535).default(3210)),
    HOST: z.preprocess(blankAsUndefined, z.string().default("0.0.0.0")),
    SNAPSHOT_SOURCE: z.preprocess(blankAsUndefined, z.enum(["csv", "pg"]).default("csv")),
    SNAPSHOT_CSV_PATH: z.preprocess(blankAsUndefined, z.string().default("data/snapshots.csv")),
    DATABASE_URL: z.preprocess(blankAsUndefined, z.string().optional()),
    SNAPSHOT_TABLE: z.preprocess(
      blankAsUndefined,
      z.string().regex(TABLE_NAME_RE, "must be a plain or schema-qualified identifier").default("weekly_snapshots_v1")
    ),
    LOG_LEVEL: z.preprocess(
      blankAsUndefined,
      z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info")
    ),
  })
  .superRefine((v, ctx) => {
    if (v.SNAPSHOT_SOURCE === "pg" && !v.DATABASE_URL) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["DATABASE_URL"], message: "required when SNAPSHOT_SOURCE=pg" });
    }
  });

export type ScorerEnv = z.output<typeof ScorerEnvSchema>;

/**
 * Validate the environment. A relative SNAPSHOT_CSV_PATH is resolved against `repoRoot`.
 * Throws `INVALID_ENV: ...` listing every bad variable.
 */
export function readScorerEnv(env: NodeJS.ProcessEnv = process.env, repoRoot: string = findScorerRepoRoot()): ScorerEnv {
  const r = ScorerEnvSchema.safeParse(env);
  if (!r.success) {
    const detail = r.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new Error(`INVALID_ENV: ${detail}`);
  }
  return {
    ...r.data,
    SNAPSHOT_CSV_PATH: path.resolve(repoRoot, r.data.SNAPSHOT_CSV_PATH),
  };
}
