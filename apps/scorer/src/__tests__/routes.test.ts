import assert from "node:assert/strict";
import { after, before, describe, it } from "node:test";

import type { ScoringResponseV1 } from "@healthgauge/contracts";
import type { FastifyInstance } from "fastify";

import { buildApp } from "../app";
import { ScoringRuntime } from "../runtime";
import type { SnapshotSource } from "../source/snapshot_source";
import { rawRow, toCsv } from "./fixtures";

type Rejection = { ok: false; errors: { code: string; path: string; message: string }[] };

const BOUNDARY = "----scorer-test-boundary";

function multipartBody(parts: { name: string; value: string; filename?: string }[]): string {
  const chunks: string[] = [];
  for (const p of parts) {
    const disposition = p.filename
      ? `form-data; name="${p.name}"; filename="${p.filename}"\r\nContent-Type: text/csv`
      : `form-data; name="${p.name}"`;
    chunks.push(`--${BOUNDARY}\r\nContent-Disposition: ${disposition}\r\n\r\n${p.value}\r\n`);
  }
  chunks.push(`--${BOUNDARY}--\r\n`);
  return chunks.join("");
}

const source: SnapshotSource = {
  kind: "memory",
  async ping() {},
  async load() {
    return [rawRow(), rawRow({ week_ending: "2024-03-08" })];
  },
  async close() {},
};

describe("scoring routes", () => {
  let app: FastifyInstance;

  before(async () => {
    app = buildApp({ runtime: new ScoringRuntime(source), logger: false });
    await app.ready();
  });

  after(async () => {
    await app.close();
  });

  it("GET /healthz", async () => {
    const res = await app.inject({ method: "GET", url: "/healthz" });
    assert.equal(res.statusCode, 200);
    assert.deepEqual(res.json(), { ok: true });
  });

  it("GET /api/thresholds returns defaults and the manifest", async () => {
    const res = await app.inject({ method: "GET", url: "/api/thresholds" });
    assert.equal(res.statusCode, 200);
    const body = res.json<{ defaults: Record<string, number>; manifest: { editable: unknown[] } }>();
    assert.equal(body.defaults.slip_days_max, 140);
    assert.equal(body.manifest.editable.length, 17);
  });

  it("GET /api/data scores the source with query overrides", async () => {
    const res = await app.inject({ method: "GET", url: "/api/data?slip_days_max=120&bogus=1" });
    assert.equal(res.statusCode, 200);
    const body = res.json<ScoringResponseV1>();
    assert.equal(body.summaries.length, 1);
    assert.equal(body.summaries[0].week_ending, "2024-03-08");
    assert.equal(body.meta.thresholds.slip_days_max, 120);
    assert.deepEqual(body.meta.thresholds_applied, ["slip_days_max"]);
    assert.deepEqual(body.meta.thresholds_ignored.map((x) => x.key), ["bogus"]);
  });

  it("POST /api/score scores a JSON body", async () => {
    const res = await app.inject({
      method: "POST",
      url: "/api/score",
      payload: { snapshots: [rawRow(), rawRow({ project_id: "P2", project_name: "Borealis" })] },
    });
    assert.equal(res.statusCode, 200);
    const body = res.json<ScoringResponseV1>();
    assert.deepEqual(
      body.summaries.map((s) => [s.project_id, s.health_score]),
      [
        ["P1", 96.3],
        ["P2", 96.3],
      ]
    );
  });

  it("POST /api/score rejects a malformed body", async () => {
    const res = await app.inject({ method: "POST", url: "/api/score", payload: { snapshots: "nope" } });
    assert.equal(res.statusCode, 400);
    const body = res.json<Rejection>();
    assert.equal(body.ok, false);
    assert.deepEqual(
      body.errors.map((e) => [e.code, e.path]),
      [["INVALID_BODY", "snapshots"]]
    );
  });

  it("POST /api/import/csv scores an uploaded file with form-field overrides", async () => {
    const csv = toCsv([rawRow(), rawRow({ week_ending: "2024-03-08" })]) + ",,,\n";
    const res = await app.inject({
      method: "POST",
      url: "/api/import/csv",
      headers: { "content-type": `multipart/form-data; boundary=${BOUNDARY}` },
      payload: multipartBody([
        { name: "blocked_days_max", value: "5" },
        { name: "file", value: csv, filename: "snapshots.csv" },
      ]),
    });
    assert.equal(res.statusCode, 200);
    const body = res.json<ScoringResponseV1>();
    assert.deepEqual(body.series[0].weeks, ["2024-03-01", "2024-03-08"]);
    assert.equal(body.dropped_empty_rows, 1);
    assert.deepEqual(body.meta.thresholds_applied, ["blocked_days_max"]);
  });

  it("POST /api/import/csv requires a file part", async () => {
    const res = await app.inject({
      method: "POST",
      url: "/api/import/csv",
      headers: { "content-type": `multipart/form-data; boundary=${BOUNDARY}` },
      payload: multipartBody([{ name: "slip_days_max", value: "120" }]),
    });
    assert.equal(res.statusCode, 400);
    assert.deepEqual(
      res.json<Rejection>().errors.map((e) => e.code),
      ["FILE_REQUIRED"]
    );
  });

  it("POST /api/import/csv rejects a non-multipart request", async () => {
    const res = await app.inject({ method: "POST", url: "/api/import/csv", payload: { file: "x" } });
    assert.equal(res.statusCode, 400);
    assert.equal(res.json<Rejection>().errors[0].code, "FILE_REQUIRED");
  });

  it("POST /api/import/csv reports a broken CSV", async () => {
    const res = await app.inject({
      method: "POST",
      url: "/api/import/csv",
      headers: { "content-type": `multipart/form-data; boundary=${BOUNDARY}` },
      payload: multipartBody([{ name: "file", value: 'project_id\n"P1', filename: "broken.csv" }]),
    });
    assert.equal(res.statusCode, 400);
    assert.equal(res.json<Rejection>().errors[0].code, "CSV_PARSE_FAILED");
  });
});
