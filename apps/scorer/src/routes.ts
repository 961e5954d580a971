// apps/scorer/src/routes.ts
//
// HTTP surface of the scorer.
//
// GET  /healthz
// GET  /api/thresholds           defaults + editable manifest
// GET  /api/data?<key>=<value>   score the configured source; query params are threshold overrides
// POST /api/score                JSON { snapshots: [...], thresholds?: {...} }
// POST /api/import/csv           multipart: `file` part + text parts as threshold overrides
//
// Invalid request input -> 400 { ok: false, errors }. Scoring itself never rejects a request:
// bad rows and bad overrides are reported inside the response.

import type { MultipartFile } from "@fastify/multipart";
import { getDefaultThresholds, getThresholdManifest } from "@healthgauge/scoring-kernel";
import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import { z } from "zod";

import { ScoringInputRejected } from "./errors";
import { parseCsv } from "./ingest/csv";
import type { ScoringRuntime } from "./runtime";

const OverridesSchema = z.record(z.unknown());

const ScoreBodySchema = z.object({
  snapshots: z.array(z.record(z.unknown())),
  thresholds: OverridesSchema.optional(),
});

export const CSV_FILE_FIELD = "file";

function rejectionFromZod(err: z.ZodError): ScoringInputRejected {
  return new ScoringInputRejected(
    400,
    err.issues.map((i) => ({ code: "INVALID_BODY", path: i.path.join(".") || "(root)", message: i.message }))
  );
}

async function readFilePart(part: MultipartFile): Promise<string> {
  const buf = await part.toBuffer();
  return buf.toString("utf8");
}

async function readCsvUpload(req: FastifyRequest): Promise<{ name: string; text: string; fields: Record<string, string> }> {
  let file: { name: string; text: string } | null = null;
  const fields: Record<string, string> = {};

  // Every part has to be consumed or the request never completes.
  for await (const part of req.parts()) {
    if (part.type === "file") {
      const text = await readFilePart(part);
      if (part.fieldname === CSV_FILE_FIELD && !file) file = { name: part.filename, text };
    } else if (typeof part.value === "string") {
      fields[part.fieldname] = part.value;
    }
  }

  if (!file || !file.text.trim()) {
    throw new ScoringInputRejected(400, [
      { code: "FILE_REQUIRED", path: CSV_FILE_FIELD, message: "a non-empty CSV file part is required" },
    ]);
  }
  return { name: file.name, text: file.text, fields };
}

function parseUploadedCsv(text: string): Record<string, string>[] {
  try {
    return parseCsv(text).records;
  } catch (e: unknown) {
    const message = e instanceof Error ? e.message : String(e);
    throw new ScoringInputRejected(400, [{ code: "CSV_PARSE_FAILED", path: CSV_FILE_FIELD, message }]);
  }
}

async function sendRejection(reply: FastifyReply, e: unknown): Promise<FastifyReply> {
  if (e instanceof ScoringInputRejected) {
    return reply.code(e.status).send({ ok: false, errors: e.errors });
  }
  throw e;
}

export function registerScoringRoutes(app: FastifyInstance, runtime: ScoringRuntime): void {
  app.get("/healthz", async () => ({ ok: true }));

  app.get("/api/thresholds", async () => ({
    defaults: getDefaultThresholds(),
    manifest: getThresholdManifest(),
  }));

  app.get("/api/data", async (req, reply) => {
    const q = OverridesSchema.safeParse(req.query ?? {});
    if (!q.success) return sendRejection(reply, rejectionFromZod(q.error));
    const out = await runtime.run({ thresholds: q.data, logger: req.log });
    return reply.send(out);
  });

  app.post("/api/score", async (req, reply) => {
    const body = ScoreBodySchema.safeParse(req.body ?? {});
    if (!body.success) return sendRejection(reply, rejectionFromZod(body.error));
    const out = runtime.scoreRows(body.data.snapshots, { thresholds: body.data.thresholds, logger: req.log });
    return reply.send(out);
  });

  app.post("/api/import/csv", async (req, reply) => {
    if (!req.isMultipart()) {
      return sendRejection(
        reply,
        new ScoringInputRejected(400, [
          { code: "FILE_REQUIRED", path: CSV_FILE_FIELD, message: "expected multipart/form-data" },
        ])
      );
    }
    try {
      const upload = await readCsvUpload(req);
      const records = parseUploadedCsv(upload.text);
      req.log.info({ file: upload.name, rows: records.length, overrides: Object.keys(upload.fields) }, "csv upload received");
      return reply.send(runtime.scoreRows(records, { thresholds: upload.fields, logger: req.log }));
    } catch (e: unknown) {
      return sendRejection(reply, e);
    }
  });
}
