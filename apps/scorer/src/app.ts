// apps/scorer/src/app.ts
import multipart from "@fastify/multipart";
import Fastify, { type FastifyInstance, type FastifyServerOptions } from "fastify";

import { registerScoringRoutes } from "./routes";
import type { ScoringRuntime } from "./runtime";

export const UPLOAD_LIMIT_BYTES = 10 * 1024 * 1024;

export type BuildAppOptions = {
  runtime: ScoringRuntime;
  logger?: FastifyServerOptions["logger"];
};

export function buildApp(opts: BuildAppOptions): FastifyInstance {
  const app = Fastify({ logger: opts.logger ?? true, bodyLimit: UPLOAD_LIMIT_BYTES });

  app.addHook("onRequest", async (req, reply) => {
    reply.header("Access-Control-Allow-Origin", "*");
    reply.header("Access-Control-Allow-Headers", "content-type");
    reply.header("Access-Control-Allow-Methods", "GET,POST,OPTIONS");
    if (req.method === "OPTIONS") return reply.code(204).send();
  });

  app.register(multipart, { limits: { fileSize: UPLOAD_LIMIT_BYTES } });
  registerScoringRoutes(app, opts.runtime);

  app.addHook("onClose", async () => {
    await opts.runtime.close();
  });

  return app;
}
