// apps/scorer/src/server.ts
import { buildApp } from "./app";
import { loadEnv, readScorerEnv } from "./config/env";
import { ScoringRuntime } from "./runtime";
import { makeSnapshotSourceFromEnv } from "./source/snapshot_source";

loadEnv();
const env = readScorerEnv();

const runtime = new ScoringRuntime(makeSnapshotSourceFromEnv(env));
const app = buildApp({ runtime, logger: { level: env.LOG_LEVEL } });

async function main(): Promise<void> {
  await runtime.ping();
  await app.listen({ port: env.PORT, host: env.HOST });
  app.log.info({ source: env.SNAPSHOT_SOURCE }, "scorer ready");
}

main().catch((err) => {
  app.log.error(err);
  process.exit(1);
});
