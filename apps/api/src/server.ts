import "dotenv/config";
import IORedis from "ioredis";
import { Queue } from "bullmq";

import {
  QUEUE_NAME,
  componentLogger,
  createR2Client,
  errorMessage,
  type JobResult,
  type LibraryJobPayload,
} from "@trackprint/shared";
import { VectorIndexClient, transportFactoryFor } from "@trackprint/vector-index";

import { buildApp } from "./app";
import { LocalArtifactLinks, R2ArtifactLinks, type ArtifactLinks } from "./artifacts";
import { loadApiConfig } from "./config";
import { BullJobStore } from "./jobs";

const log = componentLogger("api");

async function main() {
  const cfg = loadApiConfig();

  // -----------------------------
  // 1) Redis connection + queue
  // -----------------------------
  const connection = new IORedis(cfg.redisUrl, {
    maxRetriesPerRequest: null,
    ...(cfg.redisUrl.startsWith("rediss://") ? { tls: {} } : {}),
  });
  const queue = new Queue<LibraryJobPayload, JobResult>(QUEUE_NAME, { connection });

  // -----------------------------
  // 2) vector index (read side; the worker owns collection setup)
  // -----------------------------
  const index = new VectorIndexClient({
    createTransport: transportFactoryFor(cfg.qdrant.url, cfg.qdrant.apiKey),
    collection: cfg.qdrant.collection,
    log: componentLogger("vector-index", { collection: cfg.qdrant.collection }),
  });
  await index.connect();

  // -----------------------------
  // 3) artifact links
  // -----------------------------
  const artifacts: ArtifactLinks = cfg.r2
    ? new R2ArtifactLinks(createR2Client(cfg.r2), cfg.r2.R2_BUCKET)
    : new LocalArtifactLinks(cfg.artifactsDir);

  // -----------------------------
  // 4) Fastify app + listen
  // -----------------------------
  const app = await buildApp({ jobs: new BullJobStore(queue), index, artifacts, logger: log });

  const shutdown = async (signal: string) => {
    log.info({ signal }, "shutting down");
    try {
      await app.close();
      await queue.close();
      await connection.quit();
      process.exit(0);
    } catch (err) {
      log.error({ err: errorMessage(err) }, "shutdown failed");
      process.exit(1);
    }
  };
  process.once("SIGINT", (s) => void shutdown(s));
  process.once("SIGTERM", (s) => void shutdown(s));

  await app.listen({ port: cfg.port, host: cfg.host });
  log.info({ queue: QUEUE_NAME, artifacts: cfg.r2 ? "r2" : "local" }, `API on http://${cfg.host}:${cfg.port}`);
}

main().catch((err) => {
  log.fatal({ err: errorMessage(err) }, "api failed to start");
  process.exit(1);
});
