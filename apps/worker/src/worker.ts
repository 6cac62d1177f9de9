import "dotenv/config";
import path from "node:path";
import IORedis from "ioredis";
import { Worker } from "bullmq";

import {
  QUEUE_NAME,
  componentLogger,
  createR2Client,
  errorMessage,
  type JobResult,
  type LibraryJobPayload,
} from "@trackprint/shared";
import { VectorIndexClient, transportFactoryFor } from "@trackprint/vector-index";

import { loadWorkerConfig } from "./config";
import { HttpEmbeddingModel, SharedEmbeddingModel } from "./modules/embed/model";
import { CommandPreviewResolver, StaticPreviewResolver } from "./modules/previews/resolver";
import { LocalArtifactStore, R2ArtifactStore } from "./pipeline/artifacts";
import { createProcessor } from "./processor";
import type { ArtifactStore, PreviewResolver } from "./types/processing";

const log = componentLogger("worker");

async function main() {
  const cfg = loadWorkerConfig();

  // ---------- Redis ----------
  const connection = new IORedis(cfg.redisUrl, {
    maxRetriesPerRequest: null,
    ...(cfg.redisUrl.startsWith("rediss://") ? { tls: {} } : {}),
  });

  // ---------- vector index (hard prerequisite) ----------
  const index = await VectorIndexClient.open({
    createTransport: transportFactoryFor(cfg.qdrant.url, cfg.qdrant.apiKey),
    collection: cfg.qdrant.collection,
    recreateCollection: cfg.qdrant.recreate,
    log: componentLogger("vector-index", { collection: cfg.qdrant.collection }),
  });

  // ---------- model: loaded on first use, shared by all jobs ----------
  const modelLog = componentLogger("embedding-model");
  const model = new SharedEmbeddingModel(() => HttpEmbeddingModel.connect({ url: cfg.model.url, log: modelLog }));

  const resolver: PreviewResolver = cfg.resolverCommand
    ? new CommandPreviewResolver(cfg.resolverCommand, undefined, componentLogger("preview-resolver"))
    : new StaticPreviewResolver();
  if (!cfg.resolverCommand) log.warn("PREVIEW_RESOLVER_CMD not set, only tracks with a preview_url are fetched");

  // ---------- artifacts ----------
  const artifactLog = componentLogger("artifacts");
  const artifacts: ArtifactStore = cfg.r2
    ? new R2ArtifactStore(createR2Client(cfg.r2), cfg.r2.R2_BUCKET, artifactLog)
    : new LocalArtifactStore(path.join(cfg.dataDir, "artifacts"), artifactLog);

  const processor = createProcessor(
    {
      dataDir: cfg.dataDir,
      resolver,
      model,
      index,
      artifacts,
      ffmpegPath: cfg.ffmpegPath,
      downloadConcurrency: cfg.concurrency.downloads,
      convertConcurrency: cfg.concurrency.conversions,
      layer: cfg.model.layer,
      reduce: cfg.model.reduce,
    },
    { log }
  );

  const worker = new Worker<LibraryJobPayload, JobResult>(QUEUE_NAME, processor, {
    connection,
    concurrency: cfg.concurrency.jobs,
  });

  worker.on("completed", (job, result) =>
    log.info({ jobId: job.id, ok: result.ok, message: result.message }, "job completed")
  );
  worker.on("failed", (job, err) => log.error({ jobId: job?.id, err: errorMessage(err) }, "job failed"));
  worker.on("error", (err) => log.error({ err: errorMessage(err) }, "worker error"));

  const shutdown = async (signal: string) => {
    log.info({ signal }, "shutting down");
    try {
      await worker.close();
      await connection.quit();
      process.exit(0);
    } catch (err) {
      log.error({ err: errorMessage(err) }, "shutdown failed");
      process.exit(1);
    }
  };
  process.once("SIGINT", (s) => void shutdown(s));
  process.once("SIGTERM", (s) => void shutdown(s));

  log.info(
    { queue: QUEUE_NAME, concurrency: cfg.concurrency.jobs, artifacts: cfg.r2 ? "r2" : "local" },
    `worker is running and listening queue: ${QUEUE_NAME}`
  );
}

main().catch((err) => {
  log.fatal({ err: errorMessage(err) }, "worker failed to start");
  process.exit(1);
});
