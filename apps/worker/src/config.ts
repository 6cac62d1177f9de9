import path from "node:path";
import { z } from "zod";

import { envBool, parseEnv, r2EnvSchema, type R2Env } from "@trackprint/shared";
import { DEFAULT_COLLECTION } from "@trackprint/vector-index";

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const WorkerEnv = z
  .object({
    REDIS_URL: z.string().url(),
    QDRANT_URL: z.string().min(1),
    QDRANT_API_KEY: z.string().optional(),
    QDRANT_COLLECTION: z.string().default(DEFAULT_COLLECTION),
    QDRANT_RECREATE_COLLECTION: envBool,
    EMBEDDING_MODEL_URL: z.string().url(),
    EMBEDDING_LAYER: z.coerce.number().int().default(-1),
    EMBEDDING_REDUCE: z.enum(["mean", "max"]).default("mean"),
    PREVIEW_RESOLVER_CMD: z.string().optional(),
    FFMPEG_PATH: z.string().default("ffmpeg"),
    DATA_DIR: z.string().default("./data"),
    WORKER_CONCURRENCY: positiveInt(1),
    DOWNLOAD_CONCURRENCY: positiveInt(4),
    CONVERT_CONCURRENCY: positiveInt(2),
  })
  .merge(r2EnvSchema.partial());

export type WorkerConfig = {
  redisUrl: string;
  qdrant: { url: string; apiKey?: string; collection: string; recreate: boolean };
  model: { url: string; layer: number; reduce: "mean" | "max" };
  resolverCommand?: string;
  ffmpegPath: string;
  dataDir: string;
  concurrency: { jobs: number; downloads: number; conversions: number };
  /** unset: artifacts are written under `dataDir/artifacts` */
  r2?: R2Env;
};

function r2From(env: Partial<R2Env>): R2Env | undefined {
  const parsed = r2EnvSchema.safeParse(env);
  if (parsed.success) return parsed.data;

  const given = Object.values(env).some((v) => v !== undefined);
  if (given) {
    const missing = parsed.error.issues.map((i) => i.path.join(".")).join(", ");
    throw new Error(`Invalid worker environment:\n  R2 storage is partially configured, missing ${missing}`);
  }
  return undefined;
}

export function loadWorkerConfig(env: NodeJS.ProcessEnv = process.env): WorkerConfig {
  const e = parseEnv(WorkerEnv, env, "worker");

  return {
    redisUrl: e.REDIS_URL,
    qdrant: {
      url: e.QDRANT_URL,
      apiKey: e.QDRANT_API_KEY,
      collection: e.QDRANT_COLLECTION,
      recreate: e.QDRANT_RECREATE_COLLECTION,
    },
    model: { url: e.EMBEDDING_MODEL_URL, layer: e.EMBEDDING_LAYER, reduce: e.EMBEDDING_REDUCE },
    resolverCommand: e.PREVIEW_RESOLVER_CMD,
    ffmpegPath: e.FFMPEG_PATH,
    dataDir: path.resolve(e.DATA_DIR),
    concurrency: {
      jobs: e.WORKER_CONCURRENCY,
      downloads: e.DOWNLOAD_CONCURRENCY,
      conversions: e.CONVERT_CONCURRENCY,
    },
    r2: r2From({
      R2_ACCOUNT_ID: e.R2_ACCOUNT_ID,
      R2_ACCESS_KEY_ID: e.R2_ACCESS_KEY_ID,
      R2_SECRET_ACCESS_KEY: e.R2_SECRET_ACCESS_KEY,
      R2_BUCKET: e.R2_BUCKET,
    }),
  };
}
