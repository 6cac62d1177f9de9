import path from "node:path";
import { z } from "zod";

import { parseEnv, r2EnvSchema, type R2Env } from "@trackprint/shared";
import { DEFAULT_COLLECTION } from "@trackprint/vector-index";

const ApiEnv = z
  .object({
    REDIS_URL: z.string().url(),
    QDRANT_URL: z.string().min(1),
    QDRANT_API_KEY: z.string().optional(),
    QDRANT_COLLECTION: z.string().default(DEFAULT_COLLECTION),
    DATA_DIR: z.string().default("./data"),
    PORT: z.coerce.number().int().min(1).max(65535).default(3000),
    HOST: z.string().default("127.0.0.1"),
  })
  .merge(r2EnvSchema.partial());

export type ApiConfig = {
  redisUrl: string;
  qdrant: { url: string; apiKey?: string; collection: string };
  artifactsDir: string;
  port: number;
  host: string;
  r2?: R2Env;
};

export function loadApiConfig(env: NodeJS.ProcessEnv = process.env): ApiConfig {
  const e = parseEnv(ApiEnv, env, "api");
  const r2 = r2EnvSchema.safeParse(e);

  return {
    redisUrl: e.REDIS_URL,
    qdrant: { url: e.QDRANT_URL, apiKey: e.QDRANT_API_KEY, collection: e.QDRANT_COLLECTION },
    artifactsDir: path.resolve(e.DATA_DIR, "artifacts"),
    port: e.PORT,
    host: e.HOST,
    r2: r2.success ? r2.data : undefined,
  };
}
