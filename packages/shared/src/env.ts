import { z } from "zod";

/** "true"/"1"/"yes" → true, anything else (or unset) → false */
export const envBool = z
  .string()
  .optional()
  .transform((v) => ["1", "true", "yes"].includes(String(v ?? "").trim().toLowerCase()));

/** empty strings count as unset so `.env` templates with blank values keep defaults */
export function blankToUndefined(env: NodeJS.ProcessEnv): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [k, v] of Object.entries(env)) {
    const t = v?.trim();
    if (t) out[k] = t;
  }
  return out;
}

export function parseEnv<S extends z.ZodTypeAny>(schema: S, env: NodeJS.ProcessEnv, app: string): z.output<S> {
  const parsed = schema.safeParse(blankToUndefined(env));
  if (!parsed.success) {
    const lines = parsed.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`);
    throw new Error(`Invalid ${app} environment:\n  ${lines.join("\n  ")}`);
  }
  return parsed.data;
}

/** R2 (S3-compatible) credentials, shared by the worker (writes artifacts) and the api (signs downloads) */
export const r2EnvSchema = z.object({
  R2_ACCOUNT_ID: z.string().min(1),
  R2_ACCESS_KEY_ID: z.string().min(1),
  R2_SECRET_ACCESS_KEY: z.string().min(1),
  R2_BUCKET: z.string().min(1),
});

export type R2Env = z.infer<typeof r2EnvSchema>;

export function r2Endpoint(accountId: string) {
  return `https://${accountId}.r2.cloudflarestorage.com`;
}

export function artifactObjectKey(userId: string) {
  return `embeddings/${encodeURIComponent(userId)}.json`;
}
