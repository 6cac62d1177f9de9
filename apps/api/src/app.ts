import Fastify from "fastify";
import cors from "@fastify/cors";
import { z, ZodError } from "zod";

import { errorMessage, isAppError, isTerminalStage, sanitizeErrorMessage, type Logger } from "@trackprint/shared";
import type { VectorIndexClient } from "@trackprint/vector-index";

import { DOWNLOAD_URL_TTL_SEC, type ArtifactLinks } from "./artifacts";
import type { JobStore } from "./jobs";
import { toStatusView } from "./status";

export type AppDeps = {
  jobs: JobStore;
  index: Pick<VectorIndexClient, "connected" | "findSimilar" | "getEmbedding" | "hasEmbedding" | "deleteEmbedding">;
  artifacts: ArtifactLinks;
  logger?: Logger;
};

const CreateJobBody = z.object({
  user_id: z.string().trim().min(1),
  tracks: z.array(z.unknown()),
});

const JobParams = z.object({ id: z.string().min(1) });
const UserParams = z.object({ userId: z.string().min(1) });
const TrackParams = z.object({ trackId: z.string().min(1) });

const SimilarBody = z
  .object({
    track_id: z.string().min(1).optional(),
    vector: z.array(z.number()).optional(),
    limit: z.number().int().min(1).max(100).default(10),
    min_score: z.number().min(-1).max(1).default(0.7),
  })
  .refine((b) => (b.track_id === undefined) !== (b.vector === undefined), {
    message: "give exactly one of track_id or vector",
  });

const EmbeddingQuery = z.object({
  with_vector: z
    .enum(["true", "false"])
    .optional()
    .transform((v) => v === "true"),
});

export async function buildApp(deps: AppDeps) {
  const { jobs, index, artifacts } = deps;

  const app = Fastify({ logger: deps.logger ?? false });
  await app.register(cors, { origin: true });

  app.setErrorHandler((err, req, reply) => {
    if (err instanceof ZodError) {
      return reply.code(400).send({
        error: "Invalid request",
        issues: err.issues.map((i) => ({ path: i.path.join("."), message: i.message })),
      });
    }
    if (isAppError(err) && err.code === "BAD_INPUT") {
      return reply.code(400).send({ error: err.message });
    }
    if (typeof err.statusCode === "number" && err.statusCode < 500) {
      return reply.code(err.statusCode).send({ error: err.message });
    }
    req.log.error({ err: errorMessage(err) }, "request failed");
    return reply.code(500).send({ error: sanitizeErrorMessage(err) });
  });

  app.get("/health", async () => ({
    status: "ok",
    index: index.connected ? "connected" : "disconnected",
  }));

  // =========================================
  // Jobs
  // =========================================

  app.post("/jobs", async (req, reply) => {
    const body = CreateJobBody.parse(req.body);
    const jobId = await jobs.enqueue({
      user_id: body.user_id,
      tracks: body.tracks,
      submittedAt: new Date().toISOString(),
    });
    req.log.info({ jobId, userId: body.user_id, tracks: body.tracks.length }, "job queued");
    return reply.code(202).send({ jobId });
  });

  app.get("/jobs/:id", async (req, reply) => {
    const { id } = JobParams.parse(req.params);
    const job = await jobs.get(id);
    if (!job) return reply.code(404).send({ error: "Job not found" });

    const view = toStatusView(job);

    // the terminal state has been seen; nothing is left to poll for
    if (isTerminalStage(view.state)) {
      try {
        await jobs.remove(id);
      } catch (err) {
        req.log.warn({ jobId: id, err: errorMessage(err) }, "could not release finished job");
      }
    }

    return reply.send(view);
  });

  // =========================================
  // Embeddings
  // =========================================

  app.get("/users/:userId/embeddings/download", async (req, reply) => {
    const { userId } = UserParams.parse(req.params);
    const url = await artifacts.downloadUrl(userId);
    if (!url) return reply.code(404).send({ error: "Embeddings not found", userId });
    return reply.send({ userId, url, expiresInSec: DOWNLOAD_URL_TTL_SEC });
  });

  app.post("/tracks/similar", async (req, reply) => {
    const body = SimilarBody.parse(req.body);

    let vector = body.vector;
    if (body.track_id !== undefined) {
      const stored = await index.getEmbedding(body.track_id);
      if (!stored) return reply.code(404).send({ error: "Embedding not found", trackId: body.track_id });
      vector = stored;
    }
    if (!vector) return reply.code(400).send({ error: "give exactly one of track_id or vector" });

    // a track is always most similar to itself; ask for one more and drop it
    const limit = body.track_id !== undefined ? body.limit + 1 : body.limit;
    const hits = await index.findSimilar(vector, limit, body.min_score);
    const results = hits.filter((h) => h.track_id !== body.track_id).slice(0, body.limit);

    return reply.send({ results });
  });

  app.get("/tracks/:trackId/embedding", async (req, reply) => {
    const { trackId } = TrackParams.parse(req.params);
    const { with_vector } = EmbeddingQuery.parse(req.query);

    if (with_vector) {
      const vector = await index.getEmbedding(trackId);
      return reply.send(vector ? { trackId, exists: true, vector } : { trackId, exists: false });
    }
    return reply.send({ trackId, exists: await index.hasEmbedding(trackId) });
  });

  app.delete("/tracks/:trackId/embedding", async (req, reply) => {
    const { trackId } = TrackParams.parse(req.params);
    const deleted = await index.deleteEmbedding(trackId);
    return reply.send({ trackId, deleted });
  });

  return app;
}
