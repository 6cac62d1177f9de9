import fsp from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { AppError, type LibraryJobPayload } from "@trackprint/shared";
import { MemoryTransport, VectorIndexClient } from "@trackprint/vector-index";

import { EMBEDDING_WIDTH } from "../modules/embed/reducer";
import { StaticPreviewResolver } from "../modules/previews/resolver";
import { fakeDownloader, fakeFfmpeg, progressRecorder } from "../testing/fakes";
import type { EmbeddingModel, EmbeddingsArtifact, HiddenStates, PreviewResolver } from "../types/processing";
import { LocalArtifactStore } from "./artifacts";
import { processLibrary, type PipelineDeps } from "./orchestrator";

const TRACKS: unknown[] = [
  { id: "t1", name: "Alpha", artists: [{ name: "Band A" }], preview_url: "https://cdn.test/alpha.mp3" },
  { track: { id: "t2", name: "Beta", artists: [{ name: "Band B" }], preview_url: "https://cdn.test/beta.mp3" } },
  { id: "t3", name: "Gamma", artist: "Band C" },
];

const URLS = { "Gamma - Band C": "https://cdn.test/gamma.mp3" };

function stack(value: number): HiddenStates {
  return Array.from({ length: 2 }, () => Array.from({ length: 3 }, () => new Array<number>(EMBEDDING_WIDTH).fill(value)));
}

let dataDir: string;

beforeEach(async () => {
  dataDir = await fsp.mkdtemp(path.join(os.tmpdir(), "trackprint-pipeline-"));
});

afterEach(async () => {
  await fsp.rm(dataDir, { recursive: true, force: true });
});

async function setup(overrides: Partial<PipelineDeps> = {}) {
  const index = new VectorIndexClient({
    createTransport: () => new MemoryTransport(),
    retry: { maxAttempts: 3, baseDelayMs: 1 },
    sleep: async () => undefined,
  });
  await index.connect();
  await index.ensureCollection();

  const hiddenStates = vi.fn<EmbeddingModel["hiddenStates"]>(async () => stack(0.5));
  const deps: PipelineDeps = {
    dataDir,
    resolver: new StaticPreviewResolver(URLS),
    model: { sampleRate: 24000, hiddenStates },
    index,
    artifacts: new LocalArtifactStore(path.join(dataDir, "artifacts")),
    download: fakeDownloader(),
    runCommand: fakeFfmpeg(),
    now: () => new Date("2026-03-01T12:00:00.000Z"),
    ...overrides,
  };
  return { deps, index, hiddenStates };
}

function run(tracks: unknown[], signal?: AbortSignal) {
  const payload: LibraryJobPayload = { user_id: "user-1", tracks, submittedAt: "2026-03-01T11:59:00.000Z" };
  return { jobId: "job-1", payload, reporter: progressRecorder(), signal };
}

describe("processLibrary", () => {
  it("fails an empty track list without touching any stage", async () => {
    const resolver = new StaticPreviewResolver();
    const resolve = vi.spyOn(resolver, "resolve");
    const download = fakeDownloader();
    const { deps, hiddenStates } = await setup({ resolver, download });
    const job = run([]);

    const result = await processLibrary(job, deps);

    expect(result).toEqual({
      ok: false,
      status: "FAILED",
      message: "No tracks provided for processing",
      user_id: "user-1",
      processedAt: "2026-03-01T12:00:00.000Z",
    });
    expect(job.reporter.reports.map((r) => r.stage)).toEqual(["STARTED", "FAILED"]);
    expect(resolve).not.toHaveBeenCalled();
    expect(download).not.toHaveBeenCalled();
    expect(hiddenStates).not.toHaveBeenCalled();
  });

  it("fails when no record survives normalization", async () => {
    const { deps } = await setup();
    const job = run([42, { name: "no id here" }]);

    const result = await processLibrary(job, deps);

    expect(result).toMatchObject({ ok: false, message: "No valid tracks found to process" });
    expect(job.reporter.reports.at(-1)).toEqual({
      stage: "FAILED",
      status: "Failed",
      percent: 100,
      error: "No valid tracks found to process",
    });
  });

  it("takes every track through download, conversion, embedding and storage", async () => {
    const { deps, index, hiddenStates } = await setup();
    const job = run(TRACKS);

    const result = await processLibrary(job, deps);

    const artifactPath = path.join(dataDir, "artifacts", "embeddings", "user-1.json");
    expect(result).toEqual({
      ok: true,
      status: "COMPLETED",
      message: "Processed 3 tracks, generated 3 embeddings",
      user_id: "user-1",
      processedAt: "2026-03-01T12:00:00.000Z",
      tracks_processed: 3,
      embeddings_generated: 3,
      embeddings_path: artifactPath,
    });
    expect(job.reporter.reports.map((r) => [r.stage, r.percent])).toEqual([
      ["STARTED", 5],
      ["PROCESSING", 20],
      ["DOWNLOADING", 40],
      ["CONVERTING", 60],
      ["EMBEDDING", 80],
      ["COMPLETED", 100],
    ]);
    expect(hiddenStates).toHaveBeenCalledTimes(3);
    expect(hiddenStates.mock.calls[0]?.[0]).toBe(path.join(dataDir, "wav", "user-1", "Alpha - Band A.wav"));

    for (const id of ["t1", "t2", "t3"]) {
      expect(await index.hasEmbedding(id)).toBe(true);
    }

    const artifact: EmbeddingsArtifact = JSON.parse(await fsp.readFile(artifactPath, "utf8"));
    expect(artifact.job_id).toBe("job-1");
    expect(artifact.entries.map((e) => [e.track_id, e.preview_key, e.stored])).toEqual([
      ["t1", "Alpha - Band A", true],
      ["t2", "Beta - Band B", true],
      ["t3", "Gamma - Band C", true],
    ]);
    expect(artifact.entries[0]?.shape).toEqual([2, 3, EMBEDDING_WIDTH]);
    expect(artifact.entries[0]?.embedding).toHaveLength(EMBEDDING_WIDTH);
  });

  it("drops single tracks that fail and still completes", async () => {
    const hiddenStates = vi.fn<EmbeddingModel["hiddenStates"]>(async (wavPath) => {
      if (wavPath.includes("Gamma")) {
        throw new AppError({ code: "EMBEDDING_MODEL_ERROR", message: "cannot decode", retryable: false });
      }
      return stack(1);
    });
    const { deps } = await setup({
      download: fakeDownloader({ failing: ["https://cdn.test/beta.mp3"] }),
      model: { sampleRate: 24000, hiddenStates },
    });

    const result = await processLibrary(run(TRACKS), deps);

    expect(result).toMatchObject({
      ok: true,
      status: "COMPLETED",
      tracks_processed: 3,
      embeddings_generated: 1,
    });
    expect(hiddenStates).toHaveBeenCalledTimes(2);
  });

  it("counts every submitted record, malformed ones included", async () => {
    const { deps, index } = await setup();
    const job = run([TRACKS[0], { name: "Beta", artist: "Band B", preview_url: "https://cdn.test/beta.mp3" }, "garbage"]);

    const result = await processLibrary(job, deps);

    expect(result).toMatchObject({
      ok: true,
      message: "Processed 3 tracks, generated 1 embeddings",
      tracks_processed: 3,
      embeddings_generated: 1,
    });
    expect(job.reporter.reports.at(-1)).toMatchObject({ stage: "COMPLETED", status: "Processed 3 tracks, generated 1 embeddings" });
    expect(await index.hasEmbedding("t1")).toBe(true);
  });

  it("completes with zero embeddings when no preview could be fetched", async () => {
    const { deps, hiddenStates } = await setup({ resolver: new StaticPreviewResolver() });
    const job = run([{ id: "t3", name: "Gamma", artist: "Band C" }]);

    const result = await processLibrary(job, deps);

    expect(result).toMatchObject({ ok: true, tracks_processed: 1, embeddings_generated: 0 });
    expect(hiddenStates).not.toHaveBeenCalled();
  });

  it("reports the fetcher's message when the resolver is down", async () => {
    const resolver: PreviewResolver = {
      resolve: async () => {
        throw new Error("connection refused");
      },
    };
    const { deps } = await setup({ resolver });

    const result = await processLibrary(run(TRACKS), deps);

    expect(result).toMatchObject({
      ok: false,
      status: "FAILED",
      message: "Failed to download previews: Preview resolver unavailable: connection refused",
    });
  });

  it("fails the job and rethrows when the model is unreachable", async () => {
    const hiddenStates = vi.fn<EmbeddingModel["hiddenStates"]>(async () => {
      throw new AppError({
        code: "EMBEDDING_MODEL_UNAVAILABLE",
        message: "embedding request failed after 3 attempts: fetch failed\n    at stack line",
        retryable: true,
      });
    });
    const { deps } = await setup({ model: { sampleRate: 24000, hiddenStates } });
    const job = run(TRACKS);

    await expect(processLibrary(job, deps)).rejects.toMatchObject({ code: "EMBEDDING_MODEL_UNAVAILABLE" });

    expect(hiddenStates).toHaveBeenCalledTimes(1);
    expect(job.reporter.reports.at(-1)).toEqual({
      stage: "FAILED",
      status: "Failed",
      percent: 100,
      error: "embedding request failed after 3 attempts: fetch failed",
    });
  });

  it("fails the job when the index connection is lost", async () => {
    let calls = 0;
    const index = new VectorIndexClient({
      createTransport: () => {
        calls++;
        const t = new MemoryTransport();
        if (calls > 1) {
          t.listCollections = async () => {
            throw new AppError({ code: "INDEX_CONNECTION", message: "connect ECONNREFUSED", retryable: true });
          };
        }
        t.upsert = async () => {
          throw new AppError({ code: "INDEX_CONNECTION", message: "socket hang up", retryable: true });
        };
        return t;
      },
      retry: { maxAttempts: 3, baseDelayMs: 1 },
      sleep: async () => undefined,
    });
    await index.connect();
    await index.ensureCollection();
    const { deps } = await setup({ index });
    const job = run(TRACKS);

    await expect(processLibrary(job, deps)).rejects.toThrow("Vector index unreachable while storing embeddings");
    expect(index.connected).toBe(false);
    expect(job.reporter.reports.at(-1)?.stage).toBe("FAILED");
  });

  it("stops with TIMED_OUT once the job signal fires", async () => {
    const controller = new AbortController();
    controller.abort(new AppError({ code: "TIMED_OUT", message: "Job exceeded 30 minutes", retryable: false }));
    const { deps, hiddenStates } = await setup();
    const job = run(TRACKS, controller.signal);

    await expect(processLibrary(job, deps)).rejects.toMatchObject({ code: "TIMED_OUT" });

    expect(hiddenStates).not.toHaveBeenCalled();
    expect(job.reporter.reports.at(-1)).toMatchObject({ stage: "FAILED", error: "Job exceeded 30 minutes" });
  });
});
