import path from "node:path";

import {
  AppError,
  componentLogger,
  errorMessage,
  isAppError,
  sanitizeErrorMessage,
  type JobResult,
  type JobResultFail,
  type LibraryJobPayload,
  type Logger,
  type TrackDescriptor,
} from "@trackprint/shared";
import type { VectorIndexClient } from "@trackprint/vector-index";

import { throwIfAborted } from "../lib/abort";
import type { CommandRunner } from "../lib/runCmd";
import { normalizeDirectory, type NormalizedClip } from "../modules/convert/convert.module";
import { hiddenStateShape, reduceHiddenStates } from "../modules/embed/reducer";
import { fetchPreviews } from "../modules/previews/previews.module";
import type {
  ArtifactEntry,
  ArtifactStore,
  Downloader,
  EmbeddingModel,
  PreviewResolver,
  ProgressReporter,
} from "../types/processing";
import { JobTracker } from "./tracker";
import { normalizeTracks, previewKey, sanitizeFilename } from "./tracks";

export type PipelineDeps = {
  dataDir: string;
  resolver: PreviewResolver;
  model: EmbeddingModel;
  index: Pick<VectorIndexClient, "storeEmbedding" | "connected">;
  artifacts: ArtifactStore;
  download?: Downloader;
  runCommand?: CommandRunner;
  ffmpegPath?: string;
  downloadConcurrency?: number;
  convertConcurrency?: number;
  layer?: number;
  reduce?: "mean" | "max";
  now?: () => Date;
  log?: Logger;
};

export type LibraryRun = {
  jobId: string;
  payload: LibraryJobPayload;
  reporter: ProgressReporter;
  signal?: AbortSignal;
};

export function userDirs(dataDir: string, userId: string) {
  const user = sanitizeFilename(userId);
  return {
    previewsDir: path.join(dataDir, "previews", user),
    wavDir: path.join(dataDir, "wav", user),
  };
}

type EmbedOutcome = {
  entries: ArtifactEntry[];
  generated: number;
};

/**
 * Model → reducer → index for every clip that belongs to this job's tracks.
 * Clip and store failures only drop their tracks; an unreachable model or a lost
 * index connection ends the job.
 */
async function embedClips(
  tracks: TrackDescriptor[],
  clips: NormalizedClip[],
  run: LibraryRun,
  deps: PipelineDeps,
  log: Logger
): Promise<EmbedOutcome> {
  const byName = new Map(clips.map((c) => [c.name, c]));
  const layer = deps.layer ?? -1;
  const reduce = deps.reduce ?? "mean";
  const out: EmbedOutcome = { entries: [], generated: 0 };

  // tracks sharing a preview share its clip and its model call
  const groups = new Map<NormalizedClip, TrackDescriptor[]>();
  for (const t of tracks) {
    const clip = byName.get(sanitizeFilename(previewKey(t)));
    if (!clip) continue;
    groups.set(clip, [...(groups.get(clip) ?? []), t]);
  }

  let modelSucceeded = false;

  for (const [clip, group] of groups) {
    throwIfAborted(run.signal);

    let vector: number[];
    let shape: [number, number, number];
    try {
      const stack = await deps.model.hiddenStates(clip.wavPath, run.signal);
      vector = reduceHiddenStates(stack, { layer, reduce });
      shape = hiddenStateShape(stack);
      modelSucceeded = true;
    } catch (err) {
      if (isAppError(err) && err.code === "EMBEDDING_MODEL_UNAVAILABLE" && !modelSucceeded) throw err;
      throwIfAborted(run.signal);
      log.warn({ clip: clip.name, err: errorMessage(err) }, "embedding failed for clip");
      continue;
    }

    for (const t of group) {
      let stored = false;
      try {
        stored = await deps.index.storeEmbedding(t.id, vector, {
          user_id: run.payload.user_id,
          name: t.name,
          artist: t.artist,
          preview_key: previewKey(t),
          job_id: run.jobId,
        });
      } catch (err) {
        log.warn({ trackId: t.id, err: errorMessage(err) }, "embedding rejected by index");
      }

      if (!stored && !deps.index.connected) {
        throw new AppError({
          code: "INDEX_CONNECTION",
          message: "Vector index unreachable while storing embeddings",
          retryable: false,
          details: { trackId: t.id },
        });
      }
      if (stored) out.generated++;

      out.entries.push({
        track_id: t.id,
        name: t.name,
        artist: t.artist,
        preview_key: previewKey(t),
        audio_path: clip.wavPath,
        layer,
        reduce,
        shape,
        stored,
        embedding: vector,
      });
    }
  }

  return out;
}

/**
 * One library job from raw payload to terminal result. Early validation failures
 * come back as `{ok: false}`; structural errors are reported as FAILED and then
 * rethrown so the queue marks the job as errored.
 */
export async function processLibrary(run: LibraryRun, deps: PipelineDeps): Promise<JobResult> {
  const { user_id } = run.payload;
  const log = (deps.log ?? componentLogger("pipeline")).child({ jobId: run.jobId, userId: user_id });
  const now = deps.now ?? (() => new Date());
  const tracker = new JobTracker(run.reporter, log);

  const failed = async (message: string): Promise<JobResultFail> => {
    await tracker.fail(message);
    return { ok: false, status: "FAILED", message, user_id, processedAt: now().toISOString() };
  };

  try {
    await tracker.advance("STARTED", "Job started");

    if (run.payload.tracks.length === 0) {
      return await failed("No tracks provided for processing");
    }

    await tracker.advance("PROCESSING", `Processing ${run.payload.tracks.length} tracks`);
    const tracks = normalizeTracks(run.payload.tracks, log);
    if (tracks.length === 0) {
      return await failed("No valid tracks found to process");
    }

    const { previewsDir, wavDir } = userDirs(deps.dataDir, user_id);

    await tracker.advance("DOWNLOADING", "Downloading previews");
    const fetched = await fetchPreviews(tracks, {
      previewsDir,
      resolver: deps.resolver,
      download: deps.download,
      concurrency: deps.downloadConcurrency,
      signal: run.signal,
      log,
    });
    throwIfAborted(run.signal);
    if (fetched.status !== "success") {
      return await failed(`Failed to download previews: ${fetched.message}`);
    }

    await tracker.advance("CONVERTING", "Converting audio");
    const normalized = await normalizeDirectory(previewsDir, wavDir, {
      runCommand: deps.runCommand,
      ffmpegPath: deps.ffmpegPath,
      concurrency: deps.convertConcurrency,
      signal: run.signal,
      log,
    });
    throwIfAborted(run.signal);

    await tracker.advance("EMBEDDING", "Generating embeddings");
    const withClips = tracks.filter((t) => fetched.files[t.id]);
    const { entries, generated } = await embedClips(withClips, normalized.clips, run, deps, log);

    const embeddings_path = await deps.artifacts.save({
      user_id,
      job_id: run.jobId,
      generatedAt: now().toISOString(),
      entries,
    });

    const submitted = run.payload.tracks.length;
    const message = `Processed ${submitted} tracks, generated ${generated} embeddings`;
    log.info({ submitted, valid: tracks.length, generated }, "library processed");
    await tracker.advance("COMPLETED", message);

    return {
      ok: true,
      status: "COMPLETED",
      message,
      user_id,
      processedAt: now().toISOString(),
      tracks_processed: submitted,
      embeddings_generated: generated,
      embeddings_path,
    };
  } catch (err) {
    log.error({ stage: tracker.stage, err: errorMessage(err), stack: err instanceof Error ? err.stack : undefined }, "job failed");
    if (!tracker.finished) {
      try {
        await tracker.fail(sanitizeErrorMessage(err));
      } catch (reportErr) {
        log.error({ err: errorMessage(reportErr) }, "could not report failure");
      }
    }
    throw err;
  }
}
