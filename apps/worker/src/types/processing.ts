import type { StageReport } from "@trackprint/shared";

export type PreviewQuery = {
  name: string;
  artist: string;
};

/** `"name - artist"` → playable preview url, or null when none was found */
export type PreviewUrlMap = Record<string, string | null>;

export interface PreviewResolver {
  resolve(queries: PreviewQuery[], signal?: AbortSignal): Promise<PreviewUrlMap>;
}

export type DownloadOptions = {
  timeoutMs: number;
  signal?: AbortSignal;
};

/** streams `url` into `destPath`; throws on any failure */
export type Downloader = (url: string, destPath: string, opts: DownloadOptions) => Promise<void>;

/** layers × time steps × feature width */
export type HiddenStates = number[][][];

export interface EmbeddingModel {
  /** sample rate the model was trained on; clips must already be at this rate */
  readonly sampleRate: number;
  hiddenStates(wavPath: string, signal?: AbortSignal): Promise<HiddenStates>;
}

export type ReducePolicy = "mean" | "max" | "none";

export type ArtifactEntry = {
  track_id: string;
  name: string;
  artist: string;
  preview_key: string;
  audio_path: string;
  layer: number;
  reduce: Exclude<ReducePolicy, "none">;
  /** [layers, time steps, width] of the raw model output */
  shape: [number, number, number];
  stored: boolean;
  embedding: number[];
};

export type EmbeddingsArtifact = {
  user_id: string;
  job_id: string;
  generatedAt: string;
  entries: ArtifactEntry[];
};

export interface ArtifactStore {
  /** persists the artifact and returns where it went */
  save(artifact: EmbeddingsArtifact): Promise<string>;
}

export interface ProgressReporter {
  report(update: StageReport): Promise<void>;
}
