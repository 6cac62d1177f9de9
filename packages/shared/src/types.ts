export const QUEUE_NAME = "library-jobs";
export const PROCESS_LIBRARY_JOB = "process-library";

export type JobStage =
  | "PENDING"
  | "STARTED"
  | "PROCESSING"
  | "DOWNLOADING"
  | "CONVERTING"
  | "EMBEDDING"
  | "COMPLETED"
  | "FAILED";

// static: does not move inside a stage
export const STAGE_PROGRESS: Record<JobStage, number> = {
  PENDING: 0,
  STARTED: 5,
  PROCESSING: 20,
  DOWNLOADING: 40,
  CONVERTING: 60,
  EMBEDDING: 80,
  COMPLETED: 100,
  FAILED: 100,
};

export function progressFor(stage: string): number {
  return isJobStage(stage) ? STAGE_PROGRESS[stage] : 0;
}

export function isJobStage(x: unknown): x is JobStage {
  return typeof x === "string" && Object.prototype.hasOwnProperty.call(STAGE_PROGRESS, x);
}

export function isTerminalStage(stage: JobStage) {
  return stage === "COMPLETED" || stage === "FAILED";
}

export type TrackDescriptor = {
  id: string;
  name: string;
  artist: string;
  duration_ms: number;
  preview_url?: string;
};

/** what the API enqueues; tracks stay loosely typed until the worker normalizes them */
export type LibraryJobPayload = {
  user_id: string;
  tracks: unknown[];
  submittedAt: string;
};

export type StageReport = {
  stage: JobStage;
  status: string;
  percent: number;
  error?: string;
};

export type JobResultOk = {
  ok: true;
  status: "COMPLETED";
  message: string;
  user_id: string;
  processedAt: string;
  tracks_processed: number;
  embeddings_generated: number;
  embeddings_path: string;
};

export type JobResultFail = {
  ok: false;
  status: "FAILED";
  message: string;
  user_id: string;
  processedAt: string;
};

export type JobResult = JobResultOk | JobResultFail;

export type JobStatusView = {
  jobId: string;
  state: JobStage;
  status: string;
  progress: number;
  result?: JobResult;
};

export type Scalar = string | number | boolean | null;

export type EmbeddingMetadata = Record<string, Scalar>;
