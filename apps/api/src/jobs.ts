import { randomUUID } from "node:crypto";
import type { Queue } from "bullmq";

import { PROCESS_LIBRARY_JOB, type JobResult, type LibraryJobPayload } from "@trackprint/shared";

export type QueueState =
  | "waiting"
  | "waiting-children"
  | "prioritized"
  | "delayed"
  | "active"
  | "completed"
  | "failed"
  | "unknown";

/** what a status query needs to know about a queued job */
export type QueuedJob = {
  id: string;
  userId: string;
  queueState: QueueState;
  progress: unknown;
  returnvalue: unknown;
  failedReason?: string;
};

export interface JobStore {
  /** returns the job token handed back to the caller */
  enqueue(payload: LibraryJobPayload): Promise<string>;
  get(id: string): Promise<QueuedJob | null>;
  remove(id: string): Promise<void>;
}

const KNOWN_STATES: QueueState[] = [
  "waiting",
  "waiting-children",
  "prioritized",
  "delayed",
  "active",
  "completed",
  "failed",
];

function toQueueState(state: string): QueueState {
  return KNOWN_STATES.find((s) => s === state) ?? "unknown";
}

export class BullJobStore implements JobStore {
  constructor(private readonly queue: Queue<LibraryJobPayload, JobResult>) {}

  async enqueue(payload: LibraryJobPayload): Promise<string> {
    const job = await this.queue.add(PROCESS_LIBRARY_JOB, payload, {
      jobId: randomUUID(),
      // the pipeline is not idempotent across partial runs; a failed job is reported, not replayed
      attempts: 1,
      removeOnComplete: false,
      removeOnFail: false,
    });
    return String(job.id);
  }

  async get(id: string): Promise<QueuedJob | null> {
    const job = await this.queue.getJob(id);
    if (!job) return null;

    const state = await job.getState();
    return {
      id: String(job.id),
      userId: job.data.user_id,
      queueState: toQueueState(state),
      progress: job.progress,
      returnvalue: job.returnvalue,
      failedReason: job.failedReason || undefined,
    };
  }

  async remove(id: string): Promise<void> {
    await this.queue.remove(id);
  }
}
