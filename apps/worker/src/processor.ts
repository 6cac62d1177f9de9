import type { Job } from "bullmq";

import type { JobResult, LibraryJobPayload, Logger } from "@trackprint/shared";

import { withTimeLimit, type TimeLimitOptions } from "./lib/timeLimit";
import { processLibrary, type PipelineDeps } from "./pipeline/orchestrator";
import type { ProgressReporter } from "./types/processing";

/** the part of a BullMQ job the pipeline needs */
export type QueueJob = Pick<Job<LibraryJobPayload, JobResult>, "data" | "updateProgress"> & { id?: string };

/** progress goes to the queue as `{stage, status, percent}` so the api can read it back */
export function jobReporter(job: QueueJob): ProgressReporter {
  return {
    report: async (update) => {
      await job.updateProgress(update);
    },
  };
}

export function createProcessor(deps: PipelineDeps, opts: TimeLimitOptions & { log: Logger }) {
  return async (job: QueueJob): Promise<JobResult> => {
    const jobId = job.id ?? "unknown";
    const log = opts.log.child({ jobId });
    log.info({ userId: job.data.user_id, tracks: job.data.tracks.length }, "job start");

    return withTimeLimit(
      (signal) => processLibrary({ jobId, payload: job.data, reporter: jobReporter(job), signal }, { ...deps, log }),
      { softMs: opts.softMs, hardMs: opts.hardMs, log }
    );
  };
}
