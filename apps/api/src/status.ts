import { z } from "zod";

import {
  STAGE_PROGRESS,
  isJobStage,
  isTerminalStage,
  sanitizeErrorMessage,
  type JobResult,
  type JobStage,
  type JobStatusView,
} from "@trackprint/shared";

import type { QueuedJob } from "./jobs";

const StageReportSchema = z.object({
  stage: z.custom<JobStage>(isJobStage),
  status: z.string(),
  percent: z.number(),
  error: z.string().optional(),
});

const JobResultSchema: z.ZodType<JobResult> = z.discriminatedUnion("ok", [
  z.object({
    ok: z.literal(true),
    status: z.literal("COMPLETED"),
    message: z.string(),
    user_id: z.string(),
    processedAt: z.string(),
    tracks_processed: z.number(),
    embeddings_generated: z.number(),
    embeddings_path: z.string(),
  }),
  z.object({
    ok: z.literal(false),
    status: z.literal("FAILED"),
    message: z.string(),
    user_id: z.string(),
    processedAt: z.string(),
  }),
]);

/**
 * Folds queue state, the last reported stage and the return value into one view.
 * The queue has the final word on terminal states; the stage report carries the
 * message while the job runs.
 */
export function toStatusView(job: QueuedJob, now: () => Date = () => new Date()): JobStatusView {
  const report = StageReportSchema.safeParse(job.progress);
  const last = report.success ? report.data : null;

  switch (job.queueState) {
    case "completed": {
      const result = JobResultSchema.safeParse(job.returnvalue);
      if (!result.success) {
        return { jobId: job.id, state: "COMPLETED", status: last?.status ?? "Completed", progress: 100 };
      }
      const r = result.data;
      return {
        jobId: job.id,
        state: r.status,
        status: r.ok ? r.message : `Failed: ${r.message}`,
        progress: 100,
        result: r,
      };
    }

    case "failed": {
      const message = last?.error ?? sanitizeErrorMessage(job.failedReason ?? "Job failed");
      return {
        jobId: job.id,
        state: "FAILED",
        status: `Failed: ${message}`,
        progress: STAGE_PROGRESS.FAILED,
        result: { ok: false, status: "FAILED", message, user_id: job.userId, processedAt: now().toISOString() },
      };
    }

    case "active":
      if (last && !isTerminalStage(last.stage)) {
        return { jobId: job.id, state: last.stage, status: last.status, progress: last.percent };
      }
      return { jobId: job.id, state: "STARTED", status: "Job started", progress: STAGE_PROGRESS.STARTED };

    default:
      return { jobId: job.id, state: "PENDING", status: "Queued", progress: STAGE_PROGRESS.PENDING };
  }
}
