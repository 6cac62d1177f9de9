import {
  AppError,
  STAGE_PROGRESS,
  isTerminalStage,
  type JobStage,
  type Logger,
  type StageReport,
} from "@trackprint/shared";

import type { ProgressReporter } from "../types/processing";

const ORDER: JobStage[] = ["PENDING", "STARTED", "PROCESSING", "DOWNLOADING", "CONVERTING", "EMBEDDING", "COMPLETED"];

export function canTransition(from: JobStage, to: JobStage) {
  if (isTerminalStage(from)) return false;
  if (to === "FAILED") return true;
  return ORDER.indexOf(to) > ORDER.indexOf(from);
}

/** forward-only stage machine; every move is reported with its fixed percentage */
export class JobTracker {
  private current: JobStage = "PENDING";
  private last: StageReport = { stage: "PENDING", status: "Queued", percent: STAGE_PROGRESS.PENDING };

  constructor(
    private readonly reporter: ProgressReporter,
    private readonly log?: Logger
  ) {}

  get stage(): JobStage {
    return this.current;
  }

  get snapshot(): StageReport {
    return this.last;
  }

  get finished() {
    return isTerminalStage(this.current);
  }

  async advance(stage: Exclude<JobStage, "FAILED">, status: string): Promise<void> {
    await this.move({ stage, status, percent: STAGE_PROGRESS[stage] });
  }

  async fail(message: string): Promise<void> {
    await this.move({ stage: "FAILED", status: "Failed", percent: STAGE_PROGRESS.FAILED, error: message });
  }

  private async move(update: StageReport) {
    if (!canTransition(this.current, update.stage)) {
      throw new AppError({
        code: "PROCESSING_FAILED",
        message: `Illegal stage transition ${this.current} -> ${update.stage}`,
        retryable: false,
      });
    }
    this.log?.info({ from: this.current, to: update.stage, percent: update.percent }, update.status);
    this.current = update.stage;
    this.last = update;
    await this.reporter.report(update);
  }
}
