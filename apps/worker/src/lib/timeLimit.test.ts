import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { componentLogger } from "@trackprint/shared";

import { withTimeLimit } from "./timeLimit";

function spiedLog() {
  const log = componentLogger("time-limit-test");
  return { log, warn: vi.spyOn(log, "warn") };
}

beforeEach(() => {
  vi.useFakeTimers();
});

afterEach(() => {
  vi.useRealTimers();
});

describe("withTimeLimit", () => {
  it("returns the result when the work finishes in time", async () => {
    await expect(withTimeLimit(async () => "done", { softMs: 100, hardMs: 200 })).resolves.toBe("done");
  });

  it("warns at the soft limit and keeps running", async () => {
    const { log, warn } = spiedLog();
    const work = withTimeLimit(
      () => new Promise<string>((resolve) => setTimeout(() => resolve("late but fine"), 90_000)),
      { softMs: 60_000, hardMs: 180_000, log }
    );

    await vi.advanceTimersByTimeAsync(60_000);
    expect(warn).toHaveBeenCalledWith({ softMs: 60_000, hardMs: 180_000 }, "job running for over 1 minutes");

    await vi.advanceTimersByTimeAsync(30_000);
    await expect(work).resolves.toBe("late but fine");
  });

  it("aborts the signal and rejects with TIMED_OUT at the hard limit", async () => {
    let seen: AbortSignal | undefined;
    const work = withTimeLimit(
      (signal) => {
        seen = signal;
        return new Promise<string>(() => undefined);
      },
      { softMs: 60_000, hardMs: 120_000 }
    );
    const outcome = expect(work).rejects.toMatchObject({ code: "TIMED_OUT", message: "Job exceeded 2 minutes" });

    await vi.advanceTimersByTimeAsync(120_000);

    await outcome;
    expect(seen?.aborted).toBe(true);
  });
});
