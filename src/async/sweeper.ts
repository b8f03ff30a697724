import type { JobStore } from "../store/jobStore.js";
import { TimeoutFailure } from "../utils/errors.js";
import type { Logger } from "../utils/logger.js";

export interface SweepOptions {
  jobs: JobStore;
  now: Date;
  staleAfterMs: number;
  logger: Logger;
}

/**
 * Fails jobs stuck in `processing` past the threshold, e.g. after a worker
 * crash. Each write is conditional on `processing`, so a job that finishes
 * meanwhile keeps its result. Returns the ids that were failed.
 */
export async function sweepStaleJobs({ jobs, now, staleAfterMs, logger }: SweepOptions): Promise<string[]> {
  const log = logger.child({ component: "sweeper" });
  const cutoff = now.getTime() - staleAfterMs;
  const failed: string[] = [];

  for (const job of await jobs.listByStatus("processing")) {
    // Jobs written without a start stamp fall back to their last update
    const startedAt = Date.parse(job.processingStartedAt ?? job.updatedAt);
    if (Number.isNaN(startedAt) || startedAt > cutoff) continue;

    const failure = new TimeoutFailure(
      `processing abandoned: no result after ${Math.round((now.getTime() - startedAt) / 1000)}s`
    );
    const res = await jobs.conditionalUpdate(job.id, "processing", {
      status: "failed",
      errorKind: failure.kind,
      errorMessage: failure.toJobError(),
    });
    if (res.ok) {
      log.warn({ jobId: job.id, startedAt: job.processingStartedAt }, "stale job failed");
      failed.push(job.id);
    }
  }

  return failed;
}

export interface SweeperHandle {
  stop(): void;
}

export function startSweeper(opts: {
  jobs: JobStore;
  staleAfterMs: number;
  intervalMs: number;
  logger: Logger;
  clock?: () => Date;
}): SweeperHandle {
  const clock = opts.clock ?? (() => new Date());
  let running = false;

  const timer = setInterval(() => {
    if (running) return;
    running = true;
    void sweepStaleJobs({ jobs: opts.jobs, now: clock(), staleAfterMs: opts.staleAfterMs, logger: opts.logger })
      .catch((err: unknown) => {
        opts.logger.error({ err }, "stale job sweep failed");
      })
      .finally(() => {
        running = false;
      });
  }, opts.intervalMs);
  timer.unref();

  return {
    stop() {
      clearInterval(timer);
    },
  };
}
