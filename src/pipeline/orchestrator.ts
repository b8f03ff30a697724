import type { EventStore } from "../store/eventStore.js";
import type { JobStore } from "../store/jobStore.js";
import type { EnhancementPatch, JobPatch, VoiceProcessingJob } from "../types.js";
import {
  PipelineFailure,
  StorageFailure,
  classifyError,
  errorMessage,
  type FailureKind,
} from "../utils/errors.js";
import { toZonedLocal, type LocalDateTime } from "../utils/localTime.js";
import type { Logger } from "../utils/logger.js";
import { mergeEnhancement, type EntityEnhancer } from "./enhance.js";
import type { SemanticExtractor } from "./extract.js";
import { materializeEvent } from "./materialize.js";
import type { Transcriber } from "./transcribe.js";
import { validateCandidate } from "./validate.js";

export type PipelineOutcome = "skipped" | "completed" | "failed" | "abandoned";

export interface PipelineDeps {
  jobs: JobStore;
  events: EventStore;
  transcriber: Transcriber;
  extractor: SemanticExtractor;
  enhancer: EntityEnhancer;
  logger: Logger;
  timeZone: string; // the zone event wall-clock times are written in
  reminderMinutes: number;
  clock?: () => Date;
}

type StageName = "transcription" | "extraction" | "validation" | "materialization" | "persistence";

/**
 * Runs one voice job from `pending` to a terminal status. Safe to call more
 * than once for the same id: only the call that wins the pending → processing
 * transition does any work.
 */
export class VoicePipeline {
  private readonly log: Logger;
  private readonly clock: () => Date;

  constructor(private readonly deps: PipelineDeps) {
    this.log = deps.logger.child({ component: "pipeline" });
    this.clock = deps.clock ?? (() => new Date());
  }

  /** Never rejects; the outcome says what happened to the job. */
  async run(jobId: string): Promise<PipelineOutcome> {
    const log = this.log.child({ jobId });

    let job: VoiceProcessingJob;
    try {
      const claimed = await this.claim(jobId, log);
      if (!claimed) return "skipped";
      job = claimed;
    } catch (err) {
      // Nothing was claimed, so there is nothing to mark failed
      log.error({ err }, "could not claim job");
      return "abandoned";
    }

    try {
      return await this.process(job, log);
    } catch (err) {
      const failure = classifyError(err, "StorageFailure");
      log.warn({ kind: failure.kind, err: failure.message }, "job failed");
      return this.finish(job.id, failedPatch(failure), "failed", log);
    }
  }

  private async claim(jobId: string, log: Logger): Promise<VoiceProcessingJob | null> {
    const existing = await this.deps.jobs.get(jobId);
    if (!existing) {
      log.warn("job not found");
      return null;
    }
    if (existing.status !== "pending") {
      log.info({ status: existing.status }, "job already picked up, skipping");
      return null;
    }

    const res = await this.deps.jobs.conditionalUpdate(jobId, "pending", {
      status: "processing",
      processingStartedAt: this.clock().toISOString(),
    });
    if (!res.ok) {
      log.info({ reason: res.reason }, "lost the race for job, skipping");
      return null;
    }
    log.info("job processing started");
    return res.job;
  }

  private async process(job: VoiceProcessingJob, log: Logger): Promise<PipelineOutcome> {
    const { transcriber, extractor, events } = this.deps;

    const transcript = await this.stage("transcription", "TranscriptionFailure", log, () =>
      transcriber.transcribe(job.audioUrl)
    );

    if (!(await this.saveProgress(job.id, { transcription: transcript }, log))) return "abandoned";

    const referenceNow = toZonedLocal(this.clock(), this.deps.timeZone);
    const extracted = await this.stage("extraction", "ExtractionFailure", log, () =>
      extractor.extract({ transcript, referenceNow, labels: job.labels })
    );

    const patch = await this.enhance(transcript, referenceNow, log);
    const { candidate, spanCheck } = mergeEnhancement(extracted, patch);
    if (spanCheck === "disputed") {
      log.warn(
        { startTime: candidate.startTime, endTime: candidate.endTime, ruleSpan: patch?.span },
        "extracted time span disagrees with the transcript rules"
      );
    }

    // Kept on the job whatever validation says. The write is also the last
    // ownership check before the event exists.
    if (!(await this.saveProgress(job.id, { result: candidate, spanCheck }, log))) return "abandoned";

    const event = await this.stage("validation", "ValidationFailure", log, async () =>
      validateCandidate(candidate, job.labels)
    );

    const eventId = await this.stage("materialization", "StorageFailure", log, () =>
      materializeEvent(
        events,
        event,
        {
          jobId: job.id,
          userId: job.userId,
          calendarId: job.calendarId,
          audioUrl: job.audioUrl,
          transcript,
        },
        { reminderMinutes: this.deps.reminderMinutes, timeZone: this.deps.timeZone, now: this.clock() }
      )
    );
    log.info({ eventId }, "event created");

    return this.finish(
      job.id,
      { status: "completed", eventId, result: event, transcription: transcript, spanCheck },
      "completed",
      log
    );
  }

  /** Writes a patch while the job stays in `processing`; false once it has left. */
  private async saveProgress(jobId: string, patch: JobPatch, log: Logger): Promise<boolean> {
    const res = await this.stage("persistence", "StorageFailure", log, () =>
      this.deps.jobs.conditionalUpdate(jobId, "processing", patch)
    );
    if (!res.ok) {
      log.warn({ reason: res.reason }, "job left processing mid-run, stopping");
      return false;
    }
    return true;
  }

  private async stage<T>(
    name: StageName,
    fallback: FailureKind,
    log: Logger,
    fn: () => Promise<T>
  ): Promise<T> {
    const started = Date.now();
    try {
      const value = await fn();
      log.debug({ stage: name, durationMs: Date.now() - started }, "stage finished");
      return value;
    } catch (err) {
      const failure = classifyError(err, fallback);
      log.debug({ stage: name, kind: failure.kind, durationMs: Date.now() - started }, "stage failed");
      throw failure;
    }
  }

  // Enhancement is advisory: any error leaves the extraction output as is
  private async enhance(
    transcript: string,
    referenceNow: LocalDateTime,
    log: Logger
  ): Promise<EnhancementPatch | null> {
    try {
      return await this.deps.enhancer.enhance({ transcript, referenceNow });
    } catch (err) {
      log.warn({ err }, "entity enhancement failed, keeping extraction output");
      return null;
    }
  }

  /**
   * Terminal write from `processing`. A write that throws gets one more try
   * as a StorageFailure; a job that is no longer in `processing` belongs to
   * someone else and is left alone.
   */
  private async finish(
    jobId: string,
    patch: JobPatch,
    outcome: PipelineOutcome,
    log: Logger
  ): Promise<PipelineOutcome> {
    let writeError: unknown;
    try {
      const res = await this.deps.jobs.conditionalUpdate(jobId, "processing", patch);
      if (res.ok) {
        log.info({ status: patch.status }, "job finished");
        return outcome;
      }
      log.error({ reason: res.reason, status: patch.status }, "job left processing before the terminal write");
      return "abandoned";
    } catch (err) {
      writeError = err;
      log.error({ err, status: patch.status }, "terminal job write failed");
    }

    const failure = new StorageFailure(`terminal job write failed: ${errorMessage(writeError)}`, {
      cause: writeError,
    });
    try {
      const res = await this.deps.jobs.conditionalUpdate(jobId, "processing", failedPatch(failure));
      if (res.ok) return "failed";
      log.error({ reason: res.reason }, "could not record storage failure");
    } catch (err) {
      log.error({ err }, "could not record storage failure");
    }
    return "abandoned";
  }
}

function failedPatch(failure: PipelineFailure): JobPatch {
  return { status: "failed", errorKind: failure.kind, errorMessage: failure.toJobError() };
}
