import type { Job } from "bullmq";
import type { PipelineOutcome, VoicePipeline } from "../pipeline/orchestrator.js";
import type { VoiceTriggerPayload } from "./queue.js";

/**
 * bullmq processor. The pipeline records failures on the job itself, so the
 * queue job always completes, with the outcome as its return value.
 */
export function createProcessor(pipeline: Pick<VoicePipeline, "run">) {
  return async function processVoiceJob(job: Job<VoiceTriggerPayload>): Promise<PipelineOutcome> {
    return pipeline.run(job.data.jobId);
  };
}
