import { Queue } from "bullmq";
import type { ServiceConfig } from "../config.js";

export const VOICE_QUEUE_NAME = "voice-processing";

export interface VoiceTriggerPayload {
  jobId: string;
}

export function createVoiceQueue(cfg: ServiceConfig): Queue<VoiceTriggerPayload> {
  return new Queue<VoiceTriggerPayload>(VOICE_QUEUE_NAME, {
    connection: {
      host: cfg.redisHost,
      port: cfg.redisPort,
    },
    defaultJobOptions: {
      // Failed voice jobs are terminal; the pipeline never retries
      attempts: 1,
      removeOnComplete: { count: 1000 },
      removeOnFail: { count: 5000 },
    },
  });
}

/** Hands a job id to whatever runs the pipeline. */
export interface JobTrigger {
  enqueue(jobId: string): Promise<void>;
}

export function createQueueTrigger(queue: Queue<VoiceTriggerPayload>): JobTrigger {
  return {
    async enqueue(jobId: string): Promise<void> {
      // The queue job id is the voice job id, so a duplicate enqueue is dropped
      await queue.add("process", { jobId }, { jobId });
    },
  };
}
