import { Worker } from "bullmq";
import { loadConfig } from "../config.js";
import { createChatExtractor } from "../pipeline/extract.js";
import { createRuleEnhancer } from "../pipeline/enhance.js";
import { VoicePipeline } from "../pipeline/orchestrator.js";
import { createWhisperTranscriber } from "../pipeline/transcribe.js";
import { RedisEventStore } from "../store/redisEventStore.js";
import { RedisJobStore } from "../store/redisJobStore.js";
import { createLogger } from "../utils/logger.js";
import { createRedisConnection, disconnectRedis } from "../utils/redis.js";
import { createProcessor } from "./processor.js";
import { VOICE_QUEUE_NAME, type VoiceTriggerPayload } from "./queue.js";
import { startSweeper } from "./sweeper.js";

const cfg = loadConfig();
const logger = createLogger(cfg.logLevel).child({ process: "worker" });
const redis = createRedisConnection(cfg, logger);
const jobs = new RedisJobStore(redis);

const pipeline = new VoicePipeline({
  jobs,
  events: new RedisEventStore(redis),
  transcriber: createWhisperTranscriber({
    baseUrl: cfg.openaiBaseUrl,
    apiKey: cfg.openaiApiKey,
    model: cfg.transcriptionModel,
    language: cfg.spokenLanguage,
    timeoutMs: cfg.externalTimeoutMs,
    maxAudioBytes: cfg.maxAudioBytes,
    logger,
  }),
  extractor: createChatExtractor({
    baseUrl: cfg.openaiBaseUrl,
    apiKey: cfg.openaiApiKey,
    model: cfg.extractionModel,
    timeZone: cfg.calendarTimeZone,
    timeoutMs: cfg.externalTimeoutMs,
    logger,
  }),
  enhancer: createRuleEnhancer(),
  logger,
  timeZone: cfg.calendarTimeZone,
  reminderMinutes: cfg.defaultReminderMinutes,
});

const worker = new Worker<VoiceTriggerPayload>(VOICE_QUEUE_NAME, createProcessor(pipeline), {
  connection: {
    host: cfg.redisHost,
    port: cfg.redisPort,
  },
  concurrency: cfg.workerConcurrency,
  autorun: false,
});

worker.on("completed", (job, outcome) => {
  logger.info({ jobId: job.data.jobId, outcome }, "voice job handled");
});

worker.on("failed", (job, err) => {
  logger.error({ jobId: job?.data.jobId, err }, "voice job handler crashed");
});

worker.on("error", (err) => {
  logger.error({ err }, "worker error");
});

const sweeper = startSweeper({
  jobs,
  staleAfterMs: cfg.staleProcessingMs,
  intervalMs: cfg.sweepIntervalMs,
  logger,
});

async function shutdown(signal: string): Promise<void> {
  logger.info({ signal }, "shutting down worker");
  sweeper.stop();
  try {
    await worker.close();
  } catch (err) {
    logger.error({ err }, "error closing worker");
  }
  await disconnectRedis(redis, logger);
  process.exit(0);
}

process.on("SIGINT", () => void shutdown("SIGINT"));
process.on("SIGTERM", () => void shutdown("SIGTERM"));

async function start(): Promise<void> {
  try {
    await redis.connect();
    logger.info({ concurrency: cfg.workerConcurrency, queue: VOICE_QUEUE_NAME }, "worker started");
    await worker.run();
  } catch (err) {
    logger.error({ err }, "worker failed to start");
    process.exit(1);
  }
}

void start();
