import "dotenv/config";
import {
  DEFAULT_EXTRACTION_MODEL,
  DEFAULT_MAX_AUDIO_BYTES,
  DEFAULT_REMINDER_MINUTES,
  DEFAULT_TRANSCRIPTION_MODEL,
} from "./constants.js";

export interface ServiceConfig {
  port: number;
  apiKey: string | null; // guards /v1/* when set
  redisHost: string;
  redisPort: number;
  // OpenAI-compatible endpoint used for both transcription and extraction
  openaiBaseUrl: string;
  openaiApiKey: string;
  transcriptionModel: string;
  extractionModel: string;
  spokenLanguage: string; // fixed, no auto-detection
  calendarTimeZone: string; // IANA zone the wall-clock event times live in
  externalTimeoutMs: number; // per external call
  maxAudioBytes: number;
  workerConcurrency: number;
  staleProcessingMs: number;
  sweepIntervalMs: number;
  defaultReminderMinutes: number;
  logLevel: string;
}

function intFromEnv(name: string, fallback: number, min = 0): number {
  const parsed = parseInt(process.env[name] || "", 10);
  if (!Number.isFinite(parsed)) return fallback;
  return Math.max(min, parsed);
}

function isValidTimeZone(zone: string): boolean {
  try {
    new Intl.DateTimeFormat("en-US", { timeZone: zone });
    return true;
  } catch {
    return false;
  }
}

export function loadConfig(): ServiceConfig {
  const calendarTimeZone = process.env.CALENDAR_TIME_ZONE || "Asia/Taipei";
  if (!isValidTimeZone(calendarTimeZone)) {
    throw new Error(`CALENDAR_TIME_ZONE is not a valid IANA zone: ${calendarTimeZone}`);
  }

  // Never below one second, default one minute
  const externalTimeoutMs = intFromEnv("EXTERNAL_TIMEOUT_MS", 60000, 1000);

  return {
    port: intFromEnv("PORT", 5688),
    apiKey: process.env.API_KEY || null,
    redisHost: process.env.REDIS_HOST || "localhost",
    redisPort: intFromEnv("REDIS_PORT", 6379),
    openaiBaseUrl: (process.env.OPENAI_BASE_URL || "https://api.openai.com/v1").replace(/\/+$/, ""),
    openaiApiKey: process.env.OPENAI_API_KEY || "",
    transcriptionModel: process.env.TRANSCRIPTION_MODEL || DEFAULT_TRANSCRIPTION_MODEL,
    extractionModel: process.env.EXTRACTION_MODEL || DEFAULT_EXTRACTION_MODEL,
    spokenLanguage: process.env.SPOKEN_LANGUAGE || "zh",
    calendarTimeZone,
    externalTimeoutMs,
    maxAudioBytes: intFromEnv("MAX_AUDIO_BYTES", DEFAULT_MAX_AUDIO_BYTES, 1),
    workerConcurrency: intFromEnv("WORKER_CONCURRENCY", 5, 1),
    // A run makes three external calls; a job is only stale once all of them could have timed out
    staleProcessingMs: intFromEnv("STALE_PROCESSING_MS", 10 * 60 * 1000, 3 * externalTimeoutMs + 60000),
    sweepIntervalMs: intFromEnv("SWEEP_INTERVAL_MS", 60000, 1000),
    defaultReminderMinutes: intFromEnv("DEFAULT_REMINDER_MINUTES", DEFAULT_REMINDER_MINUTES),
    logLevel: process.env.LOG_LEVEL || "info",
  };
}
