import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";
import { loadConfig } from "../src/config.js";

describe("loadConfig", () => {
  beforeEach(() => {
    for (const key of [
      "PORT",
      "API_KEY",
      "OPENAI_BASE_URL",
      "CALENDAR_TIME_ZONE",
      "EXTERNAL_TIMEOUT_MS",
      "WORKER_CONCURRENCY",
      "STALE_PROCESSING_MS",
      "DEFAULT_REMINDER_MINUTES",
    ]) {
      vi.stubEnv(key, "");
    }
  });

  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it("falls back to defaults", () => {
    const cfg = loadConfig();
    expect(cfg.port).toBe(5688);
    expect(cfg.apiKey).toBeNull();
    expect(cfg.openaiBaseUrl).toBe("https://api.openai.com/v1");
    expect(cfg.calendarTimeZone).toBe("Asia/Taipei");
    expect(cfg.externalTimeoutMs).toBe(60000);
    expect(cfg.workerConcurrency).toBe(5);
    expect(cfg.staleProcessingMs).toBe(600000);
    expect(cfg.defaultReminderMinutes).toBe(15);
  });

  it("reads and clamps overrides", () => {
    vi.stubEnv("API_KEY", "test-secret");
    vi.stubEnv("OPENAI_BASE_URL", "https://llm.test/v1/");
    vi.stubEnv("EXTERNAL_TIMEOUT_MS", "5");
    vi.stubEnv("WORKER_CONCURRENCY", "12");

    const cfg = loadConfig();
    expect(cfg.apiKey).toBe("test-secret");
    expect(cfg.openaiBaseUrl).toBe("https://llm.test/v1");
    expect(cfg.externalTimeoutMs).toBe(1000);
    expect(cfg.workerConcurrency).toBe(12);
  });

  it("keeps the stale threshold above three external call budgets", () => {
    vi.stubEnv("EXTERNAL_TIMEOUT_MS", "120000");
    vi.stubEnv("STALE_PROCESSING_MS", "60000");

    expect(loadConfig().staleProcessingMs).toBe(420000);
  });

  it("rejects an unknown time zone", () => {
    vi.stubEnv("CALENDAR_TIME_ZONE", "Mars/Olympus");
    expect(() => loadConfig()).toThrow("CALENDAR_TIME_ZONE is not a valid IANA zone: Mars/Olympus");
  });
});
