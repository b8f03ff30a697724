import { afterEach, describe, it, expect, vi } from "vitest";
import { buildServer } from "../src/app.js";
import { InMemoryJobStore } from "../src/store/memoryStore.js";
import { createLogger } from "../src/utils/logger.js";

const NOW = new Date("2025-10-01T02:00:00Z");

function setup(apiKey: string | null = null) {
  const jobs = new InMemoryJobStore(() => NOW);
  const enqueue = vi.fn(async (_jobId: string) => {});
  const app = buildServer({ jobs, trigger: { enqueue }, logger: createLogger("silent"), apiKey });
  return { app, jobs, enqueue };
}

const body = {
  audioUrl: "https://audio.test/users/user-1/voice/1.m4a",
  userId: "user-1",
  calendarId: "cal-1",
  labels: [
    { id: "work", name: "工作" },
    { id: "work", name: "工作 (dup)" },
  ],
};

describe("voice job routes", () => {
  let app: ReturnType<typeof setup>["app"] | null = null;

  afterEach(async () => {
    await app?.close();
    app = null;
  });

  it("accepts a job and queues it", async () => {
    const ctx = setup();
    app = ctx.app;

    const res = await app.inject({ method: "POST", url: "/v1/voice-jobs", payload: body });

    expect(res.statusCode).toBe(202);
    const json = res.json();
    expect(json.status).toBe("pending");
    expect(json.statusUrl).toMatch(new RegExp(`/v1/voice-jobs/${json.jobId}$`));
    expect(ctx.enqueue).toHaveBeenCalledWith(json.jobId);

    const stored = await ctx.jobs.get(json.jobId);
    expect(stored).toMatchObject({
      audioUrl: body.audioUrl,
      userId: "user-1",
      calendarId: "cal-1",
      labels: [{ id: "work", name: "工作" }],
      status: "pending",
    });
  });

  it("rejects a body without a valid audio URL", async () => {
    const ctx = setup();
    app = ctx.app;

    const res = await app.inject({
      method: "POST",
      url: "/v1/voice-jobs",
      payload: { audioUrl: "not-a-url", userId: "user-1" },
    });

    expect(res.statusCode).toBe(400);
    const json = res.json();
    expect(json.code).toBe("BAD_REQUEST");
    expect(json.error).toBe("Invalid request body");
    expect(json.details).toEqual([{ path: "audioUrl", message: "Invalid url" }]);
    expect(ctx.enqueue).not.toHaveBeenCalled();
  });

  it("rejects a body that is not JSON", async () => {
    const ctx = setup();
    app = ctx.app;

    const res = await app.inject({
      method: "POST",
      url: "/v1/voice-jobs",
      headers: { "content-type": "application/json" },
      payload: "{not json",
    });

    expect(res.statusCode).toBe(400);
  });

  it("answers 503 and keeps the job pending when the queue is down", async () => {
    const ctx = setup();
    app = ctx.app;
    ctx.enqueue.mockRejectedValueOnce(new Error("ECONNREFUSED"));

    const res = await app.inject({ method: "POST", url: "/v1/voice-jobs", payload: body });

    expect(res.statusCode).toBe(503);
    expect(res.json().code).toBe("SERVICE_UNAVAILABLE");
    expect(await ctx.jobs.listByStatus("pending")).toHaveLength(1);
  });

  it("returns a job record", async () => {
    const ctx = setup();
    app = ctx.app;
    const job = await ctx.jobs.create({ audioUrl: body.audioUrl, userId: "user-1" });

    const res = await app.inject({ method: "GET", url: `/v1/voice-jobs/${job.id}` });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual(job);
  });

  it("answers 404 for an unknown job", async () => {
    const ctx = setup();
    app = ctx.app;

    const res = await app.inject({ method: "GET", url: "/v1/voice-jobs/missing" });

    expect(res.statusCode).toBe(404);
    expect(res.json()).toEqual({ error: "Job not found", code: "NOT_FOUND" });
  });

  describe("with an API key", () => {
    it("refuses requests without the key", async () => {
      const ctx = setup("test-secret");
      app = ctx.app;

      const res = await app.inject({ method: "POST", url: "/v1/voice-jobs", payload: body });

      expect(res.statusCode).toBe(401);
      expect(res.json()).toEqual({ error: "Unauthorized: Invalid or missing API key", code: "UNAUTHORIZED" });
      expect(ctx.enqueue).not.toHaveBeenCalled();
    });

    it("accepts requests with the key", async () => {
      const ctx = setup("test-secret");
      app = ctx.app;

      const res = await app.inject({
        method: "POST",
        url: "/v1/voice-jobs",
        headers: { "x-api-key": "test-secret" },
        payload: body,
      });

      expect(res.statusCode).toBe(202);
    });

    it("leaves the health check open", async () => {
      const ctx = setup("test-secret");
      app = ctx.app;

      const res = await app.inject({ method: "GET", url: "/healthz" });

      expect(res.statusCode).toBe(200);
      expect(res.json()).toEqual({ ok: true });
    });
  });
});
