import { describe, it, expect } from "vitest";
import { dedupeLabels, isAllowedTransition } from "../src/store/jobStore.js";
import { InMemoryEventStore, InMemoryJobStore } from "../src/store/memoryStore.js";
import { decodeJob, encodeHash, jobKey, pairsToHash, statusIndexKey } from "../src/store/redisJobStore.js";
import type { NewCalendarEvent, VoiceProcessingJob } from "../src/types.js";

const NOW = new Date("2025-10-01T02:00:00Z");

function makeJob(overrides?: Partial<VoiceProcessingJob>): VoiceProcessingJob {
  return {
    id: "job-1",
    audioUrl: "https://audio.test/clip.m4a",
    userId: "user-1",
    calendarId: null,
    labels: [{ id: "work", name: "工作" }],
    status: "pending",
    createdAt: "2025-10-01T02:00:00.000Z",
    updatedAt: "2025-10-01T02:00:00.000Z",
    ...overrides,
  };
}

describe("isAllowedTransition", () => {
  it("allows only the forward path", () => {
    expect(isAllowedTransition("pending", { status: "processing" })).toBe(true);
    expect(isAllowedTransition("processing", { status: "completed" })).toBe(true);
    expect(isAllowedTransition("processing", { status: "failed" })).toBe(true);
    expect(isAllowedTransition("processing", { transcription: "x" })).toBe(true);
    expect(isAllowedTransition("pending", { status: "completed" })).toBe(false);
    expect(isAllowedTransition("processing", { status: "pending" })).toBe(false);
  });

  it("never patches a terminal job", () => {
    expect(isAllowedTransition("completed", { transcription: "x" })).toBe(false);
    expect(isAllowedTransition("failed", { status: "processing" })).toBe(false);
  });
});

describe("dedupeLabels", () => {
  it("keeps the first label of each id in order", () => {
    expect(
      dedupeLabels([
        { id: "b", name: "B" },
        { id: "a", name: "A" },
        { id: "b", name: "B2" },
      ])
    ).toEqual([
      { id: "b", name: "B" },
      { id: "a", name: "A" },
    ]);
  });
});

describe("InMemoryJobStore", () => {
  it("creates pending jobs", async () => {
    const store = new InMemoryJobStore(() => NOW);
    const job = await store.create({ audioUrl: "https://audio.test/a.wav", userId: "user-1" });
    expect(job).toMatchObject({
      status: "pending",
      calendarId: null,
      labels: [],
      createdAt: "2025-10-01T02:00:00.000Z",
      updatedAt: "2025-10-01T02:00:00.000Z",
    });
    expect(await store.get(job.id)).toEqual(job);
  });

  it("applies an update only from the expected status", async () => {
    const store = new InMemoryJobStore(() => NOW);
    await store.put(makeJob());

    const first = await store.conditionalUpdate("job-1", "pending", { status: "processing" });
    expect(first.ok).toBe(true);

    const second = await store.conditionalUpdate("job-1", "pending", { status: "processing" });
    expect(second).toEqual({ ok: false, reason: "conflict" });
  });

  it("reports unknown jobs and forbidden transitions", async () => {
    const store = new InMemoryJobStore(() => NOW);
    await store.put(makeJob({ status: "completed", eventId: "event-1" }));

    expect(await store.conditionalUpdate("nope", "pending", { status: "processing" })).toEqual({
      ok: false,
      reason: "not_found",
    });
    expect(await store.conditionalUpdate("job-1", "completed", { status: "failed" })).toEqual({
      ok: false,
      reason: "invalid_transition",
    });
  });

  it("keeps the status when a patch has none", async () => {
    const store = new InMemoryJobStore(() => NOW);
    await store.put(makeJob({ status: "processing" }));

    const res = await store.conditionalUpdate("job-1", "processing", { transcription: "明天開會" });
    expect(res).toEqual({ ok: true, job: makeJob({ status: "processing", transcription: "明天開會" }) });
  });

  it("hands out copies", async () => {
    const store = new InMemoryJobStore(() => NOW);
    await store.put(makeJob());

    const copy = await store.get("job-1");
    copy?.labels.push({ id: "x", name: "X" });
    expect((await store.get("job-1"))?.labels).toHaveLength(1);
  });

  it("lists jobs by status", async () => {
    const store = new InMemoryJobStore(() => NOW);
    await store.put(makeJob({ id: "a" }));
    await store.put(makeJob({ id: "b", status: "processing" }));

    const processing = await store.listByStatus("processing");
    expect(processing.map((j) => j.id)).toEqual(["b"]);
  });
});

describe("InMemoryEventStore", () => {
  it("assigns an id to each event", async () => {
    const store = new InMemoryEventStore();
    const event: NewCalendarEvent = {
      userId: "user-1",
      calendarId: null,
      title: "開會",
      startTime: "2025-10-02T14:00:00",
      endTime: "2025-10-02T15:00:00",
      timeZone: "Asia/Taipei",
      location: null,
      description: null,
      isAllDay: false,
      labelId: null,
      participants: [],
      reminderMinutes: 15,
      metadata: { createdBy: "voice", originalVoiceText: "明天開會", voiceFileUrl: "https://audio.test/a.wav", jobId: "job-1" },
      createdAt: "2025-10-01T02:00:00.000Z",
      updatedAt: "2025-10-01T02:00:00.000Z",
    };

    const id = await store.create(event);
    expect(store.get(id)).toEqual({ ...event, id });
  });
});

describe("Redis job encoding", () => {
  it("names keys by job id and status", () => {
    expect(jobKey("job-1")).toBe("voice:job:job-1");
    expect(statusIndexKey("processing")).toBe("voice:jobs:status:processing");
  });

  it("JSON-encodes each field and skips undefined ones", () => {
    expect(encodeHash({ status: "failed", labels: [{ id: "a", name: "A" }], eventId: undefined, calendarId: null })).toEqual({
      status: '"failed"',
      labels: '[{"id":"a","name":"A"}]',
      calendarId: "null",
    });
  });

  it("decodes what it encodes", () => {
    const job = makeJob({
      status: "completed",
      eventId: "event-1",
      transcription: "明天下午兩點開會",
      spanCheck: "agreed",
      result: {
        title: "開會",
        startTime: "2025-10-02T14:00:00",
        endTime: "2025-10-02T15:00:00",
        isAllDay: false,
        participants: [],
        labelId: null,
      },
    });
    expect(decodeJob(encodeHash(job))).toEqual(job);
  });

  it("treats an empty hash as a missing job", () => {
    expect(decodeJob({})).toBeNull();
  });

  it("refuses corrupted records", () => {
    expect(() => decodeJob({ ...encodeHash(makeJob()), status: "pending" })).toThrow(
      'stored job field "status" is not valid JSON'
    );
    expect(() => decodeJob(encodeHash({ ...makeJob(), status: "archived" }))).toThrow(/stored job failed validation/);
  });

  it("reads a flat field/value reply", () => {
    expect(pairsToHash(["status", '"pending"', "id", '"job-1"', "dangling"])).toEqual({
      status: '"pending"',
      id: '"job-1"',
    });
  });
});
