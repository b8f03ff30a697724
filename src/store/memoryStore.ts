import crypto from "node:crypto";
import type {
  CalendarEvent,
  ConditionalUpdateResult,
  JobPatch,
  JobStatus,
  NewCalendarEvent,
  NewVoiceJob,
  VoiceProcessingJob,
} from "../types.js";
import type { EventStore } from "./eventStore.js";
import { buildPendingJob, isAllowedTransition, type JobStore } from "./jobStore.js";

// In-memory storage - no persistence to disk. Used for local runs and tests.
export class InMemoryJobStore implements JobStore {
  private readonly jobs = new Map<string, VoiceProcessingJob>();

  constructor(private readonly clock: () => Date = () => new Date()) {}

  async create(input: NewVoiceJob): Promise<VoiceProcessingJob> {
    const job = buildPendingJob(input, this.clock());
    this.jobs.set(job.id, job);
    return structuredClone(job);
  }

  // Inserts a record as-is; lets callers seed jobs in any state
  async put(job: VoiceProcessingJob): Promise<void> {
    this.jobs.set(job.id, structuredClone(job));
  }

  async get(id: string): Promise<VoiceProcessingJob | null> {
    const job = this.jobs.get(id);
    return job ? structuredClone(job) : null;
  }

  async conditionalUpdate(id: string, expected: JobStatus, patch: JobPatch): Promise<ConditionalUpdateResult> {
    const job = this.jobs.get(id);
    if (!job) return { ok: false, reason: "not_found" };
    if (job.status !== expected) return { ok: false, reason: "conflict" };
    if (!isAllowedTransition(expected, patch)) return { ok: false, reason: "invalid_transition" };

    const updated: VoiceProcessingJob = {
      ...job,
      ...structuredClone(patch),
      status: patch.status ?? job.status,
      updatedAt: this.clock().toISOString(),
    };
    this.jobs.set(id, updated);
    return { ok: true, job: structuredClone(updated) };
  }

  async listByStatus(status: JobStatus): Promise<VoiceProcessingJob[]> {
    return [...this.jobs.values()].filter((j) => j.status === status).map((j) => structuredClone(j));
  }
}

export class InMemoryEventStore implements EventStore {
  private readonly events = new Map<string, CalendarEvent>();

  async create(event: NewCalendarEvent): Promise<string> {
    const id = crypto.randomUUID();
    this.events.set(id, { ...structuredClone(event), id });
    return id;
  }

  get(id: string): CalendarEvent | null {
    const event = this.events.get(id);
    return event ? structuredClone(event) : null;
  }

  list(): CalendarEvent[] {
    return [...this.events.values()].map((e) => structuredClone(e));
  }
}
