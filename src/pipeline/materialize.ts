import type { EventStore } from "../store/eventStore.js";
import type { NewCalendarEvent, StructuredCandidateEvent } from "../types.js";
import { StorageFailure, errorMessage } from "../utils/errors.js";

export interface MaterializeContext {
  jobId: string;
  userId: string;
  calendarId: string | null;
  audioUrl: string;
  transcript: string;
}

export interface MaterializeOptions {
  reminderMinutes: number;
  timeZone: string;
  now: Date;
}

export function buildEvent(
  candidate: StructuredCandidateEvent,
  ctx: MaterializeContext,
  opts: MaterializeOptions
): NewCalendarEvent {
  const stamp = opts.now.toISOString();
  return {
    userId: ctx.userId,
    calendarId: ctx.calendarId,
    title: candidate.title,
    startTime: candidate.startTime,
    endTime: candidate.endTime,
    timeZone: opts.timeZone,
    location: candidate.location ?? null,
    description: candidate.description ?? null,
    isAllDay: candidate.isAllDay,
    labelId: candidate.labelId,
    participants: [...candidate.participants],
    reminderMinutes: opts.reminderMinutes,
    metadata: {
      createdBy: "voice",
      originalVoiceText: ctx.transcript,
      voiceFileUrl: ctx.audioUrl,
      jobId: ctx.jobId,
    },
    createdAt: stamp,
    updatedAt: stamp,
  };
}

/** Writes the one event for a job and returns its id. */
export async function materializeEvent(
  events: EventStore,
  candidate: StructuredCandidateEvent,
  ctx: MaterializeContext,
  opts: MaterializeOptions
): Promise<string> {
  try {
    return await events.create(buildEvent(candidate, ctx, opts));
  } catch (err) {
    throw new StorageFailure(`event write failed: ${errorMessage(err)}`, { cause: err });
  }
}
