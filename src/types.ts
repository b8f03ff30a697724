import type { z } from "zod";
import type {
  CandidateEventSchema,
  JOB_STATUSES,
  LabelSchema,
  SPAN_CHECKS,
  VoiceJobSchema,
} from "./schemas.js";
import type { LocalDateTime } from "./utils/localTime.js";

export type JobStatus = (typeof JOB_STATUSES)[number];
export type SpanCheck = (typeof SPAN_CHECKS)[number];

export type LabelInfo = z.infer<typeof LabelSchema>;
export type StructuredCandidateEvent = z.infer<typeof CandidateEventSchema>;
export type VoiceProcessingJob = z.infer<typeof VoiceJobSchema>;

export interface NewVoiceJob {
  audioUrl: string;
  userId: string;
  calendarId?: string | null;
  labels?: LabelInfo[];
}

// Fields the orchestrator may change after creation
export type JobPatch = Partial<
  Pick<
    VoiceProcessingJob,
    | "status"
    | "transcription"
    | "result"
    | "errorKind"
    | "errorMessage"
    | "eventId"
    | "spanCheck"
    | "processingStartedAt"
  >
>;

export type ConditionalUpdateResult =
  | { ok: true; job: VoiceProcessingJob }
  | { ok: false; reason: "conflict" | "not_found" | "invalid_transition" };

export interface EventProvenance {
  createdBy: "voice";
  originalVoiceText: string;
  voiceFileUrl: string;
  jobId: string;
}

export interface NewCalendarEvent {
  userId: string;
  calendarId: string | null;
  title: string;
  startTime: LocalDateTime;
  endTime: LocalDateTime;
  timeZone: string;
  location: string | null;
  description: string | null;
  isAllDay: boolean;
  labelId: string | null;
  participants: string[];
  reminderMinutes: number;
  metadata: EventProvenance;
  createdAt: string;
  updatedAt: string;
}

export interface CalendarEvent extends NewCalendarEvent {
  id: string;
}

// Span derived by the rule-based enhancer
export interface ResolvedSpan {
  startTime: LocalDateTime;
  endTime: LocalDateTime;
  isAllDay: boolean;
  precision: "day" | "minute";
  hasExplicitEnd: boolean;
}

export interface EnhancementPatch {
  location?: string;
  span?: ResolvedSpan;
}
