import { z } from "zod";
import { FAILURE_KINDS } from "./utils/errors.js";

export const JOB_STATUSES = ["pending", "processing", "completed", "failed"] as const;

// Outcome of comparing the extraction span with the rule-based span
export const SPAN_CHECKS = ["agreed", "disputed", "unresolved"] as const;

export const LabelSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
});

export const CandidateEventSchema = z.object({
  title: z.string(),
  startTime: z.string(),
  endTime: z.string(),
  location: z.string().optional(),
  description: z.string().optional(),
  isAllDay: z.boolean(),
  participants: z.array(z.string()),
  labelId: z.string().nullable(),
});

export const VoiceJobSchema = z.object({
  id: z.string().min(1),
  audioUrl: z.string().min(1),
  userId: z.string().min(1),
  calendarId: z.string().nullable(),
  labels: z.array(LabelSchema),
  status: z.enum(JOB_STATUSES),
  transcription: z.string().optional(),
  result: CandidateEventSchema.optional(),
  errorKind: z.enum(FAILURE_KINDS).optional(),
  errorMessage: z.string().optional(),
  eventId: z.string().optional(),
  spanCheck: z.enum(SPAN_CHECKS).optional(),
  processingStartedAt: z.string().optional(),
  createdAt: z.string(),
  updatedAt: z.string(),
});

// POST /v1/voice-jobs
export const CreateJobBodySchema = z.object({
  audioUrl: z.string().url(),
  userId: z.string().min(1),
  calendarId: z.string().min(1).optional(),
  labels: z.array(LabelSchema).optional(),
});
