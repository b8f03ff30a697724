import crypto from "node:crypto";
import type {
  ConditionalUpdateResult,
  JobPatch,
  JobStatus,
  LabelInfo,
  NewVoiceJob,
  VoiceProcessingJob,
} from "../types.js";

/**
 * Persisted voice jobs. `conditionalUpdate` is the only way status moves,
 * and it is atomic per record: the write happens only if the stored status
 * still equals `expected`.
 */
export interface JobStore {
  create(input: NewVoiceJob): Promise<VoiceProcessingJob>;
  get(id: string): Promise<VoiceProcessingJob | null>;
  conditionalUpdate(id: string, expected: JobStatus, patch: JobPatch): Promise<ConditionalUpdateResult>;
  listByStatus(status: JobStatus): Promise<VoiceProcessingJob[]>;
}

const ALLOWED_TRANSITIONS: Record<JobStatus, readonly JobStatus[]> = {
  pending: ["processing"],
  processing: ["processing", "completed", "failed"],
  completed: [],
  failed: [],
};

export function isTerminal(status: JobStatus): boolean {
  return status === "completed" || status === "failed";
}

/**
 * A patch applied while the job is in `from`. Terminal jobs take no patch at
 * all; a patch without a status keeps the job where it is.
 */
export function isAllowedTransition(from: JobStatus, patch: JobPatch): boolean {
  if (isTerminal(from)) return false;
  const to = patch.status ?? from;
  return ALLOWED_TRANSITIONS[from].includes(to);
}

// Keeps the first occurrence of each label id, in order
export function dedupeLabels(labels: readonly LabelInfo[]): LabelInfo[] {
  const seen = new Set<string>();
  const out: LabelInfo[] = [];
  for (const label of labels) {
    if (seen.has(label.id)) continue;
    seen.add(label.id);
    out.push({ id: label.id, name: label.name });
  }
  return out;
}

export function buildPendingJob(input: NewVoiceJob, now: Date = new Date()): VoiceProcessingJob {
  const stamp = now.toISOString();
  return {
    id: crypto.randomUUID(),
    audioUrl: input.audioUrl,
    userId: input.userId,
    calendarId: input.calendarId ?? null,
    labels: dedupeLabels(input.labels ?? []),
    status: "pending",
    createdAt: stamp,
    updatedAt: stamp,
  };
}
