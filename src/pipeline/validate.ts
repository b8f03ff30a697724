import type { LabelInfo, StructuredCandidateEvent } from "../types.js";
import { ValidationFailure } from "../utils/errors.js";
import { normalizeLocal } from "../utils/localTime.js";

/**
 * Checks the merged candidate before anything is written. Every violation is
 * collected into one ValidationFailure. Returns the candidate with its title
 * trimmed and timestamps in canonical form.
 */
export function validateCandidate(
  candidate: StructuredCandidateEvent,
  labels: readonly LabelInfo[]
): StructuredCandidateEvent {
  const issues: string[] = [];

  const title = candidate.title.trim();
  if (!title) issues.push("title is empty");

  const start = normalizeLocal(candidate.startTime);
  if (!start) issues.push(`startTime is not a valid date-time: ${candidate.startTime}`);
  const end = normalizeLocal(candidate.endTime);
  if (!end) issues.push(`endTime is not a valid date-time: ${candidate.endTime}`);

  // Canonical local strings compare in time order
  if (start && end) {
    if (end < start) {
      issues.push(`endTime ${end} is before startTime ${start}`);
    } else if (end === start && !candidate.isAllDay) {
      issues.push(`endTime equals startTime ${start}`);
    }
  }

  if (candidate.labelId !== null && !labels.some((l) => l.id === candidate.labelId)) {
    issues.push(`labelId ${candidate.labelId} is not one of the job's labels`);
  }

  if (issues.length > 0 || !start || !end) {
    throw new ValidationFailure(issues);
  }

  return { ...candidate, title, startTime: start, endTime: end };
}
