import type { EnhancementPatch, ResolvedSpan, SpanCheck, StructuredCandidateEvent } from "../types.js";
import type { LocalDateTime } from "../utils/localTime.js";
import { extractLocation } from "./locationExtractor.js";
import { resolveTimeSpan } from "./timeResolver.js";

export interface EnhancementInput {
  transcript: string;
  referenceNow: LocalDateTime;
}

export interface EntityEnhancer {
  enhance(input: EnhancementInput): Promise<EnhancementPatch>;
}

/** Rule-based enhancer: no network, same output for the same input. */
export function createRuleEnhancer(): EntityEnhancer {
  return {
    async enhance({ transcript, referenceNow }: EnhancementInput): Promise<EnhancementPatch> {
      const patch: EnhancementPatch = {};
      const location = extractLocation(transcript);
      if (location) patch.location = location;
      const span = resolveTimeSpan(transcript, referenceNow);
      if (span) patch.span = span;
      return patch;
    },
  };
}

function sameDay(a: LocalDateTime, b: LocalDateTime): boolean {
  return a.slice(0, 10) === b.slice(0, 10);
}

/**
 * Compares the extraction span with the rule-derived one. Day-precision
 * spans only pin the date; an end is compared only when the transcript
 * stated one.
 */
export function checkSpan(candidate: StructuredCandidateEvent, span: ResolvedSpan | undefined): SpanCheck {
  if (!span) return "unresolved";
  if (candidate.isAllDay !== span.isAllDay) return "disputed";

  if (span.precision === "day") {
    return sameDay(candidate.startTime, span.startTime) ? "agreed" : "disputed";
  }
  if (candidate.startTime !== span.startTime) return "disputed";
  if (span.hasExplicitEnd && candidate.endTime !== span.endTime) return "disputed";
  return "agreed";
}

export interface MergeResult {
  candidate: StructuredCandidateEvent;
  spanCheck: SpanCheck;
}

/**
 * Applies an enhancement patch to the extraction output. The patch location
 * only fills an empty one; the span is never replaced, only checked.
 * A null patch (enhancement failed) leaves the candidate unchanged.
 */
export function mergeEnhancement(
  candidate: StructuredCandidateEvent,
  patch: EnhancementPatch | null
): MergeResult {
  if (!patch) return { candidate, spanCheck: "unresolved" };

  const merged: StructuredCandidateEvent = { ...candidate };
  if (!merged.location && patch.location) {
    merged.location = patch.location;
  }
  return { candidate: merged, spanCheck: checkSpan(candidate, patch.span) };
}
