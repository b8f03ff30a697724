import { addDays, isEqual, startOfDay } from "date-fns";
import { fetch, type Dispatcher } from "undici";
import { z } from "zod";
import type { LabelInfo, StructuredCandidateEvent } from "../types.js";
import { ExtractionFailure, PipelineFailure, errorMessage } from "../utils/errors.js";
import { formatLocal, parseLocal, type LocalDateTime } from "../utils/localTime.js";
import type { Logger } from "../utils/logger.js";
import { callWithTimeout } from "../utils/timeout.js";
import { buildSystemPrompt, buildUserPrompt } from "./prompt.js";

export interface ExtractionInput {
  transcript: string;
  referenceNow: LocalDateTime;
  labels: readonly LabelInfo[];
}

export interface SemanticExtractor {
  extract(input: ExtractionInput): Promise<StructuredCandidateEvent>;
}

/* ============================== Response schema ============================== */

// Models write null, "" or leave the key out for "nothing"; all mean absent
const OptionalText = z
  .string()
  .nullish()
  .transform((v) => {
    const t = v?.trim();
    return t ? t : undefined;
  });

const RawCandidateSchema = z.object({
  title: z.string().trim().min(1, "title is empty"),
  startTime: z.string({ required_error: "startTime is missing" }),
  endTime: z.string({ required_error: "endTime is missing" }).trim().min(1, "endTime is empty"),
  location: OptionalText,
  description: OptionalText,
  isAllDay: z.boolean().nullish(),
  participants: z.array(z.string()).nullish(),
  labelId: OptionalText,
});

const ChatCompletionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string().nullable() }),
      })
    )
    .min(1),
});

/* ============================== Parsing ============================== */

/** Pulls the JSON object out of a reply that may carry code fences or prose. */
export function extractJsonBlock(s: string): string {
  const trimmed = s.trim();
  if (trimmed.startsWith("{") && trimmed.endsWith("}")) return trimmed;

  const fenceMatch = trimmed.match(/```(?:json)?\s*([\s\S]*?)\s*```/i);
  if (fenceMatch) return fenceMatch[1].trim();

  const first = trimmed.indexOf("{");
  const last = trimmed.lastIndexOf("}");
  if (first >= 0 && last > first) return trimmed.slice(first, last + 1);

  return trimmed;
}

/**
 * All-day events run from midnight of the first day to midnight after the
 * last. An end already on a midnight is taken as exclusive.
 */
function snapAllDay(start: Date, end: Date): { start: Date; end: Date } {
  const snappedStart = startOfDay(start);
  const endDay = startOfDay(end);
  const snappedEnd =
    isEqual(endDay, end) && end > snappedStart ? endDay : addDays(endDay, 1);
  return { start: snappedStart, end: snappedEnd < snappedStart ? addDays(snappedStart, 1) : snappedEnd };
}

/**
 * Turns a model reply into a candidate event. A missing title, start or end,
 * an unparseable timestamp or an unknown label is an ExtractionFailure. Span
 * ordering is left to validation.
 */
export function parseCandidateResponse(raw: string, labels: readonly LabelInfo[]): StructuredCandidateEvent {
  let json: unknown;
  try {
    json = JSON.parse(extractJsonBlock(raw));
  } catch (err) {
    throw new ExtractionFailure(`model reply is not JSON: ${errorMessage(err)}`, { cause: err });
  }

  const parsed = RawCandidateSchema.safeParse(json);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".") || "reply"}: ${i.message}`);
    throw new ExtractionFailure(`model reply does not match the event shape (${issues.join("; ")})`);
  }
  const c = parsed.data;

  const start = parseLocal(c.startTime);
  if (!start) throw new ExtractionFailure(`unparseable startTime: ${c.startTime}`);
  const end = parseLocal(c.endTime);
  if (!end) throw new ExtractionFailure(`unparseable endTime: ${c.endTime}`);

  if (c.labelId && !labels.some((l) => l.id === c.labelId)) {
    throw new ExtractionFailure(`model chose unknown label id: ${c.labelId}`);
  }

  const isAllDay = c.isAllDay ?? false;
  const span = isAllDay ? snapAllDay(start, end) : { start, end };

  return {
    title: c.title,
    startTime: formatLocal(span.start),
    endTime: formatLocal(span.end),
    location: c.location,
    description: c.description,
    isAllDay,
    participants: (c.participants ?? []).map((p) => p.trim()).filter((p) => p.length > 0),
    labelId: c.labelId ?? null,
  };
}

/* ============================== Client ============================== */

export interface ChatExtractorOptions {
  baseUrl: string;
  apiKey: string;
  model: string;
  timeZone: string;
  timeoutMs: number;
  logger: Logger;
  temperature?: number;
  dispatcher?: Dispatcher;
}

/** Extraction through an OpenAI-compatible `/chat/completions` endpoint in JSON mode. */
export function createChatExtractor(opts: ChatExtractorOptions): SemanticExtractor {
  const log = opts.logger.child({ component: "extraction" });

  return {
    async extract(input: ExtractionInput): Promise<StructuredCandidateEvent> {
      const body = {
        model: opts.model,
        temperature: opts.temperature ?? 0.2,
        response_format: { type: "json_object" },
        messages: [
          {
            role: "system",
            content: buildSystemPrompt({
              referenceNow: input.referenceNow,
              timeZone: opts.timeZone,
              labels: input.labels,
            }),
          },
          { role: "user", content: buildUserPrompt(input.transcript) },
        ],
      };

      let content: string;
      try {
        content = await callWithTimeout("extraction request", opts.timeoutMs, async (signal) => {
          const res = await fetch(`${opts.baseUrl}/chat/completions`, {
            method: "POST",
            headers: {
              Authorization: `Bearer ${opts.apiKey}`,
              "Content-Type": "application/json",
            },
            body: JSON.stringify(body),
            signal,
            dispatcher: opts.dispatcher,
          });
          if (!res.ok) {
            const text = await res.text().catch(() => "");
            throw new ExtractionFailure(`chat completion failed: ${res.status} ${text.slice(0, 200)}`);
          }
          const completion = ChatCompletionSchema.safeParse(await res.json());
          if (!completion.success) {
            throw new ExtractionFailure("chat completion reply has no message content");
          }
          return completion.data.choices[0].message.content ?? "";
        });
      } catch (err) {
        if (err instanceof PipelineFailure) throw err;
        throw new ExtractionFailure(`chat completion failed: ${errorMessage(err)}`, { cause: err });
      }

      log.debug({ reply: content }, "model reply");
      const candidate = parseCandidateResponse(content, input.labels);
      log.info(
        { startTime: candidate.startTime, endTime: candidate.endTime, labelId: candidate.labelId },
        "candidate event extracted"
      );
      return candidate;
    },
  };
}
