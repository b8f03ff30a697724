import { format } from "date-fns";
import { DAY_PART_HOURS, WEEKDAY_CHARS_ZH } from "../constants.js";
import type { LabelInfo } from "../types.js";
import { parseLocal, type LocalDateTime } from "../utils/localTime.js";

export interface PromptContext {
  referenceNow: LocalDateTime;
  timeZone: string;
  labels: readonly LabelInfo[];
}

function hh(hour: number): string {
  return `${String(hour).padStart(2, "0")}:00`;
}

function describeReference(referenceNow: LocalDateTime): string {
  const ref = parseLocal(referenceNow);
  if (!ref) return referenceNow;
  // date-fns "i" is ISO weekday, 1 = Monday
  const zh = WEEKDAY_CHARS_ZH[Number(format(ref, "i")) - 1];
  return `${format(ref, "yyyy-MM-dd HH:mm")}, ${format(ref, "EEEE")} (星期${zh})`;
}

function describeLabels(labels: readonly LabelInfo[]): string {
  if (labels.length === 0) return "(none: labelId must be null)";
  return labels.map((l) => `- ${l.id}: ${l.name}`).join("\n");
}

export function buildSystemPrompt(ctx: PromptContext): string {
  return `You turn a spoken calendar request into exactly one calendar event.

Reference time (${ctx.timeZone}): ${describeReference(ctx.referenceNow)}

Output ONLY one JSON object, no prose, no code fences:
{"title": string, "startTime": "YYYY-MM-DDTHH:mm:ss", "endTime": "YYYY-MM-DDTHH:mm:ss", "location": string | null, "description": string | null, "isAllDay": boolean, "participants": string[], "labelId": string | null}

Dates (always relative to the reference date):
- 今天 / today -> the reference date
- 明天 / tomorrow -> reference date + 1 day
- 後天 / day after tomorrow -> reference date + 2 days
- 大後天 -> reference date + 3 days
- 下週X / next <weekday> -> that weekday in the week after the reference week (weeks start on Monday)
- X月X日 -> that date, in the reference year unless it has already passed

Times:
- 凌晨, 清晨 / early morning -> ${hh(DAY_PART_HOURS.earlyMorning)}; 凌晨三點 -> 03:00
- 早上, 上午 / morning -> ${hh(DAY_PART_HOURS.morning)}
- 中午 / noon -> ${hh(DAY_PART_HOURS.noon)}
- 下午 / afternoon -> ${hh(DAY_PART_HOURS.afternoon)}
- 晚上 / evening -> ${hh(DAY_PART_HOURS.evening)}
- 深夜 / night -> ${hh(DAY_PART_HOURS.night)}
- A clock time with one of those words is read on that side of noon: 下午兩點 -> 14:00, 下午兩點半 -> 14:30
- Times are wall-clock times in ${ctx.timeZone}; never add a zone suffix

Duration:
- Only a start time -> endTime = startTime + 1 hour
- 全天, 整天, 休假 / all day -> isAllDay true, startTime = that date 00:00:00, endTime = the next date 00:00:00
- endTime is never before startTime

Labels:
${describeLabels(ctx.labels)}
- Choose at most one labelId from the list above by best meaning match, or null if none fits
- Never output a labelId that is not in the list

Other fields:
- title: short, in the speaker's language
- location: the place if one is said (在XX, 去XX, XX會議室), else null
- description: remaining details such as things to bring or prepare (記得帶XX), joined with commas, else null
- participants: names of people mentioned, else []

Example (reference 2025-10-01 10:00):
明天下午兩點在公司會議室開會，記得帶筆電
{"title":"開會","startTime":"2025-10-02T14:00:00","endTime":"2025-10-02T15:00:00","location":"公司會議室","description":"記得帶筆電","isAllDay":false,"participants":[],"labelId":null}`;
}

export function buildUserPrompt(transcript: string): string {
  return `Transcript:\n${transcript}`;
}
