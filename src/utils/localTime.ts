import { format, isValid, parseISO } from "date-fns";

/**
 * Event times are wall-clock strings (`YYYY-MM-DDTHH:mm:ss`) in the calendar's
 * zone. Arithmetic happens on Date values built from those fields, so a
 * round trip through parseLocal/formatLocal never shifts the clock reading.
 */
export type LocalDateTime = string;

const LOCAL_FORMAT = "yyyy-MM-dd'T'HH:mm:ss";
const LOOSE_RE = /^(\d{4}-\d{2}-\d{2})[T ](\d{2}:\d{2})(:\d{2})?(?:\.\d+)?(?:Z|[+-]\d{2}:?\d{2})?$/;

export function formatLocal(date: Date): LocalDateTime {
  return format(date, LOCAL_FORMAT);
}

/**
 * Accepts `YYYY-MM-DDTHH:mm[:ss]`, optionally with fractional seconds and a
 * zone suffix, which is dropped: the clock reading is what the speaker said.
 * Returns null for anything that does not name a real calendar instant.
 */
export function normalizeLocal(value: string): LocalDateTime | null {
  const m = LOOSE_RE.exec(value.trim());
  if (!m) return null;
  const candidate = `${m[1]}T${m[2]}${m[3] ?? ":00"}`;
  const parsed = parseISO(candidate);
  if (!isValid(parsed)) return null;
  // Rejects rolled-over dates such as 2025-02-30
  return formatLocal(parsed) === candidate ? candidate : null;
}

export function parseLocal(value: string): Date | null {
  const normalized = normalizeLocal(value);
  return normalized ? parseISO(normalized) : null;
}

/** Renders an absolute instant as the wall-clock reading in `timeZone`. */
export function toZonedLocal(instant: Date, timeZone: string): LocalDateTime {
  const parts = new Intl.DateTimeFormat("en-CA", {
    timeZone,
    hourCycle: "h23",
    year: "numeric",
    month: "2-digit",
    day: "2-digit",
    hour: "2-digit",
    minute: "2-digit",
    second: "2-digit",
  }).formatToParts(instant);

  const get = (type: Intl.DateTimeFormatPartTypes): string =>
    parts.find((p) => p.type === type)?.value ?? "00";

  return `${get("year")}-${get("month")}-${get("day")}T${get("hour")}:${get("minute")}:${get("second")}`;
}
