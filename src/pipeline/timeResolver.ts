import { addDays, addMinutes, addWeeks, nextDay, setHours, setMinutes, startOfDay, startOfWeek } from "date-fns";
import {
  ALL_DAY_PATTERN,
  DAY_PART_HOURS,
  DAY_PART_WORDS,
  DEFAULT_EVENT_DURATION_MINUTES,
  WEEKDAY_CHARS_ZH,
  WEEKDAY_NAMES_EN,
  type DayPart,
} from "../constants.js";
import type { ResolvedSpan } from "../types.js";
import { formatLocal, parseLocal, type LocalDateTime } from "../utils/localTime.js";

const ZH_DIGITS: Record<string, number> = {
  零: 0,
  〇: 0,
  一: 1,
  二: 2,
  兩: 2,
  两: 2,
  三: 3,
  四: 4,
  五: 5,
  六: 6,
  七: 7,
  八: 8,
  九: 9,
};

const NUM = "[\\d零〇一二兩两三四五六七八九十]{1,3}";
const WEEK = "(?:週|周|禮拜|礼拜|星期)";
const WEEKDAY_ZH = "([一二三四五六日天])";

/** "3", "十", "十二", "二十三" -> number; null when not a numeral. */
export function parseChineseNumber(s: string): number | null {
  if (/^\d+$/.test(s)) return parseInt(s, 10);
  if (s.length === 0) return null;

  const ten = s.indexOf("十");
  if (ten === -1) {
    return s.length === 1 && s in ZH_DIGITS ? ZH_DIGITS[s] : null;
  }
  const before = s.slice(0, ten);
  const after = s.slice(ten + 1);
  const tens = before === "" ? 1 : before.length === 1 && before in ZH_DIGITS ? ZH_DIGITS[before] : null;
  const ones = after === "" ? 0 : after.length === 1 && after in ZH_DIGITS ? ZH_DIGITS[after] : null;
  if (tens === null || ones === null) return null;
  return tens * 10 + ones;
}

function weekdayIndexZh(ch: string): number {
  // 天 is the colloquial Sunday
  return ch === "天" ? 6 : WEEKDAY_CHARS_ZH.findIndex((c) => c === ch);
}

// Monday-based index -> date-fns day (0 = Sunday)
function toDateFnsDay(mondayIndex: number): 0 | 1 | 2 | 3 | 4 | 5 | 6 {
  const days = [1, 2, 3, 4, 5, 6, 0] as const;
  return days[mondayIndex];
}

function weekdayIn(weekOf: Date, mondayIndex: number): Date {
  return addDays(startOfWeek(weekOf, { weekStartsOn: 1 }), mondayIndex);
}

function buildDate(year: number, month: number, day: number): Date | null {
  const d = new Date(year, month - 1, day);
  if (d.getFullYear() !== year || d.getMonth() !== month - 1 || d.getDate() !== day) return null;
  return d;
}

// A date said without a year is the next one on or after today
function upcoming(month: number, day: number, today: Date): Date | null {
  const thisYear = buildDate(today.getFullYear(), month, day);
  if (thisYear && thisYear >= today) return thisYear;
  return buildDate(today.getFullYear() + 1, month, day);
}

/** The calendar day a phrase in `text` points at, relative to `ref`. */
export function resolveDay(text: string, ref: Date): Date | null {
  const today = startOfDay(ref);

  const iso = /(\d{4})-(\d{1,2})-(\d{1,2})/.exec(text);
  if (iso) return buildDate(Number(iso[1]), Number(iso[2]), Number(iso[3]));

  const zhDate = new RegExp(`(?:(\\d{4})年)?(${NUM})月(${NUM})[日號号]`).exec(text);
  if (zhDate) {
    const month = parseChineseNumber(zhDate[2]);
    const day = parseChineseNumber(zhDate[3]);
    if (month !== null && day !== null) {
      return zhDate[1] ? buildDate(Number(zhDate[1]), month, day) : upcoming(month, day, today);
    }
  }

  const slash = /(?<![\d/])(\d{1,2})\/(\d{1,2})(?![\d/])/.exec(text);
  if (slash) return upcoming(Number(slash[1]), Number(slash[2]), today);

  if (text.includes("大後天") || text.includes("大后天")) return addDays(today, 3);
  if (text.includes("後天") || text.includes("后天") || /day after tomorrow/i.test(text)) return addDays(today, 2);
  if (text.includes("明天") || /\btomorrow\b/i.test(text)) return addDays(today, 1);
  if (/今天|今晚|今早/.test(text) || /\b(today|tonight)\b/i.test(text)) return today;

  const nextWeekZh = new RegExp(`下(?:個|个)?${WEEK}${WEEKDAY_ZH}`).exec(text);
  if (nextWeekZh) return weekdayIn(addWeeks(today, 1), weekdayIndexZh(nextWeekZh[1]));

  const thisWeekZh = new RegExp(`(?:這|这|本)(?:個|个)?${WEEK}${WEEKDAY_ZH}`).exec(text);
  if (thisWeekZh) return weekdayIn(today, weekdayIndexZh(thisWeekZh[1]));

  const names = WEEKDAY_NAMES_EN.join("|");
  const nextWeekEn = new RegExp(`\\bnext (${names})\\b`, "i").exec(text);
  if (nextWeekEn) {
    return weekdayIn(addWeeks(today, 1), WEEKDAY_NAMES_EN.findIndex((n) => n === nextWeekEn[1].toLowerCase()));
  }

  const thisWeekEn = new RegExp(`\\bthis (${names})\\b`, "i").exec(text);
  if (thisWeekEn) {
    return weekdayIn(today, WEEKDAY_NAMES_EN.findIndex((n) => n === thisWeekEn[1].toLowerCase()));
  }

  const bareZh = new RegExp(`${WEEK}${WEEKDAY_ZH}`).exec(text);
  if (bareZh) return nextDay(today, toDateFnsDay(weekdayIndexZh(bareZh[1])));

  const bareEn = new RegExp(`\\b(${names})\\b`, "i").exec(text);
  if (bareEn) {
    return nextDay(today, toDateFnsDay(WEEKDAY_NAMES_EN.findIndex((n) => n === bareEn[1].toLowerCase())));
  }

  return null;
}

export function detectDayPart(text: string): DayPart | null {
  let found: { index: number; part: DayPart } | null = null;
  const lower = text.toLowerCase();
  for (const [word, part] of DAY_PART_WORDS) {
    const index = lower.indexOf(word);
    if (index !== -1 && (found === null || index < found.index)) {
      found = { index, part };
    }
  }
  return found ? found.part : null;
}

interface ClockMatch {
  hour: number;
  minute: number;
  meridiem: "am" | "pm" | null;
  index: number;
  length: number;
}

const CLOCK_PATTERNS: ReadonlyArray<{ re: RegExp; read: (m: RegExpExecArray) => Omit<ClockMatch, "index" | "length"> | null }> = [
  {
    re: /\b(\d{1,2})(?::(\d{2}))?\s*(am|pm)\b/i,
    read: (m) => ({
      hour: Number(m[1]),
      minute: m[2] ? Number(m[2]) : 0,
      meridiem: m[3].toLowerCase() === "am" ? "am" : "pm",
    }),
  },
  {
    re: /(?<!\d)(\d{1,2}):(\d{2})(?!\d)/,
    read: (m) => ({ hour: Number(m[1]), minute: Number(m[2]), meridiem: null }),
  },
  {
    re: new RegExp(`(${NUM})\\s*[點点時时](?:\\s*(半|${NUM})\\s*分?)?`),
    read: (m) => {
      const hour = parseChineseNumber(m[1]);
      if (hour === null) return null;
      if (!m[2]) return { hour, minute: 0, meridiem: null };
      const minute = m[2] === "半" ? 30 : parseChineseNumber(m[2]);
      return minute === null ? null : { hour, minute, meridiem: null };
    },
  },
];

/** Earliest clock time in `text`, across the digit, am/pm and Chinese forms. */
export function findClock(text: string): ClockMatch | null {
  let best: ClockMatch | null = null;
  for (const { re, read } of CLOCK_PATTERNS) {
    const m = re.exec(text);
    if (!m) continue;
    const value = read(m);
    if (!value || value.hour > 24 || value.minute > 59 || (value.hour === 24 && value.minute > 0)) continue;
    if (best === null || m.index < best.index) {
      best = { ...value, index: m.index, length: m[0].length };
    }
  }
  return best;
}

/**
 * 24-hour reading of a clock time. Explicit am/pm wins; otherwise the day
 * part decides, and a bare 1–6 o'clock is taken as afternoon. Twelve in the
 * evening or at night is the following midnight (24).
 */
export function toHour24(clock: Pick<ClockMatch, "hour" | "meridiem">, part: DayPart | null): number {
  const h = clock.hour;
  if (clock.meridiem === "am") return h === 12 ? 0 : h;
  if (clock.meridiem === "pm") return h < 12 ? h + 12 : h;

  switch (part) {
    case "afternoon":
      return h < 12 ? h + 12 : h;
    case "evening":
      return h === 12 ? 24 : h < 12 ? h + 12 : h;
    case "night":
      if (h === 12) return 24;
      return h >= 6 && h < 12 ? h + 12 : h;
    case "earlyMorning":
      return h === 12 ? 0 : h;
    case "noon":
      return h >= 1 && h <= 5 ? h + 12 : h;
    case "morning":
      return h;
    case null:
      return h >= 1 && h <= 6 ? h + 12 : h;
  }
}

const RANGE_CONNECTOR = /^\s*(?:到|至|~|～|-|–|until|to)\s*/i;

// `day` is a midnight; hour 24 is the next day's midnight
function at(day: Date, hour: number, minute: number): Date {
  return hour === 24 ? addMinutes(addDays(day, 1), minute) : setMinutes(setHours(day, hour), minute);
}

/**
 * Resolves the date/time span a transcript talks about, using fixed rules
 * and `referenceNow`. Returns null when the text names neither a day nor a
 * time.
 */
export function resolveTimeSpan(text: string, referenceNow: LocalDateTime): ResolvedSpan | null {
  const ref = parseLocal(referenceNow);
  if (!ref) return null;

  const day = resolveDay(text, ref);
  const isAllDay = ALL_DAY_PATTERN.test(text);
  const part = detectDayPart(text);
  const clock = findClock(text);

  if (!day && !isAllDay && !part && !clock) return null;
  const base = day ?? startOfDay(ref);

  if (isAllDay) {
    return {
      startTime: formatLocal(base),
      endTime: formatLocal(addDays(base, 1)),
      isAllDay: true,
      precision: "day",
      hasExplicitEnd: false,
    };
  }

  if (!clock && !part) {
    return {
      startTime: formatLocal(base),
      endTime: formatLocal(addDays(base, 1)),
      isAllDay: false,
      precision: "day",
      hasExplicitEnd: false,
    };
  }

  const startHour = clock ? toHour24(clock, part) : DAY_PART_HOURS[part ?? "morning"];
  const start = at(base, startHour, clock ? clock.minute : 0);

  let end: Date | null = null;
  if (clock) {
    const rest = text.slice(clock.index + clock.length);
    const connector = RANGE_CONNECTOR.exec(rest);
    const second = connector ? findClock(rest.slice(connector[0].length)) : null;
    if (second && second.index === 0) {
      let endHour = toHour24(second, part);
      if (endHour * 60 + second.minute <= startHour * 60 + clock.minute && endHour < 12) {
        endHour += 12;
      }
      const candidate = at(base, endHour, second.minute);
      if (candidate > start) end = candidate;
    }
  }

  return {
    startTime: formatLocal(start),
    endTime: formatLocal(end ?? addMinutes(start, DEFAULT_EVENT_DURATION_MINUTES)),
    isAllDay: false,
    precision: "minute",
    hasExplicitEnd: end !== null,
  };
}
