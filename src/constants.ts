/**
 * Model defaults and the time-resolution policy shared by the extraction
 * prompt and the rule-based enhancer. Both read from here so the model and
 * the deterministic pass resolve "下午" to the same hour.
 */

export const DEFAULT_TRANSCRIPTION_MODEL = "whisper-1";
export const DEFAULT_EXTRACTION_MODEL = "gpt-4o-mini";

// Upload cap of the hosted Whisper endpoint
export const DEFAULT_MAX_AUDIO_BYTES = 25 * 1024 * 1024;

export const DEFAULT_REMINDER_MINUTES = 15;
export const DEFAULT_EVENT_DURATION_MINUTES = 60;

// Extension -> upload mime type
export const SUPPORTED_AUDIO_FORMATS = {
  flac: "audio/flac",
  m4a: "audio/mp4",
  mp3: "audio/mpeg",
  mp4: "audio/mp4",
  mpeg: "audio/mpeg",
  mpga: "audio/mpeg",
  oga: "audio/ogg",
  ogg: "audio/ogg",
  wav: "audio/wav",
  webm: "audio/webm",
} as const;

export type AudioExtension = keyof typeof SUPPORTED_AUDIO_FORMATS;

export function isSupportedAudioExtension(ext: string): ext is AudioExtension {
  return Object.prototype.hasOwnProperty.call(SUPPORTED_AUDIO_FORMATS, ext);
}

// Canonical hour for a time-of-day word said without a clock time
export const DAY_PART_HOURS = {
  earlyMorning: 5,
  morning: 9,
  noon: 12,
  afternoon: 14,
  evening: 19,
  night: 21,
} as const;

export type DayPart = keyof typeof DAY_PART_HOURS;

// Longer words first so "今晚" is not read as a bare "晚"
export const DAY_PART_WORDS: ReadonlyArray<readonly [string, DayPart]> = [
  ["凌晨", "earlyMorning"],
  ["清晨", "earlyMorning"],
  ["early morning", "earlyMorning"],
  ["早上", "morning"],
  ["上午", "morning"],
  ["早晨", "morning"],
  ["今早", "morning"],
  ["morning", "morning"],
  ["中午", "noon"],
  ["noon", "noon"],
  ["lunchtime", "noon"],
  ["下午", "afternoon"],
  ["afternoon", "afternoon"],
  ["傍晚", "evening"],
  ["晚上", "evening"],
  ["今晚", "evening"],
  ["evening", "evening"],
  ["tonight", "evening"],
  ["深夜", "night"],
  ["半夜", "night"],
  ["night", "night"],
];

export const ALL_DAY_PATTERN = /全天|整天|休假|請假|请假|all[- ]day|day off/i;

export const WEEKDAY_NAMES_EN = [
  "monday",
  "tuesday",
  "wednesday",
  "thursday",
  "friday",
  "saturday",
  "sunday",
] as const;

// Index 0 = Monday, matching WEEKDAY_NAMES_EN
export const WEEKDAY_CHARS_ZH = ["一", "二", "三", "四", "五", "六", "日"] as const;

// Nouns that end a place name in spoken Mandarin
export const VENUE_SUFFIXES = [
  "會議室",
  "会议室",
  "辦公室",
  "办公室",
  "咖啡廳",
  "咖啡店",
  "餐廳",
  "餐厅",
  "公司",
  "學校",
  "学校",
  "教室",
  "醫院",
  "医院",
  "診所",
  "诊所",
  "捷運站",
  "車站",
  "车站",
  "機場",
  "机场",
  "大樓",
  "大楼",
  "公園",
  "公园",
  "圖書館",
  "图书馆",
  "體育館",
  "飯店",
  "酒店",
] as const;
