import { VENUE_SUFFIXES } from "../constants.js";

// Place after a locative verb, ending in a venue noun. Greedy, so
// "在公司會議室開會" gives "公司會議室" rather than "公司".
const LOCATIVE_PHRASE = new RegExp(
  `(?:在|去|到|於|于)([^\\s，。,.、；;：:！!？?在去到於于跟和與与]{0,20}(?:${VENUE_SUFFIXES.join("|")}))`
);

// "301會議室", "B2教室"
const NUMBERED_ROOM = /([A-Za-z]?\d{1,4}[A-Za-z]?(?:會議室|会议室|教室))/;

// "at Starbucks", "in Room 204"; the first word must be capitalised
const ENGLISH_PLACE = /\b(?:at|in)\s+(?:the\s+)?([A-Z][\w'&-]*(?:\s+[A-Z0-9][\w'&-]*)*)/;

const NOT_PLACES = new Set(["Monday", "Tuesday", "Wednesday", "Thursday", "Friday", "Saturday", "Sunday"]);

/** First place-like phrase in a transcript, or null. */
export function extractLocation(text: string): string | null {
  const phrase = LOCATIVE_PHRASE.exec(text);
  if (phrase) return phrase[1];

  const room = NUMBERED_ROOM.exec(text);
  if (room) return room[1];

  const english = ENGLISH_PLACE.exec(text);
  if (english && !NOT_PLACES.has(english[1])) return english[1];

  return null;
}
