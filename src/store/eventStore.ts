import type { NewCalendarEvent } from "../types.js";

/** Calendar events. The pipeline only ever creates; it never updates. */
export interface EventStore {
  create(event: NewCalendarEvent): Promise<string>;
}
