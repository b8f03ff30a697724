import crypto from "node:crypto";
import type { Redis } from "ioredis";
import type { NewCalendarEvent } from "../types.js";
import { assertExecOk } from "../utils/redis.js";
import type { EventStore } from "./eventStore.js";

// Consumed by notification scheduling, outside this service
export const EVENTS_CREATED_STREAM = "events:created";

export function eventKey(id: string): string {
  return `event:${id}`;
}

export class RedisEventStore implements EventStore {
  constructor(private readonly redis: Redis) {}

  // Record and stream entry are written in one MULTI, so the event is
  // announced only once it is stored.
  async create(event: NewCalendarEvent): Promise<string> {
    const id = crypto.randomUUID();
    const results = await this.redis
      .multi()
      .set(eventKey(id), JSON.stringify({ ...event, id }))
      .sadd(`user:${event.userId}:events`, id)
      .xadd(EVENTS_CREATED_STREAM, "*", "eventId", id, "userId", event.userId)
      .exec();
    assertExecOk(results, "create event");
    return id;
  }
}
