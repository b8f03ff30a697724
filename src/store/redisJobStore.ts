import type { Redis } from "ioredis";
import { VoiceJobSchema } from "../schemas.js";
import type {
  ConditionalUpdateResult,
  JobPatch,
  JobStatus,
  NewVoiceJob,
  VoiceProcessingJob,
} from "../types.js";
import { assertExecOk } from "../utils/redis.js";
import { buildPendingJob, isAllowedTransition, type JobStore } from "./jobStore.js";

// Job hash: one field per job property, each value JSON-encoded.
// Status index: one sorted set per status, scored by the time the job entered it.
export function jobKey(id: string): string {
  return `voice:job:${id}`;
}

export function statusIndexKey(status: JobStatus): string {
  return `voice:jobs:status:${status}`;
}

/*
 * KEYS[1] job hash, KEYS[2] index of the expected status, KEYS[3] index of the next status
 * ARGV[1] expected status (JSON), ARGV[2] index score, ARGV[3] job id, ARGV[4..] field/value pairs
 * Returns -1 when the job is missing, 0 on status mismatch, otherwise the
 * updated hash as a flat [field, value, ...] array.
 */
const CONDITIONAL_UPDATE_SCRIPT = `
if redis.call("EXISTS", KEYS[1]) == 0 then return -1 end
if redis.call("HGET", KEYS[1], "status") ~= ARGV[1] then return 0 end
for i = 4, #ARGV, 2 do
  redis.call("HSET", KEYS[1], ARGV[i], ARGV[i + 1])
end
if KEYS[2] ~= KEYS[3] then
  redis.call("ZREM", KEYS[2], ARGV[3])
  redis.call("ZADD", KEYS[3], ARGV[2], ARGV[3])
end
local out = {}
for _, field in ipairs(redis.call("HKEYS", KEYS[1])) do
  out[#out + 1] = field
  out[#out + 1] = redis.call("HGET", KEYS[1], field)
end
return out
`;

export function encodeHash(fields: object): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [field, value] of Object.entries(fields)) {
    if (value === undefined) continue;
    out[field] = JSON.stringify(value);
  }
  return out;
}

export function decodeJob(hash: Record<string, string>): VoiceProcessingJob | null {
  const fields = Object.entries(hash);
  if (fields.length === 0) return null;

  const raw: Record<string, unknown> = {};
  for (const [field, value] of fields) {
    try {
      raw[field] = JSON.parse(value);
    } catch (err) {
      throw new Error(`stored job field "${field}" is not valid JSON`, { cause: err });
    }
  }

  const parsed = VoiceJobSchema.safeParse(raw);
  if (!parsed.success) {
    throw new Error(`stored job failed validation: ${parsed.error.message}`);
  }
  return parsed.data;
}

// Script replies list a hash as [field, value, ...]
export function pairsToHash(reply: readonly unknown[]): Record<string, string> {
  const hash: Record<string, string> = {};
  for (let i = 0; i + 1 < reply.length; i += 2) {
    const field = reply[i];
    const value = reply[i + 1];
    if (typeof field === "string" && typeof value === "string") {
      hash[field] = value;
    }
  }
  return hash;
}

export class RedisJobStore implements JobStore {
  constructor(
    private readonly redis: Redis,
    private readonly clock: () => Date = () => new Date()
  ) {}

  async create(input: NewVoiceJob): Promise<VoiceProcessingJob> {
    const job = buildPendingJob(input, this.clock());
    const results = await this.redis
      .multi()
      .hset(jobKey(job.id), encodeHash(job))
      .zadd(statusIndexKey("pending"), Date.parse(job.createdAt), job.id)
      .exec();
    assertExecOk(results, "create job");
    return job;
  }

  async get(id: string): Promise<VoiceProcessingJob | null> {
    const hash = await this.redis.hgetall(jobKey(id));
    return decodeJob(hash);
  }

  async conditionalUpdate(id: string, expected: JobStatus, patch: JobPatch): Promise<ConditionalUpdateResult> {
    if (!isAllowedTransition(expected, patch)) {
      return { ok: false, reason: "invalid_transition" };
    }

    const now = this.clock();
    const next = patch.status ?? expected;
    const fields = encodeHash({ ...patch, status: next, updatedAt: now.toISOString() });

    const reply = await this.redis.eval(
      CONDITIONAL_UPDATE_SCRIPT,
      3,
      jobKey(id),
      statusIndexKey(expected),
      statusIndexKey(next),
      JSON.stringify(expected),
      now.getTime(),
      id,
      ...Object.entries(fields).flat()
    );

    if (reply === -1) return { ok: false, reason: "not_found" };
    if (reply === 0 || !Array.isArray(reply)) return { ok: false, reason: "conflict" };

    const job = decodeJob(pairsToHash(reply));
    if (!job) return { ok: false, reason: "not_found" };
    return { ok: true, job };
  }

  async listByStatus(status: JobStatus): Promise<VoiceProcessingJob[]> {
    const ids = await this.redis.zrange(statusIndexKey(status), 0, -1);
    const jobs = await Promise.all(ids.map((id) => this.get(id)));
    // The index can briefly lag a concurrent transition
    return jobs.filter((job): job is VoiceProcessingJob => job !== null && job.status === status);
  }
}
