import { Redis } from "ioredis";
import type { ServiceConfig } from "../config.js";
import type { Logger } from "./logger.js";

export function createRedisConnection(cfg: ServiceConfig, logger: Logger): Redis {
  const log = logger.child({ component: "redis" });
  const redis = new Redis({
    host: cfg.redisHost,
    port: cfg.redisPort,
    lazyConnect: true,
  });

  redis.on("error", (err) => {
    log.error({ err }, "Redis client error");
  });

  redis.on("connect", () => {
    log.info("Connected to Redis");
  });

  redis.on("ready", () => {
    log.info("Redis client ready");
  });

  redis.on("end", () => {
    log.info("Redis connection ended");
  });

  return redis;
}

export async function disconnectRedis(redis: Redis, logger: Logger): Promise<void> {
  try {
    await redis.quit();
    logger.info("Redis client disconnected");
  } catch (error) {
    logger.error({ err: error }, "Error disconnecting from Redis");
  }
}

type ExecResult = [error: Error | null, result: unknown][] | null;

/** Throws the first error of a MULTI/EXEC reply, or if the transaction was discarded. */
export function assertExecOk(results: ExecResult, operation: string): void {
  if (!results) {
    throw new Error(`${operation}: transaction was discarded`);
  }
  for (const [err] of results) {
    if (err) throw new Error(`${operation}: ${err.message}`, { cause: err });
  }
}
