import { buildServer } from "./app.js";
import { createQueueTrigger, createVoiceQueue } from "./async/queue.js";
import { loadConfig } from "./config.js";
import { RedisJobStore } from "./store/redisJobStore.js";
import { createLogger } from "./utils/logger.js";
import { createRedisConnection, disconnectRedis } from "./utils/redis.js";

const cfg = loadConfig();
const logger = createLogger(cfg.logLevel);
const redis = createRedisConnection(cfg, logger);
const queue = createVoiceQueue(cfg);

const app = buildServer({
  jobs: new RedisJobStore(redis),
  trigger: createQueueTrigger(queue),
  logger,
  apiKey: cfg.apiKey,
});

const start = async () => {
  try {
    await redis.connect();
    await app.listen({ port: cfg.port, host: "0.0.0.0" });
  } catch (err) {
    app.log.error({ err }, "server failed to start");
    process.exit(1);
  }
};

async function shutdown(signal: string): Promise<void> {
  app.log.info({ signal }, "shutting down");
  try {
    await app.close();
    await queue.close();
  } catch (err) {
    app.log.error({ err }, "error during shutdown");
  }
  await disconnectRedis(redis, logger);
  process.exit(0);
}

process.on("SIGINT", () => void shutdown("SIGINT"));
process.on("SIGTERM", () => void shutdown("SIGTERM"));

void start();
