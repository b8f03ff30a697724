import Fastify from "fastify";
import type { JobTrigger } from "./async/queue.js";
import { CreateJobBodySchema } from "./schemas.js";
import type { JobStore } from "./store/jobStore.js";
import {
  AppError,
  BadRequestError,
  NotFoundError,
  ServiceUnavailableError,
  UnauthorizedError,
} from "./utils/errors.js";
import type { Logger } from "./utils/logger.js";

export interface AppDeps {
  jobs: JobStore;
  trigger: JobTrigger;
  logger: Logger;
  apiKey: string | null;
}

export function buildServer({ jobs, trigger, logger, apiKey }: AppDeps) {
  const app = Fastify({ logger });

  // API key guard for /v1/*, only when a key is configured
  app.addHook("preHandler", async (request) => {
    if (!apiKey || !request.url.startsWith("/v1/")) return;
    if (request.headers["x-api-key"] !== apiKey) {
      throw new UnauthorizedError();
    }
  });

  app.setErrorHandler((err, request, reply) => {
    if (err instanceof AppError) {
      return reply.code(err.statusCode).send(err.toJSON());
    }
    // fastify's own 4xx, e.g. a body that is not JSON
    if (err.statusCode !== undefined && err.statusCode >= 400 && err.statusCode < 500) {
      return reply.code(err.statusCode).send({ error: err.message, code: err.code || "BAD_REQUEST" });
    }
    request.log.error({ err }, "unhandled request error");
    return reply.code(500).send({ error: "Internal server error", code: "INTERNAL" });
  });

  app.post("/v1/voice-jobs", async (request, reply) => {
    const parsed = CreateJobBodySchema.safeParse(request.body);
    if (!parsed.success) {
      throw new BadRequestError(
        "Invalid request body",
        parsed.error.issues.map((i) => ({ path: i.path.join("."), message: i.message }))
      );
    }

    const job = await jobs.create(parsed.data);
    try {
      await trigger.enqueue(job.id);
    } catch (err) {
      // The job stays pending; a client may resubmit
      request.log.error({ err, jobId: job.id }, "failed to enqueue voice job");
      throw new ServiceUnavailableError(`Job ${job.id} was stored but could not be queued`);
    }

    request.log.info({ jobId: job.id, userId: job.userId }, "voice job accepted");
    return reply.code(202).send({
      jobId: job.id,
      status: job.status,
      statusUrl: `${request.protocol}://${request.hostname}/v1/voice-jobs/${job.id}`,
    });
  });

  app.get<{ Params: { jobId: string } }>("/v1/voice-jobs/:jobId", async (request, reply) => {
    const job = await jobs.get(request.params.jobId);
    if (!job) {
      throw new NotFoundError("Job not found");
    }
    return reply.code(200).send(job);
  });

  app.get("/healthz", async () => ({ ok: true }));

  return app;
}
