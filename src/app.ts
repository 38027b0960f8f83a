import fastify, { type FastifyInstance } from "fastify";
import cors from "@fastify/cors";
import { z } from "zod";
import { env } from "@/config/env.js";
import { logger, loggerOptions } from "@/config/logger.js";
import { connectMongo } from "@/db/mongodb.js";
import { registerAuthRoutes } from "@/features/auth/auth.routes.js";
import { registerActivityRoutes } from "@/features/activity/activity.routes.js";
import { registerMonitoringRoutes } from "@/features/monitoring/monitoring.routes.js";
import { isPoolError, poolErrorStatus } from "@/features/pool/pool.errors.js";
import { InMemoryPoolRepository, MongoPoolRepository, type PoolRepository } from "@/features/pool/pool.repository.js";
import { registerPoolRoutes } from "@/features/pool/pool.routes.js";
import { PoolService } from "@/features/pool/pool.service.js";
import { registerPublicConfigRoutes } from "@/features/public-config/public-config.routes.js";
import { HttpError } from "@/shared/http-errors.js";
import { asAddress } from "@/shared/viem.js";

export type BuildAppOptions = {
  repository?: PoolRepository;
};

async function createRepository(): Promise<PoolRepository> {
  if (env.POOL_STORE === "mongo") return MongoPoolRepository.fromDb(await connectMongo());
  return new InMemoryPoolRepository();
}

export async function buildApp(options: BuildAppOptions = {}): Promise<FastifyInstance> {
  const app = fastify({
    logger: loggerOptions,
    requestTimeout: 30_000,
  });

  await app.register(cors, {
    origin: env.CORS_ORIGIN ?? true,
    credentials: true,
  });

  app.decorateRequest("auth", null);

  const repository = options.repository ?? (await createRepository());
  const service = new PoolService(repository, logger);

  if (env.DEFAULT_POOL_ID && env.DEFAULT_POOL_ADMIN) {
    await service.ensurePool(env.DEFAULT_POOL_ID, asAddress(env.DEFAULT_POOL_ADMIN));
  }

  app.get("/health", async () => ({ ok: true }));

  registerAuthRoutes(app);
  registerPoolRoutes(app, service);
  registerActivityRoutes(app, service);
  registerMonitoringRoutes(app, service);
  registerPublicConfigRoutes(app);

  app.setErrorHandler((error, request, reply) => {
    if (error instanceof HttpError) {
      return reply.status(error.statusCode).send({ ok: false, code: error.code, message: error.message });
    }
    if (isPoolError(error)) {
      return reply.status(poolErrorStatus[error.code]).send({ ok: false, code: error.code, message: error.message });
    }
    if (error instanceof z.ZodError) {
      return reply.status(400).send({ ok: false, code: "validation-error", issues: error.issues });
    }
    request.log.error({ error }, "unhandled-error");
    return reply.status(500).send({ ok: false, code: "internal", message: "Internal server error" });
  });

  return app;
}
