import type { FastifyInstance } from "fastify";
import { createActivityController } from "@/features/activity/activity.controller.js";
import type { PoolService } from "@/features/pool/pool.service.js";

export function registerActivityRoutes(app: FastifyInstance, service: PoolService) {
  const controller = createActivityController(service);
  app.get("/pools/:poolId/activity", controller.getActivity);
}
