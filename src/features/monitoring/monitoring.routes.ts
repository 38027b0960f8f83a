import type { FastifyInstance } from "fastify";
import { createMonitoringController } from "@/features/monitoring/monitoring.controller.js";
import type { PoolService } from "@/features/pool/pool.service.js";

export function registerMonitoringRoutes(app: FastifyInstance, service: PoolService) {
  const controller = createMonitoringController(service);
  app.get("/pools/:poolId/audit", controller.getAudit);
}
