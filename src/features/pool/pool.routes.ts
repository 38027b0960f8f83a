import type { FastifyInstance } from "fastify";
import { requireCallerAuth } from "@/features/auth/auth.middleware.js";
import { createPoolController } from "@/features/pool/pool.controller.js";
import type { PoolService } from "@/features/pool/pool.service.js";

export function registerPoolRoutes(app: FastifyInstance, service: PoolService) {
  const controller = createPoolController(service);

  app.post("/pools", { preHandler: requireCallerAuth }, controller.postPool);
  app.get("/pools/:poolId", controller.getPool);
  app.get("/pools/:poolId/accounts/:account", controller.getAccount);
  app.get("/pools/:poolId/accounts/:account/pending", controller.getPending);

  app.post("/pools/:poolId/deposit", { preHandler: requireCallerAuth }, controller.postDeposit);
  app.post("/pools/:poolId/withdraw", { preHandler: requireCallerAuth }, controller.postWithdraw);
  app.post("/pools/:poolId/proceeds", { preHandler: requireCallerAuth }, controller.postProceeds);
  app.post("/pools/:poolId/claim", { preHandler: requireCallerAuth }, controller.postClaim);
  app.post("/pools/:poolId/transfer", { preHandler: requireCallerAuth }, controller.postTransfer);

  app.post("/pools/:poolId/assets/approve", { preHandler: requireCallerAuth }, controller.postApprove);
  app.post("/pools/:poolId/assets/issue", { preHandler: requireCallerAuth }, controller.postIssue);
}
