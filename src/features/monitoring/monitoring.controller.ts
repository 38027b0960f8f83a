import type { FastifyReply, FastifyRequest } from "fastify";
import { z } from "zod";
import { auditPool, toAuditResponse } from "@/features/monitoring/monitoring.service.js";
import type { PoolService } from "@/features/pool/pool.service.js";

const paramsSchema = z.object({ poolId: z.string().regex(/^[a-z0-9-]{1,64}$/) });

export function createMonitoringController(service: PoolService) {
  return {
    async getAudit(request: FastifyRequest, reply: FastifyReply) {
      const { poolId } = paramsSchema.parse(request.params);
      const report = auditPool(await service.getState(poolId));
      if (!report.healthy) {
        request.log.warn({ poolId, dust: report.dust.toString(), custodyReconciled: report.custodyReconciled }, "pool-audit-failed");
      }
      return reply.send({ ok: true, data: toAuditResponse(report) });
    },
  };
}
