import type { FastifyReply, FastifyRequest } from "fastify";
import { z } from "zod";
import type { ActivityEvent } from "@/features/activity/activity.types.js";
import type { PoolEventDoc } from "@/features/pool/pool.model.js";
import type { PoolService } from "@/features/pool/pool.service.js";
import { addressPattern, asAddress } from "@/shared/viem.js";

const paramsSchema = z.object({ poolId: z.string().regex(/^[a-z0-9-]{1,64}$/) });

const querySchema = z.object({
  account: z.string().regex(addressPattern).transform((value) => asAddress(value)).optional(),
  type: z
    .enum([
      "pool.deposited",
      "pool.withdrawn",
      "proceeds.deposited",
      "proceeds.claimed",
      "first-depositor.bonus",
      "claims.transferred",
      "assets.approved",
      "assets.issued",
    ])
    .optional(),
  limit: z.coerce.number().int().min(1).max(200).default(50),
  beforeSeq: z.coerce.number().int().positive().optional(),
});

function toApi(doc: PoolEventDoc): ActivityEvent {
  return {
    poolId: doc.poolId,
    seq: doc.seq,
    type: doc.type,
    account: asAddress(doc.account),
    amount: doc.amount,
    to: doc.to ? asAddress(doc.to) : undefined,
    cumulativeRewardPerShare: doc.cumulativeRewardPerShare,
    escrowed: doc.escrowed,
    createdAt: doc.createdAt.toISOString(),
  };
}

export function createActivityController(service: PoolService) {
  return {
    async getActivity(request: FastifyRequest, reply: FastifyReply) {
      const { poolId } = paramsSchema.parse(request.params);
      const query = querySchema.parse(request.query);
      const docs = await service.listEvents(poolId, query);
      return reply.send({ ok: true, data: docs.map(toApi) });
    },
  };
}
