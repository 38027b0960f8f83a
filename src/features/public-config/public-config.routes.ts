import type { FastifyInstance } from "fastify";
import { env } from "@/config/env.js";
import { PRECISION } from "@/features/pool/pool.ledger.js";

export function registerPublicConfigRoutes(app: FastifyInstance) {
  app.get("/public/config", async () => ({
    ok: true,
    data: {
      precision: PRECISION.toString(),
      store: env.POOL_STORE,
      defaultPoolId: env.DEFAULT_POOL_ID ?? null,
    },
  }));
}
