import type { FastifyInstance } from "fastify";
import { requireCallerAuth } from "@/features/auth/auth.middleware.js";
import { getMe } from "@/features/auth/auth.controller.js";

export function registerAuthRoutes(app: FastifyInstance) {
  app.get("/auth/me", { preHandler: requireCallerAuth }, getMe);
}
