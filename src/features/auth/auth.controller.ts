import type { FastifyReply, FastifyRequest } from "fastify";
import { getAuth } from "@/features/auth/auth.middleware.js";

export async function getMe(request: FastifyRequest, reply: FastifyReply) {
  const auth = getAuth(request);
  return reply.send({ ok: true, data: { caller: auth.caller } });
}
