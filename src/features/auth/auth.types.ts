import type { Address } from "viem";

export type AuthContext = {
  caller: Address;
};

declare module "fastify" {
  interface FastifyRequest {
    auth: AuthContext | null;
  }
}
