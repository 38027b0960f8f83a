import type { PoolEventType } from "@/features/pool/pool.types.js";

export type ActivityEvent = {
  poolId: string;
  seq: number;
  type: PoolEventType;
  account: `0x${string}`;
  amount: string;
  to?: `0x${string}`;
  cumulativeRewardPerShare?: string;
  escrowed?: boolean;
  createdAt: string;
};
