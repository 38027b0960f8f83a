import type { PoolEventType } from "@/features/pool/pool.types.js";

export type PoolDoc = {
  poolId: string;
  admin: string;
  version: number;
  lastEventSeq: number;
  ledger: {
    cumulativeRewardPerShare: string;
    totalProceedsDeposited: string;
    pendingZeroSupplyProceeds: string;
  };
  stats: {
    totalProceedsPaid: string;
    proceedsInjections: number;
    dustBound: string;
  };
  accounts: { account: string; checkpoint: string; lockedProceeds: string }[];
  claims: {
    totalSupply: string;
    balances: { account: string; amount: string }[];
  };
  assets: {
    custody: string;
    balances: { account: string; amount: string }[];
    allowances: { account: string; amount: string }[];
  };
  createdAt: Date;
  updatedAt: Date;
};

export type PoolEventDoc = {
  poolId: string;
  seq: number;
  type: PoolEventType;
  account: string;
  amount: string;
  to?: string;
  cumulativeRewardPerShare?: string;
  escrowed?: boolean;
  createdAt: Date;
};
