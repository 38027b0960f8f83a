import type { Address } from "viem";
import type { AccountRewardState } from "@/features/pool/pool.accounts.js";
import type { AssetBook } from "@/features/pool/pool.assets.js";
import type { ClaimBook } from "@/features/pool/pool.claims.js";
import type { PoolLedger } from "@/features/pool/pool.ledger.js";

export type PoolStats = {
  totalProceedsPaid: bigint;
  proceedsInjections: number;
  /** Sum of `totalShares - 1` over every injection that raised the accumulator. */
  dustBound: bigint;
};

export type PoolState = {
  poolId: string;
  admin: Address;
  version: number;
  lastEventSeq: number;
  ledger: PoolLedger;
  stats: PoolStats;
  accounts: Map<Address, AccountRewardState>;
  claims: ClaimBook;
  assets: AssetBook;
};

export type PoolEventInput =
  | { type: "pool.deposited"; account: Address; amount: bigint }
  | { type: "pool.withdrawn"; account: Address; amount: bigint }
  | { type: "proceeds.deposited"; account: Address; amount: bigint; cumulativeRewardPerShare: bigint; escrowed: boolean }
  | { type: "proceeds.claimed"; account: Address; amount: bigint }
  | { type: "first-depositor.bonus"; account: Address; amount: bigint }
  | { type: "claims.transferred"; account: Address; to: Address; amount: bigint }
  | { type: "assets.approved"; account: Address; amount: bigint }
  | { type: "assets.issued"; account: Address; to: Address; amount: bigint };

export type PoolEventType = PoolEventInput["type"];

export type PoolEvent = PoolEventInput & {
  poolId: string;
  seq: number;
  createdAt: Date;
};

export type ContractInfo = {
  poolId: string;
  admin: Address;
  totalShares: bigint;
  totalUnderlying: bigint;
  totalProceedsDeposited: bigint;
  pendingZeroSupplyProceeds: bigint;
  cumulativeRewardPerShare: bigint;
};

export type AssetAccount = {
  assetBalance: bigint;
  assetAllowance: bigint;
};

export type UserInfo = AssetAccount & {
  account: Address;
  balance: bigint;
  pendingProceeds: bigint;
  checkpoint: bigint;
  lockedProceeds: bigint;
};

export type DepositReceipt = { minted: bigint; bonus: bigint; settled: bigint };
export type WithdrawReceipt = { burned: bigint; settled: bigint };
export type ProceedsReceipt = { escrowed: boolean; cumulativeRewardPerShare: bigint };
export type ClaimReceipt = { claimed: bigint };
export type TransferReceipt = { transferred: bigint; receiverSettled: bigint };
