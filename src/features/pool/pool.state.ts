import type { Address } from "viem";
import type { AccountRewardState } from "@/features/pool/pool.accounts.js";
import { createAssetBook } from "@/features/pool/pool.assets.js";
import { createClaimBook } from "@/features/pool/pool.claims.js";
import { createPoolLedger } from "@/features/pool/pool.ledger.js";
import type { PoolState } from "@/features/pool/pool.types.js";

export function createPoolState(poolId: string, admin: Address): PoolState {
  return {
    poolId,
    admin,
    version: 0,
    lastEventSeq: 0,
    ledger: createPoolLedger(),
    stats: { totalProceedsPaid: 0n, proceedsInjections: 0, dustBound: 0n },
    accounts: new Map(),
    claims: createClaimBook(),
    assets: createAssetBook(),
  };
}

export function clonePoolState(state: PoolState): PoolState {
  return {
    poolId: state.poolId,
    admin: state.admin,
    version: state.version,
    lastEventSeq: state.lastEventSeq,
    ledger: { ...state.ledger },
    stats: { ...state.stats },
    accounts: new Map(
      [...state.accounts].map(([account, entry]): [Address, AccountRewardState] => [account, { ...entry }])
    ),
    claims: { balances: new Map(state.claims.balances), totalSupply: state.claims.totalSupply },
    assets: {
      balances: new Map(state.assets.balances),
      allowances: new Map(state.assets.allowances),
      custody: state.assets.custody,
    },
  };
}
