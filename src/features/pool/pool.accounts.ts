import type { Address } from "viem";
import { accruedSince, type PoolLedger } from "@/features/pool/pool.ledger.js";

export type AccountRewardState = {
  checkpoint: bigint;
  lockedProceeds: bigint;
};

export function emptyAccountState(): AccountRewardState {
  return { checkpoint: 0n, lockedProceeds: 0n };
}

/**
 * Per-account reward checkpoints. Accounts are never created explicitly:
 * reading an unknown account yields the zero record, and a fully withdrawn
 * account keeps whatever record it was left with.
 */
export class AccountBook {
  private readonly entries: Map<Address, AccountRewardState>;

  constructor(entries: Map<Address, AccountRewardState> = new Map()) {
    this.entries = entries;
  }

  get(account: Address): AccountRewardState {
    return this.entries.get(account) ?? emptyAccountState();
  }

  set(account: Address, state: AccountRewardState) {
    this.entries.set(account, { checkpoint: state.checkpoint, lockedProceeds: state.lockedProceeds });
  }

  accounts(): Address[] {
    return [...this.entries.keys()];
  }

  toMap(): Map<Address, AccountRewardState> {
    return this.entries;
  }
}

export function pendingProceeds(ledger: PoolLedger, state: AccountRewardState, balance: bigint): bigint {
  return state.lockedProceeds + accruedSince(ledger, state.checkpoint, balance);
}
