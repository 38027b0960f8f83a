import type { Address } from "viem";
import { pendingProceeds, type AccountBook } from "@/features/pool/pool.accounts.js";
import type { AssetMover } from "@/features/pool/pool.assets.js";
import type { BalanceChange, BalanceChangeHook } from "@/features/pool/pool.claims.js";
import { accruedSince, type PoolLedger } from "@/features/pool/pool.ledger.js";
import type { PoolEventInput } from "@/features/pool/pool.types.js";

type SettlementDeps = {
  ledger: PoolLedger;
  accounts: AccountBook;
  assets: AssetMover;
  balanceOf: (account: Address) => bigint;
  emit: (event: PoolEventInput) => void;
  onPaid: (amount: bigint) => void;
};

/**
 * Reconciles accounts against the global accumulator. Every write to a
 * checkpoint or to locked proceeds goes through `settle` or the balance-change hook.
 */
export class Settlement implements BalanceChangeHook {
  constructor(private readonly deps: SettlementDeps) {}

  pendingOf(account: Address): bigint {
    const { ledger, accounts, balanceOf } = this.deps;
    return pendingProceeds(ledger, accounts.get(account), balanceOf(account));
  }

  /** Pays out everything the account is owed. Returns the amount paid. */
  settle(account: Address): bigint {
    const pending = this.pendingOf(account);
    if (pending === 0n) return 0n;

    const { ledger, accounts, assets } = this.deps;
    assets.payOut(account, pending);
    accounts.set(account, { checkpoint: ledger.cumulativeRewardPerShare, lockedProceeds: 0n });
    this.deps.onPaid(pending);
    this.deps.emit({ type: "proceeds.claimed", account, amount: pending });
    return pending;
  }

  beforeBalanceChange(change: BalanceChange) {
    switch (change.kind) {
      case "mint":
        // freeze-then-mint: existing units are paid out on the balance they earned on
        if (change.oldToBalance > 0n) this.settle(change.to);
        return;
      case "burn":
        return;
      case "transfer": {
        const { ledger, accounts } = this.deps;
        const sender = accounts.get(change.from);
        accounts.set(change.from, {
          checkpoint: ledger.cumulativeRewardPerShare,
          lockedProceeds: sender.lockedProceeds + accruedSince(ledger, sender.checkpoint, change.oldFromBalance),
        });
        this.settle(change.to);
        return;
      }
    }
  }

  afterBalanceChange(change: BalanceChange) {
    if (change.kind === "burn") return;

    const { ledger, accounts } = this.deps;
    const receiver = accounts.get(change.to);
    accounts.set(change.to, { checkpoint: ledger.cumulativeRewardPerShare, lockedProceeds: receiver.lockedProceeds });
  }
}
