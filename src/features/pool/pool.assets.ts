import type { Address } from "viem";
import { PoolError } from "@/features/pool/pool.errors.js";

/** Moves underlying units between accounts and pool custody. Throws `transfer-failed` when a move is rejected. */
export interface AssetMover {
  pullIn(from: Address, amount: bigint): void;
  payOut(to: Address, amount: bigint): void;
  custodyBalance(): bigint;
}

export type AssetBook = {
  balances: Map<Address, bigint>;
  allowances: Map<Address, bigint>;
  custody: bigint;
};

export function createAssetBook(): AssetBook {
  return { balances: new Map(), allowances: new Map(), custody: 0n };
}

/**
 * Underlying asset held in process. Accounts grant the pool an allowance and
 * the pool pulls against it; payouts come out of custody.
 */
export class InMemoryAssetMover implements AssetMover {
  constructor(private readonly book: AssetBook) {}

  balanceOf(account: Address): bigint {
    return this.book.balances.get(account) ?? 0n;
  }

  allowanceOf(owner: Address): bigint {
    return this.book.allowances.get(owner) ?? 0n;
  }

  custodyBalance(): bigint {
    return this.book.custody;
  }

  approve(owner: Address, amount: bigint) {
    this.book.allowances.set(owner, amount);
  }

  issue(to: Address, amount: bigint) {
    this.book.balances.set(to, this.balanceOf(to) + amount);
  }

  pullIn(from: Address, amount: bigint) {
    const balance = this.balanceOf(from);
    const allowance = this.allowanceOf(from);
    if (allowance < amount) {
      throw new PoolError("transfer-failed", `Allowance ${allowance} of ${from} is below ${amount}`);
    }
    if (balance < amount) {
      throw new PoolError("transfer-failed", `Balance ${balance} of ${from} is below ${amount}`);
    }

    this.book.balances.set(from, balance - amount);
    this.book.allowances.set(from, allowance - amount);
    this.book.custody += amount;
  }

  payOut(to: Address, amount: bigint) {
    if (this.book.custody < amount) {
      throw new PoolError("transfer-failed", `Custody ${this.book.custody} cannot cover ${amount}`);
    }

    this.book.custody -= amount;
    this.book.balances.set(to, this.balanceOf(to) + amount);
  }
}
