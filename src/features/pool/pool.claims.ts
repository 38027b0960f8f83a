import type { Address } from "viem";
import { PoolError } from "@/features/pool/pool.errors.js";
import { isZeroAddress } from "@/shared/viem.js";

export type BalanceChange =
  | { kind: "mint"; from: null; to: Address; amount: bigint; oldFromBalance: 0n; oldToBalance: bigint }
  | { kind: "burn"; from: Address; to: null; amount: bigint; oldFromBalance: bigint; oldToBalance: 0n }
  | { kind: "transfer"; from: Address; to: Address; amount: bigint; oldFromBalance: bigint; oldToBalance: bigint };

/**
 * Called by the claim ledger around every balance change: `beforeBalanceChange`
 * sees the old balances, `afterBalanceChange` runs once the new ones are committed.
 */
export interface BalanceChangeHook {
  beforeBalanceChange(change: BalanceChange): void;
  afterBalanceChange(change: BalanceChange): void;
}

export type ClaimBook = {
  balances: Map<Address, bigint>;
  totalSupply: bigint;
};

export function createClaimBook(): ClaimBook {
  return { balances: new Map(), totalSupply: 0n };
}

export function claimBalanceOf(book: ClaimBook, account: Address): bigint {
  return book.balances.get(account) ?? 0n;
}

export class ClaimLedger {
  constructor(
    private readonly book: ClaimBook,
    private readonly hook: BalanceChangeHook
  ) {}

  get totalSupply(): bigint {
    return this.book.totalSupply;
  }

  balanceOf(account: Address): bigint {
    return claimBalanceOf(this.book, account);
  }

  mint(to: Address, amount: bigint) {
    if (isZeroAddress(to)) throw new PoolError("zero-address", "Cannot mint to the zero address");

    const change: BalanceChange = {
      kind: "mint",
      from: null,
      to,
      amount,
      oldFromBalance: 0n,
      oldToBalance: this.balanceOf(to),
    };
    this.hook.beforeBalanceChange(change);
    this.book.balances.set(to, change.oldToBalance + amount);
    this.book.totalSupply += amount;
    this.hook.afterBalanceChange(change);
  }

  burn(from: Address, amount: bigint) {
    const oldFromBalance = this.balanceOf(from);
    if (oldFromBalance < amount) {
      throw new PoolError("insufficient-balance", `Cannot burn ${amount} from a balance of ${oldFromBalance}`);
    }

    const change: BalanceChange = { kind: "burn", from, to: null, amount, oldFromBalance, oldToBalance: 0n };
    this.hook.beforeBalanceChange(change);
    this.book.balances.set(from, oldFromBalance - amount);
    this.book.totalSupply -= amount;
    this.hook.afterBalanceChange(change);
  }

  transfer(from: Address, to: Address, amount: bigint) {
    if (isZeroAddress(to)) throw new PoolError("zero-address", "Cannot transfer to the zero address");
    if (amount === 0n) throw new PoolError("zero-amount", "Transfer amount must be greater than 0");

    const oldFromBalance = this.balanceOf(from);
    if (oldFromBalance < amount) {
      throw new PoolError("insufficient-balance", `Cannot transfer ${amount} from a balance of ${oldFromBalance}`);
    }
    if (from === to) return;

    const change: BalanceChange = {
      kind: "transfer",
      from,
      to,
      amount,
      oldFromBalance,
      oldToBalance: this.balanceOf(to),
    };
    this.hook.beforeBalanceChange(change);
    this.book.balances.set(from, oldFromBalance - amount);
    this.book.balances.set(to, change.oldToBalance + amount);
    this.hook.afterBalanceChange(change);
  }
}
