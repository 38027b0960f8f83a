import type { Address } from "viem";
import { AccountBook } from "@/features/pool/pool.accounts.js";
import { InMemoryAssetMover } from "@/features/pool/pool.assets.js";
import { ClaimLedger, claimBalanceOf } from "@/features/pool/pool.claims.js";
import { PoolError } from "@/features/pool/pool.errors.js";
import { injectProceeds, takeZeroSupplyEscrow } from "@/features/pool/pool.ledger.js";
import { Settlement } from "@/features/pool/pool.settlement.js";
import { clonePoolState } from "@/features/pool/pool.state.js";
import type {
  AssetAccount,
  ClaimReceipt,
  ContractInfo,
  DepositReceipt,
  PoolEventInput,
  PoolState,
  ProceedsReceipt,
  TransferReceipt,
  UserInfo,
  WithdrawReceipt,
} from "@/features/pool/pool.types.js";
import { isZeroAddress } from "@/shared/viem.js";

type OperationContext = {
  state: PoolState;
  accounts: AccountBook;
  assets: InMemoryAssetMover;
  claims: ClaimLedger;
  settlement: Settlement;
  emit: (event: PoolEventInput) => void;
  paidTo: (account: Address) => bigint;
};

function requireAccount(account: Address, label: string) {
  if (isZeroAddress(account)) throw new PoolError("zero-address", `${label} must not be the zero address`);
}

function requireAmount(amount: bigint) {
  if (amount <= 0n) throw new PoolError("zero-amount", "Amount must be greater than 0");
}

function bind(state: PoolState, emitted: PoolEventInput[]): OperationContext {
  const accounts = new AccountBook(state.accounts);
  const assets = new InMemoryAssetMover(state.assets);
  const emit = (event: PoolEventInput) => {
    emitted.push(event);
  };
  const settlement = new Settlement({
    ledger: state.ledger,
    accounts,
    assets,
    balanceOf: (account) => claimBalanceOf(state.claims, account),
    emit,
    onPaid: (amount) => {
      state.stats.totalProceedsPaid += amount;
    },
  });

  return {
    state,
    accounts,
    assets,
    claims: new ClaimLedger(state.claims, settlement),
    settlement,
    emit,
    paidTo: (account) =>
      emitted.reduce(
        (sum, event) => (event.type === "proceeds.claimed" && event.account === account ? sum + event.amount : sum),
        0n
      ),
  };
}

/**
 * Pool operations over one pool's state. Each mutating call runs against a
 * draft copy that replaces the current state only when the call returns, so a
 * rejected asset move leaves nothing behind.
 */
export class PoolEngine {
  private current: PoolState;
  private pending: PoolEventInput[] = [];

  constructor(state: PoolState) {
    this.current = state;
  }

  get state(): PoolState {
    return this.current;
  }

  /** Events of committed operations since the last drain, oldest first. */
  drainEvents(): PoolEventInput[] {
    const events = this.pending;
    this.pending = [];
    return events;
  }

  deposit(caller: Address, amount: bigint): DepositReceipt {
    requireAccount(caller, "Depositor");
    requireAmount(amount);

    return this.transact(({ state, assets, claims, emit, paidTo }) => {
      const bonus = state.claims.totalSupply === 0n ? state.ledger.pendingZeroSupplyProceeds : 0n;

      assets.pullIn(caller, amount);
      claims.mint(caller, amount);
      emit({ type: "pool.deposited", account: caller, amount });

      if (bonus > 0n) {
        takeZeroSupplyEscrow(state.ledger);
        assets.payOut(caller, bonus);
        state.stats.totalProceedsPaid += bonus;
        emit({ type: "first-depositor.bonus", account: caller, amount: bonus });
      }

      return { minted: amount, bonus, settled: paidTo(caller) };
    });
  }

  withdraw(caller: Address, amount: bigint): WithdrawReceipt {
    requireAccount(caller, "Withdrawer");
    requireAmount(amount);
    this.requireBalance(caller, amount);

    return this.transact(({ assets, claims, settlement, emit }) => {
      const settled = settlement.settle(caller);
      claims.burn(caller, amount);
      assets.payOut(caller, amount);
      emit({ type: "pool.withdrawn", account: caller, amount });
      return { burned: amount, settled };
    });
  }

  depositProceeds(caller: Address, amount: bigint): ProceedsReceipt {
    requireAccount(caller, "Caller");
    this.requireAdmin(caller);
    requireAmount(amount);

    return this.transact(({ state, assets, emit }) => {
      assets.pullIn(caller, amount);

      const totalShares = state.claims.totalSupply;
      const injection = injectProceeds(state.ledger, amount, totalShares);
      state.stats.proceedsInjections += 1;
      if (!injection.escrowed) state.stats.dustBound += totalShares - 1n;

      emit({
        type: "proceeds.deposited",
        account: caller,
        amount,
        cumulativeRewardPerShare: injection.cumulativeRewardPerShare,
        escrowed: injection.escrowed,
      });
      return { escrowed: injection.escrowed, cumulativeRewardPerShare: injection.cumulativeRewardPerShare };
    });
  }

  claimProceeds(caller: Address): ClaimReceipt {
    requireAccount(caller, "Claimant");
    return this.transact(({ settlement }) => ({ claimed: settlement.settle(caller) }));
  }

  transfer(caller: Address, to: Address, amount: bigint): TransferReceipt {
    requireAccount(caller, "Sender");
    requireAccount(to, "Receiver");
    requireAmount(amount);
    this.requireBalance(caller, amount);
    if (caller === to) return { transferred: 0n, receiverSettled: 0n };

    return this.transact(({ claims, emit, paidTo }) => {
      claims.transfer(caller, to, amount);
      emit({ type: "claims.transferred", account: caller, to, amount });
      return { transferred: amount, receiverSettled: paidTo(to) };
    });
  }

  approve(owner: Address, amount: bigint) {
    requireAccount(owner, "Owner");
    this.transact(({ assets, emit }) => {
      assets.approve(owner, amount);
      emit({ type: "assets.approved", account: owner, amount });
    });
  }

  issueAsset(caller: Address, to: Address, amount: bigint) {
    requireAccount(caller, "Caller");
    this.requireAdmin(caller);
    requireAccount(to, "Receiver");
    requireAmount(amount);

    this.transact(({ assets, emit }) => {
      assets.issue(to, amount);
      emit({ type: "assets.issued", account: caller, to, amount });
    });
  }

  getPendingProceeds(account: Address): bigint {
    return this.read().settlement.pendingOf(account);
  }

  getContractInfo(): ContractInfo {
    const { poolId, admin, ledger, claims, assets } = this.current;
    return {
      poolId,
      admin,
      totalShares: claims.totalSupply,
      totalUnderlying: assets.custody,
      totalProceedsDeposited: ledger.totalProceedsDeposited,
      pendingZeroSupplyProceeds: ledger.pendingZeroSupplyProceeds,
      cumulativeRewardPerShare: ledger.cumulativeRewardPerShare,
    };
  }

  getAssetAccount(account: Address): AssetAccount {
    const assets = new InMemoryAssetMover(this.current.assets);
    return { assetBalance: assets.balanceOf(account), assetAllowance: assets.allowanceOf(account) };
  }

  getUserInfo(account: Address): UserInfo {
    const { accounts, claims, settlement } = this.read();
    const { checkpoint, lockedProceeds } = accounts.get(account);
    return {
      account,
      balance: claims.balanceOf(account),
      pendingProceeds: settlement.pendingOf(account),
      checkpoint,
      lockedProceeds,
      ...this.getAssetAccount(account),
    };
  }

  private requireAdmin(caller: Address) {
    if (caller !== this.current.admin) {
      throw new PoolError("not-privileged", `${caller} is not the administrator of pool ${this.current.poolId}`);
    }
  }

  private requireBalance(account: Address, amount: bigint) {
    const balance = claimBalanceOf(this.current.claims, account);
    if (balance < amount) {
      throw new PoolError("insufficient-balance", `Balance ${balance} of ${account} is below ${amount}`);
    }
  }

  private read(): OperationContext {
    return bind(this.current, []);
  }

  private transact<T>(run: (context: OperationContext) => T): T {
    const draft = clonePoolState(this.current);
    const emitted: PoolEventInput[] = [];
    const result = run(bind(draft, emitted));

    this.current = draft;
    this.pending.push(...emitted);
    return result;
  }
}
