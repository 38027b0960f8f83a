/** Fixed-point scale of the reward-per-share accumulator. */
export const PRECISION = 10n ** 18n;

export type PoolLedger = {
  cumulativeRewardPerShare: bigint;
  totalProceedsDeposited: bigint;
  pendingZeroSupplyProceeds: bigint;
};

export type ProceedsInjection = {
  escrowed: boolean;
  rewardPerShareDelta: bigint;
  cumulativeRewardPerShare: bigint;
};

export function createPoolLedger(): PoolLedger {
  return {
    cumulativeRewardPerShare: 0n,
    totalProceedsDeposited: 0n,
    pendingZeroSupplyProceeds: 0n,
  };
}

/**
 * Books `amount` of proceeds against the shares outstanding right now.
 * With no shares the amount is escrowed for the next depositor and the
 * accumulator stays where it is. The division floors; the remainder is lost.
 */
export function injectProceeds(ledger: PoolLedger, amount: bigint, totalShares: bigint): ProceedsInjection {
  ledger.totalProceedsDeposited += amount;

  if (totalShares === 0n) {
    ledger.pendingZeroSupplyProceeds += amount;
    return { escrowed: true, rewardPerShareDelta: 0n, cumulativeRewardPerShare: ledger.cumulativeRewardPerShare };
  }

  const rewardPerShareDelta = (amount * PRECISION) / totalShares;
  ledger.cumulativeRewardPerShare += rewardPerShareDelta;
  return { escrowed: false, rewardPerShareDelta, cumulativeRewardPerShare: ledger.cumulativeRewardPerShare };
}

/** Proceeds earned by `balance` shares since the accumulator read `checkpoint`. */
export function accruedSince(ledger: PoolLedger, checkpoint: bigint, balance: bigint): bigint {
  return ((ledger.cumulativeRewardPerShare - checkpoint) * balance) / PRECISION;
}

export function takeZeroSupplyEscrow(ledger: PoolLedger): bigint {
  const escrow = ledger.pendingZeroSupplyProceeds;
  ledger.pendingZeroSupplyProceeds = 0n;
  return escrow;
}
