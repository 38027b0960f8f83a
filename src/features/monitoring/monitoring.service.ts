import type { Address } from "viem";
import { pendingProceeds, AccountBook } from "@/features/pool/pool.accounts.js";
import { claimBalanceOf } from "@/features/pool/pool.claims.js";
import type { PoolState } from "@/features/pool/pool.types.js";
import type { AuditReport, AuditReportResponse } from "@/features/monitoring/monitoring.types.js";

/**
 * Walks every known account and checks the conservation invariant:
 * the sum of pending proceeds may fall short of what was distributed only by
 * the floor-division dust, and custody must hold principal, escrow, pending and dust.
 */
export function auditPool(state: PoolState): AuditReport {
  const { ledger, stats, claims, assets } = state;
  const book = new AccountBook(state.accounts);
  const known = new Set<Address>([...state.accounts.keys(), ...claims.balances.keys()]);

  let accountedPending = 0n;
  for (const account of known) {
    accountedPending += pendingProceeds(ledger, book.get(account), claimBalanceOf(claims, account));
  }

  const distributable = ledger.totalProceedsDeposited - ledger.pendingZeroSupplyProceeds - stats.totalProceedsPaid;
  const dust = distributable - accountedPending;
  const custodyReconciled =
    assets.custody === claims.totalSupply + ledger.pendingZeroSupplyProceeds + accountedPending + dust;

  return {
    poolId: state.poolId,
    accounts: known.size,
    proceedsInjections: stats.proceedsInjections,
    totalProceedsDeposited: ledger.totalProceedsDeposited,
    pendingZeroSupplyProceeds: ledger.pendingZeroSupplyProceeds,
    totalProceedsPaid: stats.totalProceedsPaid,
    distributable,
    accountedPending,
    dust,
    dustBound: stats.dustBound,
    custody: assets.custody,
    totalShares: claims.totalSupply,
    custodyReconciled,
    healthy: custodyReconciled && dust >= 0n && dust <= stats.dustBound,
  };
}

export function toAuditResponse(report: AuditReport): AuditReportResponse {
  return {
    ...report,
    totalProceedsDeposited: report.totalProceedsDeposited.toString(),
    pendingZeroSupplyProceeds: report.pendingZeroSupplyProceeds.toString(),
    totalProceedsPaid: report.totalProceedsPaid.toString(),
    distributable: report.distributable.toString(),
    accountedPending: report.accountedPending.toString(),
    dust: report.dust.toString(),
    dustBound: report.dustBound.toString(),
    custody: report.custody.toString(),
    totalShares: report.totalShares.toString(),
  };
}
