export type AuditReport = {
  poolId: string;
  accounts: number;
  proceedsInjections: number;
  totalProceedsDeposited: bigint;
  pendingZeroSupplyProceeds: bigint;
  totalProceedsPaid: bigint;
  /** Proceeds that should still be claimable: deposited minus escrowed minus paid. */
  distributable: bigint;
  accountedPending: bigint;
  dust: bigint;
  dustBound: bigint;
  custody: bigint;
  totalShares: bigint;
  custodyReconciled: boolean;
  healthy: boolean;
};

export type AuditReportResponse = {
  [K in keyof AuditReport]: AuditReport[K] extends bigint ? string : AuditReport[K];
};
