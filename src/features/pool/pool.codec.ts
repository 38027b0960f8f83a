import type { Address } from "viem";
import { z } from "zod";
import type { PoolDoc, PoolEventDoc } from "@/features/pool/pool.model.js";
import type { PoolEvent, PoolState } from "@/features/pool/pool.types.js";
import { addressPattern, asAddress } from "@/shared/viem.js";

const uintString = z
  .string()
  .regex(/^\d+$/)
  .transform((value) => BigInt(value));

const addressString = z
  .string()
  .regex(addressPattern)
  .transform((value) => asAddress(value));

const amountEntrySchema = z.object({ account: addressString, amount: uintString });

const poolDocSchema = z.object({
  poolId: z.string().min(1),
  admin: addressString,
  version: z.number().int().nonnegative(),
  lastEventSeq: z.number().int().nonnegative(),
  ledger: z.object({
    cumulativeRewardPerShare: uintString,
    totalProceedsDeposited: uintString,
    pendingZeroSupplyProceeds: uintString,
  }),
  stats: z.object({
    totalProceedsPaid: uintString,
    proceedsInjections: z.number().int().nonnegative(),
    dustBound: uintString,
  }),
  accounts: z.array(z.object({ account: addressString, checkpoint: uintString, lockedProceeds: uintString })),
  claims: z.object({ totalSupply: uintString, balances: z.array(amountEntrySchema) }),
  assets: z.object({
    custody: uintString,
    balances: z.array(amountEntrySchema),
    allowances: z.array(amountEntrySchema),
  }),
});

function toAmountMap(entries: { account: Address; amount: bigint }[]): Map<Address, bigint> {
  return new Map(entries.map(({ account, amount }): [Address, bigint] => [account, amount]));
}

function fromAmountMap(entries: Map<Address, bigint>): { account: string; amount: string }[] {
  return [...entries].map(([account, amount]) => ({ account, amount: amount.toString() }));
}

export function fromPoolDoc(doc: unknown): PoolState {
  const parsed = poolDocSchema.parse(doc);
  return {
    poolId: parsed.poolId,
    admin: parsed.admin,
    version: parsed.version,
    lastEventSeq: parsed.lastEventSeq,
    ledger: parsed.ledger,
    stats: parsed.stats,
    accounts: new Map(
      parsed.accounts.map(({ account, checkpoint, lockedProceeds }): [Address, { checkpoint: bigint; lockedProceeds: bigint }] => [
        account,
        { checkpoint, lockedProceeds },
      ])
    ),
    claims: { totalSupply: parsed.claims.totalSupply, balances: toAmountMap(parsed.claims.balances) },
    assets: {
      custody: parsed.assets.custody,
      balances: toAmountMap(parsed.assets.balances),
      allowances: toAmountMap(parsed.assets.allowances),
    },
  };
}

export function toPoolDoc(state: PoolState, timestamps: { createdAt: Date; updatedAt: Date }): PoolDoc {
  const { ledger, stats, claims, assets } = state;
  return {
    poolId: state.poolId,
    admin: state.admin,
    version: state.version,
    lastEventSeq: state.lastEventSeq,
    ledger: {
      cumulativeRewardPerShare: ledger.cumulativeRewardPerShare.toString(),
      totalProceedsDeposited: ledger.totalProceedsDeposited.toString(),
      pendingZeroSupplyProceeds: ledger.pendingZeroSupplyProceeds.toString(),
    },
    stats: {
      totalProceedsPaid: stats.totalProceedsPaid.toString(),
      proceedsInjections: stats.proceedsInjections,
      dustBound: stats.dustBound.toString(),
    },
    accounts: [...state.accounts].map(([account, entry]) => ({
      account,
      checkpoint: entry.checkpoint.toString(),
      lockedProceeds: entry.lockedProceeds.toString(),
    })),
    claims: { totalSupply: claims.totalSupply.toString(), balances: fromAmountMap(claims.balances) },
    assets: {
      custody: assets.custody.toString(),
      balances: fromAmountMap(assets.balances),
      allowances: fromAmountMap(assets.allowances),
    },
    createdAt: timestamps.createdAt,
    updatedAt: timestamps.updatedAt,
  };
}

export function toPoolEventDoc(event: PoolEvent): PoolEventDoc {
  const doc: PoolEventDoc = {
    poolId: event.poolId,
    seq: event.seq,
    type: event.type,
    account: event.account,
    amount: event.amount.toString(),
    createdAt: event.createdAt,
  };

  switch (event.type) {
    case "claims.transferred":
    case "assets.issued":
      doc.to = event.to;
      break;
    case "proceeds.deposited":
      doc.cumulativeRewardPerShare = event.cumulativeRewardPerShare.toString();
      doc.escrowed = event.escrowed;
      break;
    default:
      break;
  }

  return doc;
}
