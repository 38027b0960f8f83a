import { describe, expect, it } from "vitest";
import { fromPoolDoc, toPoolDoc, toPoolEventDoc } from "@/features/pool/pool.codec.js";
import { ADMIN, ALICE, BOB, createFundedEngine } from "./utils/pool.js";

const createdAt = new Date("2026-01-01T00:00:00.000Z");

describe("pool document codec", () => {
  it("stores amounts as decimal strings and reads them back as bigints", () => {
    const engine = createFundedEngine();
    engine.deposit(ALICE, 1000n);
    engine.depositProceeds(ADMIN, 1n);

    const doc = toPoolDoc(engine.state, { createdAt, updatedAt: createdAt });
    expect(doc.ledger.cumulativeRewardPerShare).toBe("1000000000000000");
    expect(doc.claims).toEqual({ totalSupply: "1000", balances: [{ account: ALICE, amount: "1000" }] });

    const restored = fromPoolDoc(JSON.parse(JSON.stringify(doc)));
    expect(restored.ledger).toEqual(engine.state.ledger);
    expect(restored.accounts.get(ALICE)).toEqual({ checkpoint: 0n, lockedProceeds: 0n });
    expect(restored.assets.custody).toBe(1001n);
    expect(restored.assets.allowances.get(BOB)).toBe(1_000_000n);
  });

  it("checksums stored addresses", () => {
    const engine = createFundedEngine();
    const doc = toPoolDoc(engine.state, { createdAt, updatedAt: createdAt });
    doc.admin = "0x52908400098527886e0f7030069857d2e4169ee7";

    expect(fromPoolDoc(doc).admin).toBe("0x52908400098527886E0F7030069857D2E4169EE7");
  });

  it("rejects a document with a negative or fractional amount", () => {
    const doc = toPoolDoc(createFundedEngine().state, { createdAt, updatedAt: createdAt });

    expect(() => fromPoolDoc({ ...doc, ledger: { ...doc.ledger, totalProceedsDeposited: "-5" } })).toThrow();
    expect(() => fromPoolDoc({ ...doc, assets: { ...doc.assets, custody: "1.5" } })).toThrow();
  });

  it("keeps event-specific fields", () => {
    const transfer = toPoolEventDoc({
      type: "claims.transferred",
      account: ALICE,
      to: BOB,
      amount: 5n,
      poolId: "test-pool",
      seq: 7,
      createdAt,
    });
    const proceeds = toPoolEventDoc({
      type: "proceeds.deposited",
      account: ADMIN,
      amount: 9n,
      cumulativeRewardPerShare: 3n,
      escrowed: false,
      poolId: "test-pool",
      seq: 8,
      createdAt,
    });

    expect(transfer).toEqual({
      poolId: "test-pool",
      seq: 7,
      type: "claims.transferred",
      account: ALICE,
      amount: "5",
      to: BOB,
      createdAt,
    });
    expect(proceeds).toMatchObject({ cumulativeRewardPerShare: "3", escrowed: false });
    expect(proceeds.to).toBeUndefined();
  });
});
