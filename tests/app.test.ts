import type { FastifyInstance } from "fastify";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { buildApp } from "@/app.js";
import { InMemoryPoolRepository } from "@/features/pool/pool.repository.js";
import { ADMIN, ALICE, BOB } from "./utils/pool.js";

function headers(caller: string) {
  return { "x-api-key": "test-token", "x-caller-address": caller };
}

describe("http api", () => {
  let app: FastifyInstance;

  beforeEach(async () => {
    app = await buildApp({ repository: new InMemoryPoolRepository() });
    await app.ready();
  });

  afterEach(async () => {
    await app.close();
  });

  async function post(path: string, caller: string, payload: Record<string, string> = {}) {
    return await app.inject({ method: "POST", url: path, headers: headers(caller), payload });
  }

  async function seedPool() {
    await post("/pools", ADMIN, { poolId: "main", admin: ADMIN });
    for (const account of [ADMIN, ALICE, BOB]) {
      await post("/pools/main/assets/issue", ADMIN, { to: account, amount: "10000" });
      await post("/pools/main/assets/approve", account, { amount: "10000" });
    }
  }

  it("builds its logger from the shared pino options", () => {
    expect(app.log.level).toBe("silent");
  });

  it("answers health checks", async () => {
    const response = await app.inject({ method: "GET", url: "/health" });
    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({ ok: true });
  });

  it("requires the api key on mutating routes", async () => {
    const missing = await app.inject({ method: "POST", url: "/pools", payload: { poolId: "main", admin: ADMIN } });
    expect(missing.statusCode).toBe(401);
    expect(missing.json()).toMatchObject({ code: "missing-api-key" });

    const wrong = await app.inject({
      method: "POST",
      url: "/pools",
      headers: { "x-api-key": "other-token", "x-caller-address": ADMIN },
      payload: { poolId: "main", admin: ADMIN },
    });
    expect(wrong.statusCode).toBe(401);
    expect(wrong.json()).toMatchObject({ code: "invalid-api-key" });

    const noCaller = await app.inject({
      method: "POST",
      url: "/pools",
      headers: { "x-api-key": "test-token" },
      payload: { poolId: "main", admin: ADMIN },
    });
    expect(noCaller.json()).toMatchObject({ code: "missing-caller" });
  });

  it("reports the authenticated caller", async () => {
    const response = await app.inject({ method: "GET", url: "/auth/me", headers: headers(ALICE) });
    expect(response.json()).toEqual({ ok: true, data: { caller: ALICE } });
  });

  it("runs a deposit, proceeds and claim cycle", async () => {
    await seedPool();
    await post("/pools/main/deposit", ALICE, { amount: "1000" });
    await post("/pools/main/deposit", BOB, { amount: "3000" });

    const proceeds = await post("/pools/main/proceeds", ADMIN, { amount: "400" });
    expect(proceeds.json()).toEqual({
      ok: true,
      data: { escrowed: false, cumulativeRewardPerShare: "100000000000000000" },
    });

    const pending = await app.inject({ method: "GET", url: `/pools/main/accounts/${BOB}/pending` });
    expect(pending.json()).toEqual({ ok: true, data: { account: BOB, pendingProceeds: "300" } });

    const claim = await post("/pools/main/claim", BOB);
    expect(claim.json()).toEqual({ ok: true, data: { claimed: "300" } });

    const account = await app.inject({ method: "GET", url: `/pools/main/accounts/${BOB}` });
    expect(account.json()).toEqual({
      ok: true,
      data: {
        account: BOB,
        balance: "3000",
        pendingProceeds: "0",
        checkpoint: "100000000000000000",
        lockedProceeds: "0",
        assetBalance: "7300",
        assetAllowance: "7000",
      },
    });

    const pool = await app.inject({ method: "GET", url: "/pools/main" });
    expect(pool.json()).toMatchObject({
      data: { totalShares: "4000", totalUnderlying: "4100", totalProceedsDeposited: "400" },
    });
  });

  it("maps pool errors to http statuses", async () => {
    await seedPool();

    const zero = await post("/pools/main/deposit", ALICE, { amount: "0" });
    expect(zero.statusCode).toBe(400);
    expect(zero.json()).toMatchObject({ ok: false, code: "zero-amount" });

    const notAdmin = await post("/pools/main/proceeds", ALICE, { amount: "5" });
    expect(notAdmin.statusCode).toBe(403);
    expect(notAdmin.json()).toMatchObject({ code: "not-privileged" });

    const tooMuch = await post("/pools/main/deposit", ALICE, { amount: "10001" });
    expect(tooMuch.statusCode).toBe(422);
    expect(tooMuch.json()).toMatchObject({ code: "transfer-failed" });

    const badBody = await post("/pools/main/deposit", ALICE, { amount: "-1" });
    expect(badBody.statusCode).toBe(400);
    expect(badBody.json()).toMatchObject({ code: "validation-error" });

    const missing = await app.inject({ method: "GET", url: "/pools/other" });
    expect(missing.statusCode).toBe(404);
    expect(missing.json()).toMatchObject({ code: "pool-not-found" });
  });

  it("lists activity and audits the pool", async () => {
    await seedPool();
    await post("/pools/main/deposit", ALICE, { amount: "1" });
    await post("/pools/main/deposit", BOB, { amount: "2" });
    await post("/pools/main/proceeds", ADMIN, { amount: "10" });
    await post("/pools/main/transfer", ALICE, { to: BOB, amount: "1" });

    const activity = await app.inject({
      method: "GET",
      url: `/pools/main/activity?account=${BOB}&limit=2`,
    });
    expect(activity.json().data.map((event: { type: string; amount: string }) => [event.type, event.amount])).toEqual([
      ["proceeds.claimed", "6"],
      ["pool.deposited", "2"],
    ]);

    const audit = await app.inject({ method: "GET", url: "/pools/main/audit" });
    expect(audit.json()).toMatchObject({
      ok: true,
      data: { accountedPending: "3", dust: "1", dustBound: "2", healthy: true },
    });
  });

  it("publishes its public config", async () => {
    const response = await app.inject({ method: "GET", url: "/public/config" });
    expect(response.json()).toEqual({
      ok: true,
      data: { precision: "1000000000000000000", store: "memory", defaultPoolId: null },
    });
  });
});
