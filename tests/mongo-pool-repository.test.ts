import { describe, expect, it, vi } from "vitest";
import { MongoPoolRepository } from "@/features/pool/pool.repository.js";
import { createPoolState } from "@/features/pool/pool.state.js";
import type { PoolEvent } from "@/features/pool/pool.types.js";
import { ADMIN, ALICE } from "./utils/pool.js";

const POOL = "mongo-pool";

function committedState() {
  const state = createPoolState(POOL, ADMIN);
  state.version = 4;
  state.lastEventSeq = 8;
  return state;
}

const events: PoolEvent[] = [
  { type: "pool.deposited", account: ALICE, amount: 10n, poolId: POOL, seq: 7, createdAt: new Date(0) },
  { type: "assets.approved", account: ALICE, amount: 0n, poolId: POOL, seq: 8, createdAt: new Date(0) },
];

function createCollections() {
  const pools = {
    findOne: vi.fn(),
    insertOne: vi.fn(),
    updateOne: vi.fn().mockResolvedValue({ matchedCount: 1 }),
  };
  const eventLog = {
    find: vi.fn(),
    insertMany: vi.fn().mockResolvedValue({ insertedCount: 2 }),
    deleteMany: vi.fn().mockResolvedValue({ deletedCount: 0 }),
  };
  return { pools, eventLog, repository: new MongoPoolRepository(pools, eventLog) };
}

function insertedIds(insertMany: ReturnType<typeof vi.fn>) {
  const [docs] = insertMany.mock.calls[0];
  return docs.map((doc: { _id: unknown }) => doc._id);
}

describe("MongoPoolRepository.save", () => {
  it("writes the events before the versioned pool update", async () => {
    const { pools, eventLog, repository } = createCollections();

    await repository.save(committedState(), 3, events);

    expect(eventLog.insertMany).toHaveBeenCalledTimes(1);
    expect(eventLog.insertMany.mock.calls[0][0].map((doc: { seq: number }) => doc.seq)).toEqual([7, 8]);
    expect(pools.updateOne).toHaveBeenCalledWith(
      { poolId: POOL, version: 3 },
      { $set: expect.objectContaining({ version: 4, lastEventSeq: 8 }) }
    );
    expect(eventLog.insertMany.mock.invocationCallOrder[0]).toBeLessThan(
      pools.updateOne.mock.invocationCallOrder[0]
    );
    expect(eventLog.deleteMany).not.toHaveBeenCalled();
  });

  it("leaves the pool untouched when the event insert fails", async () => {
    const { pools, eventLog, repository } = createCollections();
    eventLog.insertMany.mockRejectedValue(new Error("connection reset"));

    await expect(repository.save(committedState(), 3, events)).rejects.toThrow("connection reset");

    expect(pools.updateOne).not.toHaveBeenCalled();
    expect(eventLog.deleteMany).toHaveBeenCalledWith({ _id: { $in: insertedIds(eventLog.insertMany) } });
  });

  it("reports taken sequence numbers as a version conflict", async () => {
    const { pools, eventLog, repository } = createCollections();
    eventLog.insertMany.mockRejectedValue(Object.assign(new Error("E11000 duplicate key"), { code: 11000 }));

    await expect(repository.save(committedState(), 3, events)).rejects.toMatchObject({
      statusCode: 409,
      code: "pool-version-conflict",
    });
    expect(pools.updateOne).not.toHaveBeenCalled();
  });

  it("removes its events when the pool version has moved on", async () => {
    const { pools, eventLog, repository } = createCollections();
    pools.updateOne.mockResolvedValue({ matchedCount: 0 });

    await expect(repository.save(committedState(), 3, events)).rejects.toMatchObject({
      code: "pool-version-conflict",
    });
    expect(eventLog.deleteMany).toHaveBeenCalledWith({ _id: { $in: insertedIds(eventLog.insertMany) } });
  });

  it("skips the event insert for an operation without events", async () => {
    const { pools, eventLog, repository } = createCollections();

    await repository.save(committedState(), 3, []);

    expect(eventLog.insertMany).not.toHaveBeenCalled();
    expect(pools.updateOne).toHaveBeenCalledTimes(1);
  });
});
