import { ObjectId, type Collection, type Db } from "mongodb";
import type { Address } from "viem";
import { fromPoolDoc, toPoolDoc, toPoolEventDoc } from "@/features/pool/pool.codec.js";
import type { PoolDoc, PoolEventDoc } from "@/features/pool/pool.model.js";
import type { PoolEvent, PoolEventType, PoolState } from "@/features/pool/pool.types.js";
import { HttpError } from "@/shared/http-errors.js";

export type PoolEventFilter = {
  type?: PoolEventType;
  account?: Address;
  beforeSeq?: number;
  limit: number;
};

export interface PoolRepository {
  load(poolId: string): Promise<PoolState | null>;
  create(state: PoolState): Promise<void>;
  /** Persists `state` if the stored version still equals `expectedVersion`. */
  save(state: PoolState, expectedVersion: number, events: PoolEvent[]): Promise<void>;
  listEvents(poolId: string, filter: PoolEventFilter): Promise<PoolEventDoc[]>;
}

function poolExists(poolId: string) {
  return new HttpError(409, "pool-exists", `Pool ${poolId} already exists`);
}

function versionConflict(poolId: string) {
  return new HttpError(409, "pool-version-conflict", `Pool ${poolId} was modified concurrently`);
}

function matchesFilter(doc: PoolEventDoc, filter: PoolEventFilter): boolean {
  if (filter.type && doc.type !== filter.type) return false;
  if (filter.account && doc.account !== filter.account) return false;
  if (filter.beforeSeq !== undefined && doc.seq >= filter.beforeSeq) return false;
  return true;
}

function isMongoDuplicateKeyError(error: unknown): boolean {
  if (typeof error !== "object" || error === null) return false;
  if (!("code" in error)) return false;
  return error.code === 11000;
}

/** Keeps the serialized documents in memory, the same shape Mongo stores. */
export class InMemoryPoolRepository implements PoolRepository {
  private readonly pools = new Map<string, PoolDoc>();
  private readonly events = new Map<string, PoolEventDoc[]>();

  async load(poolId: string): Promise<PoolState | null> {
    const doc = this.pools.get(poolId);
    return doc ? fromPoolDoc(structuredClone(doc)) : null;
  }

  async create(state: PoolState): Promise<void> {
    if (this.pools.has(state.poolId)) throw poolExists(state.poolId);
    const now = new Date();
    this.pools.set(state.poolId, toPoolDoc(state, { createdAt: now, updatedAt: now }));
    this.events.set(state.poolId, []);
  }

  async save(state: PoolState, expectedVersion: number, events: PoolEvent[]): Promise<void> {
    const existing = this.pools.get(state.poolId);
    if (!existing || existing.version !== expectedVersion) throw versionConflict(state.poolId);

    this.pools.set(state.poolId, toPoolDoc(state, { createdAt: existing.createdAt, updatedAt: new Date() }));
    const log = this.events.get(state.poolId) ?? [];
    log.push(...events.map(toPoolEventDoc));
    this.events.set(state.poolId, log);
  }

  async listEvents(poolId: string, filter: PoolEventFilter): Promise<PoolEventDoc[]> {
    const log = this.events.get(poolId) ?? [];
    return log
      .filter((doc) => matchesFilter(doc, filter))
      .sort((a, b) => b.seq - a.seq)
      .slice(0, filter.limit)
      .map((doc) => structuredClone(doc));
  }
}

type PoolCollection = Pick<Collection<PoolDoc>, "findOne" | "insertOne" | "updateOne">;
type PoolEventCollection = Pick<Collection<PoolEventDoc>, "find" | "insertMany" | "deleteMany">;

/**
 * Events are written before the versioned pool update and removed again when
 * that update does not go through, so a failed save leaves neither behind.
 */
export class MongoPoolRepository implements PoolRepository {
  constructor(
    private readonly pools: PoolCollection,
    private readonly events: PoolEventCollection
  ) {}

  static fromDb(db: Db) {
    return new MongoPoolRepository(db.collection<PoolDoc>("pools"), db.collection<PoolEventDoc>("pool-events"));
  }

  async load(poolId: string): Promise<PoolState | null> {
    const doc = await this.pools.findOne({ poolId }, { projection: { _id: 0 } });
    return doc ? fromPoolDoc(doc) : null;
  }

  async create(state: PoolState): Promise<void> {
    const now = new Date();
    try {
      await this.pools.insertOne(toPoolDoc(state, { createdAt: now, updatedAt: now }));
    } catch (error: unknown) {
      if (isMongoDuplicateKeyError(error)) throw poolExists(state.poolId);
      throw error;
    }
  }

  async save(state: PoolState, expectedVersion: number, events: PoolEvent[]): Promise<void> {
    const eventDocs = events.map((event) => ({ _id: new ObjectId(), ...toPoolEventDoc(event) }));
    const ids = eventDocs.map((doc) => doc._id);

    if (eventDocs.length > 0) {
      try {
        await this.events.insertMany(eventDocs);
      } catch (error: unknown) {
        await this.discardEvents(ids);
        // another writer already holds these sequence numbers
        if (isMongoDuplicateKeyError(error)) throw versionConflict(state.poolId);
        throw error;
      }
    }

    const { createdAt: _createdAt, ...doc } = toPoolDoc(state, { createdAt: new Date(), updatedAt: new Date() });
    const result = await this.pools.updateOne({ poolId: state.poolId, version: expectedVersion }, { $set: doc });
    if (result.matchedCount === 0) {
      await this.discardEvents(ids);
      throw versionConflict(state.poolId);
    }
  }

  async listEvents(poolId: string, filter: PoolEventFilter): Promise<PoolEventDoc[]> {
    const query: Record<string, unknown> = { poolId };
    if (filter.type) query.type = filter.type;
    if (filter.account) query.account = filter.account;
    if (filter.beforeSeq !== undefined) query.seq = { $lt: filter.beforeSeq };

    return await this.events
      .find(query, { projection: { _id: 0 } })
      .sort({ seq: -1 })
      .limit(filter.limit)
      .toArray();
  }

  private async discardEvents(ids: ObjectId[]) {
    if (ids.length === 0) return;
    await this.events.deleteMany({ _id: { $in: ids } });
  }
}
