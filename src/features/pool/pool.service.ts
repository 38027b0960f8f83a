import type { Logger } from "pino";
import type { Address } from "viem";
import { PoolEngine } from "@/features/pool/pool.engine.js";
import type { PoolEventFilter, PoolRepository } from "@/features/pool/pool.repository.js";
import { createPoolState } from "@/features/pool/pool.state.js";
import type { PoolEvent, PoolEventInput, PoolState } from "@/features/pool/pool.types.js";
import { HttpError } from "@/shared/http-errors.js";
import { KeyedQueue } from "@/shared/keyed-queue.js";

function poolNotFound(poolId: string) {
  return new HttpError(404, "pool-not-found", `Pool ${poolId} does not exist`);
}

function describeEvent(event: PoolEventInput): Record<string, unknown> {
  return Object.fromEntries(
    Object.entries(event).map(([key, value]) => [key, typeof value === "bigint" ? value.toString() : value])
  );
}

/**
 * Loads a pool, runs one engine operation and persists the result. Operations
 * on the same pool are queued so each one sees the state the previous one committed.
 */
export class PoolService {
  private readonly queue = new KeyedQueue();

  constructor(
    private readonly repository: PoolRepository,
    private readonly logger: Logger
  ) {}

  async createPool(poolId: string, admin: Address) {
    await this.queue.run(poolId, () => this.repository.create(createPoolState(poolId, admin)));
    this.logger.info({ poolId, admin }, "pool-created");
    const state = await this.requirePool(poolId);
    return new PoolEngine(state).getContractInfo();
  }

  async ensurePool(poolId: string, admin: Address) {
    const existing = await this.repository.load(poolId);
    if (existing) return;

    try {
      await this.createPool(poolId, admin);
    } catch (error: unknown) {
      // another process created it between the load and the insert
      if (error instanceof HttpError && error.code === "pool-exists") {
        this.logger.debug({ poolId }, "pool-already-created");
        return;
      }
      throw error;
    }
  }

  deposit(poolId: string, caller: Address, amount: bigint) {
    return this.mutate(poolId, (engine) => engine.deposit(caller, amount));
  }

  withdraw(poolId: string, caller: Address, amount: bigint) {
    return this.mutate(poolId, (engine) => engine.withdraw(caller, amount));
  }

  depositProceeds(poolId: string, caller: Address, amount: bigint) {
    return this.mutate(poolId, (engine) => engine.depositProceeds(caller, amount));
  }

  claimProceeds(poolId: string, caller: Address) {
    return this.mutate(poolId, (engine) => engine.claimProceeds(caller));
  }

  transfer(poolId: string, caller: Address, to: Address, amount: bigint) {
    return this.mutate(poolId, (engine) => engine.transfer(caller, to, amount));
  }

  approve(poolId: string, owner: Address, amount: bigint) {
    return this.mutate(poolId, (engine) => engine.approve(owner, amount));
  }

  issueAsset(poolId: string, caller: Address, to: Address, amount: bigint) {
    return this.mutate(poolId, (engine) => engine.issueAsset(caller, to, amount));
  }

  async getContractInfo(poolId: string) {
    return new PoolEngine(await this.requirePool(poolId)).getContractInfo();
  }

  async getUserInfo(poolId: string, account: Address) {
    return new PoolEngine(await this.requirePool(poolId)).getUserInfo(account);
  }

  async getPendingProceeds(poolId: string, account: Address) {
    return new PoolEngine(await this.requirePool(poolId)).getPendingProceeds(account);
  }

  async getState(poolId: string): Promise<PoolState> {
    return await this.requirePool(poolId);
  }

  async listEvents(poolId: string, filter: PoolEventFilter) {
    await this.requirePool(poolId);
    return await this.repository.listEvents(poolId, filter);
  }

  private async requirePool(poolId: string): Promise<PoolState> {
    const state = await this.repository.load(poolId);
    if (!state) throw poolNotFound(poolId);
    return state;
  }

  private mutate<T>(poolId: string, operation: (engine: PoolEngine) => T): Promise<T> {
    return this.queue.run(poolId, async () => {
      const loaded = await this.requirePool(poolId);
      const engine = new PoolEngine(loaded);
      const result = operation(engine);
      // nothing committed, as for a transfer to oneself
      if (engine.state === loaded) return result;

      const emitted = engine.drainEvents();
      const state = engine.state;
      const expectedVersion = loaded.version;

      const createdAt = new Date();
      const events: PoolEvent[] = emitted.map((event, index) => ({
        ...event,
        poolId,
        seq: state.lastEventSeq + index + 1,
        createdAt,
      }));
      state.version = expectedVersion + 1;
      state.lastEventSeq += events.length;

      await this.repository.save(state, expectedVersion, events);
      this.logger.info(
        { poolId, version: state.version, events: emitted.map(describeEvent) },
        "pool-operation-committed"
      );
      return result;
    });
  }
}
