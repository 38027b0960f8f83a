import type { FastifyReply, FastifyRequest } from "fastify";
import { z } from "zod";
import { getAuth } from "@/features/auth/auth.middleware.js";
import type { PoolService } from "@/features/pool/pool.service.js";
import type { ContractInfo, UserInfo } from "@/features/pool/pool.types.js";
import { addressPattern, asAddress } from "@/shared/viem.js";

const poolIdSchema = z.string().regex(/^[a-z0-9-]{1,64}$/);
const addressSchema = z.string().regex(addressPattern).transform((value) => asAddress(value));
const amountSchema = z
  .string()
  .regex(/^\d+$/)
  .transform((value) => BigInt(value));

const poolParamsSchema = z.object({ poolId: poolIdSchema });
const accountParamsSchema = z.object({ poolId: poolIdSchema, account: addressSchema });

const createPoolSchema = z.object({ poolId: poolIdSchema, admin: addressSchema });
const amountBodySchema = z.object({ amount: amountSchema });
const transferBodySchema = z.object({ to: addressSchema, amount: amountSchema });

function toContractInfoResponse(info: ContractInfo) {
  return {
    poolId: info.poolId,
    admin: info.admin,
    totalShares: info.totalShares.toString(),
    totalUnderlying: info.totalUnderlying.toString(),
    totalProceedsDeposited: info.totalProceedsDeposited.toString(),
    pendingZeroSupplyProceeds: info.pendingZeroSupplyProceeds.toString(),
    cumulativeRewardPerShare: info.cumulativeRewardPerShare.toString(),
  };
}

function toUserInfoResponse(info: UserInfo) {
  return {
    account: info.account,
    balance: info.balance.toString(),
    pendingProceeds: info.pendingProceeds.toString(),
    checkpoint: info.checkpoint.toString(),
    lockedProceeds: info.lockedProceeds.toString(),
    assetBalance: info.assetBalance.toString(),
    assetAllowance: info.assetAllowance.toString(),
  };
}

export function createPoolController(service: PoolService) {
  return {
    async postPool(request: FastifyRequest, reply: FastifyReply) {
      const { poolId, admin } = createPoolSchema.parse(request.body);
      const info = await service.createPool(poolId, admin);
      return reply.status(201).send({ ok: true, data: toContractInfoResponse(info) });
    },

    async getPool(request: FastifyRequest, reply: FastifyReply) {
      const { poolId } = poolParamsSchema.parse(request.params);
      const info = await service.getContractInfo(poolId);
      return reply.send({ ok: true, data: toContractInfoResponse(info) });
    },

    async getAccount(request: FastifyRequest, reply: FastifyReply) {
      const { poolId, account } = accountParamsSchema.parse(request.params);
      const info = await service.getUserInfo(poolId, account);
      return reply.send({ ok: true, data: toUserInfoResponse(info) });
    },

    async getPending(request: FastifyRequest, reply: FastifyReply) {
      const { poolId, account } = accountParamsSchema.parse(request.params);
      const pending = await service.getPendingProceeds(poolId, account);
      return reply.send({ ok: true, data: { account, pendingProceeds: pending.toString() } });
    },

    async postDeposit(request: FastifyRequest, reply: FastifyReply) {
      const { caller } = getAuth(request);
      const { poolId } = poolParamsSchema.parse(request.params);
      const { amount } = amountBodySchema.parse(request.body);
      const receipt = await service.deposit(poolId, caller, amount);
      return reply.send({
        ok: true,
        data: { minted: receipt.minted.toString(), bonus: receipt.bonus.toString(), settled: receipt.settled.toString() },
      });
    },

    async postWithdraw(request: FastifyRequest, reply: FastifyReply) {
      const { caller } = getAuth(request);
      const { poolId } = poolParamsSchema.parse(request.params);
      const { amount } = amountBodySchema.parse(request.body);
      const receipt = await service.withdraw(poolId, caller, amount);
      return reply.send({ ok: true, data: { burned: receipt.burned.toString(), settled: receipt.settled.toString() } });
    },

    async postProceeds(request: FastifyRequest, reply: FastifyReply) {
      const { caller } = getAuth(request);
      const { poolId } = poolParamsSchema.parse(request.params);
      const { amount } = amountBodySchema.parse(request.body);
      const receipt = await service.depositProceeds(poolId, caller, amount);
      return reply.send({
        ok: true,
        data: {
          escrowed: receipt.escrowed,
          cumulativeRewardPerShare: receipt.cumulativeRewardPerShare.toString(),
        },
      });
    },

    async postClaim(request: FastifyRequest, reply: FastifyReply) {
      const { caller } = getAuth(request);
      const { poolId } = poolParamsSchema.parse(request.params);
      const receipt = await service.claimProceeds(poolId, caller);
      return reply.send({ ok: true, data: { claimed: receipt.claimed.toString() } });
    },

    async postTransfer(request: FastifyRequest, reply: FastifyReply) {
      const { caller } = getAuth(request);
      const { poolId } = poolParamsSchema.parse(request.params);
      const { to, amount } = transferBodySchema.parse(request.body);
      const receipt = await service.transfer(poolId, caller, to, amount);
      return reply.send({
        ok: true,
        data: { transferred: receipt.transferred.toString(), receiverSettled: receipt.receiverSettled.toString() },
      });
    },

    async postApprove(request: FastifyRequest, reply: FastifyReply) {
      const { caller } = getAuth(request);
      const { poolId } = poolParamsSchema.parse(request.params);
      const { amount } = amountBodySchema.parse(request.body);
      await service.approve(poolId, caller, amount);
      return reply.send({ ok: true, data: { owner: caller, allowance: amount.toString() } });
    },

    async postIssue(request: FastifyRequest, reply: FastifyReply) {
      const { caller } = getAuth(request);
      const { poolId } = poolParamsSchema.parse(request.params);
      const { to, amount } = transferBodySchema.parse(request.body);
      await service.issueAsset(poolId, caller, to, amount);
      return reply.send({ ok: true, data: { to, issued: amount.toString() } });
    },
  };
}
