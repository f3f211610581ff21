import { FastifyPluginAsync } from "fastify";
import { z } from "zod";
import { AssetType, StakingEngine } from "../../staking-engine/index.js";
import { requireAuth } from "../auth.js";
import { amountSchema, assetSchema, formatAccount, formatPools, sendError } from "../serializers.js";

const assetAmountSchema = z.object({
  asset: assetSchema,
  amount: amountSchema,
});

const withdrawSchema = z.object({
  asset: assetSchema,
});

const principalParamSchema = z.object({
  principal: z.string().min(1).max(128),
});

export const vaultRoutes: FastifyPluginAsync<{ stakingEngine: StakingEngine }> = async (
  fastify,
  opts
) => {
  const { vault } = opts.stakingEngine;

  /**
   * POST /vault/deposit
   * Pull native value or tokens from the caller into their idle balance.
   */
  fastify.post("/vault/deposit", { preHandler: requireAuth }, async (request, reply) => {
    try {
      const body = assetAmountSchema.parse(request.body);
      const account = await vault.deposit(request.principal, body.asset, body.amount);
      return formatAccount(request.principal, account);
    } catch (err: unknown) {
      return sendError(reply, err, "Deposit failed");
    }
  });

  /**
   * POST /vault/stake
   * Move part of the idle balance into the staked position.
   */
  fastify.post("/vault/stake", { preHandler: requireAuth }, async (request, reply) => {
    try {
      const body = assetAmountSchema.parse(request.body);
      const account = await vault.stake(request.principal, body.asset, body.amount);
      return formatAccount(request.principal, account);
    } catch (err: unknown) {
      return sendError(reply, err, "Stake failed");
    }
  });

  /**
   * POST /vault/unstake
   * Finalize principal plus reward and start the cooldown.
   */
  fastify.post("/vault/unstake", { preHandler: requireAuth }, async (request, reply) => {
    try {
      const account = await vault.unstake(request.principal);
      return formatAccount(request.principal, account);
    } catch (err: unknown) {
      return sendError(reply, err, "Unstake failed");
    }
  });

  /**
   * POST /vault/withdraw
   * Pay out a finalized unstake or an idle deposit with its yield.
   */
  fastify.post("/vault/withdraw", { preHandler: requireAuth }, async (request, reply) => {
    try {
      const body = withdrawSchema.parse(request.body);
      const paid = await vault.withdraw(request.principal, body.asset);
      return { asset: body.asset, paid: paid.toString() };
    } catch (err: unknown) {
      return sendError(reply, err, "Withdraw failed");
    }
  });

  fastify.get("/vault/accounts/:principal", async (request, reply) => {
    try {
      const params = principalParamSchema.parse(request.params);
      return formatAccount(params.principal, vault.getAccount(params.principal));
    } catch (err: unknown) {
      return sendError(reply, err, "Failed to fetch account");
    }
  });

  fastify.get("/vault/accounts/:principal/pending-reward", async (request, reply) => {
    try {
      const params = principalParamSchema.parse(request.params);
      return {
        principal: params.principal,
        stakingReward: vault.pendingReward(params.principal).toString(),
        // Idle balances in both assets earn depositor yield independently of the stake
        depositorReward: {
          native: vault.pendingDepositorReward(params.principal, AssetType.Native).toString(),
          token: vault.pendingDepositorReward(params.principal, AssetType.Token).toString(),
        },
      };
    } catch (err: unknown) {
      return sendError(reply, err, "Failed to compute pending reward");
    }
  });

  fastify.get("/vault/pools", async () => formatPools(vault.getPools()));

  fastify.get("/vault/status", async () => {
    const status = await opts.stakingEngine.getStatus();
    return {
      ...status,
      price: status.price?.toString() ?? null,
    };
  });
};
