import { FastifyPluginAsync } from "fastify";
import { z } from "zod";
import { StakingEngine } from "../../staking-engine/index.js";
import { requireAuth } from "../auth.js";
import { amountSchema, assetSchema, formatPools, sendError } from "../serializers.js";

const poolAmountSchema = z.object({
  asset: assetSchema,
  amount: amountSchema,
});

/**
 * Admin routes: JWT required, and the vault itself rejects callers other than
 * its owner with `Unauthorized`.
 */
export const adminRoutes: FastifyPluginAsync<{ stakingEngine: StakingEngine }> = async (
  fastify,
  opts
) => {
  const { vault } = opts.stakingEngine;

  fastify.addHook("preHandler", requireAuth);

  /**
   * POST /admin/pause
   * Blocks every balance-mutating operation.
   */
  fastify.post("/admin/pause", async (request, reply) => {
    try {
      await vault.pause(request.principal);
      return { success: true, message: "Vault paused" };
    } catch (err: unknown) {
      return sendError(reply, err, "Pause failed");
    }
  });

  /**
   * POST /admin/unpause
   */
  fastify.post("/admin/unpause", async (request, reply) => {
    try {
      await vault.unpause(request.principal);
      return { success: true, message: "Vault unpaused" };
    } catch (err: unknown) {
      return sendError(reply, err, "Unpause failed");
    }
  });

  /**
   * POST /admin/notify-reward
   * Start, extend or override the staking reward schedule of one asset.
   */
  fastify.post("/admin/notify-reward", async (request, reply) => {
    try {
      const body = poolAmountSchema.parse(request.body);
      await vault.notifyReward(request.principal, body.asset, body.amount);
      return formatPools(vault.getPools());
    } catch (err: unknown) {
      return sendError(reply, err, "Notify reward failed");
    }
  });

  /**
   * POST /admin/fund-staking-pool
   */
  fastify.post("/admin/fund-staking-pool", async (request, reply) => {
    try {
      const body = poolAmountSchema.parse(request.body);
      const remaining = await vault.fundProvidedReward(request.principal, body.asset, body.amount);
      return { pool: "staking", asset: body.asset, remaining: remaining.toString() };
    } catch (err: unknown) {
      return sendError(reply, err, "Funding failed");
    }
  });

  /**
   * POST /admin/fund-depositor-pool
   */
  fastify.post("/admin/fund-depositor-pool", async (request, reply) => {
    try {
      const body = poolAmountSchema.parse(request.body);
      const remaining = await vault.fundDepositorsProvidedPool(request.principal, body.asset, body.amount);
      return { pool: "depositor", asset: body.asset, remaining: remaining.toString() };
    } catch (err: unknown) {
      return sendError(reply, err, "Funding failed");
    }
  });
};
