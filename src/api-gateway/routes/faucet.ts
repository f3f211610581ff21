import { FastifyPluginAsync } from "fastify";
import { z } from "zod";
import type { VaultRuntime } from "../../staking-engine/index.js";
import { AssetType } from "../../staking-engine/types.js";
import { requireAuth } from "../auth.js";
import { amountSchema, assetSchema, sendError } from "../serializers.js";

const faucetSchema = z.object({
  asset: assetSchema,
  amount: amountSchema,
});

/**
 * Development-only faucet for the in-memory custody: credits the caller and,
 * for the token, approves the vault to pull the minted amount.
 */
export const faucetRoutes: FastifyPluginAsync<{ runtime: VaultRuntime }> = async (fastify, opts) => {
  const { runtime } = opts;

  fastify.post("/dev/faucet", { preHandler: requireAuth }, async (request, reply) => {
    try {
      const body = faucetSchema.parse(request.body);
      if (body.asset === AssetType.Native) {
        runtime.nativeBank.mint(request.principal, body.amount);
        const balance = await runtime.nativeBank.balanceOf(request.principal);
        return { asset: body.asset, balance: balance.toString() };
      }

      runtime.token.mint(request.principal, body.amount);
      const allowance = runtime.token.allowance(request.principal, runtime.vault.address) + body.amount;
      await runtime.token.approve(request.principal, runtime.vault.address, allowance);
      const balance = await runtime.token.balanceOf(request.principal);
      return { asset: body.asset, balance: balance.toString(), allowance: allowance.toString() };
    } catch (err: unknown) {
      return sendError(reply, err, "Faucet failed");
    }
  });
};
