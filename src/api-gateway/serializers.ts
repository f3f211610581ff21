import type { FastifyReply } from "fastify";
import { z, ZodError } from "zod";
import { isStakingError } from "../staking-engine/errors.js";
import type { PoolsSnapshot } from "../staking-engine/rewardPools.js";
import { AssetType, type Account } from "../staking-engine/types.js";

// Amounts travel as decimal strings of base units (18 decimals)
export const amountSchema = z
  .string()
  .regex(/^\d{1,60}$/, "amount must be a non-negative integer string")
  .transform((v) => BigInt(v));

export const assetSchema = z.nativeEnum(AssetType);

export function formatAccount(principal: string, account: Account) {
  return {
    principal,
    isDepositor: account.isDepositor,
    isStaker: account.isStaker,
    nativeBalance: account.nativeBalance.toString(),
    tokenBalance: account.tokenBalance.toString(),
    stakedValueUsd: account.stakedValueUsd.toString(),
    assetType: account.assetType,
    depositTimestamp: account.depositTimestamp.toString(),
    stakeTimestamp: account.stakeTimestamp.toString(),
    finalizedReward: account.finalizedReward.toString(),
    unstakeReadyAt: account.unstakeReadyAt.toString(),
  };
}

export function formatPools(pools: PoolsSnapshot) {
  const staking = (asset: AssetType) => ({
    remaining: pools.staking[asset].remaining.toString(),
    scheduleEnd: pools.staking[asset].scheduleEnd.toString(),
    lastUpdate: pools.staking[asset].lastUpdate.toString(),
  });
  return {
    staking: {
      native: staking(AssetType.Native),
      token: staking(AssetType.Token),
    },
    depositor: {
      native: { remaining: pools.depositor[AssetType.Native].remaining.toString() },
      token: { remaining: pools.depositor[AssetType.Token].remaining.toString() },
    },
  };
}

/** Map vault and validation errors onto HTTP responses. */
export function sendError(reply: FastifyReply, err: unknown, fallback: string): FastifyReply {
  if (isStakingError(err)) {
    return reply.status(err.httpStatus()).send({ error: err.code, message: err.message });
  }
  if (err instanceof ZodError) {
    return reply.status(400).send({ error: "Invalid request", details: err.issues });
  }
  const message = err instanceof Error ? err.message : fallback;
  return reply.status(500).send({ error: message });
}
