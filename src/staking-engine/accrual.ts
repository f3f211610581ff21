import type { Account, VaultParams } from "./types.js";

type AccrualParams = Pick<VaultParams, "basisPoints" | "rewardDuration">;

/**
 * Flat linear accrual: `principal * rateBps * elapsed / (BPS * duration)`.
 * Truncates toward zero and returns 0 for a zero rate, principal or elapsed time.
 */
export function linearAccrual(
  principal: bigint,
  rateBps: bigint,
  since: bigint,
  now: bigint,
  params: AccrualParams
): bigint {
  const zero = BigInt(0);
  if (principal <= zero || rateBps <= zero || since === zero) return zero;

  const elapsed = now - since;
  if (elapsed <= zero) return zero;

  return (principal * rateBps * elapsed) / (params.basisPoints * params.rewardDuration);
}

/** Staking yield accrued on `stakedValueUsd` since the first stake. */
export function pendingStakeReward(
  account: Account,
  now: bigint,
  params: Pick<VaultParams, "basisPoints" | "rewardDuration" | "stakeRateBps">
): bigint {
  if (!account.isStaker) return BigInt(0);
  return linearAccrual(account.stakedValueUsd, params.stakeRateBps, account.stakeTimestamp, now, params);
}

/** Yield on an idle balance since the most recent deposit. */
export function pendingDepositorReward(
  idleBalance: bigint,
  depositTimestamp: bigint,
  now: bigint,
  params: Pick<VaultParams, "basisPoints" | "rewardDuration" | "depositorRateBps">
): bigint {
  return linearAccrual(idleBalance, params.depositorRateBps, depositTimestamp, now, params);
}
