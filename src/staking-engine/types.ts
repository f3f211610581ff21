export enum AssetType {
  Native = "native",
  Token = "token",
}

export const ASSET_TYPES: readonly AssetType[] = [AssetType.Native, AssetType.Token];

export interface Account {
  isDepositor: boolean;
  isStaker: boolean;
  nativeBalance: bigint;
  tokenBalance: bigint;
  stakedValueUsd: bigint;
  assetType: AssetType;
  depositTimestamp: bigint;
  stakeTimestamp: bigint;
  finalizedReward: bigint;
  unstakeReadyAt: bigint;
}

export interface StakingPool {
  remaining: bigint;
  scheduleEnd: bigint;
  lastUpdate: bigint;
}

export interface DepositorPool {
  remaining: bigint;
}

export interface VaultParams {
  basisPoints: bigint;
  stakeRateBps: bigint;
  depositorRateBps: bigint;
  rewardDuration: bigint;
  cooldown: bigint;
  minDeposit: bigint;
  maxDeposit: bigint;
  minDepositToken: bigint;
  maxDepositToken: bigint;
  minStake: bigint;
  maxStake: bigint;
}

/** Source of the current instant, in whole seconds. */
export interface Clock {
  now(): bigint;
}

export const systemClock: Clock = {
  now: () => BigInt(Math.floor(Date.now() / 1000)),
};
