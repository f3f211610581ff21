import type { AssetType } from "../staking-engine/types.js";
import type { PoolKind } from "../staking-engine/rewardPools.js";

export enum EventType {
  DEPOSITED = "vault:deposited",
  STAKED = "vault:staked",
  UNSTAKED = "vault:unstaked",
  WITHDRAWN = "vault:withdrawn",
  REWARD_INITIALIZED = "reward:initialized",
  REWARD_EXTENDED = "reward:extended",
  POOL_FUNDED = "pool:funded",
  PAUSED = "vault:paused",
  UNPAUSED = "vault:unpaused",
  PRICE_REFRESHED = "price:refreshed",
}

export interface DepositedPayload {
  principal: string;
  asset: AssetType;
  amount: bigint;
  timestamp: bigint;
}

export interface StakedPayload {
  principal: string;
  asset: AssetType;
  amount: bigint;
  stakedValueUsd: bigint;
  timestamp: bigint;
}

export interface UnstakedPayload {
  principal: string;
  asset: AssetType;
  reward: bigint;
  finalizedReward: bigint;
  unstakeReadyAt: bigint;
}

export interface WithdrawnPayload {
  principal: string;
  asset: AssetType;
  amount: bigint;
  reward: bigint;
  timestamp: bigint;
}

export interface RewardInitializedPayload {
  asset: AssetType;
  amount: bigint;
  scheduleEnd: bigint;
}

export interface RewardExtendedPayload {
  asset: AssetType;
  total: bigint;
  scheduleEnd: bigint;
}

export interface PoolFundedPayload {
  pool: PoolKind;
  asset: AssetType;
  amount: bigint;
  remaining: bigint;
}

export interface PauseChangedPayload {
  by: string;
  timestamp: bigint;
}

export interface PriceRefreshedPayload {
  previousPrice: bigint | null;
  price: bigint;
  deviationBps: bigint | null;
  timestamp: number;
}

export type EventPayloadMap = {
  [EventType.DEPOSITED]: DepositedPayload;
  [EventType.STAKED]: StakedPayload;
  [EventType.UNSTAKED]: UnstakedPayload;
  [EventType.WITHDRAWN]: WithdrawnPayload;
  [EventType.REWARD_INITIALIZED]: RewardInitializedPayload;
  [EventType.REWARD_EXTENDED]: RewardExtendedPayload;
  [EventType.POOL_FUNDED]: PoolFundedPayload;
  [EventType.PAUSED]: PauseChangedPayload;
  [EventType.UNPAUSED]: PauseChangedPayload;
  [EventType.PRICE_REFRESHED]: PriceRefreshedPayload;
};

export type VaultEvent = {
  [K in EventType]: { type: K; payload: EventPayloadMap[K] };
}[EventType];

export type VaultEventListener = (event: VaultEvent) => void;
