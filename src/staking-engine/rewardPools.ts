import { StakingError } from "./errors.js";
import { ASSET_TYPES, AssetType, type DepositorPool, type StakingPool } from "./types.js";

export type PoolKind = "staking" | "depositor";

export type NotifyOutcome =
  | { kind: "initialized"; asset: AssetType; amount: bigint; scheduleEnd: bigint }
  | { kind: "extended"; asset: AssetType; leftover: bigint; total: bigint; scheduleEnd: bigint };

export interface PoolsSnapshot {
  staking: Record<AssetType, StakingPool>;
  depositor: Record<AssetType, DepositorPool>;
}

function emptyPools(): PoolsSnapshot {
  const zero = BigInt(0);
  return {
    staking: {
      [AssetType.Native]: { remaining: zero, scheduleEnd: zero, lastUpdate: zero },
      [AssetType.Token]: { remaining: zero, scheduleEnd: zero, lastUpdate: zero },
    },
    depositor: {
      [AssetType.Native]: { remaining: zero },
      [AssetType.Token]: { remaining: zero },
    },
  };
}

function clonePools(pools: PoolsSnapshot): PoolsSnapshot {
  const copy = emptyPools();
  for (const asset of ASSET_TYPES) {
    copy.staking[asset] = { ...pools.staking[asset] };
    copy.depositor[asset] = { ...pools.depositor[asset] };
  }
  return copy;
}

/**
 * Four asset-scoped reward pools. `remaining` never goes negative: a debit
 * larger than the balance is rejected before anything changes.
 *
 * Schedule bookkeeping (`notifyReward`) and the plain top-ups share the same
 * `remaining` counter.
 */
export class RewardPoolManager {
  private pools: PoolsSnapshot = emptyPools();

  constructor(private readonly rewardDuration: bigint) {}

  stakingPool(asset: AssetType): StakingPool {
    return { ...this.pools.staking[asset] };
  }

  depositorPool(asset: AssetType): DepositorPool {
    return { ...this.pools.depositor[asset] };
  }

  remaining(kind: PoolKind, asset: AssetType): bigint {
    return kind === "staking"
      ? this.pools.staking[asset].remaining
      : this.pools.depositor[asset].remaining;
  }

  /**
   * Start, extend or override the staking schedule for `asset`.
   *
   * While a schedule is running, only the unspent share of the current pool
   * (linear in the time left) carries into the new one.
   */
  notifyReward(asset: AssetType, amount: bigint, now: bigint): NotifyOutcome {
    if (amount <= BigInt(0)) {
      throw new StakingError("ZeroRewardCantBeAdded");
    }

    const pool = this.pools.staking[asset];
    const scheduleEnd = now + this.rewardDuration;

    if (pool.remaining > BigInt(0) && pool.scheduleEnd > now) {
      const leftover = (pool.remaining * (pool.scheduleEnd - now)) / this.rewardDuration;
      const total = leftover + amount;
      this.pools.staking[asset] = { remaining: total, scheduleEnd, lastUpdate: now };
      return { kind: "extended", asset, leftover, total, scheduleEnd };
    }

    // Empty pool, or a schedule that already ran out: the new amount replaces it
    this.pools.staking[asset] = { remaining: amount, scheduleEnd, lastUpdate: now };
    return { kind: "initialized", asset, amount, scheduleEnd };
  }

  fund(kind: PoolKind, asset: AssetType, amount: bigint): bigint {
    if (amount <= BigInt(0)) {
      throw new StakingError("ZeroRewardCantBeAdded");
    }
    if (kind === "staking") {
      this.pools.staking[asset].remaining += amount;
      return this.pools.staking[asset].remaining;
    }
    this.pools.depositor[asset].remaining += amount;
    return this.pools.depositor[asset].remaining;
  }

  /** Debit a payout. Throws `InsufficientRewardPool` without mutating on shortfall. */
  debit(kind: PoolKind, asset: AssetType, amount: bigint): void {
    const available = this.remaining(kind, asset);
    if (amount > available) {
      throw new StakingError(
        "InsufficientRewardPool",
        `${kind} pool for ${asset} holds ${available}, payout needs ${amount}`
      );
    }
    if (kind === "staking") {
      this.pools.staking[asset].remaining -= amount;
    } else {
      this.pools.depositor[asset].remaining -= amount;
    }
  }

  snapshot(): PoolsSnapshot {
    return clonePools(this.pools);
  }

  restore(snapshot: PoolsSnapshot): void {
    this.pools = clonePools(snapshot);
  }
}
