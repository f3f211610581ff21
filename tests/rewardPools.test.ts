import { describe, it, expect, beforeEach } from "vitest";
import { RewardPoolManager } from "../src/staking-engine/rewardPools.js";
import { AssetType } from "../src/staking-engine/types.js";
import { DAY, START, USD, thrownCode } from "./helpers.js";

describe("RewardPoolManager", () => {
  let pools: RewardPoolManager;

  beforeEach(() => {
    pools = new RewardPoolManager(200n * DAY);
  });

  describe("notifyReward", () => {
    it("initializes an empty pool", () => {
      const outcome = pools.notifyReward(AssetType.Native, 1_000n * USD, START);

      expect(outcome).toEqual({
        kind: "initialized",
        asset: AssetType.Native,
        amount: 1_000n * USD,
        scheduleEnd: START + 200n * DAY,
      });
      expect(pools.stakingPool(AssetType.Native)).toEqual({
        remaining: 1_000n * USD,
        scheduleEnd: START + 200n * DAY,
        lastUpdate: START,
      });
    });

    it("carries the unspent share into an extension", () => {
      pools.notifyReward(AssetType.Native, 1_000n * USD, START);
      const outcome = pools.notifyReward(AssetType.Native, 500n * USD, START + 50n * DAY);

      expect(outcome).toEqual({
        kind: "extended",
        asset: AssetType.Native,
        leftover: 750n * USD,
        total: 1_250n * USD,
        scheduleEnd: START + 250n * DAY,
      });
      expect(pools.remaining("staking", AssetType.Native)).toBe(1_250n * USD);
    });

    it("replaces a schedule that has already ended", () => {
      pools.notifyReward(AssetType.Token, 1_000n * USD, START);
      const outcome = pools.notifyReward(AssetType.Token, 300n * USD, START + 201n * DAY);

      expect(outcome.kind).toBe("initialized");
      expect(pools.remaining("staking", AssetType.Token)).toBe(300n * USD);
    });

    it("rejects a zero amount", () => {
      expect(thrownCode(() => pools.notifyReward(AssetType.Native, 0n, START))).toBe("ZeroRewardCantBeAdded");
    });

    it("leaves the other asset's pool alone", () => {
      pools.notifyReward(AssetType.Native, 1_000n * USD, START);
      expect(pools.remaining("staking", AssetType.Token)).toBe(0n);
    });
  });

  it("funds and debits the same remaining counter", () => {
    pools.notifyReward(AssetType.Native, 100n * USD, START);
    expect(pools.fund("staking", AssetType.Native, 50n * USD)).toBe(150n * USD);

    pools.debit("staking", AssetType.Native, 120n * USD);
    expect(pools.remaining("staking", AssetType.Native)).toBe(30n * USD);
  });

  it("rejects an oversized debit without touching the pool", () => {
    pools.fund("depositor", AssetType.Token, 10n * USD);

    expect(thrownCode(() => pools.debit("depositor", AssetType.Token, 11n * USD))).toBe("InsufficientRewardPool");
    expect(pools.depositorPool(AssetType.Token)).toEqual({ remaining: 10n * USD });
  });

  it("restores a snapshot without sharing references", () => {
    pools.fund("staking", AssetType.Native, 10n * USD);
    const saved = pools.snapshot();

    saved.staking[AssetType.Native].remaining = 999n;
    expect(pools.remaining("staking", AssetType.Native)).toBe(10n * USD);

    pools.debit("staking", AssetType.Native, 4n * USD);
    pools.restore(saved);
    expect(pools.remaining("staking", AssetType.Native)).toBe(999n);
  });
});
