import { describe, it, expect } from "vitest";
import { linearAccrual, pendingDepositorReward, pendingStakeReward } from "../src/staking-engine/accrual.js";
import { emptyAccount } from "../src/staking-engine/accountLedger.js";
import { DAY, PARAMS, START, USD } from "./helpers.js";

describe("accrual", () => {
  it("accrues linearly over the reward duration", () => {
    expect(linearAccrual(1_000n * USD, 5_000n, START, START + 200n * DAY, PARAMS)).toBe(500n * USD);
    expect(linearAccrual(1_000n * USD, 5_000n, START, START + 100n * DAY, PARAMS)).toBe(250n * USD);
  });

  it("keeps accruing past the nominal duration", () => {
    expect(linearAccrual(1_000n * USD, 5_000n, START, START + 400n * DAY, PARAMS)).toBe(1_000n * USD);
  });

  it("truncates toward zero", () => {
    // 1 * 5000 * 1 / (10000 * 17_280_000) rounds down to 0
    expect(linearAccrual(1n, 5_000n, START, START + 1n, PARAMS)).toBe(0n);
  });

  it("returns zero for a missing start, zero principal or no elapsed time", () => {
    expect(linearAccrual(1_000n * USD, 5_000n, 0n, START, PARAMS)).toBe(0n);
    expect(linearAccrual(0n, 5_000n, START, START + DAY, PARAMS)).toBe(0n);
    expect(linearAccrual(1_000n * USD, 5_000n, START, START, PARAMS)).toBe(0n);
    expect(linearAccrual(1_000n * USD, 5_000n, START, START - DAY, PARAMS)).toBe(0n);
  });

  it("only pays stake yield to open positions", () => {
    const account = { ...emptyAccount(), stakedValueUsd: 2_000n * USD, stakeTimestamp: START };
    expect(pendingStakeReward(account, START + 50n * DAY, PARAMS)).toBe(0n);

    account.isStaker = true;
    expect(pendingStakeReward(account, START + 50n * DAY, PARAMS)).toBe(250n * USD);
  });

  it("pays depositor yield at the depositor rate", () => {
    expect(pendingDepositorReward(500n * USD, START, START + 20n * DAY, PARAMS)).toBe(5n * USD);
  });
});
