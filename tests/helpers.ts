import { InMemoryNativeBank } from "../src/collaborators/inMemoryNativeBank.js";
import { InMemoryToken } from "../src/collaborators/inMemoryToken.js";
import { StaticPriceFeed } from "../src/collaborators/priceFeed.js";
import type { VaultEvent } from "../src/event-bus/events.js";
import { StakingVault } from "../src/staking-engine/vault.js";
import type { Clock, VaultParams } from "../src/staking-engine/types.js";
import { isStakingError } from "../src/staking-engine/errors.js";

export const ETH = 10n ** 18n;
export const USD = 10n ** 18n;
export const DAY = 86_400n;
export const START = 1_700_000_000n;

export const OWNER = "owner";
export const VAULT = "vault";

export const PARAMS: VaultParams = {
  basisPoints: 10_000n,
  stakeRateBps: 5_000n,
  depositorRateBps: 1_000n,
  rewardDuration: 200n * DAY,
  cooldown: DAY,
  minDeposit: 100n * USD,
  maxDeposit: 1_000_000n * USD,
  minDepositToken: 100n * USD,
  maxDepositToken: 1_000_000n * USD,
  minStake: 100n * USD,
  maxStake: 500_000n * USD,
};

export class ManualClock implements Clock {
  constructor(public current: bigint = START) {}

  now(): bigint {
    return this.current;
  }

  advance(seconds: bigint): void {
    this.current += seconds;
  }
}

/** Native bank whose outbound transfers from the vault can be switched off. */
export class RejectingNativeBank extends InMemoryNativeBank {
  rejectFrom: string | null = null;

  override async transfer(from: string, to: string, amount: bigint): Promise<boolean> {
    if (from === this.rejectFrom) return false;
    return super.transfer(from, to, amount);
  }
}

export interface Fixture {
  vault: StakingVault;
  clock: ManualClock;
  bank: RejectingNativeBank;
  token: InMemoryToken;
  priceFeed: StaticPriceFeed;
  events: VaultEvent[];
}

/** Vault at $2000 per native unit, with every named holder funded. */
export function createFixture(holders: string[] = ["alice", "bob", OWNER]): Fixture {
  const clock = new ManualClock();
  const bank = new RejectingNativeBank();
  const token = new InMemoryToken();
  const priceFeed = new StaticPriceFeed(2000n * 10n ** 8n, 8);
  const vault = new StakingVault({
    owner: OWNER,
    address: VAULT,
    priceFeed,
    token,
    nativeBank: bank,
    params: PARAMS,
    clock,
  });

  for (const holder of holders) {
    bank.mint(holder, 10n * ETH);
    token.mint(holder, 10_000n * USD);
  }

  const events: VaultEvent[] = [];
  vault.onEvent((event) => events.push(event));

  return { vault, clock, bank, token, priceFeed, events };
}

export async function approveVault(token: InMemoryToken, holder: string, amount: bigint): Promise<void> {
  await token.approve(holder, VAULT, amount);
}

/** Error code thrown by a synchronous call, or null when it returns. */
export function thrownCode(fn: () => unknown): string | null {
  try {
    fn();
  } catch (err) {
    return isStakingError(err) ? err.code : "not a StakingError";
  }
  return null;
}
