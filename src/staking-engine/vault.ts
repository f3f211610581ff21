import { EventType, type VaultEvent, type VaultEventListener } from "../event-bus/events.js";
import { AccountLedger } from "./accountLedger.js";
import { pendingDepositorReward, pendingStakeReward } from "./accrual.js";
import { buildAssetDescriptors, idleBalanceOf, type AssetDescriptor } from "./assets.js";
import type { FungibleToken, NativeBank, PriceFeed } from "./collaborators.js";
import { StakingError, isStakingError } from "./errors.js";
import { ReentrancyGuard } from "./reentrancyGuard.js";
import { RewardPoolManager, type PoolKind, type PoolsSnapshot } from "./rewardPools.js";
import { AssetType, systemClock, type Account, type Clock, type VaultParams } from "./types.js";
import { WAD, normalizePrice } from "./unitConverter.js";

export interface VaultDeps {
  owner: string;
  /** The vault's own holder address on the native bank and token. */
  address: string;
  priceFeed: PriceFeed;
  token: FungibleToken;
  nativeBank: NativeBank;
  params: VaultParams;
  clock?: Clock;
}

type Emit = (event: VaultEvent) => void;

const ZERO = BigInt(0);

export class StakingVault {
  readonly owner: string;
  readonly address: string;

  private readonly ledger = new AccountLedger();
  private readonly pools: RewardPoolManager;
  private readonly guard = new ReentrancyGuard();
  private readonly assets: Record<AssetType, AssetDescriptor>;
  private readonly params: VaultParams;
  private readonly clock: Clock;
  private readonly priceFeed: PriceFeed;
  private readonly token: FungibleToken;
  private readonly nativeBank: NativeBank;
  private listeners: VaultEventListener[] = [];
  private paused = false;

  constructor(deps: VaultDeps) {
    this.owner = deps.owner;
    this.address = deps.address;
    this.params = deps.params;
    this.clock = deps.clock ?? systemClock;
    this.priceFeed = deps.priceFeed;
    this.token = deps.token;
    this.nativeBank = deps.nativeBank;
    this.assets = buildAssetDescriptors(deps.params);
    this.pools = new RewardPoolManager(deps.params.rewardDuration);
  }

  onEvent(listener: VaultEventListener): () => void {
    this.listeners.push(listener);
    return () => {
      this.listeners = this.listeners.filter((l) => l !== listener);
    };
  }

  // ============================================================
  // Depositor / staker operations
  // ============================================================

  async deposit(caller: string, asset: AssetType, amount: bigint): Promise<Account> {
    return this.mutate("deposit", caller, async (emit) => {
      this.requireNotPaused();
      const descriptor = this.assets[asset];
      const price = await this.priceFor(descriptor);

      const boundValue = descriptor.depositBoundValue(amount, price);
      if (amount <= ZERO || boundValue < descriptor.minDeposit || boundValue > descriptor.maxDeposit) {
        throw new StakingError(
          "DepositFailed",
          `Deposit value ${boundValue} outside [${descriptor.minDeposit}, ${descriptor.maxDeposit}]`
        );
      }

      if (!(await this.pull(descriptor, caller, amount))) {
        throw new StakingError("TransferFailed", `Could not pull ${amount} ${asset} from ${caller}`);
      }

      const now = this.clock.now();
      const account = this.ledger.get(caller);
      account.isDepositor = true;
      account.depositTimestamp = now;
      account[descriptor.balanceField] += amount;
      this.ledger.set(caller, account);

      emit({ type: EventType.DEPOSITED, payload: { principal: caller, asset, amount, timestamp: now } });
      return account;
    });
  }

  async stake(caller: string, asset: AssetType, amount: bigint): Promise<Account> {
    return this.mutate("stake", caller, async (emit) => {
      this.requireNotPaused();
      const descriptor = this.assets[asset];
      const account = this.ledger.get(caller);

      if (!account.isDepositor) {
        throw new StakingError("NotDepositor");
      }
      if (account.finalizedReward > ZERO) {
        throw new StakingError("UnstakePending", "Withdraw the finalized payout before staking again");
      }
      if (amount <= ZERO || idleBalanceOf(account, descriptor) < amount) {
        throw new StakingError(
          "InsufficientFunds",
          `Idle ${asset} balance ${idleBalanceOf(account, descriptor)} is below ${amount}`
        );
      }
      if (account.isStaker && account.assetType !== asset) {
        throw new StakingError(
          "AssetTypeMismatch",
          `Open position is in ${account.assetType}, cannot add ${asset}`
        );
      }

      const price = await this.priceFor(descriptor);
      const value = descriptor.toStakeValue(amount, price);
      if (value < this.params.minStake || value > this.params.maxStake) {
        throw new StakingError(
          "StakeLimitExceeded",
          `Stake value ${value} outside [${this.params.minStake}, ${this.params.maxStake}]`
        );
      }

      const now = this.clock.now();
      account[descriptor.balanceField] -= amount;
      account.stakedValueUsd += value;
      account.assetType = asset;
      // Top-ups keep accruing from the original stake time
      if (!account.isStaker) {
        account.isStaker = true;
        account.stakeTimestamp = now;
      }
      this.ledger.set(caller, account);

      emit({
        type: EventType.STAKED,
        payload: {
          principal: caller,
          asset,
          amount,
          stakedValueUsd: account.stakedValueUsd,
          timestamp: now,
        },
      });
      return account;
    });
  }

  async unstake(caller: string): Promise<Account> {
    return this.mutate("unstake", caller, async (emit) => {
      this.requireNotPaused();
      const account = this.ledger.get(caller);
      if (!account.isStaker) {
        throw new StakingError("NotAStaker");
      }

      const now = this.clock.now();
      const descriptor = this.assets[account.assetType];
      const reward = pendingStakeReward(account, now, this.params);
      const price = await this.priceFor(descriptor);

      this.pools.debit("staking", descriptor.kind, reward);

      account.finalizedReward =
        descriptor.fromStakeValue(reward, price) +
        descriptor.fromStakeValue(account.stakedValueUsd, price);
      account.stakedValueUsd = ZERO;
      account.stakeTimestamp = ZERO;
      account.isStaker = false;
      account.unstakeReadyAt = now + this.params.cooldown;
      this.ledger.set(caller, account);

      emit({
        type: EventType.UNSTAKED,
        payload: {
          principal: caller,
          asset: descriptor.kind,
          reward,
          finalizedReward: account.finalizedReward,
          unstakeReadyAt: account.unstakeReadyAt,
        },
      });
      return account;
    });
  }

  /**
   * Pays out either a finalized unstake (after cooldown) or an idle deposit
   * with its depositor yield. State is committed before the outbound
   * transfer and rolled back if the transfer fails.
   */
  async withdraw(caller: string, asset: AssetType): Promise<bigint> {
    return this.mutate("withdraw", caller, async (emit) => {
      this.requireNotPaused();
      const descriptor = this.assets[asset];
      const account = this.ledger.get(caller);
      const now = this.clock.now();
      const idle = idleBalanceOf(account, descriptor);

      let payout: bigint;
      let reward = ZERO;

      if (account.assetType === asset && account.finalizedReward > ZERO) {
        if (now < account.unstakeReadyAt) {
          throw new StakingError(
            "CoolDownPeriodIsActive",
            `Withdrawal unlocks at ${account.unstakeReadyAt}, now ${now}`
          );
        }
        payout = idle + account.finalizedReward;
        account.finalizedReward = ZERO;
        account.unstakeReadyAt = ZERO;
      } else if (account.isDepositor) {
        if (idle === ZERO) {
          throw new StakingError("InsufficientFunds", `No idle ${asset} balance to withdraw`);
        }
        reward = pendingDepositorReward(idle, account.depositTimestamp, now, this.params);
        this.pools.debit("depositor", asset, reward);
        payout = idle + reward;
      } else {
        throw new StakingError("NotADepositorOrStaker");
      }

      account[descriptor.balanceField] = ZERO;
      // Another asset's idle balance keeps the account a depositor, still
      // accruing from the shared deposit timestamp
      account.isDepositor = account.nativeBalance > ZERO || account.tokenBalance > ZERO;
      if (!account.isDepositor) {
        account.depositTimestamp = ZERO;
      }
      this.persistAfterWithdraw(caller, account);

      await this.send(descriptor, caller, payout);

      emit({
        type: EventType.WITHDRAWN,
        payload: { principal: caller, asset, amount: payout, reward, timestamp: now },
      });
      return payout;
    });
  }

  // ============================================================
  // Owner operations
  // ============================================================

  async notifyReward(caller: string, asset: AssetType, amount: bigint): Promise<void> {
    return this.mutate("notifyReward", null, async (emit) => {
      this.requireOwner(caller);
      this.requireNotPaused();

      const outcome = this.pools.notifyReward(asset, amount, this.clock.now());
      if (outcome.kind === "extended") {
        emit({
          type: EventType.REWARD_EXTENDED,
          payload: {
            asset,
            total: outcome.total,
            scheduleEnd: outcome.scheduleEnd,
          },
        });
      } else {
        emit({
          type: EventType.REWARD_INITIALIZED,
          payload: {
            asset,
            amount: outcome.amount,
            scheduleEnd: outcome.scheduleEnd,
          },
        });
      }
    });
  }

  /** Top up the staking pool for `asset`; native funding is credited at its USD value. */
  async fundProvidedReward(caller: string, asset: AssetType, amount: bigint): Promise<bigint> {
    return this.fundPool("staking", caller, asset, amount);
  }

  async fundDepositorsProvidedPool(caller: string, asset: AssetType, amount: bigint): Promise<bigint> {
    return this.fundPool("depositor", caller, asset, amount);
  }

  async pause(caller: string): Promise<void> {
    return this.mutate("pause", null, async (emit) => {
      this.requireOwner(caller);
      if (this.paused) {
        throw new StakingError("ContractIsPaused");
      }
      this.paused = true;
      emit({ type: EventType.PAUSED, payload: { by: caller, timestamp: this.clock.now() } });
    });
  }

  async unpause(caller: string): Promise<void> {
    return this.mutate("unpause", null, async (emit) => {
      this.requireOwner(caller);
      if (!this.paused) {
        throw new StakingError("ContractIsNotPaused");
      }
      this.paused = false;
      emit({ type: EventType.UNPAUSED, payload: { by: caller, timestamp: this.clock.now() } });
    });
  }

  // ============================================================
  // Views
  // ============================================================

  pendingReward(principal: string): bigint {
    return pendingStakeReward(this.ledger.get(principal), this.clock.now(), this.params);
  }

  pendingDepositorReward(principal: string, asset: AssetType): bigint {
    const account = this.ledger.get(principal);
    if (!account.isDepositor) return ZERO;
    return pendingDepositorReward(
      idleBalanceOf(account, this.assets[asset]),
      account.depositTimestamp,
      this.clock.now(),
      this.params
    );
  }

  getAccount(principal: string): Account {
    return this.ledger.get(principal);
  }

  getPools(): PoolsSnapshot {
    return this.pools.snapshot();
  }

  isPaused(): boolean {
    return this.paused;
  }

  accountCount(): number {
    return this.ledger.size;
  }

  async getPrice(): Promise<bigint> {
    return this.priceFor(this.assets[AssetType.Native]);
  }

  async getPriceFeedVersion(): Promise<number> {
    return this.priceFeed.version();
  }

  // ============================================================
  // Internals
  // ============================================================

  private async fundPool(
    kind: PoolKind,
    caller: string,
    asset: AssetType,
    amount: bigint
  ): Promise<bigint> {
    const operation = kind === "staking" ? "fundProvidedReward" : "fundDepositorsProvidedPool";
    return this.mutate(operation, null, async (emit) => {
      this.requireOwner(caller);
      this.requireNotPaused();
      if (amount <= ZERO) {
        throw new StakingError("ZeroRewardCantBeAdded");
      }

      const descriptor = this.assets[asset];
      const credit =
        kind === "staking" ? descriptor.toStakeValue(amount, await this.priceFor(descriptor)) : amount;

      if (!(await this.pull(descriptor, caller, amount))) {
        throw new StakingError("TransferFailed", `Could not pull ${amount} ${asset} from ${caller}`);
      }

      const remaining = this.pools.fund(kind, asset, credit);
      emit({ type: EventType.POOL_FUNDED, payload: { pool: kind, asset, amount: credit, remaining } });
      return remaining;
    });
  }

  /**
   * Runs one mutating operation under the reentrancy guard. Any failure
   * restores the principal's account, the pools and the pause flag; events
   * are only delivered once the operation has succeeded.
   */
  private async mutate<T>(
    operation: string,
    principal: string | null,
    fn: (emit: Emit) => Promise<T>
  ): Promise<T> {
    return this.guard.run(operation, async () => {
      const accountBefore = principal === null ? undefined : this.ledger.snapshot(principal);
      const poolsBefore = this.pools.snapshot();
      const pausedBefore = this.paused;
      const pending: VaultEvent[] = [];

      const emit: Emit = (event) => {
        pending.push(event);
      };

      let result: T;
      try {
        result = await fn(emit);
      } catch (err) {
        if (principal !== null) {
          this.ledger.restore(principal, accountBefore);
        }
        this.pools.restore(poolsBefore);
        this.paused = pausedBefore;
        if (!isStakingError(err)) {
          console.error(`[Vault] ${operation} failed unexpectedly:`, err);
        }
        throw err;
      }

      for (const event of pending) {
        this.dispatch(event);
      }
      return result;
    });
  }

  private dispatch(event: VaultEvent): void {
    console.log(`[Vault] ${event.type}`);
    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (err) {
        console.error(`[Vault] Listener error on ${event.type}:`, err);
      }
    }
  }

  private requireNotPaused(): void {
    if (this.paused) {
      throw new StakingError("ContractIsPaused");
    }
  }

  private requireOwner(caller: string): void {
    if (caller !== this.owner) {
      throw new StakingError("Unauthorized", `${caller} is not the vault owner`);
    }
  }

  private async priceFor(descriptor: AssetDescriptor): Promise<bigint> {
    if (!descriptor.needsPrice) return WAD;

    try {
      const reading = await this.priceFeed.latestPrice();
      return normalizePrice(reading.answer, reading.decimals);
    } catch (err) {
      if (isStakingError(err)) throw err;
      throw new StakingError("InvalidPrice", "Price feed unavailable", { cause: err });
    }
  }

  private async pull(descriptor: AssetDescriptor, from: string, amount: bigint): Promise<boolean> {
    return descriptor.kind === AssetType.Native
      ? this.nativeBank.transfer(from, this.address, amount)
      : this.token.transferFrom(this.address, from, this.address, amount);
  }

  private async send(descriptor: AssetDescriptor, to: string, amount: bigint): Promise<void> {
    let sent: boolean;
    try {
      sent =
        descriptor.kind === AssetType.Native
          ? await this.nativeBank.transfer(this.address, to, amount)
          : await this.token.transfer(this.address, to, amount);
    } catch (err) {
      throw new StakingError("WithdrawFailed", `Transfer of ${amount} to ${to} threw`, { cause: err });
    }
    if (!sent) {
      throw new StakingError("WithdrawFailed", `Transfer of ${amount} to ${to} was rejected`);
    }
  }

  private persistAfterWithdraw(principal: string, account: Account): void {
    const holdsNothing =
      !account.isStaker &&
      account.nativeBalance === ZERO &&
      account.tokenBalance === ZERO &&
      account.finalizedReward === ZERO;

    if (holdsNothing) {
      this.ledger.delete(principal);
    } else {
      this.ledger.set(principal, account);
    }
  }
}
