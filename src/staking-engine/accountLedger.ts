import { AssetType, type Account } from "./types.js";

export function emptyAccount(): Account {
  return {
    isDepositor: false,
    isStaker: false,
    nativeBalance: BigInt(0),
    tokenBalance: BigInt(0),
    stakedValueUsd: BigInt(0),
    assetType: AssetType.Native,
    depositTimestamp: BigInt(0),
    stakeTimestamp: BigInt(0),
    finalizedReward: BigInt(0),
    unstakeReadyAt: BigInt(0),
  };
}

const ACCOUNT_FIELDS: ReadonlyArray<keyof Account> = [
  "isDepositor",
  "isStaker",
  "nativeBalance",
  "tokenBalance",
  "stakedValueUsd",
  "assetType",
  "depositTimestamp",
  "stakeTimestamp",
  "finalizedReward",
  "unstakeReadyAt",
];

export function isEmptyAccount(account: Account): boolean {
  const empty = emptyAccount();
  return ACCOUNT_FIELDS.every((key) => account[key] === empty[key]);
}

/**
 * Per-principal account store. Absent keys read as a zeroed account and
 * accounts that return to the zeroed state are dropped.
 */
export class AccountLedger {
  private accounts = new Map<string, Account>();

  get(principal: string): Account {
    const account = this.accounts.get(principal);
    return account ? { ...account } : emptyAccount();
  }

  set(principal: string, account: Account): void {
    if (isEmptyAccount(account)) {
      this.accounts.delete(principal);
      return;
    }
    this.accounts.set(principal, { ...account });
  }

  delete(principal: string): void {
    this.accounts.delete(principal);
  }

  get size(): number {
    return this.accounts.size;
  }

  snapshot(principal: string): Account | undefined {
    const account = this.accounts.get(principal);
    return account ? { ...account } : undefined;
  }

  restore(principal: string, snapshot: Account | undefined): void {
    if (snapshot) {
      this.accounts.set(principal, { ...snapshot });
    } else {
      this.accounts.delete(principal);
    }
  }
}
