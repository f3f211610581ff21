import { AssetType, type Account, type VaultParams } from "./types.js";
import { fromUsd, toUsd } from "./unitConverter.js";

type BalanceField = "nativeBalance" | "tokenBalance";

/**
 * Everything that differs between the native and token code paths.
 * Operations select one descriptor per call and never branch on the asset again.
 */
export interface AssetDescriptor {
  kind: AssetType;
  balanceField: BalanceField;
  /** Whether pricing the asset needs a feed reading. */
  needsPrice: boolean;
  /** Asset units → USD-normalized stake value. */
  toStakeValue(amount: bigint, price: bigint): bigint;
  /** USD-normalized stake value → asset units. */
  fromStakeValue(value: bigint, price: bigint): bigint;
  /** Value compared against the deposit bounds. */
  depositBoundValue(amount: bigint, price: bigint): bigint;
  minDeposit: bigint;
  maxDeposit: bigint;
}

const identity = (amount: bigint): bigint => amount;

export function buildAssetDescriptors(params: VaultParams): Record<AssetType, AssetDescriptor> {
  return {
    [AssetType.Native]: {
      kind: AssetType.Native,
      balanceField: "nativeBalance",
      needsPrice: true,
      toStakeValue: toUsd,
      fromStakeValue: fromUsd,
      depositBoundValue: toUsd,
      minDeposit: params.minDeposit,
      maxDeposit: params.maxDeposit,
    },
    [AssetType.Token]: {
      kind: AssetType.Token,
      balanceField: "tokenBalance",
      needsPrice: false,
      toStakeValue: identity,
      fromStakeValue: identity,
      depositBoundValue: identity,
      minDeposit: params.minDepositToken,
      maxDeposit: params.maxDepositToken,
    },
  };
}

export function idleBalanceOf(account: Account, asset: AssetDescriptor): bigint {
  return account[asset.balanceField];
}
