import { StakingError } from "./errors.js";

export const PRICE_DECIMALS = 18;
export const WAD = BigInt(10) ** BigInt(PRICE_DECIMALS);

function assertPrice(price: bigint): void {
  if (price <= BigInt(0)) {
    throw new StakingError("InvalidPrice", `Invalid price: ${price}`);
  }
}

/** Native amount (18 decimals) → USD value (18 decimals), truncating. */
export function toUsd(amount: bigint, price: bigint): bigint {
  assertPrice(price);
  return (amount * price) / WAD;
}

/** USD value (18 decimals) → native amount (18 decimals), truncating. */
export function fromUsd(usdAmount: bigint, price: bigint): bigint {
  assertPrice(price);
  return (usdAmount * WAD) / price;
}

/**
 * Scale a feed answer reported with `decimals` places to 18 decimals.
 * Feeds with more than 18 decimals are truncated.
 */
export function normalizePrice(answer: bigint, decimals: number): bigint {
  if (!Number.isInteger(decimals) || decimals < 0) {
    throw new StakingError("InvalidPrice", `Invalid price decimals: ${decimals}`);
  }
  assertPrice(answer);

  const normalized =
    decimals <= PRICE_DECIMALS
      ? answer * BigInt(10) ** BigInt(PRICE_DECIMALS - decimals)
      : answer / BigInt(10) ** BigInt(decimals - PRICE_DECIMALS);

  assertPrice(normalized);
  return normalized;
}
