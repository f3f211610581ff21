export interface PriceReading {
  answer: bigint;
  decimals: number;
}

/** External USD price source for the native asset. */
export interface PriceFeed {
  latestPrice(): Promise<PriceReading>;
  version(): Promise<number>;
}

/**
 * Stable-token contract. Transfers report failure by returning `false`;
 * callers must check the result.
 */
export interface FungibleToken {
  transferFrom(spender: string, from: string, to: string, amount: bigint): Promise<boolean>;
  transfer(from: string, to: string, amount: bigint): Promise<boolean>;
  approve(owner: string, spender: string, amount: bigint): Promise<boolean>;
  balanceOf(holder: string): Promise<bigint>;
}

/** Native-currency transfers between principals. */
export interface NativeBank {
  transfer(from: string, to: string, amount: bigint): Promise<boolean>;
  balanceOf(holder: string): Promise<bigint>;
}

/** Invoked on the recipient when funds arrive, before the transfer returns. */
export type ReceiptHook = (from: string, amount: bigint) => Promise<void>;
