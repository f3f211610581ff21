import type { ReceiptHook } from "../staking-engine/collaborators.js";

/**
 * Balance map shared by the in-memory native bank and token. Recipients may
 * register a receipt hook that runs after they are credited.
 */
export class BalanceBook {
  private balances = new Map<string, bigint>();
  private hooks = new Map<string, ReceiptHook>();

  balanceOf(holder: string): bigint {
    return this.balances.get(holder) ?? BigInt(0);
  }

  mint(holder: string, amount: bigint): void {
    this.balances.set(holder, this.balanceOf(holder) + amount);
  }

  onReceive(holder: string, hook: ReceiptHook | null): void {
    if (hook) {
      this.hooks.set(holder, hook);
    } else {
      this.hooks.delete(holder);
    }
  }

  async move(from: string, to: string, amount: bigint): Promise<boolean> {
    if (amount < BigInt(0) || this.balanceOf(from) < amount) return false;

    this.balances.set(from, this.balanceOf(from) - amount);
    this.balances.set(to, this.balanceOf(to) + amount);

    const hook = this.hooks.get(to);
    if (hook) {
      try {
        await hook(from, amount);
      } catch (err) {
        // A throwing recipient undoes the whole transfer
        this.balances.set(to, this.balanceOf(to) - amount);
        this.balances.set(from, this.balanceOf(from) + amount);
        throw err;
      }
    }
    return true;
  }
}
