import type { FungibleToken, ReceiptHook } from "../staking-engine/collaborators.js";
import { BalanceBook } from "./balanceBook.js";

/** Allowance-based fungible token held in memory. */
export class InMemoryToken implements FungibleToken {
  private book = new BalanceBook();
  private allowances = new Map<string, bigint>();

  mint(holder: string, amount: bigint): void {
    this.book.mint(holder, amount);
  }

  onReceive(holder: string, hook: ReceiptHook | null): void {
    this.book.onReceive(holder, hook);
  }

  allowance(owner: string, spender: string): bigint {
    return this.allowances.get(`${owner}:${spender}`) ?? BigInt(0);
  }

  async approve(owner: string, spender: string, amount: bigint): Promise<boolean> {
    if (amount < BigInt(0)) return false;
    this.allowances.set(`${owner}:${spender}`, amount);
    return true;
  }

  async transfer(from: string, to: string, amount: bigint): Promise<boolean> {
    return this.book.move(from, to, amount);
  }

  async transferFrom(spender: string, from: string, to: string, amount: bigint): Promise<boolean> {
    const allowed = this.allowance(from, spender);
    if (allowed < amount || this.book.balanceOf(from) < amount) return false;

    this.allowances.set(`${from}:${spender}`, allowed - amount);
    try {
      return await this.book.move(from, to, amount);
    } catch (err) {
      this.allowances.set(`${from}:${spender}`, allowed);
      throw err;
    }
  }

  async balanceOf(holder: string): Promise<bigint> {
    return this.book.balanceOf(holder);
  }
}
