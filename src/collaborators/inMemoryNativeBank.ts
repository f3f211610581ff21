import type { NativeBank, ReceiptHook } from "../staking-engine/collaborators.js";
import { BalanceBook } from "./balanceBook.js";

export class InMemoryNativeBank implements NativeBank {
  private book = new BalanceBook();

  /** Credit `holder` out of thin air (faucet / test setup). */
  mint(holder: string, amount: bigint): void {
    this.book.mint(holder, amount);
  }

  onReceive(holder: string, hook: ReceiptHook | null): void {
    this.book.onReceive(holder, hook);
  }

  async transfer(from: string, to: string, amount: bigint): Promise<boolean> {
    return this.book.move(from, to, amount);
  }

  async balanceOf(holder: string): Promise<bigint> {
    return this.book.balanceOf(holder);
  }
}
