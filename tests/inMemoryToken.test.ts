import { describe, it, expect } from "vitest";
import { InMemoryToken } from "../src/collaborators/inMemoryToken.js";
import { USD, VAULT } from "./helpers.js";

describe("InMemoryToken", () => {
  it("spends the allowance on a successful transferFrom", async () => {
    const token = new InMemoryToken();
    token.mint("alice", 100n * USD);
    await token.approve("alice", VAULT, 100n * USD);

    expect(await token.transferFrom(VAULT, "alice", VAULT, 40n * USD)).toBe(true);
    expect(token.allowance("alice", VAULT)).toBe(60n * USD);
    expect(await token.balanceOf(VAULT)).toBe(40n * USD);
  });

  it("refuses transfers beyond the allowance", async () => {
    const token = new InMemoryToken();
    token.mint("alice", 100n * USD);
    await token.approve("alice", VAULT, 10n * USD);

    expect(await token.transferFrom(VAULT, "alice", VAULT, 11n * USD)).toBe(false);
    expect(token.allowance("alice", VAULT)).toBe(10n * USD);
  });

  it("restores balances and allowance when the recipient hook throws", async () => {
    const token = new InMemoryToken();
    token.mint("alice", 100n * USD);
    await token.approve("alice", VAULT, 100n * USD);
    token.onReceive(VAULT, async () => {
      throw new Error("rejected");
    });

    await expect(token.transferFrom(VAULT, "alice", VAULT, 40n * USD)).rejects.toThrow("rejected");
    expect(token.allowance("alice", VAULT)).toBe(100n * USD);
    expect(await token.balanceOf("alice")).toBe(100n * USD);
    expect(await token.balanceOf(VAULT)).toBe(0n);
  });
});
