import { AsyncLocalStorage } from "node:async_hooks";
import { StakingError } from "./errors.js";

interface Scope {
  operation: string;
}

/**
 * Non-reentrant lock for vault operations.
 *
 * A call made from inside a running operation (e.g. a transfer hook calling
 * back into the vault) is rejected with `ReentrantCall`. Calls from outside
 * wait their turn, so operations never interleave.
 */
export class ReentrancyGuard {
  private readonly context = new AsyncLocalStorage<Scope>();
  private tail: Promise<void> = Promise.resolve();
  private active: Scope | null = null;

  get locked(): boolean {
    return this.active !== null;
  }

  async run<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    const outer = this.context.getStore();
    if (outer !== undefined && outer === this.active) {
      throw new StakingError(
        "ReentrantCall",
        `${operation} called while ${outer.operation} is in progress`
      );
    }

    let release: () => void = () => undefined;
    const done = new Promise<void>((resolve) => {
      release = resolve;
    });
    const previous = this.tail;
    this.tail = previous.then(() => done);
    await previous;

    const scope: Scope = { operation };
    this.active = scope;
    try {
      return await this.context.run(scope, fn);
    } finally {
      this.active = null;
      release();
    }
  }
}
