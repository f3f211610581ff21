import { config } from "../config/index.js";
import { InMemoryNativeBank } from "../collaborators/inMemoryNativeBank.js";
import { InMemoryToken } from "../collaborators/inMemoryToken.js";
import { HttpPriceFeed, StaticPriceFeed } from "../collaborators/priceFeed.js";
import type { EventBus, VaultEvent } from "../event-bus/index.js";
import type { PriceFeed } from "./collaborators.js";
import { systemClock, type Clock } from "./types.js";
import { StakingVault } from "./vault.js";

export { StakingVault } from "./vault.js";
export { StakingError, isStakingError } from "./errors.js";
export type { StakingErrorCode } from "./errors.js";
export { AssetType } from "./types.js";
export type { Account, Clock, VaultParams } from "./types.js";

export interface VaultRuntime {
  vault: StakingVault;
  nativeBank: InMemoryNativeBank;
  token: InMemoryToken;
  priceFeed: PriceFeed;
}

export function createPriceFeed(): PriceFeed {
  if (config.price.apiUrl) {
    return new HttpPriceFeed(config.price.apiUrl);
  }
  return new StaticPriceFeed(config.price.staticAnswer, config.price.staticDecimals);
}

/** Vault wired to in-memory custody and the configured price feed. */
export function createVaultRuntime(
  priceFeed: PriceFeed = createPriceFeed(),
  clock: Clock = systemClock
): VaultRuntime {
  const nativeBank = new InMemoryNativeBank();
  const token = new InMemoryToken();
  const vault = new StakingVault({
    owner: config.admin.owner,
    address: config.admin.vaultAddress,
    priceFeed,
    token,
    nativeBank,
    params: config.protocol,
    clock,
  });
  return { vault, nativeBank, token, priceFeed };
}

/**
 * Service wrapper around the vault: forwards ledger events to the Redis
 * event bus for downstream consumers.
 */
export class StakingEngine {
  private detach: (() => void) | null = null;

  constructor(
    readonly vault: StakingVault,
    private readonly eventBus: EventBus | null
  ) {}

  async initialize(): Promise<void> {
    console.log("[StakingEngine] Initializing...");

    if (this.eventBus) {
      const bus = this.eventBus;
      this.detach = this.vault.onEvent((event) => {
        this.forward(bus, event).catch((err) =>
          console.error(`[StakingEngine] Failed to publish ${event.type}:`, err)
        );
      });
    }

    console.log("[StakingEngine] Initialized successfully");
  }

  async shutdown(): Promise<void> {
    if (this.detach) {
      this.detach();
      this.detach = null;
    }
    console.log("[StakingEngine] Shut down");
  }

  async getStatus(): Promise<{
    paused: boolean;
    owner: string;
    accounts: number;
    price: bigint | null;
    priceFeedVersion: number | null;
  }> {
    const [price, priceFeedVersion] = await Promise.all([
      this.vault.getPrice().catch(() => null),
      this.vault.getPriceFeedVersion().catch(() => null),
    ]);

    return {
      paused: this.vault.isPaused(),
      owner: this.vault.owner,
      accounts: this.vault.accountCount(),
      price,
      priceFeedVersion,
    };
  }

  private async forward(bus: EventBus, event: VaultEvent): Promise<void> {
    if (!bus.connected) return;
    await bus.publish(event.type, event.payload);
  }
}
