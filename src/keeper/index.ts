/**
 * Keeper Bot
 *
 * Keeps a cached snapshot of the native/USD price fresh:
 *
 *   1. checkUpkeep()   — compare the live feed price against the cached one
 *   2. performUpkeep() — refresh the snapshot and publish price:refreshed
 *
 * Upkeep is needed when nothing is cached yet or when the price has moved by
 * at least `priceDeviationBps` (200 bps = 2%). The keeper never touches the
 * ledger.
 */

import cron, { type ScheduledTask } from "node-cron";
import { config } from "../config/index.js";
import { EventType, type EventBus } from "../event-bus/index.js";
import type { PriceFeed } from "../staking-engine/collaborators.js";
import { normalizePrice } from "../staking-engine/unitConverter.js";

export interface PriceSnapshot {
  price: bigint;
  refreshedAt: number;
}

export interface UpkeepCheck {
  needed: boolean;
  livePrice: bigint;
  deviationBps: bigint | null;
}

export function deviationBps(cached: bigint, live: bigint): bigint {
  const diff = live > cached ? live - cached : cached - live;
  return (diff * BigInt(10_000)) / cached;
}

export class KeeperBot {
  private snapshot: PriceSnapshot | null = null;
  private cronJob: ScheduledTask | null = null;
  private isRunning = false;

  constructor(
    private readonly priceFeed: PriceFeed,
    private readonly eventBus: EventBus | null,
    private readonly thresholdBps: bigint = config.protocol.priceDeviationBps
  ) {}

  async initialize(): Promise<void> {
    console.log("[KeeperBot] Initializing...");

    await this.runCycle().catch((err) =>
      console.error("[KeeperBot] Initial upkeep cycle failed:", err)
    );

    this.cronJob = cron.schedule(config.protocol.keeperCron, async () => {
      try {
        await this.runCycle();
      } catch (err) {
        console.error("[KeeperBot] Upkeep cycle error:", err);
      }
    });

    console.log(`[KeeperBot] Running on schedule "${config.protocol.keeperCron}"`);
  }

  async shutdown(): Promise<void> {
    if (this.cronJob) {
      this.cronJob.stop();
      this.cronJob = null;
    }
    console.log("[KeeperBot] Shut down");
  }

  getSnapshot(): PriceSnapshot | null {
    return this.snapshot ? { ...this.snapshot } : null;
  }

  async checkUpkeep(): Promise<UpkeepCheck> {
    const reading = await this.priceFeed.latestPrice();
    const livePrice = normalizePrice(reading.answer, reading.decimals);

    if (!this.snapshot) {
      return { needed: true, livePrice, deviationBps: null };
    }

    const deviation = deviationBps(this.snapshot.price, livePrice);
    return { needed: deviation >= this.thresholdBps, livePrice, deviationBps: deviation };
  }

  /** Refreshes the cached snapshot. Re-checks so a stale trigger is a no-op. */
  async performUpkeep(): Promise<boolean> {
    const check = await this.checkUpkeep();
    if (!check.needed) return false;

    const previousPrice = this.snapshot?.price ?? null;
    this.snapshot = { price: check.livePrice, refreshedAt: Date.now() };

    console.log(
      `[KeeperBot] Price snapshot refreshed: ${check.livePrice} (deviation: ${check.deviationBps ?? "n/a"} bps)`
    );

    if (this.eventBus?.connected) {
      await this.eventBus.publish(EventType.PRICE_REFRESHED, {
        previousPrice,
        price: check.livePrice,
        deviationBps: check.deviationBps,
        timestamp: this.snapshot.refreshedAt,
      });
    }
    return true;
  }

  async runCycle(): Promise<void> {
    if (this.isRunning) {
      console.log("[KeeperBot] Previous cycle still running, skipping");
      return;
    }
    this.isRunning = true;
    try {
      const { needed } = await this.checkUpkeep();
      if (needed) {
        await this.performUpkeep();
      }
    } finally {
      this.isRunning = false;
    }
  }
}
