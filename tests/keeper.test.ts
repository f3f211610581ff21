import { describe, it, expect, beforeEach } from "vitest";
import { KeeperBot, deviationBps } from "../src/keeper/index.js";
import { EventBus, EventType } from "../src/event-bus/index.js";
import { StaticPriceFeed } from "../src/collaborators/priceFeed.js";
import { FakeBroker } from "./fakePubSub.js";

const usd = (dollars: bigint) => dollars * 10n ** 8n;

describe("deviationBps", () => {
  it("is symmetric in direction", () => {
    expect(deviationBps(100n, 97n)).toBe(300n);
    expect(deviationBps(100n, 103n)).toBe(300n);
    expect(deviationBps(100n, 100n)).toBe(0n);
  });
});

describe("KeeperBot", () => {
  let feed: StaticPriceFeed;
  let keeper: KeeperBot;

  beforeEach(() => {
    feed = new StaticPriceFeed(usd(2000n), 8);
    keeper = new KeeperBot(feed, null, 200n);
  });

  it("needs upkeep when nothing is cached", async () => {
    expect(await keeper.checkUpkeep()).toEqual({
      needed: true,
      livePrice: 2000n * 10n ** 18n,
      deviationBps: null,
    });
  });

  it("refreshes only once the price moves past the threshold", async () => {
    expect(await keeper.performUpkeep()).toBe(true);
    expect(keeper.getSnapshot()?.price).toBe(2000n * 10n ** 18n);

    feed.setAnswer(usd(2030n));
    const check = await keeper.checkUpkeep();
    expect(check.needed).toBe(false);
    expect(check.deviationBps).toBe(150n);
    expect(await keeper.performUpkeep()).toBe(false);
    expect(keeper.getSnapshot()?.price).toBe(2000n * 10n ** 18n);

    feed.setAnswer(usd(2040n));
    expect((await keeper.checkUpkeep()).deviationBps).toBe(200n);
    expect(await keeper.performUpkeep()).toBe(true);
    expect(keeper.getSnapshot()?.price).toBe(2040n * 10n ** 18n);
  });

  it("publishes price:refreshed when the bus is connected", async () => {
    const broker = new FakeBroker();
    const bus = new EventBus(broker.createClient);
    await bus.connect();
    keeper = new KeeperBot(feed, bus, 200n);

    await keeper.runCycle();

    expect(broker.published).toHaveLength(1);
    expect(broker.published[0].channel).toBe(EventType.PRICE_REFRESHED);
    expect(JSON.parse(broker.published[0].message)).toMatchObject({
      previousPrice: null,
      price: "2000000000000000000000",
      deviationBps: null,
    });

    await bus.disconnect();
  });

  it("surfaces feed failures from checkUpkeep", async () => {
    feed.setAnswer(0n);
    await expect(keeper.checkUpkeep()).rejects.toMatchObject({ code: "InvalidPrice" });
  });
});
