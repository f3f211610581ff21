import { describe, it, expect, vi, afterEach } from "vitest";
import { EventBus, EventType, serializePayload } from "../src/event-bus/index.js";
import { StakingEngine } from "../src/staking-engine/index.js";
import { AssetType } from "../src/staking-engine/types.js";
import { ETH, START, createFixture } from "./helpers.js";
import { FakeBroker } from "./fakePubSub.js";

describe("Event Bus Serialization", () => {
  it("serializes BigInt values as decimal strings", () => {
    const serialized = serializePayload({ amount: 10n ** 18n, principal: "alice" });
    expect(serialized).toBe('{"amount":"1000000000000000000","principal":"alice"}');
  });
});

describe("EventBus", () => {
  let bus: EventBus;

  afterEach(async () => {
    await bus.disconnect();
  });

  it("refuses to publish before connecting", async () => {
    bus = new EventBus(new FakeBroker().createClient);
    await expect(
      bus.publish(EventType.PAUSED, { by: "owner", timestamp: START })
    ).rejects.toThrow("Not connected");
  });

  it("delivers published payloads to subscribers", async () => {
    const broker = new FakeBroker();
    bus = new EventBus(broker.createClient);
    await bus.connect();

    const handler = vi.fn();
    await bus.subscribe(EventType.PAUSED, handler);
    const receivers = await bus.publish(EventType.PAUSED, { by: "owner", timestamp: START });

    expect(receivers).toBe(1);
    await vi.waitFor(() => expect(handler).toHaveBeenCalledTimes(1));
    expect(handler).toHaveBeenCalledWith({ by: "owner", timestamp: "1700000000" });
  });

  it("stops delivering after unsubscribe", async () => {
    const broker = new FakeBroker();
    bus = new EventBus(broker.createClient);
    await bus.connect();

    const handler = vi.fn();
    await bus.subscribe(EventType.UNPAUSED, handler);
    await bus.unsubscribe(EventType.UNPAUSED);

    expect(await bus.publish(EventType.UNPAUSED, { by: "owner", timestamp: START })).toBe(0);
    expect(handler).not.toHaveBeenCalled();
  });
});

describe("StakingEngine", () => {
  it("forwards vault events to the bus", async () => {
    const broker = new FakeBroker();
    const bus = new EventBus(broker.createClient);
    await bus.connect();

    const f = createFixture();
    const engine = new StakingEngine(f.vault, bus);
    await engine.initialize();

    await f.vault.deposit("alice", AssetType.Native, 2n * ETH);

    await vi.waitFor(() => expect(broker.published).toHaveLength(1));
    expect(broker.published[0]).toEqual({
      channel: EventType.DEPOSITED,
      message: serializePayload({
        principal: "alice",
        asset: AssetType.Native,
        amount: 2n * ETH,
        timestamp: START,
      }),
    });

    await engine.shutdown();
    await f.vault.deposit("alice", AssetType.Native, 1n * ETH);
    expect(broker.published).toHaveLength(1);

    await bus.disconnect();
  });

  it("reports vault status", async () => {
    const f = createFixture();
    const engine = new StakingEngine(f.vault, null);
    await f.vault.deposit("alice", AssetType.Native, 1n * ETH);

    expect(await engine.getStatus()).toEqual({
      paused: false,
      owner: "owner",
      accounts: 1,
      price: 2000n * 10n ** 18n,
      priceFeedVersion: 1,
    });
  });
});
