import { Redis } from "ioredis";
import { config } from "../config/index.js";
import { EventType, type EventPayloadMap } from "./events.js";

export { EventType } from "./events.js";
export type { EventPayloadMap, VaultEvent, VaultEventListener } from "./events.js";

/** The slice of an ioredis connection the bus relies on. */
export interface PubSubClient {
  connect(): Promise<void>;
  publish(channel: string, message: string): Promise<number>;
  subscribe(channel: string): Promise<unknown>;
  unsubscribe(channel: string): Promise<unknown>;
  quit(): Promise<unknown>;
  on(event: "message", listener: (channel: string, message: string) => void): unknown;
}

function createRedisClient(): PubSubClient {
  return new Redis(config.redis.url, {
    maxRetriesPerRequest: 3,
    retryStrategy(times) {
      const delay = Math.min(times * 200, 5000);
      return delay;
    },
    lazyConnect: true,
  });
}

export function serializePayload(data: object): string {
  return JSON.stringify(data, (_, value) =>
    typeof value === "bigint" ? value.toString() : value
  );
}

function deserializePayload(raw: string): unknown {
  return JSON.parse(raw);
}

type Handler = (data: unknown) => void | Promise<void>;

export class EventBus {
  private publisher: PubSubClient;
  private subscriber: PubSubClient;
  private handlers: Map<string, Handler[]>;
  private isConnected: boolean;

  constructor(createClient: () => PubSubClient = createRedisClient) {
    this.publisher = createClient();
    this.subscriber = createClient();
    this.handlers = new Map();
    this.isConnected = false;
  }

  get connected(): boolean {
    return this.isConnected;
  }

  async connect(): Promise<void> {
    if (this.isConnected) return;

    await Promise.all([this.publisher.connect(), this.subscriber.connect()]);

    this.subscriber.on("message", (channel: string, message: string) => {
      const channelHandlers = this.handlers.get(channel);
      if (!channelHandlers) return;

      const data = deserializePayload(message);
      for (const handler of channelHandlers) {
        try {
          const result = handler(data);
          if (result instanceof Promise) {
            result.catch((err) =>
              console.error(`[EventBus] Handler error on ${channel}:`, err)
            );
          }
        } catch (err) {
          console.error(`[EventBus] Sync handler error on ${channel}:`, err);
        }
      }
    });

    this.isConnected = true;
    console.log("[EventBus] Connected to Redis pub/sub");
  }

  async publish<T extends EventType>(
    channel: T,
    data: EventPayloadMap[T]
  ): Promise<number> {
    if (!this.isConnected) {
      throw new Error("[EventBus] Not connected. Call connect() first.");
    }
    const serialized = serializePayload(data);
    const receivers = await this.publisher.publish(channel, serialized);
    console.log(`[EventBus] Published to ${channel} (${receivers} receivers)`);
    return receivers;
  }

  /**
   * Handlers receive the JSON-decoded payload: bigint fields arrive as
   * decimal strings.
   */
  async subscribe(channel: EventType, callback: Handler): Promise<void> {
    if (!this.isConnected) {
      throw new Error("[EventBus] Not connected. Call connect() first.");
    }

    const existing = this.handlers.get(channel);
    if (existing) {
      existing.push(callback);
    } else {
      this.handlers.set(channel, [callback]);
      await this.subscriber.subscribe(channel);
    }

    console.log(`[EventBus] Subscribed to ${channel}`);
  }

  async unsubscribe(channel: EventType): Promise<void> {
    this.handlers.delete(channel);
    await this.subscriber.unsubscribe(channel);
    console.log(`[EventBus] Unsubscribed from ${channel}`);
  }

  async disconnect(): Promise<void> {
    if (!this.isConnected) return;
    this.handlers.clear();
    await this.subscriber.quit();
    await this.publisher.quit();
    this.isConnected = false;
    console.log("[EventBus] Disconnected");
  }
}

let eventBusInstance: EventBus | null = null;

export function getEventBus(): EventBus {
  if (!eventBusInstance) {
    eventBusInstance = new EventBus();
  }
  return eventBusInstance;
}

export async function initEventBus(): Promise<void> {
  const bus = getEventBus();
  await bus.connect();
}

export async function shutdownEventBus(): Promise<void> {
  if (eventBusInstance) {
    await eventBusInstance.disconnect();
    eventBusInstance = null;
  }
}
