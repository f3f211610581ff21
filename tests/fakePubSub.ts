import type { PubSubClient } from "../src/event-bus/index.js";

type MessageListener = (channel: string, message: string) => void;

/** In-process stand-in for a Redis pub/sub server. */
export class FakeBroker {
  readonly published: Array<{ channel: string; message: string }> = [];
  private subscriptions = new Map<string, Set<FakeClient>>();

  createClient = (): PubSubClient => new FakeClient(this);

  deliver(channel: string, message: string): number {
    this.published.push({ channel, message });
    const receivers = this.subscriptions.get(channel) ?? new Set<FakeClient>();
    for (const client of receivers) {
      setImmediate(() => client.emit(channel, message));
    }
    return receivers.size;
  }

  add(channel: string, client: FakeClient): void {
    const set = this.subscriptions.get(channel) ?? new Set<FakeClient>();
    set.add(client);
    this.subscriptions.set(channel, set);
  }

  remove(channel: string, client: FakeClient): void {
    this.subscriptions.get(channel)?.delete(client);
  }
}

class FakeClient implements PubSubClient {
  private listeners: MessageListener[] = [];
  private channels = new Set<string>();

  constructor(private readonly broker: FakeBroker) {}

  async connect(): Promise<void> {}

  async publish(channel: string, message: string): Promise<number> {
    return this.broker.deliver(channel, message);
  }

  async subscribe(channel: string): Promise<number> {
    this.channels.add(channel);
    this.broker.add(channel, this);
    return this.channels.size;
  }

  async unsubscribe(channel: string): Promise<number> {
    this.channels.delete(channel);
    this.broker.remove(channel, this);
    return this.channels.size;
  }

  async quit(): Promise<string> {
    for (const channel of this.channels) {
      this.broker.remove(channel, this);
    }
    this.channels.clear();
    return "OK";
  }

  on(_event: "message", listener: MessageListener): this {
    this.listeners.push(listener);
    return this;
  }

  emit(channel: string, message: string): void {
    for (const listener of this.listeners) {
      listener(channel, message);
    }
  }
}
