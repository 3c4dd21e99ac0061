import type { ChatEvent } from "@triad/protocol";

/** What a subscription does when its buffer is full and another event arrives */
export type OverflowPolicy = "drop-oldest" | "disconnect";

export interface SubscriptionOptions {
  bufferSize?: number;
  overflow?: OverflowPolicy;
}

const DEFAULT_BUFFER_SIZE = 256;

/**
 * A live listener on one topic. Events are buffered until consumed through
 * `next()` or `for await`. The buffer is bounded.
 */
export class Subscription implements AsyncIterable<ChatEvent> {
  /** Events discarded under the drop-oldest policy */
  dropped = 0;
  /** True once the subscription closed because its buffer overflowed */
  overflowed = false;

  private buffer: ChatEvent[] = [];
  private waiters: Array<(result: IteratorResult<ChatEvent, undefined>) => void> = [];
  private closed = false;

  constructor(
    readonly topic: string,
    private bufferSize: number,
    private overflow: OverflowPolicy,
    private onClose: (subscription: Subscription) => void
  ) {}

  get isClosed(): boolean {
    return this.closed;
  }

  /** Number of events waiting to be consumed */
  get pending(): number {
    return this.buffer.length;
  }

  push(event: ChatEvent): void {
    if (this.closed) return;

    const waiter = this.waiters.shift();
    if (waiter) {
      waiter({ done: false, value: event });
      return;
    }

    if (this.buffer.length >= this.bufferSize) {
      if (this.overflow === "disconnect") {
        this.overflowed = true;
        this.close();
        return;
      }
      this.buffer.shift();
      this.dropped++;
    }
    this.buffer.push(event);
  }

  next(): Promise<IteratorResult<ChatEvent, undefined>> {
    const event = this.buffer.shift();
    if (event) {
      return Promise.resolve({ done: false, value: event });
    }
    if (this.closed) {
      return Promise.resolve({ done: true, value: undefined });
    }
    return new Promise((resolve) => {
      this.waiters.push(resolve);
    });
  }

  /** Stop listening; pending waiters finish and buffered events are discarded */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.buffer = [];
    for (const waiter of this.waiters.splice(0)) {
      waiter({ done: true, value: undefined });
    }
    this.onClose(this);
  }

  [Symbol.asyncIterator](): AsyncIterator<ChatEvent, undefined> {
    return {
      next: () => this.next(),
      return: () => {
        this.close();
        return Promise.resolve({ done: true, value: undefined });
      },
    };
  }
}

/**
 * Topic-keyed fan-out. Registry state is local to this process; a message
 * published here never reaches subscribers of another instance.
 */
export class Broadcaster {
  private topics = new Map<string, Set<Subscription>>();

  constructor(private defaults: SubscriptionOptions = {}) {}

  subscribe(topic: string, options: SubscriptionOptions = {}): Subscription {
    const subscription = new Subscription(
      topic,
      options.bufferSize ?? this.defaults.bufferSize ?? DEFAULT_BUFFER_SIZE,
      options.overflow ?? this.defaults.overflow ?? "drop-oldest",
      (s) => this.remove(s)
    );
    let subscribers = this.topics.get(topic);
    if (!subscribers) {
      subscribers = new Set();
      this.topics.set(topic, subscribers);
    }
    subscribers.add(subscription);
    return subscription;
  }

  unsubscribe(subscription: Subscription): void {
    subscription.close();
  }

  /** Deliver to every subscriber registered on the topic right now */
  publish(topic: string, event: ChatEvent): number {
    const subscribers = this.topics.get(topic);
    if (!subscribers) return 0;
    const targets = [...subscribers];
    for (const subscription of targets) {
      subscription.push(event);
    }
    return targets.length;
  }

  subscriberCount(topic: string): number {
    return this.topics.get(topic)?.size ?? 0;
  }

  /** Close every subscription on every topic */
  closeAll(): void {
    for (const subscribers of [...this.topics.values()]) {
      for (const subscription of [...subscribers]) {
        subscription.close();
      }
    }
  }

  private remove(subscription: Subscription): void {
    const subscribers = this.topics.get(subscription.topic);
    if (!subscribers) return;
    subscribers.delete(subscription);
    if (subscribers.size === 0) {
      this.topics.delete(subscription.topic);
    }
  }
}
