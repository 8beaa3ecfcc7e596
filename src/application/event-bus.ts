import type { Logger } from 'pino';
import type { EventPayload, EventType, RegistryEvent } from '../domain/index.js';

/** What a live subscriber reads next. */
export type StreamItem =
  | { kind: 'event'; event: RegistryEvent }
  | { kind: 'warning'; missed: number }
  | { kind: 'heartbeat' }
  | { kind: 'closed' };

/**
 * Receives every published event synchronously.
 * Implementations must hand off any slow work and return immediately.
 */
export interface EventSink {
  readonly name: string;
  accept(event: RegistryEvent): void;
}

export interface EventBusOptions {
  log: Logger;
  /** Per-subscriber queue capacity. */
  bufferCapacity?: number;
  heartbeatMs?: number;
  now?: () => Date;
}

const DEFAULT_BUFFER_CAPACITY = 256;
const DEFAULT_HEARTBEAT_MS = 15_000;

let nextSubscriptionId = 1;

/**
 * One live subscriber's bounded queue.
 *
 * When the queue is full the oldest event is dropped and counted. The next
 * read reports the drop count once as a warning, then delivery resumes with
 * whatever is still queued.
 */
export class Subscription {
  readonly id = nextSubscriptionId++;

  private readonly queue: RegistryEvent[] = [];
  private missed = 0;
  private heartbeatPending = false;
  private closed = false;
  private waiter: ((item: StreamItem) => void) | null = null;

  constructor(
    private readonly capacity: number,
    private readonly onClose: (subscription: Subscription) => void,
  ) {}

  /** Resolves with the next item; waits when nothing is pending. */
  next(): Promise<StreamItem> {
    const ready = this.take();
    if (ready !== null) return Promise.resolve(ready);

    return new Promise<StreamItem>((resolve) => {
      this.waiter = resolve;
    });
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.queue.length = 0;
    this.wake();
    this.onClose(this);
  }

  get isClosed(): boolean {
    return this.closed;
  }

  get pending(): number {
    return this.queue.length;
  }

  /** @internal called by the bus */
  deliver(event: RegistryEvent): void {
    if (this.closed) return;

    this.queue.push(event);
    if (this.queue.length > this.capacity) {
      this.queue.shift();
      this.missed += 1;
    }
    this.wake();
  }

  /** @internal called by the bus */
  flagHeartbeat(): void {
    if (this.closed) return;
    this.heartbeatPending = true;
    this.wake();
  }

  private wake(): void {
    if (this.waiter === null) return;
    const item = this.take();
    if (item === null) return;

    const resolve = this.waiter;
    this.waiter = null;
    resolve(item);
  }

  private take(): StreamItem | null {
    if (this.closed) return { kind: 'closed' };

    if (this.missed > 0) {
      const missed = this.missed;
      this.missed = 0;
      return { kind: 'warning', missed };
    }

    // One heartbeat per tick, whether or not events are flowing.
    if (this.heartbeatPending) {
      this.heartbeatPending = false;
      return { kind: 'heartbeat' };
    }

    const event = this.queue.shift();
    if (event !== undefined) return { kind: 'event', event };

    return null;
  }
}

/**
 * In-process broadcaster.
 *
 * `publish()` copies the event into every current subscriber's queue and
 * hands it to every sink before returning. It never awaits, so a slow
 * reader or a slow webhook target cannot hold up the publisher.
 */
export class EventBus {
  private readonly subscriptions = new Set<Subscription>();
  private readonly sinks: EventSink[] = [];
  private readonly log: Logger;
  private readonly capacity: number;
  private readonly heartbeatMs: number;
  private readonly now: () => Date;
  private heartbeat: ReturnType<typeof setInterval> | null = null;
  private stopped = false;

  constructor(options: EventBusOptions) {
    this.log = options.log;
    this.capacity = options.bufferCapacity ?? DEFAULT_BUFFER_CAPACITY;
    this.heartbeatMs = options.heartbeatMs ?? DEFAULT_HEARTBEAT_MS;
    this.now = options.now ?? (() => new Date());
  }

  subscribe(): Subscription {
    const subscription = new Subscription(this.capacity, (s) => this.detach(s));
    if (this.stopped) {
      subscription.close();
      return subscription;
    }

    this.subscriptions.add(subscription);
    this.ensureHeartbeat();
    this.log.debug(
      { subscriptionId: subscription.id, subscriberCount: this.subscriptions.size },
      'Subscriber attached',
    );
    return subscription;
  }

  addSink(sink: EventSink): void {
    this.sinks.push(sink);
  }

  publish(type: EventType, payload: EventPayload): RegistryEvent {
    const event: RegistryEvent = {
      type,
      payload,
      timestamp: this.now().toISOString(),
    };

    for (const subscription of this.subscriptions) {
      subscription.deliver(event);
    }

    for (const sink of this.sinks) {
      try {
        sink.accept(event);
      } catch (err: unknown) {
        this.log.error({ err, sink: sink.name, type }, 'Event sink threw during publish');
      }
    }

    this.log.debug({ type, subscriberCount: this.subscriptions.size }, 'Event published');
    return event;
  }

  get subscriberCount(): number {
    return this.subscriptions.size;
  }

  /** Stops the heartbeat and closes every live subscription. */
  shutdown(): void {
    this.stopped = true;
    this.stopHeartbeat();
    for (const subscription of [...this.subscriptions]) {
      subscription.close();
    }
  }

  private detach(subscription: Subscription): void {
    if (!this.subscriptions.delete(subscription)) return;
    this.log.debug(
      { subscriptionId: subscription.id, subscriberCount: this.subscriptions.size },
      'Subscriber detached',
    );
    if (this.subscriptions.size === 0) this.stopHeartbeat();
  }

  private ensureHeartbeat(): void {
    if (this.heartbeat !== null) return;
    this.heartbeat = setInterval(() => {
      for (const subscription of this.subscriptions) {
        subscription.flagHeartbeat();
      }
    }, this.heartbeatMs);
    this.heartbeat.unref();
  }

  private stopHeartbeat(): void {
    if (this.heartbeat === null) return;
    clearInterval(this.heartbeat);
    this.heartbeat = null;
  }
}
