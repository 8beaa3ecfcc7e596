import type { Logger } from 'pino';
import type { RegistryEvent, Webhook } from '../../domain/index.js';
import type { EventSink } from '../../application/event-bus.js';
import { KeyedLock } from '../../application/keyed-lock.js';
import { applyDeliveryOutcome, DEFAULT_FAILURE_THRESHOLD, webhookWants } from '../../application/webhook-state.js';
import type { RegistryStore } from '../store/index.js';
import { EVENT_HEADER, SIGNATURE_HEADER, serializeEvent, signPayload } from './signature.js';

export interface WebhookDispatcherOptions {
  /** The dispatcher's own store handle. */
  store: RegistryStore;
  log: Logger;
  /** Shared with any other writer of webhook records. */
  lock?: KeyedLock;
  failureThreshold?: number;
  timeoutMs?: number;
  fetchImpl?: typeof fetch;
  now?: () => Date;
}

const DEFAULT_TIMEOUT_MS = 10_000;

/**
 * Event sink that POSTs signed events to registered webhooks.
 *
 * `accept()` only spawns work: the lookup and every delivery run as
 * detached promises, so publishers never wait on a target. There is no
 * retry; each outcome feeds the webhook's failure counter, and recording
 * is serialized per webhook so concurrent deliveries never lose an update.
 */
export class WebhookDispatcher implements EventSink {
  readonly name = 'webhooks';

  private readonly store: RegistryStore;
  private readonly log: Logger;
  private readonly lock: KeyedLock;
  private readonly failureThreshold: number;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;
  private readonly now: () => Date;
  private readonly inFlight = new Set<Promise<void>>();

  constructor(options: WebhookDispatcherOptions) {
    this.store = options.store;
    this.log = options.log;
    this.lock = options.lock ?? new KeyedLock();
    this.failureThreshold = options.failureThreshold ?? DEFAULT_FAILURE_THRESHOLD;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init));
    this.now = options.now ?? (() => new Date());
  }

  accept(event: RegistryEvent): void {
    this.track(
      this.fanOut(event).catch((err: unknown) => {
        this.log.error({ err, type: event.type }, 'Webhook fan-out failed');
      }),
    );
  }

  /** Resolves once every spawned lookup and delivery has settled. */
  async drain(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.allSettled([...this.inFlight]);
    }
  }

  get pendingDeliveries(): number {
    return this.inFlight.size;
  }

  private track(task: Promise<void>): void {
    this.inFlight.add(task);
    void task.finally(() => this.inFlight.delete(task));
  }

  private async fanOut(event: RegistryEvent): Promise<void> {
    const targets = (await this.store.list('webhooks', { active: true })).filter((w) => webhookWants(w, event.type));
    if (targets.length === 0) return;

    const body = serializeEvent(event);
    for (const webhook of targets) {
      this.track(
        this.deliver(webhook, event, body).catch((err: unknown) => {
          this.log.error({ err, webhookId: webhook.id }, 'Recording webhook outcome failed');
        }),
      );
    }
  }

  private async deliver(webhook: Webhook, event: RegistryEvent, body: string): Promise<void> {
    let delivered = false;
    try {
      const response = await this.fetchImpl(webhook.url, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          [SIGNATURE_HEADER]: signPayload(webhook.secret, body),
          [EVENT_HEADER]: event.type,
        },
        body,
        signal: AbortSignal.timeout(this.timeoutMs),
      });
      delivered = response.ok;

      if (delivered) {
        this.log.debug({ webhookId: webhook.id, type: event.type }, 'Webhook delivered');
      } else {
        this.log.warn(
          { webhookId: webhook.id, type: event.type, status: response.status },
          'Webhook target returned non-2xx status',
        );
      }
    } catch (err: unknown) {
      this.log.warn({ err, webhookId: webhook.id, type: event.type }, 'Webhook delivery failed');
    }

    await this.recordOutcome(webhook.id, delivered);
  }

  private async recordOutcome(webhookId: string, delivered: boolean): Promise<void> {
    await this.lock.run(webhookId, async () => {
      // Re-read under the lock: the snapshot taken at fan-out may be stale.
      const current = await this.store.get('webhooks', webhookId);
      if (current === undefined) return;

      const next = applyDeliveryOutcome(current, delivered, this.now(), this.failureThreshold);
      await this.store.upsert('webhooks', next);

      if (current.active && !next.active) {
        this.log.warn(
          { webhookId, failureCount: next.failure_count },
          'Webhook disabled after repeated delivery failures',
        );
      }
    });
  }
}
