import { describe, it, expect, vi, beforeEach, type Mock } from 'vitest';
import { WebhookDispatcher, signPayload } from '../../src/infrastructure/webhooks/index.js';
import { MemoryBackend, MemoryStore } from '../../src/infrastructure/store/index.js';
import type { CollectionName, RecordOf } from '../../src/infrastructure/store/index.js';
import { KeyedLock } from '../../src/application/keyed-lock.js';
import { deleteWebhook } from '../../src/application/webhooks.js';
import type { RegistryEvent } from '../../src/domain/index.js';
import { fakeLogger, makeWebhook, FIXED_NOW } from '../helpers.js';

function event(type: RegistryEvent['type'] = 'listing.approved'): RegistryEvent {
  return { type, payload: { listing_id: 'l1' }, timestamp: '2026-03-02T12:00:00.000Z' };
}

const EXPECTED_BODY = '{"event":"listing.approved","data":{"listing_id":"l1"},"timestamp":"2026-03-02T12:00:00.000Z"}';

describe('WebhookDispatcher', () => {
  let store: MemoryStore;
  let log: ReturnType<typeof fakeLogger>;
  let fetchImpl: Mock<typeof fetch>;
  let dispatcher: WebhookDispatcher;

  beforeEach(() => {
    store = new MemoryStore(new MemoryBackend(), 'webhooks');
    log = fakeLogger();
    fetchImpl = vi.fn<typeof fetch>();
    dispatcher = new WebhookDispatcher({ store, log, fetchImpl, now: () => new Date(FIXED_NOW) });
  });

  it('POSTs the signed event body to an active webhook', async () => {
    const webhook = makeWebhook({ url: 'https://hooks.example.test/a', secret: 'test-secret' });
    await store.append('webhooks', webhook);
    fetchImpl.mockResolvedValue(new Response(null, { status: 204 }));

    dispatcher.accept(event());
    await dispatcher.drain();

    expect(fetchImpl).toHaveBeenCalledOnce();
    expect(fetchImpl).toHaveBeenCalledWith('https://hooks.example.test/a', expect.objectContaining({
      method: 'POST',
      body: EXPECTED_BODY,
      headers: {
        'Content-Type': 'application/json',
        'X-Registry-Signature': signPayload('test-secret', EXPECTED_BODY),
        'X-Registry-Event': 'listing.approved',
      },
    }));

    const stored = await store.get('webhooks', webhook.id);
    expect(stored?.failure_count).toBe(0);
    expect(stored?.last_triggered_at).toBe('2026-03-02T12:00:00.000Z');
  });

  it('returns from accept before any delivery finishes', async () => {
    await store.append('webhooks', makeWebhook());
    let respond: (response: Response) => void = () => undefined;
    fetchImpl.mockReturnValue(new Promise<Response>((resolve) => {
      respond = resolve;
    }));

    dispatcher.accept(event());
    expect(dispatcher.pendingDeliveries).toBeGreaterThan(0);

    await vi.waitFor(() => expect(fetchImpl).toHaveBeenCalledOnce());
    respond(new Response(null, { status: 200 }));
    await dispatcher.drain();
    expect(dispatcher.pendingDeliveries).toBe(0);
  });

  it('skips webhooks not subscribed to the event type', async () => {
    await store.append('webhooks', makeWebhook({ events: ['listing.rejected'] }));
    await store.append('webhooks', makeWebhook({ active: false, failure_count: 10 }));

    dispatcher.accept(event('listing.approved'));
    await dispatcher.drain();

    expect(fetchImpl).not.toHaveBeenCalled();
  });

  it('counts a non-2xx response as a failure and logs it at warn', async () => {
    const webhook = makeWebhook();
    await store.append('webhooks', webhook);
    fetchImpl.mockResolvedValue(new Response('nope', { status: 500 }));

    dispatcher.accept(event());
    await dispatcher.drain();

    expect((await store.get('webhooks', webhook.id))?.failure_count).toBe(1);
    expect(log.warn).toHaveBeenCalledWith(
      expect.objectContaining({ webhookId: webhook.id, status: 500 }),
      'Webhook target returned non-2xx status',
    );
  });

  it('counts a network error as a failure', async () => {
    const webhook = makeWebhook();
    await store.append('webhooks', webhook);
    fetchImpl.mockRejectedValue(new TypeError('fetch failed'));

    dispatcher.accept(event());
    await dispatcher.drain();

    expect((await store.get('webhooks', webhook.id))?.failure_count).toBe(1);
    expect(log.warn).toHaveBeenCalledWith(
      expect.objectContaining({ err: expect.any(TypeError), webhookId: webhook.id }),
      'Webhook delivery failed',
    );
  });

  it('disables at the tenth consecutive failure and stops delivering', async () => {
    const webhook = makeWebhook();
    await store.append('webhooks', webhook);
    fetchImpl.mockResolvedValue(new Response(null, { status: 503 }));

    for (let i = 1; i <= 9; i++) {
      dispatcher.accept(event());
      await dispatcher.drain();
      expect((await store.get('webhooks', webhook.id))?.active).toBe(true);
    }

    dispatcher.accept(event());
    await dispatcher.drain();
    const disabled = await store.get('webhooks', webhook.id);
    expect(disabled?.failure_count).toBe(10);
    expect(disabled?.active).toBe(false);
    expect(log.warn).toHaveBeenCalledWith(
      { webhookId: webhook.id, failureCount: 10 },
      'Webhook disabled after repeated delivery failures',
    );

    dispatcher.accept(event());
    await dispatcher.drain();
    expect(fetchImpl).toHaveBeenCalledTimes(10);
  });

  it('never loses an increment when failures land concurrently', async () => {
    const webhook = makeWebhook();
    await store.append('webhooks', webhook);
    fetchImpl.mockImplementation(async () => new Response(null, { status: 500 }));

    for (let i = 0; i < 10; i++) dispatcher.accept(event());
    await dispatcher.drain();

    const stored = await store.get('webhooks', webhook.id);
    expect(stored?.failure_count).toBe(10);
    expect(stored?.active).toBe(false);
  });

  it('clears the counter on the next success', async () => {
    const webhook = makeWebhook({ failure_count: 7 });
    await store.append('webhooks', webhook);
    fetchImpl.mockResolvedValue(new Response(null, { status: 200 }));

    dispatcher.accept(event());
    await dispatcher.drain();

    expect((await store.get('webhooks', webhook.id))?.failure_count).toBe(0);
  });
});

/** Holds every read open until `release()`, after the record was fetched. */
class SlowReadStore extends MemoryStore {
  reads = 0;
  private gate: Promise<void>;
  release: () => void = () => undefined;

  constructor(backend: MemoryBackend, name: string) {
    super(backend, name);
    this.gate = new Promise<void>((resolve) => {
      this.release = resolve;
    });
  }

  override async get<C extends CollectionName>(collection: C, id: string): Promise<RecordOf<C> | undefined> {
    const record = await super.get(collection, id);
    this.reads += 1;
    await this.gate;
    return record;
  }
}

describe('deleteWebhook during outcome recording', () => {
  it('is not undone by a delivery outcome recorded at the same time', async () => {
    const backend = new MemoryBackend();
    const webhooksHandle = new SlowReadStore(backend, 'webhooks');
    const requestsHandle = new MemoryStore(backend, 'requests');
    const lock = new KeyedLock();
    const fetchImpl = vi.fn<typeof fetch>().mockResolvedValue(new Response(null, { status: 500 }));
    const dispatcher = new WebhookDispatcher({ store: webhooksHandle, log: fakeLogger(), lock, fetchImpl });

    const webhook = makeWebhook();
    await requestsHandle.append('webhooks', webhook);

    dispatcher.accept(event());
    await vi.waitFor(() => expect(webhooksHandle.reads).toBe(1));

    const deleting = deleteWebhook(requestsHandle, lock, webhook.id);
    webhooksHandle.release();
    await dispatcher.drain();

    expect(await deleting).toBe(true);
    expect(await requestsHandle.get('webhooks', webhook.id)).toBeUndefined();
  });
});
