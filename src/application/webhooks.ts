import { randomBytes, randomUUID } from 'node:crypto';
import type { Webhook } from '../domain/index.js';
import type { RegistryStore } from '../infrastructure/store/index.js';
import type { KeyedLock } from './keyed-lock.js';
import type { CreateWebhookInput, PatchWebhookInput } from './registry-schema.js';
import { reactivateWebhook } from './webhook-state.js';

/** A webhook as listed over the API: the secret is only shown on creation. */
export type PublicWebhook = Omit<Webhook, 'secret'>;

export function toPublicWebhook({ secret: _secret, ...rest }: Webhook): PublicWebhook {
  return rest;
}

export async function createWebhook(
  store: RegistryStore,
  input: CreateWebhookInput,
  createdBy: string,
): Promise<Webhook> {
  const webhook: Webhook = {
    id: randomUUID(),
    url: input.url,
    secret: `whsec_${randomBytes(24).toString('hex')}`,
    events: input.events,
    active: true,
    failure_count: 0,
    last_triggered_at: null,
    created_at: new Date().toISOString(),
    created_by: createdBy,
  };
  await store.append('webhooks', webhook);
  return webhook;
}

/** Updates url/events; `active: true` also clears the failure counter. */
export async function patchWebhook(
  store: RegistryStore,
  webhook: Webhook,
  patch: PatchWebhookInput,
): Promise<Webhook> {
  let next: Webhook = {
    ...webhook,
    url: patch.url ?? webhook.url,
    events: patch.events ?? webhook.events,
  };
  if (patch.active === true) next = reactivateWebhook(next);

  await store.upsert('webhooks', next);
  return next;
}

/**
 * Removes a webhook under the same lock the dispatcher records delivery
 * outcomes under, so an in-flight outcome cannot write the record back.
 */
export async function deleteWebhook(store: RegistryStore, lock: KeyedLock, id: string): Promise<boolean> {
  return lock.run(id, () => store.remove('webhooks', id));
}
