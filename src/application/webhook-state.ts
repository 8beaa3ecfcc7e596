import type { Webhook } from '../domain/index.js';

export const DEFAULT_FAILURE_THRESHOLD = 10;

/**
 * Applies one delivery outcome to a webhook.
 *
 * Success clears the counter and stamps `last_triggered_at` but leaves
 * `active` alone. Failure increments the counter and deactivates the
 * webhook once it reaches `threshold`.
 */
export function applyDeliveryOutcome(
  webhook: Webhook,
  delivered: boolean,
  now: Date,
  threshold: number = DEFAULT_FAILURE_THRESHOLD,
): Webhook {
  if (delivered) {
    return { ...webhook, failure_count: 0, last_triggered_at: now.toISOString() };
  }

  const failure_count = webhook.failure_count + 1;
  return {
    ...webhook,
    failure_count,
    active: failure_count >= threshold ? false : webhook.active,
  };
}

export function reactivateWebhook(webhook: Webhook): Webhook {
  return { ...webhook, failure_count: 0, active: true };
}

/** Empty `events` subscribes to everything. */
export function webhookWants(webhook: Pick<Webhook, 'active' | 'events'>, type: string): boolean {
  return webhook.active && (webhook.events.length === 0 || webhook.events.some((e) => e === type));
}
