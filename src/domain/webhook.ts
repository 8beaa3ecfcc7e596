import type { EventType } from './event.js';

/**
 * Registered webhook target.
 *
 * `events` empty means "all event types".
 * `active` is false exactly when `failure_count` has reached the
 * auto-disable threshold; only a successful delivery or an explicit
 * reactivation brings the counter back to zero.
 */
export interface Webhook {
  readonly id: string;
  readonly url: string;
  readonly secret: string;
  readonly events: readonly EventType[];
  readonly active: boolean;
  readonly failure_count: number;
  readonly last_triggered_at: string | null;
  readonly created_at: string;
  readonly created_by: string;
}
