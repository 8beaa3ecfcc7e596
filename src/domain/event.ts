/**
 * Events published on the in-process bus.
 *
 * Events are never persisted: they live for the duration of a publish call
 * and in the bounded queues of live subscribers.
 */

export const EVENT_TYPES = [
  'listing.submitted',
  'listing.approved',
  'listing.rejected',
  'listing.deprecated',
  'listing.updated',
  'listing.deleted',
  'health.checked',
] as const;

export type EventType = (typeof EVENT_TYPES)[number];

export type EventPayload = Record<string, unknown>;

export interface RegistryEvent {
  readonly type: EventType;
  readonly payload: EventPayload;
  readonly timestamp: string; // ISO-8601
}
