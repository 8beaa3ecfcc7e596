import { createHmac } from 'node:crypto';
import type { RegistryEvent } from '../../domain/index.js';

export const SIGNATURE_HEADER = 'X-Registry-Signature';
export const EVENT_HEADER = 'X-Registry-Event';

/** Hex HMAC-SHA256 of the exact body bytes sent. */
export function signPayload(secret: string, body: string): string {
  return createHmac('sha256', secret).update(body, 'utf8').digest('hex');
}

/** Wire form of an event as POSTed to webhook targets. */
export function serializeEvent(event: RegistryEvent): string {
  return JSON.stringify({
    event: event.type,
    data: event.payload,
    timestamp: event.timestamp,
  });
}
