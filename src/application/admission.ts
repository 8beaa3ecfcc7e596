import { assertNever, type Identity } from '../domain/index.js';
import type { RateLimitConfig } from '../infrastructure/config/index.js';

export interface AdmissionPolicy {
  bucket: string;
  limit: number;
}

/**
 * Maps a resolved identity to its rate-limit bucket and budget.
 *
 * Keys are limited per credential (with an optional per-key override),
 * edit tokens per listing, anonymous callers per client address.
 */
export function admissionPolicy(identity: Identity, config: RateLimitConfig): AdmissionPolicy {
  switch (identity.kind) {
    case 'admin':
      return { bucket: `key:${identity.credential_id}`, limit: identity.rate_limit ?? config.adminLimit };
    case 'regular':
      return { bucket: `key:${identity.credential_id}`, limit: identity.rate_limit ?? config.defaultLimit };
    case 'edit_token':
      return { bucket: `listing:${identity.listing_id}`, limit: config.defaultLimit };
    case 'anonymous':
      return { bucket: `ip:${identity.client}`, limit: config.defaultLimit };
    default:
      return assertNever(identity);
  }
}
