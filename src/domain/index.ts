export type { Credential, CredentialKind, Identity } from './credential.js';
export { assertNever } from './credential.js';
export type { EventType, EventPayload, RegistryEvent } from './event.js';
export { EVENT_TYPES } from './event.js';
export type { Webhook } from './webhook.js';
export type { HealthStatus, ProbeOutcome, HealthCheckResult } from './health.js';
export type { Listing, ListingStatus, RateExemption } from './listing.js';
export { LISTING_STATUSES } from './listing.js';
