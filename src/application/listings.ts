import { randomUUID } from 'node:crypto';
import type { Identity, Listing, ListingStatus } from '../domain/index.js';
import type { RegistryStore } from '../infrastructure/store/index.js';
import { issueCredential } from './credential-resolver.js';
import type { EventBus } from './event-bus.js';
import type { PatchListingInput, SubmitListingInput } from './registry-schema.js';

export interface SubmittedListing {
  listing: Listing;
  /** Raw edit token; shown once. */
  edit_token: string;
}

const STATUS_EVENTS = {
  approved: 'listing.approved',
  rejected: 'listing.rejected',
  deprecated: 'listing.deprecated',
} as const;

/** Lowercase, ASCII, hyphen-separated. Falls back to "listing". */
export function slugify(name: string): string {
  const slug = name
    .normalize('NFKD')
    .replace(/[\u0300-\u036f]/g, '')
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '')
    .slice(0, 80);
  return slug.length > 0 ? slug : 'listing';
}

async function uniqueSlug(store: RegistryStore, name: string): Promise<string> {
  const base = slugify(name);
  if ((await store.count('listings', { slug: base })) === 0) return base;

  for (let n = 2; n < 100; n++) {
    const candidate = `${base}-${n}`;
    if ((await store.count('listings', { slug: candidate })) === 0) return candidate;
  }
  return `${base}-${randomUUID().slice(0, 8)}`;
}

function submitterOf(identity: Identity): string | null {
  return identity.kind === 'admin' || identity.kind === 'regular' ? identity.credential_id : null;
}

/**
 * Stores a new pending listing and mints its edit token.
 * Anyone may submit; a submitting key is remembered as the owner.
 */
export async function submitListing(
  store: RegistryStore,
  bus: EventBus,
  identity: Identity,
  input: SubmitListingInput,
): Promise<SubmittedListing> {
  const now = new Date().toISOString();
  const listing: Listing = {
    id: randomUUID(),
    name: input.name,
    slug: await uniqueSlug(store, input.name),
    short_description: input.short_description,
    description: input.description,
    homepage_url: input.homepage_url,
    api_url: input.api_url,
    status: 'pending',
    is_featured: false,
    is_verified: false,
    submitted_by_key_id: submitterOf(identity),
    last_health_status: null,
    last_checked_at: null,
    uptime_pct: null,
    created_at: now,
    updated_at: now,
  };
  await store.append('listings', listing);

  const { secret, credential } = issueCredential({
    kind: 'edit_token',
    name: `edit token for ${listing.slug}`,
    listing_id: listing.id,
  });
  await store.append('credentials', credential);

  bus.publish('listing.submitted', {
    listing_id: listing.id,
    name: listing.name,
    slug: listing.slug,
  });

  return { listing, edit_token: secret };
}

/**
 * Applies an already-authorized patch.
 * Publishes `listing.updated`, plus the status event when a review
 * decision changed the status.
 */
export async function updateListing(
  store: RegistryStore,
  bus: EventBus,
  listing: Listing,
  patch: PatchListingInput,
): Promise<Listing> {
  const updated: Listing = {
    ...listing,
    name: patch.name ?? listing.name,
    short_description: patch.short_description ?? listing.short_description,
    description: patch.description ?? listing.description,
    homepage_url: patch.homepage_url !== undefined ? patch.homepage_url : listing.homepage_url,
    api_url: patch.api_url !== undefined ? patch.api_url : listing.api_url,
    status: patch.status ?? listing.status,
    is_featured: patch.is_featured ?? listing.is_featured,
    is_verified: patch.is_verified ?? listing.is_verified,
    updated_at: new Date().toISOString(),
  };
  await store.upsert('listings', updated);

  bus.publish('listing.updated', {
    listing_id: updated.id,
    name: updated.name,
    fields: Object.keys(patch),
  });

  if (updated.status !== listing.status) {
    const type = statusEvent(updated.status);
    if (type !== null) {
      bus.publish(type, {
        listing_id: updated.id,
        name: updated.name,
        previous_status: listing.status,
      });
    }
  }

  return updated;
}

function statusEvent(status: ListingStatus): (typeof STATUS_EVENTS)[keyof typeof STATUS_EVENTS] | null {
  return status === 'pending' ? null : STATUS_EVENTS[status];
}

/** Removes the listing and revokes its edit tokens. Health history is kept. */
export async function deleteListing(store: RegistryStore, bus: EventBus, listing: Listing): Promise<void> {
  await store.remove('listings', listing.id);

  const tokens = await store.list('credentials', { listing_id: listing.id, kind: 'edit_token' });
  for (const token of tokens) {
    await store.remove('credentials', token.id);
  }

  bus.publish('listing.deleted', { listing_id: listing.id, name: listing.name });
}
