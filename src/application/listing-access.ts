import { assertNever, type Identity, type Listing } from '../domain/index.js';

/** Fields only an admin may change. */
export const RESERVED_LISTING_FIELDS = ['status', 'is_featured', 'is_verified'] as const;

export type ReservedListingField = (typeof RESERVED_LISTING_FIELDS)[number];

export type EditDecision =
  | { allowed: true; mayTouchReserved: boolean }
  | { allowed: false; status: 401 | 403; reason: string };

/**
 * Decides whether `identity` may edit or delete `listing`.
 *
 * An edit token is good for exactly the listing it was minted for;
 * a regular key only for listings it submitted.
 */
export function authorizeListingEdit(
  identity: Identity,
  listing: Pick<Listing, 'id' | 'submitted_by_key_id'>,
): EditDecision {
  switch (identity.kind) {
    case 'admin':
      return { allowed: true, mayTouchReserved: true };
    case 'regular':
      return identity.credential_id === listing.submitted_by_key_id
        ? { allowed: true, mayTouchReserved: false }
        : { allowed: false, status: 403, reason: 'This key did not submit the listing' };
    case 'edit_token':
      return identity.listing_id === listing.id
        ? { allowed: true, mayTouchReserved: false }
        : { allowed: false, status: 403, reason: 'Edit token does not belong to this listing' };
    case 'anonymous':
      return { allowed: false, status: 401, reason: 'An API key or edit token is required' };
    default:
      return assertNever(identity);
  }
}

/** Reserved fields present in a patch. */
export function reservedFieldsIn(patch: Partial<Record<ReservedListingField, unknown>>): ReservedListingField[] {
  return RESERVED_LISTING_FIELDS.filter((field) => patch[field] !== undefined);
}
