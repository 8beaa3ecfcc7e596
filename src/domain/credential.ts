/**
 * Credential and identity types.
 *
 * Raw secrets are never stored: a credential is addressed by the SHA-256
 * hex digest of the secret it was issued with.
 */

export type CredentialKind = 'admin' | 'regular' | 'edit_token';

export interface Credential {
  readonly id: string;
  readonly key_hash: string;
  readonly kind: CredentialKind;
  readonly name: string;
  /** Per-identity request budget; null falls back to the configured default. */
  readonly rate_limit: number | null;
  /** Set only for edit tokens. */
  readonly listing_id: string | null;
  readonly created_at: string;
}

/**
 * Resolved identity of an inbound request.
 *
 * Closed union — call sites switch on `kind` and must handle every case.
 */
export type Identity =
  | { readonly kind: 'admin'; readonly credential_id: string; readonly rate_limit: number | null }
  | { readonly kind: 'regular'; readonly credential_id: string; readonly rate_limit: number | null }
  | { readonly kind: 'edit_token'; readonly credential_id: string; readonly listing_id: string }
  | { readonly kind: 'anonymous'; readonly client: string };

export function assertNever(value: never): never {
  throw new Error(`Unhandled variant: ${JSON.stringify(value)}`);
}
