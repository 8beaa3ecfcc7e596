import { createHash, randomUUID } from 'node:crypto';
import type { Credential, CredentialKind, Identity } from '../domain/index.js';
import type { RegistryStore } from '../infrastructure/store/index.js';

/** Secrets as presented on a request, already pulled out of their slots. */
export interface PresentedSecrets {
  /** Dedicated edit-token slot (`X-Edit-Token` header or `?token=`). */
  editToken: string | null;
  /** Generic API key slot (`Authorization: Bearer` or `X-API-Key`). */
  apiKey: string | null;
  /** Client address, used as the anonymous bucket. */
  client: string;
}

const SECRET_PREFIX: Record<CredentialKind, string> = {
  admin: 'rk_',
  regular: 'rk_',
  edit_token: 'et_',
};

export function hashSecret(raw: string): string {
  return createHash('sha256').update(raw).digest('hex');
}

/** Mints a raw secret and the credential that stores its hash. */
export function issueCredential(input: {
  kind: CredentialKind;
  name: string;
  rate_limit?: number | null;
  listing_id?: string | null;
}): { secret: string; credential: Credential } {
  const secret = `${SECRET_PREFIX[input.kind]}${randomUUID().replaceAll('-', '')}`;
  return {
    secret,
    credential: {
      id: randomUUID(),
      key_hash: hashSecret(secret),
      kind: input.kind,
      name: input.name,
      rate_limit: input.rate_limit ?? null,
      listing_id: input.listing_id ?? null,
      created_at: new Date().toISOString(),
    },
  };
}

/**
 * Classifies a request's identity from its presented secrets.
 *
 * Precedence: a live edit token in the dedicated slot wins; otherwise the
 * API key slot is consulted. A secret that is unknown, revoked, or of the
 * wrong kind for its slot is ignored, and a request with nothing valid
 * resolves to anonymous instead of failing.
 */
export class CredentialResolver {
  constructor(private readonly store: RegistryStore) {}

  async resolve(secrets: PresentedSecrets): Promise<Identity> {
    if (secrets.editToken) {
      const credential = await this.lookup(secrets.editToken);
      if (credential?.kind === 'edit_token' && credential.listing_id !== null) {
        return { kind: 'edit_token', credential_id: credential.id, listing_id: credential.listing_id };
      }
    }

    if (secrets.apiKey) {
      const credential = await this.lookup(secrets.apiKey);
      if (credential?.kind === 'admin' || credential?.kind === 'regular') {
        return { kind: credential.kind, credential_id: credential.id, rate_limit: credential.rate_limit };
      }
    }

    return { kind: 'anonymous', client: secrets.client };
  }

  private async lookup(raw: string): Promise<Credential | undefined> {
    const [credential] = await this.store.list('credentials', { key_hash: hashSecret(raw) }, { limit: 1 });
    return credential;
  }
}
