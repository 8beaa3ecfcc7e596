import type { Logger } from 'pino';
import type { Credential } from '../domain/index.js';
import type { RegistryStore } from '../infrastructure/store/index.js';
import { hashSecret, issueCredential } from './credential-resolver.js';
import type { CreateKeyInput } from './registry-schema.js';

/** A credential as shown over the API: never its hash. */
export type PublicCredential = Omit<Credential, 'key_hash'>;

export function toPublicCredential({ key_hash: _hash, ...rest }: Credential): PublicCredential {
  return rest;
}

/** Issues an API key. Returns the raw secret once, with the stored record. */
export async function createApiKey(
  store: RegistryStore,
  input: CreateKeyInput,
): Promise<{ key: string; credential: PublicCredential }> {
  const { secret, credential } = issueCredential({
    kind: input.kind,
    name: input.name,
    rate_limit: input.rate_limit,
  });
  await store.append('credentials', credential);
  return { key: secret, credential: toPublicCredential(credential) };
}

/** API keys only; edit tokens are managed through their listing. */
export async function listApiKeys(store: RegistryStore): Promise<PublicCredential[]> {
  const [admins, regulars] = await Promise.all([
    store.list('credentials', { kind: 'admin' }),
    store.list('credentials', { kind: 'regular' }),
  ]);
  return [...admins, ...regulars]
    .sort((a, b) => a.created_at.localeCompare(b.created_at))
    .map(toPublicCredential);
}

export async function revokeApiKey(store: RegistryStore, id: string): Promise<boolean> {
  const credential = await store.get('credentials', id);
  if (credential === undefined || credential.kind === 'edit_token') return false;
  return store.remove('credentials', id);
}

/**
 * Makes sure an admin credential exists at startup.
 *
 * A configured key is registered if it is not already known. Without one,
 * and with no admin on record, a fresh admin key is minted and logged once.
 */
export async function ensureAdminCredential(
  store: RegistryStore,
  configuredKey: string | null,
  log: Logger,
): Promise<void> {
  if (configuredKey !== null) {
    const existing = await store.list('credentials', { key_hash: hashSecret(configuredKey) }, { limit: 1 });
    if (existing.length > 0) return;

    const { credential } = issueCredential({ kind: 'admin', name: 'bootstrap admin' });
    await store.append('credentials', { ...credential, key_hash: hashSecret(configuredKey) });
    log.info({ credentialId: credential.id }, 'Configured admin key registered');
    return;
  }

  if ((await store.count('credentials', { kind: 'admin' })) > 0) return;

  const { secret, credential } = issueCredential({ kind: 'admin', name: 'generated admin' });
  await store.append('credentials', credential);
  log.warn({ credentialId: credential.id, key: secret }, 'No admin key configured; generated one (shown once)');
}
